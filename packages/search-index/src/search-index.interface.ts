import type { PassageRecord, RankedQuery, SearchHit } from "@groundwrite/types";

export interface ISearchIndex {
  /** Returns the number of passages the backend accepted. */
  index(passages: PassageRecord[]): Promise<number>;
  search(query: RankedQuery): Promise<SearchHit[]>;
  ensureIndex(dimensions: number): Promise<void>;
  /** Resolves false when no passage has that id. */
  deletePassage(id: string): Promise<boolean>;
  /** Removes passages uploaded more than `days` days ago; returns how many. */
  deleteOlderThan(days: number): Promise<number>;
  healthCheck(): Promise<boolean>;
}
