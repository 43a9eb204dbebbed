export type PassageKind = "document" | "article";

export interface PassageMetadata {
  kind: PassageKind;
  ownerId: string;
  filename?: string;
  chunkId?: number;
  totalChunks?: number;
  uploadTimestamp: string;
  contentType: string;
  category?: string;
  articleId?: string;
  topic?: string;
}

export interface FieldBoost {
  field: string;
  boost?: number;
}

export interface MultiFieldClause {
  kind: "multi_field";
  fields: FieldBoost[];
  fuzzy: boolean;
  minimumShouldMatch: string;
}

export interface FieldMatchClause {
  kind: "field_match";
  field: string;
  operator: "or" | "and";
  minimumShouldMatch?: string;
}

export type QueryClause = MultiFieldClause | FieldMatchClause;

/**
 * Backend-neutral ranked query. Clauses are alternatives; at least
 * `minimumClauseMatches` must hit and the hit must reach `minScore`.
 */
export interface RankedQuery {
  text: string;
  clauses: QueryClause[];
  minimumClauseMatches: number;
  minScore?: number;
  size: number;
  filter?: { ownerId?: string };
}

export interface SearchHit {
  id: string;
  score: number;
  content?: string;
  metadata: Partial<PassageMetadata>;
}
