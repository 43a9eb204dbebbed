import type { ChunkingConfig } from "@groundwrite/types";

export interface IChunker {
  readonly strategy: string;
  chunk(content: string, config: ChunkingConfig): string[];
}
