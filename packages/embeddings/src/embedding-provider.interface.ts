import type { EmbeddingResult } from "@groundwrite/types";

export type EmbeddingPurpose = "document" | "query";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  embed(text: string, purpose?: EmbeddingPurpose): Promise<EmbeddingResult>;
  batchEmbed(texts: string[], purpose?: EmbeddingPurpose): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
