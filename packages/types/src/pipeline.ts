import type { PassageMetadata } from "./search.js";

export interface ParseResult {
  text: string;
  pageCount: number;
  metadata: Record<string, unknown>;
}

export interface IngestionInput {
  documentId: string;
  ownerId: string;
  filename: string;
  contentType: string;
  text: string;
  category?: string;
}

export interface IngestionResult {
  documentId: string;
  chunkCount: number;
  indexedCount: number;
  totalCharacters: number;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface PassageRecord {
  text: string;
  vector: number[];
  metadata: PassageMetadata;
}
