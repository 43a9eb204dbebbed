export interface Chunk {
  text: string;
  sequenceIndex: number;
  parentDocumentId: string;
}

export interface ChunkingConfig {
  /** Character budget per chunk; a single oversized token may exceed it. */
  maxChunkChars: number;
}

export const DEFAULT_MAX_CHUNK_CHARS = 1000;
