import { ExternalServiceError, ExtractionFailureError } from "@groundwrite/errors";
import type { IChunker } from "@groundwrite/chunker";
import type { IEmbeddingProvider } from "@groundwrite/embeddings";
import type { Logger } from "@groundwrite/logger";
import type { ISearchIndex } from "@groundwrite/search-index";
import {
  DEFAULT_MAX_CHUNK_CHARS,
  type EmbeddingResult,
  type IngestionInput,
  type IngestionResult,
  type PassageRecord,
} from "@groundwrite/types";

export interface IngestionDependencies {
  chunker: IChunker;
  embeddingProvider: IEmbeddingProvider;
  searchIndex: ISearchIndex;
  maxChunkChars?: number;
  logger?: Logger;
  now?: () => Date;
  onChunked?: (chunks: string[]) => Promise<void>;
  onEmbedded?: (result: EmbeddingResult) => Promise<void>;
  onIndexed?: (indexedCount: number) => Promise<void>;
}

/**
 * Ingestion pipeline: Chunk -> Embed -> Index
 *
 * Every chunk is indexed with its position, the owner and the upload time so
 * retrieval and retention cleanup can find it again.
 */
export async function ingestDocument(
  input: IngestionInput,
  deps: IngestionDependencies,
): Promise<IngestionResult> {
  const log = deps.logger?.child({ documentId: input.documentId });

  if (input.text.trim().length === 0) {
    throw new ExtractionFailureError(input.documentId, `Could not extract text from ${input.filename}`);
  }

  // Phase 1: Chunk
  const chunks = deps.chunker.chunk(input.text, {
    maxChunkChars: deps.maxChunkChars ?? DEFAULT_MAX_CHUNK_CHARS,
  });
  if (deps.onChunked) await deps.onChunked(chunks);
  log?.debug({ chunks: chunks.length }, "document chunked");

  // Phase 2: Embed
  const embeddingResult = await deps.embeddingProvider.batchEmbed(chunks, "document");
  if (embeddingResult.embeddings.length !== chunks.length) {
    throw new ExternalServiceError(
      `Expected ${String(chunks.length)} embeddings, got ${String(embeddingResult.embeddings.length)}`,
      deps.embeddingProvider.name,
    );
  }
  if (deps.onEmbedded) await deps.onEmbedded(embeddingResult);

  // Phase 3: Index
  const uploadTimestamp = (deps.now ?? (() => new Date()))().toISOString();
  const passages: PassageRecord[] = chunks.map((text, chunkId) => ({
    text,
    vector: embeddingResult.embeddings[chunkId] ?? [],
    metadata: {
      kind: "document",
      ownerId: input.ownerId,
      filename: input.filename,
      chunkId,
      totalChunks: chunks.length,
      uploadTimestamp,
      contentType: input.contentType,
      ...(input.category !== undefined ? { category: input.category } : {}),
    },
  }));

  const indexedCount = await deps.searchIndex.index(passages);
  if (deps.onIndexed) await deps.onIndexed(indexedCount);
  if (indexedCount < passages.length) {
    log?.warn({ indexedCount, chunks: passages.length }, "some chunks were not indexed");
  }
  log?.info({ chunks: chunks.length, indexedCount }, "document ingested");

  return {
    documentId: input.documentId,
    chunkCount: chunks.length,
    indexedCount,
    totalCharacters: input.text.length,
  };
}
