import type { Chunk, ChunkingConfig } from "@groundwrite/types";
import type { IChunker } from "./chunker.interface.js";

/**
 * Yield chunks of whitespace-delimited tokens. Each token costs its length
 * plus one separator; a chunk closes when the next token would push it past
 * `maxChunkChars`. Tokens are never split, so a token longer than the budget
 * becomes a chunk of its own.
 */
export function* chunkText(text: string, maxChunkChars: number): Generator<string> {
  let current: string[] = [];
  let currentSize = 0;

  for (const token of text.split(/\s+/)) {
    if (token.length === 0) continue;

    const tokenSize = token.length + 1;
    if (current.length > 0 && currentSize + tokenSize > maxChunkChars) {
      yield current.join(" ");
      current = [];
      currentSize = 0;
    }
    current.push(token);
    currentSize += tokenSize;
  }

  if (current.length > 0) {
    yield current.join(" ");
  }
}

export function buildChunks(documentId: string, text: string, maxChunkChars: number): Chunk[] {
  return Array.from(chunkText(text, maxChunkChars), (chunk, sequenceIndex) => ({
    text: chunk,
    sequenceIndex,
    parentDocumentId: documentId,
  }));
}

export class TokenBudgetChunker implements IChunker {
  readonly strategy = "token-budget";

  chunk(content: string, config: ChunkingConfig): string[] {
    if (!Number.isInteger(config.maxChunkChars) || config.maxChunkChars < 1) {
      throw new RangeError(`maxChunkChars must be a positive integer, got ${String(config.maxChunkChars)}`);
    }
    return Array.from(chunkText(content, config.maxChunkChars));
  }
}
