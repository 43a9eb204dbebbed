import { ExternalServiceError, withRetry } from "@groundwrite/errors";
import type { RetryOptions } from "@groundwrite/errors";
import type { EmbeddingResult } from "@groundwrite/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 384;
const BATCH_SIZE = 32;

export interface TeiProviderConfig {
  baseUrl: string;
  dimensions?: number;
  /** Model name recorded on results; the server decides which model runs. */
  model?: string;
  retry?: RetryOptions;
  fetch?: typeof fetch;
}

function isVectorList(value: unknown): value is number[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((n) => typeof n === "number"))
  );
}

/**
 * Self-hosted text-embeddings-inference server (sentence-transformers models).
 * Vectors are requested normalized so cosine and dot product agree.
 */
export class TeiEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "tei";
  readonly dimensions: number;
  private baseUrl: string;
  private model: string;
  private retry?: RetryOptions;
  private fetchFn: typeof fetch;

  constructor(config: TeiProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.model = config.model ?? "sentence-transformers";
    this.retry = config.retry;
    this.fetchFn = config.fetch ?? fetch;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const embeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);
      embeddings.push(...(await withRetry(() => this.request(batch), this.retry)));
    }

    for (const vector of embeddings) {
      if (vector.length !== this.dimensions) {
        throw new ExternalServiceError(
          `Embedding dimension mismatch: expected ${String(this.dimensions)}, got ${String(vector.length)}`,
          this.name,
        );
      }
    }

    return {
      embeddings,
      model: this.model,
      // TEI does not report usage
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }

  private async request(inputs: string[]): Promise<number[][]> {
    const response = await this.fetchFn(`${this.baseUrl}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ inputs, normalize: true, truncate: true }),
    });

    if (!response.ok) {
      throw new ExternalServiceError(
        `Embedding request failed: ${String(response.status)} ${response.statusText}`,
        this.name,
      );
    }

    const data: unknown = await response.json();
    if (!isVectorList(data) || data.length !== inputs.length) {
      throw new ExternalServiceError("Embedding server returned an unexpected payload", this.name);
    }
    return data;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchFn(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
