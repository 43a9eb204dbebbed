import { CohereClient } from "cohere-ai";
import { ExternalServiceError, withRetry } from "@groundwrite/errors";
import type { RetryOptions } from "@groundwrite/errors";
import type { EmbeddingResult } from "@groundwrite/types";
import type { EmbeddingPurpose, IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  retry?: RetryOptions;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;
  private retry?: RetryOptions;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.retry = config.retry;
  }

  async embed(text: string, purpose: EmbeddingPurpose = "query"): Promise<EmbeddingResult> {
    return this.batchEmbed([text], purpose);
  }

  async batchEmbed(texts: string[], purpose: EmbeddingPurpose = "document"): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await withRetry(
        () =>
          this.client.v2.embed({
            texts: batch,
            model: this.model,
            inputType: purpose === "document" ? "search_document" : "search_query",
            embeddingTypes: ["float"],
          }),
        this.retry,
      );

      const vectors = response.embeddings.float;
      if (!vectors || vectors.length !== batch.length) {
        throw new ExternalServiceError("Cohere returned no float embeddings", this.name);
      }
      allEmbeddings.push(...vectors);

      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }
}
