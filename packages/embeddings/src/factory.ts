import type { EmbeddingConfig } from "@groundwrite/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { TeiEmbeddingProvider } from "./tei-provider.js";

export function createEmbeddingProvider(config: EmbeddingConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohereApiKey) {
        throw new Error("cohereApiKey is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider({
        apiKey: config.cohereApiKey,
        model: config.cohereModel,
        dimensions: config.dimensions,
      });
    case "tei":
      if (!config.teiUrl) {
        throw new Error("teiUrl is required when provider is 'tei'");
      }
      return new TeiEmbeddingProvider({ baseUrl: config.teiUrl, dimensions: config.dimensions });
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
