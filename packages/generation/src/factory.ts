import type { CircuitState } from "@groundwrite/errors";
import type { GenerationConfig } from "@groundwrite/types";
import type { IGenerationProvider } from "./generation-provider.interface.js";
import { CohereGenerationProvider } from "./cohere-provider.js";
import { TgiGenerationProvider } from "./tgi-provider.js";

export function createGenerationProvider(
  config: GenerationConfig,
  onCircuitStateChange?: (name: string, state: CircuitState) => void,
): IGenerationProvider {
  switch (config.provider) {
    case "tgi":
      if (!config.tgiUrl) {
        throw new Error("tgiUrl is required when provider is 'tgi'");
      }
      return new TgiGenerationProvider({
        baseUrl: config.tgiUrl,
        timeoutMs: config.timeoutMs,
        onCircuitStateChange,
      });
    case "cohere":
      if (!config.cohereApiKey) {
        throw new Error("cohereApiKey is required when provider is 'cohere'");
      }
      return new CohereGenerationProvider({
        apiKey: config.cohereApiKey,
        model: config.cohereModel,
        timeoutMs: config.timeoutMs,
        onCircuitStateChange,
      });
    default:
      throw new Error(`Unknown generation provider: ${String(config.provider)}`);
  }
}
