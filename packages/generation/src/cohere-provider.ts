import { CohereClient } from "cohere-ai";
import { GenerationCapabilityError, createCircuitBreaker } from "@groundwrite/errors";
import type { CircuitState } from "@groundwrite/errors";
import type { SamplingParams } from "@groundwrite/types";
import type CircuitBreaker from "opossum";
import type { IGenerationProvider } from "./generation-provider.interface.js";

const DEFAULT_MODEL = "command-r-08-2024";
const DEFAULT_TIMEOUT_MS = 60_000;

export interface CohereGenerationConfig {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  onCircuitStateChange?: (name: string, state: CircuitState) => void;
}

/**
 * Cohere has no repetition penalty; a penalty of 1.2 maps to a frequency
 * penalty of 0.2, clamped to Cohere's [0, 1] range.
 */
export function toFrequencyPenalty(repetitionPenalty: number | undefined): number | undefined {
  if (repetitionPenalty === undefined) return undefined;
  return Math.min(1, Math.max(0, Number((repetitionPenalty - 1).toFixed(2))));
}

export class CohereGenerationProvider implements IGenerationProvider {
  readonly name = "cohere";
  private client: CohereClient;
  private model: string;
  private breaker: CircuitBreaker<[string, SamplingParams], string>;

  constructor(config: CohereGenerationConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.breaker = createCircuitBreaker(
      "cohere-chat",
      (prompt: string, params: SamplingParams) => this.chat(prompt, params),
      { timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS, onStateChange: config.onCircuitStateChange },
    );
  }

  async generate(prompt: string, params: SamplingParams): Promise<string> {
    try {
      return await this.breaker.fire(prompt, params);
    } catch (err: unknown) {
      if (err instanceof GenerationCapabilityError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new GenerationCapabilityError(`Cohere chat failed: ${message}`, this.name, { cause: err });
    }
  }

  private async chat(prompt: string, params: SamplingParams): Promise<string> {
    const frequencyPenalty = toFrequencyPenalty(params.repetitionPenalty);
    const response = await this.client.v2.chat({
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      maxTokens: params.maxNewTokens,
      temperature: params.temperature,
      ...(params.topP !== undefined ? { p: params.topP } : {}),
      ...(frequencyPenalty !== undefined ? { frequencyPenalty } : {}),
    });

    const parts: string[] = [];
    for (const item of response.message?.content ?? []) {
      if (item.type === "text") parts.push(item.text);
    }
    if (parts.length === 0) {
      throw new GenerationCapabilityError("Cohere chat returned no text", this.name);
    }
    return parts.join("");
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.generate("ping", { maxNewTokens: 1, temperature: 0 });
      return true;
    } catch {
      return false;
    }
  }

  shutdown(): void {
    this.breaker.shutdown();
  }
}
