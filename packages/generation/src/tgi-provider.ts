import type CircuitBreaker from "opossum";
import { AppError, GenerationCapabilityError, createCircuitBreaker } from "@groundwrite/errors";
import type { CircuitState } from "@groundwrite/errors";
import type { SamplingParams } from "@groundwrite/types";
import type { IGenerationProvider } from "./generation-provider.interface.js";

const DEFAULT_TIMEOUT_MS = 120_000;

export interface TgiProviderConfig {
  baseUrl: string;
  /** Upper bound on one generate call; longer calls fail and count against the circuit. */
  timeoutMs?: number;
  fetch?: typeof fetch;
  onCircuitStateChange?: (name: string, state: CircuitState) => void;
}

interface TgiRequestBody {
  inputs: string;
  parameters: {
    max_new_tokens: number;
    temperature: number;
    do_sample: true;
    return_full_text: false;
    top_p?: number;
    repetition_penalty?: number;
    no_repeat_ngram_size?: number;
  };
}

function readGeneratedText(payload: unknown): string | undefined {
  const first: unknown = Array.isArray(payload) ? payload[0] : payload;
  if (typeof first === "object" && first !== null && "generated_text" in first) {
    const text = first.generated_text;
    return typeof text === "string" ? text : undefined;
  }
  return undefined;
}

/**
 * Self-hosted text-generation server speaking the `{inputs, parameters}`
 * protocol (text-generation-inference, or a transformers pipeline behind the
 * same route). Servers without n-gram blocking ignore `no_repeat_ngram_size`.
 */
export class TgiGenerationProvider implements IGenerationProvider {
  readonly name = "tgi";
  private baseUrl: string;
  private fetchFn: typeof fetch;
  private breaker: CircuitBreaker<[TgiRequestBody], string>;

  constructor(config: TgiProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.fetchFn = config.fetch ?? fetch;
    this.breaker = createCircuitBreaker("tgi-generate", (body: TgiRequestBody) => this.request(body), {
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      onStateChange: config.onCircuitStateChange,
    });
  }

  async generate(prompt: string, params: SamplingParams): Promise<string> {
    const body: TgiRequestBody = {
      inputs: prompt,
      parameters: {
        max_new_tokens: params.maxNewTokens,
        temperature: params.temperature,
        do_sample: true,
        return_full_text: false,
        ...(params.topP !== undefined ? { top_p: params.topP } : {}),
        ...(params.repetitionPenalty !== undefined
          ? { repetition_penalty: params.repetitionPenalty }
          : {}),
        ...(params.noRepeatNgramSize !== undefined
          ? { no_repeat_ngram_size: params.noRepeatNgramSize }
          : {}),
      },
    };

    try {
      return await this.breaker.fire(body);
    } catch (err: unknown) {
      if (AppError.isAppError(err)) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new GenerationCapabilityError(`Text generation failed: ${message}`, this.name, {
        cause: err,
      });
    }
  }

  private async request(body: TgiRequestBody): Promise<string> {
    const response = await this.fetchFn(`${this.baseUrl}/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      throw new GenerationCapabilityError(
        `Text generation failed: ${String(response.status)} ${response.statusText}`,
        this.name,
      );
    }

    const text = readGeneratedText(await response.json());
    if (text === undefined) {
      throw new GenerationCapabilityError("Generation server returned no generated_text", this.name);
    }
    return text;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchFn(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }

  shutdown(): void {
    this.breaker.shutdown();
  }
}
