import type { SamplingParams } from "@groundwrite/types";

export interface IGenerationProvider {
  readonly name: string;

  /** Returns the raw completion text; callers do their own cleanup. */
  generate(prompt: string, params: SamplingParams): Promise<string>;
  healthCheck(): Promise<boolean>;
}
