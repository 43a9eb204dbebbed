export type { IGenerationProvider } from "./generation-provider.interface.js";
export { TgiGenerationProvider } from "./tgi-provider.js";
export type { TgiProviderConfig } from "./tgi-provider.js";
export { CohereGenerationProvider, toFrequencyPenalty } from "./cohere-provider.js";
export type { CohereGenerationConfig } from "./cohere-provider.js";
export { createGenerationProvider } from "./factory.js";
