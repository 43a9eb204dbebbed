export type { IChunker } from "./chunker.interface.js";
export { TokenBudgetChunker, chunkText, buildChunks } from "./token-budget-chunker.js";
