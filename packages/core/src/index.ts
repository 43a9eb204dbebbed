export { extractTerms, STOP_WORDS } from "./term-extractor.js";

export {
  retrieve,
  retrieveAll,
  buildTermQuery,
  dedupePassages,
  DEFAULT_RETRIEVAL_LIMIT,
} from "./context-retriever.js";
export type { RetrievalDependencies } from "./context-retriever.js";

export {
  generate,
  generateOrThrow,
  countWords,
  tokenize,
  stripEcho,
  assertTargetWordCount,
  ARTICLE_SAMPLING,
  MAX_CONTINUATION_ROUNDS,
} from "./grounded-generator.js";
export type { GeneratorDependencies } from "./grounded-generator.js";

export {
  INSUFFICIENT_CONTEXT_SENTINEL,
  ARTICLE_MARKER,
  CONTINUATION_MARKER,
  DEFAULT_CONTEXT_CHAR_BUDGET,
  buildArticlePrompt,
  buildContinuationPrompt,
  buildCategoryPrompt,
} from "./prompts.js";

export { ingestDocument } from "./ingestion-pipeline.js";
export type { IngestionDependencies } from "./ingestion-pipeline.js";

export { createArticle, searchOwnedPassages } from "./generation-pipeline.js";
export type { GenerationDependencies } from "./generation-pipeline.js";

export { suggestCategories, recommendProducts, parseCategories } from "./recommendations.js";
export type { RecommendationDependencies } from "./recommendations.js";
