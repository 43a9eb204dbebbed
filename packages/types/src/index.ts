export type { Chunk, ChunkingConfig } from "./chunk.js";
export { DEFAULT_MAX_CHUNK_CHARS } from "./chunk.js";

export type {
  ParseResult,
  IngestionInput,
  IngestionResult,
  EmbeddingResult,
  PassageRecord,
} from "./pipeline.js";

export type {
  GenerationRequest,
  GeneratedArtifact,
  GenerationOutcome,
  SamplingParams,
  ArticleRequest,
  ArticleResult,
} from "./generation.js";
export { DEFAULT_TARGET_WORD_COUNT } from "./generation.js";

export type {
  PassageKind,
  PassageMetadata,
  FieldBoost,
  MultiFieldClause,
  FieldMatchClause,
  QueryClause,
  RankedQuery,
  SearchHit,
} from "./search.js";

export type { ArticleRecord, NewArticle, Product, ProductRecommendation } from "./article.js";

export type {
  JobType,
  JobData,
  IngestJobData,
  GenerateJobData,
  RecommendJobData,
  ModelJobData,
  MaintenanceJobData,
  AnyJobData,
} from "./job.js";

export type {
  AppConfig,
  DatabaseConfig,
  RedisConfig,
  OpenSearchConfig,
  EmbeddingConfig,
  GenerationConfig,
  PipelineConfig,
} from "./config.js";

export type { ArticleRepository, ProductCatalog } from "./repository.js";
