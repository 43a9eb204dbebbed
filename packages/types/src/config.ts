export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  redis: RedisConfig;
  openSearch: OpenSearchConfig;
  embedding: EmbeddingConfig;
  generation: GenerationConfig;
  pipeline: PipelineConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface OpenSearchConfig {
  url: string;
  username?: string;
  password?: string;
  index: string;
  rejectUnauthorized: boolean;
}

export interface EmbeddingConfig {
  provider: "cohere" | "tei";
  dimensions: number;
  cohereApiKey: string;
  cohereModel: string;
  teiUrl?: string;
}

export interface GenerationConfig {
  provider: "tgi" | "cohere";
  tgiUrl?: string;
  cohereApiKey: string;
  cohereModel: string;
  timeoutMs: number;
  concurrency: number;
}

export interface PipelineConfig {
  maxChunkChars: number;
  targetWordCount: number;
  retrievalLimit: number;
  contextCharBudget: number;
  maxContinuationRounds: number;
  passageRetentionDays: number;
}
