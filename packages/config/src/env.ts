import { z } from "zod";
import type { AppConfig } from "@groundwrite/types";

const intString = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const boolString = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((val) => val === "true");

/**
 * Zod schema for all environment variables listed in .env.example.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string()
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgresql://"), {
        message: "DATABASE_URL must start with postgresql://",
      }),
    DATABASE_POOL_MAX: intString("10"),

    // ---------- Redis ----------
    REDIS_URL: z.string().min(1, "REDIS_URL is required"),

    // ---------- OpenSearch ----------
    OPENSEARCH_URL: z.string().url("OPENSEARCH_URL must be a URL"),
    OPENSEARCH_USERNAME: z.string().optional(),
    OPENSEARCH_PASSWORD: z.string().optional(),
    OPENSEARCH_INDEX: z.string().min(1).default("documents"),
    OPENSEARCH_REJECT_UNAUTHORIZED: boolString("true"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "tei"]).default("tei"),
    EMBEDDING_DIMENSIONS: intString("384"),
    TEI_URL: z.string().url().optional(),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    COHERE_CHAT_MODEL: z.string().default("command-r-plus"),

    // ---------- Generation ----------
    GENERATION_PROVIDER: z.enum(["tgi", "cohere"]).default("tgi"),
    TGI_URL: z.string().url().optional(),
    GENERATION_TIMEOUT_MS: intString("120000"),
    GENERATION_CONCURRENCY: intString("1"),

    // ---------- Pipeline ----------
    CHUNK_MAX_CHARS: intString("1000"),
    TARGET_WORD_COUNT: intString("800"),
    RETRIEVAL_LIMIT: intString("5"),
    CONTEXT_CHAR_BUDGET: intString("2000"),
    MAX_CONTINUATION_ROUNDS: z
      .string()
      .default("1")
      .transform(Number)
      .pipe(z.number().int().min(1).max(3)),
    PASSAGE_RETENTION_DAYS: intString("30"),
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDING_PROVIDER === "tei" && !env.TEI_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TEI_URL"],
        message: "TEI_URL is required when EMBEDDING_PROVIDER is tei",
      });
    }
    if (env.GENERATION_PROVIDER === "tgi" && !env.TGI_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TGI_URL"],
        message: "TGI_URL is required when GENERATION_PROVIDER is tgi",
      });
    }
    const usesCohere = env.EMBEDDING_PROVIDER === "cohere" || env.GENERATION_PROVIDER === "cohere";
    if (usesCohere && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when a cohere provider is selected",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) into an
 * {@link AppConfig}. Throws a ZodError listing every invalid variable.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    openSearch: {
      url: parsed.OPENSEARCH_URL,
      username: parsed.OPENSEARCH_USERNAME,
      password: parsed.OPENSEARCH_PASSWORD,
      index: parsed.OPENSEARCH_INDEX,
      rejectUnauthorized: parsed.OPENSEARCH_REJECT_UNAUTHORIZED,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      cohereApiKey: parsed.COHERE_API_KEY ?? "",
      cohereModel: parsed.COHERE_EMBED_MODEL,
      teiUrl: parsed.TEI_URL,
    },

    generation: {
      provider: parsed.GENERATION_PROVIDER,
      tgiUrl: parsed.TGI_URL,
      cohereApiKey: parsed.COHERE_API_KEY ?? "",
      cohereModel: parsed.COHERE_CHAT_MODEL,
      timeoutMs: parsed.GENERATION_TIMEOUT_MS,
      concurrency: parsed.GENERATION_CONCURRENCY,
    },

    pipeline: {
      maxChunkChars: parsed.CHUNK_MAX_CHARS,
      targetWordCount: parsed.TARGET_WORD_COUNT,
      retrievalLimit: parsed.RETRIEVAL_LIMIT,
      contextCharBudget: parsed.CONTEXT_CHAR_BUDGET,
      maxContinuationRounds: parsed.MAX_CONTINUATION_ROUNDS,
      passageRetentionDays: parsed.PASSAGE_RETENTION_DAYS,
    },
  };
}
