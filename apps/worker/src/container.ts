import { TokenBudgetChunker } from "@groundwrite/chunker";
import { closeDbClient, createDbClient, DrizzleArticleRepository, DrizzleProductCatalog } from "@groundwrite/db";
import { createEmbeddingProvider } from "@groundwrite/embeddings";
import { createGenerationProvider } from "@groundwrite/generation";
import type { Logger } from "@groundwrite/logger";
import { createParserRegistry } from "@groundwrite/parser";
import { createSearchIndex } from "@groundwrite/search-index";
import type { AppConfig } from "@groundwrite/types";
import type { IngestProcessorDependencies } from "./processors/ingest.js";
import type { GenerateProcessorDependencies } from "./processors/generate.js";
import type { MaintenanceDependencies } from "./processors/maintenance.js";

export interface WorkerDependencies {
  ingest: IngestProcessorDependencies;
  generate: GenerateProcessorDependencies;
  maintenance: MaintenanceDependencies;
  ensureIndex(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Builds every capability once and hands each processor the slice it needs.
 */
export function createWorkerDependencies(config: AppConfig, logger: Logger): WorkerDependencies {
  const onCircuitStateChange = (name: string, state: string): void => {
    logger.warn({ circuit: name, state }, "circuit breaker state changed");
  };

  const db = createDbClient(config.database);
  const searchIndex = createSearchIndex(config.openSearch);
  const embeddingProvider = createEmbeddingProvider(config.embedding);
  const generationProvider = createGenerationProvider(config.generation, onCircuitStateChange);
  const articleRepository = new DrizzleArticleRepository(db);
  const productCatalog = new DrizzleProductCatalog(db);

  return {
    ingest: {
      parsers: createParserRegistry(),
      chunker: new TokenBudgetChunker(),
      embeddingProvider,
      searchIndex,
      maxChunkChars: config.pipeline.maxChunkChars,
      logger: logger.child({ queue: "ingest" }),
    },
    generate: {
      searchIndex,
      embeddingProvider,
      generationProvider,
      articleRepository,
      productCatalog,
      logger: logger.child({ queue: "generate" }),
      retrievalLimit: config.pipeline.retrievalLimit,
      contextCharBudget: config.pipeline.contextCharBudget,
      maxContinuationRounds: config.pipeline.maxContinuationRounds,
      defaultTargetWordCount: config.pipeline.targetWordCount,
    },
    maintenance: {
      searchIndex,
      logger: logger.child({ queue: "maintenance" }),
    },
    ensureIndex: () => searchIndex.ensureIndex(embeddingProvider.dimensions),
    close: async () => {
      await searchIndex.close();
      await closeDbClient(db);
    },
  };
}
