import { ExternalServiceError, NoRetrievableContextError } from "@groundwrite/errors";
import type { IEmbeddingProvider } from "@groundwrite/embeddings";
import type { IGenerationProvider } from "@groundwrite/generation";
import type { Logger } from "@groundwrite/logger";
import type { ISearchIndex } from "@groundwrite/search-index";
import type { ArticleRepository, ArticleRequest, ArticleResult, SearchHit } from "@groundwrite/types";
import { DEFAULT_RETRIEVAL_LIMIT, retrieveAll } from "./context-retriever.js";
import { assertTargetWordCount, generateOrThrow } from "./grounded-generator.js";
import { extractTerms } from "./term-extractor.js";

export interface GenerationDependencies {
  searchIndex: ISearchIndex;
  embeddingProvider: IEmbeddingProvider;
  generationProvider: IGenerationProvider;
  articleRepository: ArticleRepository;
  logger?: Logger;
  retrievalLimit?: number;
  contextCharBudget?: number;
  maxContinuationRounds?: number;
  defaultTargetWordCount?: number;
  now?: () => Date;
}

/**
 * Generation pipeline: Terms -> Retrieve -> Generate -> Persist -> Index
 *
 * The finished article is indexed like any other passage, so later articles
 * can draw on it. It is embedded before the row is written: a failed embed
 * leaves nothing behind for the job retry to duplicate.
 */
export async function createArticle(
  request: ArticleRequest,
  deps: GenerationDependencies,
): Promise<ArticleResult> {
  const { topic, ownerId } = request;
  const log = deps.logger?.child({ topic, ownerId });
  const targetWordCount = request.targetWordCount ?? deps.defaultTargetWordCount;
  if (targetWordCount !== undefined) {
    assertTargetWordCount(targetWordCount);
  }

  const terms = extractTerms(topic);
  if (terms.length === 0) {
    throw new NoRetrievableContextError(topic, "terms");
  }

  const context = await retrieveAll(terms, {
    searchIndex: deps.searchIndex,
    limit: deps.retrievalLimit,
    logger: log,
  });
  if (context.length === 0) {
    throw new NoRetrievableContextError(topic, "retrieval", { details: { terms } });
  }
  log?.info({ terms, passages: context.length }, "context retrieved");

  const artifact = await generateOrThrow(
    {
      topic,
      context,
      targetWordCount,
    },
    {
      generationProvider: deps.generationProvider,
      logger: log,
      contextCharBudget: deps.contextCharBudget,
      maxContinuationRounds: deps.maxContinuationRounds,
    },
  );

  const embedding = await deps.embeddingProvider.embed(artifact.content, "document");
  const vector = embedding.embeddings[0];
  if (!vector) {
    throw new ExternalServiceError("Embedding provider returned no vector", deps.embeddingProvider.name);
  }

  const createdAt = (deps.now ?? (() => new Date()))();
  const record = await deps.articleRepository.insert({ ...artifact, topic, ownerId, createdAt });

  await deps.searchIndex.index([
    {
      text: artifact.content,
      vector,
      metadata: {
        kind: "article",
        ownerId,
        articleId: record.id,
        topic,
        uploadTimestamp: createdAt.toISOString(),
        contentType: "article",
      },
    },
  ]);
  log?.info({ articleId: record.id, wordCount: artifact.wordCount }, "article created");

  return { articleId: record.id, topic, artifact };
}

/** Plain content match restricted to one owner's passages. */
export async function searchOwnedPassages(
  ownerId: string,
  query: string,
  deps: Pick<GenerationDependencies, "searchIndex">,
  limit: number = DEFAULT_RETRIEVAL_LIMIT,
): Promise<SearchHit[]> {
  return deps.searchIndex.search({
    text: query,
    clauses: [{ kind: "field_match", field: "content", operator: "or" }],
    minimumClauseMatches: 1,
    size: limit,
    filter: { ownerId },
  });
}
