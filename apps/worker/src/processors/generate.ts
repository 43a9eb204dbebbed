import {
  createArticle,
  recommendProducts,
  type GenerationDependencies,
  type RecommendationDependencies,
} from "@groundwrite/core";
import type { ArticleResult, ModelJobData, ProductRecommendation } from "@groundwrite/types";

export type GenerateProcessorDependencies = GenerationDependencies & RecommendationDependencies;

/**
 * Model-bound jobs. The generation queue's worker concurrency decides how many
 * of these share the model at once.
 */
export async function processGenerate(
  data: ModelJobData,
  deps: GenerateProcessorDependencies,
): Promise<ArticleResult | ProductRecommendation> {
  switch (data.type) {
    case "generate":
      return createArticle(
        {
          topic: data.topic,
          ownerId: data.ownerId,
          ...(data.targetWordCount !== undefined ? { targetWordCount: data.targetWordCount } : {}),
        },
        deps,
      );
    case "recommend":
      return recommendProducts(data.articleId, deps);
  }
}
