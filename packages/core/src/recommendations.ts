import { NotFoundError } from "@groundwrite/errors";
import type { IGenerationProvider } from "@groundwrite/generation";
import type { Logger } from "@groundwrite/logger";
import type { ArticleRepository, ProductCatalog, ProductRecommendation } from "@groundwrite/types";
import { ARTICLE_SAMPLING } from "./grounded-generator.js";
import { buildCategoryPrompt } from "./prompts.js";

const MAX_CATEGORIES = 5;
const PRODUCT_LIMIT = 10;
const ECHO_PREFIXES = ["Based", "Categories", "Requirements", "Article"];

export interface RecommendationDependencies {
  articleRepository: ArticleRepository;
  productCatalog: ProductCatalog;
  generationProvider: IGenerationProvider;
  logger?: Logger;
}

export function parseCategories(raw: string): string[] {
  return raw
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !ECHO_PREFIXES.some((prefix) => line.startsWith(prefix)))
    .slice(0, MAX_CATEGORIES);
}

export async function suggestCategories(
  article: { topic: string; content: string },
  deps: Pick<RecommendationDependencies, "generationProvider">,
): Promise<string[]> {
  const raw = await deps.generationProvider.generate(buildCategoryPrompt(article.topic, article.content), {
    ...ARTICLE_SAMPLING,
    maxNewTokens: 100,
    temperature: 0.3,
  });
  return parseCategories(raw);
}

export async function recommendProducts(
  articleId: string,
  deps: RecommendationDependencies,
): Promise<ProductRecommendation> {
  const article = await deps.articleRepository.findById(articleId);
  if (!article) {
    throw new NotFoundError(`Article not found: ${articleId}`);
  }

  const categories = await suggestCategories(article, deps);
  const products =
    categories.length > 0 ? await deps.productCatalog.findByCategories(categories, PRODUCT_LIMIT) : [];
  deps.logger?.info({ articleId, categories, products: products.length }, "products recommended");

  return { articleId, topic: article.topic, categories, products };
}
