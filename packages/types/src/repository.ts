import type { ArticleRecord, NewArticle, Product } from "./article.js";

export interface ArticleRepository {
  insert(article: NewArticle): Promise<ArticleRecord>;
  findById(id: string): Promise<ArticleRecord | null>;
}

export interface ProductCatalog {
  /** Products whose category or any tag is in `categories`. */
  findByCategories(categories: string[], limit: number): Promise<Product[]>;
}
