import { eq, inArray, or, arrayOverlaps } from "drizzle-orm";
import type { ArticleRecord, ArticleRepository, NewArticle, Product, ProductCatalog } from "@groundwrite/types";
import type { DbClient } from "./client.js";
import { articles, products, type ArticleRow, type ProductRow } from "./schema/index.js";

export function toArticleRecord(row: ArticleRow): ArticleRecord {
  return {
    id: row.id,
    topic: row.topic,
    ownerId: row.ownerId,
    content: row.content,
    wordCount: row.wordCount,
    sourcePassageCount: row.sourcePassageCount,
    createdAt: row.createdAt,
  };
}

export function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    category: row.category,
    tags: row.tags,
    priceCents: row.priceCents,
  };
}

export class DrizzleArticleRepository implements ArticleRepository {
  private db: DbClient;

  constructor(db: DbClient) {
    this.db = db;
  }

  async insert(article: NewArticle): Promise<ArticleRecord> {
    const [row] = await this.db
      .insert(articles)
      .values({
        topic: article.topic,
        content: article.content,
        ownerId: article.ownerId,
        wordCount: article.wordCount,
        sourcePassageCount: article.sourcePassageCount,
        ...(article.createdAt ? { createdAt: article.createdAt } : {}),
      })
      .returning();

    if (!row) {
      throw new Error("Article insert returned no row");
    }
    return toArticleRecord(row);
  }

  async findById(id: string): Promise<ArticleRecord | null> {
    const [row] = await this.db.select().from(articles).where(eq(articles.id, id)).limit(1);
    return row ? toArticleRecord(row) : null;
  }
}

export class DrizzleProductCatalog implements ProductCatalog {
  private db: DbClient;

  constructor(db: DbClient) {
    this.db = db;
  }

  async findByCategories(categories: string[], limit: number): Promise<Product[]> {
    if (categories.length === 0) return [];

    const rows = await this.db
      .select()
      .from(products)
      .where(or(inArray(products.category, categories), arrayOverlaps(products.tags, categories)))
      .limit(limit);

    return rows.map(toProduct);
  }
}
