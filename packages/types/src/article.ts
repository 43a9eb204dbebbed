import type { GeneratedArtifact } from "./generation.js";

export interface ArticleRecord extends GeneratedArtifact {
  id: string;
  topic: string;
  ownerId: string;
  createdAt: Date;
}

export type NewArticle = Omit<ArticleRecord, "id" | "createdAt"> & { createdAt?: Date };

export interface Product {
  id: string;
  name: string;
  category: string;
  tags: string[];
  priceCents: number | null;
}

export interface ProductRecommendation {
  articleId: string;
  topic: string;
  categories: string[];
  products: Product[];
}
