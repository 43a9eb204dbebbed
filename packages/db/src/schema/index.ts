export { articles, type ArticleRow } from "./articles.js";
export { products, type ProductRow } from "./products.js";
