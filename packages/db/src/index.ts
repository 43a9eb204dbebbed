export * from "./schema/index.js";
export { createDbClient, closeDbClient, type DbClient } from "./client.js";
export {
  DrizzleArticleRepository,
  DrizzleProductCatalog,
  toArticleRecord,
  toProduct,
} from "./repositories.js";
