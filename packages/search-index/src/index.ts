export type { ISearchIndex } from "./search-index.interface.js";
export { OpenSearchIndex } from "./opensearch-index.js";
export type { OpenSearchIndexOptions, SearchTransport, TransportRequest } from "./opensearch-index.js";
export { toOpenSearchBody, indexDefinition } from "./query-dsl.js";
export type { QueryBody } from "./query-dsl.js";
export { createSearchIndex } from "./factory.js";
