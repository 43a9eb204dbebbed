import type { QueryClause, RankedQuery } from "@groundwrite/types";

export type QueryBody = Record<string, unknown>;

function formatField({ field, boost }: { field: string; boost?: number }): string {
  return boost === undefined ? field : `${field}^${String(boost)}`;
}

function clauseToDsl(text: string, clause: QueryClause): QueryBody {
  switch (clause.kind) {
    case "multi_field":
      return {
        multi_match: {
          query: text,
          fields: clause.fields.map(formatField),
          type: "best_fields",
          ...(clause.fuzzy ? { fuzziness: "AUTO" } : {}),
          minimum_should_match: clause.minimumShouldMatch,
        },
      };
    case "field_match":
      return {
        match: {
          [clause.field]: {
            query: text,
            operator: clause.operator,
            ...(clause.minimumShouldMatch !== undefined
              ? { minimum_should_match: clause.minimumShouldMatch }
              : {}),
          },
        },
      };
  }
}

/**
 * Translates a ranked query into an OpenSearch `_search` body: clauses become
 * `bool.should`, the owner filter a `term` on `metadata.ownerId`.
 */
export function toOpenSearchBody(query: RankedQuery): QueryBody {
  const bool: QueryBody = {
    should: query.clauses.map((clause) => clauseToDsl(query.text, clause)),
    minimum_should_match: query.minimumClauseMatches,
  };

  if (query.filter?.ownerId !== undefined) {
    bool.filter = [{ term: { "metadata.ownerId": query.filter.ownerId } }];
  }

  return {
    size: query.size,
    query: { bool },
    ...(query.minScore !== undefined ? { min_score: query.minScore } : {}),
  };
}

export function indexDefinition(dimensions: number): QueryBody {
  return {
    settings: {
      index: {
        knn: true,
        "knn.algo_param.ef_search": 100,
        number_of_shards: 1,
        number_of_replicas: 1,
      },
    },
    mappings: {
      properties: {
        content: { type: "text" },
        vector_field: { type: "knn_vector", dimension: dimensions },
        metadata: {
          type: "object",
          properties: {
            kind: { type: "keyword" },
            ownerId: { type: "keyword" },
            filename: { type: "keyword" },
            chunkId: { type: "integer" },
            totalChunks: { type: "integer" },
            uploadTimestamp: { type: "date" },
            contentType: { type: "keyword" },
            category: { type: "keyword" },
            articleId: { type: "keyword" },
            topic: { type: "text" },
          },
        },
      },
    },
  };
}
