import { z } from "zod";
import { ExternalServiceError, ValidationError, withRetry } from "@groundwrite/errors";
import type { RetryOptions } from "@groundwrite/errors";
import type { PassageRecord, RankedQuery, SearchHit } from "@groundwrite/types";
import type { ISearchIndex } from "./search-index.interface.js";
import { indexDefinition, toOpenSearchBody } from "./query-dsl.js";
import type { QueryBody } from "./query-dsl.js";

const SERVICE = "search";

export interface TransportRequest {
  method: "GET" | "HEAD" | "POST" | "PUT" | "DELETE";
  path: string;
  body?: QueryBody;
  bulkBody?: QueryBody[];
  querystring?: Record<string, string>;
}

/** The slice of the OpenSearch client transport this adapter needs. */
export interface SearchTransport {
  request(
    params: TransportRequest,
    options?: { ignore?: number[] },
  ): Promise<{ statusCode: number | null; body: unknown }>;
}

export interface OpenSearchIndexOptions {
  transport: SearchTransport;
  index: string;
  retry?: RetryOptions;
  close?: () => Promise<void>;
}

const metadataSchema = z
  .object({
    kind: z.enum(["document", "article"]),
    ownerId: z.string(),
    filename: z.string(),
    chunkId: z.number().int(),
    totalChunks: z.number().int(),
    uploadTimestamp: z.string(),
    contentType: z.string(),
    category: z.string(),
    articleId: z.string(),
    topic: z.string(),
  })
  .partial();

const searchResponseSchema = z.object({
  hits: z.object({
    hits: z.array(
      z.object({
        _id: z.string(),
        _score: z.number().nullable().optional(),
        _source: z
          .object({
            content: z.string().optional(),
            metadata: metadataSchema.optional(),
          })
          .optional(),
      }),
    ),
  }),
});

const bulkResponseSchema = z.object({
  errors: z.boolean(),
  items: z.array(z.record(z.object({ status: z.number() }))),
});

const deleteResponseSchema = z.object({ result: z.string() });
const deleteByQueryResponseSchema = z.object({ deleted: z.number() });
const healthResponseSchema = z.object({ status: z.string() });

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class OpenSearchIndex implements ISearchIndex {
  private transport: SearchTransport;
  private indexName: string;
  private retry?: RetryOptions;
  private closeClient?: () => Promise<void>;

  constructor(options: OpenSearchIndexOptions) {
    this.transport = options.transport;
    this.indexName = options.index;
    this.retry = options.retry;
    this.closeClient = options.close;
  }

  async index(passages: PassageRecord[]): Promise<number> {
    if (passages.length === 0) return 0;

    const bulkBody: QueryBody[] = [];
    for (const passage of passages) {
      bulkBody.push({ index: { _index: this.indexName } });
      bulkBody.push({
        content: passage.text,
        vector_field: passage.vector,
        metadata: passage.metadata,
      });
    }

    const body = await this.call("bulk", { method: "POST", path: "/_bulk", bulkBody });
    const parsed = this.parse("bulk", bulkResponseSchema, body);

    let accepted = 0;
    for (const item of parsed.items) {
      for (const result of Object.values(item)) {
        if (result.status >= 200 && result.status < 300) accepted++;
      }
    }
    return accepted;
  }

  async search(query: RankedQuery): Promise<SearchHit[]> {
    const body = await this.call("search", {
      method: "POST",
      path: `/${this.indexName}/_search`,
      body: toOpenSearchBody(query),
    });
    const parsed = this.parse("search", searchResponseSchema, body);

    return parsed.hits.hits.map((hit) => ({
      id: hit._id,
      score: hit._score ?? 0,
      content: hit._source?.content,
      metadata: hit._source?.metadata ?? {},
    }));
  }

  async ensureIndex(dimensions: number): Promise<void> {
    const { statusCode } = await this.request(
      "exists",
      { method: "HEAD", path: `/${this.indexName}` },
      [404],
    );
    if (statusCode !== 404) return;

    await this.call("create index", {
      method: "PUT",
      path: `/${this.indexName}`,
      body: indexDefinition(dimensions),
    });
  }

  async deletePassage(id: string): Promise<boolean> {
    const { statusCode, body } = await this.request(
      "delete",
      { method: "DELETE", path: `/${this.indexName}/_doc/${encodeURIComponent(id)}` },
      [404],
    );
    if (statusCode === 404) return false;
    return this.parse("delete", deleteResponseSchema, body).result === "deleted";
  }

  async deleteOlderThan(days: number): Promise<number> {
    if (!Number.isInteger(days) || days < 1) {
      throw new ValidationError("Retention must be a positive number of days", {
        days: "must be an integer >= 1",
      });
    }

    const body = await this.call("delete by query", {
      method: "POST",
      path: `/${this.indexName}/_delete_by_query`,
      body: { query: { range: { "metadata.uploadTimestamp": { lt: `now-${String(days)}d` } } } },
    });
    return this.parse("delete by query", deleteByQueryResponseSchema, body).deleted;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const body = await this.call("health", { method: "GET", path: "/_cluster/health" });
      return this.parse("health", healthResponseSchema, body).status !== "red";
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.closeClient?.();
  }

  private async call(operation: string, params: TransportRequest): Promise<unknown> {
    const { body } = await this.request(operation, params);
    return body;
  }

  private async request(
    operation: string,
    params: TransportRequest,
    ignore?: number[],
  ): Promise<{ statusCode: number | null; body: unknown }> {
    try {
      return await withRetry(
        () => this.transport.request(params, ignore ? { ignore } : undefined),
        this.retry,
      );
    } catch (err: unknown) {
      throw new ExternalServiceError(`OpenSearch ${operation} failed: ${errorMessage(err)}`, SERVICE, {
        cause: err,
      });
    }
  }

  private parse<S extends z.ZodTypeAny>(operation: string, schema: S, body: unknown): z.infer<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new ExternalServiceError(`Unexpected OpenSearch ${operation} response`, SERVICE, {
        details: { issues: result.error.issues.map((issue) => issue.message) },
      });
    }
    return result.data;
  }
}
