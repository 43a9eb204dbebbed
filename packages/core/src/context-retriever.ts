import { AppError, ExternalServiceError } from "@groundwrite/errors";
import type { Logger } from "@groundwrite/logger";
import type { ISearchIndex } from "@groundwrite/search-index";
import type { RankedQuery, SearchHit } from "@groundwrite/types";

export const DEFAULT_RETRIEVAL_LIMIT = 5;

export interface RetrievalDependencies {
  searchIndex: ISearchIndex;
  limit?: number;
  logger?: Logger;
}

/**
 * Lexical query for one search term: a fuzzy match over content (boosted) and
 * filename, or a plain content match that needs most of the query terms.
 */
export function buildTermQuery(term: string, limit: number = DEFAULT_RETRIEVAL_LIMIT): RankedQuery {
  return {
    text: term,
    clauses: [
      {
        kind: "multi_field",
        fields: [{ field: "content", boost: 3 }, { field: "metadata.filename" }],
        fuzzy: true,
        minimumShouldMatch: "30%",
      },
      { kind: "field_match", field: "content", operator: "or", minimumShouldMatch: "2<70%" },
    ],
    minimumClauseMatches: 1,
    minScore: 0.1,
    size: limit,
  };
}

/** First occurrence wins; later duplicates are dropped. */
export function dedupePassages(passages: Iterable<string>): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const passage of passages) {
    if (seen.has(passage)) continue;
    seen.add(passage);
    ordered.push(passage);
  }
  return ordered;
}

export async function retrieve(
  term: string,
  deps: RetrievalDependencies,
  limit: number = deps.limit ?? DEFAULT_RETRIEVAL_LIMIT,
): Promise<string[]> {
  let hits: SearchHit[];
  try {
    hits = await deps.searchIndex.search(buildTermQuery(term, limit));
  } catch (err: unknown) {
    if (AppError.isAppError(err)) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new ExternalServiceError(`Search failed for term "${term}": ${message}`, "search", {
      cause: err,
    });
  }

  const passages: string[] = [];
  for (const hit of hits) {
    if (hit.content !== undefined) passages.push(hit.content);
  }
  deps.logger?.debug({ term, hits: hits.length, passages: passages.length }, "term retrieved");
  return passages;
}

/**
 * Queries each term in order and merges the results without duplicates.
 * Terms are searched one after another so the merged order is stable.
 */
export async function retrieveAll(terms: string[], deps: RetrievalDependencies): Promise<string[]> {
  const collected: string[] = [];
  for (const term of terms) {
    collected.push(...(await retrieve(term, deps)));
  }
  return dedupePassages(collected);
}
