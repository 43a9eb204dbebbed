/** Articles, prepositions, conjunctions and request filler ("explain me about ..."). */
export const STOP_WORDS: ReadonlySet<string> = new Set([
  "and",
  "or",
  "the",
  "a",
  "an",
  "in",
  "on",
  "at",
  "to",
  "for",
  "of",
  "with",
  "by",
  "about",
  "explain",
  "me",
]);

/**
 * Lowercase the topic, split on whitespace and drop stop words. Order and
 * duplicates are kept; an empty result is the caller's problem.
 */
export function extractTerms(topic: string): string[] {
  return topic
    .toLowerCase()
    .split(/\s+/)
    .filter((term) => term.length > 0 && !STOP_WORDS.has(term));
}
