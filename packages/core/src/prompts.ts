export const INSUFFICIENT_CONTEXT_SENTINEL = "INSUFFICIENT_CONTEXT";
export const ARTICLE_MARKER = "Write the article:";
export const CONTINUATION_MARKER = "Continue the article:";
export const DEFAULT_CONTEXT_CHAR_BUDGET = 2000;

export function buildArticlePrompt(
  topic: string,
  context: string[],
  targetWordCount: number,
  contextCharBudget: number = DEFAULT_CONTEXT_CHAR_BUDGET,
): string {
  const contextText = context.join("\n").slice(0, contextCharBudget);

  return `Based on ONLY the following context information, write about ${topic}.
If you cannot find enough relevant information in the context, respond with '${INSUFFICIENT_CONTEXT_SENTINEL}'.

CONTEXT:
${contextText}

RULES:
1. Use ONLY information from the context
2. Do not add external knowledge
3. Write exactly ${String(targetWordCount)} words
4. Include technical details from context
5. Be specific and accurate
6. No general statements
7. Focus on factual content

${ARTICLE_MARKER}`;
}

export function buildContinuationPrompt(existing: string, shortfall: number): string {
  return `Continue using ONLY the original context. DO NOT add new information.
Previous content: ${existing}
Add ${String(shortfall)} more words.

${CONTINUATION_MARKER}`;
}

export function buildCategoryPrompt(topic: string, content: string): string {
  return `Based on this article about '${topic}', suggest 5 specific product categories.
Article content: ${content.slice(0, 500)}...

Requirements:
- List only product category names
- One per line
- Focus on practical items
- Must be relevant to topic

Categories:`;
}
