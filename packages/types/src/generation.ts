export const DEFAULT_TARGET_WORD_COUNT = 800;

export interface GenerationRequest {
  topic: string;
  /** Deduplicated passages in first-retrieval order. */
  context: string[];
  targetWordCount?: number;
}

export interface GeneratedArtifact {
  content: string;
  wordCount: number;
  sourcePassageCount: number;
}

export type GenerationOutcome =
  | { kind: "grounded"; artifact: GeneratedArtifact }
  | { kind: "insufficient"; topic: string; reason: string };

export interface SamplingParams {
  maxNewTokens: number;
  temperature: number;
  topP?: number;
  repetitionPenalty?: number;
  noRepeatNgramSize?: number;
}

export interface ArticleRequest {
  topic: string;
  ownerId: string;
  targetWordCount?: number;
}

export interface ArticleResult {
  articleId: string;
  topic: string;
  artifact: GeneratedArtifact;
}
