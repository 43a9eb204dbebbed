import {
  GenerationCapabilityError,
  InsufficientContextError,
  NoRetrievableContextError,
  ValidationError,
} from "@groundwrite/errors";
import type { IGenerationProvider } from "@groundwrite/generation";
import type { Logger } from "@groundwrite/logger";
import {
  DEFAULT_TARGET_WORD_COUNT,
  type GeneratedArtifact,
  type GenerationOutcome,
  type GenerationRequest,
  type SamplingParams,
} from "@groundwrite/types";
import {
  ARTICLE_MARKER,
  CONTINUATION_MARKER,
  INSUFFICIENT_CONTEXT_SENTINEL,
  buildArticlePrompt,
  buildContinuationPrompt,
} from "./prompts.js";

export const MAX_CONTINUATION_ROUNDS = 3;

export const ARTICLE_SAMPLING: SamplingParams = {
  maxNewTokens: 1500,
  temperature: 0.6,
  topP: 0.85,
  repetitionPenalty: 1.2,
  noRepeatNgramSize: 3,
};

const CONTINUATION_TEMPERATURE = 0.6;

export interface GeneratorDependencies {
  generationProvider: IGenerationProvider;
  logger?: Logger;
  contextCharBudget?: number;
  /** Extension passes allowed when the first draft is short. Default 1, at most 3. */
  maxContinuationRounds?: number;
}

export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

export function countWords(text: string): number {
  return tokenize(text).length;
}

/** Everything after the last echoed marker, trimmed. */
export function stripEcho(raw: string, marker: string): string {
  const at = raw.lastIndexOf(marker);
  return (at === -1 ? raw : raw.slice(at + marker.length)).trim();
}

/** Target lengths come from job payloads; only positive whole word counts are accepted. */
export function assertTargetWordCount(target: number): void {
  if (!Number.isInteger(target) || target < 1) {
    throw new ValidationError(`Target word count must be a positive integer, got ${String(target)}`, {
      targetWordCount: "must be a positive integer",
    });
  }
}

function continuationRounds(requested: number | undefined): number {
  return Math.min(MAX_CONTINUATION_ROUNDS, Math.max(0, requested ?? 1));
}

/**
 * Writes an article about `topic` from `context` only.
 *
 * The raw model output is checked for the insufficient-context sentinel
 * before anything else. A draft longer than the target is cut to the target;
 * a shorter one is extended by continuation passes and then cut. A shortfall
 * left after the last pass is accepted.
 */
export async function generate(
  request: GenerationRequest,
  deps: GeneratorDependencies,
): Promise<GenerationOutcome> {
  const { topic, context } = request;
  const target = request.targetWordCount ?? DEFAULT_TARGET_WORD_COUNT;
  assertTargetWordCount(target);
  const log = deps.logger?.child({ topic, target });

  if (context.length === 0) {
    throw new NoRetrievableContextError(topic, "generation");
  }

  const prompt = buildArticlePrompt(topic, context, target, deps.contextCharBudget);
  const raw = await deps.generationProvider.generate(prompt, ARTICLE_SAMPLING);

  if (raw.includes(INSUFFICIENT_CONTEXT_SENTINEL)) {
    log?.info({ passages: context.length }, "model reported insufficient context");
    return { kind: "insufficient", topic, reason: "model reported insufficient context" };
  }

  let content = stripEcho(raw, ARTICLE_MARKER);
  let words = tokenize(content);
  log?.debug({ words: words.length }, "first draft measured");

  if (words.length > target) {
    words = words.slice(0, target);
    content = words.join(" ");
  } else if (words.length < target) {
    const rounds = continuationRounds(deps.maxContinuationRounds);

    for (let round = 1; round <= rounds && words.length < target; round++) {
      const shortfall = target - words.length;
      const addition = await deps.generationProvider.generate(
        buildContinuationPrompt(words.join(" "), shortfall),
        { ...ARTICLE_SAMPLING, maxNewTokens: shortfall * 2, temperature: CONTINUATION_TEMPERATURE },
      );

      if (addition.includes(INSUFFICIENT_CONTEXT_SENTINEL)) {
        log?.warn({ round }, "continuation reported insufficient context; keeping current draft");
        break;
      }

      const extra = tokenize(stripEcho(stripEcho(addition, ARTICLE_MARKER), CONTINUATION_MARKER));
      if (extra.length === 0) {
        log?.warn({ round }, "continuation added no words");
        break;
      }

      words = [...words, ...extra].slice(0, target);
      content = words.join(" ");
      log?.debug({ round, shortfall, words: words.length }, "continuation applied");
    }

    if (words.length < target) {
      log?.info({ words: words.length }, "accepting draft below target length");
    }
  }

  if (words.length === 0) {
    throw new GenerationCapabilityError(
      `Model returned no usable text for topic: ${topic}`,
      deps.generationProvider.name,
    );
  }

  return {
    kind: "grounded",
    artifact: { content, wordCount: words.length, sourcePassageCount: context.length },
  };
}

export async function generateOrThrow(
  request: GenerationRequest,
  deps: GeneratorDependencies,
): Promise<GeneratedArtifact> {
  const outcome = await generate(request, deps);
  if (outcome.kind === "insufficient") {
    throw new InsufficientContextError(outcome.topic, { details: { reason: outcome.reason } });
  }
  return outcome.artifact;
}
