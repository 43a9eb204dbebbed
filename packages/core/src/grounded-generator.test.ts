import { describe, it, expect } from "vitest";
import {
  GenerationCapabilityError,
  InsufficientContextError,
  NoRetrievableContextError,
  ValidationError,
} from "@groundwrite/errors";
import { ARTICLE_SAMPLING, countWords, generate, generateOrThrow, stripEcho } from "./grounded-generator.js";
import { ScriptedGenerationProvider, words } from "./testing/fakes.js";

const CONTEXT = ["Caches keep hot data close to readers.", "Eviction drops the least recent entries."];

function expectGrounded(outcome: Awaited<ReturnType<typeof generate>>) {
  if (outcome.kind !== "grounded") {
    throw new Error(`expected a grounded outcome, got ${outcome.kind}`);
  }
  return outcome.artifact;
}

describe("stripEcho", () => {
  it("keeps only the text after the last marker", () => {
    expect(stripEcho("a Write the article: b Write the article:  body ", "Write the article:")).toBe("body");
  });

  it("trims text without a marker", () => {
    expect(stripEcho("  body  ", "Write the article:")).toBe("body");
  });
});

describe("generate", () => {
  it("never calls the model without context", async () => {
    const generationProvider = new ScriptedGenerationProvider([words(10)]);

    const error = await generate({ topic: "caching", context: [] }, { generationProvider }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(NoRetrievableContextError);
    expect(error).toMatchObject({ topic: "caching", stage: "generation" });
    expect(generationProvider.calls).toHaveLength(0);
  });

  it("prompts with the context, the escape instruction and the exact target", async () => {
    const generationProvider = new ScriptedGenerationProvider([words(5)]);

    await generate({ topic: "caching", context: CONTEXT, targetWordCount: 5 }, { generationProvider });

    const call = generationProvider.calls[0];
    expect(call?.params).toEqual(ARTICLE_SAMPLING);
    expect(call?.prompt).toContain("write about caching.");
    expect(call?.prompt).toContain("respond with 'INSUFFICIENT_CONTEXT'");
    expect(call?.prompt).toContain(`CONTEXT:\n${CONTEXT.join("\n")}\n\nRULES:`);
    expect(call?.prompt).toContain("3. Write exactly 5 words");
    expect(call?.prompt.endsWith("Write the article:")).toBe(true);
  });

  it("truncates the joined context to the character budget", async () => {
    const generationProvider = new ScriptedGenerationProvider([words(3), words(3)]);
    const context = ["x".repeat(1500), "y".repeat(1500)];

    await generate({ topic: "t", context, targetWordCount: 3 }, { generationProvider });
    await generate({ topic: "t", context, targetWordCount: 3 }, { generationProvider, contextCharBudget: 10 });

    const expected = `${"x".repeat(1500)}\n${"y".repeat(499)}`;
    expect(generationProvider.calls[0]?.prompt).toContain(`CONTEXT:\n${expected}\n\nRULES:`);
    expect(generationProvider.calls[1]?.prompt).toContain(`CONTEXT:\n${"x".repeat(10)}\n\nRULES:`);
  });

  it("reports insufficient context when the sentinel appears anywhere", async () => {
    const generationProvider = new ScriptedGenerationProvider([
      `${words(900)} INSUFFICIENT_CONTEXT ${words(10)}`,
    ]);

    const outcome = await generate({ topic: "caching", context: CONTEXT }, { generationProvider });

    expect(outcome).toEqual({
      kind: "insufficient",
      topic: "caching",
      reason: "model reported insufficient context",
    });
    expect(generationProvider.calls).toHaveLength(1);
  });

  it("cuts a long draft to the target without continuing", async () => {
    const generationProvider = new ScriptedGenerationProvider([words(1000)]);

    const artifact = expectGrounded(
      await generate({ topic: "caching", context: CONTEXT, targetWordCount: 800 }, { generationProvider }),
    );

    expect(artifact.content).toBe(words(800));
    expect(artifact.wordCount).toBe(800);
    expect(artifact.sourcePassageCount).toBe(2);
    expect(generationProvider.calls).toHaveLength(1);
  });

  it("extends a short draft by the shortfall", async () => {
    const generationProvider = new ScriptedGenerationProvider([words(600), words(250, "c")]);

    const artifact = expectGrounded(
      await generate({ topic: "caching", context: CONTEXT, targetWordCount: 800 }, { generationProvider }),
    );

    expect(generationProvider.calls).toHaveLength(2);
    const continuation = generationProvider.calls[1];
    expect(continuation?.params).toEqual({ ...ARTICLE_SAMPLING, maxNewTokens: 400, temperature: 0.6 });
    expect(continuation?.params).toMatchObject({ topP: 0.85, repetitionPenalty: 1.2, noRepeatNgramSize: 3 });
    expect(continuation?.prompt).toContain(`Previous content: ${words(600)}\nAdd 200 more words.`);
    expect(artifact.wordCount).toBe(800);
    expect(artifact.content).toBe(`${words(600)} ${words(200, "c")}`);
  });

  it("leaves a draft of exactly the target untouched", async () => {
    const generationProvider = new ScriptedGenerationProvider(["Write the article:\nOne two.\n\nThree four."]);

    const artifact = expectGrounded(
      await generate({ topic: "t", context: CONTEXT, targetWordCount: 4 }, { generationProvider }),
    );

    expect(artifact.content).toBe("One two.\n\nThree four.");
    expect(artifact.wordCount).toBe(4);
  });

  it("drops the echoed prompt from both passes", async () => {
    const generationProvider = new ScriptedGenerationProvider([
      "RULES: ... Write the article: alpha beta",
      "Previous content: alpha beta\nAdd 2 more words.\n\nContinue the article: gamma delta",
    ]);

    const artifact = expectGrounded(
      await generate({ topic: "t", context: CONTEXT, targetWordCount: 4 }, { generationProvider }),
    );

    expect(artifact.content).toBe("alpha beta gamma delta");
  });

  it("keeps the current draft when a continuation reports insufficient context", async () => {
    const generationProvider = new ScriptedGenerationProvider(["one two three", "INSUFFICIENT_CONTEXT"]);

    const artifact = expectGrounded(
      await generate({ topic: "t", context: CONTEXT, targetWordCount: 10 }, { generationProvider }),
    );

    expect(artifact).toEqual({ content: "one two three", wordCount: 3, sourcePassageCount: 2 });
  });

  it("accepts a residual shortfall after the default single round", async () => {
    const generationProvider = new ScriptedGenerationProvider(["a b", "c d e", "f g h"]);

    const artifact = expectGrounded(
      await generate({ topic: "t", context: CONTEXT, targetWordCount: 10 }, { generationProvider }),
    );

    expect(artifact.content).toBe("a b c d e");
    expect(artifact.wordCount).toBe(5);
    expect(generationProvider.calls).toHaveLength(2);
  });

  it("runs further rounds when configured and stops at the target", async () => {
    const generationProvider = new ScriptedGenerationProvider(["a b", "c d", "e f g"]);

    const artifact = expectGrounded(
      await generate(
        { topic: "t", context: CONTEXT, targetWordCount: 5 },
        { generationProvider, maxContinuationRounds: 3 },
      ),
    );

    expect(artifact.content).toBe("a b c d e");
    expect(generationProvider.calls.map((call) => call.params.maxNewTokens)).toEqual([1500, 6, 2]);
  });

  it("caps continuation rounds at three", async () => {
    const generationProvider = new ScriptedGenerationProvider(["a", "b", "c", "d", "e", "f"]);

    const artifact = expectGrounded(
      await generate(
        { topic: "t", context: CONTEXT, targetWordCount: 10 },
        { generationProvider, maxContinuationRounds: 10 },
      ),
    );

    expect(artifact.content).toBe("a b c d");
    expect(generationProvider.calls).toHaveLength(4);
  });

  it("fails when the model produces no words at all", async () => {
    const generationProvider = new ScriptedGenerationProvider(["   ", ""]);

    await expect(
      generate({ topic: "t", context: CONTEXT, targetWordCount: 5 }, { generationProvider }),
    ).rejects.toBeInstanceOf(GenerationCapabilityError);
  });

  it("never exceeds the target and reaches it whenever the first draft does", async () => {
    for (const draftLength of [1, 799, 800, 801, 1500]) {
      const generationProvider = new ScriptedGenerationProvider([words(draftLength), words(1000, "c")]);

      const artifact = expectGrounded(
        await generate({ topic: "t", context: CONTEXT, targetWordCount: 800 }, { generationProvider }),
      );

      expect(artifact.wordCount).toBe(800);
      expect(countWords(artifact.content)).toBe(artifact.wordCount);
    }
  });

  it("defaults the target to 800 words", async () => {
    const generationProvider = new ScriptedGenerationProvider([words(900)]);

    const artifact = expectGrounded(await generate({ topic: "t", context: CONTEXT }, { generationProvider }));

    expect(artifact.wordCount).toBe(800);
    expect(generationProvider.calls[0]?.prompt).toContain("Write exactly 800 words");
  });

  it("rejects a target that is not a positive whole number before calling the model", async () => {
    for (const targetWordCount of [-5, 0, 2.5]) {
      const generationProvider = new ScriptedGenerationProvider([words(10)]);

      const error = await generate(
        { topic: "t", context: CONTEXT, targetWordCount },
        { generationProvider },
      ).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ statusCode: 400, fields: { targetWordCount: "must be a positive integer" } });
      expect(generationProvider.calls).toHaveLength(0);
    }
  });
});

describe("generateOrThrow", () => {
  it("returns the artifact of a grounded outcome", async () => {
    const generationProvider = new ScriptedGenerationProvider(["one two"]);

    await expect(
      generateOrThrow({ topic: "t", context: CONTEXT, targetWordCount: 2 }, { generationProvider }),
    ).resolves.toEqual({ content: "one two", wordCount: 2, sourcePassageCount: 2 });
  });

  it("turns an insufficient outcome into an error carrying the topic", async () => {
    const generationProvider = new ScriptedGenerationProvider(["INSUFFICIENT_CONTEXT"]);

    const error = await generateOrThrow({ topic: "quantum", context: CONTEXT }, { generationProvider }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(InsufficientContextError);
    expect(error).toMatchObject({
      topic: "quantum",
      message: "Insufficient context available for topic: quantum",
    });
  });
});
