import { afterEach, describe, it, expect, vi } from "vitest";
import { GenerationCapabilityError } from "@groundwrite/errors";
import { createGenerationProvider } from "./factory.js";
import { TgiGenerationProvider } from "./tgi-provider.js";
import { toFrequencyPenalty } from "./cohere-provider.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const SAMPLING = {
  maxNewTokens: 1500,
  temperature: 0.6,
  topP: 0.85,
  repetitionPenalty: 1.2,
  noRepeatNgramSize: 3,
};

describe("TgiGenerationProvider", () => {
  const providers: TgiGenerationProvider[] = [];

  function makeProvider(fetchMock: typeof fetch): TgiGenerationProvider {
    const provider = new TgiGenerationProvider({ baseUrl: "http://tgi.local/", fetch: fetchMock });
    providers.push(provider);
    return provider;
  }

  afterEach(() => {
    for (const provider of providers.splice(0)) provider.shutdown();
  });

  it("sends the prompt with every sampling parameter", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ generated_text: "body text" }));
    const provider = makeProvider(fetchMock);

    const text = await provider.generate("Write the article:", SAMPLING);

    expect(text).toBe("body text");
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://tgi.local/generate");
    expect(JSON.parse(String(init?.body))).toEqual({
      inputs: "Write the article:",
      parameters: {
        max_new_tokens: 1500,
        temperature: 0.6,
        do_sample: true,
        return_full_text: false,
        top_p: 0.85,
        repetition_penalty: 1.2,
        no_repeat_ngram_size: 3,
      },
    });
  });

  it("omits optional parameters that are not set", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ generated_text: "ok" }));
    const provider = makeProvider(fetchMock);

    await provider.generate("prompt", { maxNewTokens: 100, temperature: 0.3 });

    const [, init] = fetchMock.mock.calls[0] ?? [];
    expect(JSON.parse(String(init?.body))).toEqual({
      inputs: "prompt",
      parameters: { max_new_tokens: 100, temperature: 0.3, do_sample: true, return_full_text: false },
    });
  });

  it("accepts the list-shaped payload of pipeline servers", async () => {
    const provider = makeProvider(vi.fn<typeof fetch>(async () => jsonResponse([{ generated_text: "first" }])));

    await expect(provider.generate("prompt", SAMPLING)).resolves.toBe("first");
  });

  it("raises a generation error on a failed response", async () => {
    const provider = makeProvider(vi.fn<typeof fetch>(async () => jsonResponse({ error: "busy" }, 503)));

    await expect(provider.generate("prompt", SAMPLING)).rejects.toMatchObject({
      code: "GENERATION_FAILED",
      provider: "tgi",
    });
  });

  it("raises a generation error when the payload has no text", async () => {
    const provider = makeProvider(vi.fn<typeof fetch>(async () => jsonResponse({ tokens: [] })));

    await expect(provider.generate("prompt", SAMPLING)).rejects.toThrow(
      "Generation server returned no generated_text",
    );
  });

  it("wraps transport failures", async () => {
    const provider = makeProvider(
      vi.fn<typeof fetch>(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    const error = await provider.generate("prompt", SAMPLING).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(GenerationCapabilityError);
    expect(error).toMatchObject({ message: "Text generation failed: fetch failed" });
  });

  it("reports health from the health route", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response(null, { status: 200 }));
    const provider = makeProvider(fetchMock);

    await expect(provider.healthCheck()).resolves.toBe(true);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://tgi.local/health");
  });
});

describe("toFrequencyPenalty", () => {
  it("maps a repetition penalty onto the frequency penalty range", () => {
    expect(toFrequencyPenalty(1.2)).toBe(0.2);
    expect(toFrequencyPenalty(1)).toBe(0);
    expect(toFrequencyPenalty(0.8)).toBe(0);
    expect(toFrequencyPenalty(2.5)).toBe(1);
    expect(toFrequencyPenalty(undefined)).toBeUndefined();
  });
});

describe("createGenerationProvider", () => {
  const base = { cohereApiKey: "", cohereModel: "command-r", timeoutMs: 1000, concurrency: 1 };

  it("creates a tgi provider", () => {
    const provider = createGenerationProvider({ ...base, provider: "tgi", tgiUrl: "http://tgi.local" });
    expect(provider.name).toBe("tgi");
    if (provider instanceof TgiGenerationProvider) provider.shutdown();
  });

  it("creates a cohere provider", () => {
    const provider = createGenerationProvider({ ...base, provider: "cohere", cohereApiKey: "test-key" });
    expect(provider.name).toBe("cohere");
  });

  it("requires a tgi url", () => {
    expect(() => createGenerationProvider({ ...base, provider: "tgi" })).toThrow("tgiUrl is required");
  });

  it("requires a cohere key", () => {
    expect(() => createGenerationProvider({ ...base, provider: "cohere" })).toThrow(
      "cohereApiKey is required",
    );
  });
});
