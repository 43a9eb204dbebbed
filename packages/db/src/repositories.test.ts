import { describe, it, expect } from "vitest";
import { toArticleRecord, toProduct } from "./repositories.js";

describe("row mapping", () => {
  it("maps an article row to a record", () => {
    const createdAt = new Date("2024-05-01T12:00:00.000Z");

    expect(
      toArticleRecord({
        id: "a1",
        topic: "caching",
        content: "Caches keep hot data close.",
        ownerId: "user-1",
        wordCount: 5,
        sourcePassageCount: 2,
        createdAt,
      }),
    ).toEqual({
      id: "a1",
      topic: "caching",
      ownerId: "user-1",
      content: "Caches keep hot data close.",
      wordCount: 5,
      sourcePassageCount: 2,
      createdAt,
    });
  });

  it("maps a product row and drops storage-only columns", () => {
    expect(
      toProduct({
        id: "p1",
        name: "Trail tent",
        category: "Tents",
        tags: ["camping"],
        priceCents: null,
        createdAt: new Date(0),
      }),
    ).toEqual({ id: "p1", name: "Trail tent", category: "Tents", tags: ["camping"], priceCents: null });
  });
});
