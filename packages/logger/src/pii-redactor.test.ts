import { describe, it, expect } from "vitest";
import { redactValue, redactRecord, REDACT_PATHS } from "./pii-redactor.js";

describe("PII Redactor", () => {
  describe("redactValue", () => {
    it("redacts sensitive keys entirely", () => {
      expect(redactValue("password", "test-secret")).toBe("[REDACTED]");
      expect(redactValue("token", "test-token")).toBe("[REDACTED]");
      expect(redactValue("api_key", "test-key")).toBe("[REDACTED]");
      expect(redactValue("authorization", "Bearer test")).toBe("[REDACTED]");
    });

    it("is case-insensitive for key matching", () => {
      expect(redactValue("Password", "test-secret")).toBe("[REDACTED]");
      expect(redactValue("APIKEY", "test-key")).toBe("[REDACTED]");
    });

    it("redacts every email address in string values", () => {
      expect(redactValue("log", "From a@b.com to c@d.com")).toBe("From [REDACTED] to [REDACTED]");
    });

    it("redacts consistently across repeated calls", () => {
      expect(redactValue("message", "x@y.org")).toBe("[REDACTED]");
      expect(redactValue("message", "x@y.org")).toBe("[REDACTED]");
    });

    it("leaves other values untouched", () => {
      expect(redactValue("topic", "distributed caching")).toBe("distributed caching");
      expect(redactValue("count", 42)).toBe(42);
      expect(redactValue("data", null)).toBe(null);
    });
  });

  describe("redactRecord", () => {
    it("redacts each top-level property", () => {
      expect(redactRecord({ ownerId: "u-1", password: "test-secret", note: "ping a@b.io" })).toEqual({
        ownerId: "u-1",
        password: "[REDACTED]",
        note: "ping [REDACTED]",
      });
    });
  });

  describe("REDACT_PATHS", () => {
    it("has a nested path for each top-level key", () => {
      const topLevel = REDACT_PATHS.filter((p) => !p.startsWith("*."));
      const nested = REDACT_PATHS.filter((p) => p.startsWith("*."));

      expect(topLevel.length).toBe(nested.length);
      for (const key of topLevel) {
        expect(REDACT_PATHS).toContain(`*.${key}`);
      }
    });
  });
});
