import { describe, it, expect } from "vitest";
import { redactValue, redactFields, REDACT_PATHS } from "./pii-redactor.js";

describe("PII Redactor", () => {
  describe("redactValue", () => {
    it("redacts provider credentials entirely", () => {
      expect(redactValue("apiToken", "atl-test-token")).toBe("[REDACTED]");
      expect(redactValue("api_token", "atl-test-token")).toBe("[REDACTED]");
      expect(redactValue("clientSecret", "test-secret")).toBe("[REDACTED]");
      expect(redactValue("authorization", "Basic dGVzdA==")).toBe("[REDACTED]");
      expect(redactValue("accessToken", "graph-token")).toBe("[REDACTED]");
      expect(redactValue("apiKey", "test-cohere-key")).toBe("[REDACTED]");
    });

    it("is case-insensitive for key matching", () => {
      expect(redactValue("APITOKEN", "x")).toBe("[REDACTED]");
      expect(redactValue("Client_Secret", "x")).toBe("[REDACTED]");
    });

    it("masks email addresses inside other strings", () => {
      expect(redactValue("msg", "Fetching issues as bot@example.com")).toBe(
        "Fetching issues as [REDACTED]",
      );
      expect(redactValue("msg", "From a@b.com to c@d.com")).toBe("From [REDACTED] to [REDACTED]");
    });

    it("masks consistently across repeated calls", () => {
      expect(redactValue("author", "x@y.io")).toBe("[REDACTED]");
      expect(redactValue("author", "x@y.io")).toBe("[REDACTED]");
    });

    it("leaves other values untouched", () => {
      expect(redactValue("source", "jira")).toBe("jira");
      expect(redactValue("count", 42)).toBe(42);
      expect(redactValue("active", true)).toBe(true);
      expect(redactValue("data", null)).toBe(null);
    });
  });

  describe("redactFields", () => {
    it("redacts each top-level field", () => {
      expect(
        redactFields({ source: "confluence", apiToken: "t", note: "owner is me@corp.com" }),
      ).toEqual({ source: "confluence", apiToken: "[REDACTED]", note: "owner is [REDACTED]" });
    });
  });

  describe("REDACT_PATHS", () => {
    it("covers credential names at the top level and one level down", () => {
      expect(REDACT_PATHS).toContain("apiToken");
      expect(REDACT_PATHS).toContain("clientSecret");
      expect(REDACT_PATHS).toContain("*.apiToken");
      expect(REDACT_PATHS).toContain("*.authorization");
    });

    it("has a nested path for each top-level path", () => {
      const topLevel = REDACT_PATHS.filter((p) => !p.startsWith("*."));
      const nested = REDACT_PATHS.filter((p) => p.startsWith("*."));

      expect(topLevel.length).toBe(nested.length);
      for (const key of topLevel) {
        expect(REDACT_PATHS).toContain(`*.${key}`);
      }
    });
  });
});
