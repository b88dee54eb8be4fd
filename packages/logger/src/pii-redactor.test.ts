import { describe, it, expect } from "vitest";
import { redactValue, redactRecord, REDACT_PATHS } from "./pii-redactor.js";

describe("redactValue", () => {
  it("redacts sensitive keys entirely", () => {
    expect(redactValue("password", "placeholder")).toBe("[REDACTED]");
    expect(redactValue("token", "test-token")).toBe("[REDACTED]");
    expect(redactValue("apikey", "test-key")).toBe("[REDACTED]");
    expect(redactValue("api_key", "test-key")).toBe("[REDACTED]");
    expect(redactValue("authorization", "Bearer test")).toBe("[REDACTED]");
    expect(redactValue("credit_card", "4111111111111111")).toBe("[REDACTED]");
  });

  it("is case-insensitive for key matching", () => {
    expect(redactValue("Password", "placeholder")).toBe("[REDACTED]");
    expect(redactValue("ApiKey", "test-key")).toBe("[REDACTED]");
  });

  it("redacts email addresses in string values", () => {
    expect(redactValue("query", "Contact alice@example.com for details")).toBe(
      "Contact [REDACTED] for details",
    );
  });

  it("redacts multiple email addresses on consecutive calls", () => {
    expect(redactValue("log", "From a@b.com to c@d.com")).toBe("From [REDACTED] to [REDACTED]");
    expect(redactValue("log", "again x@y.org")).toBe("again [REDACTED]");
  });

  it("leaves other values untouched", () => {
    expect(redactValue("userId", "u-1")).toBe("u-1");
    expect(redactValue("count", 42)).toBe(42);
    expect(redactValue("active", true)).toBe(true);
    expect(redactValue("data", null)).toBe(null);
    expect(redactValue("name", "")).toBe("");
  });
});

describe("redactRecord", () => {
  it("applies redaction to each top-level field", () => {
    expect(
      redactRecord({ userId: "u-1", query: "mail bob@example.org", secret: "s", turns: 3 }),
    ).toEqual({ userId: "u-1", query: "mail [REDACTED]", secret: "[REDACTED]", turns: 3 });
  });
});

describe("REDACT_PATHS", () => {
  it("has both top-level and nested for each sensitive key", () => {
    const topLevel = REDACT_PATHS.filter((p) => !p.startsWith("*."));
    const nested = REDACT_PATHS.filter((p) => p.startsWith("*."));

    expect(topLevel.length).toBe(nested.length);
    for (const key of topLevel) {
      expect(REDACT_PATHS).toContain(`*.${key}`);
    }
  });
});
