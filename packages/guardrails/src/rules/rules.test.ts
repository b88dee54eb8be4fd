import { describe, it, expect } from "vitest";
import { BlockedPatternRule } from "./blocked-pattern-rule.js";
import { EmptyInputRule } from "./empty-rule.js";
import { LengthRule } from "./length-rule.js";
import { PiiRule, detectPii, redactPii } from "./pii-rule.js";
import { ToxicityRule } from "./toxicity-rule.js";
import { KeywordToxicityScorer } from "../toxicity-scorer.js";

describe("LengthRule", () => {
  it("passes text within the bound", () => {
    const rule = new LengthRule({ direction: "input", severity: "high", maxLength: 5 });
    expect(rule.evaluate("abcde")).toBeNull();
  });

  it("truncates with an ellipsis when over the bound", () => {
    const rule = new LengthRule({ direction: "output", severity: "medium", maxLength: 5 });
    expect(rule.evaluate("abcdef")).toEqual({
      detail: "output exceeds maximum length of 5 characters",
      sanitized: "abcde...",
    });
    expect(rule.id).toBe("length.output");
  });
});

describe("EmptyInputRule", () => {
  it("flags whitespace-only input", () => {
    const rule = new EmptyInputRule();
    expect(rule.evaluate(" \n\t ")).toEqual({ detail: "input is empty" });
    expect(rule.evaluate("hi")).toBeNull();
  });
});

describe("PII detection", () => {
  it("finds e-mail and phone numbers", () => {
    const text = "mail me at jane.doe@example.com or 555-123-4567";
    expect(detectPii(text)).toEqual(["email", "phone"]);
    expect(redactPii(text)).toBe("mail me at [REDACTED_EMAIL] or [REDACTED_PHONE]");
  });

  it("recognises card numbers without mistaking them for phones", () => {
    expect(detectPii("card 4111 1111 1111 1111")).toEqual(["credit_card"]);
    expect(redactPii("card 4111-1111-1111-1111")).toBe("card [REDACTED_CREDIT_CARD]");
  });

  it("recognises SSN-like numbers", () => {
    expect(detectPii("ssn 123-45-6789")).toEqual(["ssn"]);
  });

  it("reports the families found", () => {
    const rule = new PiiRule({ direction: "input", severity: "medium" });
    expect(rule.evaluate("ssn 123-45-6789")).toEqual({
      detail: "PII detected: ssn",
      sanitized: "ssn [REDACTED_SSN]",
    });
    expect(rule.evaluate("nothing personal here")).toBeNull();
  });

  it("defaults to fail-closed", () => {
    expect(new PiiRule({ direction: "output", severity: "high" }).failureMode).toBe("closed");
  });
});

describe("BlockedPatternRule", () => {
  const rule = new BlockedPatternRule({ direction: "input", severity: "medium" });

  it("strips matched words", () => {
    expect(rule.evaluate("how do I HACK the login")).toEqual({
      detail: "matched 1 blocked pattern(s)",
      sanitized: "how do I the login",
    });
  });

  it("strips credential assignments", () => {
    expect(rule.evaluate("my password: placeholder")?.sanitized).toBe("my placeholder");
  });

  it("ignores clean text", () => {
    expect(rule.evaluate("what is a hash table")).toBeNull();
  });
});

describe("KeywordToxicityScorer", () => {
  const scorer = new KeywordToxicityScorer();

  it("adds 0.5 per distinct keyword, capped at 1", () => {
    expect(scorer.assess("harmful")).toEqual({ score: 0.5, terms: ["harmful"] });
    expect(scorer.assess("hate, violence and more hate")).toEqual({
      score: 1,
      terms: ["hate", "violence"],
    });
    expect(scorer.assess("hate violence illegal").score).toBe(1);
  });

  it("matches whole words only", () => {
    expect(scorer.assess("whatever you like")).toEqual({ score: 0, terms: [] });
  });
});

describe("ToxicityRule", () => {
  it("masks the offending terms", async () => {
    const rule = new ToxicityRule({ direction: "output", severity: "medium", threshold: 0.5 });
    expect(await rule.evaluate("Such Hate is harmful")).toEqual({
      detail: "toxicity score 1.00 >= 0.50",
      sanitized: "Such **** is *******",
    });
  });

  it("stays quiet below the threshold", async () => {
    const rule = new ToxicityRule({ direction: "input", severity: "medium", threshold: 0.8 });
    expect(await rule.evaluate("a dangerous idea")).toBeNull();
  });

  it("accepts an async scorer", async () => {
    const rule = new ToxicityRule({
      direction: "input",
      severity: "high",
      threshold: 0.5,
      scorer: { assess: async () => ({ score: 0.9, terms: [] }) },
    });
    expect(await rule.evaluate("anything")).toEqual({
      detail: "toxicity score 0.90 >= 0.50",
      sanitized: "anything",
    });
  });
});
