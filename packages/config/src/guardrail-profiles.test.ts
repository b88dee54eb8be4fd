import { describe, it, expect } from "vitest";
import { getProfileDefaults, isRuleEnabled, getEffectiveRules } from "./guardrail-profiles.js";

describe("Guardrail profiles", () => {
  describe("getProfileDefaults", () => {
    it("enables every rule with blocking PII for strict", () => {
      expect(getProfileDefaults("strict")).toEqual({
        rules: { length: true, empty: true, blockedPatterns: true, pii: true, toxicity: true },
        inputPiiSeverity: "high",
        outputPiiSeverity: "high",
      });
    });

    it("keeps only structural rules for permissive", () => {
      const { rules } = getProfileDefaults("permissive");

      expect(rules.length).toBe(true);
      expect(rules.empty).toBe(true);
      expect(rules.pii).toBe(false);
      expect(rules.blockedPatterns).toBe(false);
      expect(rules.toxicity).toBe(false);
    });

    it("returns a copy (not a reference to internal state)", () => {
      const first = getProfileDefaults("standard");
      first.rules.pii = false;

      expect(getProfileDefaults("standard").rules.pii).toBe(true);
    });
  });

  describe("isRuleEnabled", () => {
    it("reflects the profile defaults", () => {
      expect(isRuleEnabled("permissive", "pii")).toBe(false);
      expect(isRuleEnabled("standard", "pii")).toBe(true);
    });
  });

  describe("getEffectiveRules", () => {
    it("returns profile defaults when no overrides given", () => {
      expect(getEffectiveRules("standard")).toEqual(getProfileDefaults("standard").rules);
    });

    it("applies overrides in both directions", () => {
      const rules = getEffectiveRules("strict", { toxicity: false });
      expect(rules.toxicity).toBe(false);
      expect(rules.pii).toBe(true);

      expect(getEffectiveRules("permissive", { pii: true }).pii).toBe(true);
    });
  });
});
