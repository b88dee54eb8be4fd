import type { GuardrailProfile, RuleName, RuleToggles, Severity } from "@groundline/types";

export const RULE_NAMES = ["length", "empty", "blockedPatterns", "pii", "toxicity"] as const;

export interface ProfileDefaults {
  rules: RuleToggles;
  inputPiiSeverity: Severity;
  outputPiiSeverity: Severity;
}

/**
 * Default rule set per guardrail profile.
 *
 * - **strict**     – every rule, PII blocks in both directions
 * - **standard**   – every rule, PII is redacted on input and blocks on output
 * - **permissive** – only the structural length/empty checks
 */
const PROFILE_DEFAULTS: Record<GuardrailProfile, ProfileDefaults> = {
  strict: {
    rules: { length: true, empty: true, blockedPatterns: true, pii: true, toxicity: true },
    inputPiiSeverity: "high",
    outputPiiSeverity: "high",
  },
  standard: {
    rules: { length: true, empty: true, blockedPatterns: true, pii: true, toxicity: true },
    inputPiiSeverity: "medium",
    outputPiiSeverity: "high",
  },
  permissive: {
    rules: { length: true, empty: true, blockedPatterns: false, pii: false, toxicity: false },
    inputPiiSeverity: "medium",
    outputPiiSeverity: "medium",
  },
};

export function getProfileDefaults(profile: GuardrailProfile): ProfileDefaults {
  const defaults = PROFILE_DEFAULTS[profile];
  return { ...defaults, rules: { ...defaults.rules } };
}

export function isRuleEnabled(profile: GuardrailProfile, rule: RuleName): boolean {
  return PROFILE_DEFAULTS[profile].rules[rule];
}

/**
 * Merge a profile's rule toggles with explicit per-rule overrides.
 */
export function getEffectiveRules(
  profile: GuardrailProfile,
  overrides?: Partial<RuleToggles>,
): RuleToggles {
  const base = getProfileDefaults(profile).rules;

  if (!overrides) {
    return base;
  }

  return { ...base, ...overrides };
}
