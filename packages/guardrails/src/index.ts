/**
 * @groundline/guardrails
 *
 * Input and output policy checks: length, empty input, blocked patterns, PII
 * and toxicity.
 */

export { GuardrailsEngine } from "./guardrails-engine.js";
export { buildRules, createGuardrailsEngine } from "./factory.js";
export type { GuardrailsEngineOptions } from "./factory.js";
export type { Rule, RuleFinding, RuleOptions, FailureMode } from "./rules/rule.js";
export { LengthRule } from "./rules/length-rule.js";
export type { LengthRuleOptions } from "./rules/length-rule.js";
export { EmptyInputRule } from "./rules/empty-rule.js";
export { BlockedPatternRule, DEFAULT_BLOCKED_PATTERNS } from "./rules/blocked-pattern-rule.js";
export type { BlockedPatternRuleOptions } from "./rules/blocked-pattern-rule.js";
export { PiiRule, PII_PATTERNS, detectPii, redactPii, redactionToken } from "./rules/pii-rule.js";
export type { PiiFamily, PiiRuleOptions } from "./rules/pii-rule.js";
export { ToxicityRule } from "./rules/toxicity-rule.js";
export type { ToxicityRuleOptions } from "./rules/toxicity-rule.js";
export { KeywordToxicityScorer, DEFAULT_TOXIC_KEYWORDS } from "./toxicity-scorer.js";
export type { ToxicityScorer, ToxicityAssessment } from "./toxicity-scorer.js";
