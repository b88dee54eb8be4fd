import type { Logger } from "@groundline/logger";
import type { GuardrailsConfig, Severity } from "@groundline/types";
import { GuardrailsEngine } from "./guardrails-engine.js";
import { BlockedPatternRule } from "./rules/blocked-pattern-rule.js";
import { EmptyInputRule } from "./rules/empty-rule.js";
import { LengthRule } from "./rules/length-rule.js";
import { PiiRule } from "./rules/pii-rule.js";
import type { Rule } from "./rules/rule.js";
import { ToxicityRule } from "./rules/toxicity-rule.js";
import type { ToxicityScorer } from "./toxicity-scorer.js";

export interface GuardrailsEngineOptions {
  logger?: Logger;
  toxicityScorer?: ToxicityScorer;
  blockedPatterns?: readonly string[];
  toxicitySeverity?: Severity;
}

/**
 * Build the rule list for a guardrails config. Order is fixed:
 * length, empty, blocked patterns, PII, toxicity.
 */
export function buildRules(config: GuardrailsConfig, options: GuardrailsEngineOptions = {}): Rule[] {
  const rules: Rule[] = [];
  const toxicitySeverity = options.toxicitySeverity ?? "medium";

  if (config.rules.length) {
    rules.push(
      new LengthRule({ direction: "input", severity: "high", maxLength: config.maxInputLength }),
      new LengthRule({ direction: "output", severity: "medium", maxLength: config.maxOutputLength }),
    );
  }
  if (config.rules.empty) {
    rules.push(new EmptyInputRule());
  }
  if (config.rules.blockedPatterns) {
    rules.push(
      new BlockedPatternRule({
        direction: "input",
        severity: "high",
        patterns: options.blockedPatterns,
      }),
    );
  }
  if (config.rules.pii) {
    rules.push(
      new PiiRule({ direction: "input", severity: config.inputPiiSeverity }),
      new PiiRule({ direction: "output", severity: config.outputPiiSeverity }),
    );
  }
  if (config.rules.toxicity) {
    for (const direction of ["input", "output"] as const) {
      rules.push(
        new ToxicityRule({
          direction,
          severity: toxicitySeverity,
          threshold: config.toxicityThreshold,
          scorer: options.toxicityScorer,
        }),
      );
    }
  }

  return rules;
}

export function createGuardrailsEngine(
  config: GuardrailsConfig,
  options: GuardrailsEngineOptions = {},
): GuardrailsEngine {
  return new GuardrailsEngine(buildRules(config, options), options.logger);
}
