import { createSilentLogger } from "@groundline/logger";
import type { Logger } from "@groundline/logger";
import type { Direction, GuardrailViolation, ValidationResult } from "@groundline/types";
import type { Rule, RuleFinding } from "./rules/rule.js";

/**
 * Runs an ordered rule list over one piece of text.
 *
 * Medium-severity findings replace the text with the rule's sanitized version
 * before the next rule sees it. Any high-severity violation marks the result
 * blocked; low-severity findings are recorded and change nothing.
 */
export class GuardrailsEngine {
  private readonly rules: readonly Rule[];
  private readonly logger: Logger;

  constructor(rules: readonly Rule[], logger: Logger = createSilentLogger()) {
    this.rules = rules;
    this.logger = logger;
  }

  rulesFor(direction: Direction): Rule[] {
    return this.rules.filter((rule) => rule.direction === direction);
  }

  async validate(text: string, direction: Direction): Promise<ValidationResult> {
    let current = text;
    const violations: GuardrailViolation[] = [];

    for (const rule of this.rulesFor(direction)) {
      let finding: RuleFinding | null;
      try {
        finding = await rule.evaluate(current);
      } catch (err: unknown) {
        this.logger.warn(
          { err, ruleId: rule.id, failureMode: rule.failureMode },
          "Guardrail detector failed",
        );
        if (rule.failureMode === "closed") {
          violations.push({
            ruleId: rule.id,
            kind: "detector_failure",
            severity: "high",
            field: direction,
            detail: `${rule.id} detector failed`,
          });
        }
        continue;
      }

      if (!finding) continue;

      violations.push({
        ruleId: rule.id,
        kind: rule.kind,
        severity: rule.severity,
        field: direction,
        detail: finding.detail,
      });

      if (rule.severity === "medium" && finding.sanitized !== undefined) {
        current = finding.sanitized;
      }
    }

    return {
      sanitizedText: current,
      violations,
      blocked: violations.some((violation) => violation.severity === "high"),
    };
  }
}
