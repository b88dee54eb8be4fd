import type { Direction, Severity } from "@groundline/types";
import type { FailureMode, Rule, RuleFinding, RuleOptions } from "./rule.js";

export interface LengthRuleOptions extends RuleOptions {
  maxLength: number;
}

export class LengthRule implements Rule {
  readonly kind = "length";
  readonly id: string;
  readonly direction: Direction;
  readonly severity: Severity;
  readonly failureMode: FailureMode;
  private readonly maxLength: number;

  constructor(options: LengthRuleOptions) {
    this.id = `length.${options.direction}`;
    this.direction = options.direction;
    this.severity = options.severity;
    this.failureMode = options.failureMode ?? "open";
    this.maxLength = options.maxLength;
  }

  evaluate(text: string): RuleFinding | null {
    if (text.length <= this.maxLength) return null;
    return {
      detail: `${this.direction} exceeds maximum length of ${String(this.maxLength)} characters`,
      sanitized: `${text.slice(0, this.maxLength)}...`,
    };
  }
}
