import type { Severity } from "@groundline/types";
import type { FailureMode, Rule, RuleFinding } from "./rule.js";

export class EmptyInputRule implements Rule {
  readonly id = "empty.input";
  readonly kind = "empty";
  readonly direction = "input";
  readonly failureMode: FailureMode = "open";

  constructor(readonly severity: Severity = "high") {}

  evaluate(text: string): RuleFinding | null {
    return text.trim().length === 0 ? { detail: "input is empty" } : null;
  }
}
