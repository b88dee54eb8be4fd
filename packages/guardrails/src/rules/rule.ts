import type { Direction, Severity, ViolationKind } from "@groundline/types";

/**
 * `open`: a detector that throws is logged and skipped.
 * `closed`: a detector that throws blocks the text.
 */
export type FailureMode = "open" | "closed";

export interface RuleFinding {
  detail: string;
  /** Replacement text, applied when the rule runs at medium severity. */
  sanitized?: string;
}

export interface Rule {
  readonly id: string;
  readonly kind: ViolationKind;
  readonly severity: Severity;
  readonly direction: Direction;
  readonly failureMode: FailureMode;
  evaluate(text: string): RuleFinding | null | Promise<RuleFinding | null>;
}

export interface RuleOptions {
  direction: Direction;
  severity: Severity;
  failureMode?: FailureMode;
}
