export type Severity = "low" | "medium" | "high";

export type Direction = "input" | "output";

export type ViolationKind =
  | "length"
  | "empty"
  | "blocked_pattern"
  | "pii"
  | "toxicity"
  | "detector_failure";

export type RuleName = "length" | "empty" | "blockedPatterns" | "pii" | "toxicity";

export interface GuardrailViolation {
  ruleId: string;
  kind: ViolationKind;
  severity: Severity;
  field: Direction;
  detail: string;
}

export interface ValidationResult {
  sanitizedText: string;
  violations: GuardrailViolation[];
  /** True when any violation is high severity. */
  blocked: boolean;
}

export type RuleToggles = Record<RuleName, boolean>;
