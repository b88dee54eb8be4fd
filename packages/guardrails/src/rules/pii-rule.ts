import type { Direction, Severity } from "@groundline/types";
import type { FailureMode, Rule, RuleFinding, RuleOptions } from "./rule.js";

export type PiiFamily = "email" | "credit_card" | "ssn" | "phone";

// Card and SSN run before phone so their digit groups are not half-redacted as a phone number.
export const PII_PATTERNS: Readonly<Record<PiiFamily, RegExp>> = {
  email: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  credit_card: /\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/g,
  ssn: /\b\d{3}-\d{2}-\d{4}\b/g,
  phone: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g,
};

const ALL_FAMILIES: readonly PiiFamily[] = ["email", "credit_card", "ssn", "phone"];

export interface PiiRuleOptions extends RuleOptions {
  families?: readonly PiiFamily[];
}

export function redactionToken(family: PiiFamily): string {
  return `[REDACTED_${family.toUpperCase()}]`;
}

/** Families present in `text`, in detection order. */
export function detectPii(text: string, families: readonly PiiFamily[] = ALL_FAMILIES): PiiFamily[] {
  return families.filter((family) => text.search(PII_PATTERNS[family]) !== -1);
}

export function redactPii(text: string, families: readonly PiiFamily[] = ALL_FAMILIES): string {
  return families.reduce(
    (current, family) => current.replace(PII_PATTERNS[family], redactionToken(family)),
    text,
  );
}

export class PiiRule implements Rule {
  readonly kind = "pii";
  readonly id: string;
  readonly direction: Direction;
  readonly severity: Severity;
  readonly failureMode: FailureMode;
  private readonly families: readonly PiiFamily[];

  constructor(options: PiiRuleOptions) {
    this.id = `pii.${options.direction}`;
    this.direction = options.direction;
    this.severity = options.severity;
    this.failureMode = options.failureMode ?? "closed";
    this.families = options.families ?? ALL_FAMILIES;
  }

  evaluate(text: string): RuleFinding | null {
    const found = detectPii(text, this.families);
    if (found.length === 0) return null;
    return {
      detail: `PII detected: ${found.join(", ")}`,
      sanitized: redactPii(text, found),
    };
  }
}
