import type { Direction, Severity } from "@groundline/types";
import type { FailureMode, Rule, RuleFinding, RuleOptions } from "./rule.js";

export const DEFAULT_BLOCKED_PATTERNS: readonly string[] = [
  String.raw`\b(hack|exploit|bypass|jailbreak)\b`,
  String.raw`\b(password|secret|token)\s*[:=]`,
];

export interface BlockedPatternRuleOptions extends RuleOptions {
  /** Regex sources, matched case-insensitively. */
  patterns?: readonly string[];
}

export class BlockedPatternRule implements Rule {
  readonly kind = "blocked_pattern";
  readonly id: string;
  readonly direction: Direction;
  readonly severity: Severity;
  readonly failureMode: FailureMode;
  private readonly patterns: RegExp[];

  constructor(options: BlockedPatternRuleOptions) {
    this.id = `blocked_pattern.${options.direction}`;
    this.direction = options.direction;
    this.severity = options.severity;
    this.failureMode = options.failureMode ?? "closed";
    this.patterns = (options.patterns ?? DEFAULT_BLOCKED_PATTERNS).map(
      (source) => new RegExp(source, "gi"),
    );
  }

  evaluate(text: string): RuleFinding | null {
    const hits = this.patterns.filter((pattern) => text.search(pattern) !== -1);
    if (hits.length === 0) return null;

    const stripped = hits.reduce((current, pattern) => current.replace(pattern, ""), text);
    return {
      detail: `matched ${String(hits.length)} blocked pattern(s)`,
      sanitized: stripped.replace(/\s{2,}/g, " ").trim(),
    };
  }
}
