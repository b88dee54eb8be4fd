import type { Direction, Severity } from "@groundline/types";
import { KeywordToxicityScorer, escapeRegExp } from "../toxicity-scorer.js";
import type { ToxicityScorer } from "../toxicity-scorer.js";
import type { FailureMode, Rule, RuleFinding, RuleOptions } from "./rule.js";

export interface ToxicityRuleOptions extends RuleOptions {
  threshold: number;
  scorer?: ToxicityScorer;
}

function maskTerms(text: string, terms: readonly string[]): string {
  return terms.reduce(
    (current, term) =>
      current.replace(new RegExp(String.raw`\b${escapeRegExp(term)}\b`, "gi"), (match) =>
        "*".repeat(match.length),
      ),
    text,
  );
}

export class ToxicityRule implements Rule {
  readonly kind = "toxicity";
  readonly id: string;
  readonly direction: Direction;
  readonly severity: Severity;
  readonly failureMode: FailureMode;
  private readonly threshold: number;
  private readonly scorer: ToxicityScorer;

  constructor(options: ToxicityRuleOptions) {
    this.id = `toxicity.${options.direction}`;
    this.direction = options.direction;
    this.severity = options.severity;
    this.failureMode = options.failureMode ?? "open";
    this.threshold = options.threshold;
    this.scorer = options.scorer ?? new KeywordToxicityScorer();
  }

  async evaluate(text: string): Promise<RuleFinding | null> {
    const { score, terms } = await this.scorer.assess(text);
    if (score < this.threshold) return null;
    return {
      detail: `toxicity score ${score.toFixed(2)} >= ${this.threshold.toFixed(2)}`,
      sanitized: maskTerms(text, terms),
    };
  }
}
