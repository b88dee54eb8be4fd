export interface ToxicityAssessment {
  /** 0..1 */
  score: number;
  /** Terms to mask when the text is sanitized. */
  terms: string[];
}

/** Pluggable scorer; an external classifier can be wrapped behind this. */
export interface ToxicityScorer {
  assess(text: string): ToxicityAssessment | Promise<ToxicityAssessment>;
}

export const DEFAULT_TOXIC_KEYWORDS: readonly string[] = [
  "hate",
  "violence",
  "harassment",
  "discrimination",
  "illegal",
  "harmful",
  "dangerous",
];

/**
 * Keyword heuristic: each distinct keyword present as a whole word adds 0.5,
 * capped at 1.
 */
export class KeywordToxicityScorer implements ToxicityScorer {
  private readonly keywords: readonly string[];

  constructor(keywords: readonly string[] = DEFAULT_TOXIC_KEYWORDS) {
    this.keywords = keywords.map((keyword) => keyword.toLowerCase());
  }

  assess(text: string): ToxicityAssessment {
    const lower = text.toLowerCase();
    const terms = this.keywords.filter((keyword) =>
      new RegExp(String.raw`\b${escapeRegExp(keyword)}\b`).test(lower),
    );
    return { score: Math.min(1, terms.length * 0.5), terms };
  }
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
