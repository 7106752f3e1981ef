export type RuleSection = "title" | "description" | "tags" | "signature";

export const ruleSections: readonly RuleSection[] = [
  "title",
  "description",
  "tags",
  "signature",
];

export type SectionScores = Record<RuleSection, number>;

export type SectionTexts = Record<RuleSection, string>;

export type SectionEmbeddings = Record<RuleSection, number[]>;

export type NoveltyClass = "duplicate" | "variant" | "novel";

/**
 * Corpus rule as seen by similarity lookups; `updatedAt` breaks aggregate-score ties.
 */
export type IndexedRuleMatch = {
  ruleId: string;
  title: string;
  updatedAt: Date;
  sectionScores: SectionScores;
};

export type SimilarityMatch = {
  draftId: string;
  bestRuleId: string | null;
  bestRuleTitle: string | null;
  sectionScores: SectionScores;
  aggregate: number;
  classification: NoveltyClass;
  candidatesConsidered: number;
};
