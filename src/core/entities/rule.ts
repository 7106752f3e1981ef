export const severityLevels = [
  "informational",
  "low",
  "medium",
  "high",
  "critical",
] as const;

export type Severity = (typeof severityLevels)[number];

export type LogSource = {
  category?: string;
  product?: string;
  service?: string;
};

export type FieldValue = string | number | boolean | null;

/**
 * A selection maps field names (optionally with `|modifier` suffixes) to one value or a list of alternatives.
 */
export type FieldMap = Record<string, FieldValue | FieldValue[]>;

export type Selection = FieldMap | FieldMap[] | FieldValue[];

export type DetectionTree = {
  selections: Record<string, Selection>;
  condition: string;
};

export type RuleFields = {
  title: string;
  description: string;
  logSource: LogSource;
  detection: DetectionTree;
  tags: string[];
  severity?: Severity;
};

export type RuleValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export type RuleDraft = {
  id: string;
  index: number;
  fields: RuleFields | null;
  raw: string;
  validation: RuleValidation;
  attempts: number;
};

export type GenerationAttempt = {
  attempt: number;
  prompt: string;
  response?: string;
  parseError?: string;
  validations: RuleValidation[];
  error?: string;
};

export type GenerationResult = {
  drafts: RuleDraft[];
  attempts: GenerationAttempt[];
};
