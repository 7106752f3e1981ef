import type { ObservableType } from "./workflowConfig";

export type Observable = {
  type: ObservableType;
  value: string;
  sourceRef: string;
  context?: string;
};

export type QaVerdict = "pass" | "needs_revision" | "critical_failure";

export type QaIssue = {
  type: "compliance" | "factuality" | "formatting";
  description: string;
  location?: string;
  severity: "low" | "medium" | "high";
};

export type QaReview = {
  verdict: QaVerdict;
  summary: string;
  issues: QaIssue[];
};

/**
 * One generate(+review) round of a sub-agent, retained verbatim for audit.
 */
export type SubAgentAttempt = {
  attempt: number;
  prompt: string;
  response?: string;
  parseError?: string;
  observables?: Observable[];
  review?: QaReview;
  reviewPrompt?: string;
  reviewResponse?: string;
  error?: string;
};

export type SubAgentState =
  | "pending"
  | "generating"
  | "reviewing"
  | "retry"
  | "done"
  | "failed";

export type SubAgentFlag = "qa_exhausted" | "qa_unavailable";

export type SubAgentOutcome = {
  name: string;
  observableType: ObservableType;
  status: Extract<SubAgentState, "done" | "failed">;
  observables: Observable[];
  flags: SubAgentFlag[];
  attempts: SubAgentAttempt[];
  warnings: string[];
};

export type ExtractionResult = {
  platform: string;
  agents: SubAgentOutcome[];
  observables: Partial<Record<ObservableType, Observable[]>>;
  totalObservables: number;
  warnings: string[];
};
