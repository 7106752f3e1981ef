import type { FilterStepResult } from "./contentFilter";
import type { Platform } from "./document";
import type { ExtractionResult, SubAgentOutcome } from "./extraction";
import type { GenerationAttempt, GenerationResult } from "./rule";
import type { NoveltyClass, SimilarityMatch } from "./similarity";
import type { WorkflowConfig } from "./workflowConfig";

export const workflowSteps = [
  "filter",
  "rank",
  "platform_detect",
  "extract",
  "generate",
  "similarity",
  "promote",
] as const;

export type WorkflowStep = (typeof workflowSteps)[number];

export type ExecutionStatus =
  | "pending"
  | "running"
  | "completed"
  | "failed"
  | "cancelled";

export const terminalStatuses: readonly ExecutionStatus[] = [
  "completed",
  "failed",
  "cancelled",
];

export type TerminationReason =
  | "low_relevance"
  | "platform_excluded"
  | "duplicate_suppressed"
  | "queued"
  | "stale_timeout"
  | "extraction_failed"
  | "no_observables"
  | "no_valid_rules"
  | "cancelled";

export type RankStepResult = {
  score: number;
  reasoning: string;
  threshold: number;
  prompt: string;
  response: string;
};

export type PlatformEvidence = Record<"windows" | "linux" | "macos", number>;

export type PlatformStepResult = {
  platform: Platform;
  source: "keywords" | "model" | "none";
  evidence: PlatformEvidence;
  targets: Platform[];
  excluded: boolean;
  fallback?: { prompt: string; response?: string; error?: string };
  warnings: string[];
};

export type SimilarityStepResult = {
  matches: SimilarityMatch[];
};

export type SuppressedDraft = {
  draftId: string;
  bestRuleId: string | null;
  aggregate: number;
  classification: NoveltyClass;
};

export type PromoteStepResult = {
  queuedItemIds: string[];
  suppressed: SuppressedDraft[];
};

export type StepResults = {
  filter: FilterStepResult;
  rank: RankStepResult;
  platform_detect: PlatformStepResult;
  extract: ExtractionResult;
  generate: GenerationResult;
  similarity: SimilarityStepResult;
  promote: PromoteStepResult;
};

/**
 * Model conversation a step held when it failed.
 */
export type StageTranscript =
  | { kind: "model_call"; prompt: string; response?: string }
  | { kind: "extraction"; agents: SubAgentOutcome[] }
  | { kind: "generation"; attempts: GenerationAttempt[] };

export type ExecutionError = {
  step: WorkflowStep | null;
  code: string;
  message: string;
  retryable: boolean;
  fatal: boolean;
  details?: string[];
  transcript?: StageTranscript;
};

/**
 * Why a stage could not produce a result. `reason` is set when the failure maps to a termination reason.
 */
export type StageFailure = {
  code: string;
  message: string;
  retryable: boolean;
  reason?: TerminationReason;
  details?: string[];
  transcript?: StageTranscript;
};

export type ExecutionFlag = "filter_degraded";

export type AuditEventKind =
  | "created"
  | "started"
  | "step_completed"
  | "terminated"
  | "failed"
  | "retry"
  | "cancel_requested"
  | "cancelled"
  | "stale_timeout";

export type AuditEntry = {
  at: string;
  kind: AuditEventKind;
  step: WorkflowStep | null;
  message: string;
  data?: Record<string, unknown>;
};

/**
 * Single mutable record per run; every writer must present the revision it read.
 */
export type WorkflowExecutionEntity = {
  id: string;
  documentId: string;
  configVersion: string;
  config: WorkflowConfig;
  status: ExecutionStatus;
  currentStep: WorkflowStep | null;
  stepResults: Partial<StepResults>;
  terminationReason: TerminationReason | null;
  error: ExecutionError | null;
  flags: ExecutionFlag[];
  cancelRequested: boolean;
  retryCount: number;
  revision: number;
  audit: AuditEntry[];
  createdAt: Date;
  startedAt: Date | null;
  updatedAt: Date;
  completedAt: Date | null;
};
