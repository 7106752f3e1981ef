import type { Result } from "neverthrow";
import type { AppBoundaryError, ModelGatewayError } from "../entities/appError";
import type { QueueItemEntity, ReviewStatus } from "../entities/reviewQueue";
import type {
  IndexedRuleMatch,
  SectionEmbeddings,
} from "../entities/similarity";
import type {
  ExecutionStatus,
  WorkflowExecutionEntity,
  WorkflowStep,
} from "../entities/workflow";

export type WorkflowJobAction = "start" | "retry";

export type WorkflowJob = {
  executionId: string;
  action: WorkflowJobAction;
  requestedAt: string;
};

export interface JobQueuePort {
  enqueue(job: WorkflowJob): Promise<void>;
}

export type ModelPrompt = {
  system?: string;
  user: string;
};

/**
 * Per-call policy: the timeout bounds one request, `retries`/`retryDelayMs` drive transport backoff only.
 */
export type ModelCallOptions = {
  agent: string;
  model?: string;
  temperature: number;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export interface ModelGatewayPort {
  complete(
    prompt: ModelPrompt,
    options: ModelCallOptions,
  ): Promise<Result<string, ModelGatewayError>>;
}

export interface EmbeddingPort {
  embedTexts(texts: string[]): Promise<Result<number[][], AppBoundaryError>>;
}

export type IndexedRuleEntry = {
  ruleId: string;
  title: string;
  updatedAt: Date;
  embeddings: SectionEmbeddings;
};

export interface VectorIndexPort {
  upsert(entry: IndexedRuleEntry): Promise<Result<void, AppBoundaryError>>;
  query(
    embeddings: SectionEmbeddings,
    topK: number,
  ): Promise<Result<IndexedRuleMatch[], AppBoundaryError>>;
}

/**
 * Guards a write: it only lands if the stored revision (and, when given, the current step) still match what the writer read.
 */
export type ExecutionWriteGuard = {
  expectedRevision: number;
  expectedStep?: WorkflowStep | null;
};

export type ExecutionListFilter = {
  status?: ExecutionStatus;
  documentId?: string;
  limit: number;
};

export interface ExecutionRepositoryPort {
  create(
    execution: WorkflowExecutionEntity,
  ): Promise<Result<WorkflowExecutionEntity, AppBoundaryError>>;
  findById(executionId: string): Promise<WorkflowExecutionEntity | null>;
  compareAndSet(
    next: WorkflowExecutionEntity,
    guard: ExecutionWriteGuard,
  ): Promise<Result<WorkflowExecutionEntity, AppBoundaryError>>;
  list(filter: ExecutionListFilter): Promise<WorkflowExecutionEntity[]>;
  listRunningUpdatedBefore(cutoff: Date): Promise<WorkflowExecutionEntity[]>;
}

export interface ReviewQueueRepositoryPort {
  insertMany(items: QueueItemEntity[]): Promise<void>;
  findById(itemId: string): Promise<QueueItemEntity | null>;
  list(filter: {
    status?: ReviewStatus;
    limit: number;
  }): Promise<QueueItemEntity[]>;
  update(item: QueueItemEntity): Promise<void>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}
