import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import {
  describeBoundaryError,
  FatalConfigurationError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type { DocumentEntity } from "../../core/entities/document";
import type {
  AuditEntry,
  AuditEventKind,
  ExecutionError,
  ExecutionFlag,
  StageFailure,
  StepResults,
  TerminationReason,
  WorkflowExecutionEntity,
  WorkflowStep,
} from "../../core/entities/workflow";
import { terminalStatuses, workflowSteps } from "../../core/entities/workflow";
import {
  configVersionOf,
  type WorkflowConfig,
} from "../../core/entities/workflowConfig";
import type { DocumentStorePort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  ExecutionListFilter,
  ExecutionRepositoryPort,
  IdGeneratorPort,
} from "../../core/ports/outboundPorts";
import {
  stepIndex,
  transition,
  type WorkflowEvent,
} from "../../core/workflow/stateMachine";
import { logger as rootLogger } from "../../shared/logger/logger";
import type { ContentFilterService } from "./contentFilterService";
import type { ExtractionSupervisorService } from "./extractionSupervisorService";
import type { PlatformDetectionService } from "./platformDetectionService";
import type { QueuePromotionService } from "./queuePromotionService";
import type { RankingService } from "./rankingService";
import type { RuleGenerationService } from "./ruleGenerationService";
import type { SimilarityMatchingService } from "./similarityMatchingService";

export type WorkflowStages = {
  contentFilter: ContentFilterService;
  ranking: RankingService;
  platform: PlatformDetectionService;
  extraction: ExtractionSupervisorService;
  generation: RuleGenerationService;
  similarity: SimilarityMatchingService;
  promotion: QueuePromotionService;
};

type StepSummary = Record<string, unknown>;

export type StepOutcome =
  | {
      kind: "advance";
      results: Partial<StepResults>;
      flags?: ExecutionFlag[];
      summary: StepSummary;
    }
  | {
      kind: "terminate";
      reason: TerminationReason;
      results: Partial<StepResults>;
      summary: StepSummary;
    }
  | {
      kind: "fail";
      failure: StageFailure;
      fatal: boolean;
    };

export type SweepReport = {
  swept: string[];
  conflicts: string[];
};

const MAX_CANCEL_WRITES = 3;

const driverError = (
  code: AppBoundaryError["code"],
  message: string,
): AppBoundaryError => ({
  source: "workflow",
  code,
  provider: "driver",
  message,
  retryable: false,
});

const isTerminal = (execution: WorkflowExecutionEntity): boolean =>
  terminalStatuses.includes(execution.status);

/**
 * True when the only write since `base` was a cancel request, which leaves the step owner in place.
 */
const isCancelMarkerOnly = (
  base: WorkflowExecutionEntity,
  fresh: WorkflowExecutionEntity,
): boolean =>
  fresh.status === "running" &&
  fresh.currentStep === base.currentStep &&
  fresh.cancelRequested &&
  !base.cancelRequested;

const clearFrom = (
  results: Partial<StepResults>,
  step: WorkflowStep,
): Partial<StepResults> => {
  const kept: Partial<StepResults> = { ...results };
  for (const candidate of workflowSteps) {
    if (stepIndex(candidate) >= stepIndex(step)) {
      delete kept[candidate];
    }
  }
  return kept;
};

/**
 * Owns execution records: creation, the step loop, retry, cancellation and the stale sweep.
 * Each write is a compare-and-set on the revision and step the writer read; a lost write ends the loop.
 */
export class WorkflowDriverService {
  private readonly configVersion: string;

  constructor(
    private readonly executions: ExecutionRepositoryPort,
    private readonly documents: DocumentStorePort,
    private readonly stages: WorkflowStages,
    private readonly config: WorkflowConfig,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
    private readonly log: Logger = rootLogger,
  ) {
    this.configVersion = configVersionOf(config);
  }

  /**
   * Creates a pending execution pinned to the current configuration snapshot.
   */
  async trigger(
    documentId: string,
  ): Promise<Result<WorkflowExecutionEntity, AppBoundaryError>> {
    const document = await this.documents.fetchById(documentId);
    if (document.isErr()) {
      return err(document.error);
    }
    if (!document.value) {
      return err(driverError("not_found", `Document ${documentId} not found.`));
    }

    const now = this.clock.now();
    const created = await this.executions.create({
      id: this.ids.next(),
      documentId,
      configVersion: this.configVersion,
      config: this.config,
      status: "pending",
      currentStep: null,
      stepResults: {},
      terminationReason: null,
      error: null,
      flags: [],
      cancelRequested: false,
      retryCount: 0,
      revision: 0,
      audit: [
        this.audit(now, "created", null, "Execution created.", {
          configVersion: this.configVersion,
        }),
      ],
      createdAt: now,
      startedAt: null,
      updatedAt: now,
      completedAt: null,
    });

    if (created.isOk()) {
      this.log.info(
        { executionId: created.value.id, documentId },
        "execution created",
      );
    }
    return created;
  }

  async start(
    executionId: string,
  ): Promise<Result<WorkflowExecutionEntity, AppBoundaryError>> {
    const loaded = await this.get(executionId);
    if (loaded.isErr()) {
      return loaded;
    }
    const execution = loaded.value;

    const next = transition(execution, { type: "start" });
    if (next.isErr()) {
      return err(driverError("conflict", next.error.message));
    }

    const now = this.clock.now();
    const started = await this.commit(execution, {
      ...execution,
      ...next.value,
      startedAt: execution.startedAt ?? now,
      updatedAt: now,
      audit: [
        ...execution.audit,
        this.audit(now, "started", next.value.currentStep, "Execution started."),
      ],
    });
    if (started.isErr()) {
      return err(started.error);
    }

    return ok(await this.runLoop(started.value));
  }

  /**
   * Re-enters the failed step. Results of earlier steps are reused; the failed step and later ones are cleared.
   */
  async retry(
    executionId: string,
  ): Promise<Result<WorkflowExecutionEntity, AppBoundaryError>> {
    const loaded = await this.get(executionId);
    if (loaded.isErr()) {
      return loaded;
    }
    const execution = loaded.value;

    if (execution.error?.fatal) {
      return err(
        driverError(
          "conflict",
          `Execution ${executionId} failed on a fatal configuration error and cannot be retried.`,
        ),
      );
    }
    if (execution.error && !execution.error.retryable) {
      return err(
        driverError(
          "conflict",
          `Execution ${executionId} failed with ${execution.error.code}, which a retry cannot fix.`,
        ),
      );
    }
    if (!execution.currentStep) {
      return err(
        driverError("conflict", `Execution ${executionId} has no step to retry.`),
      );
    }

    const step = execution.currentStep;
    const next = transition(execution, { type: "retry", step });
    if (next.isErr()) {
      return err(driverError("conflict", next.error.message));
    }

    const now = this.clock.now();
    const resumed = await this.commit(execution, {
      ...execution,
      ...next.value,
      stepResults: clearFrom(execution.stepResults, step),
      error: null,
      retryCount: execution.retryCount + 1,
      completedAt: null,
      updatedAt: now,
      audit: [
        ...execution.audit,
        this.audit(now, "retry", step, `Retrying from ${step}.`, {
          retryCount: execution.retryCount + 1,
        }),
      ],
    });
    if (resumed.isErr()) {
      return err(resumed.error);
    }

    this.log.info({ executionId, step }, "execution retry");
    return ok(await this.runLoop(resumed.value));
  }

  /**
   * Pending executions are cancelled at once; running ones get a marker the step loop honours between steps.
   */
  async cancel(
    executionId: string,
  ): Promise<Result<WorkflowExecutionEntity, AppBoundaryError>> {
    for (let attempt = 1; attempt <= MAX_CANCEL_WRITES; attempt += 1) {
      const loaded = await this.get(executionId);
      if (loaded.isErr()) {
        return loaded;
      }
      const execution = loaded.value;
      const now = this.clock.now();

      if (execution.status === "running") {
        if (execution.cancelRequested) {
          return ok(execution);
        }
        const marked = await this.commit(execution, {
          ...execution,
          cancelRequested: true,
          updatedAt: now,
          audit: [
            ...execution.audit,
            this.audit(
              now,
              "cancel_requested",
              execution.currentStep,
              "Cancellation requested; honoured after the current step.",
            ),
          ],
        });
        if (marked.isOk() || marked.error.code !== "conflict") {
          return marked;
        }
        continue;
      }

      const next = transition(execution, { type: "cancel" });
      if (next.isErr()) {
        return err(driverError("conflict", next.error.message));
      }
      const cancelled = await this.commit(execution, {
        ...execution,
        ...next.value,
        cancelRequested: true,
        updatedAt: now,
        completedAt: now,
        audit: [
          ...execution.audit,
          this.audit(now, "cancelled", execution.currentStep, "Execution cancelled."),
        ],
      });
      if (cancelled.isOk() || cancelled.error.code !== "conflict") {
        return cancelled;
      }
    }

    return err(
      driverError(
        "conflict",
        `Execution ${executionId} kept changing; cancellation not recorded.`,
      ),
    );
  }

  /**
   * Fails running executions whose last write is older than the staleness timeout.
   */
  async sweepStale(now: Date = this.clock.now()): Promise<SweepReport> {
    const cutoff = new Date(now.getTime() - this.config.staleAfterMs);
    const candidates = await this.executions.listRunningUpdatedBefore(cutoff);
    const report: SweepReport = { swept: [], conflicts: [] };

    for (const execution of candidates) {
      const next = transition(execution, { type: "stale" });
      if (next.isErr()) {
        report.conflicts.push(execution.id);
        continue;
      }

      const failedError: ExecutionError = {
        step: execution.currentStep,
        code: "stale_timeout",
        message: `No progress since ${execution.updatedAt.toISOString()}.`,
        retryable: true,
        fatal: false,
      };
      const written = await this.commit(execution, {
        ...execution,
        ...next.value,
        error: failedError,
        updatedAt: now,
        completedAt: now,
        audit: [
          ...execution.audit,
          this.audit(
            now,
            "stale_timeout",
            execution.currentStep,
            failedError.message,
          ),
        ],
      });

      if (written.isOk()) {
        report.swept.push(execution.id);
        this.log.warn(
          { executionId: execution.id, step: execution.currentStep },
          "stale execution failed",
        );
      } else {
        report.conflicts.push(execution.id);
      }
    }

    return report;
  }

  async get(
    executionId: string,
  ): Promise<Result<WorkflowExecutionEntity, AppBoundaryError>> {
    const execution = await this.executions.findById(executionId);
    return execution
      ? ok(execution)
      : err(driverError("not_found", `Execution ${executionId} not found.`));
  }

  list(filter: ExecutionListFilter): Promise<WorkflowExecutionEntity[]> {
    return this.executions.list(filter);
  }

  /**
   * Drives steps until the execution leaves `running` or this writer loses ownership of the record.
   */
  private async runLoop(
    initial: WorkflowExecutionEntity,
  ): Promise<WorkflowExecutionEntity> {
    let execution = initial;
    const log = this.log.child({
      executionId: execution.id,
      documentId: execution.documentId,
    });

    while (execution.status === "running" && execution.currentStep) {
      if (execution.cancelRequested) {
        return this.finishCancelled(execution, log);
      }

      const step = execution.currentStep;
      const outcome = await this.runStep(execution, step, log);

      const written = await this.commitOutcome(execution, step, outcome);
      if (!written) {
        log.warn({ step }, "execution ownership lost; stopping");
        return (await this.executions.findById(execution.id)) ?? execution;
      }
      execution = written;

      if (outcome.kind === "fail") {
        log.error(
          { step, code: outcome.failure.code, fatal: outcome.fatal },
          outcome.failure.message,
        );
      } else {
        log.info({ step, ...outcome.summary }, "step completed");
      }
    }

    if (isTerminal(execution)) {
      log.info(
        {
          status: execution.status,
          terminationReason: execution.terminationReason,
        },
        "execution finished",
      );
    }
    return execution;
  }

  private async finishCancelled(
    execution: WorkflowExecutionEntity,
    log: Logger,
  ): Promise<WorkflowExecutionEntity> {
    const next = transition(execution, { type: "cancel" });
    if (next.isErr()) {
      return execution;
    }
    const now = this.clock.now();
    const cancelled = await this.commit(execution, {
      ...execution,
      ...next.value,
      updatedAt: now,
      completedAt: now,
      audit: [
        ...execution.audit,
        this.audit(
          now,
          "cancelled",
          execution.currentStep,
          "Execution cancelled between steps.",
        ),
      ],
    });
    if (cancelled.isErr()) {
      log.warn({ code: cancelled.error.code }, "cancellation write lost");
      return (await this.executions.findById(execution.id)) ?? execution;
    }
    log.info({ step: execution.currentStep }, "execution cancelled");
    return cancelled.value;
  }

  /**
   * Writes a step outcome. A conflict caused only by a cancel marker is rebased once onto the fresh record.
   */
  private async commitOutcome(
    base: WorkflowExecutionEntity,
    step: WorkflowStep,
    outcome: StepOutcome,
  ): Promise<WorkflowExecutionEntity | null> {
    const next = this.applyOutcome(base, step, outcome);
    if (!next) {
      return null;
    }

    const written = await this.commit(base, next);
    if (written.isOk()) {
      return written.value;
    }
    if (written.error.code !== "conflict") {
      this.log.error(
        { executionId: base.id, step },
        describeBoundaryError(written.error),
      );
      return null;
    }

    const fresh = await this.executions.findById(base.id);
    if (!fresh || !isCancelMarkerOnly(base, fresh)) {
      return null;
    }

    const rebased = this.applyOutcome(fresh, step, outcome);
    if (!rebased) {
      return null;
    }
    const retried = await this.commit(fresh, rebased);
    return retried.isOk() ? retried.value : null;
  }

  private applyOutcome(
    base: WorkflowExecutionEntity,
    step: WorkflowStep,
    outcome: StepOutcome,
  ): WorkflowExecutionEntity | null {
    const now = this.clock.now();
    const effects = this.effectsOf(base, step, outcome, now);

    const next = transition(base, effects.event);
    if (next.isErr()) {
      this.log.warn({ executionId: base.id, step }, next.error.message);
      return null;
    }

    const done = terminalStatuses.includes(next.value.status);
    return {
      ...base,
      ...next.value,
      stepResults: { ...base.stepResults, ...effects.results },
      flags: effects.flags,
      error: effects.error,
      updatedAt: now,
      completedAt: done ? now : null,
      audit: [...base.audit, effects.entry],
    };
  }

  private effectsOf(
    base: WorkflowExecutionEntity,
    step: WorkflowStep,
    outcome: StepOutcome,
    now: Date,
  ): {
    event: WorkflowEvent;
    entry: AuditEntry;
    results: Partial<StepResults>;
    flags: ExecutionFlag[];
    error: ExecutionError | null;
  } {
    switch (outcome.kind) {
      case "advance":
        return {
          event: { type: "step_succeeded", step },
          entry: this.audit(now, "step_completed", step, `Step ${step} completed.`, outcome.summary),
          results: outcome.results,
          flags: [...new Set([...base.flags, ...(outcome.flags ?? [])])],
          error: null,
        };
      case "terminate":
        return {
          event: { type: "step_terminated", step, reason: outcome.reason },
          entry: this.audit(now, "terminated", step, `Terminated: ${outcome.reason}.`, outcome.summary),
          results: outcome.results,
          flags: base.flags,
          error: null,
        };
      case "fail":
        return {
          event: outcome.failure.reason
            ? { type: "step_failed", step, reason: outcome.failure.reason }
            : { type: "step_failed", step },
          entry: this.audit(now, "failed", step, outcome.failure.message, {
            code: outcome.failure.code,
            fatal: outcome.fatal,
            ...(outcome.failure.transcript ? { transcript: outcome.failure.transcript } : {}),
          }),
          results: {},
          flags: base.flags,
          error: {
            step,
            code: outcome.failure.code,
            message: outcome.failure.message,
            retryable: outcome.failure.retryable && !outcome.fatal,
            fatal: outcome.fatal,
            ...(outcome.failure.details ? { details: outcome.failure.details } : {}),
            ...(outcome.failure.transcript ? { transcript: outcome.failure.transcript } : {}),
          },
        };
    }
  }

  private async commit(
    base: WorkflowExecutionEntity,
    next: WorkflowExecutionEntity,
  ): Promise<Result<WorkflowExecutionEntity, AppBoundaryError>> {
    return this.executions.compareAndSet(
      { ...next, revision: base.revision + 1 },
      { expectedRevision: base.revision, expectedStep: base.currentStep },
    );
  }

  /**
   * Runs one step against the execution's own config snapshot; thrown errors become failed outcomes.
   */
  private async runStep(
    execution: WorkflowExecutionEntity,
    step: WorkflowStep,
    log: Logger,
  ): Promise<StepOutcome> {
    log.debug({ step }, "step started");
    try {
      return await this.executeStep(execution, step);
    } catch (error) {
      if (error instanceof FatalConfigurationError) {
        return {
          kind: "fail",
          fatal: true,
          failure: {
            code: "fatal_configuration",
            message: error.message,
            retryable: false,
            details: error.details,
          },
        };
      }
      return {
        kind: "fail",
        fatal: false,
        failure: {
          code: "unexpected_error",
          message: error instanceof Error ? error.message : String(error),
          retryable: true,
        },
      };
    }
  }

  private async executeStep(
    execution: WorkflowExecutionEntity,
    step: WorkflowStep,
  ): Promise<StepOutcome> {
    const config = execution.config;
    const results = execution.stepResults;

    switch (step) {
      case "filter": {
        const document = await this.loadDocument(execution.documentId);
        if (document.isErr()) {
          return { kind: "fail", fatal: false, failure: document.error };
        }
        const filtered = await this.stages.contentFilter.filter(
          document.value.content,
          config.contentFilter,
        );
        return {
          kind: "advance",
          results: { filter: filtered },
          flags: filtered.degraded ? ["filter_degraded"] : [],
          summary: {
            chunksKept: filtered.chunksKept,
            chunksRemoved: filtered.chunksRemoved,
            classifierVersion: filtered.classifierVersion,
          },
        };
      }

      case "rank": {
        const filtered = results.filter;
        if (!filtered) {
          return this.missingInput("filter");
        }
        const ranked = await this.stages.ranking.rank(filtered.filteredText, config);
        if (ranked.isErr()) {
          return { kind: "fail", fatal: false, failure: ranked.error };
        }
        const summary = { score: ranked.value.score, threshold: ranked.value.threshold };
        return ranked.value.score < ranked.value.threshold
          ? { kind: "terminate", reason: "low_relevance", results: { rank: ranked.value }, summary }
          : { kind: "advance", results: { rank: ranked.value }, summary };
      }

      case "platform_detect": {
        const filtered = results.filter;
        if (!filtered) {
          return this.missingInput("filter");
        }
        const document = await this.loadDocument(execution.documentId);
        if (document.isErr()) {
          return { kind: "fail", fatal: false, failure: document.error };
        }
        const detected = await this.stages.platform.detect(
          filtered.filteredText,
          document.value.platformHints,
          config,
        );
        const summary = { platform: detected.platform, source: detected.source };
        return detected.excluded
          ? { kind: "terminate", reason: "platform_excluded", results: { platform_detect: detected }, summary }
          : { kind: "advance", results: { platform_detect: detected }, summary };
      }

      case "extract": {
        const filtered = results.filter;
        const detected = results.platform_detect;
        if (!filtered || !detected) {
          return this.missingInput(!filtered ? "filter" : "platform_detect");
        }
        const extracted = await this.stages.extraction.extract(
          filtered.filteredText,
          detected.platform,
          config,
        );
        if (extracted.isErr()) {
          return { kind: "fail", fatal: false, failure: extracted.error };
        }
        const summary = {
          totalObservables: extracted.value.totalObservables,
          failedAgents: extracted.value.agents.filter((agent) => agent.status === "failed").length,
        };
        return extracted.value.totalObservables === 0
          ? { kind: "terminate", reason: "no_observables", results: { extract: extracted.value }, summary }
          : { kind: "advance", results: { extract: extracted.value }, summary };
      }

      case "generate": {
        const extracted = results.extract;
        if (!extracted) {
          return this.missingInput("extract");
        }
        const generated = await this.stages.generation.generate(
          extracted,
          config,
          execution.id,
        );
        if (generated.isErr()) {
          return { kind: "fail", fatal: false, failure: generated.error };
        }
        const validDrafts = generated.value.drafts.filter((draft) => draft.validation.valid).length;
        const summary = {
          drafts: generated.value.drafts.length,
          validDrafts,
          attempts: generated.value.attempts.length,
        };
        return validDrafts === 0
          ? { kind: "terminate", reason: "no_valid_rules", results: { generate: generated.value }, summary }
          : { kind: "advance", results: { generate: generated.value }, summary };
      }

      case "similarity": {
        const generated = results.generate;
        if (!generated) {
          return this.missingInput("generate");
        }
        const matched = await this.stages.similarity.match(generated.drafts, config);
        if (matched.isErr()) {
          return { kind: "fail", fatal: false, failure: matched.error };
        }
        return {
          kind: "advance",
          results: { similarity: matched.value },
          summary: {
            matches: matched.value.matches.map((match) => ({
              draftId: match.draftId,
              aggregate: match.aggregate,
              classification: match.classification,
            })),
          },
        };
      }

      case "promote": {
        const generated = results.generate;
        const matched = results.similarity;
        if (!generated || !matched) {
          return this.missingInput(!generated ? "generate" : "similarity");
        }
        const promoted = await this.stages.promotion.promote(
          execution,
          generated.drafts,
          matched,
        );
        return {
          kind: "terminate",
          reason: promoted.queuedItemIds.length > 0 ? "queued" : "duplicate_suppressed",
          results: { promote: promoted },
          summary: {
            queued: promoted.queuedItemIds.length,
            suppressed: promoted.suppressed.length,
          },
        };
      }
    }
  }

  private async loadDocument(
    documentId: string,
  ): Promise<Result<DocumentEntity, StageFailure>> {
    const document = await this.documents.fetchById(documentId);
    if (document.isErr()) {
      return err({
        code: document.error.code,
        message: describeBoundaryError(document.error),
        retryable: document.error.retryable,
      });
    }
    if (!document.value) {
      return err({
        code: "not_found",
        message: `Document ${documentId} not found.`,
        retryable: false,
      });
    }
    return ok(document.value);
  }

  private missingInput(step: WorkflowStep): StepOutcome {
    return {
      kind: "fail",
      fatal: false,
      failure: {
        code: "missing_input",
        message: `Result of step ${step} is missing from the execution record.`,
        retryable: false,
      },
    };
  }

  private audit(
    now: Date,
    kind: AuditEventKind,
    step: WorkflowStep | null,
    message: string,
    data?: Record<string, unknown>,
  ): AuditEntry {
    return {
      at: now.toISOString(),
      kind,
      step,
      message,
      ...(data ? { data } : {}),
    };
  }
}
