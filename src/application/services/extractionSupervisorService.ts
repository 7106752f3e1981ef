import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import { z } from "zod";
import {
  describeBoundaryError,
  FatalConfigurationError,
} from "../../core/entities/appError";
import type { Platform } from "../../core/entities/document";
import type {
  ExtractionResult,
  Observable,
  SubAgentAttempt,
  SubAgentFlag,
  SubAgentOutcome,
} from "../../core/entities/extraction";
import type { StageFailure } from "../../core/entities/workflow";
import type {
  ObservableType,
  SubAgentSpec,
  WorkflowConfig,
} from "../../core/entities/workflowConfig";
import type { ModelGatewayPort } from "../../core/ports/outboundPorts";
import { logger as rootLogger } from "../../shared/logger/logger";
import { callOptionsFor } from "../prompts/callOptions";
import {
  extractionPrompt,
  hasExtractionTemplate,
  renderPrompt,
} from "../prompts/promptTemplates";
import {
  describeParseError,
  tolerantParse,
  type ParseError,
} from "../parsing/tolerantParse";
import {
  countHighSeverity,
  formatFeedback,
  type QaReviewService,
} from "./qaReviewService";

const observableItemSchema = z.object({
  value: z.string().trim().min(1),
  source_ref: z.string().default(""),
  context: z.string().optional(),
});

const observablesSchema = z.union([
  z.object({ observables: z.array(observableItemSchema) }),
  z.array(observableItemSchema),
]);

export const parseObservables = (
  response: string,
  type: ObservableType,
): Result<Observable[], ParseError> =>
  tolerantParse(response, observablesSchema).map((parsed) => {
    const items = Array.isArray(parsed) ? parsed : parsed.observables;
    const seen = new Set<string>();
    const observables: Observable[] = [];

    for (const item of items) {
      if (seen.has(item.value)) {
        continue;
      }
      seen.add(item.value);
      observables.push({
        type,
        value: item.value,
        sourceRef: item.source_ref,
        ...(item.context ? { context: item.context } : {}),
      });
    }

    return observables;
  });

type RejectedCandidate = {
  attempt: number;
  observables: Observable[];
  highIssues: number;
  totalIssues: number;
};

/**
 * Fewest high-severity issues wins, then fewest issues overall, then the later attempt.
 */
export const pickBestCandidate = (
  candidates: readonly RejectedCandidate[],
): RejectedCandidate | null =>
  candidates.reduce<RejectedCandidate | null>((best, candidate) => {
    if (!best) {
      return candidate;
    }
    if (candidate.highIssues !== best.highIssues) {
      return candidate.highIssues < best.highIssues ? candidate : best;
    }
    if (candidate.totalIssues !== best.totalIssues) {
      return candidate.totalIssues < best.totalIssues ? candidate : best;
    }
    return candidate.attempt > best.attempt ? candidate : best;
  }, null);

/**
 * Dispatches the enabled roster concurrently and merges observables in roster order.
 * Every sub-agent runs the same generate, review, retry loop; only its roster entry differs.
 */
export class ExtractionSupervisorService {
  constructor(
    private readonly gateway: ModelGatewayPort,
    private readonly qa: QaReviewService,
    private readonly log: Logger = rootLogger,
  ) {}

  async extract(
    text: string,
    platform: Platform,
    config: WorkflowConfig,
  ): Promise<Result<ExtractionResult, StageFailure>> {
    const roster = config.extraction.roster.filter((spec) => spec.enabled);

    const unknownTemplates = roster
      .filter((spec) => !hasExtractionTemplate(spec.promptTemplateId))
      .map((spec) => `${spec.name}: ${spec.promptTemplateId}`);
    if (unknownTemplates.length > 0) {
      throw new FatalConfigurationError(
        "Sub-agent roster references unknown prompt templates.",
        unknownTemplates,
      );
    }

    const outcomes = await Promise.all(
      roster.map((spec) => this.runSubAgent(spec, text, platform, config)),
    );

    const warnings = outcomes.flatMap((outcome) => outcome.warnings);
    if (outcomes.every((outcome) => outcome.status === "failed")) {
      const failure: StageFailure = {
        code: "extraction_failed",
        reason: "extraction_failed",
        message: `All ${outcomes.length} sub-agents failed.`,
        retryable: true,
        details: warnings,
        transcript: { kind: "extraction", agents: outcomes },
      };
      return err(failure);
    }

    const observables: Partial<Record<ObservableType, Observable[]>> = {};
    for (const outcome of outcomes) {
      if (outcome.status !== "done") {
        continue;
      }
      const existing = observables[outcome.observableType] ?? [];
      observables[outcome.observableType] = [
        ...existing,
        ...outcome.observables,
      ];
    }

    return ok({
      platform,
      agents: outcomes,
      observables,
      totalObservables: outcomes.reduce(
        (total, outcome) => total + outcome.observables.length,
        0,
      ),
      warnings,
    });
  }

  /**
   * Local loop of one sub-agent: generate, parse, optionally review, and retry with feedback.
   * A generation transport failure fails the sub-agent; a reviewer failure accepts the candidate.
   */
  async runSubAgent(
    spec: SubAgentSpec,
    text: string,
    platform: Platform,
    config: WorkflowConfig,
  ): Promise<SubAgentOutcome> {
    const log = this.log.child({ agent: spec.name });
    const maxAttempts = config.extraction.qaMaxAttempts;
    const attempts: SubAgentAttempt[] = [];
    const rejected: RejectedCandidate[] = [];
    let feedback: string | null = null;

    const finish = (
      status: SubAgentOutcome["status"],
      observables: Observable[],
      flags: SubAgentFlag[] = [],
      warnings: string[] = [],
    ): SubAgentOutcome => {
      log.debug(
        { status, observables: observables.length, attempts: attempts.length, flags },
        "sub-agent finished",
      );
      return {
        name: spec.name,
        observableType: spec.observableType,
        status,
        observables,
        flags,
        attempts,
        warnings,
      };
    };

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const prompt = extractionPrompt(
        spec.promptTemplateId,
        text,
        platform,
        feedback,
      );
      const record: SubAgentAttempt = { attempt, prompt: renderPrompt(prompt) };
      attempts.push(record);

      const response = await this.gateway.complete(
        prompt,
        callOptionsFor(config, spec.name),
      );
      if (response.isErr()) {
        record.error = describeBoundaryError(response.error);
        return finish("failed", [], [], [
          `Sub-agent ${spec.name} failed: ${record.error}`,
        ]);
      }
      record.response = response.value;

      const parsed = parseObservables(response.value, spec.observableType);
      if (parsed.isErr()) {
        record.parseError = describeParseError(parsed.error);
        feedback = `Your answer could not be parsed (${record.parseError}). Reply with the JSON shape requested.`;
        continue;
      }
      record.observables = parsed.value;

      if (!spec.qaEnabled || parsed.value.length === 0) {
        return finish("done", parsed.value);
      }

      const reviewed = await this.qa.review(
        spec.name,
        spec.observableType,
        text,
        parsed.value,
        config,
      );
      if (reviewed.isErr()) {
        record.reviewPrompt = reviewed.error.prompt;
        if (reviewed.error.response !== undefined) {
          record.reviewResponse = reviewed.error.response;
        }
        return finish("done", parsed.value, ["qa_unavailable"], [
          `Sub-agent ${spec.name}: QA review unavailable (${reviewed.error.message}); output accepted unreviewed.`,
        ]);
      }

      record.review = reviewed.value.review;
      record.reviewPrompt = reviewed.value.prompt;
      record.reviewResponse = reviewed.value.response;

      if (reviewed.value.review.verdict === "pass") {
        return finish("done", parsed.value);
      }

      rejected.push({
        attempt,
        observables: parsed.value,
        highIssues: countHighSeverity(reviewed.value.review.issues),
        totalIssues: reviewed.value.review.issues.length,
      });
      feedback = formatFeedback(reviewed.value.review);
    }

    const best = pickBestCandidate(rejected);
    if (best) {
      return finish("done", best.observables, ["qa_exhausted"], [
        `Sub-agent ${spec.name}: QA rejected all ${maxAttempts} attempts; kept attempt ${best.attempt}.`,
      ]);
    }

    return finish("failed", [], [], [
      `Sub-agent ${spec.name} produced no parseable output in ${maxAttempts} attempts.`,
    ]);
  }
}
