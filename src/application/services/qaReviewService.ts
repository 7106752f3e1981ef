import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { describeBoundaryError } from "../../core/entities/appError";
import type {
  Observable,
  QaIssue,
  QaReview,
} from "../../core/entities/extraction";
import type {
  ObservableType,
  WorkflowConfig,
} from "../../core/entities/workflowConfig";
import type { ModelGatewayPort } from "../../core/ports/outboundPorts";
import { callOptionsFor } from "../prompts/callOptions";
import { qaReviewPrompt, renderPrompt } from "../prompts/promptTemplates";
import { describeParseError, tolerantParse } from "../parsing/tolerantParse";

const issueTypes = ["compliance", "factuality", "formatting"] as const;

const qaReviewSchema = z.object({
  verdict: z.enum(["pass", "needs_revision", "critical_failure"]),
  summary: z.string().default(""),
  issues: z
    .array(
      z.object({
        type: z.enum(issueTypes),
        description: z.string(),
        location: z.string().optional(),
        severity: z.enum(["low", "medium", "high"]).default("medium"),
      }),
    )
    .default([]),
});

export type QaReviewRecord = {
  review: QaReview;
  prompt: string;
  response: string;
};

export type QaReviewFailure = {
  message: string;
  prompt: string;
  response?: string;
};

/**
 * Renders a rejection as feedback for the next generation attempt, issues grouped by type.
 */
export const formatFeedback = (review: QaReview): string => {
  const lines = [`Verdict: ${review.verdict}`];
  if (review.summary) {
    lines.push(`Summary: ${review.summary}`);
  }

  for (const type of issueTypes) {
    const issues = review.issues.filter((issue) => issue.type === type);
    if (issues.length === 0) {
      continue;
    }
    lines.push(`${type}:`);
    for (const issue of issues) {
      const where = issue.location ? ` (at ${issue.location})` : "";
      lines.push(`- [${issue.severity}] ${issue.description}${where}`);
    }
  }

  return lines.join("\n");
};

export const countHighSeverity = (issues: readonly QaIssue[]): number =>
  issues.filter((issue) => issue.severity === "high").length;

/**
 * Second-opinion reviewer for sub-agent output.
 * Any failure to obtain a verdict, transport or parse, comes back as a QaReviewFailure.
 */
export class QaReviewService {
  constructor(private readonly gateway: ModelGatewayPort) {}

  async review(
    agentName: string,
    observableType: ObservableType,
    text: string,
    observables: Observable[],
    config: WorkflowConfig,
  ): Promise<Result<QaReviewRecord, QaReviewFailure>> {
    const prompt = qaReviewPrompt(observableType, text, observables);
    const rendered = renderPrompt(prompt);
    const response = await this.gateway.complete(
      prompt,
      callOptionsFor(config, `${agentName}.qa`),
    );

    if (response.isErr()) {
      return err({
        message: describeBoundaryError(response.error),
        prompt: rendered,
      });
    }

    const parsed = tolerantParse(response.value, qaReviewSchema);
    if (parsed.isErr()) {
      return err({
        message: describeParseError(parsed.error),
        prompt: rendered,
        response: response.value,
      });
    }

    const issues: QaIssue[] = parsed.value.issues.map((issue) => ({
      type: issue.type,
      description: issue.description,
      severity: issue.severity,
      ...(issue.location ? { location: issue.location } : {}),
    }));

    return ok({
      review: {
        verdict: parsed.value.verdict,
        summary: parsed.value.summary,
        issues,
      },
      prompt: rendered,
      response: response.value,
    });
  }
}
