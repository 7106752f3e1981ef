import type { QueueItemEntity } from "../core/entities/reviewQueue";
import type { WorkflowExecutionEntity } from "../core/entities/workflow";
import { workflowSteps } from "../core/entities/workflow";

/**
 * Formats an execution into a compact terminal report for manual inspection.
 */
export const formatExecutionReport = (
  execution: WorkflowExecutionEntity,
): string => {
  const lines: string[] = [];

  lines.push(`Execution ${execution.id}`);
  lines.push(`Document: ${execution.documentId}`);
  lines.push(`Config: ${execution.configVersion}`);
  lines.push(
    `Status: ${execution.status}${execution.terminationReason ? ` (${execution.terminationReason})` : ""}`,
  );
  lines.push(`Step: ${execution.currentStep ?? "none"}`);
  lines.push(`Retries: ${execution.retryCount}`);
  if (execution.flags.length > 0) {
    lines.push(`Flags: ${execution.flags.join(", ")}`);
  }
  if (execution.cancelRequested && execution.status === "running") {
    lines.push("Cancellation requested");
  }

  if (execution.error) {
    const error = execution.error;
    lines.push("");
    lines.push("Error:");
    lines.push(
      `- step=${error.step ?? "none"}, code=${error.code}, retryable=${error.retryable}, fatal=${error.fatal}`,
    );
    lines.push(`- ${error.message}`);
    (error.details ?? []).forEach((detail) => lines.push(`  ${detail}`));
  }

  lines.push("");
  lines.push("Steps:");
  workflowSteps.forEach((step) => {
    lines.push(`- ${step}: ${summarizeStep(execution, step)}`);
  });

  return lines.join("\n");
};

const summarizeStep = (
  execution: WorkflowExecutionEntity,
  step: (typeof workflowSteps)[number],
): string => {
  const results = execution.stepResults;
  switch (step) {
    case "filter":
      return results.filter
        ? `kept ${results.filter.chunksKept}, removed ${results.filter.chunksRemoved}, classifier ${results.filter.classifierVersion}${results.filter.degraded ? " (degraded)" : ""}`
        : "-";
    case "rank":
      return results.rank
        ? `score ${results.rank.score} / threshold ${results.rank.threshold}`
        : "-";
    case "platform_detect":
      return results.platform_detect
        ? `${results.platform_detect.platform} via ${results.platform_detect.source}`
        : "-";
    case "extract":
      return results.extract
        ? `${results.extract.totalObservables} observables from ${results.extract.agents.length} agents`
        : "-";
    case "generate":
      return results.generate
        ? `${results.generate.drafts.filter((draft) => draft.validation.valid).length}/${results.generate.drafts.length} valid drafts after ${results.generate.attempts.length} attempts`
        : "-";
    case "similarity":
      return results.similarity
        ? results.similarity.matches
            .map((match) => `${match.draftId}=${match.classification}@${match.aggregate.toFixed(3)}`)
            .join(", ") || "no drafts scored"
        : "-";
    case "promote":
      return results.promote
        ? `queued ${results.promote.queuedItemIds.length}, suppressed ${results.promote.suppressed.length}`
        : "-";
  }
};

export const formatQueueItem = (item: QueueItemEntity): string => {
  const title = item.draft.fields?.title ?? "(untitled)";
  return `${item.id} [${item.status}] ${title} (novelty ${item.similarity.aggregate.toFixed(3)}, execution ${item.executionId})`;
};
