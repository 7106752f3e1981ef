/**
 * Hyphen-only names: BullMQ uses colon as its Redis key separator.
 */
export const workflowQueueName = "workflow-executions";

/**
 * Job ids may not contain colons, so the ISO timestamp is flattened.
 */
export const workflowJobId = (job: {
  executionId: string;
  action: string;
  requestedAt: string;
}): string =>
  `${job.executionId}-${job.action}-${job.requestedAt.replace(/[^0-9A-Za-z]/g, "")}`;
