import type { WorkflowConfig } from "../../core/entities/workflowConfig";
import type { ModelCallOptions } from "../../core/ports/outboundPorts";

/**
 * Resolves per-agent model settings on top of the shared transport policy.
 */
export const callOptionsFor = (
  config: WorkflowConfig,
  agent: string,
): ModelCallOptions => {
  const overrides = config.agents[agent];
  return {
    agent,
    model: overrides?.model,
    temperature: overrides?.temperature ?? 0,
    timeoutMs: config.transport.timeoutMs,
    retries: config.transport.retries,
    retryDelayMs: config.transport.baseDelayMs,
  };
};
