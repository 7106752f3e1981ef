import { err, ok, type Result } from "neverthrow";
import {
  workflowSteps,
  type ExecutionStatus,
  type TerminationReason,
  type WorkflowStep,
} from "../entities/workflow";

export type TransitionState = {
  status: ExecutionStatus;
  currentStep: WorkflowStep | null;
  terminationReason: TerminationReason | null;
};

export type WorkflowEvent =
  | { type: "start" }
  | { type: "step_succeeded"; step: WorkflowStep }
  | { type: "step_terminated"; step: WorkflowStep; reason: TerminationReason }
  | { type: "step_failed"; step: WorkflowStep; reason?: TerminationReason }
  | { type: "cancel" }
  | { type: "retry"; step: WorkflowStep }
  | { type: "stale" };

export type TransitionError = {
  from: TransitionState;
  event: WorkflowEvent;
  message: string;
};

export const nextStep = (step: WorkflowStep): WorkflowStep | null =>
  workflowSteps[workflowSteps.indexOf(step) + 1] ?? null;

export const stepIndex = (step: WorkflowStep): number =>
  workflowSteps.indexOf(step);

const reject = (
  from: TransitionState,
  event: WorkflowEvent,
  message: string,
): Result<TransitionState, TransitionError> => err({ from, event, message });

/**
 * Pure transition function of the execution state machine.
 * Steps only move forward; the one way back into a step is `retry` on a failed run, which re-enters the step it failed in.
 */
export const transition = (
  state: TransitionState,
  event: WorkflowEvent,
): Result<TransitionState, TransitionError> => {
  switch (event.type) {
    case "start":
      if (state.status !== "pending") {
        return reject(state, event, `Cannot start a ${state.status} execution.`);
      }
      return ok({
        status: "running",
        currentStep: workflowSteps[0],
        terminationReason: null,
      });

    case "step_succeeded": {
      if (state.status !== "running" || state.currentStep !== event.step) {
        return reject(
          state,
          event,
          `Step ${event.step} does not own a ${state.status} execution at ${state.currentStep ?? "none"}.`,
        );
      }
      const following = nextStep(event.step);
      if (!following) {
        return ok({
          status: "completed",
          currentStep: event.step,
          terminationReason: state.terminationReason,
        });
      }
      return ok({
        status: "running",
        currentStep: following,
        terminationReason: null,
      });
    }

    case "step_terminated":
      if (state.status !== "running" || state.currentStep !== event.step) {
        return reject(
          state,
          event,
          `Step ${event.step} cannot terminate a ${state.status} execution at ${state.currentStep ?? "none"}.`,
        );
      }
      return ok({
        status: "completed",
        currentStep: event.step,
        terminationReason: event.reason,
      });

    case "step_failed":
      if (state.status !== "running" || state.currentStep !== event.step) {
        return reject(
          state,
          event,
          `Step ${event.step} cannot fail a ${state.status} execution at ${state.currentStep ?? "none"}.`,
        );
      }
      return ok({
        status: "failed",
        currentStep: event.step,
        terminationReason: event.reason ?? null,
      });

    case "cancel":
      if (state.status !== "pending" && state.status !== "running") {
        return reject(state, event, `Cannot cancel a ${state.status} execution.`);
      }
      return ok({
        status: "cancelled",
        currentStep: state.currentStep,
        terminationReason: "cancelled",
      });

    case "retry":
      if (state.status !== "failed") {
        return reject(state, event, `Only failed executions can be retried.`);
      }
      if (state.currentStep !== event.step) {
        return reject(
          state,
          event,
          `Retry must re-enter the failed step ${state.currentStep ?? "none"}.`,
        );
      }
      return ok({
        status: "running",
        currentStep: event.step,
        terminationReason: null,
      });

    case "stale":
      if (state.status !== "running") {
        return reject(state, event, `Only running executions can go stale.`);
      }
      return ok({
        status: "failed",
        currentStep: state.currentStep,
        terminationReason: "stale_timeout",
      });
  }
};
