import { readFile } from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import type { Result } from "neverthrow";
import {
  createRuntime,
  type Runtime,
} from "../application/bootstrap/runtimeFactory";
import {
  describeBoundaryError,
  type AppBoundaryError,
} from "../core/entities/appError";
import type { ReviewStatus } from "../core/entities/reviewQueue";
import type { ExecutionStatus } from "../core/entities/workflow";
import { configVersionOf } from "../core/entities/workflowConfig";
import type { WorkflowJobAction } from "../core/ports/outboundPorts";
import { env, redactUrl } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { formatExecutionReport, formatQueueItem } from "./executionReport";

const executionStatuses: readonly ExecutionStatus[] = [
  "pending",
  "running",
  "completed",
  "failed",
  "cancelled",
];

const reviewStatuses: readonly ReviewStatus[] = [
  "pending",
  "approved",
  "rejected",
  "edited",
];

const parseExecutionStatus = (value: string): ExecutionStatus => {
  const status = executionStatuses.find((candidate) => candidate === value);
  if (!status) {
    throw new InvalidArgumentError(`Expected one of ${executionStatuses.join(", ")}.`);
  }
  return status;
};

const parseReviewStatus = (value: string): ReviewStatus => {
  const status = reviewStatuses.find((candidate) => candidate === value);
  if (!status) {
    throw new InvalidArgumentError(`Expected one of ${reviewStatuses.join(", ")}.`);
  }
  return status;
};

const parseLimit = (value: string): number => {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return limit;
};

/**
 * Opens a runtime for one command and always releases its connections.
 */
const withRuntime = async (
  action: (runtime: Runtime) => Promise<void>,
): Promise<void> => {
  const runtime = await createRuntime();
  try {
    await action(runtime);
  } finally {
    await runtime.close();
  }
};

/**
 * Logs a failed result and marks the process as failed; returns the value otherwise.
 */
const unwrapOrReport = <T>(
  result: Result<T, AppBoundaryError>,
  context: Record<string, unknown>,
): T | null => {
  if (result.isErr()) {
    logger.error(
      { ...context, code: result.error.code },
      describeBoundaryError(result.error),
    );
    process.exitCode = 1;
    return null;
  }
  return result.value;
};

const enqueue = async (
  runtime: Runtime,
  executionId: string,
  action: WorkflowJobAction,
): Promise<void> => {
  await runtime.queue.enqueue({
    executionId,
    action,
    requestedAt: runtime.clock.now().toISOString(),
  });
  logger.info({ executionId, action }, "Enqueued workflow job");
};

/**
 * Single command surface for operators; every command goes through the same driver.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("huntline")
    .description("Threat-intel to detection-rule workflow CLI");

  cli
    .command("trigger")
    .description("Create an execution for a document and enqueue it")
    .requiredOption("--document <id>", "Document id")
    .option("--inline", "Run the execution in this process instead of enqueueing")
    .action(async (opts: { document: string; inline?: boolean }) => {
      await withRuntime(async (runtime) => {
        const created = unwrapOrReport(await runtime.driver.trigger(opts.document), {
          documentId: opts.document,
        });
        if (!created) {
          return;
        }

        if (!opts.inline) {
          await enqueue(runtime, created.id, "start");
          return;
        }

        const finished = unwrapOrReport(await runtime.driver.start(created.id), {
          executionId: created.id,
        });
        if (finished) {
          console.log(formatExecutionReport(finished));
        }
      });
    });

  cli
    .command("run")
    .description("Run a pending execution in this process")
    .requiredOption("--execution <id>", "Execution id")
    .action(async (opts: { execution: string }) => {
      await withRuntime(async (runtime) => {
        const finished = unwrapOrReport(await runtime.driver.start(opts.execution), {
          executionId: opts.execution,
        });
        if (finished) {
          console.log(formatExecutionReport(finished));
        }
      });
    });

  cli
    .command("retry")
    .description("Re-enter the failed step of an execution")
    .requiredOption("--execution <id>", "Execution id")
    .option("--inline", "Run the retry in this process instead of enqueueing")
    .action(async (opts: { execution: string; inline?: boolean }) => {
      await withRuntime(async (runtime) => {
        if (!opts.inline) {
          const execution = unwrapOrReport(await runtime.driver.get(opts.execution), {
            executionId: opts.execution,
          });
          if (!execution) {
            return;
          }
          if (execution.status !== "failed" || execution.error?.retryable === false) {
            logger.error(
              {
                executionId: execution.id,
                status: execution.status,
                code: execution.error?.code,
                fatal: execution.error?.fatal ?? false,
              },
              "Execution is not retryable",
            );
            process.exitCode = 1;
            return;
          }
          await enqueue(runtime, execution.id, "retry");
          return;
        }

        const finished = unwrapOrReport(await runtime.driver.retry(opts.execution), {
          executionId: opts.execution,
        });
        if (finished) {
          console.log(formatExecutionReport(finished));
        }
      });
    });

  cli
    .command("cancel")
    .description("Cancel a pending execution or request cancellation of a running one")
    .requiredOption("--execution <id>", "Execution id")
    .action(async (opts: { execution: string }) => {
      await withRuntime(async (runtime) => {
        const execution = unwrapOrReport(await runtime.driver.cancel(opts.execution), {
          executionId: opts.execution,
        });
        if (execution) {
          logger.info(
            {
              executionId: execution.id,
              status: execution.status,
              cancelRequested: execution.cancelRequested,
            },
            "Cancellation recorded",
          );
        }
      });
    });

  cli
    .command("sweep")
    .description("Fail running executions that stopped making progress")
    .action(async () => {
      await withRuntime(async (runtime) => {
        const report = await runtime.driver.sweepStale();
        logger.info(report, "Stale sweep finished");
      });
    });

  cli
    .command("execution")
    .description("Show one execution record")
    .requiredOption("--id <id>", "Execution id")
    .option("--prettify", "Render a human-friendly report")
    .action(async (opts: { id: string; prettify?: boolean }) => {
      await withRuntime(async (runtime) => {
        const execution = unwrapOrReport(await runtime.driver.get(opts.id), {
          executionId: opts.id,
        });
        if (!execution) {
          return;
        }
        if (opts.prettify) {
          console.log(formatExecutionReport(execution));
        } else {
          logger.info({ execution }, "Execution");
        }
      });
    });

  cli
    .command("executions")
    .description("List recent executions")
    .option("--status <status>", "Filter by status", parseExecutionStatus)
    .option("--document <id>", "Filter by document id")
    .option("--limit <n>", "Maximum rows", parseLimit, 20)
    .action(
      async (opts: { status?: ExecutionStatus; document?: string; limit: number }) => {
        await withRuntime(async (runtime) => {
          const executions = await runtime.driver.list({
            limit: opts.limit,
            ...(opts.status ? { status: opts.status } : {}),
            ...(opts.document ? { documentId: opts.document } : {}),
          });
          executions.forEach((execution) => {
            console.log(
              `${execution.id} ${execution.status}${execution.terminationReason ? `/${execution.terminationReason}` : ""} step=${execution.currentStep ?? "none"} document=${execution.documentId}`,
            );
          });
        });
      },
    );

  const queue = cli.command("queue").description("Review queued rule drafts");

  queue
    .command("list")
    .option("--status <status>", "Filter by review status", parseReviewStatus)
    .option("--limit <n>", "Maximum rows", parseLimit, 20)
    .action(async (opts: { status?: ReviewStatus; limit: number }) => {
      await withRuntime(async (runtime) => {
        const items = await runtime.review.list({
          limit: opts.limit,
          ...(opts.status ? { status: opts.status } : {}),
        });
        items.forEach((item) => console.log(formatQueueItem(item)));
      });
    });

  queue
    .command("show")
    .requiredOption("--id <id>", "Queue item id")
    .action(async (opts: { id: string }) => {
      await withRuntime(async (runtime) => {
        const item = unwrapOrReport(await runtime.review.get(opts.id), {
          itemId: opts.id,
        });
        if (item) {
          console.log(formatQueueItem(item));
          console.log(item.draft.raw);
        }
      });
    });

  queue
    .command("approve")
    .requiredOption("--id <id>", "Queue item id")
    .option("--note <text>", "Review note")
    .action(async (opts: { id: string; note?: string }) => {
      await withRuntime(async (runtime) => {
        const item = unwrapOrReport(await runtime.review.approve(opts.id, opts.note), {
          itemId: opts.id,
        });
        if (item) {
          logger.info({ itemId: item.id }, "Rule approved and indexed");
        }
      });
    });

  queue
    .command("reject")
    .requiredOption("--id <id>", "Queue item id")
    .option("--note <text>", "Review note")
    .action(async (opts: { id: string; note?: string }) => {
      await withRuntime(async (runtime) => {
        const item = unwrapOrReport(await runtime.review.reject(opts.id, opts.note), {
          itemId: opts.id,
        });
        if (item) {
          logger.info({ itemId: item.id }, "Rule rejected");
        }
      });
    });

  queue
    .command("edit")
    .requiredOption("--id <id>", "Queue item id")
    .requiredOption("--file <path>", "YAML file holding the edited rule")
    .option("--note <text>", "Review note")
    .action(async (opts: { id: string; file: string; note?: string }) => {
      await withRuntime(async (runtime) => {
        const raw = await readFile(opts.file, "utf8");
        const item = unwrapOrReport(await runtime.review.edit(opts.id, raw, opts.note), {
          itemId: opts.id,
        });
        if (item) {
          logger.info({ itemId: item.id }, "Rule edited");
        }
      });
    });

  cli
    .command("status")
    .description("Report runtime configuration and queue backlog")
    .action(async () => {
      await withRuntime(async (runtime) => {
        const queueCounts = await runtime.queue.getQueueCounts();
        logger.info(
          {
            configVersion: configVersionOf(runtime.config),
            redis: redactUrl(env.REDIS_URL),
            postgres: redactUrl(env.POSTGRES_URL),
            ollama: env.OLLAMA_BASE_URL,
            chatModel: env.OLLAMA_CHAT_MODEL,
            embedModel: env.OLLAMA_EMBED_MODEL,
            classifierArtifact: env.CLASSIFIER_ARTIFACT_PATH,
            queueCounts,
            startupWorkflow: [
              "docker compose up -d postgres redis",
              "npm run worker",
              "npm start -- trigger --document <id>",
            ],
          },
          "Runtime status",
        );
      });
    });

  return cli;
};

export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
