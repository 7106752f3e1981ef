import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { describeBoundaryError } from "../core/entities/appError";
import type { WorkflowJob } from "../core/ports/outboundPorts";
import {
  createWorkflowWorker,
  redisConfigFromUrl,
} from "../infra/queue/bullMqQueue";
import { env, redactUrl } from "../shared/config/env";
import { toErrorDetails } from "../shared/errors/errorDetails";
import { logger } from "../shared/logger/logger";

const run = async (): Promise<void> => {
  const runtime = await createRuntime();
  const startedAtByJobId = new Map<string, number>();

  logger.info(
    {
      redisUrl: redactUrl(env.REDIS_URL),
      postgresUrl: redactUrl(env.POSTGRES_URL),
      ollamaBaseUrl: env.OLLAMA_BASE_URL,
      concurrency: env.QUEUE_CONCURRENCY_WORKFLOW,
      staleSweepIntervalSeconds: env.STALE_SWEEP_INTERVAL_SECONDS,
    },
    "Worker runtime configuration",
  );

  const handle = async (job: WorkflowJob): Promise<void> => {
    const result =
      job.action === "retry"
        ? await runtime.driver.retry(job.executionId)
        : await runtime.driver.start(job.executionId);

    // The execution record carries step failures; a job only fails when the driver refused it.
    if (result.isErr()) {
      throw new Error(describeBoundaryError(result.error));
    }
  };

  const worker = createWorkflowWorker(
    redisConfigFromUrl(env.REDIS_URL),
    env.QUEUE_CONCURRENCY_WORKFLOW,
    handle,
  );

  worker.on("active", (job) => {
    if (!job.id) {
      return;
    }
    startedAtByJobId.set(job.id, Date.now());
    logger.info(
      { jobId: job.id, executionId: job.data.executionId, action: job.data.action },
      "Worker job started",
    );
  });

  worker.on("failed", (job, error) => {
    const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
    if (job?.id) {
      startedAtByJobId.delete(job.id);
    }
    logger.error(
      {
        jobId: job?.id,
        executionId: job?.data.executionId,
        action: job?.data.action,
        durationMs: startedAt ? Date.now() - startedAt : undefined,
        error: toErrorDetails(error),
      },
      "Worker job failed",
    );
  });

  worker.on("completed", (job) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    if (job.id) {
      startedAtByJobId.delete(job.id);
    }
    logger.info(
      {
        jobId: job.id,
        executionId: job.data.executionId,
        action: job.data.action,
        durationMs: startedAt ? Date.now() - startedAt : undefined,
      },
      "Worker job completed",
    );
  });

  const sweep = async (): Promise<void> => {
    const report = await runtime.driver.sweepStale();
    if (report.swept.length > 0 || report.conflicts.length > 0) {
      logger.warn(report, "Stale sweep");
    }
  };

  const sweepTimer = setInterval(() => {
    sweep().catch((error) => {
      logger.error({ error: toErrorDetails(error) }, "Stale sweep failed");
    });
  }, env.STALE_SWEEP_INTERVAL_SECONDS * 1_000);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Worker shutting down");
    clearInterval(sweepTimer);
    await worker.close();
    await runtime.close();
  };

  ["SIGINT", "SIGTERM"].forEach((signal) => {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
        process.exitCode = 1;
      });
    });
  });

  await sweep();
  logger.info("Worker online");
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
