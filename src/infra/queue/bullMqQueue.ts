import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type { JobQueuePort, WorkflowJob } from "../../core/ports/outboundPorts";
import { workflowJobId, workflowQueueName } from "./queues";

export type QueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

// Failed steps are retried through the driver, not by BullMQ.
export const defaultJobOptions = {
  attempts: 1,
  removeOnComplete: 250,
  removeOnFail: 1_000,
} as const;

export const redisConfigFromUrl = (url: string): RedisOptions => {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
  };
};

/**
 * BullMQ-backed job queue; the execution record in Postgres stays the source of truth.
 */
export class BullMqWorkflowQueue implements JobQueuePort {
  private readonly queue: Queue<WorkflowJob>;

  constructor(connection: RedisOptions) {
    this.queue = new Queue<WorkflowJob>(workflowQueueName, {
      connection,
      defaultJobOptions,
    });
  }

  async enqueue(job: WorkflowJob): Promise<void> {
    const jobId = workflowJobId(job);
    await this.queue.add(jobId, job, { jobId });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }

  async getQueueCounts(): Promise<QueueCounts> {
    const counts = await this.queue.getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
      "paused",
    );
    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
      paused: counts.paused ?? 0,
    };
  }
}

export const createWorkflowWorker = (
  connection: RedisOptions,
  concurrency: number,
  processor: (job: WorkflowJob) => Promise<void>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency,
  };

  return new Worker<WorkflowJob>(
    workflowQueueName,
    async (job) => {
      await processor(job.data);
    },
    options,
  );
};
