import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type {
  PipelineJobPayload,
  QueuePort,
} from "../../core/ports/outboundPorts";
import { queueNames, toJobId } from "./queues";

export type QueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

const QUEUE_RETRIES = 2;

export const defaultJobOptions = {
  attempts: QUEUE_RETRIES + 1,
  removeOnComplete: 250,
  backoff: {
    type: "exponential",
    delay: 1_000,
  },
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
 * Wraps BullMQ so application code depends on queue intent rather than queue vendor details.
 */
export class BullMqQueue implements QueuePort {
  private readonly queue: Queue<PipelineJobPayload>;

  constructor(connection: RedisOptions) {
    this.queue = new Queue<PipelineJobPayload>(queueNames.pipelineRun, {
      connection,
      defaultJobOptions,
    });
  }

  /**
   * Job identity comes from the idempotency key, so re-enqueueing the same request is a no-op.
   */
  async enqueue(payload: PipelineJobPayload): Promise<void> {
    const jobId = toJobId(payload.idempotencyKey);
    await this.queue.add(jobId, payload, { jobId });
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

export const createPipelineWorker = (
  connection: RedisOptions,
  concurrency: number,
  processor: (payload: PipelineJobPayload) => Promise<void>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency,
  };

  return new Worker<PipelineJobPayload>(
    queueNames.pipelineRun,
    async (job) => {
      await processor(job.data);
    },
    options,
  );
};
