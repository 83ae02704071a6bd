import { UnrecoverableError } from "bullmq";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { toErrorDetails } from "../core/entities/appError";
import {
  createPipelineWorker,
  redisConfigFromUrl,
} from "../infra/queue/bullMqQueue";
import { env, redactConnectionUrl, rssFeedUrls } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const run = async (): Promise<void> => {
  const runtime = createRuntime();
  const redis = redisConfigFromUrl(env.REDIS_URL);
  const startedAtByJobId = new Map<string, number>();

  logger.info(
    {
      sources: runtime.config.sources,
      availableSources: runtime.registry.list(),
      rssFeedCount: rssFeedUrls(env).length,
      phantomBusterApiKeyConfigured: env.PHANTOMBUSTER_API_KEY.trim().length > 0,
      embeddingProvider: runtime.embedding.name,
      embeddingDimension: runtime.embedding.dimension,
      globalCeiling: runtime.config.globalLimiter.ceiling,
      redis: redactConnectionUrl(env.REDIS_URL),
      postgres: redactConnectionUrl(env.POSTGRES_URL),
    },
    "Worker runtime configuration",
  );

  const worker = createPipelineWorker(
    redis,
    env.QUEUE_CONCURRENCY_PIPELINE,
    async (payload) => {
      const result = await runtime.jobRunner.process(payload);

      // Startup failures (unknown plugin, bad threshold) repeat on every attempt.
      if (result.state === "failed") {
        throw new UnrecoverableError(
          result.failure?.message ?? `Pipeline run ${result.id} failed at startup.`,
        );
      }

      if (result.persistence.status === "failed") {
        logger.warn(
          { runId: result.id, reason: result.persistence.reason },
          "Run finished but accepted records were not saved",
        );
      }
    },
  );

  worker.on("active", (job) => {
    if (!job?.id) {
      return;
    }

    startedAtByJobId.set(job.id, Date.now());

    logger.info(
      {
        jobId: job.id,
        runId: job.data.runId,
        company: job.data.company.name,
        sources: job.data.sources,
        idempotencyKey: job.data.idempotencyKey,
      },
      "Worker job started",
    );
  });

  worker.on("failed", (job, error) => {
    const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job?.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.error(
      {
        jobId: job?.id,
        runId: job?.data.runId,
        company: job?.data.company.name,
        idempotencyKey: job?.data.idempotencyKey,
        durationMs,
        error: toErrorDetails(error),
      },
      "Worker job failed",
    );
  });

  worker.on("completed", (job) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job.id) {
      startedAtByJobId.delete(job.id);
    }

    const snapshot = runtime.orchestrator.snapshot(job.data.runId);
    logger.info(
      {
        jobId: job.id,
        runId: job.data.runId,
        company: job.data.company.name,
        idempotencyKey: job.data.idempotencyKey,
        durationMs,
        state: snapshot?.state,
        counts: snapshot?.counts,
        pluginErrorCount: snapshot?.pluginErrors.length ?? 0,
      },
      "Worker job completed",
    );
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Worker shutting down");
    await worker.close();
    await runtime.close();
    process.exit(0);
  };

  process.once("SIGINT", (signal) => {
    shutdown(signal).catch((error) => {
      logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
      process.exit(1);
    });
  });
  process.once("SIGTERM", (signal) => {
    shutdown(signal).catch((error) => {
      logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
      process.exit(1);
    });
  });

  logger.info("Worker online");
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
