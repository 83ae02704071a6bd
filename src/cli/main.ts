import { Command } from "commander";
import {
  createPluginRegistry,
  createRuntime,
} from "../application/bootstrap/runtimeFactory";
import { buildPipelineJob } from "../application/services/pipelineJobs";
import type { CompanyTarget } from "../core/entities/company";
import { BullMqQueue, redisConfigFromUrl } from "../infra/queue/bullMqQueue";
import { SystemClock, UuidIdGenerator } from "../infra/system/systemPorts";
import { env, loadPipelineConfig, redactConnectionUrl, rssFeedUrls } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { formatRunReport } from "./runReport";

type TargetOptions = {
  company: string;
  city?: string;
  industry?: string;
  domain?: string;
  alias: string[];
  sources?: string;
};

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const splitSources = (value: string | undefined): string[] | undefined => {
  const names = value
    ?.split(",")
    .map((name) => name.trim().toLowerCase())
    .filter(Boolean);
  return names?.length ? names : undefined;
};

const toTarget = (opts: TargetOptions): CompanyTarget => {
  const city = opts.city?.trim() || env.PIPELINE_COMPANY_CITY.trim();
  return {
    name: opts.company.trim(),
    aliases: opts.alias.map((alias) => alias.trim()).filter(Boolean),
    ...(opts.industry?.trim() ? { industry: opts.industry.trim() } : {}),
    ...(opts.domain?.trim() ? { domain: opts.domain.trim() } : {}),
    ...(city ? { city } : {}),
  };
};

const withTargetOptions = (command: Command): Command =>
  command
    .requiredOption("--company <name>", "Company name")
    .option("--city <city>", "City used to disambiguate the company")
    .option("--industry <industry>", "Industry hint for relevance scoring")
    .option("--domain <domain>", "Company web domain")
    .option("--alias <alias>", "Alternative company name (repeatable)", collect, [])
    .option("--sources <names>", "Comma-separated source plugins for this run");

/**
 * Defines a single command surface so operational tasks use the same orchestration policies.
 */
export const buildCli = () => {
  const cli = new Command();
  cli.name("signal-pipeline").description("Company signal ingestion pipeline CLI");

  withTargetOptions(
    cli.command("run").description("Run the pipeline for one company in this process"),
  ).action(async (opts: TargetOptions) => {
    const runtime = createRuntime();
    const controller = new AbortController();
    const onInterrupt = () => {
      logger.warn("Interrupt received; cancelling run");
      controller.abort();
    };
    process.once("SIGINT", onInterrupt);

    try {
      const target = toTarget(opts);
      const run = await runtime.orchestrator.run(target, {
        sources: splitSources(opts.sources) ?? runtime.config.sources,
        clientProfile: runtime.config.clientProfile,
        threshold: runtime.config.threshold,
        since: runtime.jobRunner.resolveSince({}),
        signal: controller.signal,
      });

      console.log(formatRunReport(run));
      process.exitCode = run.state === "completed" ? 0 : 1;
    } finally {
      process.off("SIGINT", onInterrupt);
      await runtime.close();
    }
  });

  withTargetOptions(
    cli.command("enqueue").description("Queue a pipeline run for the worker"),
  )
    .option("--force", "Bypass hourly idempotency dedupe for immediate reruns")
    .action(async (opts: TargetOptions & { force?: boolean }) => {
      const sources = splitSources(opts.sources);
      const job = buildPipelineJob(
        toTarget(opts),
        { ...(sources ? { sources } : {}), force: Boolean(opts.force) },
        new SystemClock(),
        new UuidIdGenerator(),
      );

      const queue = new BullMqQueue(redisConfigFromUrl(env.REDIS_URL));
      try {
        await queue.enqueue(job);
      } finally {
        await queue.close();
      }

      logger.info(
        {
          runId: job.runId,
          company: job.company.name,
          idempotencyKey: job.idempotencyKey,
          force: Boolean(opts.force),
        },
        "Enqueued pipeline run",
      );
    });

  cli
    .command("sources")
    .description("List registered source plugins")
    .action(() => {
      const registry = createPluginRegistry(env, new SystemClock());
      const configured = new Set(loadPipelineConfig(env).sources);
      registry.list().forEach((name) => {
        console.log(`${name}${configured.has(name) ? " (default)" : ""}`);
      });
    });

  cli
    .command("status")
    .description("Report pipeline configuration and queue depth")
    .action(async () => {
      const config = loadPipelineConfig(env);
      const queue = new BullMqQueue(redisConfigFromUrl(env.REDIS_URL));
      const queueCounts = await queue.getQueueCounts().finally(() => queue.close());

      logger.info(
        {
          sources: config.sources,
          lookbackDays: config.lookbackDays,
          threshold: config.threshold,
          clientKeywords: config.clientProfile.keywords,
          globalLimiter: config.globalLimiter,
          throttle: config.throttle,
          rssFeedCount: rssFeedUrls(env).length,
          phantomBusterApiKeyConfigured: env.PHANTOMBUSTER_API_KEY.trim().length > 0,
          embeddingProvider: env.EMBEDDING_PROVIDER,
          embeddingDimension: env.EMBEDDING_DIMENSION,
          redis: redactConnectionUrl(env.REDIS_URL),
          postgres: redactConnectionUrl(env.POSTGRES_URL),
          queueCounts,
          startupWorkflow: [
            "docker compose up -d postgres redis",
            "npm run worker",
            "npm start -- enqueue --company \"Acme Robotics\" --city Lyon",
          ],
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
