import type {
  ClockPort,
  EmbeddingPort,
} from "../../core/ports/outboundPorts";
import {
  env,
  loadPipelineConfig,
  rssFeedUrls,
  type AppEnv,
  type PipelineConfig,
} from "../../shared/config/env";
import { createDb } from "../../infra/db/client";
import { PostgresScoredRecordRepository } from "../../infra/db/repositories";
import { SCORED_RECORD_EMBEDDING_DIMENSION } from "../../infra/db/schema";
import { HashingEmbedding } from "../../infra/embedding/hashingEmbedding";
import { OllamaEmbedding } from "../../infra/embedding/ollamaEmbedding";
import { HttpClient } from "../../infra/http/httpClient";
import { MockNewsPlugin } from "../../infra/plugins/mock/mockNewsPlugin";
import { ProfessionalNetworkPlugin } from "../../infra/plugins/phantomBuster/professionalNetworkPlugin";
import { RssFeedPlugin } from "../../infra/plugins/rss/rssFeedPlugin";
import { GlobalConcurrencyLimiter } from "../../infra/rateLimit/globalConcurrencyLimiter";
import { SourceThrottle } from "../../infra/rateLimit/sourceThrottle";
import { SystemClock, UuidIdGenerator } from "../../infra/system/systemPorts";
import { PluginRegistry } from "../registry/pluginRegistry";
import { PipelineJobRunner, type PipelineJobDefaults } from "../services/pipelineJobs";
import { PipelineOrchestratorService } from "../services/pipelineOrchestratorService";
import { SemanticFilteringService } from "../services/semanticFilteringService";

/**
 * Registers every built-in source. Factories read configuration lazily, so a source with
 * missing credentials only fails the runs that request it.
 */
export const createPluginRegistry = (
  appEnv: AppEnv,
  clock: ClockPort,
  httpClient = new HttpClient(),
): PluginRegistry => {
  const registry = new PluginRegistry();
  const userAgent = appEnv.PHANTOMBUSTER_USER_AGENT.trim();

  const registrations = [
    registry.register(
      "news",
      () =>
        new RssFeedPlugin(
          "news",
          { urls: rssFeedUrls(appEnv), timeoutMs: appEnv.RSS_TIMEOUT_MS },
          httpClient,
          clock,
        ),
    ),
    registry.register(
      "profile",
      () =>
        new ProfessionalNetworkPlugin(
          "profile",
          {
            apiUrl: appEnv.PHANTOMBUSTER_API_URL,
            apiKey: appEnv.PHANTOMBUSTER_API_KEY,
            sessionCookie: appEnv.PHANTOMBUSTER_SESSION_COOKIE,
            ...(userAgent ? { userAgent } : {}),
            agents: {
              urlFinderId: appEnv.PHANTOMBUSTER_URL_FINDER_ID,
              companyScraperId: appEnv.PHANTOMBUSTER_COMPANY_SCRAPER_ID,
              activityExtractorId: appEnv.PHANTOMBUSTER_ACTIVITY_EXTRACTOR_ID,
            },
            maxPosts: appEnv.PHANTOMBUSTER_MAX_POSTS,
            pollAttempts: appEnv.PHANTOMBUSTER_POLL_ATTEMPTS,
            pollIntervalMs: appEnv.PHANTOMBUSTER_POLL_INTERVAL_MS,
            timeoutMs: appEnv.PHANTOMBUSTER_TIMEOUT_MS,
            fetchProfile: true,
            fetchPosts: true,
            callBudget: {
              maxCallsPerHour: appEnv.PHANTOMBUSTER_MAX_CALLS_PER_HOUR,
              maxCallsPerDay: appEnv.PHANTOMBUSTER_MAX_CALLS_PER_DAY,
            },
          },
          httpClient,
          clock,
        ),
    ),
    registry.register("mock", () => new MockNewsPlugin("mock", undefined, clock)),
  ];

  registrations.forEach((registration) => {
    if (registration.isErr()) {
      throw new Error(registration.error.message);
    }
  });

  return registry;
};

export const createEmbedding = (appEnv: AppEnv): EmbeddingPort => {
  if (appEnv.EMBEDDING_PROVIDER === "ollama") {
    return new OllamaEmbedding(
      appEnv.OLLAMA_BASE_URL,
      appEnv.OLLAMA_EMBED_MODEL,
      appEnv.EMBEDDING_DIMENSION,
      appEnv.OLLAMA_EMBED_TIMEOUT_MS,
    );
  }

  return new HashingEmbedding(appEnv.EMBEDDING_DIMENSION);
};

export const runDefaults = (config: PipelineConfig): PipelineJobDefaults => ({
  sources: config.sources,
  clientProfile: config.clientProfile,
  threshold: config.threshold,
  lookbackDays: config.lookbackDays,
});

/**
 * Centralizes runtime wiring so the CLI and worker entry points share one composition root.
 * Opening Redis stays with the callers that need a queue.
 */
export const createRuntime = (appEnv: AppEnv = env) => {
  const config = loadPipelineConfig(appEnv);

  if (appEnv.EMBEDDING_DIMENSION !== SCORED_RECORD_EMBEDDING_DIMENSION) {
    throw new Error(
      `EMBEDDING_DIMENSION is ${appEnv.EMBEDDING_DIMENSION} but the scored_records.embedding column stores ${SCORED_RECORD_EMBEDDING_DIMENSION}.`,
    );
  }

  const clock = new SystemClock();
  const ids = new UuidIdGenerator();
  const { db, sql } = createDb(appEnv.POSTGRES_URL);

  const registry = createPluginRegistry(appEnv, clock);
  const globalLimiter = new GlobalConcurrencyLimiter(config.globalLimiter, clock);
  const throttle = new SourceThrottle(config.throttle, clock);
  const embedding = createEmbedding(appEnv);
  const filtering = new SemanticFilteringService(embedding, config.filter, clock);
  const repository = new PostgresScoredRecordRepository(db);

  const orchestrator = new PipelineOrchestratorService(
    registry,
    globalLimiter,
    throttle,
    filtering,
    repository,
    { fetch: config.fetch },
    clock,
    ids,
  );
  const jobRunner = new PipelineJobRunner(orchestrator, runDefaults(config), clock);

  return {
    config,
    clock,
    ids,
    registry,
    embedding,
    orchestrator,
    jobRunner,
    close: async () => {
      await sql.end();
    },
  };
};

export type PipelineRuntime = ReturnType<typeof createRuntime>;
