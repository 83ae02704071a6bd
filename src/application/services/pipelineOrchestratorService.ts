import pLimit from "p-limit";
import { err, type Result } from "neverthrow";
import {
  boundaryError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type { CompanyTarget } from "../../core/entities/company";
import {
  terminalRunStates,
  type PipelineRun,
  type PluginFailure,
} from "../../core/entities/pipelineRun";
import type { FilterOutcome, RawRecord } from "../../core/entities/record";
import type {
  FetchRequest,
  PipelineRunnerPort,
  PipelineRunOptions,
  SourcePluginPort,
} from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  ConcurrencyLimiterPort,
  IdGeneratorPort,
  ScoredRecordRepositoryPort,
  SourceThrottlePort,
} from "../../core/ports/outboundPorts";
import { validateFetchRequest } from "../../core/rules/fetchRequest";
import { logger } from "../../shared/logger/logger";
import type { PluginRegistry } from "../registry/pluginRegistry";
import {
  buildReferenceQuery,
  type SemanticFilteringService,
} from "./semanticFilteringService";

export type PipelineOrchestratorOptions = {
  fetch: {
    attempts: number;
    timeoutMs: number;
    retryDelayMs: number;
    quotaBackoffMs: number;
  };
  maxRetainedRuns?: number;
};

type PluginOutcome =
  | { kind: "succeeded"; plugin: string; records: RawRecord[]; discarded: number }
  | { kind: "failed"; plugin: string; error: AppBoundaryError; attempts: number };

const retryAfterHint = (error: AppBoundaryError): number => {
  const cause = error.cause;
  if (typeof cause === "object" && cause !== null && "retryAfterMs" in cause) {
    const hint = cause.retryAfterMs;
    return typeof hint === "number" && Number.isFinite(hint) ? hint : 0;
  }
  return 0;
};

const copyRun = (run: PipelineRun): PipelineRun => ({
  ...run,
  pluginNames: [...run.pluginNames],
  succeededPlugins: [...run.succeededPlugins],
  counts: { ...run.counts },
  pluginErrors: run.pluginErrors.map((failure) => ({ ...failure })),
  persistence: { ...run.persistence },
  acceptedRecords: [...run.acceptedRecords],
});

/**
 * Drives one company through fetch -> filter -> save. Plugins run concurrently over a
 * pool sized to the global ceiling; each one's outcome is recorded on its own, and
 * only validation or registry failures end a run as `failed`.
 */
export class PipelineOrchestratorService implements PipelineRunnerPort {
  private readonly runs = new Map<string, PipelineRun>();

  constructor(
    private readonly registry: PluginRegistry,
    private readonly globalLimiter: ConcurrencyLimiterPort,
    private readonly throttle: SourceThrottlePort,
    private readonly filtering: SemanticFilteringService,
    private readonly repository: ScoredRecordRepositoryPort,
    private readonly options: PipelineOrchestratorOptions,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
  ) {}

  snapshot(runId: string): PipelineRun | null {
    const run = this.runs.get(runId);
    return run ? copyRun(run) : null;
  }

  listRuns(): PipelineRun[] {
    return [...this.runs.values()].map(copyRun);
  }

  async run(
    target: CompanyTarget,
    options: PipelineRunOptions,
  ): Promise<PipelineRun> {
    const pluginNames = Array.from(
      new Set(options.sources.map((name) => name.trim()).filter(Boolean)),
    );
    const run: PipelineRun = {
      id: options.runId ?? this.ids.next(),
      company: target,
      state: "pending",
      startedAt: this.clock.now(),
      pluginNames,
      succeededPlugins: [],
      counts: { fetched: 0, accepted: 0, rejected: 0, failed: 0 },
      pluginErrors: [],
      persistence: { status: "pending" },
      cancelled: false,
      acceptedRecords: [],
    };
    this.track(run);
    const log = logger.child({ runId: run.id, company: target.name });

    const request: FetchRequest = {
      target,
      ...(options.since ? { since: options.since } : {}),
    };
    const startup = this.validateStartup(request, options, pluginNames);
    if (startup.isErr()) {
      return this.fail(run, startup.error);
    }

    const plugins = startup.value;
    const referenceQuery = buildReferenceQuery(target, options.clientProfile);

    run.state = "fetching_all";
    log.info({ plugins: pluginNames, referenceQuery }, "Pipeline run started");

    const pool = pLimit(this.globalLimiter.ceiling);
    const seenIds = new Set<string>();
    const outcomes = await Promise.all(
      plugins.map((plugin) =>
        pool(async (): Promise<PluginOutcome | null> => {
          if (options.signal?.aborted) {
            return null;
          }
          const outcome = await this.fetchFromPlugin(plugin, request, options.signal);
          return outcome ? this.recordOutcome(run, outcome, seenIds) : null;
        }),
      ),
    );

    if (options.signal?.aborted) {
      run.cancelled = true;
      plugins.forEach((plugin, index) => {
        if (outcomes[index] === null) {
          run.pluginErrors.push({
            plugin: plugin.name,
            code: "cancelled",
            message: "Run was cancelled before this plugin started.",
            retryable: false,
            attempts: 0,
          });
        }
      });
      log.warn({ skipped: outcomes.filter((outcome) => outcome === null).length }, "Pipeline run cancelled");
    }

    run.state = "filtering";
    const records = outcomes.flatMap((outcome) =>
      outcome?.kind === "succeeded" ? outcome.records : [],
    );
    const filtered = await this.filterRecords(records, referenceQuery, options.threshold);
    if (filtered.isErr()) {
      return this.abandon(run, filtered.error);
    }

    const { accepted, rejected } = filtered.value;
    const embeddingFailures = rejected.filter((entry) => entry.reason === "embedding_error").length;
    run.counts = {
      ...run.counts,
      accepted: accepted.length,
      rejected: rejected.length - embeddingFailures,
      failed: run.counts.failed + embeddingFailures,
    };
    run.acceptedRecords = accepted;

    run.persistence = await this.persist(target, run);

    run.state =
      run.cancelled || run.succeededPlugins.length === 0 ? "partially_failed" : "completed";
    run.finishedAt = this.clock.now();

    log.info(
      {
        state: run.state,
        counts: run.counts,
        pluginErrors: run.pluginErrors.map((failure) => `${failure.plugin}:${failure.code}`),
        persistence: run.persistence.status,
        durationMs: run.finishedAt.getTime() - run.startedAt.getTime(),
      },
      "Pipeline run finished",
    );
    return copyRun(run);
  }

  private validateStartup(
    request: FetchRequest,
    options: PipelineRunOptions,
    pluginNames: string[],
  ): Result<SourcePluginPort[], AppBoundaryError> {
    const valid = validateFetchRequest(request, "pipeline", this.clock.now());
    if (valid.isErr()) {
      return err({ ...valid.error, source: "pipeline" });
    }

    if (!Number.isFinite(options.threshold) || options.threshold < 0 || options.threshold > 1) {
      return err(
        boundaryError(
          "pipeline",
          "invalid_input",
          "pipeline",
          `Similarity threshold must be within [0, 1], got ${options.threshold}.`,
        ),
      );
    }

    if (pluginNames.length === 0) {
      return err(
        boundaryError("pipeline", "config_invalid", "pipeline", "No sources requested for the run."),
      );
    }

    return this.registry.resolve(pluginNames);
  }

  /**
   * Holds one global slot for the whole plugin call, retries included; every attempt
   * also spends a source token. Resolves to null when cancellation lands before the
   * first attempt starts. No attempt starts once the run is cancelled.
   */
  private async fetchFromPlugin(
    plugin: SourcePluginPort,
    request: FetchRequest,
    signal: AbortSignal | undefined,
  ): Promise<PluginOutcome | null> {
    const lease = await this.globalLimiter.acquire(plugin.name);
    if (lease.isErr()) {
      return { kind: "failed", plugin: plugin.name, error: lease.error, attempts: 0 };
    }

    try {
      const maxAttempts = Math.max(1, this.options.fetch.attempts);
      let attempt = 0;
      let lastError: AppBoundaryError | undefined;
      const stopped = (attempts: number): PluginOutcome | null =>
        lastError ? { kind: "failed", plugin: plugin.name, error: lastError, attempts } : null;

      for (;;) {
        if (signal?.aborted) {
          return stopped(attempt);
        }

        attempt += 1;
        const token = await this.throttle.acquire(plugin.name);
        if (token.isErr()) {
          return { kind: "failed", plugin: plugin.name, error: token.error, attempts: attempt };
        }
        if (signal?.aborted) {
          return stopped(attempt - 1);
        }

        const result = await this.fetchOnce(plugin, request);
        if (result.isOk()) {
          const records = result.value.filter((record) => record.source === plugin.name);
          return {
            kind: "succeeded",
            plugin: plugin.name,
            records,
            discarded: result.value.length - records.length,
          };
        }

        lastError = result.error;
        const delayMs = this.retryDelay(result.error, attempt);
        if (delayMs === null || attempt >= maxAttempts || signal?.aborted) {
          return { kind: "failed", plugin: plugin.name, error: result.error, attempts: attempt };
        }

        logger.warn(
          { plugin: plugin.name, attempt, code: result.error.code, delayMs },
          "Plugin fetch failed; retrying",
        );
        await this.clock.sleep(delayMs);
      }
    } finally {
      lease.value.release();
    }
  }

  /**
   * One attempt. On timeout the attempt's signal is aborted and the call is still awaited,
   * so neither a retry nor the lease release overlaps a call that is still running.
   */
  private async fetchOnce(
    plugin: SourcePluginPort,
    request: FetchRequest,
  ): Promise<Result<RawRecord[], AppBoundaryError>> {
    const timeoutMs = this.options.fetch.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const timeoutError = (): Result<RawRecord[], AppBoundaryError> =>
      err(
        boundaryError("plugin", "timeout", plugin.name, `Fetch exceeded ${timeoutMs}ms.`, {
          retryable: true,
        }),
      );

    try {
      const result = await plugin.fetch({ ...request, signal: controller.signal });
      if (controller.signal.aborted) {
        logger.warn({ plugin: plugin.name, timeoutMs }, "Plugin fetch aborted after timeout");
        return timeoutError();
      }
      return result;
    } catch (error) {
      if (controller.signal.aborted) {
        return timeoutError();
      }
      logger.error({ plugin: plugin.name, error }, "Plugin threw instead of returning an error");
      return err(
        boundaryError(
          "plugin",
          "source_unavailable",
          plugin.name,
          error instanceof Error ? error.message : String(error),
          { cause: error },
        ),
      );
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Milliseconds to wait before the next attempt, or null when the error is final.
   * Quota errors back off exponentially and honour a longer provider hint.
   */
  private retryDelay(error: AppBoundaryError, attempt: number): number | null {
    const { retryDelayMs, quotaBackoffMs } = this.options.fetch;

    switch (error.code) {
      case "source_quota_exceeded":
        return Math.max(quotaBackoffMs * 2 ** (attempt - 1), retryAfterHint(error));
      case "source_unavailable":
      case "timeout":
        return error.retryable ? retryDelayMs * attempt : null;
      default:
        return null;
    }
  }

  /**
   * Tallies a settled plugin. Record ids already seen in this run are dropped, so the
   * accepted set never carries two records under one id.
   */
  private recordOutcome(
    run: PipelineRun,
    outcome: PluginOutcome,
    seenIds: Set<string>,
  ): PluginOutcome {
    if (outcome.kind === "succeeded") {
      const records = outcome.records.filter((record) => {
        if (seenIds.has(record.id)) {
          return false;
        }
        seenIds.add(record.id);
        return true;
      });
      const repeated = outcome.records.length - records.length;

      run.succeededPlugins.push(outcome.plugin);
      run.counts = {
        ...run.counts,
        fetched: run.counts.fetched + records.length,
        failed: run.counts.failed + outcome.discarded,
      };
      if (outcome.discarded > 0) {
        logger.warn(
          { runId: run.id, plugin: outcome.plugin, discarded: outcome.discarded },
          "Discarded records tagged with another source",
        );
      }
      if (repeated > 0) {
        logger.debug(
          { runId: run.id, plugin: outcome.plugin, repeated },
          "Dropped records with an id already fetched in this run",
        );
      }
      return { ...outcome, records };
    }

    const failure: PluginFailure = {
      plugin: outcome.plugin,
      code: outcome.error.code,
      message: outcome.error.message,
      retryable: outcome.error.retryable,
      attempts: outcome.attempts,
      ...(outcome.error.httpStatus === undefined ? {} : { httpStatus: outcome.error.httpStatus }),
    };
    run.pluginErrors.push(failure);
    logger.warn({ runId: run.id, ...failure }, "Plugin failed");
    return outcome;
  }

  /**
   * Filtering never throws into the run; an engine that throws is reported like an error result.
   */
  private async filterRecords(
    records: RawRecord[],
    referenceQuery: string,
    threshold: number,
  ): Promise<Result<FilterOutcome, AppBoundaryError>> {
    try {
      return await this.filtering.filter(records, referenceQuery, threshold);
    } catch (error) {
      return err(
        boundaryError(
          "filter",
          "embedding_backend_unavailable",
          "filter",
          error instanceof Error ? error.message : String(error),
          { cause: error },
        ),
      );
    }
  }

  private async persist(
    target: CompanyTarget,
    run: PipelineRun,
  ): Promise<PipelineRun["persistence"]> {
    try {
      const saved = await this.repository.save(target, run.acceptedRecords);
      if (saved.isErr()) {
        logger.error({ runId: run.id, reason: saved.error.message }, "Persisting accepted records failed");
        return { status: "failed", reason: saved.error.message };
      }
      return { status: "saved", recordCount: run.acceptedRecords.length };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ runId: run.id, reason }, "Persistence collaborator threw");
      return { status: "failed", reason };
    }
  }

  /**
   * Filtering broke after the fetches ran: the run ends partially failed and nothing is saved.
   */
  private abandon(run: PipelineRun, failure: AppBoundaryError): PipelineRun {
    run.state = "partially_failed";
    run.failure = failure;
    run.persistence = { status: "skipped" };
    run.finishedAt = this.clock.now();
    logger.error(
      { runId: run.id, code: failure.code, reason: failure.message },
      "Filtering failed; run abandoned before persistence",
    );
    return copyRun(run);
  }

  private fail(run: PipelineRun, failure: AppBoundaryError): PipelineRun {
    run.state = "failed";
    run.failure = failure;
    run.persistence = { status: "skipped" };
    run.finishedAt = this.clock.now();
    logger.error(
      { runId: run.id, code: failure.code, reason: failure.message },
      "Pipeline run failed",
    );
    return copyRun(run);
  }

  private track(run: PipelineRun): void {
    this.runs.set(run.id, run);
    const limit = this.options.maxRetainedRuns ?? 100;
    for (const [id, existing] of this.runs) {
      if (this.runs.size <= limit) {
        break;
      }
      if (terminalRunStates.has(existing.state)) {
        this.runs.delete(id);
      }
    }
  }
}
