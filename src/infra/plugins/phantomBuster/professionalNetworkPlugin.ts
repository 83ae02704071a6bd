import { err, ok, type Result } from "neverthrow";
import {
  boundaryError,
  type AppBoundaryError,
} from "../../../core/entities/appError";
import type { CompanyTarget } from "../../../core/entities/company";
import type { RawRecord } from "../../../core/entities/record";
import type {
  FetchRequest,
  SourcePluginPort,
} from "../../../core/ports/inboundPorts";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import { validateFetchRequest } from "../../../core/rules/fetchRequest";
import { logger } from "../../../shared/logger/logger";
import { HttpClient } from "../../http/httpClient";
import { SystemClock } from "../../system/systemPorts";
import { aborted, malformed, toPluginError } from "../pluginErrors";

export type ProfessionalNetworkPluginOptions = {
  apiUrl: string;
  apiKey: string;
  sessionCookie: string;
  userAgent?: string;
  agents: {
    urlFinderId: string;
    companyScraperId: string;
    activityExtractorId: string;
  };
  maxPosts: number;
  pollAttempts: number;
  pollIntervalMs: number;
  timeoutMs: number;
  fetchProfile: boolean;
  fetchPosts: boolean;
  callBudget: { maxCallsPerHour: number; maxCallsPerDay: number };
};

type LaunchResponse = { containerId?: string | number };
type OutputResponse = { output?: string | null };
type JsonObject = Record<string, unknown>;

const HOUR_MS = 60 * 60 * 1_000;
const DAY_MS = 24 * HOUR_MS;
const RESULT_URL_PATTERN = /https:\/\/\S+result\.json/;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const stringField = (row: JsonObject, key: string): string | undefined => {
  const value = row[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
};

/**
 * Sliding hour/day call history per agent. Going over the provider's allowance gets
 * accounts banned, so the plugin refuses locally before the provider has to.
 */
class AgentCallHistory {
  private readonly calls = new Map<string, number[]>();

  constructor(
    private readonly budget: ProfessionalNetworkPluginOptions["callBudget"],
  ) {}

  tryRecord(agentId: string, now: number): { ok: true } | { ok: false; retryAfterMs: number; window: "hour" | "day" } {
    const dayAgo = now - DAY_MS;
    const hourAgo = now - HOUR_MS;
    const history = (this.calls.get(agentId) ?? []).filter((ts) => ts > dayAgo);
    const lastHour = history.filter((ts) => ts > hourAgo);

    const oldestInHour = lastHour[0];
    if (oldestInHour !== undefined && lastHour.length >= this.budget.maxCallsPerHour) {
      this.calls.set(agentId, history);
      return { ok: false, retryAfterMs: oldestInHour + HOUR_MS - now, window: "hour" };
    }

    const oldestInDay = history[0];
    if (oldestInDay !== undefined && history.length >= this.budget.maxCallsPerDay) {
      this.calls.set(agentId, history);
      return { ok: false, retryAfterMs: oldestInDay + DAY_MS - now, window: "day" };
    }

    history.push(now);
    this.calls.set(agentId, history);
    return { ok: true };
  }

  stats(agentId: string, now: number): { hour: number; day: number } {
    const history = this.calls.get(agentId) ?? [];
    return {
      hour: history.filter((ts) => ts > now - HOUR_MS).length,
      day: history.filter((ts) => ts > now - DAY_MS).length,
    };
  }
}

/**
 * Professional-network source driven through PhantomBuster agents: find the company
 * page, scrape its profile, then extract recent posts. Each agent run is launched,
 * polled until its log links a result.json, and that file is downloaded.
 */
export class ProfessionalNetworkPlugin implements SourcePluginPort {
  private readonly history: AgentCallHistory;
  private readonly headers: Record<string, string>;

  constructor(
    readonly name: string,
    private readonly options: ProfessionalNetworkPluginOptions,
    private readonly httpClient = new HttpClient(),
    private readonly clock: ClockPort = new SystemClock(),
  ) {
    if (!options.apiUrl.startsWith("https://")) {
      throw new Error(`Plugin '${name}' requires an https PhantomBuster API URL.`);
    }
    if (!options.apiKey.trim() || !options.sessionCookie.trim()) {
      throw new Error(
        "PHANTOMBUSTER_API_KEY and PHANTOMBUSTER_SESSION_COOKIE are required for the profile source.",
      );
    }
    const missingAgents = Object.entries(options.agents)
      .filter(([, id]) => !id.trim())
      .map(([key]) => key);
    if (missingAgents.length > 0) {
      throw new Error(
        `Plugin '${name}' is missing PhantomBuster agent ids: ${missingAgents.join(", ")}.`,
      );
    }

    this.history = new AgentCallHistory(options.callBudget);
    this.headers = {
      "x-phantombuster-key": options.apiKey.trim(),
      "content-type": "application/json",
    };
  }

  private get apiBase(): string {
    return this.options.apiUrl.replace(/\/+$/, "");
  }

  async fetch(
    request: FetchRequest,
  ): Promise<Result<RawRecord[], AppBoundaryError>> {
    const valid = validateFetchRequest(request, this.name, this.clock.now());
    if (valid.isErr()) {
      return err(valid.error);
    }

    const companyUrl = await this.findCompanyUrl(request.target, request.signal);
    if (companyUrl.isErr()) {
      return err(companyUrl.error);
    }
    if (!companyUrl.value) {
      logger.warn(
        { plugin: this.name, company: request.target.name, city: request.target.city },
        "No company page found",
      );
      return ok([]);
    }

    let profile: JsonObject | null = null;
    if (this.options.fetchProfile) {
      const profileResult = await this.fetchProfile(companyUrl.value, request.signal);
      if (profileResult.isErr()) {
        return err(profileResult.error);
      }
      profile = profileResult.value;
    }

    let posts: JsonObject[] = [];
    if (this.options.fetchPosts) {
      const postsResult = await this.fetchPosts(companyUrl.value, request.signal);
      if (postsResult.isErr()) {
        return err(postsResult.error);
      }
      posts = postsResult.value;
    }

    return ok(
      this.toRecords(request, companyUrl.value, profile, posts),
    );
  }

  private async findCompanyUrl(
    target: CompanyTarget,
    signal: AbortSignal | undefined,
  ): Promise<Result<string | null, AppBoundaryError>> {
    const query = [target.name, target.city].filter(Boolean).join(" ");
    const result = await this.launchAndFetchResult(
      this.options.agents.urlFinderId,
      {
        csvName: "result",
        spreadsheetUrl: query,
        numberOfLinesToProcess: 1,
        sessionCookie: this.options.sessionCookie,
        userAgent: this.options.userAgent,
      },
      signal,
    );
    if (result.isErr()) {
      return err(result.error);
    }
    if (result.value === null) {
      return ok(null);
    }
    if (!Array.isArray(result.value)) {
      return err(malformed(this.name, "URL finder result was not a list."));
    }

    const firstRow: unknown = result.value[0];
    return ok(isObject(firstRow) ? (stringField(firstRow, "linkedinUrl") ?? null) : null);
  }

  private async fetchProfile(
    companyUrl: string,
    signal: AbortSignal | undefined,
  ): Promise<Result<JsonObject | null, AppBoundaryError>> {
    const result = await this.launchAndFetchResult(
      this.options.agents.companyScraperId,
      {
        companiesPerLaunch: 1,
        delayBetween: 2,
        spreadsheetUrl: companyUrl,
        sessionCookie: this.options.sessionCookie,
        userAgent: this.options.userAgent,
        saveImg: false,
      },
      signal,
    );
    if (result.isErr()) {
      return err(result.error);
    }
    if (result.value === null) {
      return ok(null);
    }
    if (!Array.isArray(result.value)) {
      return err(malformed(this.name, "Company scraper result was not a list."));
    }

    const profile: unknown = result.value[0];
    if (profile === undefined || profile === null) {
      return ok(null);
    }
    if (!isObject(profile)) {
      return err(malformed(this.name, "Company profile payload was not an object."));
    }
    return ok(profile);
  }

  private async fetchPosts(
    companyUrl: string,
    signal: AbortSignal | undefined,
  ): Promise<Result<JsonObject[], AppBoundaryError>> {
    const result = await this.launchAndFetchResult(
      this.options.agents.activityExtractorId,
      {
        numberOfLinesPerLaunch: 1,
        numberMaxOfPosts: this.options.maxPosts,
        csvName: "result",
        activitiesToScrape: ["Post"],
        spreadsheetUrl: companyUrl,
        sessionCookie: this.options.sessionCookie,
        userAgent: this.options.userAgent,
      },
      signal,
    );
    if (result.isErr()) {
      return err(result.error);
    }
    if (result.value === null) {
      return ok([]);
    }
    if (!Array.isArray(result.value)) {
      return err(malformed(this.name, "Activity extractor result was not a list."));
    }

    return ok(result.value.filter(isObject));
  }

  /**
   * Launches one agent and polls its output log until a result file is linked.
   * Resolves to null when the agent never produces one within the polling budget.
   */
  private async launchAndFetchResult(
    agentId: string,
    args: Record<string, unknown>,
    signal: AbortSignal | undefined,
  ): Promise<Result<unknown, AppBoundaryError>> {
    if (signal?.aborted) {
      return err(aborted(this.name, `Launching agent ${agentId}`));
    }

    const now = this.clock.now().getTime();
    const admission = this.history.tryRecord(agentId, now);
    if (!admission.ok) {
      logger.warn(
        { plugin: this.name, agentId, window: admission.window, retryAfterMs: admission.retryAfterMs },
        "Agent call budget exhausted",
      );
      return err(
        boundaryError(
          "plugin",
          "source_quota_exceeded",
          this.name,
          `Agent ${agentId} reached its ${admission.window}ly call budget.`,
          { retryable: true, cause: { retryAfterMs: admission.retryAfterMs } },
        ),
      );
    }

    logger.info(
      { plugin: this.name, agentId, usage: this.history.stats(agentId, now) },
      "Launching agent",
    );

    const launch = await this.httpClient.requestJson<LaunchResponse>({
      url: `${this.apiBase}/agents/launch`,
      method: "POST",
      headers: this.headers,
      body: { id: agentId, arguments: args },
      timeoutMs: this.options.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
      signal,
    });
    if (launch.isErr()) {
      return err(toPluginError(this.name, launch.error, `Launching agent ${agentId}`));
    }
    if (!isObject(launch.value) || launch.value.containerId === undefined) {
      return err(malformed(this.name, `Agent ${agentId} launch returned no containerId.`));
    }

    for (let attempt = 1; attempt <= this.options.pollAttempts; attempt += 1) {
      if (signal?.aborted) {
        return err(aborted(this.name, `Polling agent ${agentId}`));
      }

      const output = await this.httpClient.requestJson<OutputResponse>({
        url: `${this.apiBase}/agents/fetch-output`,
        method: "GET",
        headers: this.headers,
        query: { id: agentId },
        timeoutMs: this.options.timeoutMs,
        retries: 0,
        retryDelayMs: 0,
        signal,
      });

      if (output.isErr()) {
        if (output.error.code !== "timeout") {
          return err(toPluginError(this.name, output.error, `Polling agent ${agentId}`));
        }
        logger.warn({ plugin: this.name, agentId, attempt }, "Agent output poll timed out");
      } else {
        const log = isObject(output.value) ? output.value.output : undefined;
        const resultUrl = typeof log === "string" ? log.match(RESULT_URL_PATTERN)?.[0] : undefined;

        if (resultUrl) {
          const download = await this.httpClient.requestJson<unknown>({
            url: resultUrl,
            method: "GET",
            timeoutMs: this.options.timeoutMs,
            retries: 1,
            retryDelayMs: 500,
            signal,
          });
          if (download.isErr()) {
            return err(toPluginError(this.name, download.error, `Downloading result of ${agentId}`));
          }
          logger.debug({ plugin: this.name, agentId, attempt }, "Agent result downloaded");
          return ok(download.value);
        }
      }

      if (attempt < this.options.pollAttempts) {
        await this.clock.sleep(this.options.pollIntervalMs);
      }
    }

    logger.error(
      { plugin: this.name, agentId, pollAttempts: this.options.pollAttempts },
      "Agent completed without producing a result",
    );
    return ok(null);
  }

  private toRecords(
    request: FetchRequest,
    companyUrl: string,
    profile: JsonObject | null,
    posts: JsonObject[],
  ): RawRecord[] {
    const profileMetadata = this.flattenProfile(profile);
    const baseMetadata = { companyUrl, ...profileMetadata };

    const postRecords = posts
      .map((post, index): RawRecord | null => {
        const body = stringField(post, "postContent");
        if (!body) {
          return null;
        }
        const timestamp = stringField(post, "postTimestamp");
        const publishedAt = timestamp ? new Date(timestamp) : undefined;
        const url = stringField(post, "postUrl") ?? companyUrl;

        return {
          id: `${this.name}:${url}#${index}`,
          source: this.name,
          title: stringField(post, "author") ?? request.target.name,
          body,
          url,
          ...(publishedAt && !Number.isNaN(publishedAt.getTime()) ? { publishedAt } : {}),
          metadata: { ...baseMetadata, kind: "post" },
        };
      })
      .filter((record): record is RawRecord => record !== null)
      .filter(
        (record) =>
          !request.since ||
          !record.publishedAt ||
          record.publishedAt.getTime() >= request.since.getTime(),
      );

    if (postRecords.length > 0 || !profile) {
      return postRecords;
    }

    const description =
      stringField(profile, "description") ?? stringField(profile, "tagLine") ?? "";
    return [
      {
        id: `${this.name}:${companyUrl}`,
        source: this.name,
        title: stringField(profile, "name") ?? request.target.name,
        body: description,
        url: companyUrl,
        metadata: { ...baseMetadata, kind: "profile" },
      },
    ];
  }

  private flattenProfile(profile: JsonObject | null): Record<string, string> {
    if (!profile) {
      return {};
    }

    const flat: Record<string, string> = {};
    Object.entries(profile).forEach(([key, value]) => {
      if (typeof value === "string" && value.trim()) {
        flat[`profile.${key}`] = value.trim();
      } else if (typeof value === "number" || typeof value === "boolean") {
        flat[`profile.${key}`] = String(value);
      }
    });
    return flat;
  }
}
