import type { ClientProfile, CompanyTarget } from "../../core/entities/company";
import type { PipelineRun } from "../../core/entities/pipelineRun";
import type { PipelineRunnerPort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  IdGeneratorPort,
  PipelineJobPayload,
} from "../../core/ports/outboundPorts";

const DAY_MS = 24 * 60 * 60 * 1_000;

export type PipelineJobDefaults = {
  sources: string[];
  clientProfile: ClientProfile;
  threshold: number;
  lookbackDays: number;
};

const slug = (value: string): string =>
  value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

/**
 * Builds a queued run request. The idempotency key collapses repeats of the same
 * company and sources within one hour unless `force` is set.
 */
export const buildPipelineJob = (
  target: CompanyTarget,
  options: { sources?: string[]; since?: Date; force?: boolean },
  clock: ClockPort,
  ids: IdGeneratorPort,
): PipelineJobPayload => {
  const runId = ids.next();
  const now = clock.now();
  const hourBucket = now.toISOString().slice(0, 13);
  const sourcesKey = options.sources?.length ? options.sources.join("+") : "default";
  const baseKey = `${slug(target.name)}-${sourcesKey}-${hourBucket}`;

  return {
    runId,
    company: {
      name: target.name,
      aliases: [...target.aliases],
      ...(target.industry ? { industry: target.industry } : {}),
      ...(target.domain ? { domain: target.domain } : {}),
      ...(target.city ? { city: target.city } : {}),
    },
    ...(options.sources?.length ? { sources: [...options.sources] } : {}),
    ...(options.since ? { since: options.since.toISOString() } : {}),
    requestedAt: now.toISOString(),
    idempotencyKey: options.force ? `${baseKey}-force-${runId}` : baseKey,
  };
};

export const targetFromPayload = (payload: PipelineJobPayload): CompanyTarget => ({
  name: payload.company.name,
  aliases: payload.company.aliases,
  ...(payload.company.industry ? { industry: payload.company.industry } : {}),
  ...(payload.company.domain ? { domain: payload.company.domain } : {}),
  ...(payload.company.city ? { city: payload.company.city } : {}),
});

/**
 * Turns a dequeued job into an orchestrator run, filling gaps from configuration.
 */
export class PipelineJobRunner {
  constructor(
    private readonly runner: PipelineRunnerPort,
    private readonly defaults: PipelineJobDefaults,
    private readonly clock: ClockPort,
  ) {}

  resolveSince(payload: Pick<PipelineJobPayload, "since">): Date {
    if (payload.since) {
      const parsed = new Date(payload.since);
      if (!Number.isNaN(parsed.getTime())) {
        return parsed;
      }
    }
    return new Date(this.clock.now().getTime() - this.defaults.lookbackDays * DAY_MS);
  }

  async process(payload: PipelineJobPayload): Promise<PipelineRun> {
    return this.runner.run(targetFromPayload(payload), {
      sources: payload.sources?.length ? payload.sources : this.defaults.sources,
      clientProfile: this.defaults.clientProfile,
      threshold: this.defaults.threshold,
      since: this.resolveSince(payload),
      runId: payload.runId,
    });
  }
}
