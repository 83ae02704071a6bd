import { describe, expect, it } from "vitest";
import type { CompanyTarget } from "../../core/entities/company";
import type { PipelineRun } from "../../core/entities/pipelineRun";
import type {
  PipelineRunnerPort,
  PipelineRunOptions,
} from "../../core/ports/inboundPorts";
import { acmeTarget, ManualClock, SequentialIds } from "../../__tests__/support/fakes";
import { buildPipelineJob, PipelineJobRunner, targetFromPayload } from "./pipelineJobs";

const defaults = {
  sources: ["news", "profile"],
  clientProfile: { keywords: ["automation"] },
  threshold: 0.4,
  lookbackDays: 30,
};

class RecordingRunner implements PipelineRunnerPort {
  readonly calls: PipelineRunOptions[] = [];

  async run(target: CompanyTarget, options: PipelineRunOptions): Promise<PipelineRun> {
    this.calls.push(options);
    return {
      id: options.runId ?? "run",
      company: target,
      state: "completed",
      startedAt: new Date(0),
      pluginNames: options.sources,
      succeededPlugins: options.sources,
      counts: { fetched: 0, accepted: 0, rejected: 0, failed: 0 },
      pluginErrors: [],
      persistence: { status: "saved", recordCount: 0 },
      cancelled: false,
      acceptedRecords: [],
    };
  }

  snapshot(): PipelineRun | null {
    return null;
  }

  listRuns(): PipelineRun[] {
    return [];
  }
}

describe("buildPipelineJob", () => {
  it("derives an hourly idempotency key from company and sources", () => {
    const job = buildPipelineJob(
      acmeTarget,
      { sources: ["news"] },
      new ManualClock(),
      new SequentialIds("run"),
    );

    expect(job).toEqual({
      runId: "run-1",
      company: {
        name: "Acme Robotics",
        aliases: ["Acme"],
        industry: "industrial automation",
        city: "Lyon",
      },
      sources: ["news"],
      requestedAt: "2026-03-02T09:00:00.000Z",
      idempotencyKey: "acme-robotics-news-2026-03-02T09",
    });
  });

  it("makes forced requests unique", () => {
    const job = buildPipelineJob(
      acmeTarget,
      { force: true },
      new ManualClock(),
      new SequentialIds("run"),
    );

    expect(job.idempotencyKey).toBe("acme-robotics-default-2026-03-02T09-force-run-1");
    expect(targetFromPayload(job)).toEqual(acmeTarget);
  });
});

describe("PipelineJobRunner", () => {
  it("fills sources and the lookback window from defaults", async () => {
    const runner = new RecordingRunner();
    const jobs = new PipelineJobRunner(runner, defaults, new ManualClock());
    const job = buildPipelineJob(acmeTarget, {}, new ManualClock(), new SequentialIds("run"));

    const run = await jobs.process(job);

    expect(run.id).toBe("run-1");
    expect(runner.calls).toEqual([
      {
        sources: ["news", "profile"],
        clientProfile: { keywords: ["automation"] },
        threshold: 0.4,
        since: new Date("2026-01-31T09:00:00.000Z"),
        runId: "run-1",
      },
    ]);
  });

  it("keeps an explicit cutoff from the payload", () => {
    const jobs = new PipelineJobRunner(new RecordingRunner(), defaults, new ManualClock());

    expect(jobs.resolveSince({ since: "2026-02-15T00:00:00.000Z" })).toEqual(
      new Date("2026-02-15T00:00:00.000Z"),
    );
    expect(jobs.resolveSince({ since: "not-a-date" })).toEqual(
      new Date("2026-01-31T09:00:00.000Z"),
    );
  });
});
