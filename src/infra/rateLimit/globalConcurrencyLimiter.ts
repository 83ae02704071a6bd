import { err, ok, type Result } from "neverthrow";
import {
  boundaryError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type {
  ClockPort,
  ConcurrencyLease,
  ConcurrencyLimiterPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";

export type GlobalConcurrencyLimiterOptions = {
  ceiling: number;
  acquireTimeoutMs: number;
  minDelayBetweenStartsMs?: number;
};

export type ConcurrencyLimiterStats = {
  ceiling: number;
  inFlight: number;
  waiting: number;
  activeJobs: string[];
};

type Waiter = {
  jobName: string;
  grant: () => void;
  timer: ReturnType<typeof setTimeout>;
};

/**
 * Caps the number of external calls in flight across every source and run.
 * A released slot is handed straight to the oldest waiter, so the in-flight count
 * never drops and re-rises between two holders.
 */
export class GlobalConcurrencyLimiter implements ConcurrencyLimiterPort {
  private inFlight = 0;
  private readonly waiters: Waiter[] = [];
  private readonly activeJobs = new Map<number, string>();
  private nextLeaseId = 1;
  private nextStartAt = 0;

  constructor(
    private readonly options: GlobalConcurrencyLimiterOptions,
    private readonly clock: ClockPort,
  ) {
    if (!Number.isInteger(options.ceiling) || options.ceiling < 1) {
      throw new Error(
        `Global concurrency ceiling must be a positive integer, got ${options.ceiling}.`,
      );
    }

    logger.info(
      {
        ceiling: options.ceiling,
        acquireTimeoutMs: options.acquireTimeoutMs,
        minDelayBetweenStartsMs: options.minDelayBetweenStartsMs ?? 0,
      },
      "Global concurrency limiter initialized",
    );
  }

  get ceiling(): number {
    return this.options.ceiling;
  }

  async acquire(
    jobName: string,
  ): Promise<Result<ConcurrencyLease, AppBoundaryError>> {
    const admitted = await this.waitForSlot(jobName);
    if (!admitted) {
      logger.warn(
        { jobName, timeoutMs: this.options.acquireTimeoutMs },
        "Timed out waiting for a global concurrency slot",
      );
      return err(
        boundaryError(
          "limiter",
          "rate_limit_timeout",
          "global-concurrency",
          `Timed out after ${this.options.acquireTimeoutMs}ms waiting for a global slot for '${jobName}'.`,
          { retryable: true },
        ),
      );
    }

    const lease = this.createLease(jobName);
    await this.spaceStarts(jobName);
    return ok(lease);
  }

  /**
   * Runs a task inside a slot; the slot is returned whether the task settles or throws.
   */
  async run<T>(
    jobName: string,
    task: () => Promise<T>,
  ): Promise<Result<T, AppBoundaryError>> {
    const lease = await this.acquire(jobName);
    if (lease.isErr()) {
      return err(lease.error);
    }

    try {
      return ok(await task());
    } finally {
      lease.value.release();
    }
  }

  stats(): ConcurrencyLimiterStats {
    return {
      ceiling: this.options.ceiling,
      inFlight: this.inFlight,
      waiting: this.waiters.length,
      activeJobs: [...this.activeJobs.values()],
    };
  }

  private waitForSlot(jobName: string): Promise<boolean> {
    if (this.inFlight < this.options.ceiling) {
      this.inFlight += 1;
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = {
        jobName,
        grant: () => resolve(true),
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          resolve(false);
        }, this.options.acquireTimeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  private createLease(jobName: string): ConcurrencyLease {
    const leaseId = this.nextLeaseId;
    this.nextLeaseId += 1;
    this.activeJobs.set(leaseId, jobName);
    const startedAt = this.clock.now().getTime();
    let released = false;

    logger.debug(
      { jobName, inFlight: this.inFlight, ceiling: this.options.ceiling },
      "Global slot acquired",
    );

    return {
      jobName,
      release: () => {
        if (released) {
          return;
        }
        released = true;
        this.activeJobs.delete(leaseId);
        this.handOff();
        logger.debug(
          {
            jobName,
            durationMs: this.clock.now().getTime() - startedAt,
            inFlight: this.inFlight,
          },
          "Global slot released",
        );
      },
    };
  }

  private handOff(): void {
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timer);
      next.grant();
      return;
    }

    this.inFlight = Math.max(0, this.inFlight - 1);
  }

  private async spaceStarts(jobName: string): Promise<void> {
    const minDelay = this.options.minDelayBetweenStartsMs ?? 0;
    if (minDelay <= 0) {
      return;
    }

    const now = this.clock.now().getTime();
    const startAt = Math.max(now, this.nextStartAt);
    this.nextStartAt = startAt + minDelay;

    if (startAt > now) {
      logger.debug(
        { jobName, waitMs: startAt - now },
        "Spacing job start after previous start",
      );
      await this.clock.sleep(startAt - now);
    }
  }
}
