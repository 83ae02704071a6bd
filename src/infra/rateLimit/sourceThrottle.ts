import { err, ok, type Result } from "neverthrow";
import {
  boundaryError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type {
  ClockPort,
  SourceThrottlePort,
} from "../../core/ports/outboundPorts";
import type { BucketSettings } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";

export type SourceThrottleOptions = {
  defaults: BucketSettings;
  overrides?: Record<string, BucketSettings>;
  acquireTimeoutMs: number;
};

export type SourceThrottleStats = {
  source: string;
  tokens: number;
  capacity: number;
  refillPerSecond: number;
  granted: number;
};

type Bucket = {
  settings: BucketSettings;
  tokens: number;
  refilledAt: number;
  granted: number;
};

/**
 * Token bucket per source name. Buckets start full and never hold more than their
 * capacity, so a long idle period cannot turn into a burst above it.
 */
export class SourceThrottle implements SourceThrottlePort {
  private readonly buckets = new Map<string, Bucket>();

  constructor(
    private readonly options: SourceThrottleOptions,
    private readonly clock: ClockPort,
  ) {
    const all = [options.defaults, ...Object.values(options.overrides ?? {})];
    for (const settings of all) {
      if (settings.capacity < 1 || settings.refillPerSecond <= 0) {
        throw new Error(
          `Throttle settings must have capacity >= 1 and refillPerSecond > 0, got ${JSON.stringify(settings)}.`,
        );
      }
    }
  }

  settingsFor(source: string): BucketSettings {
    return this.options.overrides?.[source] ?? this.options.defaults;
  }

  /**
   * Consumes one token for `source`, waiting for refill when the bucket is empty.
   * Gives up as soon as the next token cannot arrive before the deadline.
   */
  async acquire(source: string): Promise<Result<void, AppBoundaryError>> {
    const deadline = this.clock.now().getTime() + this.options.acquireTimeoutMs;

    for (;;) {
      const bucket = this.refill(source);
      if (bucket.tokens >= 1) {
        bucket.tokens -= 1;
        bucket.granted += 1;
        return ok(undefined);
      }

      const now = this.clock.now().getTime();
      const waitMs = Math.ceil(
        ((1 - bucket.tokens) / bucket.settings.refillPerSecond) * 1_000,
      );

      if (now + waitMs > deadline) {
        logger.warn(
          { source, waitMs, timeoutMs: this.options.acquireTimeoutMs },
          "Source throttle wait exceeds timeout",
        );
        return err(
          boundaryError(
            "limiter",
            "rate_limit_timeout",
            source,
            `No token for '${source}' within ${this.options.acquireTimeoutMs}ms (next token in ${waitMs}ms).`,
            { retryable: true },
          ),
        );
      }

      logger.debug({ source, waitMs }, "Waiting for source throttle token");
      await this.clock.sleep(waitMs);
    }
  }

  stats(source: string): SourceThrottleStats {
    const bucket = this.refill(source);
    return {
      source,
      tokens: bucket.tokens,
      capacity: bucket.settings.capacity,
      refillPerSecond: bucket.settings.refillPerSecond,
      granted: bucket.granted,
    };
  }

  reset(source?: string): void {
    if (source) {
      this.buckets.delete(source);
      return;
    }
    this.buckets.clear();
  }

  private refill(source: string): Bucket {
    const now = this.clock.now().getTime();
    const existing = this.buckets.get(source);

    if (!existing) {
      const settings = this.settingsFor(source);
      const bucket: Bucket = {
        settings,
        tokens: settings.capacity,
        refilledAt: now,
        granted: 0,
      };
      this.buckets.set(source, bucket);
      return bucket;
    }

    const elapsedSeconds = Math.max(0, now - existing.refilledAt) / 1_000;
    existing.tokens = Math.min(
      existing.settings.capacity,
      existing.tokens + elapsedSeconds * existing.settings.refillPerSecond,
    );
    existing.refilledAt = now;
    return existing;
  }
}
