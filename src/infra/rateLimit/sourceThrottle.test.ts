import { describe, expect, it } from "vitest";
import { SourceThrottle } from "./sourceThrottle";
import { ManualClock } from "../../__tests__/support/fakes";

describe("SourceThrottle", () => {
  it.each([
    { capacity: 1, refillPerSecond: 0.5 },
    { capacity: 3, refillPerSecond: 1 },
    { capacity: 5, refillPerSecond: 2 },
  ])(
    "grants at most $capacity tokens within B/R after a cold start",
    async ({ capacity, refillPerSecond }) => {
      const clock = new ManualClock();
      const throttle = new SourceThrottle(
        { defaults: { capacity, refillPerSecond }, acquireTimeoutMs: 1 },
        clock,
      );
      const windowMs = (capacity / refillPerSecond) * 1_000;
      const startedAt = clock.now().getTime();

      let granted = 0;
      while (clock.now().getTime() - startedAt < windowMs / 2) {
        const result = await throttle.acquire("news");
        if (result.isErr()) {
          break;
        }
        granted += 1;
      }

      expect(granted).toBe(capacity);
    },
  );

  it("waits for refill when a token arrives before the timeout", async () => {
    const clock = new ManualClock();
    const throttle = new SourceThrottle(
      {
        defaults: { capacity: 2, refillPerSecond: 4 },
        acquireTimeoutMs: 1_000,
      },
      clock,
    );

    await throttle.acquire("news");
    await throttle.acquire("news");
    const third = await throttle.acquire("news");

    expect(third.isOk()).toBe(true);
    expect(clock.sleeps).toEqual([250]);
  });

  it("returns rate_limit_timeout when refill is slower than the timeout", async () => {
    const clock = new ManualClock();
    const throttle = new SourceThrottle(
      {
        defaults: { capacity: 1, refillPerSecond: 0.1 },
        acquireTimeoutMs: 2_000,
      },
      clock,
    );

    expect((await throttle.acquire("profile")).isOk()).toBe(true);
    const second = await throttle.acquire("profile");

    expect(second.isErr()).toBe(true);
    if (second.isOk()) {
      throw new Error("expected timeout");
    }
    expect(second.error.code).toBe("rate_limit_timeout");
    expect(second.error.provider).toBe("profile");
    expect(clock.sleeps).toEqual([]);
  });

  it("caps the bucket at capacity after a long idle period", async () => {
    const clock = new ManualClock();
    const throttle = new SourceThrottle(
      {
        defaults: { capacity: 2, refillPerSecond: 1 },
        acquireTimeoutMs: 1,
      },
      clock,
    );

    await throttle.acquire("news");
    clock.advance(3_600_000);

    expect(throttle.stats("news").tokens).toBe(2);
    expect((await throttle.acquire("news")).isOk()).toBe(true);
    expect((await throttle.acquire("news")).isOk()).toBe(true);
    expect((await throttle.acquire("news")).isErr()).toBe(true);
  });

  it("keeps independent buckets and honours per-source overrides", async () => {
    const clock = new ManualClock();
    const throttle = new SourceThrottle(
      {
        defaults: { capacity: 3, refillPerSecond: 1 },
        overrides: { profile: { capacity: 1, refillPerSecond: 0.01 } },
        acquireTimeoutMs: 1,
      },
      clock,
    );

    expect((await throttle.acquire("profile")).isOk()).toBe(true);
    expect((await throttle.acquire("profile")).isErr()).toBe(true);
    expect((await throttle.acquire("news")).isOk()).toBe(true);

    expect(throttle.stats("profile")).toEqual({
      source: "profile",
      tokens: 0,
      capacity: 1,
      refillPerSecond: 0.01,
      granted: 1,
    });
    expect(throttle.stats("news").tokens).toBe(2);
  });

  it("refills a source from scratch after reset", async () => {
    const clock = new ManualClock();
    const throttle = new SourceThrottle(
      {
        defaults: { capacity: 1, refillPerSecond: 0.01 },
        acquireTimeoutMs: 1,
      },
      clock,
    );

    await throttle.acquire("news");
    throttle.reset("news");

    expect((await throttle.acquire("news")).isOk()).toBe(true);
  });
});
