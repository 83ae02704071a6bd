import { describe, expect, it } from "vitest";
import { GlobalConcurrencyLimiter } from "./globalConcurrencyLimiter";
import { deferred, flushMicrotasks, ManualClock } from "../../__tests__/support/fakes";

const seededDelays = (seed: number, count: number): number[] => {
  let state = seed;
  return Array.from({ length: count }, () => {
    state = (state * 1_103_515_245 + 12_345) % 2_147_483_648;
    return state % 4;
  });
};

const pause = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

describe("GlobalConcurrencyLimiter", () => {
  it.each([1, 2, 3, 5])(
    "never admits more than %i concurrent tasks",
    async (ceiling) => {
      const limiter = new GlobalConcurrencyLimiter(
        { ceiling, acquireTimeoutMs: 5_000 },
        new ManualClock(),
      );
      let active = 0;
      let peak = 0;

      const results = await Promise.all(
        seededDelays(ceiling * 7, 20).map((delayMs, index) =>
          limiter.run(`job-${index}`, async () => {
            active += 1;
            peak = Math.max(peak, active);
            await pause(delayMs);
            active -= 1;
            return index;
          }),
        ),
      );

      expect(results.every((result) => result.isOk())).toBe(true);
      expect(peak).toBeLessThanOrEqual(ceiling);
      expect(peak).toBe(ceiling);
      expect(limiter.stats()).toEqual({
        ceiling,
        inFlight: 0,
        waiting: 0,
        activeJobs: [],
      });
    },
  );

  it("delays a second acquisition until the first lease is released", async () => {
    const limiter = new GlobalConcurrencyLimiter(
      { ceiling: 1, acquireTimeoutMs: 5_000 },
      new ManualClock(),
    );

    const first = await limiter.acquire("first");
    expect(first.isOk()).toBe(true);

    let secondAdmitted = false;
    const second = limiter.acquire("second").then((result) => {
      secondAdmitted = true;
      return result;
    });

    await flushMicrotasks();
    expect(secondAdmitted).toBe(false);
    expect(limiter.stats().waiting).toBe(1);

    first._unsafeUnwrap().release();
    const secondResult = await second;

    expect(secondAdmitted).toBe(true);
    expect(limiter.stats().inFlight).toBe(1);
    expect(limiter.stats().activeJobs).toEqual(["second"]);
    secondResult._unsafeUnwrap().release();
    expect(limiter.stats().inFlight).toBe(0);
  });

  it("returns rate_limit_timeout when no slot frees up in time", async () => {
    const limiter = new GlobalConcurrencyLimiter(
      { ceiling: 1, acquireTimeoutMs: 10 },
      new ManualClock(),
    );
    const holder = await limiter.acquire("holder");

    const starved = await limiter.acquire("starved");

    expect(starved.isErr()).toBe(true);
    if (starved.isOk()) {
      throw new Error("expected timeout");
    }
    expect(starved.error.code).toBe("rate_limit_timeout");
    expect(starved.error.provider).toBe("global-concurrency");
    expect(limiter.stats()).toMatchObject({ inFlight: 1, waiting: 0 });

    holder._unsafeUnwrap().release();
    expect(limiter.stats().inFlight).toBe(0);
  });

  it("restores the slot when the task throws and ignores double release", async () => {
    const limiter = new GlobalConcurrencyLimiter(
      { ceiling: 2, acquireTimeoutMs: 100 },
      new ManualClock(),
    );

    await expect(
      limiter.run("boom", async () => {
        throw new Error("task failed");
      }),
    ).rejects.toThrow("task failed");
    expect(limiter.stats().inFlight).toBe(0);

    const lease = (await limiter.acquire("once"))._unsafeUnwrap();
    lease.release();
    lease.release();
    expect(limiter.stats().inFlight).toBe(0);
  });

  it("spaces consecutive starts by the configured minimum delay", async () => {
    const clock = new ManualClock();
    const limiter = new GlobalConcurrencyLimiter(
      { ceiling: 3, acquireTimeoutMs: 100, minDelayBetweenStartsMs: 1_500 },
      clock,
    );

    await limiter.acquire("a");
    await limiter.acquire("b");
    await limiter.acquire("c");

    expect(clock.sleeps).toEqual([1_500, 1_500]);
  });

  it("rejects a non-positive ceiling", () => {
    expect(
      () =>
        new GlobalConcurrencyLimiter(
          { ceiling: 0, acquireTimeoutMs: 100 },
          new ManualClock(),
        ),
    ).toThrow("Global concurrency ceiling must be a positive integer, got 0.");
  });

  it("hands slots to waiters without exceeding the ceiling", async () => {
    const limiter = new GlobalConcurrencyLimiter(
      { ceiling: 1, acquireTimeoutMs: 1_000 },
      new ManualClock(),
    );
    const gate = deferred<void>();
    const order: string[] = [];

    const first = limiter.run("first", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = limiter.run("second", async () => {
      order.push("second:start");
    });

    await flushMicrotasks();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second:start"]);
  });
});
