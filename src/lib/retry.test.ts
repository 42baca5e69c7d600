import { describe, it, expect } from "vitest";
import { backoffDelay, retry, retryWhile, type RetryPolicy } from "./retry.js";
import { FakeClock } from "./testing.js";

const POLICY: RetryPolicy = { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 350, jitter: 0 };

describe("backoffDelay", () => {
  it("doubles per attempt up to the ceiling", () => {
    expect(backoffDelay(POLICY, 1)).toBe(100);
    expect(backoffDelay(POLICY, 2)).toBe(200);
    expect(backoffDelay(POLICY, 3)).toBe(350);
  });

  it("spreads the delay by the jitter fraction", () => {
    const policy = { ...POLICY, jitter: 0.5 };
    expect(backoffDelay(policy, 1, () => 0)).toBe(50);
    expect(backoffDelay(policy, 1, () => 0.5)).toBe(100);
    expect(backoffDelay(policy, 1, () => 1)).toBe(150);
  });
});

describe("retryWhile", () => {
  it("stops at the attempt ceiling and returns the last result", async () => {
    const clock = new FakeClock();
    let calls = 0;
    const { result, attempts } = await retryWhile(
      async () => ++calls,
      () => true,
      { policy: POLICY, clock }
    );
    expect(result).toBe(4);
    expect(attempts).toBe(4);
    expect(clock.sleeps).toEqual([100, 200, 350]);
  });

  it("returns as soon as a result is accepted", async () => {
    const clock = new FakeClock();
    const { result, attempts } = await retryWhile(
      async (attempt) => attempt,
      (value) => value < 2,
      { policy: POLICY, clock }
    );
    expect(result).toBe(2);
    expect(attempts).toBe(2);
    expect(clock.sleeps).toEqual([100]);
  });

  it("does not retry once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const { attempts } = await retryWhile(async () => 0, () => true, {
      policy: POLICY,
      clock: new FakeClock(),
      signal: controller.signal,
    });
    expect(attempts).toBe(1);
  });
});

describe("retry", () => {
  it("rethrows the last error after the ceiling", async () => {
    let calls = 0;
    await expect(
      retry(
        async () => {
          calls++;
          throw new Error(`attempt ${calls}`);
        },
        () => true,
        { policy: POLICY, clock: new FakeClock() }
      )
    ).rejects.toThrow("attempt 4");
  });

  it("does not retry errors the predicate rejects", async () => {
    let calls = 0;
    await expect(
      retry(
        async () => {
          calls++;
          throw new Error("fatal");
        },
        () => false,
        { policy: POLICY, clock: new FakeClock() }
      )
    ).rejects.toThrow("fatal");
    expect(calls).toBe(1);
  });

  it("returns the value of a later successful attempt", async () => {
    const value = await retry(
      async (attempt) => {
        if (attempt < 3) throw new Error("transient");
        return "ok";
      },
      () => true,
      { policy: POLICY, clock: new FakeClock() }
    );
    expect(value).toBe("ok");
  });
});
