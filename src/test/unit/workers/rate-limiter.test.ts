import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RateLimiter } from "../../../workers/rate-limiter";

function track(promise: Promise<number>) {
  const state: { waited?: number } = {};
  void promise.then((waited) => {
    state.waited = waited;
  });
  return state;
}

describe("RateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("allows bursts up to the window size", async () => {
    const limiter = new RateLimiter(2, 1000);

    expect(await limiter.waitForToken()).toBe(0);
    expect(await limiter.waitForToken()).toBe(0);

    const third = track(limiter.waitForToken());
    await vi.advanceTimersByTimeAsync(499);
    expect(third.waited).toBeUndefined();

    await vi.advanceTimersByTimeAsync(1);
    expect(third.waited).toBe(500);
  });

  it("never holds more than the window size", async () => {
    const limiter = new RateLimiter(2, 1000);

    await vi.advanceTimersByTimeAsync(10_000);

    expect(await limiter.waitForToken()).toBe(0);
    expect(await limiter.waitForToken()).toBe(0);
    const third = track(limiter.waitForToken());
    await vi.advanceTimersByTimeAsync(500);
    expect(third.waited).toBe(500);
  });

  it("waits for the next token when exhausted", async () => {
    const limiter = new RateLimiter(1, 1000);
    expect(await limiter.waitForToken()).toBe(0);

    const waiting = limiter.waitForToken();
    await vi.advanceTimersByTimeAsync(1000);

    expect(await waiting).toBe(1000);
  });

  it("grants concurrent waiters one refilled token each, in arrival order", async () => {
    const limiter = new RateLimiter(1, 1000);
    await limiter.waitForToken();

    const first = track(limiter.waitForToken());
    const second = track(limiter.waitForToken());
    const third = track(limiter.waitForToken());

    await vi.advanceTimersByTimeAsync(1000);
    expect([first.waited, second.waited, third.waited]).toEqual([1000, undefined, undefined]);

    await vi.advanceTimersByTimeAsync(1000);
    expect([first.waited, second.waited, third.waited]).toEqual([1000, 2000, undefined]);

    await vi.advanceTimersByTimeAsync(1000);
    expect([first.waited, second.waited, third.waited]).toEqual([1000, 2000, 3000]);
  });
});
