import { defineModelSpec, type ModelSpec, type RateLimitPolicy } from "@modelgate/provider";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CancelledError, RateLimitTimeoutError } from "../../errors/index.js";
import { EventBus, rateLimitThrottle, rateLimitTimeout } from "../../events/index.js";
import { RateLimiter } from "../rate-limiter.js";
import type { RatePermit } from "../types.js";

function spec(id: string, rateLimit: RateLimitPolicy): ModelSpec {
  return defineModelSpec({
    id,
    provider: "mock",
    providerModel: id,
    pricing: { inputPerMillion: 1, outputPerMillion: 1 },
    rateLimit,
  });
}

function track(promise: Promise<RatePermit>): { permit?: RatePermit; error?: unknown } {
  const state: { permit?: RatePermit; error?: unknown } = {};
  promise.then(
    (permit) => {
      state.permit = permit;
    },
    (error: unknown) => {
      state.error = error;
    }
  );
  return state;
}

describe("RateLimiter", () => {
  let limiter: RateLimiter;
  let events: EventBus;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    events = new EventBus();
    limiter = new RateLimiter({ events });
  });

  afterEach(() => {
    limiter.dispose();
    vi.useRealTimers();
  });

  describe("token bucket admission", () => {
    const bucket = spec("mock/bucket", { kind: "token-bucket", capacity: 2, refillPerSecond: 1 });

    it("should grant up to capacity immediately and queue the rest", async () => {
      const first = track(limiter.acquire(bucket));
      const second = track(limiter.acquire(bucket));
      const third = track(limiter.acquire(bucket));

      await vi.advanceTimersByTimeAsync(0);
      expect(first.permit?.waitedMs).toBe(0);
      expect(second.permit?.waitedMs).toBe(0);
      expect(third.permit).toBeUndefined();

      await vi.advanceTimersByTimeAsync(999);
      expect(third.permit).toBeUndefined();

      await vi.advanceTimersByTimeAsync(1);
      expect(third.permit?.waitedMs).toBe(1000);
      expect(third.permit?.modelId).toBe("mock/bucket");
    });

    it("should emit a throttle event when a caller has to wait", async () => {
      const throttled = vi.fn();
      events.on(rateLimitThrottle, throttled);

      await limiter.acquire(bucket);
      await limiter.acquire(bucket);
      track(limiter.acquire(bucket));

      expect(throttled).toHaveBeenCalledWith({
        modelId: "mock/bucket",
        waitMs: 1000,
        queued: 1,
        timestamp: 0,
      });
    });
  });

  describe("fixed window admission", () => {
    const windowed = spec("mock/window", { kind: "fixed-window", limit: 3, windowMs: 1000 });

    it("should never admit more than the limit within one window", async () => {
      const callers = Array.from({ length: 7 }, () => track(limiter.acquire(windowed)));
      const grantedCount = (): number => callers.filter((c) => c.permit).length;

      await vi.advanceTimersByTimeAsync(0);
      expect(grantedCount()).toBe(3);

      await vi.advanceTimersByTimeAsync(999);
      expect(grantedCount()).toBe(3);

      await vi.advanceTimersByTimeAsync(1);
      expect(grantedCount()).toBe(6);

      await vi.advanceTimersByTimeAsync(1000);
      expect(grantedCount()).toBe(7);
      expect(callers.map((c) => c.permit?.grantedAt)).toEqual([0, 0, 0, 1000, 1000, 1000, 2000]);
    });
  });

  describe("release", () => {
    const single = spec("mock/single", { kind: "token-bucket", capacity: 1, refillPerSecond: 0.1 });

    it("should hand returned capacity to the next waiter", async () => {
      const permit = await limiter.acquire(single);
      const waiting = track(limiter.acquire(single));

      expect(limiter.release(permit)).toBe(true);
      await vi.advanceTimersByTimeAsync(0);

      expect(waiting.permit?.waitedMs).toBe(0);
      expect(limiter.getStats("mock/single")?.refunded).toBe(1);
    });

    it("should ignore a second release of the same permit", async () => {
      const permit = await limiter.acquire(single);

      expect(limiter.release(permit)).toBe(true);
      expect(limiter.release(permit)).toBe(false);
      expect(limiter.getStats("mock/single")?.available).toBe(1);
    });
  });

  describe("cancellation and timeouts", () => {
    const slow = spec("mock/slow", { kind: "token-bucket", capacity: 1, refillPerSecond: 0.1 });

    it("should reject a waiter whose signal aborts", async () => {
      await limiter.acquire(slow);
      const controller = new AbortController();
      const waiting = track(limiter.acquire(slow, { signal: controller.signal }));

      controller.abort();
      await vi.advanceTimersByTimeAsync(0);

      expect(waiting.error).toBeInstanceOf(CancelledError);
      expect(limiter.getStats("mock/slow")?.queued).toBe(0);
    });

    it("should reject immediately when the signal is already aborted", async () => {
      await expect(limiter.acquire(slow, { signal: AbortSignal.abort() })).rejects.toBeInstanceOf(
        CancelledError
      );
    });

    it("should give up after maxWaitMs", async () => {
      const timedOut = vi.fn();
      events.on(rateLimitTimeout, timedOut);
      await limiter.acquire(slow);
      const waiting = track(limiter.acquire(slow, { maxWaitMs: 500 }));

      await vi.advanceTimersByTimeAsync(500);

      expect(waiting.error).toBeInstanceOf(RateLimitTimeoutError);
      expect(timedOut).toHaveBeenCalledWith({
        modelId: "mock/slow",
        waitedMs: 500,
        maxWaitMs: 500,
        timestamp: 500,
      });
      expect(limiter.getStats("mock/slow")?.timedOut).toBe(1);
    });

    it("should reject queued waiters on dispose", async () => {
      await limiter.acquire(slow);
      const waiting = track(limiter.acquire(slow));

      limiter.dispose();
      await vi.advanceTimersByTimeAsync(0);

      expect(waiting.error).toBeInstanceOf(CancelledError);
      expect(limiter.isDisposed).toBe(true);
    });
  });

  it("should keep models independent", async () => {
    const busy = spec("mock/busy", { kind: "token-bucket", capacity: 1, refillPerSecond: 0.1 });
    const idle = spec("mock/idle", { kind: "token-bucket", capacity: 1, refillPerSecond: 0.1 });
    await limiter.acquire(busy);
    track(limiter.acquire(busy));

    const permit = await limiter.acquire(idle);

    expect(permit.waitedMs).toBe(0);
    expect(limiter.getAllStats().map((s) => s.modelId)).toEqual(["mock/busy", "mock/idle"]);
  });
});
