import {
  type MockHandler,
  MockProvider,
  ModelRegistry,
  type ProviderRequest,
  ProviderRegistry,
} from "@modelgate/provider";
import { usd } from "@modelgate/shared";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CostTracker } from "../../cost/index.js";
import { BudgetExceededError, CancelledError, FatalProviderError } from "../../errors/index.js";
import { type InvocationRequest, ModelInvoker } from "../../invoker/index.js";
import { RateLimiter } from "../../rate-limit/index.js";
import { RetryExecutor } from "../../retry/index.js";
import { BatchScheduler, summarizeBatch } from "../scheduler.js";
import type { BatchOutcome } from "../types.js";

function ask(content: string): InvocationRequest {
  return { model: "mock/flat", messages: [{ role: "user", content }] };
}

function lastContent(request: ProviderRequest): string {
  return request.messages[request.messages.length - 1]?.content ?? "";
}

function statuses(outcomes: readonly BatchOutcome<unknown>[]): string[] {
  return outcomes.map((outcome) => outcome.status);
}

describe("BatchScheduler", () => {
  let limiter: RateLimiter;
  let tracker: CostTracker;

  function makeScheduler(handler: MockHandler): { scheduler: BatchScheduler; provider: MockProvider } {
    const registry = new ModelRegistry();
    registry.register({
      id: "mock/flat",
      provider: "mock",
      providerModel: "flat-v1",
      pricing: { inputPerMillion: 0, outputPerMillion: 0, perCall: "0.5" },
      rateLimit: { kind: "token-bucket", capacity: 100, refillPerSecond: 100 },
    });
    const provider = new MockProvider({ handler });
    const invoker = new ModelInvoker({
      registry,
      providers: new ProviderRegistry({ adapters: { mock: provider } }),
      retry: new RetryExecutor({ limiter }),
      tracker,
    });
    return { scheduler: new BatchScheduler(invoker, tracker, { concurrency: 3 }), provider };
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    limiter = new RateLimiter();
    tracker = new CostTracker();
  });

  afterEach(() => {
    limiter.dispose();
    vi.useRealTimers();
  });

  it("should return outcomes in submission order regardless of completion order", async () => {
    const delays: Record<string, number> = { a: 300, b: 100, c: 200 };
    const { scheduler } = makeScheduler((request) => {
      const content = lastContent(request);
      return { text: content.toUpperCase(), delay: delays[content] };
    });

    const pending = scheduler.runAll([ask("a"), ask("b"), ask("c")]);
    await vi.advanceTimersByTimeAsync(300);
    const outcomes = await pending;

    expect(outcomes.map((outcome) => (outcome.status === "fulfilled" ? outcome.value.text : ""))).toEqual([
      "A",
      "B",
      "C",
    ]);
    expect(outcomes.map((outcome) => outcome.index)).toEqual([0, 1, 2]);
  });

  it("should keep at most `concurrency` invocations in flight", async () => {
    const { scheduler, provider } = makeScheduler(() => ({ text: "ok", delay: 100 }));

    const pending = scheduler.runAll([ask("1"), ask("2"), ask("3"), ask("4"), ask("5")], { concurrency: 2 });
    await vi.advanceTimersByTimeAsync(300);
    const outcomes = await pending;

    expect(statuses(outcomes)).toEqual(["fulfilled", "fulfilled", "fulfilled", "fulfilled", "fulfilled"]);
    expect(provider.requests.map((r) => r.receivedAt)).toEqual([0, 0, 100, 100, 200]);
  });

  it("should isolate a failing slot from its siblings", async () => {
    const { scheduler } = makeScheduler((request) =>
      lastContent(request) === "bad" ? { error: { kind: "fatal", message: "invalid request" } } : { text: "ok" }
    );

    const outcomes = await scheduler.runAll([ask("good"), ask("bad"), ask("good")]);

    expect(statuses(outcomes)).toEqual(["fulfilled", "rejected", "fulfilled"]);
    const failed = outcomes[1];
    expect(failed?.status === "rejected" && failed.error).toBeInstanceOf(FatalProviderError);
  });

  it("should stop a batch at its budget ceiling", async () => {
    const { scheduler, provider } = makeScheduler(() => ({ text: "ok" }));

    const outcomes = await scheduler.runAll([ask("1"), ask("2"), ask("3")], {
      budget: { name: "batch", ceilingUsd: "1.00" },
    });

    expect(statuses(outcomes)).toEqual(["fulfilled", "fulfilled", "rejected"]);
    const rejected = outcomes[2];
    expect(rejected?.status === "rejected" && rejected.error).toBeInstanceOf(BudgetExceededError);
    expect(provider.callCount).toBe(2);
    expect(summarizeBatch(outcomes)).toEqual({ total: 3, succeeded: 2, failed: 1, cost: usd(1) });
    expect(tracker.report()).toEqual({ root: 1, batch: 1 });
  });

  describe("fail-fast", () => {
    it("should skip queued items after a fatal error", async () => {
      const { scheduler, provider } = makeScheduler(() => ({ error: { kind: "fatal" } }));

      const outcomes = await scheduler.runAll([ask("1"), ask("2"), ask("3")], { concurrency: 1, failFast: true });

      expect(statuses(outcomes)).toEqual(["rejected", "rejected", "rejected"]);
      expect(outcomes.map((o) => (o.status === "rejected" ? o.error.constructor : undefined))).toEqual([
        FatalProviderError,
        CancelledError,
        CancelledError,
      ]);
      expect(provider.callCount).toBe(1);
    });

    it("should discard in-flight siblings when the budget rejects an item, keeping what they billed", async () => {
      const { scheduler, provider } = makeScheduler(() => ({ text: "slow", delay: 1000 }));

      const pending = scheduler.runAll([ask("1"), ask("2"), ask("3")], {
        failFast: true,
        budget: { name: "batch", ceilingUsd: 1 },
      });
      await vi.advanceTimersByTimeAsync(1000);
      const outcomes = await pending;

      expect(outcomes.map((o) => (o.status === "rejected" ? o.error.constructor : undefined))).toEqual([
        CancelledError,
        CancelledError,
        BudgetExceededError,
      ]);
      expect(provider.callCount).toBe(2);
      expect(tracker.report()).toEqual({ root: 1, batch: 1 });
    });

    describe("a call still in flight when the batch stops", () => {
      const handler: MockHandler = (request) =>
        lastContent(request) === "bad"
          ? { error: { kind: "fatal" }, delay: 10 }
          : { text: "slow answer", delay: 100 };

      it("should run to completion and keep its cost under the retain policy", async () => {
        const { scheduler, provider } = makeScheduler(handler);

        const pending = scheduler.runAll([ask("bad"), ask("slow")], { failFast: true });
        await vi.advanceTimersByTimeAsync(100);
        const outcomes = await pending;

        expect(outcomes.map((o) => (o.status === "rejected" ? o.error.constructor : undefined))).toEqual([
          FatalProviderError,
          CancelledError,
        ]);
        expect(provider.callCount).toBe(2);
        expect(tracker.report()).toEqual({ root: 0.5 });
      });

      it("should move its cost to discarded under the refund policy", async () => {
        const { scheduler } = makeScheduler(handler);

        const pending = scheduler.runAll([ask("bad"), ask("slow")], {
          failFast: true,
          cancelledCostPolicy: "refund",
        });
        await vi.advanceTimersByTimeAsync(100);
        await pending;

        expect(tracker.report()).toEqual({ root: 0 });
        expect(tracker.snapshot()[0]).toMatchObject({ committed: 0n, reserved: 0n, discarded: usd("0.5") });
      });
    });

    it("should keep going without fail-fast", async () => {
      const { scheduler, provider } = makeScheduler(() => ({ error: { kind: "fatal" } }));

      const outcomes = await scheduler.runAll([ask("1"), ask("2"), ask("3")], { concurrency: 1 });

      expect(statuses(outcomes)).toEqual(["rejected", "rejected", "rejected"]);
      expect(provider.callCount).toBe(3);
    });
  });

  it("should cancel every item when the caller's signal has already fired", async () => {
    const { scheduler, provider } = makeScheduler(() => ({ text: "ok" }));
    const controller = new AbortController();
    controller.abort();

    const outcomes = await scheduler.runAll([ask("1"), ask("2")], { signal: controller.signal });

    expect(outcomes.every((o) => o.status === "rejected" && o.error instanceof CancelledError)).toBe(true);
    expect(provider.callCount).toBe(0);
  });

  it("should return an empty list for an empty batch", async () => {
    const { scheduler } = makeScheduler(() => ({ text: "ok" }));

    await expect(scheduler.runAll([])).resolves.toEqual([]);
  });

  it("should reject a non-positive concurrency", async () => {
    const { scheduler } = makeScheduler(() => ({ text: "ok" }));

    await expect(scheduler.runAll([ask("1")], { concurrency: 0 })).rejects.toBeInstanceOf(RangeError);
  });
});
