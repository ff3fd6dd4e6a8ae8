import {
  defineModelSpec,
  MockProvider,
  type MockResponse,
  ModelRegistry,
  type ModelSpecInput,
  ProviderRegistry,
} from "@modelgate/provider";
import { usd } from "@modelgate/shared";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { CostTracker } from "../../cost/index.js";
import {
  BudgetExceededError,
  CancelledError,
  FatalProviderError,
  ParseExhaustedError,
  UnknownModelError,
} from "../../errors/index.js";
import { RateLimiter } from "../../rate-limit/index.js";
import { RetryExecutor } from "../../retry/index.js";
import { ModelInvoker } from "../invoker.js";

const FLAT_RATE: ModelSpecInput = {
  id: "mock/flat",
  provider: "mock",
  providerModel: "flat-v1",
  aliases: ["flat"],
  pricing: { inputPerMillion: 0, outputPerMillion: 0, perCall: "0.5" },
  rateLimit: { kind: "token-bucket", capacity: 100, refillPerSecond: 100 },
};

const PER_TOKEN: ModelSpecInput = {
  id: "mock/metered",
  provider: "mock",
  providerModel: "metered-v1",
  pricing: { inputPerMillion: 10, outputPerMillion: 0 },
  rateLimit: { kind: "token-bucket", capacity: 100, refillPerSecond: 100 },
};

const REASONING: ModelSpecInput = {
  id: "mock/reasoning",
  provider: "mock",
  providerModel: "reasoning-v1",
  pricing: { inputPerMillion: "1.10", outputPerMillion: "4.40" },
  rateLimit: { kind: "token-bucket", capacity: 100, refillPerSecond: 100 },
  maxOutputTokens: 100_000,
};

const question = [{ role: "user" as const, content: "hello" }];

describe("ModelInvoker", () => {
  let limiter: RateLimiter;
  let tracker: CostTracker;
  let registry: ModelRegistry;

  function makeInvoker(provider: MockProvider): ModelInvoker {
    return new ModelInvoker({
      registry,
      providers: new ProviderRegistry({ adapters: { mock: provider } }),
      retry: new RetryExecutor({
        limiter,
        policy: { maxAttempts: 3, baseDelayMs: 100, multiplier: 2, jitterMinMs: 0, jitterMaxMs: 0 },
      }),
      tracker,
    });
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    limiter = new RateLimiter();
    tracker = new CostTracker();
    registry = new ModelRegistry();
    registry.registerAll([FLAT_RATE, PER_TOKEN, REASONING]);
  });

  afterEach(() => {
    limiter.dispose();
    vi.useRealTimers();
  });

  it("should send the vendor model name and charge the billed cost", async () => {
    const provider = new MockProvider({ responses: [{ text: "hi there" }] });
    const invoker = makeInvoker(provider);

    const result = await invoker.invoke({ model: "flat", messages: question, params: { temperature: 0.2 } });

    expect(result.modelId).toBe("mock/flat");
    expect(result.text).toBe("hi there");
    expect(result.cost).toBe(usd("0.5"));
    expect(result.attempts).toBe(1);
    expect(result.parseAttempts).toBe(1);
    expect(result.requestId).toBe("mock-1");
    expect(result.budgetViolation).toBeUndefined();

    const sent = provider.requests[0]?.request;
    expect(sent?.model).toBe("flat-v1");
    expect(sent?.temperature).toBe(0.2);
    expect(sent?.maxOutputTokens).toBe(4096);
    expect(tracker.report()).toEqual({ root: 0.5 });
  });

  it("should accept a model spec instead of a name", async () => {
    const provider = new MockProvider({ responses: [{ text: "ok" }] });
    const invoker = makeInvoker(provider);

    const result = await invoker.invoke({ model: defineModelSpec(FLAT_RATE), messages: question });

    expect(result.modelId).toBe("mock/flat");
  });

  it("should reject an unknown model without dispatching", async () => {
    const provider = new MockProvider({ responses: [{ text: "ok" }] });
    const invoker = makeInvoker(provider);

    await expect(invoker.invoke({ model: "mock/missing", messages: question })).rejects.toBeInstanceOf(
      UnknownModelError
    );
    expect(provider.callCount).toBe(0);
  });

  it("should refuse a request whose estimate exceeds its own ceiling", async () => {
    const provider = new MockProvider({ responses: [{ text: "ok" }] });
    const invoker = makeInvoker(provider);

    await expect(
      invoker.invoke({ model: "flat", messages: question, ceilingUsd: 0.4 })
    ).rejects.toBeInstanceOf(BudgetExceededError);
    expect(provider.callCount).toBe(0);
    expect(tracker.report()).toEqual({ root: 0 });
  });

  it("should admit concurrent short calls under a ceiling their output caps would exceed", async () => {
    const provider = new MockProvider({
      responses: [{ text: "short", usage: { inputTokens: 20, outputTokens: 20 }, delay: 100 }],
    });
    const invoker = makeInvoker(provider);
    const stack = tracker.open("question", usd(1));

    const pending = Promise.all(
      ["a", "b", "c"].map((content) =>
        invoker.invoke({ model: "mock/reasoning", messages: [{ role: "user", content }] }, { budget: stack })
      )
    );
    await vi.advanceTimersByTimeAsync(100);
    const results = await pending;

    expect(provider.callCount).toBe(3);
    expect(results.map((result) => result.cost)).toEqual([usd("0.00011"), usd("0.00011"), usd("0.00011")]);
    expect(tracker.report()).toEqual({ root: 0.00033, question: 0.00033 });
  });

  it("should price the caller's expected reply length into the reservation", async () => {
    const provider = new MockProvider({ responses: [{ text: "ok" }] });
    const invoker = makeInvoker(provider);

    await expect(
      invoker.invoke({ model: "mock/reasoning", messages: question, ceilingUsd: "0.1", expectedOutputTokens: 50_000 })
    ).rejects.toBeInstanceOf(BudgetExceededError);
    expect(provider.callCount).toBe(0);
  });

  it("should report a violation when billed usage outruns the estimate", async () => {
    const provider = new MockProvider({
      responses: [{ text: "long", usage: { inputTokens: 100_000, outputTokens: 0 } }],
    });
    const invoker = makeInvoker(provider);
    const stack = tracker.open("question", usd("0.5"));

    const result = await invoker.invoke(
      { model: "mock/metered", messages: question, params: { maxOutputTokens: 1 } },
      { budget: stack }
    );

    expect(result.cost).toBe(usd(1));
    expect(result.budgetViolation).toEqual({
      budget: "question",
      ceiling: usd("0.5"),
      committed: usd(1),
      overBy: usd("0.5"),
    });
    expect(tracker.report()).toEqual({ root: 1, question: 1 });
  });

  it("should decode a structured reply, charging every correction round", async () => {
    const provider = new MockProvider({
      responses: [
        { text: "I think it is likely." },
        { text: '{"probability": "high"}' },
        { text: 'Sure: {"probability": 0.7}' },
      ],
    });
    const invoker = makeInvoker(provider);
    const Forecast = z.object({ probability: z.number().min(0).max(1) });

    const result = await invoker.invoke({ model: "flat", messages: question, schema: Forecast });

    expect(result.parsed).toEqual({ probability: 0.7 });
    expect(result.text).toBe('Sure: {"probability": 0.7}');
    expect(result.parseAttempts).toBe(3);
    expect(result.attempts).toBe(3);
    expect(result.cost).toBe(usd("1.5"));
    expect(result.usage).toEqual({ inputTokens: 300, outputTokens: 150 });
    expect(provider.requests.map((r) => r.request.messages.length)).toEqual([2, 4, 6]);
    expect(tracker.report()).toEqual({ root: 1.5 });
  });

  it("should still charge replies that never decoded", async () => {
    const provider = new MockProvider({ responses: [{ text: "no idea" }] });
    const invoker = makeInvoker(provider);

    await expect(
      invoker.invoke({ model: "flat", messages: question, schema: z.object({ ok: z.boolean() }), maxParseAttempts: 2 })
    ).rejects.toBeInstanceOf(ParseExhaustedError);
    expect(provider.callCount).toBe(2);
    expect(tracker.report()).toEqual({ root: 1 });
  });

  it("should charge billed failures even when the call fails", async () => {
    const provider = new MockProvider({
      responses: [{ error: { kind: "fatal", billedUsage: { inputTokens: 10, outputTokens: 0 } } }],
    });
    const invoker = makeInvoker(provider);

    await expect(
      invoker.invoke({ model: { ...defineModelSpec(FLAT_RATE), billFailedRequests: true }, messages: question })
    ).rejects.toBeInstanceOf(FatalProviderError);
    expect(tracker.report()).toEqual({ root: 0.5 });
  });

  it("should release the reservation when a call fails without billing", async () => {
    const provider = new MockProvider({ responses: [{ error: { kind: "fatal" } }] });
    const invoker = makeInvoker(provider);

    await expect(invoker.invoke({ model: "flat", messages: question })).rejects.toBeInstanceOf(
      FatalProviderError
    );
    expect(tracker.snapshot()[0]).toMatchObject({ committed: 0n, reserved: 0n });
  });

  describe("cancellation", () => {
    const billedThenOk: MockResponse[] = [
      { error: { kind: "rate-limited", retryAfterMs: 1000, billedUsage: { inputTokens: 10, outputTokens: 0 } } },
      { text: "late" },
    ];
    const billedModel = { ...defineModelSpec(FLAT_RATE), billFailedRequests: true };

    it("should retain billed spend of a cancelled call by default", async () => {
      const provider = new MockProvider({ responses: billedThenOk });
      const invoker = makeInvoker(provider);
      const controller = new AbortController();

      const pending = invoker.invoke({ model: billedModel, messages: question }, { signal: controller.signal });
      const assertion = expect(pending).rejects.toBeInstanceOf(CancelledError);
      await vi.advanceTimersByTimeAsync(500);
      controller.abort();
      await assertion;

      expect(provider.callCount).toBe(1);
      expect(tracker.report()).toEqual({ root: 0.5 });
    });

    it("should move billed spend to discarded under the refund policy", async () => {
      const provider = new MockProvider({ responses: billedThenOk });
      const invoker = makeInvoker(provider);
      const controller = new AbortController();

      const pending = invoker.invoke(
        { model: billedModel, messages: question },
        { signal: controller.signal, cancelledCostPolicy: "refund" }
      );
      const assertion = expect(pending).rejects.toBeInstanceOf(CancelledError);
      await vi.advanceTimersByTimeAsync(500);
      controller.abort();
      await assertion;

      expect(tracker.report()).toEqual({ root: 0 });
      expect(tracker.snapshot()[0]).toMatchObject({ committed: 0n, reserved: 0n, discarded: usd("0.5") });
    });
  });
});
