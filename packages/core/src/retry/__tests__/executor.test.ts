import {
  defineModelSpec,
  type MockResponse,
  MockProvider,
  type ModelSpec,
  type ProviderRequest,
} from "@modelgate/provider";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  AttemptTimeoutError,
  CancelledError,
  ExhaustedRetriesError,
  FatalProviderError,
} from "../../errors/index.js";
import { EventBus, retryAttempt, retryCompleted } from "../../events/index.js";
import { RateLimiter } from "../../rate-limit/index.js";
import { RetryExecutor } from "../executor.js";
import { isTerminalRetryPhase, isValidRetryTransition } from "../state.js";

function makeSpec(overrides: { billFailedRequests?: boolean } = {}): ModelSpec {
  return defineModelSpec({
    id: "mock/retry",
    provider: "mock",
    providerModel: "retry",
    pricing: { inputPerMillion: 1, outputPerMillion: 2 },
    rateLimit: { kind: "token-bucket", capacity: 100, refillPerSecond: 100 },
    ...overrides,
  });
}

const request: ProviderRequest = {
  model: "retry",
  messages: [{ role: "user", content: "hello" }],
};

const retryable: MockResponse = { error: { kind: "retryable", message: "upstream unavailable" } };

describe("RetryExecutor", () => {
  let limiter: RateLimiter;
  let events: EventBus;
  let executor: RetryExecutor;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    limiter = new RateLimiter();
    events = new EventBus();
    executor = new RetryExecutor({
      limiter,
      events,
      policy: { maxAttempts: 3, baseDelayMs: 100, multiplier: 2, jitterMinMs: 0, jitterMaxMs: 0 },
    });
  });

  afterEach(() => {
    limiter.dispose();
  });

  it("should return the first successful response", async () => {
    const provider = new MockProvider({ responses: [{ text: "hi" }] });

    const outcome = await executor.execute(makeSpec(), provider, request);

    expect(outcome.response.text).toBe("hi");
    expect(outcome.attempts).toBe(1);
    expect(outcome.rateLimitedAttempts).toBe(0);
  });

  it("should back off exponentially between retryable failures", async () => {
    const provider = new MockProvider({ responses: [retryable, retryable, { text: "ok" }] });
    const delays: number[] = [];
    events.on(retryAttempt, (event) => delays.push(event.delayMs));

    const pending = executor.execute(makeSpec(), provider, request);
    await vi.advanceTimersByTimeAsync(300);
    const outcome = await pending;

    expect(outcome.attempts).toBe(3);
    expect(delays).toEqual([100, 200]);
    expect(provider.requests.map((r) => r.receivedAt)).toEqual([0, 100, 300]);
  });

  it("should cap the backoff at maxDelayMs and add jitter from the configured range", () => {
    const jittered = new RetryExecutor({
      limiter,
      random: () => 0.5,
      policy: { baseDelayMs: 1000, multiplier: 10, maxDelayMs: 5000, jitterMinMs: 100, jitterMaxMs: 300 },
    });

    expect(jittered.backoffDelay(1)).toBe(1200);
    expect(jittered.backoffDelay(2)).toBe(5200);
  });

  it("should surface ExhaustedRetriesError when retryable failures use up maxAttempts", async () => {
    const provider = new MockProvider({ responses: [retryable] });

    const pending = executor.execute(makeSpec(), provider, request);
    const assertion = expect(pending).rejects.toMatchObject({ name: "ExhaustedRetriesError", attempts: 3 });
    await vi.advanceTimersByTimeAsync(300);
    await assertion;

    expect(provider.callCount).toBe(3);
    await expect(pending).rejects.toBeInstanceOf(ExhaustedRetriesError);
  });

  it("should never retry a fatal failure", async () => {
    const provider = new MockProvider({
      responses: [{ error: { kind: "fatal", statusCode: 401, message: "bad key" } }, { text: "unreachable" }],
    });
    const completed = vi.fn();
    events.on(retryCompleted, completed);

    const error = await executor.execute(makeSpec(), provider, request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FatalProviderError);
    expect(error).toMatchObject({ attempts: 1 });
    expect(provider.callCount).toBe(1);
    expect(completed).toHaveBeenCalledWith(expect.objectContaining({ attempts: 1, succeeded: false }));
  });

  it("should wait for the retry-after hint before retrying a rate-limited call", async () => {
    const provider = new MockProvider({
      responses: [{ error: { kind: "rate-limited", retryAfterMs: 2000 } }, { text: "done" }],
    });

    const pending = executor.execute(makeSpec(), provider, request);
    await vi.advanceTimersByTimeAsync(1999);
    expect(provider.callCount).toBe(1);

    await vi.advanceTimersByTimeAsync(1);
    const outcome = await pending;

    expect(provider.callCount).toBe(2);
    expect(outcome.attempts).toBe(2);
    expect(outcome.rateLimitedAttempts).toBe(1);
  });

  it("should not count rate-limited failures against maxAttempts", async () => {
    const rateLimited: MockResponse = { error: { kind: "rate-limited", retryAfterMs: 10 } };
    const provider = new MockProvider({ responses: [rateLimited, rateLimited, { text: "through" }] });

    const pending = executor.execute(makeSpec(), provider, request, { policy: { maxAttempts: 1 } });
    await vi.advanceTimersByTimeAsync(20);
    const outcome = await pending;

    expect(outcome.response.text).toBe("through");
    expect(outcome.attempts).toBe(3);
  });

  it("should stop rate-limited retries at maxRateLimitRetries when set", async () => {
    const provider = new MockProvider({ responses: [{ error: { kind: "rate-limited", retryAfterMs: 10 } }] });

    const pending = executor.execute(makeSpec(), provider, request, { policy: { maxRateLimitRetries: 1 } });
    const assertion = expect(pending).rejects.toMatchObject({ name: "ExhaustedRetriesError", attempts: 2 });
    await vi.advanceTimersByTimeAsync(10);
    await assertion;
  });

  it("should retry a timed-out attempt and fail with AttemptTimeoutError on the last one", async () => {
    const provider = new MockProvider({ responses: [{ text: "late", delay: 5000 }] });

    const pending = executor.execute(makeSpec(), provider, request, {
      policy: { maxAttempts: 2, attemptTimeoutMs: 1000 },
    });
    const assertion = expect(pending).rejects.toMatchObject({ name: "AttemptTimeoutError", attempt: 2 });
    await vi.advanceTimersByTimeAsync(2100);
    await assertion;

    expect(provider.requests.map((r) => r.receivedAt)).toEqual([0, 1100]);
    await expect(pending).rejects.toBeInstanceOf(AttemptTimeoutError);
  });

  it("should abandon the call when cancelled during backoff", async () => {
    const provider = new MockProvider({ responses: [retryable, { text: "never" }] });
    const controller = new AbortController();

    const pending = executor.execute(makeSpec(), provider, request, { signal: controller.signal });
    const assertion = expect(pending).rejects.toBeInstanceOf(CancelledError);
    await vi.advanceTimersByTimeAsync(50);
    controller.abort();
    await assertion;

    expect(provider.callCount).toBe(1);
  });

  it("should let an attempt already sent finish when cancelled", async () => {
    const provider = new MockProvider({ responses: [{ text: "late", delay: 100 }] });
    const controller = new AbortController();

    const pending = executor.execute(makeSpec(), provider, request, { signal: controller.signal });
    await vi.advanceTimersByTimeAsync(50);
    controller.abort();
    await vi.advanceTimersByTimeAsync(50);
    const outcome = await pending;

    expect(outcome.response.text).toBe("late");
    expect(outcome.attempts).toBe(1);
  });

  it("should report billed usage of failed attempts only for models that bill them", async () => {
    const billed: MockResponse = {
      error: { kind: "retryable", billedUsage: { inputTokens: 10, outputTokens: 0 } },
    };
    const onBilledFailure = vi.fn();

    const billing = new MockProvider({ responses: [billed, { text: "ok" }] });
    const first = executor.execute(makeSpec({ billFailedRequests: true }), billing, request, { onBilledFailure });
    await vi.advanceTimersByTimeAsync(100);
    await first;

    const free = new MockProvider({ responses: [billed, { text: "ok" }] });
    const second = executor.execute(makeSpec(), free, request, { onBilledFailure });
    await vi.advanceTimersByTimeAsync(100);
    await second;

    expect(onBilledFailure).toHaveBeenCalledTimes(1);
    expect(onBilledFailure).toHaveBeenCalledWith({ inputTokens: 10, outputTokens: 0 }, expect.any(Error));
  });
});

describe("retry state machine", () => {
  it("should allow only forward transitions", () => {
    expect(isValidRetryTransition("pending", "waiting")).toBe(true);
    expect(isValidRetryTransition("in_flight", "retrying")).toBe(true);
    expect(isValidRetryTransition("retrying", "in_flight")).toBe(false);
    expect(isValidRetryTransition("success", "pending")).toBe(false);
  });

  it("should treat success and fatal as terminal", () => {
    expect(isTerminalRetryPhase("success")).toBe(true);
    expect(isTerminalRetryPhase("fatal")).toBe(true);
    expect(isTerminalRetryPhase("retrying")).toBe(false);
  });
});
