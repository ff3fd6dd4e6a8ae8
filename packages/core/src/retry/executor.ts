// ============================================
// Retry Executor
// ============================================

import {
  classifyProviderError,
  createProviderError,
  type ErrorKind,
  type ModelSpec,
  type ProviderAdapter,
  ProviderError,
  type ProviderRequest,
  type RawResponse,
} from "@modelgate/provider";
import { ErrorCode } from "@modelgate/shared";
import { CONFIG_DEFAULTS } from "../config/defaults.js";
import {
  AttemptTimeoutError,
  abortableSleep,
  CancelledError,
  ExhaustedRetriesError,
  FatalProviderError,
  GatewayError,
  throwIfAborted,
  withTimeout,
} from "../errors/index.js";
import { type EventBus, retryAttempt, retryCompleted } from "../events/index.js";
import { createNullLogger, type Logger } from "../logger/index.js";
import type { RateLimiter, RatePermit } from "../rate-limit/index.js";
import { isValidRetryTransition } from "./state.js";
import type {
  ErrorClassifier,
  ExecuteOptions,
  RetryExecutorOptions,
  RetryOutcome,
  RetryPolicy,
} from "./types.js";

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({ ...CONFIG_DEFAULTS.retry });

type RetryState =
  | { phase: "pending" }
  | { phase: "waiting" }
  | { phase: "in_flight"; permit: RatePermit }
  | { phase: "retrying"; kind: ErrorKind; delayMs: number; reason: string }
  | { phase: "success"; response: RawResponse }
  | { phase: "fatal"; error: Error };

interface Call {
  readonly spec: ModelSpec;
  readonly adapter: ProviderAdapter;
  readonly request: ProviderRequest;
  readonly policy: RetryPolicy;
  readonly options: ExecuteOptions;
  /** Attempts dispatched */
  attempts: number;
  /** Attempts that count toward `maxAttempts` */
  counted: number;
  rateLimited: number;
  waitedMs: number;
}

/**
 * Runs one logical provider call with rate limiting and bounded retry.
 *
 * Each pass goes pending → waiting (rate limiter) → in_flight (adapter) and
 * ends in success, fatal, or retrying → pending. Rate-limited failures are
 * retried without spending the attempt allowance and wait for the vendor's
 * retry-after hint when it sends one; other retryable failures back off
 * exponentially with jitter until `maxAttempts` is used up.
 *
 * @example
 * ```typescript
 * const executor = new RetryExecutor({ limiter, events, logger });
 * const { response, attempts } = await executor.execute(spec, adapter, request, { signal });
 * ```
 */
export class RetryExecutor {
  private readonly limiter: RateLimiter;
  private readonly policy: RetryPolicy;
  private readonly classify: ErrorClassifier;
  private readonly events?: EventBus;
  private readonly logger: Logger;
  private readonly random: () => number;

  constructor(options: RetryExecutorOptions) {
    this.limiter = options.limiter;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.classify = options.classify ?? ((error) => classifyProviderError(error));
    this.events = options.events;
    this.logger = (options.logger ?? createNullLogger()).child({ component: "retry" });
    this.random = options.random ?? Math.random;
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * @throws FatalProviderError when the provider rejects the call outright
   * @throws ExhaustedRetriesError when every allowed attempt failed
   * @throws AttemptTimeoutError when the final attempt timed out
   * @throws CancelledError when the signal aborts at a suspend point
   * @throws RateLimitTimeoutError when capacity did not free up within `maxWaitMs`
   */
  async execute(
    spec: ModelSpec,
    adapter: ProviderAdapter,
    request: ProviderRequest,
    options: ExecuteOptions = {}
  ): Promise<RetryOutcome> {
    const call: Call = {
      spec,
      adapter,
      request,
      policy: { ...this.policy, ...options.policy },
      options,
      attempts: 0,
      counted: 0,
      rateLimited: 0,
      waitedMs: 0,
    };
    const startedAt = Date.now();
    let succeeded = false;
    let state: RetryState = { phase: "pending" };

    try {
      for (;;) {
        switch (state.phase) {
          case "pending":
            throwIfAborted(options.signal, "Call cancelled");
            state = this.transition(state, { phase: "waiting" });
            break;

          case "waiting": {
            const permit = await this.limiter.acquire(spec, {
              signal: options.signal,
              maxWaitMs: options.maxWaitMs,
            });
            call.waitedMs += permit.waitedMs;
            state = this.transition(state, { phase: "in_flight", permit });
            break;
          }

          case "in_flight":
            state = this.transition(state, await this.dispatch(call, state.permit));
            break;

          case "retrying":
            this.logger.warn("Retrying after failed attempt", {
              model: spec.id,
              attempt: call.attempts,
              kind: state.kind,
              delayMs: state.delayMs,
              reason: state.reason,
            });
            this.events?.emit(retryAttempt, {
              modelId: spec.id,
              attempt: call.attempts,
              kind: state.kind,
              delayMs: state.delayMs,
              reason: state.reason,
              timestamp: Date.now(),
            });
            await abortableSleep(state.delayMs, options.signal);
            state = this.transition(state, { phase: "pending" });
            break;

          case "success":
            succeeded = true;
            return {
              response: state.response,
              attempts: call.attempts,
              rateLimitedAttempts: call.rateLimited,
              waitedMs: call.waitedMs,
              durationMs: Date.now() - startedAt,
            };

          case "fatal":
            this.logger.debug("Call failed", { model: spec.id, attempts: call.attempts, error: state.error });
            throw state.error;
        }
      }
    } finally {
      this.events?.emit(retryCompleted, {
        modelId: spec.id,
        attempts: call.attempts,
        succeeded,
        durationMs: Date.now() - startedAt,
        timestamp: Date.now(),
      });
    }
  }

  /**
   * Delay before the next attempt after `failedAttempts` failures, jitter included.
   */
  backoffDelay(failedAttempts: number, policy: RetryPolicy = this.policy): number {
    const exponential = policy.baseDelayMs * policy.multiplier ** Math.max(0, failedAttempts - 1);
    const jitter = policy.jitterMinMs + this.random() * (policy.jitterMaxMs - policy.jitterMinMs);
    return Math.round(Math.min(exponential, policy.maxDelayMs) + jitter);
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async dispatch(call: Call, permit: RatePermit): Promise<RetryState> {
    const { signal } = call.options;
    if (signal?.aborted) {
      this.limiter.release(permit);
      throw new CancelledError("Call cancelled before dispatch", { cause: signal.reason });
    }

    call.attempts++;
    const attempt = call.attempts;
    const timeoutMs = call.policy.attemptTimeoutMs;
    this.logger.debug("Dispatching request", { model: call.spec.id, attempt });

    try {
      const response = await withTimeout(
        (attemptSignal) => call.adapter.send(call.request, { signal: attemptSignal }),
        timeoutMs,
        { signal, onTimeout: () => new AttemptTimeoutError(call.spec.id, attempt, timeoutMs) }
      );
      return { phase: "success", response };
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      return this.onFailure(call, error);
    }
  }

  private onFailure(call: Call, error: unknown): RetryState {
    const { policy, spec } = call;

    if (error instanceof AttemptTimeoutError) {
      call.counted++;
      if (call.counted >= policy.maxAttempts) {
        return { phase: "fatal", error };
      }
      return {
        phase: "retrying",
        kind: "retryable",
        delayMs: this.backoffDelay(call.attempts, policy),
        reason: error.message,
      };
    }

    const providerError =
      error instanceof ProviderError
        ? error
        : createProviderError(error, { provider: call.adapter.provider, model: call.request.model });
    const { kind, retryAfterMs } = this.classify(error);
    this.chargeFailure(call, providerError);

    switch (kind) {
      case "fatal":
        return { phase: "fatal", error: new FatalProviderError(spec.id, providerError, call.attempts) };

      case "rate-limited": {
        call.rateLimited++;
        const cap = policy.maxRateLimitRetries;
        if (cap !== undefined && call.rateLimited > cap) {
          return { phase: "fatal", error: new ExhaustedRetriesError(spec.id, call.attempts, providerError) };
        }
        return {
          phase: "retrying",
          kind,
          delayMs: retryAfterMs ?? this.backoffDelay(call.attempts, policy),
          reason: providerError.message,
        };
      }

      case "retryable":
        call.counted++;
        if (call.counted >= policy.maxAttempts) {
          return { phase: "fatal", error: new ExhaustedRetriesError(spec.id, call.attempts, providerError) };
        }
        return {
          phase: "retrying",
          kind,
          delayMs: this.backoffDelay(call.attempts, policy),
          reason: providerError.message,
        };
    }
  }

  private chargeFailure(call: Call, error: ProviderError): void {
    if (call.spec.billFailedRequests && error.billedUsage) {
      call.options.onBilledFailure?.(error.billedUsage, error);
    }
  }

  private transition(from: RetryState, to: RetryState): RetryState {
    if (!isValidRetryTransition(from.phase, to.phase)) {
      throw new GatewayError(`Invalid retry transition ${from.phase} -> ${to.phase}`, ErrorCode.INTERNAL_ERROR);
    }
    return to;
  }
}

/**
 * Create a retry executor bound to a rate limiter.
 */
export function createRetryExecutor(options: RetryExecutorOptions): RetryExecutor {
  return new RetryExecutor(options);
}
