// ============================================
// Retry Types
// ============================================

import type { ErrorClassification, ProviderError, RawResponse } from "@modelgate/provider";
import type { TokenUsage } from "@modelgate/shared";
import type { EventBus } from "../events/index.js";
import type { Logger } from "../logger/index.js";
import type { RateLimiter } from "../rate-limit/index.js";

/**
 * Backoff and attempt limits for one logical call.
 */
export interface RetryPolicy {
  /** Attempts allowed for retryable failures; rate-limited attempts are not counted */
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  jitterMinMs: number;
  jitterMaxMs: number;
  /** Cap on rate-limited retries; unset retries them indefinitely */
  maxRateLimitRetries?: number;
  /** Per-attempt timeout */
  attemptTimeoutMs: number;
}

/**
 * Maps a thrown value to the kind that drives the retry decision.
 */
export type ErrorClassifier = (error: unknown) => ErrorClassification;

export interface RetryExecutorOptions {
  limiter: RateLimiter;
  policy?: Partial<RetryPolicy>;
  classify?: ErrorClassifier;
  events?: EventBus;
  logger?: Logger;
  /** Uniform source in [0, 1) for jitter */
  random?: () => number;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Overrides applied on top of the executor's policy */
  policy?: Partial<RetryPolicy>;
  /** Overrides the limiter's wait ceiling for this call */
  maxWaitMs?: number;
  /**
   * Receives the usage a failed attempt was billed for. Only called for
   * models that bill failed requests.
   */
  onBilledFailure?: (usage: TokenUsage, error: ProviderError) => void;
}

export interface RetryOutcome {
  response: RawResponse;
  /** Attempts dispatched to the provider, the successful one included */
  attempts: number;
  /** How many of those failed as rate-limited */
  rateLimitedAttempts: number;
  /** Time spent waiting for rate-limit capacity */
  waitedMs: number;
  durationMs: number;
}
