// ============================================
// Rate Limiting Type Definitions
// ============================================

import type { EventBus } from "../events/index.js";
import type { Logger } from "../logger/index.js";

// =============================================================================
// Capacity Counters
// =============================================================================

/**
 * Admission state for one model. Implementations take the current time as an
 * argument so the limiter owns the clock.
 */
export interface CapacityCounter {
  /** Take one unit of capacity if available */
  tryConsume(now: number): boolean;
  /** Milliseconds until one unit could be available (0 if available now) */
  waitTimeMs(now: number): number;
  /** Return a unit granted at `grantedAt` that was never used */
  refund(grantedAt: number, now: number): void;
  /** Units available right now */
  available(now: number): number;
  /** Maximum units per window or burst */
  readonly capacity: number;
}

// =============================================================================
// Permits
// =============================================================================

/**
 * Proof of admission for one dispatch
 */
export interface RatePermit {
  readonly id: string;
  readonly modelId: string;
  /** Epoch ms at which capacity was granted */
  readonly grantedAt: number;
  /** Time spent queued before the grant */
  readonly waitedMs: number;
}

export interface AcquireOptions {
  /** Abandon the wait when aborted (rejects with CancelledError) */
  signal?: AbortSignal;
  /** Overrides the limiter-wide `maxWaitMs` for this acquisition */
  maxWaitMs?: number;
}

// =============================================================================
// Rate Limiter Types
// =============================================================================

export interface RateLimiterOptions {
  /** Give up waiting after this long (rejects with RateLimitTimeoutError); unset waits indefinitely */
  maxWaitMs?: number;
  events?: EventBus;
  logger?: Logger;
}

/**
 * Per-model statistics snapshot
 */
export interface ModelLimiterStats {
  readonly modelId: string;
  readonly capacity: number;
  readonly available: number;
  readonly queued: number;
  readonly granted: number;
  readonly throttled: number;
  readonly refunded: number;
  readonly timedOut: number;
}
