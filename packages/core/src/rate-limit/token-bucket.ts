// ============================================
// Token Bucket Algorithm
// ============================================

import type { CapacityCounter } from "./types.js";

export interface TokenBucketConfig {
  /** Maximum tokens in bucket (burst size) */
  readonly capacity: number;
  /** Tokens added per second */
  readonly refillPerSecond: number;
  /** Initial token count (defaults to capacity) */
  readonly initialTokens?: number;
}

/**
 * Token bucket with lazy refill: tokens are topped up from elapsed time
 * whenever the bucket is consulted, so no timer runs while it is idle.
 *
 * @example
 * ```typescript
 * const bucket = new TokenBucket({ capacity: 10, refillPerSecond: 5 }, Date.now());
 * if (!bucket.tryConsume(Date.now())) {
 *   console.log(`retry in ${bucket.waitTimeMs(Date.now())}ms`);
 * }
 * ```
 */
export class TokenBucket implements CapacityCounter {
  readonly capacity: number;
  private readonly refillPerMs: number;
  private tokens: number;
  private lastRefillTime: number;

  constructor(config: TokenBucketConfig, now: number) {
    if (config.capacity <= 0) {
      throw new RangeError("TokenBucket capacity must be positive");
    }
    if (config.refillPerSecond <= 0) {
      throw new RangeError("TokenBucket refillPerSecond must be positive");
    }

    this.capacity = config.capacity;
    this.refillPerMs = config.refillPerSecond / 1000;
    this.tokens = Math.min(config.initialTokens ?? config.capacity, config.capacity);
    this.lastRefillTime = now;
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  tryConsume(now: number): boolean {
    this.refill(now);
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  waitTimeMs(now: number): number {
    this.refill(now);
    if (this.tokens >= 1) {
      return 0;
    }
    return Math.ceil((1 - this.tokens) / this.refillPerMs);
  }

  refund(_grantedAt: number, now: number): void {
    this.refill(now);
    this.tokens = Math.min(this.capacity, this.tokens + 1);
  }

  available(now: number): number {
    this.refill(now);
    return Math.floor(this.tokens);
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private refill(now: number): void {
    const elapsed = now - this.lastRefillTime;
    if (elapsed <= 0) return;

    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillPerMs);
    this.lastRefillTime = now;
  }
}
