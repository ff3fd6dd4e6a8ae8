// ============================================
// Fixed Window Counter
// ============================================

import type { CapacityCounter } from "./types.js";

export interface FixedWindowConfig {
  /** Requests admitted per window */
  readonly limit: number;
  /** Window length in milliseconds */
  readonly windowMs: number;
}

/**
 * Admits at most `limit` requests per window. Windows are aligned to
 * multiples of `windowMs` since the epoch, so every caller agrees on the
 * window boundaries.
 */
export class FixedWindowCounter implements CapacityCounter {
  private readonly windowMs: number;
  private windowIndex = Number.NEGATIVE_INFINITY;
  private used = 0;

  constructor(private readonly config: FixedWindowConfig) {
    if (config.limit <= 0) {
      throw new RangeError("FixedWindowCounter limit must be positive");
    }
    if (config.windowMs <= 0) {
      throw new RangeError("FixedWindowCounter windowMs must be positive");
    }
    this.windowMs = config.windowMs;
  }

  get capacity(): number {
    return this.config.limit;
  }

  tryConsume(now: number): boolean {
    this.roll(now);
    if (this.used < this.config.limit) {
      this.used += 1;
      return true;
    }
    return false;
  }

  waitTimeMs(now: number): number {
    this.roll(now);
    if (this.used < this.config.limit) {
      return 0;
    }
    return (this.windowIndex + 1) * this.windowMs - now;
  }

  /**
   * Only a grant from the current window is returned; an older window's
   * count has already been discarded.
   */
  refund(grantedAt: number, now: number): void {
    this.roll(now);
    if (this.indexOf(grantedAt) === this.windowIndex && this.used > 0) {
      this.used -= 1;
    }
  }

  available(now: number): number {
    this.roll(now);
    return this.config.limit - this.used;
  }

  private roll(now: number): void {
    const index = this.indexOf(now);
    if (index !== this.windowIndex) {
      this.windowIndex = index;
      this.used = 0;
    }
  }

  private indexOf(time: number): number {
    return Math.floor(time / this.windowMs);
  }
}
