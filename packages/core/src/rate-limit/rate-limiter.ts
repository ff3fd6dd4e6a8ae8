// ============================================
// Rate Limiter Service
// ============================================

import type { ModelSpec, RateLimitPolicy } from "@modelgate/provider";
import { createId } from "@modelgate/shared";
import { CancelledError, RateLimitTimeoutError, throwIfAborted } from "../errors/index.js";
import { type EventBus, rateLimitThrottle, rateLimitTimeout } from "../events/index.js";
import { createNullLogger, type Logger } from "../logger/index.js";
import { FixedWindowCounter } from "./fixed-window.js";
import { TokenBucket } from "./token-bucket.js";
import type {
  AcquireOptions,
  CapacityCounter,
  ModelLimiterStats,
  RateLimiterOptions,
  RatePermit,
} from "./types.js";

// =============================================================================
// Internal State
// =============================================================================

interface Waiter {
  grant(now: number): void;
  fail(error: Error): void;
}

interface ModelEntry {
  readonly modelId: string;
  readonly counter: CapacityCounter;
  readonly queue: Waiter[];
  timer: ReturnType<typeof setTimeout> | null;
  granted: number;
  throttled: number;
  refunded: number;
  timedOut: number;
}

/**
 * Build the capacity counter for a model's rate policy.
 */
export function createCapacityCounter(policy: RateLimitPolicy, now: number): CapacityCounter {
  switch (policy.kind) {
    case "token-bucket":
      return new TokenBucket(
        { capacity: policy.capacity, refillPerSecond: policy.refillPerSecond },
        now
      );
    case "fixed-window":
      return new FixedWindowCounter({ limit: policy.limit, windowMs: policy.windowMs });
  }
}

// =============================================================================
// RateLimiter Class
// =============================================================================

/**
 * Per-model admission control shared by every caller in the process.
 *
 * Each model gets its own counter (token bucket or fixed window, from the
 * spec's rate policy) and its own FIFO queue of waiters, so contention on one
 * model never delays another. Waiters are woken by a single timer per model
 * set to the moment the next unit of capacity appears.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({ events, logger });
 *
 * const permit = await limiter.acquire(spec, { signal });
 * try {
 *   await adapter.send(request);
 * } catch (error) {
 *   // the request never left: give the capacity back
 *   limiter.release(permit);
 * }
 * ```
 */
export class RateLimiter {
  private readonly entries = new Map<string, ModelEntry>();
  private readonly issued = new WeakMap<RatePermit, ModelEntry>();
  private readonly released = new WeakSet<RatePermit>();
  private readonly maxWaitMs: number | undefined;
  private readonly events?: EventBus;
  private readonly logger: Logger;
  private disposed = false;

  constructor(options: RateLimiterOptions = {}) {
    this.maxWaitMs = options.maxWaitMs;
    this.events = options.events;
    this.logger = (options.logger ?? createNullLogger()).child({ component: "rate-limit" });
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Wait until `spec`'s model has capacity, then take one unit.
   *
   * @throws CancelledError if the signal aborts while waiting
   * @throws RateLimitTimeoutError if the wait exceeds `maxWaitMs`
   */
  async acquire(spec: ModelSpec, options: AcquireOptions = {}): Promise<RatePermit> {
    this.ensureNotDisposed();
    throwIfAborted(options.signal, "Rate limit acquisition cancelled");

    const entry = this.getOrCreateEntry(spec);
    const now = Date.now();

    if (entry.queue.length === 0 && entry.counter.tryConsume(now)) {
      return this.issue(entry, now, 0);
    }

    return this.enqueue(entry, now, options);
  }

  /**
   * Return a permit's capacity. Only meaningful for a call that was never
   * dispatched; releasing twice is a no-op.
   *
   * @returns whether capacity was returned
   */
  release(permit: RatePermit): boolean {
    const entry = this.issued.get(permit);
    if (!entry || this.released.has(permit) || this.disposed) {
      return false;
    }
    this.released.add(permit);
    entry.counter.refund(permit.grantedAt, Date.now());
    entry.refunded++;
    this.pump(entry);
    return true;
  }

  getStats(modelId: string): ModelLimiterStats | undefined {
    const entry = this.entries.get(modelId);
    if (!entry) {
      return undefined;
    }
    return {
      modelId,
      capacity: entry.counter.capacity,
      available: entry.counter.available(Date.now()),
      queued: entry.queue.length,
      granted: entry.granted,
      throttled: entry.throttled,
      refunded: entry.refunded,
      timedOut: entry.timedOut,
    };
  }

  getAllStats(): ModelLimiterStats[] {
    const stats: ModelLimiterStats[] = [];
    for (const modelId of this.entries.keys()) {
      const entry = this.getStats(modelId);
      if (entry) stats.push(entry);
    }
    return stats;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Stop all timers and reject every queued waiter with CancelledError.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    for (const entry of this.entries.values()) {
      if (entry.timer) {
        clearTimeout(entry.timer);
        entry.timer = null;
      }
      for (const waiter of entry.queue.splice(0)) {
        waiter.fail(new CancelledError("Rate limiter disposed"));
      }
    }
    this.entries.clear();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private enqueue(entry: ModelEntry, now: number, options: AcquireOptions): Promise<RatePermit> {
    const { signal } = options;
    const maxWaitMs = options.maxWaitMs ?? this.maxWaitMs;
    const estimatedWaitMs = entry.counter.waitTimeMs(now);

    entry.throttled++;
    this.logger.debug("Waiting for rate limit capacity", {
      model: entry.modelId,
      estimatedWaitMs,
      queued: entry.queue.length + 1,
    });
    this.events?.emit(rateLimitThrottle, {
      modelId: entry.modelId,
      waitMs: estimatedWaitMs,
      queued: entry.queue.length + 1,
      timestamp: now,
    });

    return new Promise<RatePermit>((resolve, reject) => {
      let deadline: ReturnType<typeof setTimeout> | undefined;

      const cleanup = (): void => {
        if (deadline !== undefined) clearTimeout(deadline);
        signal?.removeEventListener("abort", onAbort);
      };

      const waiter: Waiter = {
        grant: (grantedAt) => {
          cleanup();
          resolve(this.issue(entry, grantedAt, grantedAt - now));
        },
        fail: (error) => {
          cleanup();
          reject(error);
        },
      };

      const onAbort = (): void => {
        this.dequeue(entry, waiter);
        waiter.fail(new CancelledError("Rate limit acquisition cancelled", { cause: signal?.reason }));
      };

      if (maxWaitMs !== undefined) {
        deadline = setTimeout(() => {
          this.dequeue(entry, waiter);
          const waitedMs = Date.now() - now;
          entry.timedOut++;
          this.logger.warn("Gave up waiting for rate limit capacity", {
            model: entry.modelId,
            waitedMs,
            maxWaitMs,
          });
          this.events?.emit(rateLimitTimeout, {
            modelId: entry.modelId,
            waitedMs,
            maxWaitMs,
            timestamp: Date.now(),
          });
          waiter.fail(new RateLimitTimeoutError(entry.modelId, waitedMs, maxWaitMs));
        }, maxWaitMs);
      }

      signal?.addEventListener("abort", onAbort, { once: true });
      entry.queue.push(waiter);
      this.schedule(entry, estimatedWaitMs);
    });
  }

  private dequeue(entry: ModelEntry, waiter: Waiter): void {
    const index = entry.queue.indexOf(waiter);
    if (index >= 0) {
      entry.queue.splice(index, 1);
    }
    if (entry.queue.length === 0 && entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
  }

  /**
   * Grant capacity to queued waiters in order while it lasts, then re-arm
   * the timer for the next unit.
   */
  private pump(entry: ModelEntry): void {
    if (this.disposed) return;
    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }

    const now = Date.now();
    while (entry.queue.length > 0 && entry.counter.tryConsume(now)) {
      entry.queue.shift()?.grant(now);
    }

    if (entry.queue.length > 0) {
      this.schedule(entry, entry.counter.waitTimeMs(now));
    }
  }

  private schedule(entry: ModelEntry, delayMs: number): void {
    if (entry.timer) return;
    entry.timer = setTimeout(() => {
      entry.timer = null;
      this.pump(entry);
    }, Math.max(1, delayMs));
  }

  private issue(entry: ModelEntry, grantedAt: number, waitedMs: number): RatePermit {
    const permit: RatePermit = Object.freeze({
      id: createId("permit"),
      modelId: entry.modelId,
      grantedAt,
      waitedMs,
    });
    entry.granted++;
    this.issued.set(permit, entry);
    return permit;
  }

  private getOrCreateEntry(spec: ModelSpec): ModelEntry {
    let entry = this.entries.get(spec.id);
    if (!entry) {
      entry = {
        modelId: spec.id,
        counter: createCapacityCounter(spec.rateLimit, Date.now()),
        queue: [],
        timer: null,
        granted: 0,
        throttled: 0,
        refunded: 0,
        timedOut: 0,
      };
      this.entries.set(spec.id, entry);
    }
    return entry;
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw new CancelledError("Rate limiter disposed");
    }
  }
}

/**
 * Create a new rate limiter instance.
 */
export function createRateLimiter(options?: RateLimiterOptions): RateLimiter {
  return new RateLimiter(options);
}
