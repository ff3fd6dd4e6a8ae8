// ============================================
// Batch Scheduler
// ============================================

import { ErrorCode, usd } from "@modelgate/shared";
import { CONFIG_DEFAULTS } from "../config/defaults.js";
import { type BudgetStack, type CostTracker, formatCost } from "../cost/index.js";
import { CancelledError, GatewayError, isBatchStoppingError } from "../errors/index.js";
import type { InvocationRequest, InvokeOptions, ModelInvoker } from "../invoker/index.js";
import { createNullLogger, type Logger } from "../logger/index.js";
import type { BatchOptions, BatchOutcome, BatchSchedulerOptions, BatchSummary } from "./types.js";

interface Run<T> {
  requests: readonly InvocationRequest<T>[];
  outcomes: BatchOutcome<T>[];
  controller: AbortController;
  invokeOptions: InvokeOptions;
  failFast: boolean;
  next: number;
}

/**
 * Fans invocations out over a bounded worker pool.
 *
 * At most `concurrency` invocations are in flight; each finished slot admits
 * the next queued request. A failing slot never rejects the batch: every
 * request gets one outcome, in submission order. With `failFast`, a budget
 * rejection or fatal provider error aborts the shared signal so in-flight
 * items stop at their next suspend point and queued items are never started.
 *
 * @example
 * ```typescript
 * const outcomes = await scheduler.runAll(requests, {
 *   concurrency: 8,
 *   budget: { name: "tournament", ceilingUsd: 5 },
 * });
 * for (const outcome of outcomes) {
 *   if (outcome.status === "rejected") console.warn(outcome.index, outcome.error.message);
 * }
 * ```
 */
export class BatchScheduler {
  private readonly invoker: ModelInvoker;
  private readonly tracker: CostTracker;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(invoker: ModelInvoker, tracker: CostTracker, options: BatchSchedulerOptions = {}) {
    this.invoker = invoker;
    this.tracker = tracker;
    this.concurrency = checkConcurrency(options.concurrency ?? CONFIG_DEFAULTS.batch.concurrency);
    this.logger = (options.logger ?? createNullLogger()).child({ component: "batch" });
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Run every request and collect one outcome per request, in input order.
   *
   * Rejects only when the batch budget cannot be opened (for example under a
   * closed parent scope).
   */
  async runAll<T>(requests: readonly InvocationRequest<T>[], options: BatchOptions = {}): Promise<BatchOutcome<T>[]> {
    const { budget, parentBudget } = options;
    if (!budget) {
      return this.run(requests, options, parentBudget);
    }
    const ceiling = budget.ceilingUsd === null ? null : usd(budget.ceilingUsd);
    return this.tracker.withBudget(
      budget.name,
      ceiling,
      (stack) => this.run(requests, options, stack),
      parentBudget
    );
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async run<T>(
    requests: readonly InvocationRequest<T>[],
    options: BatchOptions,
    stack: BudgetStack | undefined
  ): Promise<BatchOutcome<T>[]> {
    const concurrency = checkConcurrency(options.concurrency ?? this.concurrency);
    const startedAt = Date.now();
    const controller = new AbortController();
    const { signal } = options;

    const forwardAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) {
      forwardAbort();
    } else {
      signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    const run: Run<T> = {
      requests,
      outcomes: [],
      controller,
      invokeOptions: {
        signal: controller.signal,
        budget: stack,
        cancelledCostPolicy: options.cancelledCostPolicy,
        retry: options.retry,
        maxWaitMs: options.maxWaitMs,
      },
      failFast: options.failFast ?? false,
      next: 0,
    };

    this.logger.debug("Batch started", { size: requests.length, concurrency, failFast: run.failFast });
    try {
      const workers = Array.from({ length: Math.min(concurrency, requests.length) }, () => this.work(run));
      await Promise.all(workers);
    } finally {
      signal?.removeEventListener("abort", forwardAbort);
    }

    const summary = summarizeBatch(run.outcomes);
    this.logger.info("Batch complete", {
      ...summary,
      cost: formatCost(summary.cost),
      durationMs: Date.now() - startedAt,
    });
    return run.outcomes;
  }

  private async work<T>(run: Run<T>): Promise<void> {
    while (run.next < run.requests.length) {
      const index = run.next++;
      run.outcomes[index] = await this.runSlot(run, index);
    }
  }

  private async runSlot<T>(run: Run<T>, index: number): Promise<BatchOutcome<T>> {
    const { signal } = run.controller;
    if (signal.aborted) {
      const error = new CancelledError("Batch cancelled before start", { cause: signal.reason });
      return { status: "rejected", index, error };
    }

    try {
      const value = await this.invoker.invoke(run.requests[index], run.invokeOptions);
      return { status: "fulfilled", index, value };
    } catch (error) {
      if (run.failFast && !signal.aborted && isBatchStoppingError(error)) {
        this.logger.warn("Stopping batch after failure", { index, error });
        run.controller.abort(error);
      }
      return { status: "rejected", index, error: toError(error) };
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Count outcomes and total the cost of the successful ones.
 */
export function summarizeBatch<T>(outcomes: readonly BatchOutcome<T>[]): BatchSummary {
  let succeeded = 0;
  let cost = 0n;
  for (const outcome of outcomes) {
    if (outcome.status === "fulfilled") {
      succeeded++;
      cost += outcome.value.cost;
    }
  }
  return { total: outcomes.length, succeeded, failed: outcomes.length - succeeded, cost };
}

function checkConcurrency(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`Batch concurrency must be a positive integer, got ${value}`);
  }
  return value;
}

function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new GatewayError(String(error), ErrorCode.INTERNAL_ERROR, { cause: error });
}

/**
 * Create a batch scheduler.
 */
export function createBatchScheduler(
  invoker: ModelInvoker,
  tracker: CostTracker,
  options?: BatchSchedulerOptions
): BatchScheduler {
  return new BatchScheduler(invoker, tracker, options);
}
