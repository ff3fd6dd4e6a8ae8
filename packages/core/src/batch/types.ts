/**
 * Batch Types
 *
 * @module @modelgate/core/batch
 */

import type { Price } from "@modelgate/provider";
import type { Money } from "@modelgate/shared";
import type { InvocationResult, InvokeOptions } from "../invoker/index.js";
import type { Logger } from "../logger/index.js";

/**
 * Outcome of one batch slot. Slots line up with the submitted requests.
 */
export type BatchOutcome<T> =
  | { status: "fulfilled"; index: number; value: InvocationResult<T> }
  | { status: "rejected"; index: number; error: Error };

/**
 * A budget opened for the duration of one batch.
 */
export interface BatchBudget {
  name: string;
  /** USD; `null` tracks spend without a ceiling */
  ceilingUsd: Price | null;
}

export interface BatchOptions extends Omit<InvokeOptions, "budget"> {
  /** Maximum invocations in flight at once */
  concurrency?: number;
  /** Cancel the remaining items after a budget rejection or fatal provider error */
  failFast?: boolean;
  /** Scope every item of the batch to a new budget, closed when the batch settles */
  budget?: BatchBudget;
  /** Stack the batch charges into (default: the tracker's root stack) */
  parentBudget?: InvokeOptions["budget"];
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  /** Cost of the successful slots */
  cost: Money;
}

export interface BatchSchedulerOptions {
  concurrency?: number;
  logger?: Logger;
}
