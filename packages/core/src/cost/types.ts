/**
 * Cost Accounting Types
 *
 * @module @modelgate/core/cost
 */

import type { Money } from "@modelgate/shared";
import type { CancelledCostPolicy } from "../config/schema.js";
import type { EventBus } from "../events/index.js";
import type { Logger } from "../logger/index.js";

// =============================================================================
// Cost Breakdown
// =============================================================================

/**
 * Cost of one call split by component, in picodollars.
 */
export interface CostBreakdown {
  input: Money;
  output: Money;
  perCall: Money;
  total: Money;
  /** Whether `total` was computed from the model's rates or taken from the vendor */
  source: "computed" | "provider";
}

// =============================================================================
// Budgets
// =============================================================================

/**
 * Point-in-time view of a budget.
 */
export interface BudgetSnapshot {
  name: string;
  /** `null` means unlimited */
  ceiling: Money | null;
  /** Billed spend; never decreases */
  committed: Money;
  /** Speculative spend held by in-flight calls */
  reserved: Money;
  /** Billed spend of discarded calls under the `refund` policy */
  discarded: Money;
  closed: boolean;
}

/**
 * Spend held against every budget of a stack while a call is in flight.
 */
export interface Reservation {
  readonly id: string;
  readonly amount: Money;
  /** Budget names, innermost first */
  readonly budgets: readonly string[];
}

/**
 * A budget that billed spend pushed past its ceiling after the call had
 * already been admitted.
 */
export interface BudgetViolation {
  budget: string;
  ceiling: Money;
  committed: Money;
  overBy: Money;
}

/**
 * `{ [budget name]: spent USD }`
 */
export type BudgetReport = Record<string, number>;

export type { CancelledCostPolicy };

// =============================================================================
// Tracker Options
// =============================================================================

export interface CostTrackerOptions {
  /** Name of the process-wide root budget (default: "root") */
  rootName?: string;
  /** Root ceiling; `null` or unset means unlimited */
  rootCeiling?: Money | null;
  events?: EventBus;
  logger?: Logger;
}
