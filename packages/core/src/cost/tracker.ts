/**
 * Cost Tracker
 *
 * Process-wide spend accounting over nested, stack-scoped budgets.
 *
 * @module @modelgate/core/cost
 */

import { createId, ErrorCode, type Money, toUsd } from "@modelgate/shared";
import { CONFIG_DEFAULTS } from "../config/defaults.js";
import { BudgetClosedError, BudgetExceededError, GatewayError } from "../errors/index.js";
import { budgetClosed, budgetExceeded, type EventBus } from "../events/index.js";
import { createNullLogger, type Logger } from "../logger/index.js";
import { Budget, BudgetStack } from "./budget.js";
import { formatCost } from "./calculator.js";
import type {
  BudgetReport,
  BudgetSnapshot,
  BudgetViolation,
  CancelledCostPolicy,
  CostTrackerOptions,
  Reservation,
} from "./types.js";

interface Hold {
  readonly budgets: readonly Budget[];
  readonly amount: Money;
  settled: boolean;
}

// =============================================================================
// CostTracker Class
// =============================================================================

/**
 * Tracks spend against a root budget and any number of nested scopes.
 *
 * Every check-and-apply runs synchronously, so concurrent invocations on the
 * event loop can never interleave between the ceiling check and the update:
 * either every budget in the stack takes the amount or none does.
 *
 * Calls go through three steps:
 * 1. `reserve` holds an estimate before dispatch, rejecting with
 *    `BudgetExceededError` when any budget in the stack would overflow
 * 2. the provider call runs
 * 3. `reconcile` swaps the hold for the billed amount, which is recorded
 *    even when it overshoots; the overshoot comes back as a violation
 *
 * @example
 * ```typescript
 * const tracker = new CostTracker({ rootCeiling: usd(10), events, logger });
 *
 * await tracker.withBudget("question-42", usd(1), async (stack) => {
 *   const reservation = tracker.reserve(estimate, stack);
 *   const response = await send();
 *   tracker.reconcile(reservation, calculateCost(spec, response.usage));
 * });
 *
 * tracker.report(); // { root: 0.0123, "question-42": 0.0123 }
 * ```
 */
export class CostTracker {
  private readonly rootBudget: Budget;
  private readonly rootStackValue: BudgetStack;
  private readonly holds = new WeakMap<Reservation, Hold>();
  private readonly totals = new Map<string, Money>();
  private readonly events?: EventBus;
  private readonly logger: Logger;

  constructor(options: CostTrackerOptions = {}) {
    this.rootBudget = new Budget(options.rootName ?? CONFIG_DEFAULTS.budget.rootName, options.rootCeiling ?? null);
    this.rootStackValue = BudgetStack.of(this.rootBudget);
    this.totals.set(this.rootBudget.name, 0n);
    this.events = options.events;
    this.logger = (options.logger ?? createNullLogger()).child({ component: "cost" });
  }

  // ===========================================================================
  // Scopes
  // ===========================================================================

  /**
   * The stack holding only the root budget.
   */
  rootStack(): BudgetStack {
    return this.rootStackValue;
  }

  /**
   * Push a new budget onto `parent`. Pair every call with {@link close};
   * {@link withBudget} does both.
   *
   * @throws BudgetClosedError if the parent scope already exited
   */
  open(name: string, ceiling: Money | null, parent: BudgetStack = this.rootStackValue): BudgetStack {
    const enclosing = parent.innermost;
    if (enclosing?.closed) {
      throw new BudgetClosedError(enclosing.name);
    }

    const stack = parent.push(new Budget(name, ceiling));
    if (!this.totals.has(name)) {
      this.totals.set(name, 0n);
    }
    this.logger.debug("Budget opened", {
      budget: name,
      ceiling: ceiling === null ? "unlimited" : formatCost(ceiling),
      depth: stack.depth,
    });
    return stack;
  }

  /**
   * Freeze the innermost budget of `stack` and report its spend.
   */
  close(stack: BudgetStack): BudgetSnapshot {
    const budget = stack.innermost;
    if (!budget || budget === this.rootBudget) {
      throw new GatewayError("The root budget cannot be closed", ErrorCode.INVALID_ARGUMENT);
    }
    if (budget.closed) {
      return budget.snapshot();
    }

    budget.close();
    const snapshot = budget.snapshot();
    const report: BudgetReport = { [budget.name]: toUsd(snapshot.committed) };

    this.logger.info("Budget closed", {
      budget: budget.name,
      spent: formatCost(snapshot.committed),
      ceiling: snapshot.ceiling === null ? "unlimited" : formatCost(snapshot.ceiling),
      discarded: formatCost(snapshot.discarded),
      report,
    });
    this.events?.emit(budgetClosed, {
      budget: budget.name,
      ceiling: snapshot.ceiling,
      committed: snapshot.committed,
      discarded: snapshot.discarded,
      report,
      timestamp: Date.now(),
    });

    return snapshot;
  }

  /**
   * Run `fn` inside a new budget scope. The scope is closed and reported
   * when `fn` settles, whether it resolves or throws.
   *
   * @param ceiling - `null` for an unlimited scope that only tracks spend
   */
  async withBudget<T>(
    name: string,
    ceiling: Money | null,
    fn: (stack: BudgetStack) => Promise<T> | T,
    parent: BudgetStack = this.rootStackValue
  ): Promise<T> {
    const stack = this.open(name, ceiling, parent);
    try {
      return await fn(stack);
    } finally {
      this.close(stack);
    }
  }

  // ===========================================================================
  // Charging
  // ===========================================================================

  /**
   * Hold `amount` against every budget in `stack`.
   *
   * @throws BudgetExceededError if any budget would exceed its ceiling; nothing is held
   * @throws BudgetClosedError if any budget in the stack is closed
   */
  reserve(amount: Money, stack: BudgetStack): Reservation {
    this.admit(amount, stack);
    for (const budget of stack.budgets) {
      budget.hold(amount);
    }

    const reservation: Reservation = Object.freeze({
      id: createId("rsv"),
      amount,
      budgets: Object.freeze(stack.names),
    });
    this.holds.set(reservation, { budgets: stack.budgets, amount, settled: false });
    return reservation;
  }

  /**
   * Check and commit `amount` to every budget in `stack` in one step.
   *
   * @throws BudgetExceededError if any budget would exceed its ceiling; nothing is charged
   */
  charge(amount: Money, stack: BudgetStack): void {
    this.admit(amount, stack);
    this.commit(stack.budgets, amount);
  }

  /**
   * Commit spend that was already billed, without a ceiling check.
   */
  record(amount: Money, stack: BudgetStack): BudgetViolation | undefined {
    checkAmount(amount);
    return this.commit(stack.budgets, amount);
  }

  /**
   * Replace a reservation's hold with the billed amount.
   *
   * @returns the innermost budget the billed amount pushed past its ceiling, if any
   */
  reconcile(reservation: Reservation, actual: Money): BudgetViolation | undefined {
    checkAmount(actual);
    const hold = this.settle(reservation);
    return this.commit(hold.budgets, actual);
  }

  /**
   * Drop a reservation whose call was never billed.
   */
  release(reservation: Reservation): void {
    this.settle(reservation);
  }

  /**
   * Settle a reservation whose result was discarded after cancellation.
   *
   * `retain` commits what was billed like any other call; `refund` records it
   * under each budget's discarded total instead.
   */
  settleCancelled(
    reservation: Reservation,
    billed: Money,
    policy: CancelledCostPolicy
  ): BudgetViolation | undefined {
    if (policy === "retain") {
      return this.reconcile(reservation, billed);
    }

    checkAmount(billed);
    const hold = this.settle(reservation);
    for (const budget of hold.budgets) {
      budget.discard(billed);
    }
    this.logger.debug("Refunded cancelled call", {
      budgets: reservation.budgets,
      billed: formatCost(billed),
    });
    return undefined;
  }

  // ===========================================================================
  // Reporting
  // ===========================================================================

  /**
   * Cumulative spend per budget name in USD. Scopes that reuse a name add up;
   * budgets pushed onto a stack without {@link open} are not reported.
   */
  report(): BudgetReport {
    const report: BudgetReport = {};
    for (const [name, amount] of this.totals) {
      report[name] = toUsd(amount);
    }
    return report;
  }

  snapshot(stack: BudgetStack = this.rootStackValue): BudgetSnapshot[] {
    return stack.budgets.map((budget) => budget.snapshot());
  }

  get rootSnapshot(): BudgetSnapshot {
    return this.rootBudget.snapshot();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private admit(amount: Money, stack: BudgetStack): void {
    checkAmount(amount);
    for (const budget of stack.budgets) {
      if (budget.closed) {
        throw new BudgetClosedError(budget.name);
      }
    }
    for (const budget of stack.budgets) {
      if (budget.wouldExceed(amount)) {
        this.reject(budget, amount);
      }
    }
  }

  private reject(budget: Budget, requested: Money): never {
    const ceiling = budget.ceiling ?? 0n;
    const details = {
      budget: budget.name,
      ceiling,
      committed: budget.committed,
      reserved: budget.reserved,
      requested,
    };

    this.logger.warn("Budget would be exceeded", {
      budget: budget.name,
      requested: formatCost(requested),
      available: formatCost(budget.available ?? 0n),
      ceiling: formatCost(ceiling),
    });
    this.events?.emit(budgetExceeded, { ...details, timestamp: Date.now() });
    throw new BudgetExceededError(details);
  }

  private commit(budgets: readonly Budget[], amount: Money): BudgetViolation | undefined {
    let violation: BudgetViolation | undefined;

    for (const budget of budgets) {
      if (budget.closed) {
        if (amount > 0n) {
          this.logger.warn("Charge arrived after budget closed", {
            budget: budget.name,
            amount: formatCost(amount),
          });
        }
        continue;
      }

      budget.commit(amount);
      const total = this.totals.get(budget.name);
      if (total !== undefined) {
        this.totals.set(budget.name, total + amount);
      }

      if (!violation && amount > 0n && budget.ceiling !== null && budget.isOverCeiling()) {
        violation = {
          budget: budget.name,
          ceiling: budget.ceiling,
          committed: budget.committed,
          overBy: budget.committed - budget.ceiling,
        };
      }
    }

    if (violation) {
      this.logger.warn("Billed cost pushed budget past its ceiling", {
        budget: violation.budget,
        overBy: formatCost(violation.overBy),
      });
    }
    return violation;
  }

  private settle(reservation: Reservation): Hold {
    const hold = this.holds.get(reservation);
    if (!hold) {
      throw new GatewayError(`Unknown reservation ${reservation.id}`, ErrorCode.INVALID_ARGUMENT);
    }
    if (hold.settled) {
      throw new GatewayError(`Reservation ${reservation.id} already settled`, ErrorCode.INVALID_ARGUMENT);
    }

    hold.settled = true;
    for (const budget of hold.budgets) {
      budget.releaseHold(hold.amount);
    }
    return hold;
  }
}

function checkAmount(amount: Money): void {
  if (amount < 0n) {
    throw new RangeError(`Cost must not be negative, got ${amount}`);
  }
}

/**
 * Create a new cost tracker instance.
 */
export function createCostTracker(options?: CostTrackerOptions): CostTracker {
  return new CostTracker(options);
}
