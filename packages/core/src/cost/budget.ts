/**
 * Budgets and budget stacks
 *
 * @module @modelgate/core/cost
 */

import type { Money } from "@modelgate/shared";
import type { BudgetSnapshot } from "./types.js";

// =============================================================================
// Budget
// =============================================================================

/**
 * A named accounting scope with an optional ceiling.
 *
 * Only the {@link CostTracker} mutates a budget; everyone else reads
 * snapshots. Once closed, totals are frozen.
 */
export class Budget {
  readonly name: string;
  readonly ceiling: Money | null;
  private committedAmount = 0n;
  private reservedAmount = 0n;
  private discardedAmount = 0n;
  private isClosed = false;

  constructor(name: string, ceiling: Money | null) {
    if (name.length === 0) {
      throw new RangeError("Budget name must not be empty");
    }
    if (ceiling !== null && ceiling < 0n) {
      throw new RangeError(`Budget "${name}" ceiling must not be negative`);
    }
    this.name = name;
    this.ceiling = ceiling;
  }

  get committed(): Money {
    return this.committedAmount;
  }

  get reserved(): Money {
    return this.reservedAmount;
  }

  get discarded(): Money {
    return this.discardedAmount;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Headroom left under the ceiling, or `null` when unlimited.
   */
  get available(): Money | null {
    if (this.ceiling === null) return null;
    const left = this.ceiling - this.committedAmount - this.reservedAmount;
    return left > 0n ? left : 0n;
  }

  wouldExceed(amount: Money): boolean {
    return this.ceiling !== null && this.committedAmount + this.reservedAmount + amount > this.ceiling;
  }

  isOverCeiling(): boolean {
    return this.ceiling !== null && this.committedAmount > this.ceiling;
  }

  // ===========================================================================
  // Mutations (CostTracker only)
  // ===========================================================================

  hold(amount: Money): void {
    this.reservedAmount += amount;
  }

  releaseHold(amount: Money): void {
    this.reservedAmount = this.reservedAmount > amount ? this.reservedAmount - amount : 0n;
  }

  commit(amount: Money): void {
    if (!this.isClosed) {
      this.committedAmount += amount;
    }
  }

  discard(amount: Money): void {
    if (!this.isClosed) {
      this.discardedAmount += amount;
    }
  }

  close(): void {
    this.isClosed = true;
  }

  snapshot(): BudgetSnapshot {
    return {
      name: this.name,
      ceiling: this.ceiling,
      committed: this.committedAmount,
      reserved: this.reservedAmount,
      discarded: this.discardedAmount,
      closed: this.isClosed,
    };
  }
}

// =============================================================================
// BudgetStack
// =============================================================================

/**
 * Immutable chain of open budgets, innermost first, ending at the root.
 *
 * Entering a scope pushes onto a stack and yields a new one; the parent
 * stack is left untouched, so concurrent scopes never see each other's
 * budgets.
 *
 * @example
 * ```typescript
 * const questionStack = tracker.rootStack().push(new Budget("question-1", usd(2)));
 * questionStack.names; // ["question-1", "root"]
 * ```
 */
export class BudgetStack {
  private constructor(readonly budgets: readonly Budget[]) {}

  static of(root: Budget): BudgetStack {
    return new BudgetStack(Object.freeze([root]));
  }

  push(budget: Budget): BudgetStack {
    return new BudgetStack(Object.freeze([budget, ...this.budgets]));
  }

  get innermost(): Budget | undefined {
    return this.budgets[0];
  }

  get names(): string[] {
    return this.budgets.map((budget) => budget.name);
  }

  get depth(): number {
    return this.budgets.length;
  }
}
