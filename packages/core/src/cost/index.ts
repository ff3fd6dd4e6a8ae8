/**
 * Cost accounting
 *
 * @module @modelgate/core/cost
 */

export { Budget, BudgetStack } from "./budget.js";
export {
  calculateCost,
  calculateCostBreakdown,
  estimateCost,
  formatCost,
  resolveCost,
} from "./calculator.js";
export { CostTracker, createCostTracker } from "./tracker.js";
export type {
  BudgetReport,
  BudgetSnapshot,
  BudgetViolation,
  CancelledCostPolicy,
  CostBreakdown,
  CostTrackerOptions,
  Reservation,
} from "./types.js";
