export { BatchScheduler, createBatchScheduler, summarizeBatch } from "./scheduler.js";
export type { BatchBudget, BatchOptions, BatchOutcome, BatchSchedulerOptions, BatchSummary } from "./types.js";
