export { createRetryExecutor, DEFAULT_RETRY_POLICY, RetryExecutor } from "./executor.js";
export {
  isTerminalRetryPhase,
  isValidRetryTransition,
  type RetryPhase,
  RetryPhaseSchema,
  VALID_RETRY_TRANSITIONS,
} from "./state.js";
export type {
  ErrorClassifier,
  ExecuteOptions,
  RetryExecutorOptions,
  RetryOutcome,
  RetryPolicy,
} from "./types.js";
