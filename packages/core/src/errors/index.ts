export { abortableSleep, throwIfAborted, type WithTimeoutOptions, withTimeout } from "./timing.js";
export {
  AttemptTimeoutError,
  BudgetClosedError,
  type BudgetExceededDetails,
  BudgetExceededError,
  CancelledError,
  ExhaustedRetriesError,
  FatalProviderError,
  GatewayError,
  type GatewayErrorOptions,
  isBatchStoppingError,
  isGatewayError,
  isRetryableError,
  ParseExhaustedError,
  RateLimitTimeoutError,
  UnknownModelError,
} from "./types.js";
