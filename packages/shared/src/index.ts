// ============================================
// Modelgate Shared Types
// ============================================

// Error codes
export { ErrorCode } from "./errors/codes.js";
export { type ErrorSeverity, inferSeverity, isRetryableCode } from "./errors/severity.js";
// Money
export {
  formatUsd,
  MONEY_SCALE,
  type Money,
  PICOS_PER_USD,
  perMillionToPerToken,
  toUsd,
  usd,
} from "./types/money.js";
// Result type (shared to avoid circular deps between core and provider)
export type { Result } from "./types/result.js";
export { Err, isErr, isOk, map, mapErr, Ok, unwrapOr } from "./types/result.js";
export { addUsage, EMPTY_USAGE, type TokenUsage } from "./types/token.js";
// Utilities
export { createId } from "./utils/id.js";
