/**
 * Error Severity Types
 *
 * Shared severity definitions for the gateway error taxonomy.
 *
 * @module @modelgate/shared/errors/severity
 */

import { ErrorCode } from "./codes.js";

// =============================================================================
// Severity Types
// =============================================================================

export type ErrorSeverity = "low" | "medium" | "high" | "critical";

/**
 * Infers the appropriate severity level from an error code.
 *
 * Severity mapping:
 * - low: Transient provider conditions that the retry loop absorbs
 * - medium: Caller-visible outcomes of a single request
 * - high: Configuration or routing mistakes
 * - critical: Internal faults
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    // ═══════════════════════════════════════════
    // Low severity - Transient, auto-retryable
    // ═══════════════════════════════════════════
    case ErrorCode.RATE_LIMITED:
    case ErrorCode.SERVICE_UNAVAILABLE:
    case ErrorCode.NETWORK_ERROR:
    case ErrorCode.TIMEOUT:
      return "low";

    // ═══════════════════════════════════════════
    // Medium severity - Request-level outcomes
    // ═══════════════════════════════════════════
    case ErrorCode.API_ERROR:
    case ErrorCode.CONTENT_POLICY:
    case ErrorCode.CONTEXT_OVERFLOW:
    case ErrorCode.RETRIES_EXHAUSTED:
    case ErrorCode.RATE_LIMIT_WAIT_EXCEEDED:
    case ErrorCode.ATTEMPT_TIMEOUT:
    case ErrorCode.CANCELLED:
    case ErrorCode.BUDGET_EXCEEDED:
    case ErrorCode.BUDGET_CLOSED:
    case ErrorCode.PARSE_EXHAUSTED:
      return "medium";

    // ═══════════════════════════════════════════
    // High severity - Requires attention
    // ═══════════════════════════════════════════
    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CONFIG_PARSE_ERROR:
    case ErrorCode.CREDENTIAL_INVALID:
    case ErrorCode.CREDENTIAL_NOT_FOUND:
    case ErrorCode.PROVIDER_NOT_FOUND:
    case ErrorCode.MODEL_NOT_FOUND:
    case ErrorCode.MODEL_ALREADY_REGISTERED:
      return "high";

    // ═══════════════════════════════════════════
    // Critical severity - Fatal, cannot recover
    // ═══════════════════════════════════════════
    case ErrorCode.UNKNOWN:
    case ErrorCode.INTERNAL_ERROR:
    case ErrorCode.INVALID_ARGUMENT:
      return "critical";

    default:
      return "high";
  }
}

/**
 * Codes whose failures are worth another attempt.
 */
export function isRetryableCode(code: ErrorCode): boolean {
  return (
    code === ErrorCode.RATE_LIMITED ||
    code === ErrorCode.SERVICE_UNAVAILABLE ||
    code === ErrorCode.NETWORK_ERROR ||
    code === ErrorCode.TIMEOUT
  );
}
