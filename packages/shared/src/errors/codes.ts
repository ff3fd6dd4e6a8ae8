// ============================================
// Modelgate Error Codes
// ============================================

/**
 * Centralized error codes shared by the provider and core packages.
 * Error code ranges:
 * - 1xxx: General/Configuration errors
 * - 2xxx: Network/API errors reported by a provider
 * - 3xxx: Credential errors
 * - 4xxx: Provider and model routing errors
 * - 5xxx: Dispatch errors (retry, rate limit, timeout, cancellation)
 * - 6xxx: Budget errors
 * - 7xxx: Structured output errors
 */
export enum ErrorCode {
  // General Errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL_ERROR = 1001,
  INVALID_ARGUMENT = 1002,
  TIMEOUT = 1004,
  CONFIG_INVALID = 1101,
  CONFIG_PARSE_ERROR = 1102,

  // Network/API Errors (2xxx)
  NETWORK_ERROR = 2001,
  API_ERROR = 2002,
  RATE_LIMITED = 2003,
  SERVICE_UNAVAILABLE = 2004,
  CONTENT_POLICY = 2005,
  CONTEXT_OVERFLOW = 2006,

  // Credential Errors (3xxx)
  CREDENTIAL_INVALID = 3001,
  CREDENTIAL_NOT_FOUND = 3002,

  // Provider Errors (4xxx)
  PROVIDER_NOT_FOUND = 4001,
  MODEL_NOT_FOUND = 4002,
  MODEL_ALREADY_REGISTERED = 4003,

  // Dispatch Errors (5xxx)
  RETRIES_EXHAUSTED = 5001,
  RATE_LIMIT_WAIT_EXCEEDED = 5002,
  ATTEMPT_TIMEOUT = 5003,
  CANCELLED = 5004,

  // Budget Errors (6xxx)
  BUDGET_EXCEEDED = 6001,
  BUDGET_CLOSED = 6002,

  // Structured Output Errors (7xxx)
  PARSE_EXHAUSTED = 7001,
}
