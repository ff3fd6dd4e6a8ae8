/**
 * Provider Error Classification Utilities
 *
 * Maps HTTP status codes, retry-after headers and error message patterns to
 * the three kinds the retry loop understands: `rate-limited`, `retryable`
 * and `fatal`.
 *
 * @module @modelgate/provider/errors
 */

import { ErrorCode, type TokenUsage } from "@modelgate/shared";

// =============================================================================
// Provider Error Types
// =============================================================================

/**
 * How the retry loop treats a failure
 */
export type ErrorKind = "rate-limited" | "retryable" | "fatal";

/**
 * Categories of provider errors for classification
 */
export type ProviderErrorCategory =
  | "credential_invalid"
  | "rate_limited"
  | "timeout"
  | "network_error"
  | "server_error"
  | "bad_request"
  | "not_found"
  | "context_overflow"
  | "content_filter"
  | "aborted"
  | "unknown";

/**
 * Result of error classification
 */
export interface ErrorClassification {
  code: ErrorCode;
  category: ProviderErrorCategory;
  kind: ErrorKind;
  /** Provider-supplied wait hint in milliseconds */
  retryAfterMs?: number;
}

/**
 * Context information attached to provider errors
 */
export interface ProviderErrorContext {
  provider?: string;
  model?: string;
  /** Request ID for tracing (from provider response headers) */
  requestId?: string;
  timestamp?: Date;
  metadata?: Record<string, unknown>;
}

export interface ProviderErrorOptions extends ErrorClassification {
  statusCode?: number;
  cause?: unknown;
  /** Usage the vendor billed for this failed request, when it reports any */
  billedUsage?: TokenUsage;
  context?: ProviderErrorContext;
}

/**
 * Error raised by every ProviderAdapter
 */
export class ProviderError extends Error {
  readonly code: ErrorCode;
  readonly category: ProviderErrorCategory;
  readonly kind: ErrorKind;
  readonly statusCode?: number;
  readonly retryAfterMs?: number;
  readonly billedUsage?: TokenUsage;
  readonly context: ProviderErrorContext;

  constructor(message: string, options: ProviderErrorOptions) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.code = options.code;
    this.category = options.category;
    this.kind = options.kind;
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
    this.billedUsage = options.billedUsage;
    this.context = { ...options.context, timestamp: options.context?.timestamp ?? new Date() };

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProviderError);
    }
  }

  get retryable(): boolean {
    return this.kind !== "fatal";
  }

  /**
   * Create a new ProviderError with additional context
   */
  withContext(context: Partial<ProviderErrorContext>): ProviderError {
    return new ProviderError(this.message, {
      code: this.code,
      category: this.category,
      kind: this.kind,
      statusCode: this.statusCode,
      retryAfterMs: this.retryAfterMs,
      billedUsage: this.billedUsage,
      cause: this.cause,
      context: { ...this.context, ...context },
    });
  }

  /**
   * Create a formatted error message including all context
   */
  toDetailedString(): string {
    const parts = [
      `[${this.name}] ${this.message}`,
      `  Code: ${this.code} (${ErrorCode[this.code]})`,
      `  Kind: ${this.kind}`,
      `  Category: ${this.category}`,
    ];

    if (this.statusCode !== undefined) {
      parts.push(`  HTTP Status: ${this.statusCode}`);
    }
    if (this.retryAfterMs !== undefined) {
      parts.push(`  Retry After: ${this.retryAfterMs}ms`);
    }
    if (this.context.provider) {
      parts.push(`  Provider: ${this.context.provider}`);
    }
    if (this.context.model) {
      parts.push(`  Model: ${this.context.model}`);
    }
    if (this.context.requestId) {
      parts.push(`  Request ID: ${this.context.requestId}`);
    }
    if (this.cause instanceof Error) {
      parts.push(`  Caused by: ${this.cause.message}`);
    }

    return parts.join("\n");
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      codeName: ErrorCode[this.code],
      kind: this.kind,
      category: this.category,
      statusCode: this.statusCode,
      retryAfterMs: this.retryAfterMs,
      billedUsage: this.billedUsage,
      context: {
        ...this.context,
        timestamp: this.context.timestamp?.toISOString(),
      },
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

// =============================================================================
// Error Classification Functions
// =============================================================================

type StatusClassification = Omit<ErrorClassification, "retryAfterMs">;

/**
 * HTTP status code to error classification mapping
 */
const HTTP_STATUS_CLASSIFICATION: Record<number, StatusClassification> = {
  // Client errors (never retried)
  400: { code: ErrorCode.INVALID_ARGUMENT, category: "bad_request", kind: "fatal" },
  401: { code: ErrorCode.CREDENTIAL_INVALID, category: "credential_invalid", kind: "fatal" },
  403: { code: ErrorCode.CREDENTIAL_INVALID, category: "credential_invalid", kind: "fatal" },
  404: { code: ErrorCode.MODEL_NOT_FOUND, category: "not_found", kind: "fatal" },
  422: { code: ErrorCode.INVALID_ARGUMENT, category: "bad_request", kind: "fatal" },

  // Transient client-side conditions
  408: { code: ErrorCode.TIMEOUT, category: "timeout", kind: "retryable" },
  409: { code: ErrorCode.API_ERROR, category: "server_error", kind: "retryable" },

  // Rate limiting
  429: { code: ErrorCode.RATE_LIMITED, category: "rate_limited", kind: "rate-limited" },

  // Server errors
  500: { code: ErrorCode.API_ERROR, category: "server_error", kind: "retryable" },
  502: { code: ErrorCode.SERVICE_UNAVAILABLE, category: "server_error", kind: "retryable" },
  503: { code: ErrorCode.SERVICE_UNAVAILABLE, category: "server_error", kind: "retryable" },
  504: { code: ErrorCode.TIMEOUT, category: "timeout", kind: "retryable" },
  // Anthropic "overloaded"
  529: { code: ErrorCode.SERVICE_UNAVAILABLE, category: "server_error", kind: "retryable" },
};

/**
 * Classifies an HTTP status code into a standardized error classification
 *
 * @example
 * ```typescript
 * classifyHttpStatus(429);
 * // { code: ErrorCode.RATE_LIMITED, category: "rate_limited", kind: "rate-limited" }
 * ```
 */
export function classifyHttpStatus(statusCode: number): StatusClassification {
  const exactMatch = HTTP_STATUS_CLASSIFICATION[statusCode];
  if (exactMatch) {
    return exactMatch;
  }

  if (statusCode >= 500) {
    return { code: ErrorCode.API_ERROR, category: "server_error", kind: "retryable" };
  }

  if (statusCode >= 400) {
    return { code: ErrorCode.API_ERROR, category: "bad_request", kind: "fatal" };
  }

  return { code: ErrorCode.UNKNOWN, category: "unknown", kind: "fatal" };
}

/**
 * Classifies any thrown value.
 *
 * Order: an existing ProviderError keeps its classification, then HTTP
 * status, then message and name patterns. Unrecognized failures are fatal.
 *
 * @example
 * ```typescript
 * try {
 *   await client.chat.completions.create(params);
 * } catch (error) {
 *   const { kind, retryAfterMs } = classifyProviderError(error);
 * }
 * ```
 */
export function classifyProviderError(error: unknown, now: number = Date.now()): ErrorClassification {
  if (error instanceof ProviderError) {
    return {
      code: error.code,
      category: error.category,
      kind: error.kind,
      retryAfterMs: error.retryAfterMs,
    };
  }

  const statusCode = getStatusCode(error);
  if (statusCode !== undefined) {
    const byStatus = classifyHttpStatus(statusCode);
    // A 400 that is really a context overflow or policy rejection keeps its fatal kind
    // but gets the more specific category.
    const byMessage = identifyErrorType(getErrorMessage(error).toLowerCase(), "");
    const refined =
      byStatus.kind === "fatal" && (byMessage === "context_overflow" || byMessage === "content_filter")
        ? classifyByErrorType(byMessage)
        : byStatus;
    return { ...refined, retryAfterMs: extractRetryAfter(error, now) };
  }

  const message = getErrorMessage(error).toLowerCase();
  const errorName = error instanceof Error ? error.name.toLowerCase() : "";
  return { ...classifyByErrorType(identifyErrorType(message, errorName)), retryAfterMs: extractRetryAfter(error, now) };
}

export function isRetryable(error: unknown): boolean {
  return classifyProviderError(error).kind !== "fatal";
}

/**
 * Creates a ProviderError from any thrown value
 *
 * @example
 * ```typescript
 * try {
 *   await anthropic.messages.create(params);
 * } catch (error) {
 *   throw createProviderError(error, { provider: "anthropic", model: params.model });
 * }
 * ```
 */
export function createProviderError(
  error: unknown,
  contextOrMessage?: string | ProviderErrorContext
): ProviderError {
  if (error instanceof ProviderError) {
    return typeof contextOrMessage === "object" ? error.withContext(contextOrMessage) : error;
  }

  const classification = classifyProviderError(error);
  const originalMessage = getErrorMessage(error);

  let message = originalMessage;
  let context: ProviderErrorContext = {};
  if (typeof contextOrMessage === "string") {
    message = `${contextOrMessage}: ${originalMessage}`;
  } else if (contextOrMessage) {
    context = { ...contextOrMessage };
  }

  const requestId = extractRequestId(error);
  if (requestId && !context.requestId) {
    context.requestId = requestId;
  }

  return new ProviderError(message, {
    ...classification,
    statusCode: getStatusCode(error),
    cause: error,
    context,
  });
}

// =============================================================================
// Header Extraction
// =============================================================================

/**
 * Reads a retry-after hint from an error's headers or a `retryAfter` property.
 *
 * Header values are either delta-seconds or an HTTP date; `retry-after-ms`
 * (sent by some OpenAI-compatible gateways) takes precedence.
 */
export function extractRetryAfter(error: unknown, now: number = Date.now()): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  const retryAfterMs = readHeader(error.headers, "retry-after-ms");
  if (retryAfterMs !== undefined) {
    const ms = Number(retryAfterMs);
    if (Number.isFinite(ms) && ms >= 0) {
      return ms;
    }
  }

  const retryAfter = readHeader(error.headers, "retry-after");
  if (retryAfter !== undefined) {
    const parsed = parseRetryAfter(retryAfter, now);
    if (parsed !== undefined) {
      return parsed;
    }
  }

  if (typeof error.retryAfter === "number" && error.retryAfter >= 0) {
    return error.retryAfter * 1000;
  }

  return undefined;
}

/**
 * Parses a Retry-After header value into milliseconds from `now`.
 */
export function parseRetryAfter(value: string, now: number = Date.now()): number | undefined {
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

const REQUEST_ID_HEADERS = ["x-request-id", "request-id", "x-anthropic-request-id"] as const;

/**
 * Extract request ID from error headers if present
 */
export function extractRequestId(error: unknown): string | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  for (const header of REQUEST_ID_HEADERS) {
    const value = readHeader(error.headers, header);
    if (value !== undefined) {
      return value;
    }
  }

  if (typeof error.requestID === "string") {
    return error.requestID;
  }
  if (typeof error.requestId === "string") {
    return error.requestId;
  }

  return undefined;
}

// =============================================================================
// Helper Functions
// =============================================================================

type ErrorTypeIdentifier = "timeout" | "network" | "abort" | "rate_limit" | "context_overflow" | "content_filter";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Case-insensitive header lookup over a fetch `Headers` instance or a plain record
 */
function readHeader(headers: unknown, name: string): string | undefined {
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  if (!isRecord(headers)) {
    return undefined;
  }
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) {
      if (typeof value === "string") return value;
      if (typeof value === "number") return String(value);
    }
  }
  return undefined;
}

function getStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  if (typeof error.status === "number") {
    return error.status;
  }
  if (typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (isRecord(error)) {
    if (typeof error.message === "string") {
      return error.message;
    }
    if (typeof error.error === "string") {
      return error.error;
    }
  }
  return "Unknown error";
}

/**
 * Identify error type from message and name patterns
 */
function identifyErrorType(message: string, errorName: string): ErrorTypeIdentifier | null {
  if (
    message.includes("timeout") ||
    message.includes("timed out") ||
    message.includes("etimedout") ||
    errorName.includes("timeout")
  ) {
    return "timeout";
  }

  if (
    message.includes("abort") ||
    message.includes("cancelled") ||
    message.includes("canceled") ||
    errorName.includes("abort")
  ) {
    return "abort";
  }

  if (message.includes("rate limit") || message.includes("too many requests")) {
    return "rate_limit";
  }

  if (
    message.includes("network") ||
    message.includes("econnrefused") ||
    message.includes("econnreset") ||
    message.includes("enotfound") ||
    message.includes("socket hang up") ||
    message.includes("connection") ||
    errorName.includes("network")
  ) {
    return "network";
  }

  if (
    message.includes("context length") ||
    message.includes("context_length") ||
    message.includes("context window") ||
    message.includes("maximum context") ||
    message.includes("prompt is too long")
  ) {
    return "context_overflow";
  }

  if (
    message.includes("content filter") ||
    message.includes("content_filter") ||
    message.includes("content policy") ||
    message.includes("flagged") ||
    message.includes("safety")
  ) {
    return "content_filter";
  }

  return null;
}

function classifyByErrorType(errorType: ErrorTypeIdentifier | null): StatusClassification {
  switch (errorType) {
    case "timeout":
      return { code: ErrorCode.TIMEOUT, category: "timeout", kind: "retryable" };
    case "network":
      return { code: ErrorCode.NETWORK_ERROR, category: "network_error", kind: "retryable" };
    case "rate_limit":
      return { code: ErrorCode.RATE_LIMITED, category: "rate_limited", kind: "rate-limited" };
    case "abort":
      return { code: ErrorCode.CANCELLED, category: "aborted", kind: "fatal" };
    case "context_overflow":
      return { code: ErrorCode.CONTEXT_OVERFLOW, category: "context_overflow", kind: "fatal" };
    case "content_filter":
      return { code: ErrorCode.CONTENT_POLICY, category: "content_filter", kind: "fatal" };
    default:
      return { code: ErrorCode.UNKNOWN, category: "unknown", kind: "fatal" };
  }
}
