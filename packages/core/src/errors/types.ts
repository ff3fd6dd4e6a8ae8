// ============================================
// Gateway Error Types
// ============================================

import type { ProviderError } from "@modelgate/provider";
import {
  ErrorCode,
  type ErrorSeverity,
  inferSeverity,
  isRetryableCode,
  type Money,
  toUsd,
} from "@modelgate/shared";

export interface GatewayErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
}

/**
 * Base error class for everything the dispatch core throws.
 *
 * Provides:
 * - Categorized error codes from `@modelgate/shared`
 * - Automatic severity inference
 * - Error cause chaining
 */
export class GatewayError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: GatewayErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "GatewayError";
    this.code = code;
    this.context = options?.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  /**
   * Whether another attempt at the same call could succeed.
   */
  get isRetryable(): boolean {
    return isRetryableCode(this.code);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      codeName: ErrorCode[this.code],
      severity: this.severity,
      isRetryable: this.isRetryable,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

// ============================================
// Dispatch Errors
// ============================================

/**
 * A provider rejected the call outright; it was not retried.
 */
export class FatalProviderError extends GatewayError {
  readonly modelId: string;
  readonly attempts: number;
  readonly providerError: ProviderError;

  constructor(modelId: string, providerError: ProviderError, attempts: number) {
    super(`${modelId} rejected the request: ${providerError.message}`, providerError.code, {
      cause: providerError,
      context: { modelId, attempts, category: providerError.category, statusCode: providerError.statusCode },
    });
    this.name = "FatalProviderError";
    this.modelId = modelId;
    this.attempts = attempts;
    this.providerError = providerError;
  }

  override get isRetryable(): boolean {
    return false;
  }
}

/**
 * Every allowed attempt failed with a retryable classification.
 */
export class ExhaustedRetriesError extends GatewayError {
  readonly modelId: string;
  readonly attempts: number;
  readonly lastError: Error;

  constructor(modelId: string, attempts: number, lastError: Error) {
    super(`${modelId} still failing after ${attempts} attempts: ${lastError.message}`, ErrorCode.RETRIES_EXHAUSTED, {
      cause: lastError,
      context: { modelId, attempts },
    });
    this.name = "ExhaustedRetriesError";
    this.modelId = modelId;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * The final attempt ran past its per-attempt timeout.
 */
export class AttemptTimeoutError extends GatewayError {
  readonly modelId: string;
  readonly attempt: number;
  readonly timeoutMs: number;

  constructor(modelId: string, attempt: number, timeoutMs: number) {
    super(`${modelId} attempt ${attempt} timed out after ${timeoutMs}ms`, ErrorCode.ATTEMPT_TIMEOUT, {
      context: { modelId, attempt, timeoutMs },
    });
    this.name = "AttemptTimeoutError";
    this.modelId = modelId;
    this.attempt = attempt;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Waited longer than the configured ceiling for rate-limit capacity.
 */
export class RateLimitTimeoutError extends GatewayError {
  readonly modelId: string;
  readonly waitedMs: number;
  readonly maxWaitMs: number;

  constructor(modelId: string, waitedMs: number, maxWaitMs: number) {
    super(
      `Gave up waiting for ${modelId} capacity after ${waitedMs}ms (limit ${maxWaitMs}ms)`,
      ErrorCode.RATE_LIMIT_WAIT_EXCEEDED,
      { context: { modelId, waitedMs, maxWaitMs } }
    );
    this.name = "RateLimitTimeoutError";
    this.modelId = modelId;
    this.waitedMs = waitedMs;
    this.maxWaitMs = maxWaitMs;
  }
}

/**
 * Cooperative cancellation observed at a suspend point.
 */
export class CancelledError extends GatewayError {
  constructor(message = "Operation cancelled", options?: GatewayErrorOptions) {
    super(message, ErrorCode.CANCELLED, options);
    this.name = "CancelledError";
  }
}

// ============================================
// Accounting Errors
// ============================================

export interface BudgetExceededDetails {
  budget: string;
  ceiling: Money;
  committed: Money;
  reserved: Money;
  requested: Money;
}

/**
 * A reservation would push a budget over its ceiling. The call was never dispatched.
 */
export class BudgetExceededError extends GatewayError {
  readonly budget: string;
  readonly ceiling: Money;
  readonly committed: Money;
  readonly reserved: Money;
  readonly requested: Money;

  constructor(details: BudgetExceededDetails) {
    const available = details.ceiling - details.committed - details.reserved;
    super(
      `Budget "${details.budget}" cannot cover $${toUsd(details.requested)} ` +
        `($${toUsd(available > 0n ? available : 0n)} of $${toUsd(details.ceiling)} left)`,
      ErrorCode.BUDGET_EXCEEDED,
      {
        context: {
          budget: details.budget,
          ceilingUsd: toUsd(details.ceiling),
          committedUsd: toUsd(details.committed),
          reservedUsd: toUsd(details.reserved),
          requestedUsd: toUsd(details.requested),
        },
      }
    );
    this.name = "BudgetExceededError";
    this.budget = details.budget;
    this.ceiling = details.ceiling;
    this.committed = details.committed;
    this.reserved = details.reserved;
    this.requested = details.requested;
  }
}

/**
 * A reservation targeted a budget whose scope already exited.
 */
export class BudgetClosedError extends GatewayError {
  readonly budget: string;

  constructor(budget: string) {
    super(`Budget "${budget}" is closed`, ErrorCode.BUDGET_CLOSED, { context: { budget } });
    this.name = "BudgetClosedError";
    this.budget = budget;
  }
}

// ============================================
// Decoding and Routing Errors
// ============================================

/**
 * Structured decoding still failed after every correction attempt.
 */
export class ParseExhaustedError extends GatewayError {
  readonly attempts: number;
  readonly lastRaw: string;
  readonly issues: readonly string[];

  constructor(attempts: number, lastRaw: string, issues: readonly string[]) {
    super(`Structured output still invalid after ${attempts} attempts: ${issues.join("; ")}`, ErrorCode.PARSE_EXHAUSTED, {
      context: { attempts, issues },
    });
    this.name = "ParseExhaustedError";
    this.attempts = attempts;
    this.lastRaw = lastRaw;
    this.issues = issues;
  }
}

/**
 * No registered model matches the requested name.
 */
export class UnknownModelError extends GatewayError {
  readonly model: string;

  constructor(model: string) {
    super(`Unknown model "${model}"`, ErrorCode.MODEL_NOT_FOUND, { context: { model } });
    this.name = "UnknownModelError";
    this.model = model;
  }
}

// ============================================
// Guards
// ============================================

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

/**
 * Checks if an error is retryable.
 * Returns true if error is a GatewayError with isRetryable=true.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof GatewayError && error.isRetryable;
}

/**
 * Errors that stop a fail-fast batch.
 */
export function isBatchStoppingError(error: unknown): boolean {
  return error instanceof BudgetExceededError || error instanceof FatalProviderError;
}
