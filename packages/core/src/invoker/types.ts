// ============================================
// Invocation Types
// ============================================

import type {
  ChatMessage,
  FinishReason,
  GenerationParams,
  ModelRegistry,
  ModelSpec,
  Price,
  ProviderRegistry,
} from "@modelgate/provider";
import type { Money, TokenUsage } from "@modelgate/shared";
import type { BudgetStack, BudgetViolation, CancelledCostPolicy, CostTracker } from "../cost/index.js";
import type { Logger } from "../logger/index.js";
import type { RetryExecutor, RetryPolicy } from "../retry/index.js";
import type { OutputSchema } from "../structured/index.js";

/**
 * One "ask the model for X" request.
 */
export interface InvocationRequest<T = unknown> {
  /** Model id, alias or `provider/model` route, or a spec */
  readonly model: string | ModelSpec;
  readonly messages: readonly ChatMessage[];
  /** Decode the reply into this shape, asking for corrections when it does not fit */
  readonly schema?: OutputSchema<T>;
  readonly params?: Readonly<GenerationParams>;
  /** Ceiling for this request alone (USD), on top of the enclosing budgets */
  readonly ceilingUsd?: Price;
  /** Overrides the invoker's correction limit for this request */
  readonly maxParseAttempts?: number;
  /** Reply length priced into the reservation; defaults to the model's `expectedOutputTokens` */
  readonly expectedOutputTokens?: number;
  /** Ask the vendor for its JSON response mode */
  readonly responseFormat?: "text" | "json";
}

/**
 * Outcome of a successful invocation. For structured requests, usage, cost
 * and attempts cover every correction round.
 */
export interface InvocationResult<T = unknown> {
  modelId: string;
  /** Text of the reply that produced the result */
  text: string;
  /** Decoded value; present when the request had a schema */
  parsed?: T;
  usage: TokenUsage;
  cost: Money;
  latencyMs: number;
  /** Provider attempts dispatched, retries included */
  attempts: number;
  /** Replies decoded; 1 for unstructured requests */
  parseAttempts: number;
  finishReason: FinishReason;
  requestId?: string;
  /** Set when billed cost pushed a budget past its ceiling after admission */
  budgetViolation?: BudgetViolation;
}

export interface InvokeOptions {
  signal?: AbortSignal;
  /** Budgets to charge, innermost first (default: the tracker's root stack) */
  budget?: BudgetStack;
  cancelledCostPolicy?: CancelledCostPolicy;
  retry?: Partial<RetryPolicy>;
  /** Overrides the rate limiter's wait ceiling */
  maxWaitMs?: number;
}

export interface ModelInvokerOptions {
  registry: ModelRegistry;
  providers: ProviderRegistry;
  retry: RetryExecutor;
  tracker: CostTracker;
  /** Default correction limit for structured requests */
  maxParseAttempts?: number;
  cancelledCostPolicy?: CancelledCostPolicy;
  logger?: Logger;
}
