// ============================================
// Model Invoker
// ============================================

import {
  type ChatMessage,
  type ModelSpec,
  type ProviderAdapter,
  type ProviderRequest,
  type RawResponse,
  createProviderError,
} from "@modelgate/provider";
import { addUsage, createId, EMPTY_USAGE, ErrorCode, type Money, type TokenUsage, usd } from "@modelgate/shared";
import {
  Budget,
  type BudgetStack,
  type BudgetViolation,
  type CancelledCostPolicy,
  estimateCost,
  formatCost,
  resolveCost,
} from "../cost/index.js";
import { CancelledError, FatalProviderError, GatewayError, UnknownModelError } from "../errors/index.js";
import { createNullLogger, type Logger } from "../logger/index.js";
import type { RetryOutcome } from "../retry/index.js";
import { StructuredOutputParser } from "../structured/index.js";
import type { InvocationRequest, InvocationResult, InvokeOptions, ModelInvokerOptions } from "./types.js";

/**
 * One provider reply, charged.
 */
interface Exchange {
  response: RawResponse;
  cost: Money;
  attempts: number;
  violation?: BudgetViolation;
}

interface Tally {
  usage: TokenUsage;
  cost: Money;
  attempts: number;
  violation?: BudgetViolation;
  last?: RawResponse;
}

interface Target {
  spec: ModelSpec;
  adapter: ProviderAdapter;
  stack: BudgetStack;
  policy: CancelledCostPolicy;
  options: InvokeOptions;
  request: InvocationRequest<unknown>;
}

// =============================================================================
// ModelInvoker Class
// =============================================================================

/**
 * Runs one request end to end: budget reservation, rate-limited and retried
 * dispatch, charge reconciliation and optional structured decoding.
 *
 * Every provider reply goes through the same exchange:
 * 1. reserve an estimate (prompt estimate plus a full completion) against
 *    every budget in the stack; a rejection means nothing is sent
 * 2. dispatch through the {@link RetryExecutor}
 * 3. reconcile the reservation to the billed cost, which is recorded even
 *    past a ceiling and reported back as `budgetViolation`
 *
 * Structured requests repeat the exchange for every correction round.
 *
 * @example
 * ```typescript
 * const result = await invoker.invoke(
 *   { model: "openai/gpt-4o-mini", messages, schema: Forecast },
 *   { budget: questionStack, signal }
 * );
 * result.parsed?.probability;
 * ```
 */
export class ModelInvoker {
  private readonly options: ModelInvokerOptions;
  private readonly logger: Logger;

  constructor(options: ModelInvokerOptions) {
    this.options = options;
    this.logger = (options.logger ?? createNullLogger()).child({ component: "invoker" });
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * @throws UnknownModelError when the model name does not resolve
   * @throws BudgetExceededError when a reservation would overflow a budget; nothing was sent
   * @throws FatalProviderError | ExhaustedRetriesError | AttemptTimeoutError from dispatch
   * @throws ParseExhaustedError when corrections did not produce a valid reply
   * @throws CancelledError when the signal aborts
   */
  async invoke<T>(request: InvocationRequest<T>, options: InvokeOptions = {}): Promise<InvocationResult<T>> {
    const startedAt = Date.now();
    const target = this.prepare(request, options);
    const { spec } = target;

    const tally: Tally = { usage: EMPTY_USAGE, cost: 0n, attempts: 0 };
    const ask = async (messages: readonly ChatMessage[]): Promise<RawResponse> => {
      const exchange = await this.exchange(target, messages);
      tally.usage = addUsage(tally.usage, exchange.response.usage);
      tally.cost += exchange.cost;
      tally.attempts += exchange.attempts;
      tally.violation ??= exchange.violation;
      tally.last = exchange.response;
      return exchange.response;
    };

    let parsed: T | undefined;
    let parseAttempts = 1;
    if (request.schema) {
      const parser = new StructuredOutputParser(request.schema, {
        maxParseAttempts: request.maxParseAttempts ?? this.options.maxParseAttempts,
        logger: this.logger,
      });
      const output = await parser.parse(request.messages, async (messages) => (await ask(messages)).text);
      parsed = output.value;
      parseAttempts = output.attempts;
    } else {
      await ask(request.messages);
    }

    const response = tally.last;
    if (!response) {
      throw new GatewayError("Invocation finished without a reply", ErrorCode.INTERNAL_ERROR);
    }

    const latencyMs = Date.now() - startedAt;
    this.logger.debug("Invocation complete", {
      model: spec.id,
      attempts: tally.attempts,
      parseAttempts,
      cost: formatCost(tally.cost),
      latencyMs,
    });

    return {
      modelId: spec.id,
      text: response.text,
      parsed,
      usage: tally.usage,
      cost: tally.cost,
      latencyMs,
      attempts: tally.attempts,
      parseAttempts,
      finishReason: response.finishReason,
      requestId: response.requestId,
      budgetViolation: tally.violation,
    };
  }

  /**
   * Resolve a model name to its spec.
   *
   * @throws UnknownModelError
   */
  resolveModel(model: string | ModelSpec): ModelSpec {
    if (typeof model !== "string") {
      return model;
    }
    const resolved = this.options.registry.resolve(model);
    if (!resolved) {
      throw new UnknownModelError(model);
    }
    return resolved.spec;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private prepare<T>(request: InvocationRequest<T>, options: InvokeOptions): Target {
    const spec = this.resolveModel(request.model);

    let adapter: ProviderAdapter;
    try {
      adapter = this.options.providers.get(spec.provider);
    } catch (error) {
      throw new FatalProviderError(spec.id, createProviderError(error, { provider: spec.provider, model: spec.id }), 0);
    }

    let stack = options.budget ?? this.options.tracker.rootStack();
    if (request.ceilingUsd !== undefined) {
      stack = stack.push(new Budget(`request:${createId()}`, usd(request.ceilingUsd)));
    }

    return {
      spec,
      adapter,
      stack,
      policy: options.cancelledCostPolicy ?? this.options.cancelledCostPolicy ?? "retain",
      options,
      request,
    };
  }

  private async exchange(target: Target, messages: readonly ChatMessage[]): Promise<Exchange> {
    const { spec, adapter, stack, policy, options, request } = target;
    const { tracker, retry } = this.options;
    const maxOutputTokens = request.params?.maxOutputTokens ?? spec.maxOutputTokens;
    const expectedOutputTokens = Math.min(
      request.expectedOutputTokens ?? spec.expectedOutputTokens,
      maxOutputTokens
    );

    const reservation = tracker.reserve(estimateCost(spec, messages, expectedOutputTokens), stack);

    const providerRequest: ProviderRequest = {
      ...request.params,
      model: spec.providerModel,
      messages,
      maxOutputTokens,
      responseFormat: request.responseFormat,
    };

    let billedFailures = 0n;
    let outcome: RetryOutcome;
    try {
      outcome = await retry.execute(spec, adapter, providerRequest, {
        signal: options.signal,
        policy: options.retry,
        maxWaitMs: options.maxWaitMs,
        onBilledFailure: (usage) => {
          billedFailures += resolveCost(spec, usage).total;
        },
      });
    } catch (error) {
      if (error instanceof CancelledError) {
        tracker.settleCancelled(reservation, billedFailures, policy);
      } else if (billedFailures > 0n) {
        tracker.reconcile(reservation, billedFailures);
      } else {
        tracker.release(reservation);
      }
      throw error;
    }

    const { response } = outcome;
    const cost = resolveCost(spec, response.usage, response.costUsd).total + billedFailures;

    if (options.signal?.aborted) {
      tracker.settleCancelled(reservation, cost, policy);
      throw new CancelledError("Invocation cancelled; reply discarded", { cause: options.signal.reason });
    }

    const violation = tracker.reconcile(reservation, cost);
    return { response, cost, attempts: outcome.attempts, violation };
  }
}

/**
 * Create a model invoker.
 */
export function createModelInvoker(options: ModelInvokerOptions): ModelInvoker {
  return new ModelInvoker(options);
}
