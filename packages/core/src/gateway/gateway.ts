// ============================================
// Model Gateway
// ============================================

import {
  createCatalogRegistry,
  type ModelRegistry,
  type ModelSpec,
  type Price,
  ProviderRegistry,
  type ProviderRegistryOptions,
} from "@modelgate/provider";
import { ErrorCode, usd } from "@modelgate/shared";
import { BatchScheduler, type BatchOptions, type BatchOutcome } from "../batch/index.js";
import {
  type ConfigError,
  type GatewayConfig,
  GatewayConfigSchema,
  type LoadConfigOptions,
  loadConfig,
  type RoleConfig,
} from "../config/index.js";
import { type BudgetReport, type BudgetStack, CostTracker } from "../cost/index.js";
import { GatewayError } from "../errors/index.js";
import { EventBus } from "../events/index.js";
import {
  type InvocationRequest,
  type InvocationResult,
  type InvokeOptions,
  ModelInvoker,
} from "../invoker/index.js";
import { createLogger, type Logger } from "../logger/index.js";
import { RateLimiter } from "../rate-limit/index.js";
import { RetryExecutor } from "../retry/index.js";

// =============================================================================
// Types
// =============================================================================

export interface ModelGatewayOptions {
  /** Validated configuration (default: every setting at its default) */
  config?: GatewayConfig;
  /** Adapters to use instead of the vendor SDK adapters */
  adapters?: ProviderRegistryOptions["adapters"];
  /** Replaces the registry built from the catalog and `config.models` */
  registry?: ModelRegistry;
  events?: EventBus;
  logger?: Logger;
  /** Jitter source for retry backoff */
  random?: () => number;
}

/**
 * The gateway bound to one budget scope. Every call made through it is
 * charged to the scope's budget and all of its parents.
 */
export interface GatewayScope {
  readonly budget: BudgetStack;
  invoke<T>(request: InvocationRequest<T>, options?: Omit<InvokeOptions, "budget">): Promise<InvocationResult<T>>;
  invokeMany<T>(
    requests: readonly InvocationRequest<T>[],
    options?: Omit<BatchOptions, "parentBudget">
  ): Promise<BatchOutcome<T>[]>;
  withBudget<R>(name: string, ceilingUsd: Price | null, fn: (scope: GatewayScope) => Promise<R>): Promise<R>;
}

// =============================================================================
// ModelGateway Class
// =============================================================================

/**
 * Entry point that wires the dispatch core from configuration: one model
 * registry, one rate limiter, one cost tracker, one event bus and one
 * logger shared by every call.
 *
 * Model names may be configured roles; `roles.parser = "openai/gpt-4o-mini"`
 * lets requests use `model: "parser"`. A role given as
 * `{ model, params }` also supplies default params, which the request's own
 * `params` override key by key.
 *
 * @example
 * ```typescript
 * const gateway = createModelGateway();
 *
 * const outcomes = await gateway.withBudget("question-42", 2, (scope) =>
 *   scope.invokeMany(forecastRequests, { concurrency: 4 })
 * );
 * console.log(gateway.report()); // { root: 1.84, "question-42": 1.84 }
 *
 * gateway.dispose();
 * ```
 */
export class ModelGateway {
  readonly config: GatewayConfig;
  readonly registry: ModelRegistry;
  readonly providers: ProviderRegistry;
  readonly limiter: RateLimiter;
  readonly tracker: CostTracker;
  readonly events: EventBus;
  readonly logger: Logger;

  private readonly invoker: ModelInvoker;
  private readonly scheduler: BatchScheduler;
  private readonly roles: ReadonlyMap<string, RoleConfig>;

  constructor(options: ModelGatewayOptions = {}) {
    const config = options.config ?? GatewayConfigSchema.parse({});
    this.config = config;
    this.events = options.events ?? new EventBus();
    this.logger =
      options.logger ?? createLogger({ level: config.logLevel, json: config.logFormat === "json" });
    this.roles = new Map(Object.entries(config.roles));

    this.registry = options.registry ?? createCatalogRegistry({ models: config.models, seal: true });
    this.providers = new ProviderRegistry({ ...config.providers, adapters: options.adapters });
    this.limiter = new RateLimiter({
      maxWaitMs: config.rateLimit.maxWaitMs,
      events: this.events,
      logger: this.logger,
    });
    this.tracker = new CostTracker({
      rootName: config.budget.name,
      rootCeiling: config.budget.ceilingUsd === undefined ? null : usd(config.budget.ceilingUsd),
      events: this.events,
      logger: this.logger,
    });

    const retry = new RetryExecutor({
      limiter: this.limiter,
      policy: config.retry,
      events: this.events,
      logger: this.logger,
      random: options.random,
    });
    this.invoker = new ModelInvoker({
      registry: this.registry,
      providers: this.providers,
      retry,
      tracker: this.tracker,
      maxParseAttempts: config.structured.maxParseAttempts,
      cancelledCostPolicy: config.batch.cancelledCostPolicy,
      logger: this.logger,
    });
    this.scheduler = new BatchScheduler(this.invoker, this.tracker, {
      concurrency: config.batch.concurrency,
      logger: this.logger,
    });
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Run one request. Charged to `options.budget`, or the root budget.
   */
  invoke<T>(request: InvocationRequest<T>, options: InvokeOptions = {}): Promise<InvocationResult<T>> {
    return this.invoker.invoke(this.withRole(request), options);
  }

  /**
   * Run many requests over bounded concurrency, one outcome per request in
   * input order. Batch defaults come from `config.batch`.
   */
  invokeMany<T>(requests: readonly InvocationRequest<T>[], options: BatchOptions = {}): Promise<BatchOutcome<T>[]> {
    return this.scheduler.runAll(
      requests.map((request) => this.withRole(request)),
      { failFast: this.config.batch.failFast, ...options }
    );
  }

  /**
   * Run `fn` inside a named budget scope, closed and reported when `fn` settles.
   *
   * @param ceilingUsd - `null` tracks spend without a ceiling
   * @param parent - Enclosing scope (default: the root budget)
   */
  withBudget<R>(
    name: string,
    ceilingUsd: Price | null,
    fn: (scope: GatewayScope) => Promise<R>,
    parent?: BudgetStack
  ): Promise<R> {
    const ceiling = ceilingUsd === null ? null : usd(ceilingUsd);
    return this.tracker.withBudget(name, ceiling, (stack) => fn(this.scope(stack)), parent);
  }

  /**
   * Resolve a model name or role to its spec.
   *
   * @throws UnknownModelError
   */
  resolveModel(model: string | ModelSpec): ModelSpec {
    return this.invoker.resolveModel(typeof model === "string" ? this.resolveRole(model) : model);
  }

  /**
   * Cumulative spend per budget name, in USD.
   */
  report(): BudgetReport {
    return this.tracker.report();
  }

  /**
   * Reject every caller still waiting for rate-limit capacity.
   */
  dispose(): void {
    this.limiter.dispose();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private resolveRole(name: string): string {
    return this.roles.get(name)?.model ?? name;
  }

  private withRole<T>(request: InvocationRequest<T>): InvocationRequest<T> {
    if (typeof request.model !== "string") {
      return request;
    }
    const role = this.roles.get(request.model);
    if (!role) {
      return request;
    }
    return {
      ...request,
      model: role.model,
      params: role.params ? { ...role.params, ...request.params } : request.params,
    };
  }

  private scope(budget: BudgetStack): GatewayScope {
    return {
      budget,
      invoke: <T>(request: InvocationRequest<T>, options: Omit<InvokeOptions, "budget"> = {}) =>
        this.invoke(request, { ...options, budget }),
      invokeMany: <T>(requests: readonly InvocationRequest<T>[], options: Omit<BatchOptions, "parentBudget"> = {}) =>
        this.invokeMany(requests, { ...options, parentBudget: budget }),
      withBudget: <R>(name: string, ceilingUsd: Price | null, fn: (scope: GatewayScope) => Promise<R>) =>
        this.withBudget(name, ceilingUsd, fn, budget),
    };
  }
}

// =============================================================================
// Factory
// =============================================================================

export interface CreateModelGatewayOptions extends Omit<ModelGatewayOptions, "config">, LoadConfigOptions {}

/**
 * Load configuration (files, environment, overrides) and build a gateway.
 *
 * @throws GatewayError when the configuration cannot be read or is invalid
 */
export function createModelGateway(options: CreateModelGatewayOptions = {}): ModelGateway {
  const result = loadConfig(options);
  if (!result.ok) {
    throw configError(result.error);
  }
  return new ModelGateway({ ...options, config: result.value });
}

function configError(error: ConfigError): GatewayError {
  const code = error.code === "PARSE_ERROR" ? ErrorCode.CONFIG_PARSE_ERROR : ErrorCode.CONFIG_INVALID;
  return new GatewayError(error.message, code, { cause: error.cause, context: { path: error.path } });
}
