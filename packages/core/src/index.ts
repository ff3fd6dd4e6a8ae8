// ============================================
// Modelgate Core
// ============================================

/**
 * @module @modelgate/core
 *
 * Dispatch core for LLM calls: per-model rate limiting, classified retry,
 * nested cost budgets, structured output decoding, bounded-concurrency
 * batches and the `ModelGateway` facade that wires them from configuration.
 */

// ============================================
// Batch
// ============================================
export {
  type BatchBudget,
  type BatchOptions,
  type BatchOutcome,
  BatchScheduler,
  type BatchSchedulerOptions,
  type BatchSummary,
  createBatchScheduler,
  summarizeBatch,
} from "./batch/index.js";

// ============================================
// Config
// ============================================
export {
  type BatchConfig,
  BatchConfigSchema,
  type CancelledCostPolicy,
  CancelledCostPolicySchema,
  CONFIG_DEFAULTS,
  type ConfigDefaults,
  type ConfigError,
  type ConfigErrorCode,
  deepMerge,
  findProjectConfig,
  type GatewayConfig,
  GatewayConfigSchema,
  GenerationParamsSchema,
  type LoadConfigOptions,
  LogFormatSchema,
  LogLevelSchema,
  loadConfig,
  type PartialGatewayConfig,
  parseEnvConfig,
  type ProviderConnection,
  ProviderConnectionSchema,
  type RetryConfig,
  RetryConfigSchema,
  type RoleConfig,
  RoleSchema,
  readTomlFile,
} from "./config/index.js";

// ============================================
// Cost
// ============================================
export {
  Budget,
  type BudgetReport,
  type BudgetSnapshot,
  BudgetStack,
  type BudgetViolation,
  type CostBreakdown,
  CostTracker,
  type CostTrackerOptions,
  calculateCost,
  calculateCostBreakdown,
  createCostTracker,
  estimateCost,
  formatCost,
  type Reservation,
  resolveCost,
} from "./cost/index.js";

// ============================================
// Errors
// ============================================
export {
  AttemptTimeoutError,
  abortableSleep,
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
  throwIfAborted,
  UnknownModelError,
  type WithTimeoutOptions,
  withTimeout,
} from "./errors/index.js";

// ============================================
// Events
// ============================================
export {
  budgetClosed,
  budgetExceeded,
  defineEvent,
  EventBus,
  type EventDefinition,
  EventTimeoutError,
  type GatewayEventName,
  type GatewayEventPayload,
  GatewayEvents,
  rateLimitThrottle,
  rateLimitTimeout,
  retryAttempt,
  retryCompleted,
} from "./events/index.js";

// ============================================
// Gateway
// ============================================
export {
  type CreateModelGatewayOptions,
  createModelGateway,
  type GatewayScope,
  ModelGateway,
  type ModelGatewayOptions,
} from "./gateway/index.js";

// ============================================
// Invoker
// ============================================
export {
  createModelInvoker,
  type InvocationRequest,
  type InvocationResult,
  type InvokeOptions,
  ModelInvoker,
  type ModelInvokerOptions,
} from "./invoker/index.js";

// ============================================
// Logger
// ============================================
export {
  ConsoleTransport,
  type ConsoleTransportOptions,
  type CreateLoggerOptions,
  createLogger,
  createNullLogger,
  JsonTransport,
  type JsonTransportOptions,
  LOG_LEVEL_PRIORITY,
  LOG_LEVELS,
  type LogEntry,
  Logger,
  type LoggerOptions,
  type LogLevel,
  type LogThreshold,
  type LogTransport,
  sanitizeData,
  serializeError,
} from "./logger/index.js";

// ============================================
// Rate Limiting
// ============================================
export {
  type AcquireOptions,
  type CapacityCounter,
  createCapacityCounter,
  createRateLimiter,
  type FixedWindowConfig,
  FixedWindowCounter,
  type ModelLimiterStats,
  RateLimiter,
  type RateLimiterOptions,
  type RatePermit,
  TokenBucket,
  type TokenBucketConfig,
} from "./rate-limit/index.js";

// ============================================
// Retry
// ============================================
export {
  createRetryExecutor,
  DEFAULT_RETRY_POLICY,
  type ErrorClassifier,
  type ExecuteOptions,
  isTerminalRetryPhase,
  isValidRetryTransition,
  RetryExecutor,
  type RetryExecutorOptions,
  type RetryOutcome,
  type RetryPhase,
  RetryPhaseSchema,
  type RetryPolicy,
  VALID_RETRY_TRANSITIONS,
} from "./retry/index.js";

// ============================================
// Structured Output
// ============================================
export {
  type AskFn,
  caseInsensitiveEnum,
  createStructuredOutputParser,
  type DecodeResult,
  extractBalanced,
  extractJson,
  type OutputSchema,
  type ParsedOutput,
  StructuredOutputParser,
  type StructuredOutputParserOptions,
} from "./structured/index.js";
