import { modelSpecSchema, priceSchema } from "@modelgate/provider";
import { z } from "zod";
import { CONFIG_DEFAULTS } from "./defaults.js";

// ============================================
// Logging
// ============================================

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

export const LogFormatSchema = z.enum(["pretty", "json"]);

// ============================================
// Provider Connection Settings
// ============================================

/**
 * Connection settings for one vendor. API keys normally come from the
 * vendor's environment variable instead.
 */
export const ProviderConnectionSchema = z.object({
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().optional(),
  headers: z.record(z.string()).optional(),
});

export type ProviderConnection = z.infer<typeof ProviderConnectionSchema>;

export const ProvidersSchema = z.object({
  openai: ProviderConnectionSchema.optional(),
  anthropic: ProviderConnectionSchema.optional(),
  openrouter: ProviderConnectionSchema.optional(),
});

// ============================================
// Dispatch Policies
// ============================================

export const RetryConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1).default(CONFIG_DEFAULTS.retry.maxAttempts),
    baseDelayMs: z.number().int().nonnegative().default(CONFIG_DEFAULTS.retry.baseDelayMs),
    multiplier: z.number().min(1).default(CONFIG_DEFAULTS.retry.multiplier),
    maxDelayMs: z.number().int().nonnegative().default(CONFIG_DEFAULTS.retry.maxDelayMs),
    /** Jitter added to each policy delay, drawn uniformly from [min, max] */
    jitterMinMs: z.number().int().nonnegative().default(CONFIG_DEFAULTS.retry.jitterMinMs),
    jitterMaxMs: z.number().int().nonnegative().default(CONFIG_DEFAULTS.retry.jitterMaxMs),
    /** Cap on rate-limited retries; unset means unbounded */
    maxRateLimitRetries: z.number().int().nonnegative().optional(),
    attemptTimeoutMs: z.number().int().positive().default(CONFIG_DEFAULTS.retry.attemptTimeoutMs),
  })
  .refine((retry) => retry.jitterMinMs <= retry.jitterMaxMs, {
    message: "jitterMinMs must not exceed jitterMaxMs",
    path: ["jitterMinMs"],
  });

export const RateLimitConfigSchema = z.object({
  /** Give up waiting for capacity after this long; unset waits indefinitely */
  maxWaitMs: z.number().int().positive().optional(),
});

export const CancelledCostPolicySchema = z.enum(["retain", "refund"]);

export const BatchConfigSchema = z.object({
  concurrency: z.number().int().min(1).default(CONFIG_DEFAULTS.batch.concurrency),
  failFast: z.boolean().default(false),
  cancelledCostPolicy: CancelledCostPolicySchema.default("retain"),
});

export const BudgetConfigSchema = z.object({
  /** Name of the process-wide root budget */
  name: z.string().min(1).default(CONFIG_DEFAULTS.budget.rootName),
  /** Root ceiling in USD; unset means unlimited */
  ceilingUsd: priceSchema.optional(),
});

export const StructuredConfigSchema = z.object({
  maxParseAttempts: z.number().int().min(1).max(10).default(CONFIG_DEFAULTS.structured.maxParseAttempts),
});

// ============================================
// Roles
// ============================================

export const GenerationParamsSchema = z.object({
  temperature: z.number().min(0).optional(),
  topP: z.number().min(0).max(1).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  stop: z.array(z.string()).optional(),
});

/**
 * A role names a model, optionally with default generation params.
 * The short form `parser = "openai/gpt-4o-mini"` is a role without params.
 */
export const RoleSchema = z.union([
  z
    .string()
    .min(1)
    .transform((model): { model: string; params?: z.infer<typeof GenerationParamsSchema> } => ({ model })),
  z.object({
    model: z.string().min(1),
    params: GenerationParamsSchema.optional(),
  }),
]);

export type RoleConfig = z.infer<typeof RoleSchema>;

// ============================================
// Complete Configuration Schema
// ============================================

export const GatewayConfigSchema = z.object({
  logLevel: LogLevelSchema.default("info"),
  logFormat: LogFormatSchema.default("pretty"),
  budget: BudgetConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  rateLimit: RateLimitConfigSchema.default({}),
  batch: BatchConfigSchema.default({}),
  structured: StructuredConfigSchema.default({}),
  providers: ProvidersSchema.default({}),
  /** Models registered on top of (or replacing) the built-in catalog */
  models: z.array(modelSpecSchema).default([]),
  /** Named roles, e.g. `default`, `summarizer`, `parser` */
  roles: z.record(RoleSchema).default({}),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

/**
 * Partial config type for user input (before defaults are applied)
 */
export type PartialGatewayConfig = z.input<typeof GatewayConfigSchema>;

export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type CancelledCostPolicy = z.infer<typeof CancelledCostPolicySchema>;
