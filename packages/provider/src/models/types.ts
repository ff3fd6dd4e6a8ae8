/**
 * ModelSpec types and Zod schemas
 * @module models/types
 */

import { type Money, perMillionToPerToken, usd } from "@modelgate/shared";
import { z } from "zod";
import { PROVIDER_TYPES, type ProviderType } from "../types.js";

// =============================================================================
// Zod Schemas
// =============================================================================

/**
 * A USD price, as a number or an exact decimal string
 */
export const priceSchema = z.union([
  z.number().nonnegative().finite(),
  z.string().regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal amount"),
]);

export type Price = z.infer<typeof priceSchema>;

/**
 * A price per million tokens that converts to a whole picodollar rate per token
 */
const perMillionPriceSchema = priceSchema.superRefine((price, ctx) => {
  try {
    perMillionToPerToken(price);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
  }
});

/**
 * Per-model pricing, quoted the way vendors publish it
 */
export const pricingSchema = z.object({
  /** Price per million input tokens (USD) */
  inputPerMillion: perMillionPriceSchema,
  /** Price per million output tokens (USD) */
  outputPerMillion: perMillionPriceSchema,
  /** Flat fee per call (USD) */
  perCall: priceSchema.default(0),
});

export type Pricing = z.infer<typeof pricingSchema>;

/**
 * Default admission policy for a model
 */
export const rateLimitPolicySchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("token-bucket"),
    /** Maximum burst of requests */
    capacity: z.number().int().positive(),
    /** Requests restored per second */
    refillPerSecond: z.number().positive(),
  }),
  z.object({
    kind: z.literal("fixed-window"),
    /** Requests admitted per window */
    limit: z.number().int().positive(),
    /** Window length in milliseconds */
    windowMs: z.number().int().positive(),
  }),
]);

export type RateLimitPolicy = z.infer<typeof rateLimitPolicySchema>;

export const capabilitySchema = z.enum(["text", "structured", "streaming"]);

export type ModelCapability = z.infer<typeof capabilitySchema>;

const providerTypeSchema = z.custom<ProviderType>(
  (value) => typeof value === "string" && PROVIDER_TYPES.some((provider) => provider === value),
  { message: `Provider must be one of: ${PROVIDER_TYPES.join(", ")}` }
);

/**
 * Canonical ModelSpec schema
 */
export const modelSpecSchema = z.object({
  /** Unique routing name (e.g., "openai/gpt-4o-mini") */
  id: z.string().min(1),
  provider: providerTypeSchema,
  /** Model name sent to the vendor */
  providerModel: z.string().min(1),
  /** Alternate routing names */
  aliases: z.array(z.string().min(1)).default([]),
  pricing: pricingSchema,
  rateLimit: rateLimitPolicySchema,
  /** Whether a failed request that reached the vendor is still billed */
  billFailedRequests: z.boolean().default(false),
  /** Output cap sent as max_tokens */
  maxOutputTokens: z.number().int().positive().default(4096),
  /** Typical reply length priced into the pre-dispatch reservation */
  expectedOutputTokens: z.number().int().positive().default(1000),
  contextWindow: z.number().int().positive().optional(),
  capabilities: z.array(capabilitySchema).default(["text", "structured"]),
  /** Charge the vendor-reported cost instead of the computed one when both exist */
  preferProviderCost: z.boolean().default(false),
  description: z.string().optional(),
});

export type ModelSpecInput = z.input<typeof modelSpecSchema>;

// =============================================================================
// Registered Spec
// =============================================================================

/**
 * Pricing quantized to picodollars at registration time
 */
export interface TokenRates {
  /** Picodollars per input token */
  readonly input: Money;
  /** Picodollars per output token */
  readonly output: Money;
  /** Picodollars per call */
  readonly perCall: Money;
}

type DeepReadonly<T> = T extends readonly (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * A validated, frozen model specification
 */
export type ModelSpec = DeepReadonly<z.infer<typeof modelSpecSchema>> & {
  readonly rates: TokenRates;
};

/**
 * Provider-wide defaults used to route `provider/...` names that have no
 * registered spec of their own
 */
export const providerDefaultsSchema = modelSpecSchema.pick({
  pricing: true,
  rateLimit: true,
  billFailedRequests: true,
  maxOutputTokens: true,
  expectedOutputTokens: true,
  capabilities: true,
  preferProviderCost: true,
});

export type ProviderDefaultsInput = z.input<typeof providerDefaultsSchema>;

// =============================================================================
// Validation Functions
// =============================================================================

/**
 * Validate, quantize and freeze a model spec
 *
 * @throws {z.ZodError} When the input does not match {@link modelSpecSchema}
 */
export function defineModelSpec(input: ModelSpecInput): ModelSpec {
  const parsed = modelSpecSchema.parse(input);
  const rates: TokenRates = Object.freeze({
    input: perMillionToPerToken(parsed.pricing.inputPerMillion),
    output: perMillionToPerToken(parsed.pricing.outputPerMillion),
    perCall: usd(parsed.pricing.perCall),
  });

  return Object.freeze({
    ...parsed,
    aliases: Object.freeze([...parsed.aliases]),
    capabilities: Object.freeze([...parsed.capabilities]),
    pricing: Object.freeze({ ...parsed.pricing }),
    rateLimit: Object.freeze({ ...parsed.rateLimit }),
    rates,
  });
}

export function safeDefineModelSpec(
  input: unknown
): { success: true; data: ModelSpec } | { success: false; error: z.ZodError } {
  const result = modelSpecSchema.safeParse(input);
  if (!result.success) {
    return { success: false, error: result.error };
  }
  return { success: true, data: defineModelSpec(result.data) };
}
