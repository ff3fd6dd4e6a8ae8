/**
 * OpenRouter model definitions
 * @module models/providers/openrouter
 */

import type { ModelSpecInput, ProviderDefaultsInput } from "../types.js";

const OPENROUTER_RATE_LIMIT = { kind: "token-bucket", capacity: 20, refillPerSecond: 10 } as const;

/**
 * OpenRouter model catalog
 *
 * OpenRouter reports the billed cost with each response, so these specs
 * prefer it over the computed cost.
 * Pricing: https://openrouter.ai/models
 */
export const OPENROUTER_MODELS: ModelSpecInput[] = [
  {
    id: "openrouter/anthropic/claude-sonnet-4.5",
    provider: "openrouter",
    providerModel: "anthropic/claude-sonnet-4.5",
    pricing: { inputPerMillion: "3.00", outputPerMillion: "15.00" },
    rateLimit: OPENROUTER_RATE_LIMIT,
    maxOutputTokens: 8192,
    preferProviderCost: true,
  },
  {
    id: "openrouter/openai/gpt-4o-mini",
    provider: "openrouter",
    providerModel: "openai/gpt-4o-mini",
    pricing: { inputPerMillion: "0.15", outputPerMillion: "0.60" },
    rateLimit: OPENROUTER_RATE_LIMIT,
    maxOutputTokens: 16384,
    preferProviderCost: true,
  },
];

/**
 * Defaults for any `openrouter/<vendor>/<model>` name not listed above.
 * The pricing only feeds reservations; charges use the cost OpenRouter reports.
 */
export const OPENROUTER_DEFAULTS: ProviderDefaultsInput = {
  pricing: { inputPerMillion: "5.00", outputPerMillion: "25.00" },
  rateLimit: OPENROUTER_RATE_LIMIT,
  maxOutputTokens: 4096,
  preferProviderCost: true,
};
