/**
 * Anthropic model definitions
 * @module models/providers/anthropic
 */

import type { ModelSpecInput } from "../types.js";

const ANTHROPIC_RATE_LIMIT = { kind: "fixed-window", limit: 50, windowMs: 60_000 } as const;

/**
 * Anthropic model catalog
 * Pricing: https://www.anthropic.com/pricing
 */
export const ANTHROPIC_MODELS: ModelSpecInput[] = [
  {
    id: "anthropic/claude-sonnet-4-5",
    provider: "anthropic",
    providerModel: "claude-sonnet-4-5",
    aliases: ["claude-sonnet-4-5", "claude-sonnet-4.5"],
    pricing: { inputPerMillion: "3.00", outputPerMillion: "15.00" },
    rateLimit: ANTHROPIC_RATE_LIMIT,
    maxOutputTokens: 8192,
    contextWindow: 200000,
    capabilities: ["text", "structured", "streaming"],
  },
  {
    id: "anthropic/claude-haiku-4-5",
    provider: "anthropic",
    providerModel: "claude-haiku-4-5",
    aliases: ["claude-haiku-4-5"],
    pricing: { inputPerMillion: "1.00", outputPerMillion: "5.00" },
    rateLimit: ANTHROPIC_RATE_LIMIT,
    maxOutputTokens: 8192,
    contextWindow: 200000,
    capabilities: ["text", "structured", "streaming"],
  },
];
