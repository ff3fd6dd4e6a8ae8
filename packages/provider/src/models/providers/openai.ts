/**
 * OpenAI model definitions
 * @module models/providers/openai
 */

import type { ModelSpecInput } from "../types.js";

const OPENAI_RATE_LIMIT = { kind: "token-bucket", capacity: 10, refillPerSecond: 5 } as const;

/**
 * OpenAI model catalog
 * Pricing: https://openai.com/api/pricing
 */
export const OPENAI_MODELS: ModelSpecInput[] = [
  {
    id: "openai/gpt-4o",
    provider: "openai",
    providerModel: "gpt-4o",
    aliases: ["gpt-4o"],
    pricing: { inputPerMillion: "2.50", outputPerMillion: "10.00" },
    rateLimit: OPENAI_RATE_LIMIT,
    maxOutputTokens: 16384,
    contextWindow: 128000,
    capabilities: ["text", "structured", "streaming"],
  },
  {
    id: "openai/gpt-4o-mini",
    provider: "openai",
    providerModel: "gpt-4o-mini",
    aliases: ["gpt-4o-mini"],
    pricing: { inputPerMillion: "0.15", outputPerMillion: "0.60" },
    rateLimit: OPENAI_RATE_LIMIT,
    maxOutputTokens: 16384,
    contextWindow: 128000,
    capabilities: ["text", "structured", "streaming"],
  },
  {
    id: "openai/o4-mini",
    provider: "openai",
    providerModel: "o4-mini",
    aliases: ["o4-mini"],
    pricing: { inputPerMillion: "1.10", outputPerMillion: "4.40" },
    rateLimit: OPENAI_RATE_LIMIT,
    maxOutputTokens: 100000,
    contextWindow: 200000,
    capabilities: ["text", "structured"],
  },
];
