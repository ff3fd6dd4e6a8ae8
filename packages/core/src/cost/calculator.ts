/**
 * Cost Calculator
 *
 * Exact picodollar arithmetic over a model's quantized rates.
 *
 * @module @modelgate/core/cost
 */

import { estimatePromptTokens, type ChatMessage, type ModelSpec } from "@modelgate/provider";
import { formatUsd, type Money, PICOS_PER_USD, type TokenUsage, usd } from "@modelgate/shared";
import type { CostBreakdown } from "./types.js";

// =============================================================================
// Cost Calculation
// =============================================================================

/**
 * Calculate the cost of a single call from its token usage.
 *
 * @throws {RangeError} For negative or fractional token counts
 *
 * @example
 * ```typescript
 * const breakdown = calculateCostBreakdown(spec, { inputTokens: 1500, outputTokens: 800 });
 * console.log(`Total: ${formatCost(breakdown.total)}`);
 * ```
 */
export function calculateCostBreakdown(spec: ModelSpec, usage: TokenUsage): CostBreakdown {
  const input = BigInt(checkTokens(usage.inputTokens, "inputTokens")) * spec.rates.input;
  const output = BigInt(checkTokens(usage.outputTokens, "outputTokens")) * spec.rates.output;
  const perCall = spec.rates.perCall;

  return { input, output, perCall, total: input + output + perCall, source: "computed" };
}

/**
 * Amount to charge for a completed call.
 *
 * The vendor-reported cost replaces the computed one only for models that
 * opt in with `preferProviderCost`.
 */
export function calculateCost(spec: ModelSpec, usage: TokenUsage, providerCostUsd?: number): Money {
  return resolveCost(spec, usage, providerCostUsd).total;
}

export function resolveCost(spec: ModelSpec, usage: TokenUsage, providerCostUsd?: number): CostBreakdown {
  const computed = calculateCostBreakdown(spec, usage);
  if (spec.preferProviderCost && providerCostUsd !== undefined && providerCostUsd >= 0) {
    return { ...computed, total: usd(providerCostUsd), source: "provider" };
  }
  return computed;
}

/**
 * Estimate used for the speculative reservation: the estimated prompt plus a
 * reply of `outputTokens`, capped at the model's `maxOutputTokens`.
 *
 * Replies that run longer are caught at reconciliation and reported as a
 * budget violation.
 */
export function estimateCost(
  spec: ModelSpec,
  messages: readonly ChatMessage[],
  outputTokens: number = spec.expectedOutputTokens
): Money {
  return calculateCostBreakdown(spec, {
    inputTokens: estimatePromptTokens(messages),
    outputTokens: Math.min(outputTokens, spec.maxOutputTokens),
  }).total;
}

function checkTokens(count: number, field: string): number {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new RangeError(`${field} must be a non-negative integer, got ${count}`);
  }
  return count;
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Format an amount for display. Precision follows magnitude; digits are
 * truncated, never rounded up.
 *
 * @example
 * ```typescript
 * formatCost(usd("0.0000123")); // "$0.000012"
 * formatCost(usd("0.0045"));    // "$0.0045"
 * formatCost(usd("1234.567"));  // "$1,234.56"
 * ```
 */
export function formatCost(amount: Money): string {
  if (amount === 0n) {
    return "$0.00";
  }

  const abs = amount < 0n ? -amount : amount;
  const digits = abs >= PICOS_PER_USD ? 2 : abs >= PICOS_PER_USD / 100n ? 4 : 6;
  const [whole = "0", fraction = ""] = formatUsd(abs, digits).split(".");
  const grouped = BigInt(whole).toLocaleString("en-US");
  return `${amount < 0n ? "-" : ""}$${grouped}.${fraction}`;
}
