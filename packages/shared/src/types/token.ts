/**
 * Token Usage Types
 *
 * Shared token usage interface so @modelgate/core and @modelgate/provider
 * agree on what a provider bills for.
 *
 * @module @modelgate/shared/types/token
 */

/**
 * Token usage statistics for a single provider call.
 *
 * @example
 * ```typescript
 * const usage: TokenUsage = { inputTokens: 150, outputTokens: 250 };
 * ```
 */
export interface TokenUsage {
  /** Number of tokens in the input/prompt */
  inputTokens: number;
  /** Number of tokens in the output/completion */
  outputTokens: number;
}

export const EMPTY_USAGE: Readonly<TokenUsage> = Object.freeze({ inputTokens: 0, outputTokens: 0 });

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
  };
}
