/**
 * Token Estimation Utilities
 *
 * Character-length heuristics used to size speculative budget reservations
 * before a request is dispatched. Actual usage always comes from the vendor.
 *
 * @module @modelgate/provider/tokenizer
 */

import type { ChatMessage } from "./types.js";

// =============================================================================
// Fallback Estimation
// =============================================================================

type ContentType = "english" | "code" | "cjk";

/**
 * Average characters per token for different content types.
 * English averages ~4 chars/token, code ~3, CJK scripts ~2.
 */
const CHARS_PER_TOKEN: Record<ContentType, number> = {
  english: 4,
  code: 3,
  cjk: 2,
};

/** Role and framing overhead per chat message */
const MESSAGE_OVERHEAD_TOKENS = 4;

/** Priming tokens every chat request carries */
const REQUEST_OVERHEAD_TOKENS = 3;

const CODE_PATTERN = /[{}[\]();=><]|function|const|let|var|import|export|class|def|async|await/;
const CJK_PATTERN = /[\u4e00-\u9fff\u3040-\u309f\u30a0-\u30ff\uac00-\ud7af]/g;

function detectContentType(text: string): ContentType {
  const cjk = text.match(CJK_PATTERN);
  if (cjk && cjk.length > text.length * 0.2) {
    return "cjk";
  }
  if (CODE_PATTERN.test(text)) {
    return "code";
  }
  return "english";
}

/**
 * Estimate token count using character length heuristic.
 *
 * @example
 * ```typescript
 * estimateTokenCount("Hello, world!"); // 4 (13 chars / 4, rounded up)
 * ```
 */
export function estimateTokenCount(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN[detectContentType(text)]);
}

/**
 * Estimate tokens for a message including role overhead
 */
export function estimateMessageTokens(message: ChatMessage): number {
  return MESSAGE_OVERHEAD_TOKENS + estimateTokenCount(message.content);
}

/**
 * Estimate the prompt size of a whole chat request
 */
export function estimatePromptTokens(messages: readonly ChatMessage[]): number {
  return messages.reduce((sum, message) => sum + estimateMessageTokens(message), REQUEST_OVERHEAD_TOKENS);
}
