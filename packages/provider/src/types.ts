/**
 * Provider boundary types
 *
 * A ProviderAdapter performs exactly one network call to one vendor and either
 * resolves a {@link RawResponse} or rejects with a classified `ProviderError`.
 * Retry, rate limiting and cost accounting all live in @modelgate/core.
 *
 * @module @modelgate/provider/types
 */

import type { TokenUsage } from "@modelgate/shared";

// =============================================================================
// Provider Types
// =============================================================================

/**
 * Supported provider identifiers
 */
export type ProviderType = "openai" | "anthropic" | "openrouter" | "mock";

export const PROVIDER_TYPES: readonly ProviderType[] = ["openai", "anthropic", "openrouter", "mock"];

export function isProviderType(value: string): value is ProviderType {
  return PROVIDER_TYPES.some((provider) => provider === value);
}

/**
 * Options shared by the HTTP adapters
 */
export interface ProviderOptions {
  /** API key; falls back to the vendor's environment variable */
  apiKey?: string;
  /** Override the vendor base URL */
  baseUrl?: string;
  /** Transport-level timeout in milliseconds */
  timeoutMs?: number;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
}

// =============================================================================
// Request Types
// =============================================================================

export type MessageRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * Generation parameters forwarded to the vendor unchanged
 */
export interface GenerationParams {
  temperature?: number;
  topP?: number;
  maxOutputTokens?: number;
  stop?: string[];
}

/**
 * Normalized request handed to an adapter
 */
export interface ProviderRequest extends GenerationParams {
  /** Model name as the vendor knows it */
  model: string;
  messages: readonly ChatMessage[];
  /** Ask the vendor for a JSON object when it supports a JSON response mode */
  responseFormat?: "text" | "json";
}

export interface SendOptions {
  /** Aborts the underlying HTTP request */
  signal?: AbortSignal;
}

// =============================================================================
// Response Types
// =============================================================================

export type FinishReason = "stop" | "length" | "content_filter" | "unknown";

/**
 * Successful vendor response
 */
export interface RawResponse {
  text: string;
  usage: TokenUsage;
  /** Cost as reported by the vendor, in USD, when it reports one */
  costUsd?: number;
  finishReason: FinishReason;
  /** Vendor request id for tracing */
  requestId?: string;
}

// =============================================================================
// Adapter Interface
// =============================================================================

/**
 * One adapter per vendor.
 *
 * `send` must not retry on its own; rejections must be `ProviderError`
 * instances (adapters run vendor errors through `createProviderError`).
 *
 * @example
 * ```typescript
 * const response = await adapter.send(
 *   { model: "gpt-4o-mini", messages: [{ role: "user", content: "Hi" }] },
 *   { signal }
 * );
 * ```
 */
export interface ProviderAdapter {
  readonly provider: ProviderType;
  send(request: ProviderRequest, options?: SendOptions): Promise<RawResponse>;
}
