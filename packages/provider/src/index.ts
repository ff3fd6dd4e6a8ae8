// ============================================
// Modelgate Provider Adapters
// ============================================

// Adapters
export {
  type AnthropicAdapterOptions,
  AnthropicAdapter,
  type AnthropicMessageLike,
  type AnthropicMessagesClient,
} from "./anthropic.js";
// Error classification
export {
  classifyHttpStatus,
  classifyProviderError,
  createProviderError,
  type ErrorClassification,
  type ErrorKind,
  extractRequestId,
  extractRetryAfter,
  isProviderError,
  isRetryable,
  parseRetryAfter,
  ProviderError,
  type ProviderErrorCategory,
  type ProviderErrorContext,
  type ProviderErrorOptions,
} from "./errors.js";
export {
  createMockProvider,
  type MockFailure,
  type MockHandler,
  MockProvider,
  type MockResponse,
  type MockScript,
  type RecordedRequest,
} from "./mock.js";
// Model specs and routing
export * from "./models/index.js";
export {
  type ChatCompletionLike,
  type ChatCompletionsClient,
  mapFinishReason,
  OpenAIAdapter,
  type OpenAIAdapterOptions,
} from "./openai.js";
export { OpenRouterAdapter, type OpenRouterAdapterOptions } from "./openrouter.js";
export { createProviderAdapter, ProviderRegistry, type ProviderRegistryOptions } from "./registry.js";
// Token estimation
export { estimateMessageTokens, estimatePromptTokens, estimateTokenCount } from "./tokenizer.js";
// Boundary types
export {
  type ChatMessage,
  type FinishReason,
  type GenerationParams,
  isProviderType,
  type MessageRole,
  PROVIDER_TYPES,
  type ProviderAdapter,
  type ProviderOptions,
  type ProviderRequest,
  type ProviderType,
  type RawResponse,
  type SendOptions,
} from "./types.js";
