/**
 * Anthropic Provider Adapter
 *
 * Sends requests through the `@anthropic-ai/sdk` messages API with the SDK
 * retry loop disabled.
 *
 * @module @modelgate/provider/anthropic
 */

import Anthropic from "@anthropic-ai/sdk";
import { ErrorCode } from "@modelgate/shared";
import { createProviderError, ProviderError } from "./errors.js";
import { mapFinishReason } from "./openai.js";
import type {
  ProviderAdapter,
  ProviderOptions,
  ProviderRequest,
  ProviderType,
  RawResponse,
  SendOptions,
} from "./types.js";

/** Anthropic requires max_tokens on every request */
const DEFAULT_MAX_TOKENS = 4096;

/** The messages API has no JSON response mode, so JSON requests get this system line */
export const JSON_ONLY_INSTRUCTION = "Respond with a single JSON object and nothing else.";

// =============================================================================
// Client Surface
// =============================================================================

/**
 * The part of an Anthropic message the adapter reads
 */
export interface AnthropicMessageLike {
  id: string;
  content: Array<{ type: string; text?: string }>;
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

/**
 * The part of the `Anthropic` client the adapter calls
 */
export interface AnthropicMessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal }
    ): PromiseLike<AnthropicMessageLike>;
  };
}

export interface AnthropicAdapterOptions extends ProviderOptions {
  client?: AnthropicMessagesClient;
}

// =============================================================================
// AnthropicAdapter
// =============================================================================

/**
 * Anthropic messages adapter
 *
 * System turns are joined into the top-level `system` field.
 *
 * @example
 * ```typescript
 * const adapter = new AnthropicAdapter();
 * const response = await adapter.send({
 *   model: "claude-sonnet-4-5",
 *   messages: [
 *     { role: "system", content: "Answer in one word." },
 *     { role: "user", content: "Capital of France?" },
 *   ],
 * });
 * ```
 */
export class AnthropicAdapter implements ProviderAdapter {
  readonly provider: ProviderType = "anthropic";
  private readonly client: AnthropicMessagesClient;

  constructor(options: AnthropicAdapterOptions = {}) {
    this.client = options.client ?? createClient(options);
  }

  async send(request: ProviderRequest, options: SendOptions = {}): Promise<RawResponse> {
    let message: AnthropicMessageLike;
    try {
      message = await this.client.messages.create(buildRequest(request), { signal: options.signal });
    } catch (error) {
      throw createProviderError(error, { provider: this.provider, model: request.model });
    }

    const text = message.content
      .map((block) => (block.type === "text" && typeof block.text === "string" ? block.text : ""))
      .join("");

    return {
      text,
      usage: {
        inputTokens: message.usage.input_tokens,
        outputTokens: message.usage.output_tokens,
      },
      finishReason: mapFinishReason(message.stop_reason),
      requestId: message.id,
    };
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

function createClient(options: ProviderOptions): AnthropicMessagesClient {
  const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new ProviderError("No API key provided for anthropic (set ANTHROPIC_API_KEY)", {
      code: ErrorCode.CREDENTIAL_NOT_FOUND,
      category: "credential_invalid",
      kind: "fatal",
      context: { provider: "anthropic" },
    });
  }

  return new Anthropic({
    apiKey,
    baseURL: options.baseUrl,
    timeout: options.timeoutMs ?? 60_000,
    maxRetries: 0,
    defaultHeaders: options.headers,
  });
}

function buildRequest(request: ProviderRequest): Anthropic.MessageCreateParamsNonStreaming {
  const systemTurns = request.messages
    .filter((message) => message.role === "system")
    .map((message) => message.content);
  if (request.responseFormat === "json") {
    systemTurns.push(JSON_ONLY_INSTRUCTION);
  }
  const system = systemTurns.join("\n\n");

  const messages: Anthropic.MessageParam[] = [];
  for (const message of request.messages) {
    if (message.role === "system") continue;
    messages.push({ role: message.role, content: message.content });
  }

  const body: Anthropic.MessageCreateParamsNonStreaming = {
    model: request.model,
    max_tokens: request.maxOutputTokens ?? DEFAULT_MAX_TOKENS,
    messages,
  };

  if (system) {
    body.system = system;
  }
  if (request.temperature !== undefined) {
    body.temperature = request.temperature;
  }
  if (request.topP !== undefined) {
    body.top_p = request.topP;
  }
  if (request.stop && request.stop.length > 0) {
    body.stop_sequences = request.stop;
  }

  return body;
}
