/**
 * OpenAI Provider Adapter
 *
 * Sends chat completions through the official `openai` SDK. The SDK's own
 * retry loop is disabled; retries belong to the dispatch core.
 *
 * @module @modelgate/provider/openai
 */

import { ErrorCode } from "@modelgate/shared";
import OpenAI from "openai";
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { createProviderError, ProviderError } from "./errors.js";
import type {
  ChatMessage,
  FinishReason,
  ProviderAdapter,
  ProviderOptions,
  ProviderRequest,
  ProviderType,
  RawResponse,
  SendOptions,
} from "./types.js";

// =============================================================================
// Client Surface
// =============================================================================

/**
 * The part of a chat completion the adapter reads
 */
export interface ChatCompletionLike {
  id: string;
  choices: Array<{
    message: { content: string | null };
    finish_reason: string | null;
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number };
}

/**
 * The part of the `OpenAI` client the adapter calls. An `OpenAI` instance
 * satisfies it; tests pass a stub.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): PromiseLike<ChatCompletionLike>;
    };
  };
}

export interface OpenAIAdapterOptions extends ProviderOptions {
  /** Pre-built client; skips API key resolution */
  client?: ChatCompletionsClient;
}

// =============================================================================
// OpenAIAdapter
// =============================================================================

/**
 * OpenAI chat completions adapter
 *
 * @example
 * ```typescript
 * const adapter = new OpenAIAdapter({ apiKey: process.env.OPENAI_API_KEY });
 * const response = await adapter.send({
 *   model: "gpt-4o-mini",
 *   messages: [{ role: "user", content: "Hello!" }],
 * });
 * ```
 */
export class OpenAIAdapter implements ProviderAdapter {
  protected readonly client: ChatCompletionsClient;

  constructor(options: OpenAIAdapterOptions = {}) {
    this.client = options.client ?? this.createClient(options);
  }

  get provider(): ProviderType {
    return "openai";
  }

  async send(request: ProviderRequest, options: SendOptions = {}): Promise<RawResponse> {
    let response: ChatCompletionLike;
    try {
      response = await this.client.chat.completions.create(this.buildRequest(request), {
        signal: options.signal,
      });
    } catch (error) {
      throw createProviderError(error, { provider: this.provider, model: request.model });
    }
    return this.normalizeResponse(response, request.model);
  }

  // ===========================================================================
  // Protected Hooks
  // ===========================================================================

  /** Environment variable holding the API key */
  protected get apiKeyEnv(): string {
    return "OPENAI_API_KEY";
  }

  /** Base URL when none is configured (undefined means the SDK default) */
  protected get defaultBaseUrl(): string | undefined {
    return undefined;
  }

  protected defaultHeaders(options: ProviderOptions): Record<string, string> | undefined {
    return options.headers;
  }

  protected buildRequest(request: ProviderRequest): ChatCompletionCreateParamsNonStreaming {
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: request.messages.map(toMessageParam),
      stream: false,
    };

    if (request.maxOutputTokens !== undefined) {
      body.max_tokens = request.maxOutputTokens;
    }
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }
    if (request.topP !== undefined) {
      body.top_p = request.topP;
    }
    if (request.stop && request.stop.length > 0) {
      body.stop = request.stop;
    }
    if (request.responseFormat === "json") {
      body.response_format = { type: "json_object" };
    }

    return body;
  }

  /**
   * Vendor-reported cost in USD, when the response carries one
   */
  protected extractCost(_response: ChatCompletionLike): number | undefined {
    return undefined;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private createClient(options: ProviderOptions): ChatCompletionsClient {
    const apiKey = options.apiKey ?? process.env[this.apiKeyEnv];
    if (!apiKey) {
      throw new ProviderError(`No API key provided for ${this.provider} (set ${this.apiKeyEnv})`, {
        code: ErrorCode.CREDENTIAL_NOT_FOUND,
        category: "credential_invalid",
        kind: "fatal",
        context: { provider: this.provider },
      });
    }

    return new OpenAI({
      apiKey,
      baseURL: options.baseUrl ?? this.defaultBaseUrl,
      timeout: options.timeoutMs ?? 60_000,
      maxRetries: 0,
      defaultHeaders: this.defaultHeaders(options),
    });
  }

  private normalizeResponse(response: ChatCompletionLike, model: string): RawResponse {
    const choice = response.choices[0];
    if (!choice) {
      throw new ProviderError("No completion choice returned", {
        code: ErrorCode.API_ERROR,
        category: "server_error",
        kind: "retryable",
        context: { provider: this.provider, model, requestId: response.id },
      });
    }

    return {
      text: choice.message.content ?? "",
      usage: {
        inputTokens: response.usage?.prompt_tokens ?? 0,
        outputTokens: response.usage?.completion_tokens ?? 0,
      },
      costUsd: this.extractCost(response),
      finishReason: mapFinishReason(choice.finish_reason),
      requestId: response.id,
    };
  }
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    default:
      return { role: "user", content: message.content };
  }
}

export function mapFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case "stop":
    case "end_turn":
    case "stop_sequence":
    case "tool_calls":
    case "tool_use":
      return "stop";
    case "length":
    case "max_tokens":
      return "length";
    case "content_filter":
    case "refusal":
      return "content_filter";
    default:
      return "unknown";
  }
}
