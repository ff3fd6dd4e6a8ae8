/**
 * OpenRouter Provider Adapter
 *
 * OpenRouter speaks the OpenAI chat completions protocol, so this adapter
 * reuses {@link OpenAIAdapter} with a different base URL, attribution
 * headers and the billed cost OpenRouter returns in `usage.cost`.
 *
 * @module @modelgate/provider/openrouter
 */

import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { type ChatCompletionLike, OpenAIAdapter, type OpenAIAdapterOptions } from "./openai.js";
import type { ProviderOptions, ProviderRequest, ProviderType } from "./types.js";

// =============================================================================
// OpenRouter Adapter Options
// =============================================================================

export interface OpenRouterAdapterOptions extends OpenAIAdapterOptions {
  /**
   * HTTP Referer header for request attribution
   */
  httpReferer?: string;

  /**
   * Application title for request attribution
   * Displayed in OpenRouter dashboard
   */
  appTitle?: string;
}

/**
 * Request body with OpenRouter's usage accounting switch
 */
type OpenRouterRequestBody = ChatCompletionCreateParamsNonStreaming & {
  usage?: { include: boolean };
};

// =============================================================================
// OpenRouterAdapter
// =============================================================================

/**
 * OpenRouter adapter
 *
 * Model names keep their vendor prefix (`anthropic/claude-sonnet-4.5`).
 *
 * @example
 * ```typescript
 * const adapter = new OpenRouterAdapter({ appTitle: "forecast-bot" });
 * const response = await adapter.send({
 *   model: "anthropic/claude-sonnet-4.5",
 *   messages: [{ role: "user", content: "Hello!" }],
 * });
 * response.costUsd; // billed amount reported by OpenRouter
 * ```
 */
export class OpenRouterAdapter extends OpenAIAdapter {
  override get provider(): ProviderType {
    return "openrouter";
  }

  protected override get apiKeyEnv(): string {
    return "OPENROUTER_API_KEY";
  }

  protected override get defaultBaseUrl(): string {
    return "https://openrouter.ai/api/v1";
  }

  protected override defaultHeaders(options: ProviderOptions): Record<string, string> | undefined {
    const headers: Record<string, string> = { ...options.headers };
    if (isOpenRouterOptions(options)) {
      if (options.httpReferer) {
        headers["HTTP-Referer"] = options.httpReferer;
      }
      if (options.appTitle) {
        headers["X-Title"] = options.appTitle;
      }
    }
    return Object.keys(headers).length > 0 ? headers : undefined;
  }

  protected override buildRequest(request: ProviderRequest): OpenRouterRequestBody {
    return { ...super.buildRequest(request), usage: { include: true } };
  }

  protected override extractCost(response: ChatCompletionLike): number | undefined {
    const usage: unknown = response.usage;
    if (typeof usage === "object" && usage !== null && "cost" in usage && typeof usage.cost === "number") {
      return usage.cost;
    }
    return undefined;
  }
}

function isOpenRouterOptions(options: ProviderOptions): options is OpenRouterAdapterOptions {
  return "httpReferer" in options || "appTitle" in options;
}
