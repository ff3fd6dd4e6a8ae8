/**
 * Provider Registry
 *
 * Creates and caches one ProviderAdapter per provider. Adapters are built on
 * first use, so a missing API key only fails requests routed to that vendor.
 *
 * @module @modelgate/provider/registry
 */

import { ErrorCode } from "@modelgate/shared";
import { AnthropicAdapter } from "./anthropic.js";
import { ProviderError } from "./errors.js";
import { MockProvider } from "./mock.js";
import { OpenAIAdapter } from "./openai.js";
import { OpenRouterAdapter, type OpenRouterAdapterOptions } from "./openrouter.js";
import { isProviderType, type ProviderAdapter, type ProviderOptions, type ProviderType } from "./types.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Per-provider adapter options
 */
export interface ProviderRegistryOptions {
  openai?: ProviderOptions;
  anthropic?: ProviderOptions;
  openrouter?: Omit<OpenRouterAdapterOptions, "client">;
  /** Adapters to use instead of building them (tests, custom vendors) */
  adapters?: Partial<Record<ProviderType, ProviderAdapter>>;
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Create a provider adapter by type
 */
export function createProviderAdapter(
  type: ProviderType,
  options: ProviderRegistryOptions = {}
): ProviderAdapter {
  switch (type) {
    case "openai":
      return new OpenAIAdapter(options.openai);
    case "anthropic":
      return new AnthropicAdapter(options.anthropic);
    case "openrouter":
      return new OpenRouterAdapter(options.openrouter);
    case "mock":
      return new MockProvider();
  }
}

// =============================================================================
// ProviderRegistry Implementation
// =============================================================================

/**
 * Provider Registry
 *
 * @example
 * ```typescript
 * const providers = new ProviderRegistry({ openrouter: { appTitle: "forecast-bot" } });
 * const adapter = providers.get("openrouter");
 *
 * // Tests
 * const providers = new ProviderRegistry({ adapters: { openai: new MockProvider(script) } });
 * ```
 */
export class ProviderRegistry {
  private readonly cache = new Map<ProviderType, ProviderAdapter>();
  private readonly options: ProviderRegistryOptions;

  constructor(options: ProviderRegistryOptions = {}) {
    this.options = options;
    for (const [type, adapter] of Object.entries(options.adapters ?? {})) {
      if (adapter) {
        this.cache.set(expectProviderType(type), adapter);
      }
    }
  }

  /**
   * Get or create the adapter for a provider
   *
   * @throws {ProviderError} When the adapter cannot be built (for example, no API key)
   */
  get(type: ProviderType): ProviderAdapter {
    const cached = this.cache.get(type);
    if (cached) {
      return cached;
    }
    const adapter = createProviderAdapter(type, this.options);
    this.cache.set(type, adapter);
    return adapter;
  }

  /**
   * Register or replace the adapter for a provider
   */
  set(type: ProviderType, adapter: ProviderAdapter): void {
    this.cache.set(type, adapter);
  }

  has(type: ProviderType): boolean {
    return this.cache.has(type);
  }

  clear(): void {
    this.cache.clear();
  }
}

function expectProviderType(type: string): ProviderType {
  if (isProviderType(type)) {
    return type;
  }
  throw new ProviderError(`Unknown provider: ${type}`, {
    code: ErrorCode.PROVIDER_NOT_FOUND,
    category: "not_found",
    kind: "fatal",
  });
}
