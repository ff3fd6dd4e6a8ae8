/**
 * Model catalog - aggregates the built-in provider model definitions
 * @module models/catalog
 */

import type { ProviderType } from "../types.js";
import {
  ANTHROPIC_MODELS,
  OPENAI_MODELS,
  OPENROUTER_DEFAULTS,
  OPENROUTER_MODELS,
} from "./providers/index.js";
import { ModelRegistry } from "./registry.js";
import type { ModelSpecInput, ProviderDefaultsInput } from "./types.js";

export const ALL_MODELS: readonly ModelSpecInput[] = [
  ...OPENAI_MODELS,
  ...ANTHROPIC_MODELS,
  ...OPENROUTER_MODELS,
];

export const PROVIDER_DEFAULTS: ReadonlyMap<ProviderType, ProviderDefaultsInput> = new Map([
  ["openrouter", OPENROUTER_DEFAULTS],
]);

export interface CatalogRegistryOptions {
  /** Extra or replacement specs; an entry replaces the built-in spec with the same id */
  models?: readonly ModelSpecInput[];
  /** Skip the built-in catalog */
  includeBuiltins?: boolean;
  /** Seal the registry once populated */
  seal?: boolean;
}

/**
 * Build a registry from the built-in catalog plus configured models.
 *
 * @example
 * ```typescript
 * const registry = createCatalogRegistry({ models: config.models, seal: true });
 * ```
 */
export function createCatalogRegistry(options: CatalogRegistryOptions = {}): ModelRegistry {
  const { models = [], includeBuiltins = true, seal = false } = options;
  const overrides = new Set(models.map((model) => model.id));
  const builtins = includeBuiltins ? ALL_MODELS.filter((model) => !overrides.has(model.id)) : [];

  const registry = new ModelRegistry();
  registry.registerAll([...builtins, ...models]);
  if (includeBuiltins) {
    for (const [provider, defaults] of PROVIDER_DEFAULTS) {
      registry.setProviderDefaults(provider, defaults);
    }
  }
  if (seal) {
    registry.seal();
  }
  return registry;
}
