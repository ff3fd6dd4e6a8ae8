/**
 * Model specifications and routing
 * @module models
 */

export {
  ALL_MODELS,
  type CatalogRegistryOptions,
  createCatalogRegistry,
  PROVIDER_DEFAULTS,
} from "./catalog.js";
export { ANTHROPIC_MODELS, OPENAI_MODELS, OPENROUTER_DEFAULTS, OPENROUTER_MODELS } from "./providers/index.js";
export {
  ModelRegistrationError,
  ModelRegistry,
  type ResolvedModel,
  type RouteKind,
} from "./registry.js";
export {
  capabilitySchema,
  defineModelSpec,
  type ModelCapability,
  type ModelSpec,
  type ModelSpecInput,
  modelSpecSchema,
  type Price,
  type Pricing,
  type ProviderDefaultsInput,
  priceSchema,
  pricingSchema,
  providerDefaultsSchema,
  type RateLimitPolicy,
  rateLimitPolicySchema,
  safeDefineModelSpec,
  type TokenRates,
} from "./types.js";
