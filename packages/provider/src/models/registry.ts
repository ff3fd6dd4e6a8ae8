/**
 * Model registry for lookup and routing
 * @module models/registry
 */

import { ErrorCode } from "@modelgate/shared";
import { isProviderType, type ProviderType } from "../types.js";
import {
  defineModelSpec,
  type ModelSpec,
  type ModelSpecInput,
  type ProviderDefaultsInput,
  providerDefaultsSchema,
} from "./types.js";

/**
 * Raised when a registration would change an existing spec or the registry is sealed
 */
export class ModelRegistrationError extends Error {
  readonly code = ErrorCode.MODEL_ALREADY_REGISTERED;

  constructor(message: string) {
    super(message);
    this.name = "ModelRegistrationError";
  }
}

/**
 * How a name was resolved
 */
export type RouteKind = "id" | "alias" | "provider-prefix";

export interface ResolvedModel {
  spec: ModelSpec;
  via: RouteKind;
}

/**
 * ModelRegistry maps routing names to immutable ModelSpecs.
 *
 * Lookup order for a name: exact id, then alias, then `provider/rest` where
 * `provider` has registered defaults and `rest` is passed to the vendor as is.
 *
 * @example
 * ```typescript
 * const registry = new ModelRegistry();
 * registry.register({ id: "openai/gpt-4o-mini", provider: "openai", providerModel: "gpt-4o-mini", ... });
 * registry.resolve("openai/gpt-4o-mini")?.spec.rates.input;
 * ```
 */
export class ModelRegistry {
  private readonly models = new Map<string, ModelSpec>();
  private readonly aliases = new Map<string, string>();
  private readonly providerDefaults = new Map<ProviderType, ProviderDefaultsInput>();
  private readonly routed = new Map<string, ModelSpec>();
  private sealed = false;

  /**
   * Register a single model
   *
   * @throws {ModelRegistrationError} When the id or an alias is already taken, or after {@link seal}
   */
  register(input: ModelSpecInput): ModelSpec {
    this.assertOpen();
    const spec = defineModelSpec(input);

    for (const name of [spec.id, ...spec.aliases]) {
      if (this.models.has(name) || this.aliases.has(name)) {
        throw new ModelRegistrationError(`Model name "${name}" is already registered`);
      }
    }

    this.models.set(spec.id, spec);
    for (const alias of spec.aliases) {
      this.aliases.set(alias, spec.id);
    }
    return spec;
  }

  /**
   * Register multiple models
   */
  registerAll(inputs: readonly ModelSpecInput[]): ModelSpec[] {
    return inputs.map((input) => this.register(input));
  }

  /**
   * Set the pricing and rate policy used for unregistered `provider/...` names
   */
  setProviderDefaults(provider: ProviderType, defaults: ProviderDefaultsInput): void {
    this.assertOpen();
    this.providerDefaults.set(provider, providerDefaultsSchema.parse(defaults));
  }

  /**
   * Disallow further registrations
   */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Get a model by exact id or alias
   */
  get(name: string): ModelSpec | undefined {
    const direct = this.models.get(name);
    if (direct) {
      return direct;
    }
    const primaryId = this.aliases.get(name);
    return primaryId ? this.models.get(primaryId) : undefined;
  }

  has(name: string): boolean {
    return this.resolve(name) !== undefined;
  }

  /**
   * Resolve a routing name, falling back to provider-prefix routing
   */
  resolve(name: string): ResolvedModel | undefined {
    const direct = this.models.get(name);
    if (direct) {
      return { spec: direct, via: "id" };
    }

    const primaryId = this.aliases.get(name);
    const aliased = primaryId ? this.models.get(primaryId) : undefined;
    if (aliased) {
      return { spec: aliased, via: "alias" };
    }

    const cached = this.routed.get(name);
    if (cached) {
      return { spec: cached, via: "provider-prefix" };
    }

    const slash = name.indexOf("/");
    if (slash <= 0 || slash === name.length - 1) {
      return undefined;
    }
    const provider = name.slice(0, slash);
    if (!isProviderType(provider)) {
      return undefined;
    }
    const defaults = this.providerDefaults.get(provider);
    if (!defaults) {
      return undefined;
    }

    const spec = defineModelSpec({
      ...defaults,
      id: name,
      provider,
      providerModel: name.slice(slash + 1),
    });
    this.routed.set(name, spec);
    return { spec, via: "provider-prefix" };
  }

  /**
   * Get all models for a provider
   */
  getByProvider(provider: ProviderType): ModelSpec[] {
    return this.getAll().filter((spec) => spec.provider === provider);
  }

  getAll(): ModelSpec[] {
    return Array.from(this.models.values());
  }

  getProviders(): ProviderType[] {
    return Array.from(new Set(this.getAll().map((spec) => spec.provider)));
  }

  get size(): number {
    return this.models.size;
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new ModelRegistrationError("Model registry is sealed");
    }
  }
}
