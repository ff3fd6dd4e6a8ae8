import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@modelgate/shared";
import { CONFIG_DEFAULTS } from "./defaults.js";
import { type GatewayConfig, GatewayConfigSchema, type PartialGatewayConfig } from "./schema.js";

/**
 * Error types for configuration loading operations
 */
export type ConfigErrorCode = "FILE_NOT_FOUND" | "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

/**
 * Configuration error with code and context
 */
export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

export interface LoadConfigOptions {
  /** Working directory to search for config files (default: process.cwd()) */
  cwd?: string;
  /** Config overrides (highest priority) */
  overrides?: PartialGatewayConfig;
  /** Environment to read MODELGATE_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectFile?: boolean;
  /** Global config file (default: ~/.config/modelgate/config.toml); `false` skips it */
  globalConfigPath?: string | false;
}

type ConfigRecord = Record<string, unknown>;

// ============================================
// findProjectConfig
// ============================================

/**
 * Find project configuration file by searching up from startDir to root.
 *
 * @example
 * ```typescript
 * const configPath = findProjectConfig();
 * if (configPath) {
 *   console.log(`Found config at: ${configPath}`);
 * }
 * ```
 */
export function findProjectConfig(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    for (const fileName of CONFIG_DEFAULTS.files.project) {
      const configPath = path.join(currentDir, fileName);
      if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

// ============================================
// parseEnvConfig
// ============================================

interface EnvMapping {
  path: readonly [string, ...string[]];
  coerce: (value: string) => unknown;
}

const asString = (value: string): string => value;
const asNumber = (value: string): number => Number(value);

/**
 * Environment variable to config path mappings
 */
const ENV_MAPPINGS: Record<string, EnvMapping> = {
  MODELGATE_LOG_LEVEL: { path: ["logLevel"], coerce: asString },
  MODELGATE_BUDGET_USD: { path: ["budget", "ceilingUsd"], coerce: asString },
  MODELGATE_CONCURRENCY: { path: ["batch", "concurrency"], coerce: asNumber },
  MODELGATE_MAX_ATTEMPTS: { path: ["retry", "maxAttempts"], coerce: asNumber },
};

function setNestedValue(obj: ConfigRecord, keys: readonly string[], value: unknown): void {
  const [head, ...rest] = keys;
  if (head === undefined) return;
  if (rest.length === 0) {
    obj[head] = value;
    return;
  }
  const existing = obj[head];
  const child: ConfigRecord = isPlainObject(existing) ? existing : {};
  obj[head] = child;
  setNestedValue(child, rest, value);
}

/**
 * Parse MODELGATE_* environment variables into a partial config object.
 *
 * Values are coerced but not validated; validation happens once on the merged result.
 *
 * @example
 * ```typescript
 * // With MODELGATE_BUDGET_USD=2.50 set:
 * parseEnvConfig(); // { budget: { ceilingUsd: "2.50" } }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const result: ConfigRecord = {};

  for (const [envVar, mapping] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar]?.trim();
    if (value !== undefined && value !== "") {
      setNestedValue(result, mapping.path, mapping.coerce(value));
    }
  }

  return result;
}

// ============================================
// deepMerge
// ============================================

function isPlainObject(value: unknown): value is ConfigRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

/**
 * Deep merge multiple objects. Later sources override earlier ones.
 * Arrays are replaced (not concatenated).
 * undefined values don't overwrite existing values.
 *
 * @example
 * ```typescript
 * deepMerge({ a: 1, b: { c: 2 } }, { b: { d: 3 } });
 * // { a: 1, b: { c: 2, d: 3 } }
 * ```
 */
export function deepMerge(...sources: ConfigRecord[]): ConfigRecord {
  const result: ConfigRecord = {};

  for (const source of sources) {
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        result[key] = deepMerge(targetValue, sourceValue);
      } else if (isPlainObject(sourceValue)) {
        result[key] = deepMerge(sourceValue);
      } else {
        result[key] = sourceValue;
      }
    }
  }

  return result;
}

// ============================================
// loadConfig
// ============================================

function getGlobalConfigPath(): string {
  return path.join(os.homedir(), ...CONFIG_DEFAULTS.files.global);
}

/**
 * Read and parse a TOML config file
 */
export function readTomlFile(filePath: string): Result<ConfigRecord, ConfigError> {
  if (!fs.existsSync(filePath)) {
    return Err({
      code: "FILE_NOT_FOUND",
      message: `Config file not found: ${filePath}`,
      path: filePath,
    });
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }

  try {
    return Ok(TOML.parse(content));
  } catch (error) {
    return Err({
      code: "PARSE_ERROR",
      message: `Failed to parse TOML: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Load configuration from multiple sources with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults
 * 2. Global config: ~/.config/modelgate/config.toml
 * 3. Project config: findProjectConfig()
 * 4. Environment variables (unless skipEnv)
 * 5. Programmatic overrides (options.overrides)
 *
 * @example
 * ```typescript
 * const result = loadConfig({ cwd: "/my/project" });
 * if (result.ok) {
 *   console.log(result.value.batch.concurrency);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<GatewayConfig, ConfigError> {
  const { cwd, overrides, env, skipEnv = false, skipProjectFile = false } = options;
  const configs: ConfigRecord[] = [];

  const globalPath = options.globalConfigPath ?? getGlobalConfigPath();
  if (globalPath !== false) {
    const globalResult = readTomlFile(globalPath);
    if (globalResult.ok) {
      configs.push(globalResult.value);
    } else if (globalResult.error.code !== "FILE_NOT_FOUND") {
      return globalResult;
    }
  }

  if (!skipProjectFile) {
    const projectPath = findProjectConfig(cwd);
    if (projectPath) {
      const projectResult = readTomlFile(projectPath);
      if (!projectResult.ok) {
        return projectResult;
      }
      configs.push(projectResult.value);
    }
  }

  if (!skipEnv) {
    configs.push(parseEnvConfig(env));
  }

  if (overrides) {
    configs.push(overrides);
  }

  const parseResult = GatewayConfigSchema.safeParse(deepMerge(...configs));

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration: ${issues}`,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}
