export { CONFIG_DEFAULTS, type ConfigDefaults } from "./defaults.js";
export {
  type ConfigError,
  type ConfigErrorCode,
  deepMerge,
  findProjectConfig,
  type LoadConfigOptions,
  loadConfig,
  parseEnvConfig,
  readTomlFile,
} from "./loader.js";
export {
  type BatchConfig,
  BatchConfigSchema,
  type CancelledCostPolicy,
  CancelledCostPolicySchema,
  type GatewayConfig,
  GatewayConfigSchema,
  GenerationParamsSchema,
  LogFormatSchema,
  LogLevelSchema,
  type PartialGatewayConfig,
  type ProviderConnection,
  ProviderConnectionSchema,
  type RetryConfig,
  RetryConfigSchema,
  type RoleConfig,
  RoleSchema,
} from "./schema.js";
