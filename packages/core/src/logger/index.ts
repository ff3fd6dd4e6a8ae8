export type { CreateLoggerOptions } from "./factory.js";
export { createLogger } from "./factory.js";
export { createNullLogger, Logger } from "./logger.js";
export { sanitizeData, serializeError } from "./sanitize.js";
export type { ConsoleTransportOptions, JsonTransportOptions } from "./transports/index.js";
export { ConsoleTransport, JsonTransport } from "./transports/index.js";
export type { LogEntry, LoggerOptions, LogLevel, LogThreshold, LogTransport } from "./types.js";
export { LOG_LEVEL_PRIORITY, LOG_LEVELS } from "./types.js";
