import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogThreshold } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: 'modelgate') */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogThreshold;
  /** Enable console output (default: true) */
  console?: boolean;
  /** If true, output JSON format to console (default: false) */
  json?: boolean;
  /** Enable colored console output (default: true in non-production) */
  colors?: boolean;
}

/**
 * Factory function to create a Logger with common transport configurations.
 *
 * @example
 * ```typescript
 * // Human-readable console logger
 * const logger = createLogger({ level: "debug" });
 *
 * // JSON lines for log shipping
 * const logger = createLogger({ name: "batch-runner", json: true });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    context: { logger: options.name ?? "modelgate" },
  });

  const enableConsole = options.console ?? true;
  if (enableConsole) {
    if (options.json) {
      logger.addTransport(new JsonTransport());
    } else {
      logger.addTransport(
        new ConsoleTransport({
          colors: options.colors ?? process.env.NODE_ENV !== "production",
        })
      );
    }
  }

  return logger;
}
