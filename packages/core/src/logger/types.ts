/**
 * Log severity levels in ascending order of importance.
 * `silent` is only meaningful as a threshold: it disables output.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogThreshold = LogLevel | "silent";

export const LOG_LEVELS: readonly LogThreshold[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

/**
 * Numeric priority for log levels (higher = more severe).
 */
export const LOG_LEVEL_PRIORITY: Record<LogThreshold, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6,
};

/**
 * A single log entry with metadata.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  /** Structured context inherited from parent loggers (component, model, budget) */
  context?: Record<string, unknown>;
  /** Sanitized payload data */
  data?: unknown;
  /** OpenTelemetry trace ID (when within active span) */
  traceId?: string;
  /** OpenTelemetry span ID (when within active span) */
  spanId?: string;
}

/**
 * Transport interface for log output destinations.
 */
export interface LogTransport {
  log(entry: LogEntry): void;
  /** Flush any buffered entries (optional) */
  flush?(): Promise<void>;
  /** Clean up resources (optional) */
  dispose?(): void;
}

export interface LoggerOptions {
  /** Minimum level to log (default: 'info') */
  level?: LogThreshold;
  /** Context data attached to all log entries */
  context?: Record<string, unknown>;
  transports?: LogTransport[];
}
