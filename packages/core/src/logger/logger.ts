import { context, trace } from "@opentelemetry/api";
import { sanitizeData } from "./sanitize.js";
import type { LogEntry, LoggerOptions, LogLevel, LogThreshold, LogTransport } from "./types.js";
import { LOG_LEVEL_PRIORITY } from "./types.js";

/**
 * Logger with multi-transport support, level filtering, and child logger creation.
 *
 * Payloads are sanitized before they reach a transport (bigint amounts become
 * strings, secret-looking keys are redacted).
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: "info", transports: [new ConsoleTransport()] });
 * const invokerLog = logger.child({ component: "invoker" });
 * invokerLog.debug("Dispatching attempt", { model: "openai/gpt-4o-mini", attempt: 1 });
 * ```
 */
export class Logger {
  private level: LogThreshold;
  private readonly context: Record<string, unknown>;
  private readonly transports: LogTransport[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = options.context ?? {};
    this.transports = options.transports ?? [];
  }

  trace(message: string, data?: unknown): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  fatal(message: string, data?: unknown): void {
    this.log("fatal", message, data);
  }

  /**
   * Whether entries at `level` would be written.
   */
  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  setLevel(level: LogThreshold): void {
    this.level = level;
  }

  getLevel(): LogThreshold {
    return this.level;
  }

  /**
   * Create a child logger with merged context.
   * Child shares transports with the parent and starts at its level.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      transports: this.transports,
    });
  }

  async flush(): Promise<void> {
    await Promise.all(this.transports.map((t) => t.flush?.()));
  }

  dispose(): void {
    for (const transport of this.transports) {
      transport.dispose?.();
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      data: data === undefined ? undefined : sanitizeData(data),
      ...this.getTraceContext(),
    };

    for (const transport of this.transports) {
      transport.log(entry);
    }
  }

  /**
   * Extract trace context from OpenTelemetry active span.
   */
  private getTraceContext(): { traceId?: string; spanId?: string } {
    const span = trace.getSpan(context.active());
    if (span) {
      const ctx = span.spanContext();
      return { traceId: ctx.traceId, spanId: ctx.spanId };
    }
    return {};
  }
}

/**
 * Logger that writes nothing; the default for components built without one.
 */
export function createNullLogger(): Logger {
  return new Logger({ level: "silent" });
}
