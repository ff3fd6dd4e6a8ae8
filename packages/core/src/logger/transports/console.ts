import type { LogEntry, LogLevel, LogTransport } from "../types.js";

/**
 * ANSI color codes for terminal output.
 */
const COLORS = {
  reset: "\x1b[0m",
  gray: "\x1b[90m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.gray,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Line sink for stdout-level entries (default: console.log) */
  stdout?: (line: string) => void;
  /** Line sink for error and fatal entries (default: console.error) */
  stderr?: (line: string) => void;
}

/**
 * Colors stay off when NO_COLOR or CI is set, or stdout is not a TTY.
 */
function shouldEnableColors(): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  if (process.env.CI) {
    return false;
  }
  return process.stdout.isTTY === true;
}

/**
 * Format a timestamp as ISO string without milliseconds.
 */
function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

function formatContext(context: Record<string, unknown> | undefined): string {
  if (!context) return "";
  const component = context.component;
  return typeof component === "string" ? `(${component}) ` : "";
}

/**
 * Console transport with color support.
 *
 * Lines look like `[2025-01-02 03:04:05] [WARN ] (retry) Retrying attempt {"attempt":2}`.
 *
 * @example
 * ```typescript
 * const transport = new ConsoleTransport({ colors: true });
 * logger.addTransport(transport);
 * ```
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
  }

  log(entry: LogEntry): void {
    const timestamp = formatTimestamp(entry.timestamp);
    const level = entry.level.toUpperCase().padEnd(5);
    const message = `${formatContext(entry.context)}${entry.message}`;

    let output = this.useColors
      ? `[${timestamp}] ${LEVEL_COLORS[entry.level]}[${level}]${COLORS.reset} ${message}`
      : `[${timestamp}] [${level}] ${message}`;

    if (entry.data !== undefined) {
      const dataStr = typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data);
      output += ` ${dataStr}`;
    }

    if (entry.level === "error" || entry.level === "fatal") {
      this.stderr(output);
    } else {
      this.stdout(output);
    }
  }
}
