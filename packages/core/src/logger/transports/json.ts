import type { LogEntry, LogTransport } from "../types.js";

export interface JsonTransportOptions {
  /** Custom output function (default: console.log) */
  output?: (line: string) => void;
}

/**
 * JSON transport for structured log output.
 * Outputs single-line JSON objects for each log entry.
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * const transport = new JsonTransport({ output: (line) => lines.push(line) });
 * // {"time":"2025-12-26T10:00:00.000Z","level":"info","message":"Budget closed","data":{"eval":0.42}}
 * ```
 */
export class JsonTransport implements LogTransport {
  private readonly output: (line: string) => void;

  constructor(options: JsonTransportOptions = {}) {
    this.output = options.output ?? ((line) => console.log(line));
  }

  log(entry: LogEntry): void {
    const obj: Record<string, unknown> = {
      time: entry.timestamp.toISOString(),
      level: entry.level,
    };

    if (entry.context && Object.keys(entry.context).length > 0) {
      obj.context = entry.context;
    }

    obj.message = entry.message;

    if (entry.data !== undefined) {
      obj.data = entry.data;
    }
    if (entry.traceId) {
      obj.traceId = entry.traceId;
      obj.spanId = entry.spanId;
    }

    this.output(JSON.stringify(obj));
  }
}
