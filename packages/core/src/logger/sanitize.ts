/**
 * Payload sanitization applied before log entries reach a transport.
 *
 * Money amounts are bigint, which JSON cannot encode, and adapter options
 * carry API keys; both are handled here.
 */

const DEFAULT_MAX_DEPTH = 4;
const DEFAULT_MAX_STRING_LENGTH = 1000;

const SECRET_KEY_PATTERN = /^(?:x-)?(?:api[-_]?key|authorization|secret|password|token|access[-_]?token)$/i;

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const serialized: Record<string, unknown> = { name: error.name, message: error.message };
    if ("code" in error && error.code !== undefined) {
      serialized.code = error.code;
    }
    return serialized;
  }
  return { raw: String(error) };
}

/**
 * Sanitize data for logging: bigint to string, secrets redacted, long strings
 * truncated, depth and cycles bounded.
 *
 * @example
 * ```typescript
 * sanitizeData({ apiKey: "test-secret", spent: 5n });
 * // { apiKey: "[REDACTED]", spent: "5" }
 * ```
 */
export function sanitizeData(
  data: unknown,
  maxDepth: number = DEFAULT_MAX_DEPTH,
  maxStringLength: number = DEFAULT_MAX_STRING_LENGTH
): unknown {
  return sanitizeRecursive(data, 0, maxDepth, maxStringLength, new WeakSet());
}

function sanitizeRecursive(
  data: unknown,
  depth: number,
  maxDepth: number,
  maxStringLength: number,
  seen: WeakSet<object>
): unknown {
  switch (typeof data) {
    case "string":
      return data.length > maxStringLength
        ? `${data.slice(0, maxStringLength)}...[truncated ${data.length - maxStringLength} chars]`
        : data;
    case "bigint":
      return data.toString();
    case "symbol":
      return data.toString();
    case "function":
      return `[Function: ${data.name || "anonymous"}]`;
    case "object":
      break;
    default:
      return data;
  }

  if (data === null) {
    return null;
  }
  if (data instanceof Date) {
    return data.toISOString();
  }
  if (data instanceof Error) {
    return serializeError(data);
  }
  if (depth >= maxDepth) {
    return "[Max depth exceeded]";
  }
  if (seen.has(data)) {
    return "[Circular reference]";
  }
  seen.add(data);

  if (Array.isArray(data)) {
    return data.map((item) => sanitizeRecursive(item, depth + 1, maxDepth, maxStringLength, seen));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    result[key] = SECRET_KEY_PATTERN.test(key)
      ? "[REDACTED]"
      : sanitizeRecursive(value, depth + 1, maxDepth, maxStringLength, seen);
  }
  return result;
}
