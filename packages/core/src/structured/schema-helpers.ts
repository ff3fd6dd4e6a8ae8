import { z } from "zod";

/**
 * An enum that accepts its values in any letter case and normalizes them
 * to the declared spelling.
 *
 * @example
 * ```typescript
 * const Direction = caseInsensitiveEnum(["Up", "Down"]);
 * Direction.parse("DOWN"); // "Down"
 * ```
 */
export function caseInsensitiveEnum<U extends string, T extends Readonly<[U, ...U[]]>>(values: T) {
  return z.preprocess((value) => {
    if (typeof value !== "string") return value;
    const lower = value.toLowerCase();
    return values.find((candidate) => candidate.toLowerCase() === lower) ?? value;
  }, z.enum(values));
}
