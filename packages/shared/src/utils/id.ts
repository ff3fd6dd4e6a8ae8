import { randomUUID } from "node:crypto";

/**
 * Generate a unique ID, optionally namespaced with a prefix (`req_…`, `permit_…`).
 */
export function createId(prefix?: string): string {
  const id = randomUUID();
  return prefix ? `${prefix}_${id}` : id;
}
