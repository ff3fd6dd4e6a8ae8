// ============================================
// Gateway Events
// Rate limiting, retry and budget lifecycle
// ============================================

import { z } from "zod";
import { defineEvent } from "./bus.js";

const errorKindSchema = z.enum(["rate-limited", "retryable", "fatal"]);

/**
 * A caller had to wait for rate-limit capacity.
 */
export const rateLimitThrottle = defineEvent(
  "rate-limit:throttle",
  z.object({
    modelId: z.string(),
    waitMs: z.number().nonnegative(),
    /** Callers queued behind this model's limiter, this one included */
    queued: z.number().int().nonnegative(),
    timestamp: z.number(),
  })
);

/**
 * A caller gave up waiting for capacity after `maxWaitMs`.
 */
export const rateLimitTimeout = defineEvent(
  "rate-limit:timeout",
  z.object({
    modelId: z.string(),
    waitedMs: z.number().nonnegative(),
    maxWaitMs: z.number().nonnegative(),
    timestamp: z.number(),
  })
);

/**
 * An attempt failed and another one is scheduled.
 */
export const retryAttempt = defineEvent(
  "retry:attempt",
  z.object({
    modelId: z.string(),
    /** The attempt that just failed (1-based) */
    attempt: z.number().int().positive(),
    kind: errorKindSchema,
    delayMs: z.number().nonnegative(),
    reason: z.string(),
    timestamp: z.number(),
  })
);

/**
 * A logical call finished, successfully or not.
 */
export const retryCompleted = defineEvent(
  "retry:completed",
  z.object({
    modelId: z.string(),
    attempts: z.number().int().nonnegative(),
    succeeded: z.boolean(),
    durationMs: z.number().nonnegative(),
    timestamp: z.number(),
  })
);

/**
 * A reservation was rejected because a budget in the stack would overflow.
 */
export const budgetExceeded = defineEvent(
  "budget:exceeded",
  z.object({
    budget: z.string(),
    ceiling: z.bigint(),
    committed: z.bigint(),
    reserved: z.bigint(),
    requested: z.bigint(),
    timestamp: z.number(),
  })
);

/**
 * A budget scope exited and was frozen.
 */
export const budgetClosed = defineEvent(
  "budget:closed",
  z.object({
    budget: z.string(),
    ceiling: z.bigint().nullable(),
    committed: z.bigint(),
    discarded: z.bigint(),
    /** `{ [budget name]: spent USD }` */
    report: z.record(z.number()),
    timestamp: z.number(),
  })
);

/**
 * All gateway events, keyed for iteration.
 */
export const GatewayEvents = {
  rateLimitThrottle,
  rateLimitTimeout,
  retryAttempt,
  retryCompleted,
  budgetExceeded,
  budgetClosed,
} as const;

export type GatewayEventName = keyof typeof GatewayEvents;

/**
 * Payload type of a gateway event.
 */
export type GatewayEventPayload<K extends GatewayEventName> = (typeof GatewayEvents)[K] extends {
  schema: z.ZodType<infer T, z.ZodTypeDef, unknown>;
}
  ? T
  : never;
