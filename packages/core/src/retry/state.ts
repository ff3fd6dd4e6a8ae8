// ============================================
// Retry State Machine
// ============================================

import { z } from "zod";

/**
 * Phases of one logical call.
 *
 * - pending: About to request a rate-limit permit
 * - waiting: Suspended in the rate limiter
 * - in_flight: Request handed to the provider adapter
 * - retrying: Sleeping before the next attempt
 * - success: A response arrived (terminal)
 * - fatal: The call failed for good (terminal)
 */
export const RetryPhaseSchema = z.enum(["pending", "waiting", "in_flight", "retrying", "success", "fatal"]);

export type RetryPhase = z.infer<typeof RetryPhaseSchema>;

/**
 * Valid phase transitions.
 */
export const VALID_RETRY_TRANSITIONS: Readonly<Record<RetryPhase, readonly RetryPhase[]>> = {
  pending: ["waiting", "fatal"],
  waiting: ["in_flight", "fatal"],
  in_flight: ["success", "retrying", "fatal"],
  retrying: ["pending", "fatal"],
  success: [],
  fatal: [],
} as const;

export function isValidRetryTransition(from: RetryPhase, to: RetryPhase): boolean {
  return VALID_RETRY_TRANSITIONS[from].includes(to);
}

export function isTerminalRetryPhase(phase: RetryPhase): boolean {
  return VALID_RETRY_TRANSITIONS[phase].length === 0;
}
