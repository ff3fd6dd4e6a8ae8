/**
 * Vitest Global Setup
 *
 * Keeps the environment-driven configuration layer out of test results
 * and makes sure no test leaks fake timers into the next one.
 */
import { afterEach, beforeEach, vi } from "vitest";

const CONFIG_ENV_KEYS = [
  "MODELGATE_BUDGET_USD",
  "MODELGATE_CONCURRENCY",
  "MODELGATE_MAX_ATTEMPTS",
  "OPENAI_API_KEY",
  "ANTHROPIC_API_KEY",
  "OPENROUTER_API_KEY",
] as const;

process.setMaxListeners(0);

beforeEach(() => {
  for (const key of CONFIG_ENV_KEYS) {
    delete process.env[key];
  }
});

afterEach(() => {
  vi.useRealTimers();
});
