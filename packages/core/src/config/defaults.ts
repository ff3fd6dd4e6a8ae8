/**
 * Centralized configuration defaults.
 */
export const CONFIG_DEFAULTS = {
  retry: {
    maxAttempts: 3,
    baseDelayMs: 1_000,
    multiplier: 2,
    maxDelayMs: 30_000,
    jitterMinMs: 0,
    jitterMaxMs: 250,
    attemptTimeoutMs: 60_000,
  },

  batch: {
    concurrency: 4,
  },

  budget: {
    rootName: "root",
  },

  structured: {
    maxParseAttempts: 3,
  },

  files: {
    /** Project file names searched from cwd upward, in order */
    project: ["modelgate.toml", ".modelgate.toml"],
    /** Global file under the home directory */
    global: [".config", "modelgate", "config.toml"],
  },
} as const;

export type ConfigDefaults = typeof CONFIG_DEFAULTS;
