// ============================================
// Rate Limiting Module
// ============================================

export { FixedWindowCounter, type FixedWindowConfig } from "./fixed-window.js";
export { createCapacityCounter, createRateLimiter, RateLimiter } from "./rate-limiter.js";
export { TokenBucket, type TokenBucketConfig } from "./token-bucket.js";
export type {
  AcquireOptions,
  CapacityCounter,
  ModelLimiterStats,
  RateLimiterOptions,
  RatePermit,
} from "./types.js";
