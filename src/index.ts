/**
 * Per-client token bucket rate limiting middleware
 */

export {
  AdmissionMiddleware,
  buildRejection,
  REJECTION_STATUS,
  type AdmissionMiddlewareOptions,
} from './core/middleware/admission-middleware.js';
export {
  RATE_LIMIT_PRESETS,
  PRESET_NAMES,
  createRateLimiter,
  createPresetLimiter,
  createPresetLimiters,
  type RateLimitPresetName,
  type PresetLimiterOptions,
  type PresetLimiters,
} from './security/presets.js';
export { TokenBucket } from './security/token-bucket.js';
export { ClientRegistry, type ClientEntry, type ClientRegistryOptions } from './security/client-registry.js';
export {
  Sweeper,
  DEFAULT_SWEEP_INTERVAL_MS,
  DEFAULT_IDLE_THRESHOLD_MS,
  type SweeperOptions,
} from './security/sweeper.js';
export { canonicalizeAddress, resolveClientIdentity } from './security/client-identity.js';
export {
  LimiterOptionsSchema,
  RateLimitEnvSchema,
  parseLimiterOptions,
  loadRateLimitEnv,
  type LimiterOptions,
  type LimiterOptionsInput,
  type RateLimitEnv,
} from './config/rate-limit-config.js';
export { ConsoleLogger, resolveLogLevel } from './observability/console-logger.js';
export {
  RateLimitError,
  IdentityUnavailableError,
  RateLimitConfigError,
  LimiterDestroyedError,
} from './errors.js';
export type { ILogger, LogLevel } from './interfaces/logger.js';
export type {
  AdmissionDecision,
  AdmissionOutcome,
  BucketParameters,
  Clock,
  IdentityResolver,
  IRateLimiter,
  RateLimiterStats,
  RateLimitRejection,
  RejectionBody,
  SweeperStats,
} from './interfaces/rate-limiter.js';
