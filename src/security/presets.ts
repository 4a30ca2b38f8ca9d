/**
 * Named limiter presets and factories
 *
 * There are no module-level limiter instances: every call builds fresh
 * limiters, each with its own registry and sweeper, so separate callers and
 * test runs never share client state.
 */

import { AdmissionMiddleware, type AdmissionMiddlewareOptions } from '../core/middleware/admission-middleware.js';
import { loadRateLimitEnv } from '../config/rate-limit-config.js';
import type { BucketParameters } from '../interfaces/rate-limiter.js';

/**
 * | Preset   | Sustained rate | Burst |
 * |----------|----------------|-------|
 * | public   | 5000/s         | 100   |
 * | internal | 10000/s        | 200   |
 * | web      | 300/s          | 30    |
 * | strict   | 100/s          | 10    |
 */
export const RATE_LIMIT_PRESETS = {
  /** Public-facing endpoints with high traffic */
  public: { capacity: 100, refillRatePerSecond: 5000 },
  /** Service-to-service traffic */
  internal: { capacity: 200, refillRatePerSecond: 10000 },
  /** Endpoints driven by users in a browser */
  web: { capacity: 30, refillRatePerSecond: 300 },
  /** Authentication, payments and other sensitive endpoints */
  strict: { capacity: 10, refillRatePerSecond: 100 },
} as const satisfies Record<string, BucketParameters>;

export type RateLimitPresetName = keyof typeof RATE_LIMIT_PRESETS;

export const PRESET_NAMES: readonly RateLimitPresetName[] = ['public', 'internal', 'web', 'strict'];

/**
 * Options shared by preset limiters (bucket parameters come from the preset)
 */
export type PresetLimiterOptions = Omit<
  AdmissionMiddlewareOptions,
  'capacity' | 'refillRatePerSecond' | 'name'
> & {
  /** Environment to read sweep overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

export type PresetLimiters = Record<RateLimitPresetName, AdmissionMiddleware> & {
  /** Stops every preset's sweeper and drops its clients */
  destroyAll(): void;
};

/**
 * Builds a limiter with arbitrary parameters
 *
 * @throws {RateLimitConfigError} If options are out of range
 */
export function createRateLimiter(options: AdmissionMiddlewareOptions): AdmissionMiddleware {
  return new AdmissionMiddleware(options);
}

/**
 * Builds one preset limiter
 *
 * Sweep settings resolve as: explicit option, then
 * RATE_LIMIT_SWEEP_INTERVAL_MS / RATE_LIMIT_IDLE_THRESHOLD_MS, then defaults.
 */
export function createPresetLimiter(
  preset: RateLimitPresetName,
  options: PresetLimiterOptions = {}
): AdmissionMiddleware {
  const { env, ...limiterOptions } = options;
  const overrides = loadRateLimitEnv(env);

  return new AdmissionMiddleware({
    ...limiterOptions,
    name: preset,
    ...RATE_LIMIT_PRESETS[preset],
    sweepIntervalMs: limiterOptions.sweepIntervalMs ?? overrides.sweepIntervalMs,
    idleThresholdMs: limiterOptions.idleThresholdMs ?? overrides.idleThresholdMs,
  });
}

/**
 * Builds all four presets, each independent of the others
 */
export function createPresetLimiters(options: PresetLimiterOptions = {}): PresetLimiters {
  const limiters = {
    public: createPresetLimiter('public', options),
    internal: createPresetLimiter('internal', options),
    web: createPresetLimiter('web', options),
    strict: createPresetLimiter('strict', options),
  };

  return {
    ...limiters,
    destroyAll(): void {
      for (const name of PRESET_NAMES) {
        limiters[name].destroy();
      }
    },
  };
}
