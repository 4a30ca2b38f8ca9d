/**
 * Rate limiter configuration schemas
 *
 * Limiter options and environment overrides are validated with Zod before
 * any limiter state is created.
 */

import { z, type ZodError } from 'zod';
import { RateLimitConfigError } from '../errors.js';
import { DEFAULT_IDLE_THRESHOLD_MS, DEFAULT_SWEEP_INTERVAL_MS } from '../security/sweeper.js';

/**
 * Numeric limiter options
 */
export const LimiterOptionsSchema = z.object({
  /** Name used in logs and stats */
  name: z.string().trim().min(1).default('custom'),
  /** Maximum burst (requests admitted instantly from a full bucket) */
  capacity: z.number().int().min(1),
  /** Sustained requests per second */
  refillRatePerSecond: z.number().finite().min(0),
  /** Sweep period in milliseconds (default: 60000 = 1 minute) */
  sweepIntervalMs: z.number().int().min(1).default(DEFAULT_SWEEP_INTERVAL_MS),
  /** Idle time before eviction in milliseconds (default: 300000 = 5 minutes) */
  idleThresholdMs: z.number().int().min(1).default(DEFAULT_IDLE_THRESHOLD_MS),
});

export type LimiterOptionsInput = z.input<typeof LimiterOptionsSchema>;
export type LimiterOptions = z.infer<typeof LimiterOptionsSchema>;

/**
 * Environment overrides for preset limiters
 *
 * Both variables are optional; unset means the built-in default.
 */
export const RateLimitEnvSchema = z.object({
  RATE_LIMIT_SWEEP_INTERVAL_MS: z.coerce.number().int().min(1).optional(),
  RATE_LIMIT_IDLE_THRESHOLD_MS: z.coerce.number().int().min(1).optional(),
});

export interface RateLimitEnv {
  sweepIntervalMs?: number;
  idleThresholdMs?: number;
}

/**
 * Formats Zod issues as `path: message` lines
 */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validates limiter options and applies defaults
 *
 * @throws {RateLimitConfigError} If any option is out of range
 */
export function parseLimiterOptions(input: LimiterOptionsInput): LimiterOptions {
  const result = LimiterOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new RateLimitConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Reads sweep overrides from an environment object
 *
 * Empty strings count as unset.
 *
 * @throws {RateLimitConfigError} If a variable is set but not a positive integer
 */
export function loadRateLimitEnv(env: NodeJS.ProcessEnv = process.env): RateLimitEnv {
  const blankToUndefined = (value: string | undefined): string | undefined =>
    value === undefined || value.trim() === '' ? undefined : value;

  const result = RateLimitEnvSchema.safeParse({
    RATE_LIMIT_SWEEP_INTERVAL_MS: blankToUndefined(env.RATE_LIMIT_SWEEP_INTERVAL_MS),
    RATE_LIMIT_IDLE_THRESHOLD_MS: blankToUndefined(env.RATE_LIMIT_IDLE_THRESHOLD_MS),
  });

  if (!result.success) {
    throw new RateLimitConfigError(formatIssues(result.error));
  }

  return {
    sweepIntervalMs: result.data.RATE_LIMIT_SWEEP_INTERVAL_MS,
    idleThresholdMs: result.data.RATE_LIMIT_IDLE_THRESHOLD_MS,
  };
}
