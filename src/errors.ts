/**
 * Error types raised by the rate limiter
 *
 * Only misconfiguration and identity failures are errors. A rate-limited
 * request is an ordinary admission outcome and is returned as a value.
 */

/**
 * Base class carrying a stable machine-readable code
 */
export abstract class RateLimitError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The request carries no usable client network address.
 *
 * Usually a proxy or transport misconfiguration, so it is surfaced as a
 * server error rather than admitted or throttled.
 */
export class IdentityUnavailableError extends RateLimitError {
  readonly code = 'IDENTITY_UNAVAILABLE';

  constructor(readonly rawAddress: string | undefined) {
    super(
      rawAddress === undefined
        ? 'Client identity unavailable: request has no remote address'
        : `Client identity unavailable: cannot parse remote address "${rawAddress}"`
    );
  }
}

/**
 * Limiter options failed validation
 */
export class RateLimitConfigError extends RateLimitError {
  readonly code = 'INVALID_RATE_LIMIT_CONFIG';

  /**
   * @param issues - One `path: message` line per failed constraint
   */
  constructor(readonly issues: string[]) {
    super(`Invalid rate limit configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
  }
}

/**
 * Admission check on a limiter whose `destroy()` already ran
 */
export class LimiterDestroyedError extends RateLimitError {
  readonly code = 'LIMITER_DESTROYED';

  constructor(readonly limiterName: string) {
    super(`Rate limiter "${limiterName}" has been destroyed`);
  }
}
