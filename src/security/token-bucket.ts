/**
 * Token Bucket
 *
 * Continuous-refill bucket for a single client. Tokens are not added by a
 * timer; each call computes what accrued since the last refill.
 *
 *   tokens = min(capacity, tokens + elapsedSeconds * refillRatePerSecond)
 *
 * All methods take the current time in milliseconds, so the bucket is
 * deterministic for a given sequence of timestamps.
 */

import { RateLimitConfigError } from '../errors.js';
import type { BucketParameters } from '../interfaces/rate-limiter.js';

// Refill is computed in floating point; waiting exactly 1000/rate ms can
// leave the balance at 0.9999999999999999
const TOKEN_EPSILON = 1e-9;

export class TokenBucket {
  readonly capacity: number;
  readonly refillRatePerSecond: number;
  private available: number;
  private lastRefill: number;

  /**
   * Creates a full bucket
   *
   * @param params - Burst capacity and sustained rate
   * @param now - Creation time in milliseconds
   * @throws {RateLimitConfigError} If capacity or rate are out of range
   */
  constructor(params: BucketParameters, now: number) {
    const issues: string[] = [];
    if (!Number.isInteger(params.capacity) || params.capacity < 1) {
      issues.push(`capacity: must be an integer >= 1, got ${params.capacity}`);
    }
    if (!Number.isFinite(params.refillRatePerSecond) || params.refillRatePerSecond < 0) {
      issues.push(`refillRatePerSecond: must be a finite number >= 0, got ${params.refillRatePerSecond}`);
    }
    if (issues.length > 0) {
      throw new RateLimitConfigError(issues);
    }

    this.capacity = params.capacity;
    this.refillRatePerSecond = params.refillRatePerSecond;
    this.available = params.capacity;
    this.lastRefill = now;
  }

  /** Tokens held as of the last refill */
  get tokens(): number {
    return this.available;
  }

  /** Millisecond timestamp of the last refill */
  get lastRefillTime(): number {
    return this.lastRefill;
  }

  /**
   * Refills, then takes one token if a whole token is available
   *
   * @returns true if admitted; on rejection the fractional balance is kept
   */
  tryAcquire(now: number): boolean {
    this.refill(now);

    if (this.available >= 1 - TOKEN_EPSILON) {
      this.available = Math.max(0, this.available - 1);
      return true;
    }

    return false;
  }

  /**
   * Token balance a refill at `now` would produce, without mutating
   */
  peek(now: number): number {
    return Math.min(this.capacity, this.available + this.accruedSince(now));
  }

  /**
   * Milliseconds until one whole token is available
   *
   * @returns 0 when a token is available now, Infinity when the bucket is
   * empty and never refills
   */
  msUntilNextToken(now: number): number {
    const balance = this.peek(now);
    if (balance >= 1 - TOKEN_EPSILON) {
      return 0;
    }
    if (this.refillRatePerSecond === 0) {
      return Infinity;
    }
    return ((1 - balance) * 1000) / this.refillRatePerSecond;
  }

  private accruedSince(now: number): number {
    // A clock stepping backwards accrues nothing
    const elapsedMs = Math.max(0, now - this.lastRefill);
    return (elapsedMs * this.refillRatePerSecond) / 1000;
  }

  private refill(now: number): void {
    this.available = Math.min(this.capacity, this.available + this.accruedSince(now));
    if (now > this.lastRefill) {
      this.lastRefill = now;
    }
  }
}
