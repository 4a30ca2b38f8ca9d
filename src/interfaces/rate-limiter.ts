/**
 * Rate Limiter Interface
 *
 * Per-client token bucket admission control. Each client starts with a full
 * burst allowance (`capacity`) and regains tokens continuously at
 * `refillRatePerSecond`. Decisions are immediate: no request is queued.
 */

import type { IncomingMessage } from 'http';

/** Millisecond timestamp source (defaults to Date.now) */
export type Clock = () => number;

/** Derives a client identity from a request, throwing when it cannot */
export type IdentityResolver = (req: IncomingMessage) => string;

export interface BucketParameters {
  /** Maximum burst, integer >= 1 */
  capacity: number;
  /** Sustained tokens per second, >= 0 */
  refillRatePerSecond: number;
}

export interface AdmissionDecision {
  /** Canonical client identity the decision applies to */
  identity: string;
  /** Whether the request may proceed */
  admitted: boolean;
  /** Whole tokens left after this decision */
  remaining: number;
  /** Milliseconds until the next token (0 when one is available) */
  retryAfterMs: number;
  /** Bucket capacity */
  limit: number;
  /** Clock reading the decision was made at */
  decidedAt: number;
}

/** JSON body of a 429 response */
export interface RejectionBody {
  status: string;
  body: string;
  locked: true;
  /** ISO 8601 rejection time */
  timestamp: string;
}

export interface RateLimitRejection {
  statusCode: 429;
  headers: Record<string, string>;
  body: RejectionBody;
}

export type AdmissionOutcome<T> =
  | { admitted: true; decision: AdmissionDecision; result: T }
  | { admitted: false; decision: AdmissionDecision; rejection: RateLimitRejection };

export interface SweeperStats {
  running: boolean;
  intervalMs: number;
  idleThresholdMs: number;
  /** Clock reading of the last completed sweep */
  lastSweepAt?: number;
  /** Entries removed by the last completed sweep */
  lastEvicted: number;
  /** Entries removed since construction */
  totalEvicted: number;
  /** Sweeps that threw */
  failures: number;
}

export interface RateLimiterStats {
  name: string;
  capacity: number;
  refillRatePerSecond: number;
  trackedClients: number;
  sweeper: SweeperStats;
}

export interface IRateLimiter {
  /**
   * Runs one admission check for an already-derived identity
   *
   * @remarks Does not throw for rate-limited clients; see `admitted`.
   */
  check(identity: string): Promise<AdmissionDecision>;

  /**
   * Drops the tracked state of one client (next request starts a full bucket)
   */
  reset(identity: string): Promise<boolean>;

  getStats(): RateLimiterStats;

  /**
   * Stops background eviction and releases tracked clients
   */
  destroy(): void;
}
