/**
 * Admission Middleware
 *
 * Request-path entry point of the rate limiter. For each request it:
 * 1. Resolves the client identity (canonical remote address by default)
 * 2. Runs one admission check against the client's token bucket
 * 3. Forwards to the downstream handler, or short-circuits with 429
 *
 * Each instance owns its registry and sweeper; differently configured
 * instances share nothing.
 *
 * USAGE:
 * ```typescript
 * const limiter = new AdmissionMiddleware({ capacity: 10, refillRatePerSecond: 100 });
 *
 * app.use('/login', limiter.middleware);          // Express
 *
 * const listener = limiter.wrap(handler);         // node:http
 * http.createServer((req, res) => {
 *   listener(req, res).catch((error: unknown) => {
 *     console.error('[Server] Handler failed:', error);
 *     res.statusCode = 500;
 *     res.end();
 *   });
 * });
 *
 * // on teardown; the instance must not be reused afterwards
 * limiter.destroy();
 * ```
 */

import type { IncomingMessage, ServerResponse } from 'http';
import type { Request, Response, NextFunction } from 'express';
import { ClientRegistry } from '../../security/client-registry.js';
import { Sweeper } from '../../security/sweeper.js';
import { resolveClientIdentity } from '../../security/client-identity.js';
import { parseLimiterOptions, type LimiterOptionsInput } from '../../config/rate-limit-config.js';
import { ConsoleLogger } from '../../observability/console-logger.js';
import { IdentityUnavailableError, LimiterDestroyedError } from '../../errors.js';
import { normalizeError } from '../../utils/utils.js';
import type { ILogger } from '../../interfaces/logger.js';
import type {
  AdmissionDecision,
  AdmissionOutcome,
  Clock,
  IdentityResolver,
  IRateLimiter,
  RateLimiterStats,
  RateLimitRejection,
} from '../../interfaces/rate-limiter.js';

export interface AdmissionMiddlewareOptions extends LimiterOptionsInput {
  /** Millisecond clock (default: Date.now) */
  clock?: Clock;
  /** Sink for sweep results and failures (default: ConsoleLogger) */
  logger?: ILogger;
  /** Identity extraction (default: canonical socket remote address) */
  identityResolver?: IdentityResolver;
  /** Start the idle sweeper on construction (default: true) */
  startSweeper?: boolean;
}

/** `status` field of every rejection body */
export const REJECTION_STATUS = 'Request Failed';

/**
 * Builds the 429 response for a rejected decision
 *
 * @param decision - A decision with `admitted: false`
 * @param at - Rejection time
 */
export function buildRejection(decision: AdmissionDecision, at: Date): RateLimitRejection {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'X-RateLimit-Limit': String(decision.limit),
    'X-RateLimit-Remaining': String(decision.remaining),
  };

  let message: string;
  if (Number.isFinite(decision.retryAfterMs)) {
    // Retry-After carries whole seconds; never advertise 0
    const retryAfterSeconds = Math.max(1, Math.ceil(decision.retryAfterMs / 1000));
    headers['Retry-After'] = String(retryAfterSeconds);
    message = `Rate limit reached. Please wait ${retryAfterSeconds} second(s) and try again.`;
  } else {
    message = 'Rate limit reached. Please try again later.';
  }

  return {
    statusCode: 429,
    headers,
    body: {
      status: REJECTION_STATUS,
      body: message,
      locked: true,
      timestamp: at.toISOString(),
    },
  };
}

export class AdmissionMiddleware implements IRateLimiter {
  readonly name: string;
  readonly capacity: number;
  readonly refillRatePerSecond: number;
  private readonly registry: ClientRegistry;
  private readonly sweeper: Sweeper;
  private readonly clock: Clock;
  private readonly logger: ILogger;
  private readonly identityResolver: IdentityResolver;
  private destroyed = false;

  /**
   * @throws {RateLimitConfigError} If numeric options are out of range
   */
  constructor(options: AdmissionMiddlewareOptions) {
    const config = parseLimiterOptions({
      name: options.name,
      capacity: options.capacity,
      refillRatePerSecond: options.refillRatePerSecond,
      sweepIntervalMs: options.sweepIntervalMs,
      idleThresholdMs: options.idleThresholdMs,
    });

    this.name = config.name;
    this.capacity = config.capacity;
    this.refillRatePerSecond = config.refillRatePerSecond;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? new ConsoleLogger(`RateLimiter:${config.name}`);
    this.identityResolver = options.identityResolver ?? resolveClientIdentity;

    this.registry = new ClientRegistry({
      capacity: config.capacity,
      refillRatePerSecond: config.refillRatePerSecond,
      clock: this.clock,
    });

    this.sweeper = new Sweeper({
      registry: this.registry,
      logger: this.logger,
      intervalMs: config.sweepIntervalMs,
      idleThresholdMs: config.idleThresholdMs,
      clock: this.clock,
    });

    if (options.startSweeper ?? true) {
      this.sweeper.start();
    }
  }

  /**
   * Admission check for an already-derived identity
   *
   * @throws {LimiterDestroyedError} If called after `destroy()`
   */
  async check(identity: string): Promise<AdmissionDecision> {
    if (this.destroyed) {
      throw new LimiterDestroyedError(this.name);
    }

    const decision = await this.registry.admit(identity);

    if (!decision.admitted) {
      this.logger.debug(
        `Rejected ${identity} (retry after ${Number.isFinite(decision.retryAfterMs) ? `${Math.ceil(decision.retryAfterMs)}ms` : 'never'})`
      );
    }

    return decision;
  }

  /**
   * Framework-agnostic interceptor
   *
   * Returns `next()`'s result unchanged when admitted; when rejected, `next`
   * is not invoked and the 429 response is returned instead.
   *
   * @throws {IdentityUnavailableError} If no identity can be derived
   */
  async handle<T>(req: IncomingMessage, next: () => T | Promise<T>): Promise<AdmissionOutcome<T>> {
    const identity = this.resolveIdentity(req);
    const decision = await this.check(identity);

    if (!decision.admitted) {
      return {
        admitted: false,
        decision,
        rejection: buildRejection(decision, new Date(decision.decidedAt)),
      };
    }

    return { admitted: true, decision, result: await next() };
  }

  /**
   * Express middleware
   *
   * Identity failures answer 500 (not 429) and are logged as warnings;
   * unexpected errors go to Express's error handler via `next(error)`.
   */
  middleware = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    let decision: AdmissionDecision;
    try {
      decision = await this.check(this.resolveIdentity(req));
    } catch (error: unknown) {
      if (error instanceof IdentityUnavailableError) {
        this.logger.warn(error.message);
        res.status(500).json(this.identityFailureBody());
        return;
      }
      next(error);
      return;
    }

    if (decision.admitted) {
      next();
      return;
    }

    const rejection = buildRejection(decision, new Date(decision.decidedAt));
    for (const [name, value] of Object.entries(rejection.headers)) {
      res.setHeader(name, value);
    }
    res.status(rejection.statusCode).json(rejection.body);
  };

  /**
   * Wraps a `node:http` request listener ("given next, produce a new handler")
   *
   * Errors thrown by `handler` propagate through the returned promise.
   * `http.createServer` never awaits its listener, so the caller must
   * attach a `.catch` or the failure becomes an unhandled rejection.
   */
  wrap<Req extends IncomingMessage, Res extends ServerResponse>(
    handler: (req: Req, res: Res) => void | Promise<void>
  ): (req: Req, res: Res) => Promise<void> {
    return async (req: Req, res: Res): Promise<void> => {
      let outcome: AdmissionOutcome<void>;
      try {
        outcome = await this.handle(req, () => handler(req, res));
      } catch (error: unknown) {
        if (!(error instanceof IdentityUnavailableError)) {
          throw error;
        }
        this.logger.warn(error.message);
        this.writeJson(res, 500, { 'Content-Type': 'application/json' }, this.identityFailureBody());
        return;
      }

      if (!outcome.admitted) {
        this.writeJson(res, outcome.rejection.statusCode, outcome.rejection.headers, outcome.rejection.body);
      }
    };
  }

  /**
   * Forgets one client; its next request starts with a full bucket
   */
  async reset(identity: string): Promise<boolean> {
    return await this.registry.reset(identity);
  }

  getStats(): RateLimiterStats {
    return {
      name: this.name,
      capacity: this.capacity,
      refillRatePerSecond: this.refillRatePerSecond,
      trackedClients: this.registry.size,
      sweeper: this.sweeper.getStats(),
    };
  }

  /**
   * Runs one eviction pass now (outside the schedule)
   */
  async sweep(): Promise<number> {
    return await this.sweeper.sweepNow();
  }

  /**
   * Stops the sweeper and drops all tracked clients (idempotent)
   *
   * Later admission checks throw `LimiterDestroyedError`.
   */
  destroy(): void {
    this.destroyed = true;
    this.sweeper.stop();
    this.registry.clear();
  }

  private resolveIdentity(req: IncomingMessage): string {
    let identity: string;
    try {
      identity = this.identityResolver(req);
    } catch (error: unknown) {
      if (error instanceof IdentityUnavailableError) {
        throw error;
      }
      this.logger.warn(normalizeError(error, 'Identity resolver failed').message);
      throw new IdentityUnavailableError(undefined);
    }

    if (identity.trim().length === 0) {
      throw new IdentityUnavailableError(identity);
    }

    return identity;
  }

  private identityFailureBody(): { error: string; timestamp: string } {
    return {
      error: 'Internal Server Error',
      timestamp: new Date(this.clock()).toISOString(),
    };
  }

  private writeJson(
    res: ServerResponse,
    statusCode: number,
    headers: Record<string, string>,
    body: unknown
  ): void {
    if (res.headersSent) {
      return;
    }
    res.writeHead(statusCode, headers);
    res.end(JSON.stringify(body));
  }
}
