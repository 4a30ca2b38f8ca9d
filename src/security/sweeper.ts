/**
 * Idle Client Sweeper
 *
 * Periodically evicts clients whose last activity is older than the idle
 * threshold, independent of request traffic.
 *
 * A failed sweep is logged and the schedule continues. The timer is unref'd
 * so it never keeps the process alive, and `stop()` cancels it
 * deterministically when the owning limiter is torn down.
 */

import type { ClientRegistry } from './client-registry.js';
import type { Clock, SweeperStats } from '../interfaces/rate-limiter.js';
import type { ILogger } from '../interfaces/logger.js';
import { formatDuration, normalizeError } from '../utils/utils.js';

/** Default sweep period: 1 minute */
export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

/** Default idle threshold: 5 minutes */
export const DEFAULT_IDLE_THRESHOLD_MS = 300_000;

export interface SweeperOptions {
  registry: Pick<ClientRegistry, 'evictIdleSince'>;
  logger: ILogger;
  intervalMs?: number;
  idleThresholdMs?: number;
  clock?: Clock;
}

export class Sweeper {
  private readonly registry: Pick<ClientRegistry, 'evictIdleSince'>;
  private readonly logger: ILogger;
  private readonly intervalMs: number;
  private readonly idleThresholdMs: number;
  private readonly clock: Clock;
  private timer: NodeJS.Timeout | null = null;
  private sweeping = false;
  private lastSweepAt: number | undefined;
  private lastEvicted = 0;
  private totalEvicted = 0;
  private failures = 0;

  constructor(options: SweeperOptions) {
    this.registry = options.registry;
    this.logger = options.logger;
    this.intervalMs = options.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.idleThresholdMs = options.idleThresholdMs ?? DEFAULT_IDLE_THRESHOLD_MS;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Starts the periodic schedule (no-op if already running)
   */
  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      void this.runScheduledSweep();
    }, this.intervalMs);

    // Don't keep Node.js process alive for cleanup task
    this.timer.unref();

    this.logger.debug(
      `Sweeper started (every ${formatDuration(this.intervalMs)}, idle after ${formatDuration(this.idleThresholdMs)})`
    );
  }

  /**
   * Cancels the schedule; no sweep fires after this returns (idempotent)
   */
  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    this.logger.debug('Sweeper stopped');
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Runs one eviction pass immediately
   *
   * @returns Number of clients evicted
   * @throws Whatever the registry throws; scheduled sweeps catch it instead
   */
  async sweepNow(): Promise<number> {
    const now = this.clock();
    const evicted = await this.registry.evictIdleSince(this.idleThresholdMs, now);

    this.lastSweepAt = now;
    this.lastEvicted = evicted;
    this.totalEvicted += evicted;

    if (evicted > 0) {
      this.logger.debug(`Evicted ${evicted} idle client(s)`);
    }

    return evicted;
  }

  getStats(): SweeperStats {
    return {
      running: this.isRunning(),
      intervalMs: this.intervalMs,
      idleThresholdMs: this.idleThresholdMs,
      lastSweepAt: this.lastSweepAt,
      lastEvicted: this.lastEvicted,
      totalEvicted: this.totalEvicted,
      failures: this.failures,
    };
  }

  /**
   * Timer callback; never rejects
   */
  private async runScheduledSweep(): Promise<void> {
    // A sweep slower than the interval must not pile up behind itself
    if (this.sweeping) {
      this.logger.debug('Previous sweep still running, skipping tick');
      return;
    }

    this.sweeping = true;
    try {
      await this.sweepNow();
    } catch (error: unknown) {
      this.failures++;
      this.logger.error(normalizeError(error, 'Idle client sweep failed').message);
    } finally {
      this.sweeping = false;
    }
  }
}
