/**
 * Client Registry
 *
 * Maps client identity to its token bucket and last activity time.
 *
 * Every operation on an identity runs inside an AsyncLock critical section
 * keyed by that identity:
 * - concurrent first requests from one client create exactly one bucket
 * - decisions for one client are totally ordered
 * - eviction takes the same key before deleting, so an entry is never
 *   removed while an admission check is mutating its bucket
 *
 * Critical sections only touch the map and the bucket; nothing inside them
 * awaits I/O.
 */

import AsyncLock from 'async-lock';
import { TokenBucket } from './token-bucket.js';
import type { AdmissionDecision, BucketParameters, Clock } from '../interfaces/rate-limiter.js';

export interface ClientEntry {
  readonly identity: string;
  readonly bucket: TokenBucket;
  /** Millisecond timestamp of the latest admission check, admitted or not */
  lastSeen: number;
}

export interface ClientRegistryOptions extends BucketParameters {
  /** Used when a method is called without an explicit `now` */
  clock?: Clock;
}

export class ClientRegistry {
  private readonly entries: Map<string, ClientEntry> = new Map();
  private readonly lock: AsyncLock;
  private readonly params: BucketParameters;
  private readonly clock: Clock;

  constructor(options: ClientRegistryOptions) {
    this.params = {
      capacity: options.capacity,
      refillRatePerSecond: options.refillRatePerSecond,
    };
    this.clock = options.clock ?? Date.now;
    // Bursts from one client queue on its key; the default cap of 1000
    // pending tasks would turn a burst into lock errors
    this.lock = new AsyncLock({ maxPending: Infinity });
  }

  /** Number of tracked clients */
  get size(): number {
    return this.entries.size;
  }

  has(identity: string): boolean {
    return this.entries.has(identity);
  }

  /**
   * Returns the client's bucket, creating a full one on first sight
   *
   * All concurrent callers for one identity observe the same instance.
   */
  async getOrCreate(identity: string, now?: number): Promise<TokenBucket> {
    return await this.lock.acquire(identity, () => {
      return this.entryFor(identity, now ?? this.clock()).bucket;
    });
  }

  /**
   * Records activity for a tracked client
   *
   * @returns false if the client is not tracked
   */
  async touch(identity: string, now?: number): Promise<boolean> {
    return await this.lock.acquire(identity, () => {
      const entry = this.entries.get(identity);
      if (!entry) {
        return false;
      }
      entry.lastSeen = Math.max(entry.lastSeen, now ?? this.clock());
      return true;
    });
  }

  /**
   * One admission check: get-or-create, touch, then take a token
   *
   * Runs as a single critical section. Rejected checks refresh `lastSeen`
   * too, so a client that keeps hammering is never evicted mid-burst.
   */
  async admit(identity: string, now?: number): Promise<AdmissionDecision> {
    return await this.lock.acquire(identity, () => {
      const at = now ?? this.clock();
      const entry = this.entryFor(identity, at);
      entry.lastSeen = Math.max(entry.lastSeen, at);

      const admitted = entry.bucket.tryAcquire(at);

      return {
        identity,
        admitted,
        remaining: Math.floor(entry.bucket.tokens),
        retryAfterMs: entry.bucket.msUntilNextToken(at),
        limit: entry.bucket.capacity,
        decidedAt: at,
      };
    });
  }

  /**
   * Removes every client idle for longer than `idleThresholdMs`
   *
   * Candidates are picked from a snapshot, then re-checked under their own
   * key, so a client that became active while waiting for the lock stays.
   *
   * @returns Number of entries removed
   */
  async evictIdleSince(idleThresholdMs: number, now?: number): Promise<number> {
    const at = now ?? this.clock();
    const isIdle = (entry: ClientEntry): boolean => at - entry.lastSeen > idleThresholdMs;

    const candidates: string[] = [];
    for (const [identity, entry] of this.entries) {
      if (isIdle(entry)) {
        candidates.push(identity);
      }
    }

    const removed = await Promise.all(
      candidates.map((identity) =>
        this.lock.acquire(identity, () => {
          const entry = this.entries.get(identity);
          if (!entry || !isIdle(entry)) {
            return false;
          }
          return this.entries.delete(identity);
        })
      )
    );

    return removed.filter(Boolean).length;
  }

  /**
   * Drops one client's state
   *
   * @returns true if the client was tracked
   */
  async reset(identity: string): Promise<boolean> {
    return await this.lock.acquire(identity, () => this.entries.delete(identity));
  }

  /**
   * Drops every client
   *
   * Checks already inside a critical section finish against their bucket;
   * later ones start fresh.
   */
  clear(): void {
    this.entries.clear();
  }

  /**
   * Point-in-time copy of tracked clients
   */
  snapshot(): Array<{ identity: string; lastSeen: number; tokens: number }> {
    return Array.from(this.entries.values(), (entry) => ({
      identity: entry.identity,
      lastSeen: entry.lastSeen,
      tokens: entry.bucket.tokens,
    }));
  }

  /**
   * Must be called with the identity's lock held
   */
  private entryFor(identity: string, now: number): ClientEntry {
    let entry = this.entries.get(identity);
    if (!entry) {
      entry = {
        identity,
        bucket: new TokenBucket(this.params, now),
        lastSeen: now,
      };
      this.entries.set(identity, entry);
    }
    return entry;
  }
}
