/**
 * Client Registry Tests
 *
 * Atomic bucket creation, activity tracking and idle eviction under
 * concurrent access.
 */

import { describe, test, expect } from 'vitest';
import { ClientRegistry } from '../src/security/client-registry.js';
import { ManualClock } from './helpers/manual-clock.js';

const IDLE_MS = 300_000;

describe('ClientRegistry', () => {
  describe('Bucket Creation', () => {
    test('should_returnSameBucket_when_calledRepeatedly', async () => {
      const registry = new ClientRegistry({ capacity: 3, refillRatePerSecond: 1 });

      const first = await registry.getOrCreate('198.51.100.1', 0);
      const second = await registry.getOrCreate('198.51.100.1', 5);

      expect(second).toBe(first);
      expect(registry.size).toBe(1);
    });

    test('should_createExactlyOneBucket_when_firstCallsConcurrent', async () => {
      const registry = new ClientRegistry({ capacity: 3, refillRatePerSecond: 1 });

      const buckets = await Promise.all(
        Array.from({ length: 20 }, () => registry.getOrCreate('198.51.100.1', 0))
      );

      for (const bucket of buckets) {
        expect(bucket).toBe(buckets[0]);
      }
      expect(registry.size).toBe(1);
    });

    test('should_useInjectedClock_when_nowOmitted', async () => {
      const clock = new ManualClock(42_000);
      const registry = new ClientRegistry({ capacity: 3, refillRatePerSecond: 1, clock: clock.now });

      const bucket = await registry.getOrCreate('198.51.100.1');

      expect(bucket.lastRefillTime).toBe(42_000);
      expect(registry.snapshot()).toEqual([{ identity: '198.51.100.1', lastSeen: 42_000, tokens: 3 }]);
    });
  });

  describe('Admission', () => {
    test('should_describeDecision_when_admitted', async () => {
      const registry = new ClientRegistry({ capacity: 3, refillRatePerSecond: 1 });

      const decision = await registry.admit('198.51.100.1', 0);

      expect(decision).toEqual({
        identity: '198.51.100.1',
        admitted: true,
        remaining: 2,
        retryAfterMs: 0,
        limit: 3,
        decidedAt: 0,
      });
    });

    test('should_reportRetryAfter_when_rejected', async () => {
      const registry = new ClientRegistry({ capacity: 3, refillRatePerSecond: 1 });
      for (let i = 0; i < 3; i++) {
        await registry.admit('198.51.100.1', 0);
      }

      const decision = await registry.admit('198.51.100.1', 0);

      expect(decision.admitted).toBe(false);
      expect(decision.remaining).toBe(0);
      expect(decision.retryAfterMs).toBe(1000);
    });

    test('should_neverAdmitMoreThanCapacity_when_requestsConcurrent', async () => {
      const registry = new ClientRegistry({ capacity: 10, refillRatePerSecond: 100 });

      const decisions = await Promise.all(
        Array.from({ length: 25 }, () => registry.admit('203.0.113.9', 0))
      );

      expect(decisions.filter((d) => d.admitted)).toHaveLength(10);
      expect(decisions.filter((d) => !d.admitted)).toHaveLength(15);
      expect(registry.size).toBe(1);
    });

    test('should_isolateClientsIndependently', async () => {
      const registry = new ClientRegistry({ capacity: 2, refillRatePerSecond: 0 });
      await registry.admit('client-a', 0);
      await registry.admit('client-a', 0);

      expect((await registry.admit('client-a', 0)).admitted).toBe(false);
      expect((await registry.admit('client-b', 0)).admitted).toBe(true);
      expect((await registry.admit('client-b', 0)).admitted).toBe(true);
    });
  });

  describe('Activity Tracking', () => {
    test('should_returnFalse_when_touchingUnknownClient', async () => {
      const registry = new ClientRegistry({ capacity: 1, refillRatePerSecond: 1 });

      expect(await registry.touch('198.51.100.1', 10)).toBe(false);
      expect(registry.size).toBe(0);
    });

    test('should_updateLastSeen_when_touched', async () => {
      const registry = new ClientRegistry({ capacity: 1, refillRatePerSecond: 1 });
      await registry.getOrCreate('198.51.100.1', 0);

      expect(await registry.touch('198.51.100.1', 120_000)).toBe(true);
      expect(await registry.touch('198.51.100.1', 60_000)).toBe(true);

      expect(registry.snapshot()[0]?.lastSeen).toBe(120_000);
    });

    test('should_countRejectedRequestsAsActivity', async () => {
      const registry = new ClientRegistry({ capacity: 1, refillRatePerSecond: 0 });
      await registry.admit('198.51.100.1', 0);

      const rejected = await registry.admit('198.51.100.1', 200_000);
      const evicted = await registry.evictIdleSince(IDLE_MS, 400_000);

      expect(rejected.admitted).toBe(false);
      expect(evicted).toBe(0);
      expect(registry.has('198.51.100.1')).toBe(true);
    });
  });

  describe('Idle Eviction', () => {
    test('should_evictOnlyIdleClients', async () => {
      const registry = new ClientRegistry({ capacity: 1, refillRatePerSecond: 1 });
      await registry.admit('idle', 0);
      await registry.admit('active', 250_000);

      const evicted = await registry.evictIdleSince(IDLE_MS, 300_001);

      expect(evicted).toBe(1);
      expect(registry.has('idle')).toBe(false);
      expect(registry.has('active')).toBe(true);
    });

    test('should_keepClient_when_idleExactlyThreshold', async () => {
      const registry = new ClientRegistry({ capacity: 1, refillRatePerSecond: 1 });
      await registry.admit('198.51.100.1', 0);

      expect(await registry.evictIdleSince(IDLE_MS, IDLE_MS)).toBe(0);
      expect(registry.size).toBe(1);
    });

    test('should_startFreshBucket_when_clientReturnsAfterEviction', async () => {
      const registry = new ClientRegistry({ capacity: 2, refillRatePerSecond: 0 });
      await registry.admit('198.51.100.1', 0);
      await registry.admit('198.51.100.1', 0);
      expect((await registry.admit('198.51.100.1', 0)).admitted).toBe(false);

      expect(await registry.evictIdleSince(IDLE_MS, 400_000)).toBe(1);

      const decision = await registry.admit('198.51.100.1', 400_000);
      expect(decision.admitted).toBe(true);
      expect(decision.remaining).toBe(1);
    });

    test('should_keepEntry_when_checkReachesLockBeforeEviction', async () => {
      const registry = new ClientRegistry({ capacity: 2, refillRatePerSecond: 0 });
      await registry.admit('198.51.100.1', 0);

      const [decision, evicted] = await Promise.all([
        registry.admit('198.51.100.1', 400_000),
        registry.evictIdleSince(IDLE_MS, 400_000),
      ]);

      expect(decision.admitted).toBe(true);
      expect(decision.remaining).toBe(0);
      expect(evicted).toBe(0);
      expect(registry.has('198.51.100.1')).toBe(true);
    });

    test('should_createFreshBucket_when_evictionReachesLockFirst', async () => {
      const registry = new ClientRegistry({ capacity: 2, refillRatePerSecond: 0 });
      await registry.admit('198.51.100.1', 0);
      await registry.admit('198.51.100.1', 0);
      const staleBucket = await registry.getOrCreate('198.51.100.1', 0);

      const [evicted, decision] = await Promise.all([
        registry.evictIdleSince(IDLE_MS, 400_000),
        registry.admit('198.51.100.1', 400_000),
      ]);

      expect(evicted).toBe(1);
      expect(decision.admitted).toBe(true);
      expect(decision.remaining).toBe(1);
      expect(await registry.getOrCreate('198.51.100.1', 400_000)).not.toBe(staleBucket);
    });
  });

  describe('Reset', () => {
    test('should_dropClient_when_reset', async () => {
      const registry = new ClientRegistry({ capacity: 1, refillRatePerSecond: 1 });
      await registry.admit('198.51.100.1', 0);

      expect(await registry.reset('198.51.100.1')).toBe(true);
      expect(await registry.reset('198.51.100.1')).toBe(false);
      expect(registry.size).toBe(0);
    });

    test('should_dropEveryClient_when_cleared', async () => {
      const registry = new ClientRegistry({ capacity: 1, refillRatePerSecond: 1 });
      await registry.admit('a', 0);
      await registry.admit('b', 0);

      registry.clear();

      expect(registry.size).toBe(0);
      expect(registry.snapshot()).toEqual([]);
    });
  });
});
