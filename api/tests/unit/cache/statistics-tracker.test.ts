/**
 * Statistics Tracker Tests
 * @module tests/unit/cache/statistics-tracker
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { StatisticsTracker, calculateHitRate } from '../../../src/cache/statistics-tracker.js';

describe('calculateHitRate', () => {
  it('should return a percentage rounded to two decimals', () => {
    expect(calculateHitRate(1, 2)).toBe(33.33);
    expect(calculateHitRate(2, 0)).toBe(100);
  });

  it('should return 0 when there were no requests', () => {
    expect(calculateHitRate(0, 0)).toBe(0);
  });
});

describe('StatisticsTracker', () => {
  let now: number;
  let tracker: StatisticsTracker;

  beforeEach(() => {
    now = 1000;
    tracker = new StatisticsTracker(() => now);
  });

  it('should count hits, misses, latency and bytes served per tier', () => {
    tracker.recordHit('memory', 2, 10);
    tracker.recordMiss('memory', 4);

    const { memory, distributed } = tracker.getSnapshot();

    expect(memory).toMatchObject({
      hits: 1,
      misses: 1,
      totalRequests: 2,
      hitRate: 50,
      sampleCount: 2,
      averageLatencyMs: 3,
      bytesServed: 10,
    });
    expect(distributed.totalRequests).toBe(0);
  });

  it('should keep hits plus misses equal to total requests', () => {
    tracker.recordHit('memory', 1);
    tracker.recordMiss('distributed', 1);
    tracker.recordMiss('distributed', 1);
    tracker.recordHit('distributed', 1);

    const { memory, distributed, combined } = tracker.getSnapshot();

    for (const tier of [memory, distributed, combined]) {
      expect(tier.hits + tier.misses).toBe(tier.totalRequests);
    }
    expect(combined.hitRate).toBe(50);
  });

  it('should account stored bytes per live key', () => {
    tracker.recordSet('memory', 'a', 100);
    tracker.recordSet('memory', 'a', 40);
    tracker.recordSet('memory', 'b', 10);

    expect(tracker.getSnapshot().memory).toMatchObject({ sets: 3, currentKeyCount: 2, totalBytesStored: 50 });

    tracker.recordRemove('memory', 'a');
    tracker.recordEviction('memory', 'b');

    expect(tracker.getSnapshot().memory).toMatchObject({ removes: 1, currentKeyCount: 0, totalBytesStored: 0 });
  });

  it('should stop counting keys once their TTL has passed', () => {
    tracker.recordSet('distributed', 'flights:all', 10, 0, 1);
    tracker.recordSet('distributed', 'flight:detail:1', 4, 0, 60);
    tracker.recordSet('memory', 'pinned', 6);

    now += 1000;
    const stats = tracker.getSnapshot();

    expect(stats.distributed).toMatchObject({ currentKeyCount: 1, totalBytesStored: 4 });
    expect(stats.memory).toMatchObject({ currentKeyCount: 1, totalBytesStored: 6 });
  });

  it('should restart the expiry when a key is written again', () => {
    tracker.recordSet('memory', 'a', 10, 0, 1);
    now += 500;
    tracker.recordSet('memory', 'a', 10, 0, 1);
    now += 700;

    expect(tracker.getSnapshot().memory).toMatchObject({ currentKeyCount: 1, totalBytesStored: 10 });
  });

  it('should forget keys matching a predicate', () => {
    tracker.recordSet('distributed', 'flights:all', 5);
    tracker.recordSet('distributed', 'flight:detail:1', 5);

    tracker.forgetKeys('distributed', (key) => key.startsWith('flights:'));

    expect(tracker.getSnapshot().distributed.currentKeyCount).toBe(1);
  });

  it('should ignore negative or non-finite samples', () => {
    tracker.recordHit('memory', -5, Number.NaN);

    expect(tracker.getSnapshot().memory).toMatchObject({ totalLatencyMs: 0, bytesServed: 0 });
  });

  it('should derive layer preference from hit distribution', () => {
    expect(tracker.getSnapshot().extra.layerPreference).toBe('None');

    tracker.recordHit('memory', 0);
    tracker.recordHit('distributed', 0);
    expect(tracker.getSnapshot().extra.layerPreference).toBe('Balanced');

    tracker.recordHit('memory', 0);
    tracker.recordHit('memory', 0);
    expect(tracker.getSnapshot().extra.layerPreference).toBe('Memory-Heavy');
  });

  it('should report uptime and throughput since the window started', () => {
    tracker.recordHit('memory', 0);
    tracker.recordMiss('memory', 0);
    tracker.recordHit('distributed', 0);
    tracker.recordMiss('distributed', 0);
    now = 3000;

    const { extra } = tracker.getSnapshot();

    expect(extra.startedAt).toBe(new Date(1000).toISOString());
    expect(extra.uptimeSeconds).toBe(2);
    expect(extra.operationsPerSecond).toBe(2);
  });

  it('should zero every counter on reset', () => {
    tracker.recordHit('memory', 3, 10);
    tracker.recordSet('memory', 'a', 10);
    now = 5000;

    tracker.reset();
    const snapshot = tracker.getSnapshot();

    expect(snapshot.combined).toMatchObject({ hits: 0, misses: 0, sets: 0, currentKeyCount: 0, totalBytesStored: 0 });
    expect(snapshot.extra.startedAt).toBe(new Date(5000).toISOString());
  });
});
