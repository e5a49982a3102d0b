/**
 * Local Tier Tests
 * @module tests/unit/cache/local-tier
 */

import { describe, it, expect, vi } from 'vitest';
import { LocalTier } from '../../../src/cache/local-tier.js';

describe('LocalTier', () => {
  it('should return a hit with its remaining TTL', async () => {
    let now = 0;
    const tier = new LocalTier({ maxEntries: 10, now: () => now });

    await tier.set('k', '"v"', 10);
    now = 5000;

    expect(await tier.get('k')).toEqual({ found: true, value: '"v"', tierFailed: false, remainingTtlSeconds: 5 });
  });

  it('should expire entries and report them as evicted', async () => {
    let now = 0;
    const onEvict = vi.fn();
    const tier = new LocalTier({ maxEntries: 10, now: () => now, onEvict });

    await tier.set('k', '"v"', 10);
    now = 10000;

    expect(await tier.get('k')).toEqual({ found: false, tierFailed: false });
    expect(onEvict).toHaveBeenCalledWith('k');
    expect(tier.size).toBe(0);
  });

  it('should report capacity evictions', async () => {
    const onEvict = vi.fn();
    const tier = new LocalTier({ maxEntries: 1, onEvict });

    await tier.set('a', '1', 60);
    await tier.set('b', '2', 60);

    expect(onEvict).toHaveBeenCalledWith('a');
    expect(tier.keys()).toEqual(['b']);
  });

  it('should delete keys matching a pattern', async () => {
    const tier = new LocalTier({ maxEntries: 10 });
    await tier.set('flights:all', '1', 60);
    await tier.set('flights:status:delayed', '2', 60);
    await tier.set('flight:detail:1', '3', 60);

    expect(await tier.deleteByPattern('flights:*')).toEqual({ deleted: 2, tierFailed: false });
    expect(tier.keys()).toEqual(['flight:detail:1']);
  });

  it('should clear everything and count what it removed', async () => {
    const tier = new LocalTier({ maxEntries: 10 });
    await tier.set('a', '1', 60);
    await tier.set('b', '2', 60);

    expect(await tier.clear()).toEqual({ deleted: 2, tierFailed: false });
    expect(await tier.ping()).toBe(true);
  });
});
