/**
 * LRU Cache Tests
 * @module tests/unit/cache/lru-cache
 */

import { describe, it, expect, vi } from 'vitest';
import { LRUCache } from '../../../src/cache/lru-cache.js';

describe('LRUCache', () => {
  it('should evict the least recently used entry when over capacity', () => {
    const onEvict = vi.fn();
    const cache = new LRUCache<string, number>(2, onEvict);

    cache.set('a', 1);
    cache.set('b', 2);
    cache.get('a');
    cache.set('c', 3);

    expect(cache.get('b')).toBeUndefined();
    expect(cache.keys()).toEqual(['c', 'a']);
    expect(onEvict).toHaveBeenCalledWith('b', 2);
  });

  it('should update an existing key in place', () => {
    const cache = new LRUCache<string, number>(2);

    cache.set('a', 1);
    cache.set('a', 5);

    expect(cache.size).toBe(1);
    expect(cache.get('a')).toBe(5);
  });

  it('should delete and clear', () => {
    const cache = new LRUCache<string, number>(3);
    cache.set('a', 1);
    cache.set('b', 2);

    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);
    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.keys()).toEqual([]);
  });
});
