/**
 * Cache Key Tests
 * @module tests/unit/cache/cache-keys
 */

import { describe, it, expect } from 'vitest';
import { CacheKeyPrefixes, CacheKeys, createGlobMatcher } from '../../../src/cache/index.js';

describe('CacheKeys', () => {
  it('should build colon-delimited flight keys', () => {
    expect(CacheKeys.allFlights()).toBe('flights:all');
    expect(CacheKeys.flightsByDeparture('2026-03-01')).toBe('flights:departure:2026-03-01');
    expect(CacheKeys.flightsByArrival('2026-03-01')).toBe('flights:arrival:2026-03-01');
    expect(CacheKeys.flightDetail(117)).toBe('flight:detail:117');
  });

  it('should normalize status and airline segments', () => {
    expect(CacheKeys.flightsByStatus('Delayed')).toBe('flights:status:delayed');
    expect(CacheKeys.flightsByAirline('ba')).toBe('flights:airline:BA');
  });

  it('should build a pattern covering every key under a prefix', () => {
    const matches = createGlobMatcher(CacheKeys.patternFor(CacheKeyPrefixes.FLIGHTS));

    expect(matches(CacheKeys.allFlights())).toBe(true);
    expect(matches(CacheKeys.flightsByStatus('landed'))).toBe(true);
    expect(matches(CacheKeys.flightDetail(1))).toBe(false);
  });
});
