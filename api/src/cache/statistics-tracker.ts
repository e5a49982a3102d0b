/**
 * Cache Statistics Tracker
 * @module cache/statistics-tracker
 *
 * Per-tier hit/miss/latency/byte counters shared by every cache component.
 * One instance is created at process start and injected where needed.
 *
 * All mutation happens synchronously inside a single call, so no update can
 * interleave with another on the event loop and a snapshot is taken in one
 * pass without awaiting. None of the methods throw.
 */

import { CacheTierNames, type CacheTierName } from './cache-tier.js';

// ============================================================================
// Types
// ============================================================================

export interface TierStatistics {
  hits: number;
  misses: number;
  totalRequests: number;
  /** hits / (hits + misses) * 100, two decimals, 0 with no requests */
  hitRate: number;
  sets: number;
  removes: number;
  sampleCount: number;
  totalLatencyMs: number;
  averageLatencyMs: number;
  currentKeyCount: number;
  totalBytesStored: number;
  /** Bytes returned to callers by hits */
  bytesServed: number;
}

export type LayerPreference = 'Memory-Heavy' | 'Redis-Heavy' | 'Balanced' | 'None';

export interface ExtraStatistics {
  startedAt: string;
  uptimeSeconds: number;
  operationsPerSecond: number;
  averageValueSizeBytes: number;
  layerPreference: LayerPreference;
  efficiency: {
    memory: number;
    distributed: number;
  };
}

export interface StatisticsSnapshot {
  memory: TierStatistics;
  distributed: TierStatistics;
  combined: TierStatistics;
  extra: ExtraStatistics;
}

interface TrackedKey {
  bytes: number;
  /** Epoch ms after which the tier no longer holds the key */
  expiresAt: number;
}

interface TierCounters {
  hits: number;
  misses: number;
  sets: number;
  removes: number;
  sampleCount: number;
  totalLatencyMs: number;
  keys: Map<string, TrackedKey>;
  totalBytesStored: number;
  bytesServed: number;
}

// ============================================================================
// Helpers
// ============================================================================

/** Sets between sweeps of expired keys, so unread keys cannot pile up */
const PRUNE_EVERY_SETS = 1000;

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Hit rate as a percentage rounded to two decimals
 */
export function calculateHitRate(hits: number, misses: number): number {
  const total = hits + misses;
  return total > 0 ? round((hits / total) * 100, 2) : 0;
}

function sanitize(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function createCounters(): TierCounters {
  return {
    hits: 0,
    misses: 0,
    sets: 0,
    removes: 0,
    sampleCount: 0,
    totalLatencyMs: 0,
    keys: new Map(),
    totalBytesStored: 0,
    bytesServed: 0,
  };
}

function toTierStatistics(c: TierCounters): TierStatistics {
  return {
    hits: c.hits,
    misses: c.misses,
    totalRequests: c.hits + c.misses,
    hitRate: calculateHitRate(c.hits, c.misses),
    sets: c.sets,
    removes: c.removes,
    sampleCount: c.sampleCount,
    totalLatencyMs: round(c.totalLatencyMs, 3),
    averageLatencyMs: c.sampleCount > 0 ? round(c.totalLatencyMs / c.sampleCount, 2) : 0,
    currentKeyCount: c.keys.size,
    totalBytesStored: c.totalBytesStored,
    bytesServed: c.bytesServed,
  };
}

function combine(a: TierStatistics, b: TierStatistics): TierStatistics {
  const hits = a.hits + b.hits;
  const misses = a.misses + b.misses;
  const sampleCount = a.sampleCount + b.sampleCount;
  const totalLatencyMs = a.totalLatencyMs + b.totalLatencyMs;

  return {
    hits,
    misses,
    totalRequests: hits + misses,
    hitRate: calculateHitRate(hits, misses),
    sets: a.sets + b.sets,
    removes: a.removes + b.removes,
    sampleCount,
    totalLatencyMs: round(totalLatencyMs, 3),
    averageLatencyMs: sampleCount > 0 ? round(totalLatencyMs / sampleCount, 2) : 0,
    currentKeyCount: a.currentKeyCount + b.currentKeyCount,
    totalBytesStored: a.totalBytesStored + b.totalBytesStored,
    bytesServed: a.bytesServed + b.bytesServed,
  };
}

/**
 * Weighted score of hit rate and latency; `latencyScale` is the latency in ms
 * that costs one point of the latency score.
 */
function efficiency(stats: TierStatistics, latencyScale: number): number {
  if (stats.totalRequests === 0) {
    return 0;
  }
  const latencyScore = Math.max(0, 100 - stats.averageLatencyMs / latencyScale);
  return round(stats.hitRate * 0.7 + latencyScore * 0.3, 1);
}

function layerPreference(memory: TierStatistics, distributed: TierStatistics): LayerPreference {
  if (memory.hits === 0 && distributed.hits === 0) {
    return 'None';
  }
  if (memory.hits > distributed.hits * 2) {
    return 'Memory-Heavy';
  }
  if (distributed.hits > memory.hits * 2) {
    return 'Redis-Heavy';
  }
  return 'Balanced';
}

// ============================================================================
// Statistics Tracker
// ============================================================================

export class StatisticsTracker {
  private tiers: Record<CacheTierName, TierCounters>;
  private startedAt: number;
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.tiers = {
      [CacheTierNames.MEMORY]: createCounters(),
      [CacheTierNames.DISTRIBUTED]: createCounters(),
    };
    this.startedAt = now();
  }

  recordHit(tier: CacheTierName, latencyMs: number, bytes = 0): void {
    const c = this.tiers[tier];
    c.hits++;
    c.bytesServed += sanitize(bytes);
    this.sample(c, latencyMs);
  }

  recordMiss(tier: CacheTierName, latencyMs: number): void {
    const c = this.tiers[tier];
    c.misses++;
    this.sample(c, latencyMs);
  }

  /**
   * Track a stored key. Without `ttlSeconds` the key counts until removed or evicted.
   */
  recordSet(tier: CacheTierName, key: string, bytes: number, latencyMs = 0, ttlSeconds?: number): void {
    const c = this.tiers[tier];
    const size = sanitize(bytes);
    const previous = c.keys.get(key)?.bytes ?? 0;
    const expiresAt =
      ttlSeconds !== undefined && Number.isFinite(ttlSeconds) ? this.now() + ttlSeconds * 1000 : Infinity;

    c.sets++;
    c.keys.set(key, { bytes: size, expiresAt });
    c.totalBytesStored += size - previous;
    this.sample(c, latencyMs);

    if (c.sets % PRUNE_EVERY_SETS === 0) {
      this.prune(c);
    }
  }

  recordRemove(tier: CacheTierName, key: string): void {
    const c = this.tiers[tier];
    c.removes++;
    this.forget(c, key);
  }

  /**
   * Key left the tier without a caller removing it (eviction, expiry, pattern delete)
   */
  recordEviction(tier: CacheTierName, key: string): void {
    this.forget(this.tiers[tier], key);
  }

  /**
   * Drop key accounting for every key matching `predicate`, or all keys
   */
  forgetKeys(tier: CacheTierName, predicate?: (key: string) => boolean): void {
    const c = this.tiers[tier];
    for (const key of [...c.keys.keys()]) {
      if (!predicate || predicate(key)) {
        this.forget(c, key);
      }
    }
  }

  getSnapshot(): StatisticsSnapshot {
    this.prune(this.tiers[CacheTierNames.MEMORY]);
    this.prune(this.tiers[CacheTierNames.DISTRIBUTED]);

    const memory = toTierStatistics(this.tiers[CacheTierNames.MEMORY]);
    const distributed = toTierStatistics(this.tiers[CacheTierNames.DISTRIBUTED]);
    const combined = combine(memory, distributed);

    const uptimeMs = Math.max(0, this.now() - this.startedAt);
    const uptimeSeconds = round(uptimeMs / 1000, 2);
    const liveKeys = combined.currentKeyCount;

    return {
      memory,
      distributed,
      combined,
      extra: {
        startedAt: new Date(this.startedAt).toISOString(),
        uptimeSeconds,
        operationsPerSecond: uptimeSeconds > 0 ? round(combined.totalRequests / uptimeSeconds, 2) : 0,
        averageValueSizeBytes: liveKeys > 0 ? round(combined.totalBytesStored / liveKeys, 2) : 0,
        layerPreference: layerPreference(memory, distributed),
        efficiency: {
          memory: efficiency(memory, 10),
          distributed: efficiency(distributed, 50),
        },
      },
    };
  }

  /**
   * Zero all counters and start a new measurement window
   */
  reset(): void {
    this.tiers = {
      [CacheTierNames.MEMORY]: createCounters(),
      [CacheTierNames.DISTRIBUTED]: createCounters(),
    };
    this.startedAt = this.now();
  }

  private sample(c: TierCounters, latencyMs: number): void {
    c.sampleCount++;
    c.totalLatencyMs += sanitize(latencyMs);
  }

  private forget(c: TierCounters, key: string): void {
    const tracked = c.keys.get(key);
    if (tracked !== undefined) {
      c.keys.delete(key);
      c.totalBytesStored -= tracked.bytes;
    }
  }

  private prune(c: TierCounters): void {
    const now = this.now();
    for (const [key, tracked] of c.keys) {
      if (tracked.expiresAt <= now) {
        c.keys.delete(key);
        c.totalBytesStored -= tracked.bytes;
      }
    }
  }
}
