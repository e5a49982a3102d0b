/**
 * Local Cache Tier
 * @module cache/local-tier
 *
 * In-process tier backed by an LRU map of serialized entries with per-entry TTL.
 */

import { LRUCache } from './lru-cache.js';
import { createGlobMatcher } from './glob.js';
import {
  CacheTierNames,
  TierResults,
  type CacheTier,
  type TierDeleteResult,
  type TierReadResult,
  type TierWriteResult,
} from './cache-tier.js';

interface LocalEntry {
  serialized: string;
  expiresAt: number;
}

export interface LocalTierOptions {
  /** Capacity before least-recently-used entries are evicted */
  maxEntries: number;
  /** Called when an entry leaves the tier through eviction or expiry */
  onEvict?: (key: string) => void;
  now?: () => number;
}

export class LocalTier implements CacheTier {
  readonly name = CacheTierNames.MEMORY;

  private readonly entries: LRUCache<string, LocalEntry>;
  private readonly onEvict?: (key: string) => void;
  private readonly now: () => number;

  constructor(options: LocalTierOptions) {
    this.onEvict = options.onEvict;
    this.now = options.now ?? Date.now;
    this.entries = new LRUCache<string, LocalEntry>(options.maxEntries, (key) => this.onEvict?.(key));
  }

  async get(key: string): Promise<TierReadResult> {
    const entry = this.entries.get(key);
    if (!entry) {
      return TierResults.miss();
    }

    const remainingMs = entry.expiresAt - this.now();
    if (remainingMs <= 0) {
      this.entries.delete(key);
      this.onEvict?.(key);
      return TierResults.miss();
    }

    return TierResults.hit(entry.serialized, Math.ceil(remainingMs / 1000));
  }

  async set(key: string, serialized: string, ttlSeconds: number): Promise<TierWriteResult> {
    this.entries.set(key, { serialized, expiresAt: this.now() + ttlSeconds * 1000 });
    return TierResults.written();
  }

  async delete(key: string): Promise<TierWriteResult> {
    this.entries.delete(key);
    return TierResults.written();
  }

  async deleteByPattern(pattern: string): Promise<TierDeleteResult> {
    const matches = createGlobMatcher(pattern);
    let deleted = 0;

    for (const key of this.entries.keys()) {
      if (matches(key) && this.entries.delete(key)) {
        deleted++;
      }
    }

    return TierResults.deleted(deleted);
  }

  async clear(): Promise<TierDeleteResult> {
    const count = this.entries.size;
    this.entries.clear();
    return TierResults.deleted(count);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  /**
   * Keys currently held, expired entries included until next read
   */
  keys(): string[] {
    return this.entries.keys();
  }

  get size(): number {
    return this.entries.size;
  }
}
