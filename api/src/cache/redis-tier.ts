/**
 * Distributed Cache Tier
 * @module cache/redis-tier
 *
 * Redis-backed tier. Keys are namespaced, writes use SETEX, and pattern
 * deletion runs a server-side SCAN MATCH cursor loop with batched DEL.
 */

import { toError } from '../errors/index.js';
import type { DistributedStoreClient } from './redis.js';
import {
  CacheTierNames,
  TierResults,
  type CacheTier,
  type TierDeleteResult,
  type TierReadResult,
  type TierWriteResult,
} from './cache-tier.js';

export interface RedisTierOptions {
  /** Prefix for every key, without trailing colon */
  namespace: string;
  /** SCAN batch size hint */
  scanCount?: number;
}

const DEFAULT_SCAN_COUNT = 100;

export class RedisTier implements CacheTier {
  readonly name = CacheTierNames.DISTRIBUTED;

  private readonly client: DistributedStoreClient;
  private readonly namespace: string;
  private readonly scanCount: number;

  constructor(client: DistributedStoreClient, options: RedisTierOptions) {
    this.client = client;
    this.namespace = options.namespace;
    this.scanCount = options.scanCount ?? DEFAULT_SCAN_COUNT;
  }

  /**
   * Build cache key with namespace
   */
  private buildKey(key: string): string {
    return `${this.namespace}:${key}`;
  }

  async get(key: string): Promise<TierReadResult> {
    try {
      const fullKey = this.buildKey(key);
      const [value, ttlMs] = await Promise.all([this.client.get(fullKey), this.client.pttl(fullKey)]);
      if (value === null) {
        return TierResults.miss();
      }
      // PTTL answers -1 for no expiry, -2 when the key vanished between the two calls
      return TierResults.hit(value, ttlMs > 0 ? Math.ceil(ttlMs / 1000) : undefined);
    } catch (error) {
      return TierResults.readFailed(toError(error));
    }
  }

  async set(key: string, serialized: string, ttlSeconds: number): Promise<TierWriteResult> {
    try {
      await this.client.setex(this.buildKey(key), Math.max(1, Math.ceil(ttlSeconds)), serialized);
      return TierResults.written();
    } catch (error) {
      return TierResults.writeFailed(toError(error));
    }
  }

  async delete(key: string): Promise<TierWriteResult> {
    try {
      await this.client.del(this.buildKey(key));
      return TierResults.written();
    } catch (error) {
      return TierResults.writeFailed(toError(error));
    }
  }

  async deleteByPattern(pattern: string): Promise<TierDeleteResult> {
    return this.scanAndDelete(this.buildKey(pattern));
  }

  async clear(): Promise<TierDeleteResult> {
    return this.scanAndDelete(`${this.namespace}:*`);
  }

  async ping(): Promise<boolean> {
    try {
      await this.client.ping();
      return true;
    } catch {
      return false;
    }
  }

  private async scanAndDelete(match: string): Promise<TierDeleteResult> {
    let cursor = '0';
    let deleted = 0;

    try {
      do {
        const [nextCursor, keys] = await this.client.scan(cursor, 'MATCH', match, 'COUNT', this.scanCount);
        cursor = nextCursor;

        if (keys.length > 0) {
          deleted += await this.client.del(...keys);
        }
      } while (cursor !== '0');

      return TierResults.deleted(deleted);
    } catch (error) {
      return TierResults.deleteFailed(toError(error));
    }
  }
}
