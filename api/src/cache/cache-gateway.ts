/**
 * Cache Gateway
 * @module cache/cache-gateway
 *
 * Orchestrates the local and distributed tiers behind one interface.
 * The strategy is fixed when the gateway is built:
 * - DualTierGateway: read-through distributed then local, write-through local then distributed
 * - LocalOnlyGateway: local tier only
 *
 * Distributed-tier failures are logged as fallback events and never reach
 * the caller. Key and pattern validation throws synchronously.
 */

import { TransientDependencyError } from '../errors/index.js';
import { createLogger, type StructuredLogger } from '../logging/index.js';
import { validateCacheKey, validatePattern } from '../validation/metric-validator.js';
import { createGlobMatcher } from './glob.js';
import { CacheTierNames, type CacheTier } from './cache-tier.js';
import type { StatisticsSnapshot, StatisticsTracker } from './statistics-tracker.js';

// ============================================================================
// Types
// ============================================================================

export type GatewayMode = 'dual-tier' | 'local-only';

export interface TierDeletionCounts {
  memory: number;
  distributed: number;
}

export interface PatternRemovalResult {
  pattern: string;
  deleted: TierDeletionCounts;
}

export interface CacheGateway {
  readonly mode: GatewayMode;
  /** Why the gateway runs local-only, when it does */
  readonly fallbackReason?: string;

  get<T>(key: string): Promise<T | undefined>;
  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;
  remove(key: string): Promise<void>;
  removeByPattern(pattern: string): Promise<PatternRemovalResult>;
  clearAll(): Promise<TierDeletionCounts>;
  exists(key: string): Promise<boolean>;
  /** Read, or compute and store once per key across concurrent callers */
  getOrSet<T>(key: string, factory: () => Promise<T | undefined>, ttlSeconds?: number): Promise<T | undefined>;
  /** Distributed tier reachability; always false local-only */
  pingDistributed(): Promise<boolean>;
  getStatistics(): StatisticsSnapshot;
  close(): Promise<void>;
}

export interface GatewaySettings {
  /** TTL when a caller passes none */
  defaultTtlSeconds: number;
  /** Cap on local-tier entry lifetime */
  localTtlSeconds: number;
  maxKeyLength: number;
}

export const DEFAULT_GATEWAY_SETTINGS: GatewaySettings = {
  defaultTtlSeconds: 1800,
  localTtlSeconds: 300,
  maxKeyLength: 512,
};

export interface GatewayDependencies {
  local: CacheTier;
  tracker: StatisticsTracker;
  settings?: Partial<GatewaySettings>;
  logger?: StructuredLogger;
}

// ============================================================================
// Shared Local-Tier Behaviour
// ============================================================================

abstract class BaseCacheGateway implements CacheGateway {
  abstract readonly mode: GatewayMode;

  protected readonly local: CacheTier;
  protected readonly tracker: StatisticsTracker;
  protected readonly settings: GatewaySettings;
  protected readonly logger: StructuredLogger;
  private readonly inflight = new Map<string, Promise<string | undefined>>();

  constructor(deps: GatewayDependencies) {
    this.local = deps.local;
    this.tracker = deps.tracker;
    this.settings = { ...DEFAULT_GATEWAY_SETTINGS, ...deps.settings };
    this.logger = deps.logger ?? createLogger('cache-gateway');
  }

  get<T>(key: string): Promise<T | undefined> {
    validateCacheKey(key, this.settings.maxKeyLength);
    return this.read(key).then((serialized) => this.decode<T>(key, serialized));
  }

  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    validateCacheKey(key, this.settings.maxKeyLength);
    const serialized = JSON.stringify(value);
    if (serialized === undefined) {
      return Promise.resolve();
    }
    return this.write(key, serialized, this.resolveTtl(ttlSeconds));
  }

  remove(key: string): Promise<void> {
    validateCacheKey(key, this.settings.maxKeyLength);
    return this.delete(key);
  }

  removeByPattern(pattern: string): Promise<PatternRemovalResult> {
    validatePattern(pattern);
    return this.deletePattern(pattern).then((deleted) => {
      this.logger.info({ pattern, deleted }, 'Cache entries removed by pattern');
      return { pattern, deleted };
    });
  }

  async exists(key: string): Promise<boolean> {
    validateCacheKey(key, this.settings.maxKeyLength);
    const result = await this.local.get(key);
    if (result.found) {
      return true;
    }
    return this.existsRemote(key);
  }

  async getOrSet<T>(
    key: string,
    factory: () => Promise<T | undefined>,
    ttlSeconds?: number
  ): Promise<T | undefined> {
    const cached = await this.get<T>(key);
    if (cached !== undefined) {
      return cached;
    }

    let pending = this.inflight.get(key);
    if (!pending) {
      pending = this.produce(key, factory, this.resolveTtl(ttlSeconds)).finally(() => {
        this.inflight.delete(key);
      });
      this.inflight.set(key, pending);
    }

    return this.decode<T>(key, await pending);
  }

  getStatistics(): StatisticsSnapshot {
    return this.tracker.getSnapshot();
  }

  // --------------------------------------------------------------------------
  // Strategy hooks
  // --------------------------------------------------------------------------

  protected abstract read(key: string): Promise<string | undefined>;
  protected abstract write(key: string, serialized: string, ttlSeconds: number): Promise<void>;
  protected abstract delete(key: string): Promise<void>;
  protected abstract deletePattern(pattern: string): Promise<TierDeletionCounts>;
  protected abstract existsRemote(key: string): Promise<boolean>;
  abstract clearAll(): Promise<TierDeletionCounts>;
  abstract pingDistributed(): Promise<boolean>;
  abstract close(): Promise<void>;

  // --------------------------------------------------------------------------
  // Local tier helpers
  // --------------------------------------------------------------------------

  protected async readLocal(key: string): Promise<string | undefined> {
    const start = performance.now();
    const result = await this.local.get(key);
    const latency = performance.now() - start;

    if (result.found) {
      this.tracker.recordHit(CacheTierNames.MEMORY, latency, Buffer.byteLength(result.value));
      return result.value;
    }

    this.tracker.recordMiss(CacheTierNames.MEMORY, latency);
    return undefined;
  }

  protected async writeLocal(key: string, serialized: string, ttlSeconds: number): Promise<void> {
    const start = performance.now();
    const localTtl = Math.min(ttlSeconds, this.settings.localTtlSeconds);
    await this.local.set(key, serialized, localTtl);
    this.tracker.recordSet(
      CacheTierNames.MEMORY,
      key,
      Buffer.byteLength(serialized),
      performance.now() - start,
      localTtl
    );
  }

  protected async deleteLocal(key: string): Promise<void> {
    await this.local.delete(key);
    this.tracker.recordRemove(CacheTierNames.MEMORY, key);
  }

  protected async deleteLocalPattern(pattern: string): Promise<number> {
    const result = await this.local.deleteByPattern(pattern);
    this.tracker.forgetKeys(CacheTierNames.MEMORY, createGlobMatcher(pattern));
    return result.deleted;
  }

  protected async clearLocal(): Promise<number> {
    const result = await this.local.clear();
    this.tracker.forgetKeys(CacheTierNames.MEMORY);
    return result.deleted;
  }

  private resolveTtl(ttlSeconds: number | undefined): number {
    return ttlSeconds !== undefined && ttlSeconds > 0 ? ttlSeconds : this.settings.defaultTtlSeconds;
  }

  private async produce<T>(
    key: string,
    factory: () => Promise<T | undefined>,
    ttlSeconds: number
  ): Promise<string | undefined> {
    const value = await factory();
    const serialized = value === undefined ? undefined : JSON.stringify(value);
    if (serialized !== undefined) {
      await this.write(key, serialized, ttlSeconds);
    }
    return serialized;
  }

  private decode<T>(key: string, serialized: string | undefined): T | undefined {
    if (serialized === undefined) {
      return undefined;
    }
    try {
      return JSON.parse(serialized) as T;
    } catch (error) {
      this.logger.warn({ key, err: error }, 'Discarding undecodable cache entry');
      return undefined;
    }
  }
}

// ============================================================================
// Local-Only Strategy
// ============================================================================

export class LocalOnlyGateway extends BaseCacheGateway {
  readonly mode = 'local-only' as const;
  readonly fallbackReason: string;

  constructor(deps: GatewayDependencies & { reason?: string }) {
    super(deps);
    this.fallbackReason = deps.reason ?? 'distributed cache not configured';
  }

  protected read(key: string): Promise<string | undefined> {
    return this.readLocal(key);
  }

  protected write(key: string, serialized: string, ttlSeconds: number): Promise<void> {
    return this.writeLocal(key, serialized, ttlSeconds);
  }

  protected delete(key: string): Promise<void> {
    return this.deleteLocal(key);
  }

  protected async deletePattern(pattern: string): Promise<TierDeletionCounts> {
    return { memory: await this.deleteLocalPattern(pattern), distributed: 0 };
  }

  protected async existsRemote(): Promise<boolean> {
    return false;
  }

  async clearAll(): Promise<TierDeletionCounts> {
    return { memory: await this.clearLocal(), distributed: 0 };
  }

  async pingDistributed(): Promise<boolean> {
    return false;
  }

  /**
   * The local tier outlives this strategy when a recovering gateway upgrades
   */
  close(): Promise<void> {
    return Promise.resolve();
  }
}

// ============================================================================
// Dual-Tier Strategy
// ============================================================================

export interface DualTierDependencies extends GatewayDependencies {
  distributed: CacheTier;
  /** Releases the distributed connection on close */
  onClose?: () => Promise<void>;
}

export class DualTierGateway extends BaseCacheGateway {
  readonly mode = 'dual-tier' as const;
  readonly fallbackReason = undefined;

  private readonly distributed: CacheTier;
  private readonly onClose?: () => Promise<void>;

  constructor(deps: DualTierDependencies) {
    super(deps);
    this.distributed = deps.distributed;
    this.onClose = deps.onClose;
  }

  protected async read(key: string): Promise<string | undefined> {
    const start = performance.now();
    const remote = await this.distributed.get(key);
    const latency = performance.now() - start;

    if (remote.tierFailed) {
      this.fallback('get', remote.error, key);
    } else if (remote.found) {
      this.tracker.recordHit(CacheTierNames.DISTRIBUTED, latency, Buffer.byteLength(remote.value));
      // Write back so the next read skips the network, never outliving the remote entry
      await this.writeLocal(key, remote.value, remote.remainingTtlSeconds ?? this.settings.localTtlSeconds);
      return remote.value;
    } else {
      this.tracker.recordMiss(CacheTierNames.DISTRIBUTED, latency);
    }

    return this.readLocal(key);
  }

  protected async write(key: string, serialized: string, ttlSeconds: number): Promise<void> {
    await this.writeLocal(key, serialized, ttlSeconds);

    const start = performance.now();
    const result = await this.distributed.set(key, serialized, ttlSeconds);
    if (result.tierFailed) {
      this.fallback('set', result.error, key);
      return;
    }
    this.tracker.recordSet(
      CacheTierNames.DISTRIBUTED,
      key,
      Buffer.byteLength(serialized),
      performance.now() - start,
      ttlSeconds
    );
  }

  protected async delete(key: string): Promise<void> {
    await this.deleteLocal(key);

    const result = await this.distributed.delete(key);
    if (result.tierFailed) {
      this.fallback('remove', result.error, key);
      return;
    }
    this.tracker.recordRemove(CacheTierNames.DISTRIBUTED, key);
  }

  protected async deletePattern(pattern: string): Promise<TierDeletionCounts> {
    const memory = await this.deleteLocalPattern(pattern);

    const result = await this.distributed.deleteByPattern(pattern);
    if (result.tierFailed) {
      this.fallback('removeByPattern', result.error);
    } else {
      this.tracker.forgetKeys(CacheTierNames.DISTRIBUTED, createGlobMatcher(pattern));
    }

    return { memory, distributed: result.deleted };
  }

  protected async existsRemote(key: string): Promise<boolean> {
    const result = await this.distributed.get(key);
    if (result.tierFailed) {
      this.fallback('exists', result.error, key);
      return false;
    }
    return result.found;
  }

  async clearAll(): Promise<TierDeletionCounts> {
    const memory = await this.clearLocal();

    const result = await this.distributed.clear();
    if (result.tierFailed) {
      this.fallback('clear', result.error);
    } else {
      this.tracker.forgetKeys(CacheTierNames.DISTRIBUTED);
    }

    return { memory, distributed: result.deleted };
  }

  pingDistributed(): Promise<boolean> {
    return this.distributed.ping();
  }

  async close(): Promise<void> {
    await this.onClose?.();
  }

  private fallback(operation: string, error: Error, key?: string): void {
    this.logger.cacheFallback(
      CacheTierNames.DISTRIBUTED,
      operation,
      new TransientDependencyError('distributed cache', operation, error),
      key
    );
  }
}
