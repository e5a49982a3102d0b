/**
 * Cache Gateway Factory
 * @module cache/gateway-factory
 *
 * Chooses the gateway strategy once at startup. A distributed tier that is
 * unconfigured, misconfigured or unreachable yields a local-only gateway;
 * process start never fails on cache configuration.
 *
 * When the tier was configured but unreachable and re-probing is enabled,
 * the returned gateway retries the connection in the background and swaps
 * in the dual-tier strategy once it succeeds.
 */

import { ConfigurationError, getErrorMessage } from '../errors/index.js';
import { createLogger, type StructuredLogger } from '../logging/index.js';
import type { CacheConfig, RedisConfig } from '../config/index.js';
import { LocalTier } from './local-tier.js';
import { RedisTier } from './redis-tier.js';
import { createRedisConnector, resolveRedisOptions, type DistributedConnector } from './redis.js';
import { CacheTierNames, type CacheTier } from './cache-tier.js';
import type { StatisticsSnapshot, StatisticsTracker } from './statistics-tracker.js';
import {
  DualTierGateway,
  LocalOnlyGateway,
  type CacheGateway,
  type GatewayMode,
  type GatewaySettings,
  type PatternRemovalResult,
  type TierDeletionCounts,
} from './cache-gateway.js';

// ============================================================================
// Recovering Gateway
// ============================================================================

export interface RecoveringGatewayOptions {
  initial: LocalOnlyGateway;
  /** Builds the dual-tier strategy from a successful connection attempt */
  upgrade: () => Promise<DualTierGateway>;
  intervalMs: number;
  logger: StructuredLogger;
}

/**
 * Delegates to the current strategy object. Re-probes on an interval while
 * local-only; after one successful upgrade the timer stops and every call
 * goes straight to the dual-tier strategy.
 */
export class RecoveringCacheGateway implements CacheGateway {
  private current: CacheGateway;
  private timer: NodeJS.Timeout | null;
  private probing = false;
  private readonly degradedSince = Date.now();
  private readonly upgrade: () => Promise<DualTierGateway>;
  private readonly logger: StructuredLogger;

  constructor(options: RecoveringGatewayOptions) {
    this.current = options.initial;
    this.upgrade = options.upgrade;
    this.logger = options.logger;
    this.timer = setInterval(() => {
      void this.reprobe();
    }, options.intervalMs);
    this.timer.unref();
  }

  get mode(): GatewayMode {
    return this.current.mode;
  }

  get fallbackReason(): string | undefined {
    return this.current.fallbackReason;
  }

  /**
   * Attempt one upgrade; resolves true once running dual-tier
   */
  async reprobe(): Promise<boolean> {
    if (this.current.mode === 'dual-tier') {
      return true;
    }
    if (this.probing) {
      return false;
    }

    this.probing = true;
    try {
      this.current = await this.upgrade();
      this.stopTimer();
      this.logger.tierRecovered(CacheTierNames.DISTRIBUTED, Date.now() - this.degradedSince);
      this.logger.tierModeSelected('dual-tier', 'distributed cache reachable again');
      return true;
    } catch (error) {
      this.logger.debug({ err: error }, 'Distributed cache still unreachable');
      return false;
    } finally {
      this.probing = false;
    }
  }

  get<T>(key: string): Promise<T | undefined> {
    return this.current.get<T>(key);
  }

  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    return this.current.set(key, value, ttlSeconds);
  }

  remove(key: string): Promise<void> {
    return this.current.remove(key);
  }

  removeByPattern(pattern: string): Promise<PatternRemovalResult> {
    return this.current.removeByPattern(pattern);
  }

  clearAll(): Promise<TierDeletionCounts> {
    return this.current.clearAll();
  }

  exists(key: string): Promise<boolean> {
    return this.current.exists(key);
  }

  getOrSet<T>(key: string, factory: () => Promise<T | undefined>, ttlSeconds?: number): Promise<T | undefined> {
    return this.current.getOrSet(key, factory, ttlSeconds);
  }

  pingDistributed(): Promise<boolean> {
    return this.current.pingDistributed();
  }

  getStatistics(): StatisticsSnapshot {
    return this.current.getStatistics();
  }

  async close(): Promise<void> {
    this.stopTimer();
    await this.current.close();
  }

  private stopTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface CreateCacheGatewayOptions {
  redis: RedisConfig;
  cache: CacheConfig;
  tracker: StatisticsTracker;
  /** Override how the distributed tier is reached; defaults to ioredis */
  connector?: DistributedConnector;
  logger?: StructuredLogger;
}

function gatewaySettings(cache: CacheConfig): GatewaySettings {
  return {
    defaultTtlSeconds: cache.defaultTtlSeconds,
    localTtlSeconds: cache.localTtlSeconds,
    maxKeyLength: cache.maxKeyLength,
  };
}

/**
 * Create the process-wide local tier, reporting evictions to the tracker
 */
export function createLocalTier(cache: CacheConfig, tracker: StatisticsTracker): LocalTier {
  return new LocalTier({
    maxEntries: cache.localMaxEntries,
    onEvict: (key) => tracker.recordEviction(CacheTierNames.MEMORY, key),
  });
}

/**
 * Select and build the cache gateway strategy
 */
export async function createCacheGateway(options: CreateCacheGatewayOptions): Promise<CacheGateway> {
  const logger = options.logger ?? createLogger('cache-gateway');
  const { tracker } = options;
  const settings = gatewaySettings(options.cache);
  const local: CacheTier = createLocalTier(options.cache, tracker);

  const localOnly = (reason: string): LocalOnlyGateway => {
    logger.tierModeSelected('local-only', reason);
    return new LocalOnlyGateway({ local, tracker, settings, logger, reason });
  };

  let connector = options.connector;
  if (!connector) {
    try {
      const redisOptions = resolveRedisOptions(options.redis);
      if (!redisOptions) {
        return localOnly('distributed cache not configured');
      }
      connector = createRedisConnector(redisOptions);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        logger.warn({ err: error, configKey: error.configKey }, 'Invalid distributed cache configuration');
        return localOnly(`invalid configuration: ${error.message}`);
      }
      throw error;
    }
  }

  const connect = connector;
  const upgrade = async (): Promise<DualTierGateway> => {
    const connection = await connect();
    return new DualTierGateway({
      local,
      distributed: new RedisTier(connection.client, { namespace: options.redis.namespace }),
      tracker,
      settings,
      logger,
      onClose: connection.close,
    });
  };

  try {
    const gateway = await upgrade();
    logger.tierModeSelected('dual-tier', 'distributed cache reachable');
    return gateway;
  } catch (error) {
    const reason = `distributed cache unreachable: ${getErrorMessage(error)}`;
    logger.warn({ err: error }, 'Distributed cache unreachable at startup');

    const fallback = localOnly(reason);
    if (options.redis.reprobeIntervalMs > 0) {
      return new RecoveringCacheGateway({
        initial: fallback,
        upgrade,
        intervalMs: options.redis.reprobeIntervalMs,
        logger,
      });
    }
    return fallback;
  }
}
