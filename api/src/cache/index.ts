/**
 * Cache Module
 * @module cache
 *
 * Two-tier cache: an in-process LRU tier in front of an optional Redis tier,
 * orchestrated by a gateway whose strategy is chosen at startup.
 */

export {
  CacheTierNames,
  TierResults,
  type CacheTierName,
  type CacheTier,
  type TierReadResult,
  type TierWriteResult,
  type TierDeleteResult,
} from './cache-tier.js';

export { LRUCache } from './lru-cache.js';
export { createGlobMatcher } from './glob.js';
export { LocalTier, type LocalTierOptions } from './local-tier.js';
export { RedisTier, type RedisTierOptions } from './redis-tier.js';

export {
  resolveRedisOptions,
  createRedisClient,
  connectRedisClient,
  closeRedisClient,
  createRedisConnector,
  type RedisConnectionOptions,
  type DistributedStoreClient,
  type DistributedConnection,
  type DistributedConnector,
} from './redis.js';

export {
  StatisticsTracker,
  calculateHitRate,
  type TierStatistics,
  type ExtraStatistics,
  type LayerPreference,
  type StatisticsSnapshot,
} from './statistics-tracker.js';

export {
  LocalOnlyGateway,
  DualTierGateway,
  DEFAULT_GATEWAY_SETTINGS,
  type CacheGateway,
  type GatewayMode,
  type GatewaySettings,
  type GatewayDependencies,
  type DualTierDependencies,
  type PatternRemovalResult,
  type TierDeletionCounts,
} from './cache-gateway.js';

export {
  createCacheGateway,
  createLocalTier,
  RecoveringCacheGateway,
  type CreateCacheGatewayOptions,
  type RecoveringGatewayOptions,
} from './gateway-factory.js';

export { CacheKeys, CacheKeyPrefixes } from './cache-keys.js';
