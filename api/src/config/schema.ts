/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for validating all application configuration.
 * Provides type-safe configuration with compile-time type inference.
 */

import { z } from 'zod';

// ============================================================================
// Environment Enum
// ============================================================================

/**
 * Valid application environments
 */
export const Environment = z.enum(['development', 'staging', 'production', 'test']);
export type Environment = z.infer<typeof Environment>;

// ============================================================================
// Server Configuration
// ============================================================================

export const ServerConfigSchema = z.object({
  /** Host to bind to */
  host: z.string().default('0.0.0.0'),
  /** Port to listen on */
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  /** Shared key required by the administrative cache routes; unset disables the check */
  adminApiKey: z.string().min(1).optional(),
  /** Allowed CORS origins */
  corsOrigins: z.array(z.string()).default(['*']),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// ============================================================================
// Redis Configuration
// ============================================================================

/**
 * Distributed cache tier configuration.
 * Neither `url` nor `host` set means the gateway runs local-only.
 */
export const RedisConfigSchema = z.object({
  /** Full connection URL (redis:// or rediss://), overrides host/port */
  url: z.string().min(1).optional(),
  host: z.string().min(1).optional(),
  port: z.coerce.number().int().min(1).max(65535).default(6379),
  password: z.string().optional(),
  /** Redis database number */
  db: z.coerce.number().int().min(0).max(15).default(0),
  /** Prefix applied to every key written by this service */
  namespace: z.string().min(1).default('flightboard'),
  /** Budget for the startup reachability check */
  connectTimeoutMs: z.coerce.number().int().min(100).default(2000),
  /** Re-probe interval while running local-only; 0 disables recovery */
  reprobeIntervalMs: z.coerce.number().int().min(0).default(300000),
});

export type RedisConfig = z.infer<typeof RedisConfigSchema>;

// ============================================================================
// Database Configuration
// ============================================================================

export const DatabaseConfigSchema = z.object({
  /** Full connection string */
  connectionString: z.string().min(1).optional(),
  /** Maximum pool size */
  poolMax: z.coerce.number().int().min(1).default(20),
  /** Idle timeout in milliseconds */
  idleTimeoutMs: z.coerce.number().int().min(1000).default(30000),
  /** Connection timeout in milliseconds */
  connectionTimeoutMs: z.coerce.number().int().min(100).default(5000),
  /** Count query slower than this marks the store Degraded */
  slowQueryThresholdMs: z.coerce.number().int().min(1).default(1000),
});

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

// ============================================================================
// Cache Configuration
// ============================================================================

export const CacheConfigSchema = z.object({
  /** TTL applied when a caller does not pass one */
  defaultTtlSeconds: z.coerce.number().int().min(1).default(1800),
  /** Upper bound on how long an entry lives in the local tier */
  localTtlSeconds: z.coerce.number().int().min(1).default(300),
  /** Local tier capacity before LRU eviction */
  localMaxEntries: z.coerce.number().int().min(1).default(10000),
  maxKeyLength: z.coerce.number().int().min(1).default(512),
});

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

// ============================================================================
// Health Configuration
// ============================================================================

export const HealthThresholdsSchema = z.object({
  cpuDegradedPercent: z.coerce.number().min(0).max(100).default(75),
  cpuCriticalPercent: z.coerce.number().min(0).max(100).default(90),
  memoryDegradedBytes: z.coerce.number().min(0).default(1_500_000_000),
  memoryCriticalBytes: z.coerce.number().min(0).default(2_000_000_000),
  diskDegradedPercent: z.coerce.number().min(0).max(100).default(85),
  diskCriticalPercent: z.coerce.number().min(0).max(100).default(95),
  hitRateDegradedPercent: z.coerce.number().min(0).max(100).default(50),
  hitRateUnhealthyPercent: z.coerce.number().min(0).max(100).default(25),
  hitRateRecommendPercent: z.coerce.number().min(0).max(100).default(70),
});

export type HealthThresholds = z.infer<typeof HealthThresholdsSchema>;

export const HealthConfigSchema = z.object({
  /** Per-probe time budget */
  probeTimeoutMs: z.coerce.number().int().min(1).default(5000),
  /** How long a composite report is served from memory */
  reportTtlMs: z.coerce.number().int().min(0).default(30000),
  /** CPU sampling window */
  cpuSampleMs: z.coerce.number().int().min(1).default(500),
  /** Filesystem path whose volume is checked for disk usage */
  diskPath: z.string().default('/'),
  thresholds: HealthThresholdsSchema.default({}),
});

export type HealthConfig = z.infer<typeof HealthConfigSchema>;

// ============================================================================
// Logging Configuration
// ============================================================================

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Metrics Configuration
// ============================================================================

export const MetricsConfigSchema = z.object({
  /** Prefix for every exported Prometheus series */
  prefix: z.string().regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/).default('flightboard_'),
  /** Export the process-level default collectors */
  collectDefaults: z.boolean().default(true),
});

export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;

// ============================================================================
// Application Configuration
// ============================================================================

export const AppConfigSchema = z.object({
  env: Environment.default('development'),
  version: z.string().default('1.0.0'),
  server: ServerConfigSchema.default({}),
  redis: RedisConfigSchema.default({}),
  database: DatabaseConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  health: HealthConfigSchema.default({}),
  metrics: MetricsConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
