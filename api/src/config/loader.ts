/**
 * Configuration Loader
 * @module config/loader
 *
 * Maps environment variables onto the configuration schema and validates the result.
 */

import { AppConfigSchema, type AppConfig } from './schema.js';
import { ConfigurationError } from '../errors/index.js';

type EnvMap = Record<string, string | undefined>;

function flag(value: string | undefined): boolean | undefined {
  return value === undefined ? undefined : value === 'true';
}

function list(value: string | undefined): string[] | undefined {
  return value ? value.split(',').map((s) => s.trim()).filter(Boolean) : undefined;
}

/**
 * Drop undefined leaves and empty objects so schema defaults apply
 */
function filterUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined || value === '') {
      continue;
    }
    if (isPlainObject(value)) {
      const filtered = filterUndefined(value);
      if (Object.keys(filtered).length > 0) {
        result[key] = filtered;
      }
    } else {
      result[key] = value;
    }
  }

  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Map environment variables to the raw configuration structure
 */
export function mapEnvironment(env: EnvMap): Record<string, unknown> {
  return filterUndefined({
    env: env.NODE_ENV,
    version: env.APP_VERSION,
    server: {
      host: env.HOST,
      port: env.PORT,
      adminApiKey: env.ADMIN_API_KEY,
      corsOrigins: list(env.CORS_ORIGINS),
    },
    redis: {
      url: env.REDIS_URL,
      host: env.REDIS_HOST,
      port: env.REDIS_PORT,
      password: env.REDIS_PASSWORD,
      db: env.REDIS_DB,
      namespace: env.REDIS_NAMESPACE,
      connectTimeoutMs: env.REDIS_CONNECT_TIMEOUT_MS,
      reprobeIntervalMs: env.REDIS_REPROBE_INTERVAL_MS,
    },
    database: {
      connectionString: env.DATABASE_URL,
      poolMax: env.DB_POOL_MAX,
      idleTimeoutMs: env.DB_IDLE_TIMEOUT,
      connectionTimeoutMs: env.DB_CONNECTION_TIMEOUT,
      slowQueryThresholdMs: env.DB_SLOW_QUERY_MS,
    },
    cache: {
      defaultTtlSeconds: env.CACHE_DEFAULT_TTL_SECONDS,
      localTtlSeconds: env.CACHE_LOCAL_TTL_SECONDS,
      localMaxEntries: env.CACHE_LOCAL_MAX_ENTRIES,
      maxKeyLength: env.CACHE_MAX_KEY_LENGTH,
    },
    health: {
      probeTimeoutMs: env.HEALTH_PROBE_TIMEOUT_MS,
      reportTtlMs: env.HEALTH_REPORT_TTL_MS,
      cpuSampleMs: env.HEALTH_CPU_SAMPLE_MS,
      diskPath: env.HEALTH_DISK_PATH,
      thresholds: {
        cpuDegradedPercent: env.HEALTH_CPU_DEGRADED_PERCENT,
        cpuCriticalPercent: env.HEALTH_CPU_CRITICAL_PERCENT,
        memoryDegradedBytes: env.HEALTH_MEMORY_DEGRADED_BYTES,
        memoryCriticalBytes: env.HEALTH_MEMORY_CRITICAL_BYTES,
        diskDegradedPercent: env.HEALTH_DISK_DEGRADED_PERCENT,
        diskCriticalPercent: env.HEALTH_DISK_CRITICAL_PERCENT,
      },
    },
    metrics: {
      prefix: env.METRICS_PREFIX,
      collectDefaults: flag(env.METRICS_COLLECT_DEFAULTS),
    },
    logging: {
      level: env.LOG_LEVEL,
      pretty: flag(env.LOG_PRETTY),
    },
  });
}

/**
 * Load and validate configuration.
 * Throws ConfigurationError naming the first invalid path.
 */
export function loadConfig(env: EnvMap = process.env): AppConfig {
  const result = AppConfigSchema.safeParse(mapEnvironment(env));

  if (!result.success) {
    const [first] = result.error.issues;
    const path = first ? first.path.join('.') : 'config';
    throw new ConfigurationError(
      path,
      `Invalid configuration at '${path}': ${first ? first.message : result.error.message}`
    );
  }

  return result.data;
}
