/**
 * Redis Connection
 * Distributed cache tier client using ioredis
 * @module cache/redis
 */

import { Redis } from 'ioredis';
import { createLogger } from '../logging/index.js';
import { ConfigurationError } from '../errors/index.js';
import type { RedisConfig } from '../config/index.js';

const logger = createLogger('redis-cache');

/**
 * Resolved connection settings for the distributed tier
 */
export interface RedisConnectionOptions {
  host: string;
  port: number;
  password?: string;
  db: number;
  tls: boolean;
  connectTimeoutMs: number;
}

/**
 * Commands the distributed tier issues. ioredis' `Redis` satisfies this;
 * tests substitute an in-process fake.
 */
export interface DistributedStoreClient {
  get(key: string): Promise<string | null>;
  pttl(key: string): Promise<number>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  scan(
    cursor: string,
    matchToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number
  ): Promise<[cursor: string, elements: string[]]>;
  ping(): Promise<string>;
}

/**
 * Resolve connection settings from configuration.
 * Returns null when no distributed tier is configured; throws
 * ConfigurationError for a malformed REDIS_URL.
 */
export function resolveRedisOptions(config: RedisConfig): RedisConnectionOptions | null {
  if (config.url) {
    let parsed: URL;
    try {
      parsed = new URL(config.url);
    } catch {
      throw new ConfigurationError('redis.url', 'Invalid configuration \'redis.url\': not a valid URL');
    }

    if (parsed.protocol !== 'redis:' && parsed.protocol !== 'rediss:') {
      throw ConfigurationError.invalid('redis.url', 'redis:// or rediss:// URL', parsed.protocol);
    }
    if (!parsed.hostname) {
      throw ConfigurationError.missing('redis.url host');
    }

    const dbSegment = parsed.pathname.replace(/^\//, '');
    const db = dbSegment ? Number(dbSegment) : config.db;
    if (!Number.isInteger(db) || db < 0 || db > 15) {
      throw ConfigurationError.invalid('redis.url database', 'integer 0-15', dbSegment);
    }

    const port = parsed.port ? Number(parsed.port) : config.port;

    return {
      host: parsed.hostname,
      port,
      password: parsed.password ? decodeURIComponent(parsed.password) : config.password,
      db,
      tls: parsed.protocol === 'rediss:',
      connectTimeoutMs: config.connectTimeoutMs,
    };
  }

  if (config.host) {
    return {
      host: config.host,
      port: config.port,
      password: config.password,
      db: config.db,
      tls: false,
      connectTimeoutMs: config.connectTimeoutMs,
    };
  }

  return null;
}

/**
 * Create a Redis client. Commands fail fast instead of queueing while the
 * connection is down, so a dead tier surfaces as a failed call while the
 * client keeps reconnecting in the background.
 */
export function createRedisClient(options: RedisConnectionOptions): Redis {
  const client = new Redis({
    host: options.host,
    port: options.port,
    password: options.password,
    db: options.db,
    tls: options.tls ? {} : undefined,
    connectTimeout: options.connectTimeoutMs,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    lazyConnect: true,
    retryStrategy: (times: number) => {
      if (times === 3) {
        logger.error('Redis connection failed after 3 retries, backing off');
      }
      return Math.min(times * 200, 5000);
    },
  });

  client.on('connect', () => {
    logger.info('Redis client connected');
  });

  client.on('error', (err: Error) => {
    logger.error({ err }, 'Redis client error');
  });

  client.on('close', () => {
    logger.debug('Redis connection closed');
  });

  return client;
}

/**
 * Open the connection, bounded by the configured connect timeout
 */
export async function connectRedisClient(client: Redis, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const connecting = client.connect();
  connecting.catch((err: unknown) => {
    logger.debug({ err }, 'Redis connect attempt settled with an error');
  });

  try {
    await Promise.race([
      connecting,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`Redis connect timed out after ${timeoutMs}ms`)), timeoutMs);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Close a Redis connection
 */
export async function closeRedisClient(client: Redis): Promise<void> {
  try {
    await client.quit();
    logger.info('Redis client closed');
  } catch (err) {
    logger.warn({ err }, 'Redis quit failed, disconnecting');
    client.disconnect();
  }
}

/**
 * Live distributed tier connection handed to the gateway
 */
export interface DistributedConnection {
  client: DistributedStoreClient;
  close(): Promise<void>;
}

export type DistributedConnector = () => Promise<DistributedConnection>;

/**
 * Connector that opens a fresh client per attempt and verifies it with PING.
 * A failed attempt tears its client down so no reconnect loop is left behind.
 */
export function createRedisConnector(options: RedisConnectionOptions): DistributedConnector {
  return async () => {
    const client = createRedisClient(options);
    try {
      await connectRedisClient(client, options.connectTimeoutMs);
      await client.ping();
    } catch (err) {
      client.disconnect();
      throw err;
    }

    return {
      client,
      close: () => closeRedisClient(client),
    };
  };
}
