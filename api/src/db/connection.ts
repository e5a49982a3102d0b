/**
 * PostgreSQL Database Connection Pool
 * @module db/connection
 */

import pg from 'pg';
import { createLogger } from '../logging/index.js';
import { ConfigurationError } from '../errors/index.js';
import type { DatabaseConfig } from '../config/index.js';

const { Pool } = pg;

const logger = createLogger('db-connection');

/**
 * PostgreSQL connection pool singleton
 */
let pool: pg.Pool | null = null;

/**
 * Create the pool from configuration. Replaces nothing if one already exists.
 */
export function initPool(config: DatabaseConfig): pg.Pool {
  if (pool) {
    return pool;
  }

  if (!config.connectionString) {
    throw ConfigurationError.missing('database.connectionString');
  }

  pool = new Pool({
    connectionString: config.connectionString,
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  });

  pool.on('connect', () => {
    logger.debug('New client connected to pool');
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected pool error');
  });

  return pool;
}

/**
 * Get the database connection pool
 */
export function getPool(): pg.Pool {
  if (!pool) {
    throw new ConfigurationError('database', 'Database pool has not been initialised');
  }
  return pool;
}

/**
 * Close the database connection pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Database pool closed');
  }
}

/**
 * Execute a query with the connection pool
 */
export async function query<T extends pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  const start = Date.now();
  const result = await getPool().query<T>(text, params);
  const duration = Date.now() - start;

  logger.debug({ text, duration, rows: result.rowCount }, 'Query executed');

  return result;
}
