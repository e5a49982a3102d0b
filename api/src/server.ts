/**
 * Server Entry Point
 * @module server
 */

import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import { loadConfig, type AppConfig } from './config/index.js';
import { closePool, initPool } from './db/connection.js';
import { PgFlightStore } from './db/flight-store.js';
import { StatisticsTracker, createCacheGateway, type CacheGateway } from './cache/index.js';
import { HealthAggregator, createProbeSet } from './health/index.js';
import {
  LoggingMetricSink,
  MetricTracker,
  PrometheusMetricSink,
  createMetricsRegistry,
  registerCacheMetrics,
} from './metrics/index.js';
import { createLogger } from './logging/index.js';

const logger = createLogger('server');

interface RunningServer {
  app: FastifyInstance;
  gateway: CacheGateway;
}

/**
 * Wire the cache, health and metrics services and build the app
 */
async function compose(config: AppConfig): Promise<RunningServer> {
  initPool(config.database);

  const tracker = new StatisticsTracker();
  const gateway = await createCacheGateway({
    redis: config.redis,
    cache: config.cache,
    tracker,
  });

  const registry = createMetricsRegistry({
    prefix: config.metrics.prefix,
    collectDefaults: config.metrics.collectDefaults,
    defaultLabels: { service: 'flightboard-api', env: config.env },
  });
  registerCacheMetrics(registry, config.metrics.prefix, () => tracker.getSnapshot());

  const metrics = new MetricTracker({
    sinks: [
      new LoggingMetricSink(createLogger('metrics')),
      new PrometheusMetricSink(registry, config.metrics.prefix),
    ],
  });

  const t = config.health.thresholds;
  const aggregator = new HealthAggregator(
    createProbeSet({
      store: new PgFlightStore(),
      cache: gateway,
      tracker,
      health: config.health,
      slowQueryThresholdMs: config.database.slowQueryThresholdMs,
    }),
    {
      probeTimeoutMs: config.health.probeTimeoutMs,
      reportTtlMs: config.health.reportTtlMs,
      summary: {
        slowQueryMs: config.database.slowQueryThresholdMs,
        hitRateWarningPercent: t.hitRateDegradedPercent,
        hitRateRecommendPercent: t.hitRateRecommendPercent,
        cpuWarningPercent: t.cpuDegradedPercent,
        memoryWarningMb: t.memoryDegradedBytes / (1024 * 1024),
        diskWarningPercent: t.diskDegradedPercent,
      },
    }
  );

  const app = await buildApp({ config, gateway, tracker, aggregator, metrics, registry });
  return { app, gateway };
}

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string, server: RunningServer): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal');

  try {
    await server.app.close();
    logger.info('HTTP server closed');

    await server.gateway.close();
    logger.info('Cache gateway closed');

    await closePool();
    logger.info('Database connections closed');

    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

/**
 * Start the server
 */
async function start(): Promise<void> {
  try {
    const config = loadConfig();
    const server = await compose(config);

    const shutdownHandler = (signal: string): void => {
      void gracefulShutdown(signal, server);
    };
    process.on('SIGTERM', () => shutdownHandler('SIGTERM'));
    process.on('SIGINT', () => shutdownHandler('SIGINT'));

    process.on('unhandledRejection', (reason) => {
      logger.fatal({ reason }, 'Unhandled rejection');
      shutdownHandler('unhandledRejection');
    });

    const { host, port } = config.server;
    await server.app.listen({ host, port });

    logger.info(
      { host, port, cacheMode: server.gateway.mode },
      `Server listening on http://${host}:${port}`
    );
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

void start();
