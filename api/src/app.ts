/**
 * Fastify Application Factory
 * @module app
 */

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import type { Registry } from 'prom-client';

import type { AppConfig } from './config/index.js';
import type { CacheGateway } from './cache/cache-gateway.js';
import type { StatisticsTracker } from './cache/statistics-tracker.js';
import type { HealthAggregator } from './health/health-aggregator.js';
import type { MetricTracker } from './metrics/metric-tracker.js';
import { metricsPlugin } from './metrics/prometheus.js';
import { createLogger } from './logging/index.js';
import errorHandler from './middleware/error-handler.js';
import routes from './routes/index.js';

/**
 * Collaborators the HTTP surface is built around
 */
export interface AppDependencies {
  config: AppConfig;
  gateway: CacheGateway;
  tracker: StatisticsTracker;
  aggregator: HealthAggregator;
  metrics: MetricTracker;
  /** Omit to serve no /metrics endpoint */
  registry?: Registry;
  /** Fastify request logger; defaults from config.logging */
  logger?: FastifyServerOptions['logger'];
}

function requestLoggerOptions(config: AppConfig): FastifyServerOptions['logger'] {
  if (config.logging.level === 'silent') {
    return false;
  }

  return {
    level: config.logging.level,
    transport: config.logging.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  };
}

/**
 * Create and configure Fastify application instance
 */
export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const { config } = deps;
  const logger = createLogger('app-factory');
  const isProduction = config.env === 'production';

  const app = Fastify({
    logger: deps.logger ?? requestLoggerOptions(config),
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
  });

  await app.register(cors, {
    origin: config.server.corsOrigins.includes('*') ? true : config.server.corsOrigins,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID', 'X-Admin-Key'],
  });
  logger.debug('CORS plugin registered');

  await app.register(helmet, {
    contentSecurityPolicy: isProduction,
    crossOriginEmbedderPolicy: false,
  });
  logger.debug('Helmet plugin registered');

  // Register error handler (must be before routes)
  await app.register(errorHandler, { isProduction });
  logger.debug('Error handler registered');

  if (deps.registry) {
    await app.register(metricsPlugin, { registry: deps.registry, prefix: config.metrics.prefix });
    logger.debug('Metrics plugin registered');
  }

  await app.register(routes, {
    gateway: deps.gateway,
    tracker: deps.tracker,
    aggregator: deps.aggregator,
    metrics: deps.metrics,
    adminApiKey: config.server.adminApiKey,
  });
  logger.debug('Routes registered');

  app.addHook('onClose', async () => {
    logger.info('Application closing...');
  });

  return app;
}

export default buildApp;
