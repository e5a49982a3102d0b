/**
 * Route Registration
 * @module routes
 *
 * Registers all route plugins with their prefixes.
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { CacheGateway } from '../cache/cache-gateway.js';
import type { StatisticsTracker } from '../cache/statistics-tracker.js';
import type { HealthAggregator } from '../health/health-aggregator.js';
import type { MetricTracker } from '../metrics/metric-tracker.js';
import healthRoutes from './health.js';
import performanceRoutes from './performance.js';
import adminRoutes from './admin/index.js';

export interface RoutesOptions {
  gateway: CacheGateway;
  tracker: StatisticsTracker;
  aggregator: HealthAggregator;
  metrics: MetricTracker;
  adminApiKey?: string;
}

const routes: FastifyPluginAsync<RoutesOptions> = async (
  fastify: FastifyInstance,
  opts: RoutesOptions
): Promise<void> => {
  const { gateway, tracker, aggregator, metrics } = opts;

  // GET /health, /health/detailed, /health/live, /health/ready, /health/:probe
  await fastify.register(healthRoutes, { aggregator });

  // POST /api/performance/metrics, /events; GET /summary, /cache/stats
  await fastify.register(performanceRoutes, { prefix: '/api/performance', metrics, gateway, tracker });

  // DELETE /api/admin/cache, /api/admin/cache/pattern
  await fastify.register(adminRoutes, {
    prefix: '/api/admin',
    gateway,
    adminApiKey: opts.adminApiKey,
    onInvalidated: () => aggregator.invalidate(),
  });
};

export default routes;

export { healthRoutes, performanceRoutes, adminRoutes };
