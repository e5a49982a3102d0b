/**
 * Performance Routes
 * @module routes/performance
 *
 * Metric and event intake plus cache statistics, registered under
 * /api/performance.
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { CacheGateway } from '../cache/cache-gateway.js';
import type { StatisticsTracker } from '../cache/statistics-tracker.js';
import type { MetricTracker } from '../metrics/metric-tracker.js';
import {
  AcceptedSchema,
  CacheStatisticsSchema,
  ErrorResponseSchema,
  MetricSummarySchema,
  TrackEventBodySchema,
  TrackMetricBodySchema,
  type TrackEventBody,
  type TrackMetricBody,
} from '../types/index.js';

export interface PerformanceRoutesOptions {
  metrics: MetricTracker;
  gateway: CacheGateway;
  tracker: StatisticsTracker;
}

const performanceRoutes: FastifyPluginAsync<PerformanceRoutesOptions> = async (
  fastify: FastifyInstance,
  opts: PerformanceRoutesOptions
): Promise<void> => {
  const { metrics, gateway, tracker } = opts;

  // ==========================================================================
  // POST /metrics - Record a numeric sample
  // ==========================================================================
  fastify.post<{ Body: TrackMetricBody }>('/metrics', {
    schema: {
      body: TrackMetricBodySchema,
      response: {
        202: AcceptedSchema,
        400: ErrorResponseSchema,
      },
    },
  }, async (request, reply) => {
    const { name, value, tags } = request.body;
    metrics.trackMetric(name, value, tags);
    return reply.status(202).send({ accepted: true });
  });

  // ==========================================================================
  // POST /events - Record an occurrence
  // ==========================================================================
  fastify.post<{ Body: TrackEventBody }>('/events', {
    schema: {
      body: TrackEventBodySchema,
      response: {
        202: AcceptedSchema,
        400: ErrorResponseSchema,
      },
    },
  }, async (request, reply) => {
    const { name, tags } = request.body;
    metrics.trackEvent(name, tags);
    return reply.status(202).send({ accepted: true });
  });

  // ==========================================================================
  // GET /summary - Aggregates since the last reset
  // ==========================================================================
  fastify.get('/summary', {
    schema: {
      response: { 200: MetricSummarySchema },
    },
  }, async () => metrics.getSummary());

  // ==========================================================================
  // GET /cache/stats - Per-tier cache statistics
  // ==========================================================================
  fastify.get('/cache/stats', {
    schema: {
      response: { 200: CacheStatisticsSchema },
    },
  }, async () => ({
    mode: gateway.mode,
    fallbackReason: gateway.fallbackReason,
    ...gateway.getStatistics(),
  }));

  // ==========================================================================
  // POST /cache/stats/reset - Zero the counters
  // ==========================================================================
  fastify.post('/cache/stats/reset', async (_request, reply) => {
    tracker.reset();
    return reply.status(204).send();
  });
};

export default performanceRoutes;
