/**
 * Health Check Routes
 * @module routes/health
 *
 * Health/Degraded answer 200; Unhealthy/Critical answer 503; Error answers
 * 500, so orchestrators alarm on the status code alone.
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { Type, Static } from '@sinclair/typebox';
import { httpStatusForHealth } from '../health/interfaces.js';
import { ProbeNames, type HealthAggregator } from '../health/health-aggregator.js';
import {
  HealthReportSchema,
  LivenessProbeSchema,
  ProbeParamsSchema,
  ProbeResultSchema,
  ReadinessProbeSchema,
  type ProbeParams,
} from '../types/index.js';

export interface HealthRoutesOptions {
  aggregator: HealthAggregator;
}

const DetailedQuerySchema = Type.Object({
  deadlineMs: Type.Optional(Type.Integer({ minimum: 1 })),
});

type DetailedQuery = Static<typeof DetailedQuerySchema>;

const reportResponses = {
  200: HealthReportSchema,
  500: HealthReportSchema,
  503: HealthReportSchema,
};

const probeResponses = {
  200: ProbeResultSchema,
  500: ProbeResultSchema,
  503: ProbeResultSchema,
};

/**
 * Health check routes plugin
 */
const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (
  fastify: FastifyInstance,
  opts: HealthRoutesOptions
): Promise<void> => {
  const { aggregator } = opts;

  /**
   * Composite report, memoized briefly
   * GET /health
   */
  fastify.get('/health', { schema: { response: reportResponses } }, async (_request, reply) => {
    const report = await aggregator.check();
    return reply.status(httpStatusForHealth(report.overallStatus)).send(report);
  });

  /**
   * Fresh composite report
   * GET /health/detailed
   */
  fastify.get<{ Querystring: DetailedQuery }>(
    '/health/detailed',
    { schema: { querystring: DetailedQuerySchema, response: reportResponses } },
    async (request, reply) => {
      const report = await aggregator.check({ bypassCache: true, deadlineMs: request.query.deadlineMs });
      return reply.status(httpStatusForHealth(report.overallStatus)).send(report);
    }
  );

  /**
   * Liveness probe endpoint (Kubernetes)
   * GET /health/live
   */
  fastify.get('/health/live', { schema: { response: { 200: LivenessProbeSchema } } }, async (_request, reply) => {
    return reply.status(200).send({ alive: true, timestamp: new Date().toISOString() });
  });

  /**
   * Readiness probe endpoint (Kubernetes); ready while the store answers
   * GET /health/ready
   */
  fastify.get(
    '/health/ready',
    { schema: { response: { 200: ReadinessProbeSchema, 503: ReadinessProbeSchema } } },
    async (_request, reply) => {
      const result = await aggregator.checkProbe(ProbeNames.DATABASE);
      const database = result?.status ?? 'Error';
      const ready = database === 'Healthy' || database === 'Degraded';

      return reply.status(ready ? 200 : 503).send({
        ready,
        timestamp: new Date().toISOString(),
        dependencies: { database },
      });
    }
  );

  /**
   * Single dependency check
   * GET /health/database | /health/redis | /health/cache | /health/system
   */
  fastify.get<{ Params: ProbeParams }>(
    '/health/:probe',
    { schema: { params: ProbeParamsSchema, response: probeResponses } },
    async (request, reply) => {
      const result = await aggregator.checkProbe(request.params.probe);
      if (!result) {
        return reply.callNotFound();
      }
      return reply.status(httpStatusForHealth(result.status)).send(result);
    }
  );
};

export default healthRoutes;
