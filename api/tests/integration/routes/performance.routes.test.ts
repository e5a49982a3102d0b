/**
 * Performance Routes Integration Tests
 * @module tests/integration/routes/performance.routes
 *
 * Endpoints tested:
 * - POST /api/performance/metrics
 * - POST /api/performance/events
 * - GET /api/performance/summary
 * - GET /api/performance/cache/stats
 * - POST /api/performance/cache/stats/reset
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RecordingSink, buildTestApp, createLocalOnlyFixture, type TestApp } from '../../helpers/index.js';
import { MetricTracker } from '../../../src/metrics/metric-tracker.js';

describe('Performance Routes', () => {
  let sink: RecordingSink;
  let ctx: TestApp;

  beforeEach(async () => {
    sink = new RecordingSink();
    const { gateway, tracker } = createLocalOnlyFixture('distributed cache not configured');
    ctx = await buildTestApp({ gateway, tracker, metrics: new MetricTracker({ sinks: [sink] }) });
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  describe('POST /api/performance/metrics', () => {
    it('should accept a metric and forward it to the sinks', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/performance/metrics',
        payload: { name: 'board.render_ms', value: 18, tags: { page: 'departures' } },
      });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toEqual({ accepted: true });
      expect(sink.metrics).toEqual([{ name: 'board.render_ms', value: 18, tags: { page: 'departures' } }]);
    });

    it('should reject an invalid metric name with INVALID_METRIC', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/performance/metrics',
        payload: { name: 'board render', value: 1 },
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.code).toBe('INVALID_METRIC');
      expect(body.validationErrors[0]).toMatchObject({ field: 'metricName', code: 'INVALID_CHARACTERS' });
      expect(sink.metrics).toEqual([]);
    });

    it('should reject a body without a numeric value', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/performance/metrics',
        payload: { name: 'board.render_ms' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /api/performance/events', () => {
    it('should accept an event', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/performance/events',
        payload: { name: 'board.refreshed' },
      });

      expect(response.statusCode).toBe(202);
      expect(sink.events).toEqual([{ name: 'board.refreshed', tags: {} }]);
    });
  });

  describe('GET /api/performance/summary', () => {
    it('should aggregate what was tracked', async () => {
      for (const value of [10, 20]) {
        await ctx.app.inject({
          method: 'POST',
          url: '/api/performance/metrics',
          payload: { name: 'board.render_ms', value },
        });
      }
      await ctx.app.inject({ method: 'POST', url: '/api/performance/events', payload: { name: 'board.refreshed' } });

      const body = (await ctx.app.inject({ method: 'GET', url: '/api/performance/summary' })).json();

      expect(body.totalMetrics).toBe(2);
      expect(body.totalEvents).toBe(1);
      expect(body.metrics['board.render_ms']).toEqual({ count: 2, sum: 30, min: 10, max: 20, avg: 15 });
      expect(body.events).toEqual({ 'board.refreshed': 1 });
    });
  });

  describe('cache statistics', () => {
    it('should report the gateway mode and per-tier counters', async () => {
      await ctx.gateway.set('flights:all', ['BA117']);
      await ctx.gateway.get('flights:all');
      await ctx.gateway.get('flights:none');

      const response = await ctx.app.inject({ method: 'GET', url: '/api/performance/cache/stats' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.mode).toBe('local-only');
      expect(body.fallbackReason).toBe('distributed cache not configured');
      expect(body.memory).toMatchObject({ hits: 1, misses: 1, totalRequests: 2, hitRate: 50, sets: 1 });
      expect(body.distributed).toMatchObject({ hits: 0, misses: 0 });
    });

    it('should zero the counters on reset', async () => {
      await ctx.gateway.get('flights:none');

      const reset = await ctx.app.inject({ method: 'POST', url: '/api/performance/cache/stats/reset' });
      const body = (await ctx.app.inject({ method: 'GET', url: '/api/performance/cache/stats' })).json();

      expect(reset.statusCode).toBe(204);
      expect(body.memory).toMatchObject({ hits: 0, misses: 0, totalRequests: 0 });
    });
  });
});
