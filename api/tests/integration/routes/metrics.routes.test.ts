/**
 * Metrics Endpoint Integration Tests
 * @module tests/integration/routes/metrics.routes
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createMetricsRegistry, registerCacheMetrics } from '../../../src/metrics/prometheus.js';
import { StatisticsTracker } from '../../../src/cache/statistics-tracker.js';
import { buildTestApp, type TestApp } from '../../helpers/index.js';

function findLine(text: string, predicate: (line: string) => boolean): string | undefined {
  return text.split('\n').find(predicate);
}

describe('GET /metrics', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    const tracker = new StatisticsTracker();
    const registry = createMetricsRegistry({ prefix: 'flightboard_', collectDefaults: false });
    registerCacheMetrics(registry, 'flightboard_', () => tracker.getSnapshot());
    ctx = await buildTestApp({ tracker, registry });
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it('should expose cache gauges in the Prometheus text format', async () => {
    await ctx.gateway.get('flights:none');

    const response = await ctx.app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toContain('text/plain');
    expect(findLine(response.body, (l) => l.startsWith('flightboard_cache_misses{tier="memory"}'))).toBe(
      'flightboard_cache_misses{tier="memory"} 1'
    );
  });

  it('should count API requests but not health checks or scrapes', async () => {
    await ctx.app.inject({ method: 'GET', url: '/api/performance/summary' });
    await ctx.app.inject({ method: 'GET', url: '/health/live' });
    await ctx.app.inject({ method: 'GET', url: '/metrics' });

    const body = (await ctx.app.inject({ method: 'GET', url: '/metrics' })).body;
    const counted = body
      .split('\n')
      .filter((l) => l.startsWith('flightboard_http_requests_total{'));

    expect(counted).toEqual([
      'flightboard_http_requests_total{method="GET",route="/api/performance/summary",status_code="200"} 1',
    ]);
  });
});
