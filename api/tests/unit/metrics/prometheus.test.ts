/**
 * Prometheus Exposition Tests
 * @module tests/unit/metrics/prometheus
 */

import { describe, it, expect } from 'vitest';
import {
  PrometheusMetricSink,
  createMetricsRegistry,
  registerCacheMetrics,
} from '../../../src/metrics/prometheus.js';
import { StatisticsTracker } from '../../../src/cache/statistics-tracker.js';

function line(text: string, prefix: string): string | undefined {
  return text.split('\n').find((l) => l.startsWith(prefix));
}

describe('PrometheusMetricSink', () => {
  it('should observe metrics and count events by name', async () => {
    const registry = createMetricsRegistry({ prefix: 'test_', collectDefaults: false });
    const sink = new PrometheusMetricSink(registry, 'test_');

    sink.recordMetric('flights.query_ms', 42, {});
    sink.recordEvent('cache.cleared', {});
    sink.recordEvent('cache.cleared', {});

    const text = await registry.metrics();

    expect(line(text, 'test_custom_metric_count{')).toBe('test_custom_metric_count{metric="flights.query_ms"} 1');
    expect(line(text, 'test_custom_metric_sum{')).toBe('test_custom_metric_sum{metric="flights.query_ms"} 42');
    expect(line(text, 'test_custom_events_total{')).toBe('test_custom_events_total{event="cache.cleared"} 2');
  });
});

describe('registerCacheMetrics', () => {
  it('should read tier statistics at scrape time', async () => {
    const registry = createMetricsRegistry({ prefix: 'test_', collectDefaults: false });
    const tracker = new StatisticsTracker();
    registerCacheMetrics(registry, 'test_', () => tracker.getSnapshot());

    tracker.recordHit('memory', 1);
    tracker.recordMiss('distributed', 1);

    const hits = await registry.getSingleMetric('test_cache_hits')?.get();
    const misses = await registry.getSingleMetric('test_cache_misses')?.get();

    expect(hits?.values).toEqual([
      { labels: { tier: 'memory' }, value: 1 },
      { labels: { tier: 'distributed' }, value: 0 },
    ]);
    expect(misses?.values).toEqual([
      { labels: { tier: 'memory' }, value: 0 },
      { labels: { tier: 'distributed' }, value: 1 },
    ]);
  });

  it('should apply default labels from the registry options', async () => {
    const registry = createMetricsRegistry({
      prefix: 'test_',
      collectDefaults: false,
      defaultLabels: { service: 'flightboard-api' },
    });
    registerCacheMetrics(registry, 'test_', () => new StatisticsTracker().getSnapshot());

    const text = await registry.metrics();

    expect(line(text, 'test_cache_keys{')).toBe('test_cache_keys{tier="memory",service="flightboard-api"} 0');
  });
});
