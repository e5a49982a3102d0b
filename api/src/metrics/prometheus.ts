/**
 * Prometheus Metrics
 * @module metrics/prometheus
 *
 * Prometheus exposition for tracked metrics and events, per-tier cache
 * statistics and HTTP request timings. Each registry is owned by one app
 * instance so suites can build many apps side by side.
 */

import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { CacheTierNames, type CacheTierName } from '../cache/cache-tier.js';
import type { StatisticsSnapshot } from '../cache/statistics-tracker.js';
import type { MetricSink, MetricTags } from './metric-tracker.js';

// ============================================================================
// Registry Setup
// ============================================================================

export interface MetricsRegistryOptions {
  /** Prefix for every metric name */
  prefix: string;
  /** Collect Node.js process metrics (memory, CPU, event loop) */
  collectDefaults: boolean;
  defaultLabels?: Record<string, string>;
}

export function createMetricsRegistry(options: MetricsRegistryOptions): Registry {
  const registry = new Registry();

  if (options.defaultLabels) {
    registry.setDefaultLabels(options.defaultLabels);
  }

  if (options.collectDefaults) {
    collectDefaultMetrics({
      register: registry,
      prefix: options.prefix,
      gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
    });
  }

  return registry;
}

// ============================================================================
// Custom Metric Sink
// ============================================================================

/**
 * Forwards tracked metrics and events into the registry. Tags vary per call
 * and are not exposed as labels; the log sink keeps them.
 */
export class PrometheusMetricSink implements MetricSink {
  readonly name = 'prometheus';

  private readonly samples: Histogram<'metric'>;
  private readonly events: Counter<'event'>;

  constructor(registry: Registry, prefix: string) {
    this.samples = new Histogram({
      name: `${prefix}custom_metric`,
      help: 'Values recorded through the metric tracking surface',
      labelNames: ['metric'],
      buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000],
      registers: [registry],
    });

    this.events = new Counter({
      name: `${prefix}custom_events_total`,
      help: 'Events recorded through the metric tracking surface',
      labelNames: ['event'],
      registers: [registry],
    });
  }

  recordMetric(name: string, value: number, _tags: MetricTags): void {
    this.samples.observe({ metric: name }, value);
  }

  recordEvent(name: string, _tags: MetricTags): void {
    this.events.inc({ event: name });
  }
}

// ============================================================================
// Cache Statistics Gauges
// ============================================================================

const TIERS: readonly CacheTierName[] = [CacheTierNames.MEMORY, CacheTierNames.DISTRIBUTED];

/**
 * Gauges read from the statistics snapshot at scrape time
 */
export function registerCacheMetrics(
  registry: Registry,
  prefix: string,
  snapshot: () => StatisticsSnapshot
): void {
  const tierGauge = (
    name: string,
    help: string,
    read: (s: StatisticsSnapshot, tier: CacheTierName) => number
  ): void => {
    new Gauge({
      name: `${prefix}${name}`,
      help,
      labelNames: ['tier'],
      registers: [registry],
      collect() {
        const current = snapshot();
        for (const tier of TIERS) {
          this.set({ tier }, read(current, tier));
        }
      },
    });
  };

  tierGauge('cache_hits', 'Cache hits since the last statistics reset', (s, tier) => s[tier].hits);
  tierGauge('cache_misses', 'Cache misses since the last statistics reset', (s, tier) => s[tier].misses);
  tierGauge('cache_hit_rate_percent', 'Cache hit rate per tier', (s, tier) => s[tier].hitRate);
  tierGauge('cache_keys', 'Live keys written through the gateway', (s, tier) => s[tier].currentKeyCount);
  tierGauge('cache_bytes_stored', 'Serialized bytes held per tier', (s, tier) => s[tier].totalBytesStored);
  tierGauge('cache_average_latency_ms', 'Average tier operation latency', (s, tier) => s[tier].averageLatencyMs);
}

// ============================================================================
// Fastify Plugin
// ============================================================================

export interface MetricsPluginOptions {
  registry: Registry;
  prefix: string;
  path?: string;
  excludePaths?: string[];
}

/**
 * Serves the registry and records request counts and durations
 */
const metricsPluginImpl: FastifyPluginAsync<MetricsPluginOptions> = async (
  fastify: FastifyInstance,
  opts: MetricsPluginOptions
): Promise<void> => {
  const metricsPath = opts.path ?? '/metrics';
  const excludePaths = opts.excludePaths ?? ['/health', metricsPath];
  const { registry } = opts;

  const requests = new Counter({
    name: `${opts.prefix}http_requests_total`,
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status_code'],
    registers: [registry],
  });

  const duration = new Histogram({
    name: `${opts.prefix}http_request_duration_seconds`,
    help: 'HTTP request duration in seconds',
    labelNames: ['method', 'route', 'status_code'],
    buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [registry],
  });

  fastify.get(metricsPath, async (_request, reply) => {
    const body = await registry.metrics();
    return reply.header('Content-Type', registry.contentType).send(body);
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions.url ?? 'unmatched';
    if (excludePaths.some((p) => route === p || route.startsWith(`${p}/`))) {
      return;
    }

    const labels = { method: request.method, route, status_code: String(reply.statusCode) };
    requests.inc(labels);
    duration.observe(labels, reply.elapsedTime / 1000);
  });
};

export const metricsPlugin = fp(metricsPluginImpl, {
  name: 'flightboard-metrics',
  fastify: '4.x',
});
