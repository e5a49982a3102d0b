/**
 * Metrics Module
 * @module metrics
 */

export {
  MetricTracker,
  LoggingMetricSink,
  type MetricSink,
  type MetricTags,
  type MetricAggregate,
  type MetricSummary,
  type MetricTrackerDependencies,
} from './metric-tracker.js';

export {
  createMetricsRegistry,
  PrometheusMetricSink,
  registerCacheMetrics,
  metricsPlugin,
  type MetricsRegistryOptions,
  type MetricsPluginOptions,
} from './prometheus.js';
