/**
 * Health Module
 * @module health
 */

export * from './interfaces.js';
export * from './probes/index.js';
export {
  HealthAggregator,
  ProbeNames,
  foldStatuses,
  summarize,
  DEFAULT_AGGREGATOR_CONFIG,
  DEFAULT_SUMMARY_THRESHOLDS,
  type HealthAggregatorConfig,
  type HealthAggregatorDependencies,
  type SummaryThresholds,
} from './health-aggregator.js';
