/**
 * Metric Tracker
 * @module metrics/metric-tracker
 *
 * Fire-and-forget metric and event tracking. Names and tags are validated
 * synchronously; sink failures are logged and never reach the caller.
 */

import { createLogger, type StructuredLogger } from '../logging/index.js';
import {
  validateEventName,
  validateMetricName,
  validateMetricValue,
  validateTags,
} from '../validation/metric-validator.js';

// ============================================================================
// Types
// ============================================================================

export type MetricTags = Record<string, string>;

/**
 * Destination for validated metrics and events
 */
export interface MetricSink {
  readonly name: string;
  recordMetric(name: string, value: number, tags: MetricTags): void;
  recordEvent(name: string, tags: MetricTags): void;
}

export interface MetricAggregate {
  count: number;
  sum: number;
  min: number;
  max: number;
  avg: number;
}

export interface MetricSummary {
  since: string;
  totalMetrics: number;
  totalEvents: number;
  metrics: Record<string, MetricAggregate>;
  events: Record<string, number>;
}

export interface MetricTrackerDependencies {
  sinks?: MetricSink[];
  logger?: StructuredLogger;
  now?: () => number;
}

// ============================================================================
// Logging Sink
// ============================================================================

export class LoggingMetricSink implements MetricSink {
  readonly name = 'log';

  private readonly logger: StructuredLogger;

  constructor(logger: StructuredLogger = createLogger('metrics')) {
    this.logger = logger;
  }

  recordMetric(name: string, value: number, tags: MetricTags): void {
    this.logger.metricTracked(name, value, tags);
  }

  recordEvent(name: string, tags: MetricTags): void {
    this.logger.debug({ event: 'custom_event', name, tags }, `Event ${name}`);
  }
}

// ============================================================================
// Tracker
// ============================================================================

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

export class MetricTracker {
  private readonly sinks: MetricSink[];
  private readonly logger: StructuredLogger;
  private readonly now: () => number;

  private metrics = new Map<string, MetricAggregate>();
  private events = new Map<string, number>();
  private since: number;

  constructor(deps: MetricTrackerDependencies = {}) {
    this.logger = deps.logger ?? createLogger('metric-tracker');
    this.sinks = deps.sinks ?? [new LoggingMetricSink(this.logger)];
    this.now = deps.now ?? Date.now;
    this.since = this.now();
  }

  /**
   * Record a named numeric sample
   * @throws ValidationError for a bad name, value or tags
   */
  trackMetric(name: string, value: number, tags?: MetricTags): void {
    validateMetricName(name);
    validateMetricValue(value);
    validateTags(tags);

    const current = this.metrics.get(name);
    if (current) {
      current.count++;
      current.sum += value;
      current.min = Math.min(current.min, value);
      current.max = Math.max(current.max, value);
      current.avg = current.sum / current.count;
    } else {
      this.metrics.set(name, { count: 1, sum: value, min: value, max: value, avg: value });
    }

    this.dispatch('recordMetric', (sink) => sink.recordMetric(name, value, tags ?? {}));
  }

  /**
   * Record a named occurrence
   * @throws ValidationError for a bad name or tags
   */
  trackEvent(name: string, tags?: MetricTags): void {
    validateEventName(name);
    validateTags(tags);

    this.events.set(name, (this.events.get(name) ?? 0) + 1);
    this.dispatch('recordEvent', (sink) => sink.recordEvent(name, tags ?? {}));
  }

  /**
   * Time an async operation as `<name>.duration`, tagged with its outcome.
   * The operation's own error is rethrown.
   */
  async trackOperation<T>(name: string, operation: () => Promise<T>, tags?: MetricTags): Promise<T> {
    const metricName = `${name}.duration`;
    validateMetricName(metricName);
    validateTags({ ...tags, success: 'true' });

    const start = performance.now();
    let success = false;
    try {
      const result = await operation();
      success = true;
      return result;
    } finally {
      this.trackMetric(metricName, round(performance.now() - start), {
        ...tags,
        success: String(success),
      });
    }
  }

  getSummary(): MetricSummary {
    const metrics: Record<string, MetricAggregate> = {};
    let totalMetrics = 0;
    for (const [name, aggregate] of this.metrics) {
      metrics[name] = { ...aggregate, avg: round(aggregate.avg) };
      totalMetrics += aggregate.count;
    }

    const events: Record<string, number> = {};
    let totalEvents = 0;
    for (const [name, count] of this.events) {
      events[name] = count;
      totalEvents += count;
    }

    return {
      since: new Date(this.since).toISOString(),
      totalMetrics,
      totalEvents,
      metrics,
      events,
    };
  }

  reset(): void {
    this.metrics = new Map();
    this.events = new Map();
    this.since = this.now();
  }

  private dispatch(operation: string, send: (sink: MetricSink) => void): void {
    for (const sink of this.sinks) {
      try {
        send(sink);
      } catch (err) {
        this.logger.warn({ err, sink: sink.name, operation }, 'Metric sink failed');
      }
    }
  }
}
