/**
 * Metric Tracker Tests
 * @module tests/unit/metrics/metric-tracker
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LoggingMetricSink, MetricTracker } from '../../../src/metrics/metric-tracker.js';
import { ValidationError } from '../../../src/errors/index.js';
import { createLogger } from '../../../src/logging/index.js';
import { RecordingSink } from '../../helpers/index.js';

describe('MetricTracker', () => {
  let sink: RecordingSink;
  let now: number;
  let tracker: MetricTracker;

  beforeEach(() => {
    sink = new RecordingSink();
    now = Date.parse('2026-03-01T08:00:00Z');
    tracker = new MetricTracker({ sinks: [sink], now: () => now });
  });

  describe('trackMetric', () => {
    it('should aggregate samples per name and forward them to sinks', () => {
      tracker.trackMetric('flights.query_ms', 10, { route: '/flights' });
      tracker.trackMetric('flights.query_ms', 30);
      tracker.trackMetric('flights.query_ms', 20);

      expect(tracker.getSummary().metrics['flights.query_ms']).toEqual({
        count: 3,
        sum: 60,
        min: 10,
        max: 30,
        avg: 20,
      });
      expect(sink.metrics[0]).toEqual({ name: 'flights.query_ms', value: 10, tags: { route: '/flights' } });
      expect(sink.metrics[1].tags).toEqual({});
    });

    it('should round the reported average to two decimals', () => {
      tracker.trackMetric('m', 1);
      tracker.trackMetric('m', 2);
      tracker.trackMetric('m', 2);

      expect(tracker.getSummary().metrics.m.avg).toBe(1.67);
    });

    it('should reject invalid input before recording anything', () => {
      expect(() => tracker.trackMetric('bad name', 1)).toThrow(ValidationError);
      expect(() => tracker.trackMetric('m', Number.NaN)).toThrow(ValidationError);
      expect(() => tracker.trackMetric('m', 1, { '': 'x' })).toThrow(ValidationError);

      expect(sink.metrics).toEqual([]);
      expect(tracker.getSummary().totalMetrics).toBe(0);
    });
  });

  describe('trackEvent', () => {
    it('should count events by name', () => {
      tracker.trackEvent('cache.cleared');
      tracker.trackEvent('cache.cleared', { by: 'admin' });
      tracker.trackEvent('board.viewed');

      const summary = tracker.getSummary();
      expect(summary.events).toEqual({ 'cache.cleared': 2, 'board.viewed': 1 });
      expect(summary.totalEvents).toBe(3);
      expect(sink.events[1]).toEqual({ name: 'cache.cleared', tags: { by: 'admin' } });
    });

    it('should reject invalid event names', () => {
      expect(() => tracker.trackEvent('')).toThrow(ValidationError);
    });
  });

  describe('trackOperation', () => {
    it('should record the duration tagged as successful and return the result', async () => {
      const result = await tracker.trackOperation('flights.refresh', async () => 12, { source: 'api' });

      expect(result).toBe(12);
      expect(sink.metrics).toHaveLength(1);
      expect(sink.metrics[0].name).toBe('flights.refresh.duration');
      expect(sink.metrics[0].tags).toEqual({ source: 'api', success: 'true' });
    });

    it('should record a failed operation and rethrow its error', async () => {
      const failure = new Error('upstream timeout');

      await expect(
        tracker.trackOperation('flights.refresh', async () => {
          throw failure;
        })
      ).rejects.toBe(failure);

      expect(sink.metrics[0].tags).toEqual({ success: 'false' });
    });

    it('should reject tags that leave no room for the outcome tag without running the operation', async () => {
      const tags = Object.fromEntries(Array.from({ length: 20 }, (_, i) => [`t${i}`, 'v']));
      const operation = vi.fn(async () => 1);

      await expect(tracker.trackOperation('op', operation, tags)).rejects.toBeInstanceOf(ValidationError);
      expect(operation).not.toHaveBeenCalled();
    });
  });

  describe('sinks', () => {
    it('should keep tracking when a sink throws', () => {
      const broken = {
        name: 'broken',
        recordMetric: vi.fn(() => {
          throw new Error('sink offline');
        }),
        recordEvent: vi.fn(),
      };
      const healthy = new RecordingSink();
      const withBroken = new MetricTracker({ sinks: [broken, healthy] });

      expect(() => withBroken.trackMetric('m', 1)).not.toThrow();
      expect(healthy.metrics).toHaveLength(1);
      expect(withBroken.getSummary().totalMetrics).toBe(1);
    });

    it('should log tracked metrics through the structured logger', () => {
      const logger = createLogger('metric-sink-test');
      const tracked = vi.spyOn(logger, 'metricTracked');

      new LoggingMetricSink(logger).recordMetric('m', 3, { a: 'b' });

      expect(tracked).toHaveBeenCalledWith('m', 3, { a: 'b' });
      tracked.mockRestore();
    });
  });

  it('should start a new window on reset', () => {
    tracker.trackMetric('m', 1);
    tracker.trackEvent('e');
    now += 60000;

    tracker.reset();
    const summary = tracker.getSummary();

    expect(summary).toEqual({
      since: '2026-03-01T08:01:00.000Z',
      totalMetrics: 0,
      totalEvents: 0,
      metrics: {},
      events: {},
    });
  });
});
