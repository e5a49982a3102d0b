/**
 * Cache Performance Probe
 * @module health/probes/cache-performance-probe
 */

import type { StatisticsTracker } from '../../cache/statistics-tracker.js';
import type { HealthProbe, HealthStatus, ProbeResult } from '../interfaces.js';

export interface CachePerformanceProbeConfig {
  degradedHitRatePercent: number;
  unhealthyHitRatePercent: number;
}

export const DEFAULT_CACHE_PERFORMANCE_CONFIG: CachePerformanceProbeConfig = {
  degradedHitRatePercent: 50,
  unhealthyHitRatePercent: 25,
};

/**
 * Classifies the combined hit rate. A cache with no requests yet is Healthy.
 */
export class CachePerformanceProbe implements HealthProbe {
  readonly name = 'cache';

  private readonly tracker: StatisticsTracker;
  private readonly config: CachePerformanceProbeConfig;

  constructor(tracker: StatisticsTracker, config: Partial<CachePerformanceProbeConfig> = {}) {
    this.tracker = tracker;
    this.config = { ...DEFAULT_CACHE_PERFORMANCE_CONFIG, ...config };
  }

  async probe(): Promise<ProbeResult> {
    const start = Date.now();
    const { memory, distributed, combined, extra } = this.tracker.getSnapshot();

    let status: HealthStatus = 'Healthy';
    let error: string | undefined;

    if (combined.totalRequests > 0) {
      if (combined.hitRate < this.config.unhealthyHitRatePercent) {
        status = 'Unhealthy';
        error = `Cache hit rate ${combined.hitRate}% below ${this.config.unhealthyHitRatePercent}%`;
      } else if (combined.hitRate < this.config.degradedHitRatePercent) {
        status = 'Degraded';
        error = `Cache hit rate ${combined.hitRate}% below ${this.config.degradedHitRatePercent}%`;
      }
    }

    return {
      name: this.name,
      status,
      responseTimeMs: Date.now() - start,
      metadata: {
        combinedHitRate: combined.hitRate,
        memoryHitRate: memory.hitRate,
        distributedHitRate: distributed.hitRate,
        totalRequests: combined.totalRequests,
        memoryAverageLatencyMs: memory.averageLatencyMs,
        distributedAverageLatencyMs: distributed.averageLatencyMs,
        totalKeys: combined.currentKeyCount,
        layerPreference: extra.layerPreference,
      },
      ...(error ? { error } : {}),
    };
  }
}
