/**
 * Health Probes
 * @module health/probes
 */

import type { HealthConfig } from '../../config/index.js';
import type { FlightStore } from '../../db/flight-store.js';
import type { StatisticsTracker } from '../../cache/statistics-tracker.js';
import type { HealthProbe } from '../interfaces.js';
import { StoreProbe } from './store-probe.js';
import { DistributedCacheProbe, type DistributedCacheSource } from './distributed-cache-probe.js';
import { CachePerformanceProbe } from './cache-performance-probe.js';
import { SystemResourceProbe, type SystemSamplers } from './system-resource-probe.js';

export * from './store-probe.js';
export * from './distributed-cache-probe.js';
export * from './cache-performance-probe.js';
export * from './system-resource-probe.js';

export interface ProbeSetDependencies {
  store: FlightStore;
  cache: DistributedCacheSource;
  tracker: StatisticsTracker;
  health: HealthConfig;
  slowQueryThresholdMs: number;
  samplers?: SystemSamplers;
}

/**
 * The fixed, ordered probe set registered with the aggregator
 */
export function createProbeSet(deps: ProbeSetDependencies): HealthProbe[] {
  const t = deps.health.thresholds;

  return [
    new StoreProbe(deps.store, { slowQueryThresholdMs: deps.slowQueryThresholdMs }),
    new DistributedCacheProbe(deps.cache),
    new CachePerformanceProbe(deps.tracker, {
      degradedHitRatePercent: t.hitRateDegradedPercent,
      unhealthyHitRatePercent: t.hitRateUnhealthyPercent,
    }),
    new SystemResourceProbe(
      {
        cpuSampleMs: deps.health.cpuSampleMs,
        diskPath: deps.health.diskPath,
        thresholds: {
          cpuDegradedPercent: t.cpuDegradedPercent,
          cpuCriticalPercent: t.cpuCriticalPercent,
          memoryDegradedBytes: t.memoryDegradedBytes,
          memoryCriticalBytes: t.memoryCriticalBytes,
          diskDegradedPercent: t.diskDegradedPercent,
          diskCriticalPercent: t.diskCriticalPercent,
        },
      },
      deps.samplers
    ),
  ];
}
