/**
 * Persistent Store Probe
 * @module health/probes/store-probe
 */

import { getErrorMessage } from '../../errors/index.js';
import type { FlightStore } from '../../db/flight-store.js';
import type { HealthProbe, ProbeResult } from '../interfaces.js';

export interface StoreProbeConfig {
  /** Count query slower than this is Degraded */
  slowQueryThresholdMs: number;
}

export const DEFAULT_STORE_PROBE_CONFIG: StoreProbeConfig = {
  slowQueryThresholdMs: 1000,
};

/**
 * Connectivity plus one count query. Unhealthy when the store cannot be
 * reached, Degraded when the query is slow.
 */
export class StoreProbe implements HealthProbe {
  readonly name = 'database';

  private readonly store: FlightStore;
  private readonly config: StoreProbeConfig;

  constructor(store: FlightStore, config: Partial<StoreProbeConfig> = {}) {
    this.store = store;
    this.config = { ...DEFAULT_STORE_PROBE_CONFIG, ...config };
  }

  async probe(): Promise<ProbeResult> {
    const start = Date.now();

    try {
      await this.store.ping();
    } catch (error) {
      return {
        name: this.name,
        status: 'Unhealthy',
        responseTimeMs: Date.now() - start,
        metadata: { connected: false },
        error: getErrorMessage(error),
      };
    }

    const queryStart = Date.now();
    try {
      const flightCount = await this.store.countFlights();
      const queryTimeMs = Date.now() - queryStart;
      const slow = queryTimeMs > this.config.slowQueryThresholdMs;

      return {
        name: this.name,
        status: slow ? 'Degraded' : 'Healthy',
        responseTimeMs: Date.now() - start,
        metadata: {
          connected: true,
          flightCount,
          queryTimeMs,
          slowQueryThresholdMs: this.config.slowQueryThresholdMs,
        },
      };
    } catch (error) {
      return {
        name: this.name,
        status: 'Unhealthy',
        responseTimeMs: Date.now() - start,
        metadata: { connected: true, queryTimeMs: Date.now() - queryStart },
        error: `Count query failed: ${getErrorMessage(error)}`,
      };
    }
  }
}
