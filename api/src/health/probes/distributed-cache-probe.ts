/**
 * Distributed Cache Probe
 * @module health/probes/distributed-cache-probe
 *
 * The gateway tolerates a missing distributed tier, so an unavailable tier
 * is Degraded rather than Unhealthy.
 */

import type { CacheGateway } from '../../cache/cache-gateway.js';
import type { HealthProbe, ProbeResult } from '../interfaces.js';

export type DistributedCacheSource = Pick<CacheGateway, 'mode' | 'fallbackReason' | 'pingDistributed'>;

export class DistributedCacheProbe implements HealthProbe {
  readonly name = 'redis';

  private readonly source: DistributedCacheSource;

  constructor(source: DistributedCacheSource) {
    this.source = source;
  }

  async probe(): Promise<ProbeResult> {
    const start = Date.now();
    const mode = this.source.mode;

    if (mode === 'local-only') {
      return {
        name: this.name,
        status: 'Degraded',
        responseTimeMs: Date.now() - start,
        metadata: { connected: false, mode, reason: this.source.fallbackReason },
        error: 'Distributed cache unavailable - using memory cache fallback',
      };
    }

    const connected = await this.source.pingDistributed();
    return {
      name: this.name,
      status: connected ? 'Healthy' : 'Degraded',
      responseTimeMs: Date.now() - start,
      metadata: { connected, mode },
      ...(connected ? {} : { error: 'Distributed cache not responding to ping' }),
    };
  }
}
