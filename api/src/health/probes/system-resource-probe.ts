/**
 * System Resource Probe
 * @module health/probes/system-resource-probe
 *
 * Samples process CPU over a short window, resident memory, disk usage of
 * one volume and event-loop delay. The event loop is the only thread that
 * serves requests, so its delay stands in for worker availability.
 */

import { statfs } from 'node:fs/promises';
import { availableParallelism } from 'node:os';
import { monitorEventLoopDelay } from 'node:perf_hooks';
import { setTimeout as sleep } from 'node:timers/promises';
import { getErrorMessage } from '../../errors/index.js';
import type { HealthProbe, HealthStatus, ProbeResult } from '../interfaces.js';

// ============================================================================
// Types
// ============================================================================

export interface SystemResourceThresholds {
  cpuDegradedPercent: number;
  cpuCriticalPercent: number;
  memoryDegradedBytes: number;
  memoryCriticalBytes: number;
  diskDegradedPercent: number;
  diskCriticalPercent: number;
}

export interface SystemResourceProbeConfig {
  cpuSampleMs: number;
  diskPath: string;
  thresholds: SystemResourceThresholds;
}

export interface DiskUsage {
  usedPercent: number;
  totalBytes: number;
  freeBytes: number;
}

/**
 * Measurement sources; replaced in tests
 */
export interface SystemSamplers {
  cpuPercent(windowMs: number, signal?: AbortSignal): Promise<number>;
  residentMemoryBytes(): number;
  heapUsedBytes(): number;
  diskUsage(path: string): Promise<DiskUsage>;
  eventLoopDelayMs(): number;
}

export const DEFAULT_SYSTEM_THRESHOLDS: SystemResourceThresholds = {
  cpuDegradedPercent: 75,
  cpuCriticalPercent: 90,
  memoryDegradedBytes: 1_500_000_000,
  memoryCriticalBytes: 2_000_000_000,
  diskDegradedPercent: 85,
  diskCriticalPercent: 95,
};

export const DEFAULT_SYSTEM_PROBE_CONFIG: SystemResourceProbeConfig = {
  cpuSampleMs: 500,
  diskPath: '/',
  thresholds: DEFAULT_SYSTEM_THRESHOLDS,
};

const BYTES_PER_MB = 1024 * 1024;

function round(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

// ============================================================================
// Node Samplers
// ============================================================================

let loopDelay: ReturnType<typeof monitorEventLoopDelay> | null = null;

function eventLoopHistogram(): ReturnType<typeof monitorEventLoopDelay> {
  if (!loopDelay) {
    loopDelay = monitorEventLoopDelay({ resolution: 20 });
    loopDelay.enable();
  }
  return loopDelay;
}

export const nodeSamplers: SystemSamplers = {
  async cpuPercent(windowMs, signal) {
    const startUsage = process.cpuUsage();
    const startTime = process.hrtime.bigint();

    await sleep(windowMs, undefined, { signal });

    const used = process.cpuUsage(startUsage);
    const elapsedMicros = Number(process.hrtime.bigint() - startTime) / 1000;
    if (elapsedMicros <= 0) {
      return 0;
    }
    return round(((used.user + used.system) / (elapsedMicros * availableParallelism())) * 100);
  },

  residentMemoryBytes() {
    return process.memoryUsage.rss();
  },

  heapUsedBytes() {
    return process.memoryUsage().heapUsed;
  },

  async diskUsage(path) {
    const stats = await statfs(path);
    const totalBytes = stats.blocks * stats.bsize;
    const freeBytes = stats.bavail * stats.bsize;
    const usedBytes = (stats.blocks - stats.bfree) * stats.bsize;
    return {
      usedPercent: totalBytes > 0 ? round((usedBytes / totalBytes) * 100) : 0,
      totalBytes,
      freeBytes,
    };
  },

  eventLoopDelayMs() {
    const histogram = eventLoopHistogram();
    const meanMs = Number.isNaN(histogram.mean) ? 0 : histogram.mean / 1e6;
    histogram.reset();
    return round(meanMs);
  },
};

// ============================================================================
// Probe
// ============================================================================

export class SystemResourceProbe implements HealthProbe {
  readonly name = 'system';

  private readonly config: SystemResourceProbeConfig;
  private readonly samplers: SystemSamplers;

  constructor(config: Partial<SystemResourceProbeConfig> = {}, samplers: SystemSamplers = nodeSamplers) {
    this.config = {
      ...DEFAULT_SYSTEM_PROBE_CONFIG,
      ...config,
      thresholds: { ...DEFAULT_SYSTEM_THRESHOLDS, ...config.thresholds },
    };
    this.samplers = samplers;
  }

  async probe(signal?: AbortSignal): Promise<ProbeResult> {
    const start = Date.now();
    const t = this.config.thresholds;

    const [cpuPercent, disk] = await Promise.all([
      this.samplers.cpuPercent(this.config.cpuSampleMs, signal),
      this.sampleDisk(),
    ]);
    const memoryBytes = this.samplers.residentMemoryBytes();
    const heapBytes = this.samplers.heapUsedBytes();
    const eventLoopDelayMs = this.samplers.eventLoopDelayMs();

    const findings: string[] = [];
    let status: HealthStatus = 'Healthy';
    const escalate = (to: HealthStatus, finding: string): void => {
      findings.push(finding);
      if (to === 'Critical' || status === 'Healthy') {
        status = to;
      }
    };

    if (cpuPercent > t.cpuCriticalPercent) {
      escalate('Critical', `High CPU usage: ${cpuPercent.toFixed(1)}%`);
    } else if (cpuPercent > t.cpuDegradedPercent) {
      escalate('Degraded', `Elevated CPU usage: ${cpuPercent.toFixed(1)}%`);
    }

    const memoryMb = Math.round(memoryBytes / BYTES_PER_MB);
    if (memoryBytes > t.memoryCriticalBytes) {
      escalate('Critical', `High memory usage: ${memoryMb}MB`);
    } else if (memoryBytes > t.memoryDegradedBytes) {
      escalate('Degraded', `Elevated memory usage: ${memoryMb}MB`);
    }

    if (disk.usedPercent > t.diskCriticalPercent) {
      escalate('Critical', `Critical disk usage: ${disk.usedPercent.toFixed(1)}%`);
    } else if (disk.usedPercent > t.diskDegradedPercent) {
      escalate('Degraded', `High disk usage: ${disk.usedPercent.toFixed(1)}%`);
    }

    return {
      name: this.name,
      status,
      responseTimeMs: Date.now() - start,
      metadata: {
        cpuUsagePercent: cpuPercent,
        workingSetMB: round(memoryBytes / BYTES_PER_MB),
        workingSetBytes: memoryBytes,
        heapUsedMB: round(heapBytes / BYTES_PER_MB),
        heapUsedBytes: heapBytes,
        diskUsagePercent: disk.usedPercent,
        ...(disk.error ? { diskError: disk.error } : {}),
        processorCount: availableParallelism(),
        eventLoopDelayMs,
      },
      ...(findings.length > 0 ? { error: findings.join(', ') } : {}),
    };
  }

  /**
   * An unreadable volume reports 0% rather than failing the probe
   */
  private async sampleDisk(): Promise<{ usedPercent: number; error?: string }> {
    try {
      const usage = await this.samplers.diskUsage(this.config.diskPath);
      return { usedPercent: usage.usedPercent };
    } catch (error) {
      return { usedPercent: 0, error: getErrorMessage(error) };
    }
  }
}
