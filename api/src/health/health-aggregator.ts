/**
 * Health Aggregator
 * @module health/health-aggregator
 *
 * Dispatches every registered probe in parallel, bounds each by its own
 * timeout, folds the verdicts by severity and derives a summary of issues,
 * warnings and recommendations.
 *
 * Reports are memoized for a short window so orchestrator polling does not
 * re-run the live dependency checks and the CPU sample on every request.
 * Callers arriving while an aggregation is running share its result.
 */

import { ProbeTimeoutError, getErrorMessage, toError } from '../errors/index.js';
import { createLogger, type StructuredLogger } from '../logging/index.js';
import {
  HealthSeverity,
  type CompositeHealthReport,
  type HealthCheckOptions,
  type HealthProbe,
  type HealthStatus,
  type HealthSummary,
  type ProbeResult,
} from './interfaces.js';

// ============================================================================
// Configuration
// ============================================================================

export interface SummaryThresholds {
  slowQueryMs: number;
  hitRateWarningPercent: number;
  hitRateRecommendPercent: number;
  cpuWarningPercent: number;
  memoryWarningMb: number;
  diskWarningPercent: number;
}

export interface HealthAggregatorConfig {
  /** Per-probe time budget */
  probeTimeoutMs: number;
  /** Memoization window; 0 disables */
  reportTtlMs: number;
  summary: SummaryThresholds;
}

export const DEFAULT_SUMMARY_THRESHOLDS: SummaryThresholds = {
  slowQueryMs: 1000,
  hitRateWarningPercent: 50,
  hitRateRecommendPercent: 70,
  cpuWarningPercent: 75,
  memoryWarningMb: 1500,
  diskWarningPercent: 85,
};

export const DEFAULT_AGGREGATOR_CONFIG: HealthAggregatorConfig = {
  probeTimeoutMs: 5000,
  reportTtlMs: 30000,
  summary: DEFAULT_SUMMARY_THRESHOLDS,
};

export interface HealthAggregatorDependencies {
  logger?: StructuredLogger;
  now?: () => number;
}

/**
 * Probe names the summary rules recognise
 */
export const ProbeNames = {
  DATABASE: 'database',
  REDIS: 'redis',
  CACHE: 'cache',
  SYSTEM: 'system',
} as const;

// ============================================================================
// Status Folding
// ============================================================================

/**
 * Most severe status present; Healthy for an empty set
 */
export function foldStatuses(statuses: Iterable<HealthStatus>): HealthStatus {
  let worst: HealthStatus = 'Healthy';
  for (const status of statuses) {
    const rank = HealthSeverity[status];
    const current = HealthSeverity[worst];
    if (rank > current || (rank === current && status === 'Critical')) {
      worst = status;
    }
  }
  return worst;
}

// ============================================================================
// Summary Rules
// ============================================================================

function numberAt(metadata: Readonly<Record<string, unknown>>, key: string): number | undefined {
  const value = metadata[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Build the summary for a set of probe results
 */
export function summarize(
  probes: readonly ProbeResult[],
  thresholds: SummaryThresholds = DEFAULT_SUMMARY_THRESHOLDS
): HealthSummary {
  const issues: string[] = [];
  const warnings: string[] = [];
  const recommendations: string[] = [];

  for (const probe of probes) {
    const metricWarnings: string[] = [];
    const { metadata } = probe;

    switch (probe.name) {
      case ProbeNames.DATABASE: {
        const queryTimeMs = numberAt(metadata, 'queryTimeMs');
        if (metadata.connected === true && queryTimeMs !== undefined && queryTimeMs > thresholds.slowQueryMs) {
          metricWarnings.push(`Slow database queries: ${queryTimeMs}ms`);
          recommendations.push('Review database indexes and connection pool sizing');
        }
        break;
      }
      case ProbeNames.REDIS:
        if (metadata.connected === false) {
          metricWarnings.push('Redis not connected - using memory cache only');
          recommendations.push('Restore the distributed cache so entries are shared across instances');
        }
        break;
      case ProbeNames.CACHE: {
        const hitRate = numberAt(metadata, 'combinedHitRate');
        const requests = numberAt(metadata, 'totalRequests') ?? 0;
        if (hitRate !== undefined && requests > 0) {
          if (hitRate < thresholds.hitRateWarningPercent) {
            metricWarnings.push(`Low cache hit rate: ${hitRate.toFixed(1)}%`);
          }
          if (hitRate < thresholds.hitRateRecommendPercent) {
            recommendations.push('Consider cache TTL optimization');
          }
        }
        break;
      }
      case ProbeNames.SYSTEM: {
        const cpu = numberAt(metadata, 'cpuUsagePercent');
        const memoryMb = numberAt(metadata, 'workingSetMB');
        const disk = numberAt(metadata, 'diskUsagePercent');
        if (cpu !== undefined && cpu > thresholds.cpuWarningPercent) {
          metricWarnings.push(`High CPU usage: ${cpu.toFixed(1)}%`);
          recommendations.push('Profile CPU-heavy request paths or scale out');
        }
        if (memoryMb !== undefined && memoryMb > thresholds.memoryWarningMb) {
          metricWarnings.push(`High memory usage: ${memoryMb.toFixed(1)}MB`);
          recommendations.push('Review local cache capacity and heap usage');
        }
        if (disk !== undefined && disk > thresholds.diskWarningPercent) {
          metricWarnings.push(`High disk usage: ${disk.toFixed(1)}%`);
          recommendations.push('Free disk space on the host volume');
        }
        break;
      }
      default:
        break;
    }

    if (probe.status === 'Unhealthy' || probe.status === 'Error' || probe.status === 'Critical') {
      issues.push(`${probe.name}: ${probe.error ?? probe.status}`);
    } else if (probe.status === 'Degraded' && metricWarnings.length === 0) {
      warnings.push(`${probe.name}: ${probe.error ?? probe.status}`);
    }
    warnings.push(...metricWarnings);
  }

  return { issues, warnings, recommendations };
}

// ============================================================================
// Aggregator
// ============================================================================

interface MemoizedReport {
  report: CompositeHealthReport;
  expiresAt: number;
}

export class HealthAggregator {
  private readonly probes: readonly HealthProbe[];
  private readonly config: HealthAggregatorConfig;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;

  private memoized: MemoizedReport | null = null;
  private inflight: Promise<CompositeHealthReport> | null = null;
  /** Bumped by invalidate() so an aggregation started earlier is not memoized */
  private generation = 0;

  constructor(
    probes: readonly HealthProbe[],
    config: Partial<HealthAggregatorConfig> = {},
    deps: HealthAggregatorDependencies = {}
  ) {
    this.probes = probes;
    this.config = {
      ...DEFAULT_AGGREGATOR_CONFIG,
      ...config,
      summary: { ...DEFAULT_SUMMARY_THRESHOLDS, ...config.summary },
    };
    this.logger = deps.logger ?? createLogger('health-aggregator');
    this.now = deps.now ?? Date.now;
  }

  get probeNames(): string[] {
    return this.probes.map((p) => p.name);
  }

  /**
   * Composite report, served from memory while the last one is fresh
   */
  check(options: HealthCheckOptions = {}): Promise<CompositeHealthReport> {
    const memoize = this.config.reportTtlMs > 0;

    if (memoize && !options.bypassCache) {
      if (this.memoized && this.now() < this.memoized.expiresAt) {
        const report = { ...this.memoized.report, cached: true };
        this.logger.healthAggregated(report.overallStatus, report.durationMs, true);
        return Promise.resolve(report);
      }
      if (this.inflight) {
        return this.inflight;
      }
    }

    const generation = this.generation;
    const run = this.aggregate(options.deadlineMs).then((report) => {
      if (memoize && generation === this.generation) {
        this.memoized = { report, expiresAt: this.now() + this.config.reportTtlMs };
      }
      return report;
    });

    if (memoize && !options.bypassCache) {
      this.inflight = run;
      void run.finally(() => {
        if (this.inflight === run) {
          this.inflight = null;
        }
      });
    }

    return run;
  }

  /**
   * Run one probe by name with its timeout; undefined for an unknown name
   */
  async checkProbe(name: string): Promise<ProbeResult | undefined> {
    const probe = this.probes.find((p) => p.name === name);
    if (!probe) {
      return undefined;
    }
    return this.runProbe(probe);
  }

  /**
   * Drop the memoized report so the next check runs every probe
   */
  invalidate(): void {
    this.generation++;
    this.memoized = null;
    this.inflight = null;
  }

  // --------------------------------------------------------------------------
  // Dispatch
  // --------------------------------------------------------------------------

  private async aggregate(deadlineMs?: number): Promise<CompositeHealthReport> {
    const start = this.now();
    const timestamp = new Date(start).toISOString();

    let deadlineTimer: NodeJS.Timeout | undefined;
    const deadline = deadlineMs !== undefined && deadlineMs > 0
      ? new Promise<never>((_, reject) => {
          deadlineTimer = setTimeout(() => reject(new ProbeTimeoutError('deadline', deadlineMs)), deadlineMs);
        })
      : undefined;

    try {
      const probes = await Promise.all(this.probes.map((probe) => this.runProbe(probe, deadline)));
      const overallStatus = foldStatuses(probes.map((p) => p.status));
      const durationMs = this.now() - start;

      this.logger.healthAggregated(overallStatus, durationMs, false);

      return {
        overallStatus,
        timestamp,
        durationMs,
        cached: false,
        probes,
        summary: summarize(probes, this.config.summary),
      };
    } catch (error) {
      this.logger.error({ err: error }, 'Health aggregation failed');
      return {
        overallStatus: 'Error',
        timestamp,
        durationMs: this.now() - start,
        cached: false,
        probes: [],
        summary: {
          issues: [`Health check system failure: ${getErrorMessage(error)}`],
          warnings: [],
          recommendations: [],
        },
      };
    } finally {
      clearTimeout(deadlineTimer);
    }
  }

  /**
   * Race one probe against its timeout and the optional overall deadline.
   * Never rejects; a late result is discarded and the probe's signal aborted.
   */
  private async runProbe(probe: HealthProbe, deadline?: Promise<never>): Promise<ProbeResult> {
    const timeoutMs = this.config.probeTimeoutMs;
    const controller = new AbortController();
    const start = this.now();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ProbeTimeoutError(probe.name, timeoutMs)), timeoutMs);
    });

    const racers: Promise<ProbeResult>[] = [
      Promise.resolve().then(() => probe.probe(controller.signal)),
      timeout,
    ];
    if (deadline) {
      racers.push(deadline);
    }

    try {
      const result = await Promise.race(racers);
      this.logger.probeCompleted(probe.name, result.status, result.responseTimeMs);
      return result;
    } catch (caught) {
      const error = toError(caught);
      this.logger.probeFailed(probe.name, error);

      if (error instanceof ProbeTimeoutError) {
        const deadlineHit = error.probeName !== probe.name;
        return {
          name: probe.name,
          status: 'Error',
          responseTimeMs: deadlineHit ? this.now() - start : timeoutMs,
          metadata: { timeoutMs: error.timeoutMs },
          error: deadlineHit ? 'deadline exceeded' : 'timed out',
        };
      }

      return {
        name: probe.name,
        status: 'Error',
        responseTimeMs: this.now() - start,
        metadata: {},
        error: error.message,
      };
    } finally {
      clearTimeout(timer);
      controller.abort();
    }
  }
}
