/**
 * Health Check Types
 * @module health/interfaces
 */

// ============================================================================
// Status
// ============================================================================

export const HealthStatuses = ['Healthy', 'Degraded', 'Unhealthy', 'Critical', 'Error'] as const;

export type HealthStatus = typeof HealthStatuses[number];

/**
 * Severity rank used to fold probe verdicts. Critical and Error share the
 * top rank; a tie resolves to Critical.
 */
export const HealthSeverity: Readonly<Record<HealthStatus, number>> = {
  Healthy: 0,
  Degraded: 1,
  Unhealthy: 2,
  Error: 3,
  Critical: 3,
};

// ============================================================================
// Probe Contract
// ============================================================================

/**
 * Result of one probe invocation. Built fresh on every call.
 */
export interface ProbeResult {
  readonly name: string;
  readonly status: HealthStatus;
  readonly responseTimeMs: number;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly error?: string;
}

/**
 * An independent, timeout-bounded check of one dependency or metric.
 * `signal` aborts when the aggregator stops waiting on the probe.
 */
export interface HealthProbe {
  readonly name: string;
  probe(signal?: AbortSignal): Promise<ProbeResult>;
}

// ============================================================================
// Composite Report
// ============================================================================

export interface HealthSummary {
  readonly issues: readonly string[];
  readonly warnings: readonly string[];
  readonly recommendations: readonly string[];
}

export interface CompositeHealthReport {
  readonly overallStatus: HealthStatus;
  /** ISO timestamp of when the probes ran */
  readonly timestamp: string;
  readonly durationMs: number;
  /** True when served from the memoized report */
  readonly cached: boolean;
  readonly probes: readonly ProbeResult[];
  readonly summary: HealthSummary;
}

export interface HealthCheckOptions {
  /** Overall wall-clock budget; probes unfinished at the deadline are marked Error */
  deadlineMs?: number;
  /** Skip the memoized report and run every probe */
  bypassCache?: boolean;
}

/**
 * HTTP status for a health verdict: success for Healthy/Degraded,
 * 503 for Unhealthy/Critical, 500 for Error
 */
export function httpStatusForHealth(status: HealthStatus): number {
  switch (status) {
    case 'Healthy':
    case 'Degraded':
      return 200;
    case 'Unhealthy':
    case 'Critical':
      return 503;
    case 'Error':
      return 500;
  }
}
