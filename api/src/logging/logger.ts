/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Structured logging with Pino for the cache and health subsystem.
 * Adds domain methods for tier fallback, probe outcomes and metric tracking.
 */

import { pino, type Logger, type LoggerOptions } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Domain-specific logging methods
 */
export interface DomainLogMethods {
  cacheFallback(tier: string, operation: string, error: Error, key?: string): void;
  tierModeSelected(mode: string, reason: string): void;
  tierRecovered(tier: string, downtimeMs?: number): void;
  probeCompleted(probe: string, status: string, durationMs: number): void;
  probeFailed(probe: string, error: Error): void;
  healthAggregated(status: string, durationMs: number, cached: boolean): void;
  metricTracked(name: string, value: number, tags?: Record<string, string>): void;
}

export type StructuredLogger = Logger & DomainLogMethods;

// ============================================================================
// Default Configuration
// ============================================================================

function defaultConfig(): LoggerConfig {
  return {
    level: process.env.LOG_LEVEL || 'info',
    pretty: process.env.LOG_PRETTY === 'true' || process.env.NODE_ENV === 'development',
    redact: [
      'password',
      'token',
      'authorization',
      'apiKey',
      'adminApiKey',
      'secret',
      'connectionString',
      'headers.authorization',
      'headers["x-admin-key"]',
    ],
    service: process.env.SERVICE_NAME || 'flightboard-api',
    version: process.env.SERVICE_VERSION || '1.0.0',
    environment: process.env.NODE_ENV || 'development',
  };
}

// ============================================================================
// Redaction Utilities
// ============================================================================

function createRedactionPaths(paths: string[]): string[] {
  const expandedPaths: string[] = [];

  for (const path of paths) {
    expandedPaths.push(path);
    expandedPaths.push(`*.${path}`);
  }

  return expandedPaths;
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Extends a Pino logger with domain-specific methods
 */
function extendWithDomainMethods(logger: Logger): StructuredLogger {
  const methods: DomainLogMethods = {
    cacheFallback(tier, operation, error, key) {
      logger.warn(
        {
          event: 'cache_fallback',
          tier,
          operation,
          key,
          err: error,
          errorCode: errorCode(error),
        },
        `Cache ${tier} tier ${operation} failed, continuing without it: ${error.message}`
      );
    },

    tierModeSelected(mode, reason) {
      logger.info({ event: 'cache_mode_selected', mode, reason }, `Cache gateway running in ${mode} mode`);
    },

    tierRecovered(tier, downtimeMs) {
      logger.info(
        { event: 'cache_tier_recovered', tier, downtimeMs },
        `Cache ${tier} tier reachable again`
      );
    },

    probeCompleted(probe, status, durationMs) {
      logger.debug(
        { event: 'probe_completed', probe, status, durationMs },
        `Probe ${probe} finished ${status} in ${durationMs}ms`
      );
    },

    probeFailed(probe, error) {
      logger.warn(
        { event: 'probe_failed', probe, err: error, errorCode: errorCode(error) },
        `Probe ${probe} failed: ${error.message}`
      );
    },

    healthAggregated(status, durationMs, cached) {
      logger.debug(
        { event: 'health_aggregated', status, durationMs, cached },
        `Health report ${status}${cached ? ' (cached)' : ''}`
      );
    },

    metricTracked(name, value, tags) {
      logger.debug({ event: 'metric_tracked', metric: name, value, tags }, `${name}: ${value}`);
    },
  };

  return Object.assign(logger, methods);
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(name: string, overrides: Partial<LoggerConfig> = {}): StructuredLogger {
  const config = { ...defaultConfig(), ...overrides };

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return extendWithDomainMethods(pino(options));
}
