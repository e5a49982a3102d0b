/**
 * Infrastructure Error Classes
 * @module errors/infrastructure
 *
 * Errors raised at the boundaries of the cache and health subsystem:
 * caller input, unreachable dependencies, probe timeouts and startup configuration.
 */

import { BaseError, ErrorContext } from './base.js';
import {
  ConfigErrorCodes,
  HealthErrorCodes,
  HttpErrorCodes,
  type ErrorCode,
} from './codes.js';

// ============================================================================
// Validation Errors
// ============================================================================

export interface ValidationFieldError {
  field: string;
  message: string;
  code?: string;
  value?: unknown;
}

/**
 * Validation error. Raised synchronously to the caller and never retried.
 */
export class ValidationError extends BaseError {
  public readonly validationErrors: ValidationFieldError[];

  constructor(
    message: string,
    errors: ValidationFieldError[] = [],
    context: ErrorContext = {},
    code: ErrorCode = HttpErrorCodes.VALIDATION_ERROR
  ) {
    super(message, code, context, true);
    this.name = 'ValidationError';
    this.validationErrors = errors;
  }

  toJSON() {
    return {
      ...super.toJSON(),
      validationErrors: this.validationErrors,
    };
  }
}

// ============================================================================
// Dependency Errors
// ============================================================================

/**
 * Distributed tier or persistent store unreachable during an operation.
 * Contained at the tier boundary and logged as a fallback event.
 */
export class TransientDependencyError extends BaseError {
  public readonly dependency: string;
  public readonly operation: string;

  constructor(dependency: string, operation: string, cause?: Error, context: ErrorContext = {}) {
    super(
      `${dependency} ${operation} failed${cause ? `: ${cause.message}` : ''}`,
      HttpErrorCodes.SERVICE_UNAVAILABLE,
      { ...context, cause, operation },
      true
    );
    this.name = 'TransientDependencyError';
    this.dependency = dependency;
    this.operation = operation;
  }
}

/**
 * A health probe exceeded its time budget
 */
export class ProbeTimeoutError extends BaseError {
  public readonly probeName: string;
  public readonly timeoutMs: number;

  constructor(probeName: string, timeoutMs: number) {
    super(
      `Probe '${probeName}' timed out after ${timeoutMs}ms`,
      HealthErrorCodes.PROBE_TIMEOUT,
      { details: { probeName, timeoutMs } },
      true
    );
    this.name = 'ProbeTimeoutError';
    this.probeName = probeName;
    this.timeoutMs = timeoutMs;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Configuration error
 */
export class ConfigurationError extends BaseError {
  public readonly configKey: string;
  public readonly expectedType?: string;

  constructor(
    configKey: string,
    message?: string,
    expectedType?: string,
    context: ErrorContext = {}
  ) {
    super(
      message ?? `Invalid or missing configuration: ${configKey}`,
      ConfigErrorCodes.CONFIGURATION_ERROR,
      context,
      false // Not operational - requires a config fix
    );
    this.name = 'ConfigurationError';
    this.configKey = configKey;
    this.expectedType = expectedType;
  }

  static missing(configKey: string): ConfigurationError {
    return new ConfigurationError(configKey, `Missing required configuration: ${configKey}`);
  }

  static invalid(configKey: string, expectedType: string, actualValue: unknown): ConfigurationError {
    return new ConfigurationError(
      configKey,
      `Invalid configuration '${configKey}': expected ${expectedType}, got ${typeof actualValue}`,
      expectedType
    );
  }
}

/**
 * Unauthorized error
 */
export class UnauthorizedError extends BaseError {
  constructor(message = 'Authentication required', context: ErrorContext = {}) {
    super(message, HttpErrorCodes.UNAUTHORIZED, context, true);
    this.name = 'UnauthorizedError';
  }
}
