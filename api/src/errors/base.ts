/**
 * Base Error Classes
 * @module errors/base
 *
 * Foundation error class for the cache and health subsystem.
 * Provides a hierarchical error structure with serialization and cause chaining.
 */

import { ErrorCode, getHttpStatusForCode } from './codes.js';

// ============================================================================
// Error Context Types
// ============================================================================

/**
 * Context information for errors
 */
export interface ErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** Additional details about the error */
  details?: Record<string, unknown>;
  /** Timestamp when error occurred */
  timestamp?: Date;
  /** Request ID for tracing */
  requestId?: string;
  /** Operation being performed */
  operation?: string;
}

/**
 * Serialized error format for API responses
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  statusCode: number;
  timestamp: string;
  requestId?: string;
  details?: Record<string, unknown>;
  stack?: string;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all application errors.
 */
export abstract class BaseError extends Error {
  /** Error code for programmatic handling */
  public readonly code: ErrorCode;
  /** HTTP status code */
  public readonly statusCode: number;
  public readonly timestamp: Date;
  public readonly context: ErrorContext;
  /**
   * Whether this is an operational error.
   * Operational errors are expected (validation, unreachable dependency).
   * Non-operational errors need a code or configuration fix.
   */
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode,
    context: ErrorContext = {},
    isOperational = true
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = getHttpStatusForCode(code);
    this.timestamp = context.timestamp ?? new Date();
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);

    if (context.cause) {
      this.cause = context.cause;
    }
  }

  /**
   * Serialize error to JSON-safe object
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
      requestId: this.context.requestId,
      details: this.context.details,
    };
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  /**
   * Get the root cause of the error chain
   */
  getRootCause(): Error {
    let current: Error = this;
    while (current.cause instanceof Error) {
      current = current.cause;
    }
    return current;
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a BaseError
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Check if an error is operational (expected error)
 */
export function isOperationalError(error: unknown): boolean {
  if (isBaseError(error)) {
    return error.isOperational;
  }
  return false;
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
