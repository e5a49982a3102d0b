/**
 * Error Handling Module
 * @module errors
 *
 * @example
 * ```typescript
 * import { ValidationError, TransientDependencyError } from './errors/index.js';
 *
 * throw new ValidationError('Invalid cache pattern', [
 *   { field: 'pattern', message: 'Bare wildcard patterns are not allowed' },
 * ]);
 * ```
 */

export {
  HttpErrorCodes,
  CacheErrorCodes,
  HealthErrorCodes,
  ConfigErrorCodes,
  ErrorCodes,
  type ErrorCode,
  type HttpErrorCode,
  type CacheErrorCode,
  type HealthErrorCode,
  type ConfigErrorCode,
  errorCodeToHttpStatus,
  getHttpStatusForCode,
  isClientError,
} from './codes.js';

export {
  BaseError,
  type ErrorContext,
  type SerializedError,
  isBaseError,
  isOperationalError,
  getErrorMessage,
  toError,
} from './base.js';

export {
  ValidationError,
  type ValidationFieldError,
  TransientDependencyError,
  ProbeTimeoutError,
  ConfigurationError,
  UnauthorizedError,
} from './infrastructure.js';
