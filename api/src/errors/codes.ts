/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the cache and health subsystem.
 * Provides typed error codes for consistent error handling across the service.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * HTTP/API Error Codes (4xx, 5xx mapped)
 */
export const HttpErrorCodes = {
  // 400 Bad Request
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // 401 Unauthorized
  UNAUTHORIZED: 'UNAUTHORIZED',

  // 404 Not Found
  NOT_FOUND: 'NOT_FOUND',
  ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',

  // 500 Internal Server Error
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // 503 Service Unavailable
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',

  // 504 Gateway Timeout
  TIMEOUT: 'TIMEOUT',
} as const;

export type HttpErrorCode = typeof HttpErrorCodes[keyof typeof HttpErrorCodes];

/**
 * Cache Error Codes
 */
export const CacheErrorCodes = {
  INVALID_CACHE_KEY: 'INVALID_CACHE_KEY',
  INVALID_CACHE_PATTERN: 'INVALID_CACHE_PATTERN',
  CACHE_TIER_UNAVAILABLE: 'CACHE_TIER_UNAVAILABLE',
  CACHE_CONFIGURATION_ERROR: 'CACHE_CONFIGURATION_ERROR',
} as const;

export type CacheErrorCode = typeof CacheErrorCodes[keyof typeof CacheErrorCodes];

/**
 * Health / Metric Error Codes
 */
export const HealthErrorCodes = {
  PROBE_TIMEOUT: 'PROBE_TIMEOUT',
  PROBE_FAILED: 'PROBE_FAILED',
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  INVALID_METRIC: 'INVALID_METRIC',
} as const;

export type HealthErrorCode = typeof HealthErrorCodes[keyof typeof HealthErrorCodes];

/**
 * Configuration Error Codes
 */
export const ConfigErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  MISSING_CONFIGURATION: 'MISSING_CONFIGURATION',
} as const;

export type ConfigErrorCode = typeof ConfigErrorCodes[keyof typeof ConfigErrorCodes];

// ============================================================================
// Combined Error Codes
// ============================================================================

export const ErrorCodes = {
  ...HttpErrorCodes,
  ...CacheErrorCodes,
  ...HealthErrorCodes,
  ...ConfigErrorCodes,
} as const;

export type ErrorCode = HttpErrorCode | CacheErrorCode | HealthErrorCode | ConfigErrorCode;

// ============================================================================
// HTTP Status Mapping
// ============================================================================

export const errorCodeToHttpStatus: Record<string, number> = {
  // 400
  [HttpErrorCodes.BAD_REQUEST]: 400,
  [HttpErrorCodes.VALIDATION_ERROR]: 400,
  [CacheErrorCodes.INVALID_CACHE_KEY]: 400,
  [CacheErrorCodes.INVALID_CACHE_PATTERN]: 400,
  [HealthErrorCodes.INVALID_METRIC]: 400,

  // 401
  [HttpErrorCodes.UNAUTHORIZED]: 401,

  // 404
  [HttpErrorCodes.NOT_FOUND]: 404,
  [HttpErrorCodes.ROUTE_NOT_FOUND]: 404,

  // 500
  [HttpErrorCodes.INTERNAL_ERROR]: 500,
  [HealthErrorCodes.PROBE_FAILED]: 500,
  [CacheErrorCodes.CACHE_CONFIGURATION_ERROR]: 500,
  [ConfigErrorCodes.CONFIGURATION_ERROR]: 500,
  [ConfigErrorCodes.MISSING_CONFIGURATION]: 500,

  // 503
  [HttpErrorCodes.SERVICE_UNAVAILABLE]: 503,
  [CacheErrorCodes.CACHE_TIER_UNAVAILABLE]: 503,
  [HealthErrorCodes.STORE_UNAVAILABLE]: 503,

  // 504
  [HttpErrorCodes.TIMEOUT]: 504,
  [HealthErrorCodes.PROBE_TIMEOUT]: 504,
};

/**
 * Get HTTP status code for an error code
 */
export function getHttpStatusForCode(code: string): number {
  return errorCodeToHttpStatus[code] ?? 500;
}

/**
 * Check if an error code represents a client error (4xx)
 */
export function isClientError(code: string): boolean {
  const status = getHttpStatusForCode(code);
  return status >= 400 && status < 500;
}
