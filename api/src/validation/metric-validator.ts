/**
 * Metric Validator
 * @module validation/metric-validator
 *
 * Guards metric names, event names, tags and cache-invalidation patterns
 * before they reach the tracking sink or the cache gateway. Every violation
 * throws a ValidationError synchronously.
 */

import {
  CacheErrorCodes,
  HealthErrorCodes,
  ValidationError,
  type ValidationFieldError,
} from '../errors/index.js';

// ============================================================================
// Limits
// ============================================================================

export const METRIC_LIMITS = {
  MAX_NAME_LENGTH: 100,
  MAX_TAGS: 20,
  MAX_TAG_KEY_LENGTH: 50,
  MAX_TAG_VALUE_LENGTH: 200,
  MAX_PATTERN_LENGTH: 200,
} as const;

const NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Glob characters plus `:` so colon-delimited cache keys can be targeted
 */
const CACHE_PATTERN = /^[A-Za-z0-9_.:*?[\]-]+$/;

/**
 * Wildcards and bracket classes; a pattern made only of these matches any key
 */
const WILDCARD_TOKENS = /\[[^\]]*\]|[*?]/g;

// ============================================================================
// Validators
// ============================================================================

function nameErrors(field: string, name: unknown): ValidationFieldError[] {
  if (typeof name !== 'string' || name.trim().length === 0) {
    return [{ field, message: `${field} must not be empty`, code: 'REQUIRED', value: name }];
  }
  if (name.length > METRIC_LIMITS.MAX_NAME_LENGTH) {
    return [{
      field,
      message: `${field} must be at most ${METRIC_LIMITS.MAX_NAME_LENGTH} characters`,
      code: 'TOO_LONG',
      value: name.length,
    }];
  }
  if (!NAME_PATTERN.test(name)) {
    return [{
      field,
      message: `${field} may only contain letters, digits, '_', '.' and '-'`,
      code: 'INVALID_CHARACTERS',
      value: name,
    }];
  }
  return [];
}

function assertName(field: string, name: unknown): void {
  const errors = nameErrors(field, name);
  if (errors.length > 0) {
    throw new ValidationError(`Invalid ${field}`, errors, {}, HealthErrorCodes.INVALID_METRIC);
  }
}

export function validateMetricName(name: string): void {
  assertName('metricName', name);
}

export function validateEventName(name: string): void {
  assertName('eventName', name);
}

export function validateMetricValue(value: number): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(
      'Invalid metric value',
      [{ field: 'value', message: 'value must be a finite number', code: 'NOT_FINITE', value: String(value) }],
      {},
      HealthErrorCodes.INVALID_METRIC
    );
  }
}

export function validateTags(tags: Record<string, string> | undefined): void {
  if (tags === undefined) {
    return;
  }

  const errors: ValidationFieldError[] = [];
  const entries = Object.entries(tags);

  if (entries.length > METRIC_LIMITS.MAX_TAGS) {
    errors.push({
      field: 'tags',
      message: `at most ${METRIC_LIMITS.MAX_TAGS} tags are allowed`,
      code: 'TOO_MANY',
      value: entries.length,
    });
  }

  for (const [key, value] of entries) {
    if (key.trim().length === 0) {
      errors.push({ field: 'tags', message: 'tag key must not be empty', code: 'REQUIRED' });
    } else if (key.length > METRIC_LIMITS.MAX_TAG_KEY_LENGTH) {
      errors.push({
        field: `tags.${key}`,
        message: `tag key must be at most ${METRIC_LIMITS.MAX_TAG_KEY_LENGTH} characters`,
        code: 'TOO_LONG',
      });
    }
    if (typeof value !== 'string') {
      errors.push({ field: `tags.${key}`, message: 'tag value must be a string', code: 'INVALID_TYPE' });
    } else if (value.length > METRIC_LIMITS.MAX_TAG_VALUE_LENGTH) {
      errors.push({
        field: `tags.${key}`,
        message: `tag value must be at most ${METRIC_LIMITS.MAX_TAG_VALUE_LENGTH} characters`,
        code: 'TOO_LONG',
      });
    }
  }

  if (errors.length > 0) {
    throw new ValidationError('Invalid tags', errors, {}, HealthErrorCodes.INVALID_METRIC);
  }
}

/**
 * Validate a cache-invalidation glob pattern
 */
export function validatePattern(pattern: string): void {
  const fail = (message: string, code: string): never => {
    throw new ValidationError(
      'Invalid cache pattern',
      [{ field: 'pattern', message, code, value: pattern }],
      {},
      CacheErrorCodes.INVALID_CACHE_PATTERN
    );
  };

  if (typeof pattern !== 'string' || pattern.trim().length === 0) {
    fail('pattern must not be empty', 'REQUIRED');
  } else if (pattern.length > METRIC_LIMITS.MAX_PATTERN_LENGTH) {
    fail(`pattern must be at most ${METRIC_LIMITS.MAX_PATTERN_LENGTH} characters`, 'TOO_LONG');
  } else if (pattern.replace(WILDCARD_TOKENS, '').length === 0) {
    fail('pattern must contain at least one literal character', 'TOO_BROAD');
  } else if (!CACHE_PATTERN.test(pattern)) {
    fail("pattern may only contain letters, digits, '_', '.', '-', ':', '*', '?', '[' and ']'", 'INVALID_CHARACTERS');
  }
}

/**
 * Validate a cache key before it reaches either tier
 */
export function validateCacheKey(key: string, maxLength: number): void {
  if (typeof key !== 'string' || key.length === 0) {
    throw new ValidationError(
      'Invalid cache key',
      [{ field: 'key', message: 'key must not be empty', code: 'REQUIRED' }],
      {},
      CacheErrorCodes.INVALID_CACHE_KEY
    );
  }
  if (key.length > maxLength) {
    throw new ValidationError(
      'Invalid cache key',
      [{ field: 'key', message: `key must be at most ${maxLength} characters`, code: 'TOO_LONG', value: key.length }],
      {},
      CacheErrorCodes.INVALID_CACHE_KEY
    );
  }
}
