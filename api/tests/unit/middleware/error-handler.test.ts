/**
 * Error Handler Tests
 * @module tests/unit/middleware/error-handler
 */

import { describe, it, expect } from 'vitest';
import { formatError } from '../../../src/middleware/error-handler.js';
import {
  ProbeTimeoutError,
  TransientDependencyError,
  ValidationError,
  HealthErrorCodes,
} from '../../../src/errors/index.js';

describe('formatError', () => {
  describe('application errors', () => {
    it('should map the error code to its HTTP status and keep the cause outside production', () => {
      const error = new TransientDependencyError('redis', 'get', new Error('ECONNRESET'));

      const response = formatError(error, 'req-1', false);

      expect(response).toEqual({
        statusCode: 503,
        error: 'Service Unavailable',
        message: 'redis get failed: ECONNRESET',
        code: 'SERVICE_UNAVAILABLE',
        requestId: 'req-1',
        timestamp: error.timestamp.toISOString(),
        details: undefined,
        cause: 'ECONNRESET',
      });
    });

    it('should hide details and cause in production', () => {
      const response = formatError(new ProbeTimeoutError('system', 2000), 'req-2', true);

      expect(response.statusCode).toBe(504);
      expect(response.error).toBe('Gateway Timeout');
      expect(response.details).toBeUndefined();
      expect(response.cause).toBeUndefined();
    });

    it('should include details outside production', () => {
      const response = formatError(new ProbeTimeoutError('system', 2000), 'req-3', false);

      expect(response.message).toBe("Probe 'system' timed out after 2000ms");
      expect(response.details).toEqual({ probeName: 'system', timeoutMs: 2000 });
    });

    it('should list field errors for validation failures', () => {
      const error = new ValidationError(
        'Invalid metricName',
        [{ field: 'metricName', message: 'metricName must not be empty', code: 'REQUIRED' }],
        {},
        HealthErrorCodes.INVALID_METRIC
      );

      const response = formatError(error, undefined, true);

      expect(response.statusCode).toBe(400);
      expect(response.code).toBe('INVALID_METRIC');
      expect(response.validationErrors).toEqual([
        { field: 'metricName', message: 'metricName must not be empty', code: 'REQUIRED' },
      ]);
    });
  });

  describe('framework errors', () => {
    it('should report schema validation failures as 400', () => {
      const validation = [{ instancePath: '', message: "must have required property 'value'" }];
      const error = Object.assign(new Error("body must have required property 'value'"), { validation });

      const dev = formatError(error, 'req-4', false);
      const prod = formatError(error, 'req-4', true);

      expect(dev).toMatchObject({ statusCode: 400, code: 'VALIDATION_ERROR', details: validation });
      expect(prod.details).toBeUndefined();
    });

    it('should pass client errors through with their own code', () => {
      const error = Object.assign(new Error('Request body is too large'), {
        statusCode: 413,
        code: 'FST_ERR_CTP_BODY_TOO_LARGE',
      });

      expect(formatError(error, 'req-5', true)).toMatchObject({
        statusCode: 413,
        error: 'Error',
        message: 'Request body is too large',
        code: 'FST_ERR_CTP_BODY_TOO_LARGE',
      });
    });
  });

  describe('unexpected errors', () => {
    it('should hide the message in production', () => {
      expect(formatError(new Error('pool exhausted'), 'req-6', true)).toMatchObject({
        statusCode: 500,
        message: 'An unexpected error occurred',
        code: 'INTERNAL_ERROR',
      });
    });

    it('should keep the message outside production', () => {
      expect(formatError(new Error('pool exhausted'), 'req-7', false).message).toBe('pool exhausted');
    });
  });
});
