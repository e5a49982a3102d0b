/**
 * Global Error Handler Middleware
 * @module middleware/error-handler
 *
 * Maps application errors to HTTP responses and logs them by severity.
 */

import { FastifyInstance, FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { createLogger, type StructuredLogger } from '../logging/index.js';
import {
  BaseError,
  HttpErrorCodes,
  ValidationError,
  isBaseError,
  type ValidationFieldError,
} from '../errors/index.js';

// ============================================================================
// Error Response Types
// ============================================================================

export interface ErrorResponse {
  statusCode: number;
  error: string;
  message: string;
  code: string;
  requestId?: string;
  timestamp: string;
  details?: unknown;
  cause?: string;
  validationErrors?: ValidationFieldError[];
}

// ============================================================================
// Error Formatting
// ============================================================================

/**
 * Get HTTP error name from status code
 */
function getHttpErrorName(statusCode: number): string {
  const names: Record<number, string> = {
    400: 'Bad Request',
    401: 'Unauthorized',
    404: 'Not Found',
    500: 'Internal Server Error',
    503: 'Service Unavailable',
    504: 'Gateway Timeout',
  };
  return names[statusCode] || 'Error';
}

function isFastifyError(error: Error): error is FastifyError {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

/**
 * Format error for response
 */
export function formatError(
  error: FastifyError | BaseError | Error,
  requestId: string | undefined,
  isProduction: boolean
): ErrorResponse {
  if (isBaseError(error)) {
    const response: ErrorResponse = {
      statusCode: error.statusCode,
      error: getHttpErrorName(error.statusCode),
      message: error.message,
      code: error.code,
      requestId,
      timestamp: error.timestamp.toISOString(),
    };

    if (!isProduction) {
      response.details = error.context.details;
      if (error.cause instanceof Error) {
        response.cause = error.cause.message;
      }
    }

    if (error instanceof ValidationError) {
      response.validationErrors = error.validationErrors;
    }

    return response;
  }

  // Fastify schema validation
  if ('validation' in error && error.validation) {
    return {
      statusCode: 400,
      error: 'Bad Request',
      message: error.message,
      code: HttpErrorCodes.VALIDATION_ERROR,
      details: !isProduction ? error.validation : undefined,
      requestId,
      timestamp: new Date().toISOString(),
    };
  }

  if (isFastifyError(error) && error.statusCode !== undefined && error.statusCode < 500) {
    return {
      statusCode: error.statusCode,
      error: getHttpErrorName(error.statusCode),
      message: error.message,
      code: error.code ?? HttpErrorCodes.BAD_REQUEST,
      requestId,
      timestamp: new Date().toISOString(),
    };
  }

  return {
    statusCode: 500,
    error: 'Internal Server Error',
    message: isProduction ? 'An unexpected error occurred' : error.message,
    code: HttpErrorCodes.INTERNAL_ERROR,
    requestId,
    timestamp: new Date().toISOString(),
  };
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

export interface ErrorHandlerOptions {
  /** Hide internal messages and details */
  isProduction?: boolean;
  logger?: StructuredLogger;
}

async function errorHandlerPlugin(
  fastify: FastifyInstance,
  options: ErrorHandlerOptions
): Promise<void> {
  const isProduction = options.isProduction ?? process.env.NODE_ENV === 'production';
  const logger = options.logger ?? createLogger('error-handler');

  fastify.setErrorHandler(
    async (error: FastifyError | BaseError | Error, request: FastifyRequest, reply: FastifyReply) => {
      const formatted = formatError(error, request.id, isProduction);

      const logContext = {
        err: error,
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode: formatted.statusCode,
        code: formatted.code,
      };

      if (formatted.statusCode >= 500) {
        const operational = isBaseError(error) && error.isOperational;
        logger.error(logContext, operational ? 'Server error' : 'Non-operational server error');
      } else {
        logger.warn(logContext, 'Client error');
      }

      return reply.status(formatted.statusCode).send(formatted);
    }
  );

  fastify.setNotFoundHandler(async (request: FastifyRequest, reply: FastifyReply) => {
    logger.warn({ method: request.method, url: request.url, requestId: request.id }, 'Route not found');

    return reply.status(404).send({
      statusCode: 404,
      error: 'Not Found',
      message: `Route ${request.method} ${request.url} not found`,
      code: HttpErrorCodes.ROUTE_NOT_FOUND,
      requestId: request.id,
      timestamp: new Date().toISOString(),
    });
  });
}

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
  fastify: '4.x',
});
