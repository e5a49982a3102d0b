/**
 * Cache Admin Routes
 * @module routes/admin/cache-routes
 *
 * Privileged cache invalidation. When an admin key is configured every
 * request must carry it in `x-admin-key`.
 *
 * Endpoints:
 * - DELETE /api/admin/cache           - Clear both tiers
 * - DELETE /api/admin/cache/pattern   - Remove keys matching a glob pattern
 */

import { timingSafeEqual } from 'node:crypto';
import { FastifyInstance, FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import { createLogger } from '../../logging/index.js';
import { UnauthorizedError } from '../../errors/index.js';
import type { CacheGateway } from '../../cache/cache-gateway.js';
import {
  ClearAllResponseSchema,
  ErrorResponseSchema,
  PatternQuerySchema,
  PatternRemovalResponseSchema,
  type PatternQuery,
} from '../../types/index.js';

const logger = createLogger('cache-admin-routes');

export const ADMIN_KEY_HEADER = 'x-admin-key';

export interface CacheAdminRoutesOptions {
  gateway: CacheGateway;
  /** Unset disables the key check */
  adminApiKey?: string;
  /** Runs after a successful invalidation, e.g. to drop a memoized health report */
  onInvalidated?: () => void;
}

// ============================================================================
// Admin Authorization
// ============================================================================

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * PreHandler hook requiring the configured admin key
 * @throws UnauthorizedError when the header is missing or wrong
 */
export function createRequireAdminKey(adminApiKey: string | undefined) {
  return async function requireAdminKey(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    if (!adminApiKey) {
      return;
    }

    const header = request.headers[ADMIN_KEY_HEADER];
    const provided = Array.isArray(header) ? header[0] : header;

    if (!provided || !keysMatch(provided, adminApiKey)) {
      logger.warn({ url: request.url, requestId: request.id }, 'Rejected cache admin request');
      throw new UnauthorizedError('Valid admin key required');
    }
  };
}

// ============================================================================
// Route Plugin
// ============================================================================

const cacheAdminRoutes: FastifyPluginAsync<CacheAdminRoutesOptions> = async (
  fastify: FastifyInstance,
  opts: CacheAdminRoutesOptions
): Promise<void> => {
  const { gateway, onInvalidated } = opts;
  const requireAdminKey = createRequireAdminKey(opts.adminApiKey);

  // ==========================================================================
  // DELETE / - Clear all cache entries
  // ==========================================================================
  fastify.delete('/', {
    schema: {
      response: {
        200: ClearAllResponseSchema,
        401: ErrorResponseSchema,
      },
    },
    preHandler: requireAdminKey,
  }, async (request, reply) => {
    const deleted = await gateway.clearAll();
    onInvalidated?.();

    logger.info({ deleted, requestId: request.id }, 'Cache cleared');
    return reply.status(200).send({ cleared: true, deleted });
  });

  // ==========================================================================
  // DELETE /pattern - Remove keys matching a pattern
  // ==========================================================================
  fastify.delete<{ Querystring: PatternQuery }>('/pattern', {
    schema: {
      querystring: PatternQuerySchema,
      response: {
        200: PatternRemovalResponseSchema,
        400: ErrorResponseSchema,
        401: ErrorResponseSchema,
      },
    },
    preHandler: requireAdminKey,
  }, async (request, reply) => {
    const result = await gateway.removeByPattern(request.query.pattern);
    onInvalidated?.();

    return reply.status(200).send(result);
  });
};

export default cacheAdminRoutes;
