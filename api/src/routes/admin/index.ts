/**
 * Admin Routes
 * @module routes/admin
 *
 * Administrative API endpoints, registered under /api/admin.
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import cacheAdminRoutes, { type CacheAdminRoutesOptions } from './cache-routes.js';

export type AdminRoutesOptions = CacheAdminRoutesOptions;

const adminRoutes: FastifyPluginAsync<AdminRoutesOptions> = async (
  fastify: FastifyInstance,
  opts: AdminRoutesOptions
): Promise<void> => {
  // DELETE /api/admin/cache          - Clear both tiers
  // DELETE /api/admin/cache/pattern  - Remove keys matching a pattern
  await fastify.register(cacheAdminRoutes, { ...opts, prefix: '/cache' });
};

export default adminRoutes;

export { cacheAdminRoutes };
