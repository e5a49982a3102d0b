/**
 * Cache Admin Routes Integration Tests
 * @module tests/integration/routes/admin.routes
 *
 * Endpoints tested:
 * - DELETE /api/admin/cache
 * - DELETE /api/admin/cache/pattern
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StubProbe, buildTestApp, createTestConfig, type TestApp } from '../../helpers/index.js';

const ADMIN_KEY = 'test-secret';

describe('Cache Admin Routes', () => {
  let probe: StubProbe;
  let ctx: TestApp;

  beforeEach(async () => {
    probe = new StubProbe('database');
    ctx = await buildTestApp({
      config: createTestConfig({ server: { adminApiKey: ADMIN_KEY } }),
      probes: [probe],
      aggregatorConfig: { reportTtlMs: 30000 },
    });
    await ctx.gateway.set('flights:BA117', { gate: 'A4' });
    await ctx.gateway.set('flights:LH400', { gate: 'B12' });
    await ctx.gateway.set('gates:A4', { open: true });
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  describe('authorization', () => {
    it('should reject a request without the admin key', async () => {
      const response = await ctx.app.inject({ method: 'DELETE', url: '/api/admin/cache' });

      expect(response.statusCode).toBe(401);
      expect(response.json().code).toBe('UNAUTHORIZED');
      expect(await ctx.gateway.exists('gates:A4')).toBe(true);
    });

    it('should reject a wrong admin key', async () => {
      const response = await ctx.app.inject({
        method: 'DELETE',
        url: '/api/admin/cache',
        headers: { 'x-admin-key': 'wrong-secret' },
      });

      expect(response.statusCode).toBe(401);
    });
  });

  describe('DELETE /api/admin/cache', () => {
    it('should clear every entry and drop the memoized health report', async () => {
      await ctx.app.inject({ method: 'GET', url: '/health' });
      expect(probe.calls).toBe(1);

      const response = await ctx.app.inject({
        method: 'DELETE',
        url: '/api/admin/cache',
        headers: { 'x-admin-key': ADMIN_KEY },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ cleared: true, deleted: { memory: 3, distributed: 0 } });

      const health = await ctx.app.inject({ method: 'GET', url: '/health' });
      expect(health.json().cached).toBe(false);
      expect(probe.calls).toBe(2);
    });
  });

  describe('DELETE /api/admin/cache/pattern', () => {
    it('should remove only the matching keys', async () => {
      const response = await ctx.app.inject({
        method: 'DELETE',
        url: '/api/admin/cache/pattern?pattern=flights:*',
        headers: { 'x-admin-key': ADMIN_KEY },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ pattern: 'flights:*', deleted: { memory: 2, distributed: 0 } });
      expect(await ctx.gateway.exists('flights:BA117')).toBe(false);
      expect(await ctx.gateway.exists('gates:A4')).toBe(true);
    });

    it('should refuse a bare wildcard', async () => {
      const response = await ctx.app.inject({
        method: 'DELETE',
        url: '/api/admin/cache/pattern?pattern=*',
        headers: { 'x-admin-key': ADMIN_KEY },
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.code).toBe('INVALID_CACHE_PATTERN');
      expect(body.validationErrors[0]).toMatchObject({ field: 'pattern', code: 'TOO_BROAD' });
      expect(await ctx.gateway.exists('gates:A4')).toBe(true);
    });

    it('should require the pattern parameter', async () => {
      const response = await ctx.app.inject({
        method: 'DELETE',
        url: '/api/admin/cache/pattern',
        headers: { 'x-admin-key': ADMIN_KEY },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe('VALIDATION_ERROR');
    });
  });
});
