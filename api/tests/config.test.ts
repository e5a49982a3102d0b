/**
 * Configuration Loader Tests
 * @module tests/config
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, mapEnvironment } from '../src/config/index.js';
import { ConfigurationError } from '../src/errors/index.js';

describe('Configuration Loader', () => {
  describe('loadConfig', () => {
    it('should apply defaults for an empty environment', () => {
      const config = loadConfig({});

      expect(config.env).toBe('development');
      expect(config.server).toEqual({ host: '0.0.0.0', port: 3000, corsOrigins: ['*'] });
      expect(config.redis).toMatchObject({ namespace: 'flightboard', port: 6379, reprobeIntervalMs: 300000 });
      expect(config.cache).toEqual({
        defaultTtlSeconds: 1800,
        localTtlSeconds: 300,
        localMaxEntries: 10000,
        maxKeyLength: 512,
      });
      expect(config.health.probeTimeoutMs).toBe(5000);
      expect(config.health.thresholds.hitRateDegradedPercent).toBe(50);
      expect(config.metrics).toEqual({ prefix: 'flightboard_', collectDefaults: true });
    });

    it('should map environment variables onto the schema', () => {
      const config = loadConfig({
        NODE_ENV: 'production',
        PORT: '8080',
        ADMIN_API_KEY: 'test-secret',
        CORS_ORIGINS: 'https://board.example, https://ops.example',
        REDIS_URL: 'redis://cache.local:6379',
        REDIS_REPROBE_INTERVAL_MS: '0',
        CACHE_LOCAL_MAX_ENTRIES: '50',
        HEALTH_CPU_CRITICAL_PERCENT: '80',
        METRICS_COLLECT_DEFAULTS: 'false',
        LOG_LEVEL: 'warn',
      });

      expect(config.env).toBe('production');
      expect(config.server.port).toBe(8080);
      expect(config.server.adminApiKey).toBe('test-secret');
      expect(config.server.corsOrigins).toEqual(['https://board.example', 'https://ops.example']);
      expect(config.redis.url).toBe('redis://cache.local:6379');
      expect(config.redis.reprobeIntervalMs).toBe(0);
      expect(config.cache.localMaxEntries).toBe(50);
      expect(config.health.thresholds.cpuCriticalPercent).toBe(80);
      expect(config.health.thresholds.cpuDegradedPercent).toBe(75);
      expect(config.metrics.collectDefaults).toBe(false);
      expect(config.logging.level).toBe('warn');
    });

    it('should name the invalid path in a ConfigurationError', () => {
      expect(() => loadConfig({ PORT: '70000' })).toThrow(ConfigurationError);

      try {
        loadConfig({ PORT: '70000' });
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error instanceof ConfigurationError && error.configKey).toBe('server.port');
      }
    });
  });

  describe('mapEnvironment', () => {
    it('should drop unset and empty values so defaults apply', () => {
      expect(mapEnvironment({ HOST: '', LOG_LEVEL: 'debug' })).toEqual({ logging: { level: 'debug' } });
    });
  });
});
