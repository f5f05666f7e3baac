import { describe, expect, it } from 'vitest';
import {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getLoggerConfigFromEnv,
  getReconcileLogger,
  getResourceLogger,
  validateLoggerConfig,
} from '../../src/core/logging/index.js';

describe('Logging', () => {
  describe('Logger Creation', () => {
    it('should create a logger exposing every level', () => {
      const logger = createLogger({ level: 'silent' });
      for (const method of ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'child'] as const) {
        expect(typeof logger[method]).toBe('function');
      }
    });

    it('should create child loggers with context', () => {
      const child = createLogger({ level: 'silent' }).child({ component: 'test' });
      expect(() => child.error('failed', new Error('boom'), { resourceId: 'x' })).not.toThrow();
    });

    it('should create scoped loggers', () => {
      expect(getComponentLogger('reconciler')).toBeDefined();
      expect(getResourceLogger('PublicRouteTable/public-a')).toBeDefined();
      expect(getReconcileLogger('demo', { operation: 'reconcile' })).toBeDefined();
      expect(createContextLogger({ clusterName: 'demo' }, { level: 'silent' })).toBeDefined();
    });
  });

  describe('Environment Configuration', () => {
    it('should default to info without pretty printing', () => {
      expect(getLoggerConfigFromEnv({})).toEqual({
        level: 'info',
        pretty: false,
        options: { timestamp: true },
      });
    });

    it('should respect RECONCILER_LOG_LEVEL', () => {
      expect(getLoggerConfigFromEnv({ RECONCILER_LOG_LEVEL: 'DEBUG' }).level).toBe('debug');
    });

    it('should ignore unknown levels', () => {
      expect(getLoggerConfigFromEnv({ RECONCILER_LOG_LEVEL: 'verbose' }).level).toBe('info');
    });

    it('should enable pretty printing in development or on request', () => {
      expect(getLoggerConfigFromEnv({ NODE_ENV: 'development' }).pretty).toBe(true);
      expect(getLoggerConfigFromEnv({ RECONCILER_LOG_PRETTY: 'true' }).pretty).toBe(true);
    });

    it('should read destination and timestamp settings', () => {
      const config = getLoggerConfigFromEnv({
        RECONCILER_LOG_DESTINATION: '/tmp/reconciler.log',
        RECONCILER_LOG_TIMESTAMP: 'false',
      });
      expect(config.destination).toBe('/tmp/reconciler.log');
      expect(config.options?.timestamp).toBe(false);
    });
  });

  describe('Validation', () => {
    it('should reject a blank destination', () => {
      expect(() => validateLoggerConfig({ level: 'info', destination: '  ' })).toThrow(
        'Log destination must be a non-empty path'
      );
    });

    it('should accept the silent level', () => {
      expect(() => validateLoggerConfig({ level: 'silent' })).not.toThrow();
    });
  });
});
