/**
 * @fileoverview Unit tests for configuration system
 * @module tests/unit/config
 */

import { describe, it, expect } from 'vitest';

import { loadConfig } from '../../src/core/config';
import { AppConfigSchema, LoggingConfigSchema, LogsConfigSchema } from '../../src/core/config/schema';

describe('unit: Configuration Schema Validation', () => {
  describe('LogsConfigSchema', () => {
    it('should apply default values', () => {
      const result = LogsConfigSchema.safeParse({});
      expect(result.success).toBe(true);

      if (result.success) {
        expect(result.data.waitTimeoutMs).toBe(10000);
        expect(result.data.diagnosticTailLines).toBe(100);
        expect(result.data.encoding).toBe('utf8');
      }
    });

    it('should reject a zero wait timeout', () => {
      const result = LogsConfigSchema.safeParse({ waitTimeoutMs: 0 });
      expect(result.success).toBe(false);
    });

    it('should reject unknown encodings', () => {
      const result = LogsConfigSchema.safeParse({ encoding: 'ebcdic' });
      expect(result.success).toBe(false);
    });
  });

  describe('LoggingConfigSchema', () => {
    it('should accept the silent level', () => {
      const result = LoggingConfigSchema.safeParse({ level: 'silent' });
      expect(result.success).toBe(true);
    });

    it('should reject unknown levels', () => {
      const result = LoggingConfigSchema.safeParse({ level: 'verbose' });
      expect(result.success).toBe(false);
    });
  });

  describe('AppConfigSchema', () => {
    it('should validate a minimal configuration', () => {
      const result = AppConfigSchema.safeParse({ logging: {}, logs: {}, docker: {} });
      expect(result.success).toBe(true);

      if (result.success) {
        expect(result.data.nodeEnv).toBe('development');
        expect(result.data.serviceName).toBe('dockside');
        expect(result.data.docker.socketPath).toBeUndefined();
      }
    });
  });
});

describe('unit: loadConfig', () => {
  it('should use defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      nodeEnv: 'development',
      serviceName: 'dockside',
      logging: { level: 'info', pretty: false },
      logs: { waitTimeoutMs: 10000, diagnosticTailLines: 100, encoding: 'utf8' },
      docker: {},
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      LOG_LEVEL: 'debug',
      LOG_PRETTY: 'true',
      DOCKSIDE_WAIT_TIMEOUT_MS: '2500',
      DOCKSIDE_TAIL_LINES: '20',
      DOCKSIDE_LOG_ENCODING: 'latin1',
      DOCKER_SOCKET_PATH: '/tmp/docker.sock',
    });

    expect(config.nodeEnv).toBe('test');
    expect(config.logging).toEqual({ level: 'debug', pretty: true });
    expect(config.logs).toEqual({ waitTimeoutMs: 2500, diagnosticTailLines: 20, encoding: 'latin1' });
    expect(config.docker.socketPath).toBe('/tmp/docker.sock');
  });

  it('should fall back to the default for unparseable numbers', () => {
    expect(loadConfig({ DOCKSIDE_WAIT_TIMEOUT_MS: 'soon' }).logs.waitTimeoutMs).toBe(10000);
  });

  it('should throw on invalid values', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/^Invalid configuration/);
  });
});
