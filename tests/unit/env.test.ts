/**
 * Tests for environment variable configuration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  getEnvByKey,
  getLogConfig,
  getProxyEnv,
  isBindAddress,
  parsePort,
  parseTimeout,
} from '@/lib/env';
import { AppError, ErrorCode } from '@/lib/errors';

const originalEnv = process.env;

beforeEach(() => {
  process.env = { ...originalEnv };
  delete process.env.SPA_PROXY_UPSTREAM;
  delete process.env.SPA_PROXY_PORT;
  delete process.env.SPA_PROXY_BIND;
  delete process.env.SPA_PROXY_NAME;
  delete process.env.SPA_PROXY_TIMEOUT_MS;
  delete process.env.SPA_PROXY_LOG_LEVEL;
  delete process.env.SPA_PROXY_LOG_FORMAT;
});

afterEach(() => {
  process.env = originalEnv;
});

describe('getEnvByKey', () => {
  it('should return the value when set', () => {
    process.env.SPA_PROXY_NAME = 'edge-1';

    expect(getEnvByKey('SPA_PROXY_NAME')).toBe('edge-1');
  });

  it('should return undefined when unset', () => {
    expect(getEnvByKey('SPA_PROXY_NAME')).toBeUndefined();
  });

  it('should treat an empty string as unset', () => {
    process.env.SPA_PROXY_NAME = '';

    expect(getEnvByKey('SPA_PROXY_NAME')).toBeUndefined();
  });
});

describe('getLogConfig', () => {
  it('should default to debug and text outside production', () => {
    process.env.NODE_ENV = 'test';

    expect(getLogConfig()).toEqual({ level: 'debug', format: 'text' });
  });

  it('should default to info in production', () => {
    process.env.NODE_ENV = 'production';

    expect(getLogConfig().level).toBe('info');
  });

  it('should read level and format case-insensitively', () => {
    process.env.SPA_PROXY_LOG_LEVEL = 'WARN';
    process.env.SPA_PROXY_LOG_FORMAT = 'JSON';

    expect(getLogConfig()).toEqual({ level: 'warn', format: 'json' });
  });

  it('should fall back to the default level for unknown values', () => {
    process.env.NODE_ENV = 'test';
    process.env.SPA_PROXY_LOG_LEVEL = 'verbose';
    process.env.SPA_PROXY_LOG_FORMAT = 'yaml';

    expect(getLogConfig()).toEqual({ level: 'debug', format: 'text' });
  });
});

describe('isBindAddress', () => {
  it('should accept the supported addresses', () => {
    expect(isBindAddress('127.0.0.1')).toBe(true);
    expect(isBindAddress('0.0.0.0')).toBe(true);
    expect(isBindAddress('localhost')).toBe(true);
  });

  it('should reject other addresses', () => {
    expect(isBindAddress('192.168.1.10')).toBe(false);
    expect(isBindAddress('::')).toBe(false);
  });
});

describe('parsePort', () => {
  it('should parse ports in range', () => {
    expect(parsePort('1', '--port')).toBe(1);
    expect(parsePort('8080', '--port')).toBe(8080);
    expect(parsePort('65535', '--port')).toBe(65535);
  });

  it('should reject out-of-range and non-integer values', () => {
    for (const raw of ['0', '65536', '80.5', 'http', '-1']) {
      expect(() => parsePort(raw, '--port')).toThrow(AppError);
    }
  });

  it('should name the source in the message', () => {
    expect(() => parsePort('0', 'SPA_PROXY_PORT')).toThrow(
      'Invalid SPA_PROXY_PORT: 0. Must be between 1 and 65535.'
    );
  });
});

describe('parseTimeout', () => {
  it('should parse positive integers', () => {
    expect(parseTimeout('2500', '--timeout')).toBe(2500);
  });

  it('should reject zero, negatives and fractions', () => {
    expect(() => parseTimeout('0', '--timeout')).toThrow('Invalid --timeout: 0. Must be a positive integer.');
    expect(() => parseTimeout('-5', '--timeout')).toThrow(AppError);
    expect(() => parseTimeout('1.5', '--timeout')).toThrow(AppError);
  });
});

describe('getProxyEnv', () => {
  it('should apply defaults when nothing is set', () => {
    expect(getProxyEnv()).toEqual({
      SPA_PROXY_UPSTREAM: undefined,
      SPA_PROXY_PORT: 8080,
      SPA_PROXY_BIND: '127.0.0.1',
      SPA_PROXY_NAME: 'shelf_proxy',
      SPA_PROXY_TIMEOUT_MS: undefined,
    });
  });

  it('should read every variable', () => {
    process.env.SPA_PROXY_UPSTREAM = 'http://localhost:5173/app';
    process.env.SPA_PROXY_PORT = '9000';
    process.env.SPA_PROXY_BIND = '0.0.0.0';
    process.env.SPA_PROXY_NAME = 'edge-1';
    process.env.SPA_PROXY_TIMEOUT_MS = '3000';

    expect(getProxyEnv()).toEqual({
      SPA_PROXY_UPSTREAM: 'http://localhost:5173/app',
      SPA_PROXY_PORT: 9000,
      SPA_PROXY_BIND: '0.0.0.0',
      SPA_PROXY_NAME: 'edge-1',
      SPA_PROXY_TIMEOUT_MS: 3000,
    });
  });

  it('should reject an invalid bind address', () => {
    process.env.SPA_PROXY_BIND = '10.0.0.1';

    expect(() => getProxyEnv()).toThrow(
      "Invalid SPA_PROXY_BIND: 10.0.0.1. Must be '127.0.0.1', '0.0.0.0', or 'localhost'."
    );
  });

  it('should raise a configuration error for an invalid port', () => {
    process.env.SPA_PROXY_PORT = '70000';

    let caught: unknown;
    try {
      getProxyEnv();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    expect(caught instanceof AppError ? caught.code : undefined).toBe(ErrorCode.INVALID_CONFIGURATION);
  });
});
