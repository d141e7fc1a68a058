/**
 * Proxy Logger Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import type { ProxyLogEntry } from '@/lib/proxy/logger';

// Mock the logger module
vi.mock('@/lib/logger', () => ({
  createLogger: vi.fn(),
}));

describe('Proxy Logger', () => {
  let mockLogger: {
    debug: Mock;
    info: Mock;
    warn: Mock;
    error: Mock;
    withContext: Mock;
  };

  beforeEach(async () => {
    vi.resetModules();
    const { createLogger } = await import('@/lib/logger');
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      withContext: vi.fn(() => mockLogger),
    };
    vi.mocked(createLogger).mockReturnValue(mockLogger);
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('logProxyRequest', () => {
    it('should log successful request with info level', async () => {
      const { logProxyRequest } = await import('@/lib/proxy/logger');

      const entry: ProxyLogEntry = {
        timestamp: 1700000000000,
        requestId: 'req-1',
        method: 'GET',
        path: '/dashboard',
        statusCode: 200,
        responseTime: 50,
      };

      logProxyRequest(entry);

      expect(mockLogger.info).toHaveBeenCalledTimes(1);
      expect(mockLogger.info).toHaveBeenCalledWith('[Proxy] GET /dashboard -> 200 (50ms)', entry);
      expect(mockLogger.warn).not.toHaveBeenCalled();
    });

    it('should attach the request ID as context', async () => {
      const { logProxyRequest } = await import('@/lib/proxy/logger');

      logProxyRequest({
        timestamp: 1700000000000,
        requestId: 'req-2',
        method: 'POST',
        path: '/api/items?draft=1',
        statusCode: 201,
        responseTime: 120,
      });

      expect(mockLogger.withContext).toHaveBeenCalledWith({ requestId: 'req-2' });
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[Proxy] POST /api/items?draft=1 -> 201 (120ms)',
        expect.objectContaining({ requestId: 'req-2' })
      );
    });

    it('should log request with error using warn level', async () => {
      const { logProxyRequest } = await import('@/lib/proxy/logger');

      logProxyRequest({
        timestamp: 1700000000000,
        requestId: 'req-3',
        method: 'GET',
        path: '/missing/page',
        statusCode: 404,
        responseTime: 7,
        error: 'HTTP 404',
      });

      expect(mockLogger.warn).toHaveBeenCalledTimes(1);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        '[Proxy] GET /missing/page -> 404 (7ms)',
        expect.objectContaining({ error: 'HTTP 404' })
      );
      expect(mockLogger.info).not.toHaveBeenCalled();
    });
  });

  describe('logProxyError', () => {
    it('should log error with error level', async () => {
      const { logProxyError } = await import('@/lib/proxy/logger');

      const error = new Error('ECONNREFUSED');
      error.stack = 'Error: ECONNREFUSED\n    at test.ts:1:1';

      logProxyError('req-4', 'GET', '/page/one', error);

      expect(mockLogger.withContext).toHaveBeenCalledWith({ requestId: 'req-4' });
      expect(mockLogger.error).toHaveBeenCalledTimes(1);
      expect(mockLogger.error).toHaveBeenCalledWith('[Proxy] GET /page/one failed: ECONNREFUSED', {
        method: 'GET',
        path: '/page/one',
        error: 'ECONNREFUSED',
        stack: 'Error: ECONNREFUSED\n    at test.ts:1:1',
      });
    });

    it('should include stack trace in log data', async () => {
      const { logProxyError } = await import('@/lib/proxy/logger');

      const error = new Error('Connection timeout');
      error.stack = 'Error: Connection timeout\n    at handler.ts:50:10';

      logProxyError('req-5', 'POST', '/api/submit', error);

      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.any(String),
        expect.objectContaining({
          stack: expect.stringContaining('Connection timeout'),
        })
      );
    });
  });
});
