/**
 * Proxy Logger
 *
 * Provides structured logging for proxied requests using the existing logger module.
 * Called by the server layer; the handler itself does not log.
 */

import { createLogger } from '@/lib/logger';

const logger = createLogger('proxy');

/**
 * Proxy log entry type
 */
export interface ProxyLogEntry {
  /** Timestamp of the log entry (Unix ms) */
  timestamp: number;

  /** Request ID assigned by the server layer */
  requestId: string;

  /** HTTP method (GET, POST, etc.) */
  method: string;

  /** Inbound request path (including query string) */
  path: string;

  /** HTTP status code of the response */
  statusCode: number;

  /** Response time in milliseconds */
  responseTime: number;

  /** Error message (only present if request failed) */
  error?: string;
}

/**
 * Log a proxied request
 *
 * @param entry - The proxy log entry
 *
 * @example
 * ```typescript
 * logProxyRequest({
 *   timestamp: Date.now(),
 *   requestId: generateRequestId(),
 *   method: 'GET',
 *   path: '/dashboard',
 *   statusCode: 200,
 *   responseTime: 50,
 * });
 * ```
 */
export function logProxyRequest(entry: ProxyLogEntry): void {
  const message = `[Proxy] ${entry.method} ${entry.path} -> ${entry.statusCode} (${entry.responseTime}ms)`;
  const log = logger.withContext({ requestId: entry.requestId });

  if (entry.error) {
    log.warn(message, { ...entry });
  } else {
    log.info(message, { ...entry });
  }
}

/**
 * Log a request the proxy could not complete
 *
 * @param requestId - Request ID assigned by the server layer
 * @param method - The HTTP method
 * @param path - The request path
 * @param error - The error that occurred
 *
 * @example
 * ```typescript
 * logProxyError(requestId, 'GET', '/dashboard', new Error('ECONNREFUSED'));
 * ```
 */
export function logProxyError(
  requestId: string,
  method: string,
  path: string,
  error: Error
): void {
  logger.withContext({ requestId }).error(`[Proxy] ${method} ${path} failed: ${error.message}`, {
    method,
    path,
    error: error.message,
    stack: error.stack,
  });
}
