/**
 * Proxy HTTP server
 *
 * Node http server adapter around a ProxyHandler: converts Node requests into
 * ProxyRequest values, writes the handler's Response back, logs every
 * request, and answers handler failures with 502/504.
 *
 * @module lib/proxy-server
 */

import { createServer } from 'http';
import type { IncomingMessage, Server, ServerResponse } from 'http';
import type { AddressInfo } from 'net';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { PROXY_ERROR_MESSAGES, PROXY_STATUS_CODES } from '@/config/proxy-config';
import { AppError, ErrorCode, getErrorMessage, wrapError } from '@/lib/errors';
import { createLogger, generateRequestId } from '@/lib/logger';
import { logProxyError, logProxyRequest } from '@/lib/proxy/logger';
import type { ProxyHandler, ProxyRequest } from '@/lib/proxy/types';

const logger = createLogger('proxy-server');

/**
 * Normalize the request target to path and query.
 *
 * Absolute-form targets (`GET http://host/path`) keep only their path and
 * query so that they resolve under the upstream like any other request.
 */
export function toRequestTarget(rawUrl: string | undefined): string {
  const target = rawUrl ?? '/';
  if (target.startsWith('/')) {
    return target;
  }
  try {
    const url = new URL(target);
    return url.pathname + url.search;
  } catch {
    return `/${target}`;
  }
}

/**
 * Convert a Node request into a ProxyRequest
 */
export function toProxyRequest(req: IncomingMessage): ProxyRequest {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      value.forEach((item) => headers.append(name, item));
    } else {
      headers.set(name, value);
    }
  }

  return {
    method: req.method ?? 'GET',
    url: toRequestTarget(req.url),
    headers,
    protocolVersion: req.httpVersion,
    body: Readable.toWeb(req),
  };
}

/**
 * Write a Response to a Node response, streaming its body
 */
export async function writeProxyResponse(response: Response, res: ServerResponse): Promise<void> {
  res.statusCode = response.status;
  if (response.statusText) {
    res.statusMessage = response.statusText;
  }

  response.headers.forEach((value, key) => {
    if (key !== 'set-cookie') {
      res.setHeader(key, value);
    }
  });
  const cookies = response.headers.getSetCookie();
  if (cookies.length > 0) {
    res.setHeader('set-cookie', cookies);
  }

  if (response.body === null) {
    res.end();
    return;
  }
  await pipeline(Readable.fromWeb(response.body), res);
}

function isTimeoutError(error: Error): boolean {
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

/**
 * Answer a request the handler could not complete
 */
function writeGatewayError(res: ServerResponse, error: Error): void {
  if (res.headersSent) {
    res.destroy(error);
    return;
  }

  const timeout = isTimeoutError(error);
  const failure = timeout
    ? new AppError(ErrorCode.UPSTREAM_TIMEOUT, PROXY_ERROR_MESSAGES.GATEWAY_TIMEOUT, { cause: error.message })
    : new AppError(ErrorCode.UPSTREAM_UNREACHABLE, PROXY_ERROR_MESSAGES.BAD_GATEWAY, { cause: error.message });

  res.statusCode = timeout ? PROXY_STATUS_CODES.GATEWAY_TIMEOUT : PROXY_STATUS_CODES.BAD_GATEWAY;
  res.setHeader('content-type', 'application/json');
  res.end(
    JSON.stringify({
      error: timeout ? 'Gateway Timeout' : 'Bad Gateway',
      ...failure.toClientError(),
    })
  );
}

async function serveRequest(
  handler: ProxyHandler,
  req: IncomingMessage,
  res: ServerResponse
): Promise<void> {
  const startTime = Date.now();
  const requestId = generateRequestId();
  const request = toProxyRequest(req);

  try {
    const response = await handler(request);
    await writeProxyResponse(response, res);

    logProxyRequest({
      timestamp: Date.now(),
      requestId,
      method: request.method,
      path: request.url,
      statusCode: response.status,
      responseTime: Date.now() - startTime,
      ...(response.status >= 400 ? { error: `HTTP ${response.status}` } : {}),
    });
  } catch (error) {
    const failure = error instanceof Error ? error : wrapError(error, ErrorCode.UPSTREAM_UNREACHABLE);
    logProxyError(requestId, request.method, request.url, failure);
    writeGatewayError(res, failure);
  }
}

/**
 * Create an http server that serves every request through `handler`
 *
 * @example
 * ```typescript
 * const server = createProxyServer(createProxyHandler('http://localhost:5173'));
 * await listen(server, 8080, '127.0.0.1');
 * ```
 */
export function createProxyServer(handler: ProxyHandler): Server {
  return createServer((req, res) => {
    serveRequest(handler, req, res).catch((error: unknown) => {
      logger.error('request:unhandled', { error: getErrorMessage(error) });
      res.destroy();
    });
  });
}

/**
 * Start listening and resolve with the bound address
 */
export function listen(server: Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error(`Unexpected server address: ${String(address)}`));
        return;
      }
      logger.info('listen:ready', { host: address.address, port: address.port });
      resolve(address);
    });
  });
}

/**
 * Stop accepting connections and resolve once the server has closed
 */
export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
    server.closeAllConnections();
  });
}
