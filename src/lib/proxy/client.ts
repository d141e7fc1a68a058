/**
 * Default upstream client
 *
 * Sends outbound requests with the global fetch.
 *
 * @module lib/proxy/client
 */

import {
  BODYLESS_METHODS,
  TRANSPORT_MANAGED_REQUEST_HEADERS,
} from '@/config/proxy-config';
import type { OutboundRequest, ProxyClient } from './types';

export interface FetchProxyClientOptions {
  /** Abort upstream requests after this many milliseconds (default: no timeout) */
  timeoutMs?: number;
}

function isBodylessMethod(method: string): boolean {
  return BODYLESS_METHODS.includes(method.toUpperCase());
}

/**
 * Copy headers, leaving out the connection headers undici sets itself
 */
export function toTransportHeaders(source: Headers): Headers {
  const headers = new Headers();
  source.forEach((value, key) => {
    if (!TRANSPORT_MANAGED_REQUEST_HEADERS.includes(key.toLowerCase())) {
      headers.set(key, value);
    }
  });
  return headers;
}

/**
 * {@link ProxyClient} backed by the global fetch.
 *
 * Safe for concurrent use; connection pooling is left to the fetch dispatcher.
 * Note that fetch decodes compressed bodies but keeps the Content-Encoding
 * header, which the proxy handler accounts for.
 */
export class FetchProxyClient implements ProxyClient {
  private readonly timeoutMs?: number;

  constructor(options: FetchProxyClientOptions = {}) {
    this.timeoutMs = options.timeoutMs;
  }

  async send(request: OutboundRequest): Promise<Response> {
    const withBody = !isBodylessMethod(request.method);
    if (!withBody) {
      // fetch refuses a body on GET/HEAD; release the unused stream
      await request.body.cancel();
    }

    return fetch(request.url, {
      method: request.method,
      headers: toTransportHeaders(request.headers),
      body: withBody ? request.body : undefined,
      redirect: request.followRedirects ? 'follow' : 'manual',
      signal: this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined,
      duplex: 'half',
    });
  }
}
