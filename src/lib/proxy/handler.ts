/**
 * HTTP Proxy Handler
 *
 * Forwards each inbound request to a fixed upstream base URL and relays the
 * upstream response, rewriting the headers a proxy hop invalidates.
 * Extension-less single-segment paths are served from the upstream's
 * index.html so that client-side routes of a single-page app resolve.
 *
 * The handler neither logs nor retries: a failed dispatch rejects the
 * returned promise and the server layer decides what the caller sees.
 *
 * @module lib/proxy/handler
 */

import {
  DEFAULT_PROXY_NAME,
  INDEX_FALLBACK_PATH,
  POST_REDIRECT_STATUS_CODES,
  REDIRECT_STATUS_CODES,
} from '@/config/proxy-config';
import { createConfigurationError } from '@/lib/errors';
import { FetchProxyClient } from './client';
import { addHeader } from './headers';
import { rewriteLocation } from './location';
import { needsRedirection } from './redirection';
import { StreamedBody, store } from './store';
import type {
  OutboundRequest,
  ProxyHandler,
  ProxyHandlerOptions,
  ProxyRequest,
  ResolvedProxyConfig,
  UpstreamLocation,
} from './types';

/**
 * Parse the upstream location, keeping the string it was configured with
 *
 * @throws {AppError} INVALID_CONFIGURATION when the location is neither a URL nor a parseable URL string
 */
export function parseUpstream(
  upstream: UpstreamLocation
): Pick<ResolvedProxyConfig, 'upstream' | 'upstreamString'> {
  if (upstream instanceof URL) {
    return { upstream, upstreamString: upstream.href };
  }
  if (typeof upstream === 'string') {
    try {
      return { upstream: new URL(upstream), upstreamString: upstream };
    } catch {
      throw createConfigurationError(`Upstream is not a valid URL: ${upstream}`, { upstream });
    }
  }
  throw createConfigurationError('Upstream must be a URL or a URL string', { received: typeof upstream });
}

/**
 * Resolve handler options into the immutable configuration every request shares
 *
 * `upstream` hands out a fresh URL on every read, so callers cannot reroute
 * the handler by mutating it.
 *
 * @throws {AppError} INVALID_CONFIGURATION
 */
export function resolveProxyConfig(
  upstream: UpstreamLocation,
  options: ProxyHandlerOptions = {}
): ResolvedProxyConfig {
  const { upstream: parsed, upstreamString } = parseUpstream(upstream);
  const upstreamHref = parsed.href;

  return Object.freeze({
    get upstream(): URL {
      return new URL(upstreamHref);
    },
    upstreamString,
    client: options.client ?? new FetchProxyClient(),
    ownsClient: options.client === undefined,
    proxyName: options.proxyName ?? DEFAULT_PROXY_NAME,
  });
}

/**
 * Parse an inbound request target with its dot segments (`..`, `%2e%2e`) removed
 */
export function normalizeRequestTarget(pathAndQuery: string): URL {
  // Leading slashes dropped first: `//host/x` would parse as protocol-relative
  return new URL(`/${pathAndQuery.replace(/^\/+/, '')}`, 'http://inbound.invalid');
}

/**
 * Build the outbound URL for an inbound request target
 *
 * The path and query are resolved under the upstream base path:
 * `http://example.com/docs` with `/tutorials?page=2` gives
 * `http://example.com/docs/tutorials?page=2`. Paths that need the index
 * fallback give `<upstream>/index.html`, appended to the upstream string as
 * configured and ignoring the inbound path and query.
 *
 * Dot segments are removed from the inbound path first, so the result
 * always stays under the base path.
 *
 * @param config - Resolved proxy configuration
 * @param pathAndQuery - Inbound request target (e.g. `/users?page=2`)
 */
export function resolveOutboundUrl(
  config: Pick<ResolvedProxyConfig, 'upstream' | 'upstreamString'>,
  pathAndQuery: string
): URL {
  const inbound = normalizeRequestTarget(pathAndQuery);
  if (needsRedirection(inbound.pathname)) {
    return new URL(config.upstreamString + INDEX_FALLBACK_PATH);
  }

  const base = new URL(config.upstream.href);
  if (!base.pathname.endsWith('/')) {
    base.pathname = `${base.pathname}/`;
  }
  // `./` keeps a first segment such as `ftp:x` from reading as a scheme
  return new URL(`./${inbound.pathname.replace(/^\/+/, '')}${inbound.search}`, base);
}

/**
 * Whether the Location of a response is rewritten.
 *
 * GET and HEAD follow every redirect status, POST only 303 See Other; other
 * methods never redirect and their Location passes through.
 */
export function isRelayedRedirect(method: string, status: number): boolean {
  switch (method.toUpperCase()) {
    case 'GET':
    case 'HEAD':
      return REDIRECT_STATUS_CODES.includes(status);
    case 'POST':
      return POST_REDIRECT_STATUS_CODES.includes(status);
    default:
      return false;
  }
}

/**
 * Rewrite upstream response headers for the downstream caller
 */
function rewriteResponseHeaders(
  response: Response,
  method: string,
  requestUrl: URL,
  upstream: URL,
  proxyName: string
): Headers {
  const headers = new Headers(response.headers);

  // Via header, see RFC 2616 section 14.45
  addHeader(headers, 'via', `1.1 ${proxyName}`);

  // The client already decoded the transfer coding
  headers.delete('transfer-encoding');

  // A gzipped body was decoded by the client; its length is unknown now
  if (headers.get('content-encoding') === 'gzip') {
    headers.delete('content-encoding');
    headers.delete('content-length');

    // Warning header, see RFC 2616 section 13.5.2
    addHeader(headers, 'warning', `214 ${proxyName} "GZIP decoded"`);
  }

  // Point the Location header at the proxy rather than the upstream, if possible
  const location = headers.get('location');
  if (location !== null && isRelayedRedirect(method, response.status)) {
    headers.set('location', rewriteLocation(location, requestUrl, upstream));
  }

  return headers;
}

/**
 * Create a handler that proxies requests to `upstream`.
 *
 * If the handler serves `/documentation` and `upstream` is
 * `http://example.com/docs`, a request to `/documentation/tutorials` reaches
 * the handler as `/tutorials` and is proxied to
 * `http://example.com/docs/tutorials`.
 *
 * @param upstream - Upstream base, a URL or a string parsed as one
 * @param options - Client and proxy name overrides
 * @returns Request handler
 * @throws {AppError} INVALID_CONFIGURATION when `upstream` is not a URL
 *
 * @example
 * ```typescript
 * const handler = createProxyHandler('http://localhost:5173/app', { proxyName: 'edge-1' });
 * const response = await handler(request);
 * ```
 */
export function createProxyHandler(
  upstream: UpstreamLocation,
  options: ProxyHandlerOptions = {}
): ProxyHandler {
  const config = resolveProxyConfig(upstream, options);
  const upstreamUrl = config.upstream;

  const handle = async (request: ProxyRequest): Promise<Response> => {
    const requestUrl = resolveOutboundUrl(config, request.url);

    const headers = new Headers(request.headers);
    headers.set('host', upstreamUrl.host);
    // Via header, see RFC 2616 section 14.45
    addHeader(headers, 'via', `${request.protocolVersion} ${config.proxyName}`);

    const body = new StreamedBody();
    const outbound: OutboundRequest = {
      method: request.method,
      url: requestUrl,
      headers,
      body: body.stream,
      followRedirects: false,
    };

    // Piped alongside the dispatch, not before it
    if (request.body !== null) {
      store(request.body, body.sink).catch((error: unknown) => body.sink.addError(error));
    } else {
      body.sink.close();
    }

    const response = await config.client.send(outbound);

    return new Response(response.body, {
      status: response.status,
      statusText: response.statusText,
      headers: rewriteResponseHeaders(response, request.method, requestUrl, upstreamUrl, config.proxyName),
    });
  };

  return Object.assign(handle, { config });
}

/**
 * Create a handler proxying to `rootUrl` with default options.
 *
 * @deprecated Use {@link createProxyHandler} instead.
 */
export function createRootProxyHandler(rootUrl: URL): ProxyHandler {
  return createProxyHandler(rootUrl);
}
