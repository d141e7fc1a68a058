/**
 * Proxy type definitions
 *
 * @module lib/proxy/types
 */

/**
 * Inbound request as handed over by the server layer
 */
export interface ProxyRequest {
  /** HTTP method (GET, POST, etc.) */
  method: string;

  /** Path and query of the request target (e.g. `/assets/app.js?v=2`) */
  url: string;

  /** Request headers */
  headers: Headers;

  /** HTTP version of the inbound connection (e.g. `1.1`) */
  protocolVersion: string;

  /** Request body, consumed once; null when the server layer has none */
  body: ReadableStream<Uint8Array> | null;
}

/**
 * Request sent to the upstream through a {@link ProxyClient}
 */
export interface OutboundRequest {
  method: string;
  url: URL;
  headers: Headers;
  /** Fed by the inbound body while the request is in flight */
  body: ReadableStream<Uint8Array>;
  /** The proxy relays redirects; it always sends false */
  followRedirects: boolean;
}

/**
 * Capability used to reach the upstream.
 * A single instance serves concurrent requests.
 */
export interface ProxyClient {
  send(request: OutboundRequest): Promise<Response>;
}

/**
 * Upstream base location: a parsed URL or a string parsed into one
 */
export type UpstreamLocation = string | URL;

/**
 * Options for {@link createProxyHandler}
 */
export interface ProxyHandlerOptions {
  /** Client used for upstream requests. Defaults to a FetchProxyClient owned by the handler */
  client?: ProxyClient;

  /** Token identifying this proxy in Via and Warning headers. Should be an HTTP token or a hostname */
  proxyName?: string;
}

/**
 * Configuration resolved once at construction
 */
export interface ResolvedProxyConfig {
  /** Base every inbound path is resolved against; a fresh copy on every read */
  readonly upstream: URL;

  /** The upstream exactly as configured; the index fallback is appended to it */
  readonly upstreamString: string;

  readonly client: ProxyClient;

  /** True when the handler created its client (and so is responsible for it) */
  readonly ownsClient: boolean;

  readonly proxyName: string;
}

/**
 * Per-request callable returned by {@link createProxyHandler}
 */
export interface ProxyHandler {
  (request: ProxyRequest): Promise<Response>;
  readonly config: ResolvedProxyConfig;
}
