/**
 * Proxy module exports
 */

export { logProxyRequest, logProxyError } from './logger';
export type { ProxyLogEntry } from './logger';

export {
  createProxyHandler,
  createRootProxyHandler,
  isRelayedRedirect,
  normalizeRequestTarget,
  parseUpstream,
  resolveOutboundUrl,
  resolveProxyConfig,
} from './handler';
export { FetchProxyClient, toTransportHeaders } from './client';
export type { FetchProxyClientOptions } from './client';
export { addHeader } from './headers';
export { needsRedirection } from './redirection';
export { relativeWithin, rewriteLocation } from './location';
export { store, StreamedBody } from './store';
export type { BodySink, StoreOptions } from './store';
export type {
  OutboundRequest,
  ProxyClient,
  ProxyHandler,
  ProxyHandlerOptions,
  ProxyRequest,
  ResolvedProxyConfig,
  UpstreamLocation,
} from './types';
