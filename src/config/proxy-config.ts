/**
 * Proxy configuration constants
 *
 * Centralizes all proxy-related configuration values for easy adjustment
 * and consistency across the proxy module.
 */

/**
 * Token identifying this proxy in Via and Warning headers
 */
export const DEFAULT_PROXY_NAME = 'shelf_proxy';

/**
 * Resource served for extension-less single-segment paths
 */
export const INDEX_FALLBACK_PATH = '/index.html';

/**
 * Statuses whose Location header is rewritten to point back at the proxy,
 * for GET and HEAD requests
 */
export const REDIRECT_STATUS_CODES: readonly number[] = [301, 302, 303, 307, 308];

/**
 * Statuses whose Location header is rewritten for POST requests
 */
export const POST_REDIRECT_STATUS_CODES: readonly number[] = [303];

/**
 * Connection-level request headers the fetch transport manages itself.
 * Undici rejects a request that sets any of them explicitly.
 */
export const TRANSPORT_MANAGED_REQUEST_HEADERS: readonly string[] = [
  'connection',
  'keep-alive',
  'transfer-encoding',
  'te',
  'trailer',
  'upgrade',
  'expect',
];

/**
 * Methods that never carry a request body through fetch
 */
export const BODYLESS_METHODS: readonly string[] = ['GET', 'HEAD'];

/**
 * Server defaults
 */
export const PROXY_SERVER_DEFAULTS = {
  PORT: 8080,
  BIND: '127.0.0.1',
} as const;

/**
 * HTTP status codes used by the server layer
 */
export const PROXY_STATUS_CODES = {
  /** Bad Gateway - upstream connection failed */
  BAD_GATEWAY: 502,
  /** Gateway Timeout - upstream request timed out */
  GATEWAY_TIMEOUT: 504,
} as const;

/**
 * Error messages for proxy responses
 */
export const PROXY_ERROR_MESSAGES = {
  GATEWAY_TIMEOUT: 'The upstream server did not respond in time',
  BAD_GATEWAY: 'Unable to connect to upstream server',
} as const;
