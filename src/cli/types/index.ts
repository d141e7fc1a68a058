/**
 * CLI Common Type Definitions
 */

/**
 * Exit codes for CLI commands
 */
export enum ExitCode {
  SUCCESS = 0,
  CONFIG_ERROR = 2,
  START_FAILED = 3,
  UNEXPECTED_ERROR = 99,
}

/**
 * Options for serve command
 */
export interface ServeOptions {
  /** Upstream base URL (overrides SPA_PROXY_UPSTREAM) */
  upstream?: string;
  /** Listen port (overrides SPA_PROXY_PORT) */
  port?: string;
  /** Bind address (overrides SPA_PROXY_BIND) */
  bind?: string;
  /** Via/Warning token (overrides SPA_PROXY_NAME) */
  proxyName?: string;
  /** Upstream timeout in milliseconds (overrides SPA_PROXY_TIMEOUT_MS) */
  timeout?: string;
  /** Enable debug output */
  verbose?: boolean;
}

/**
 * Options for resolve command
 */
export interface ResolveOptions {
  /** Upstream base URL (overrides SPA_PROXY_UPSTREAM) */
  upstream?: string;
}

/**
 * Settings the serve command starts the server with
 */
export interface ServeSettings {
  upstream: string;
  port: number;
  bind: string;
  proxyName: string;
  timeoutMs?: number;
}
