/**
 * Environment variable configuration and validation
 * Provides type-safe access to environment variables
 */

import { DEFAULT_PROXY_NAME, PROXY_SERVER_DEFAULTS } from '@/config/proxy-config';
import { createConfigurationError } from './errors';

// ============================================================
// Environment Variable Keys
// ============================================================

export const ENV_KEYS = [
  'SPA_PROXY_UPSTREAM',
  'SPA_PROXY_PORT',
  'SPA_PROXY_BIND',
  'SPA_PROXY_NAME',
  'SPA_PROXY_TIMEOUT_MS',
  'SPA_PROXY_LOG_LEVEL',
  'SPA_PROXY_LOG_FORMAT',
] as const;

export type EnvKey = (typeof ENV_KEYS)[number];

/**
 * Get environment variable by key
 *
 * Empty strings are treated as unset.
 *
 * @param key - Environment variable key
 * @returns Environment variable value (undefined if not set)
 */
export function getEnvByKey(key: EnvKey): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

// ============================================================
// Log Configuration
// ============================================================

/**
 * Log level type (defined here to avoid circular dependency with logger.ts)
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log configuration
 */
export interface LogConfig {
  level: LogLevel;
  format: 'json' | 'text';
}

/**
 * Validate log level
 */
function isValidLogLevel(level: string | undefined): level is LogLevel {
  return level !== undefined && ['debug', 'info', 'warn', 'error'].includes(level);
}

/**
 * Get log configuration
 *
 * @returns Log configuration with level and format
 *
 * @example
 * ```typescript
 * const config = getLogConfig();
 * console.log(config.level); // 'debug' in development, 'info' in production
 * ```
 */
export function getLogConfig(): LogConfig {
  const levelEnv = getEnvByKey('SPA_PROXY_LOG_LEVEL')?.toLowerCase();
  const formatEnv = getEnvByKey('SPA_PROXY_LOG_FORMAT')?.toLowerCase();

  // Default: debug in development, info in production
  const defaultLevel: LogLevel = process.env.NODE_ENV === 'production' ? 'info' : 'debug';

  return {
    level: isValidLogLevel(levelEnv) ? levelEnv : defaultLevel,
    format: formatEnv === 'json' ? 'json' : 'text',
  };
}

// ============================================================
// Proxy Environment Configuration
// ============================================================

export type BindAddress = '127.0.0.1' | '0.0.0.0' | 'localhost';

export interface ProxyEnv {
  /** Upstream base URL (undefined when not configured) */
  SPA_PROXY_UPSTREAM?: string;

  /** Listen port */
  SPA_PROXY_PORT: number;

  /** Bind address */
  SPA_PROXY_BIND: BindAddress;

  /** Token used in Via and Warning headers */
  SPA_PROXY_NAME: string;

  /** Upstream request timeout in milliseconds (undefined: no timeout) */
  SPA_PROXY_TIMEOUT_MS?: number;
}

export function isBindAddress(value: string): value is BindAddress {
  return value === '127.0.0.1' || value === '0.0.0.0' || value === 'localhost';
}

/**
 * Parse a port number, rejecting anything outside 1-65535
 *
 * @throws {AppError} INVALID_CONFIGURATION
 */
export function parsePort(raw: string, source: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw createConfigurationError(`Invalid ${source}: ${raw}. Must be between 1 and 65535.`, { received: raw });
  }
  return port;
}

/**
 * Parse a positive integer timeout in milliseconds
 *
 * @throws {AppError} INVALID_CONFIGURATION
 */
export function parseTimeout(raw: string, source: string): number {
  const timeout = Number(raw);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw createConfigurationError(`Invalid ${source}: ${raw}. Must be a positive integer.`, { received: raw });
  }
  return timeout;
}

/**
 * Get and validate environment variables
 *
 * @throws {AppError} If a variable is set to an invalid value
 * @returns Validated environment configuration
 *
 * @example
 * ```typescript
 * const env = getProxyEnv();
 * console.log(`Upstream: ${env.SPA_PROXY_UPSTREAM}`);
 * ```
 */
export function getProxyEnv(): ProxyEnv {
  const portEnv = getEnvByKey('SPA_PROXY_PORT');
  const bind = getEnvByKey('SPA_PROXY_BIND') ?? PROXY_SERVER_DEFAULTS.BIND;
  const timeoutEnv = getEnvByKey('SPA_PROXY_TIMEOUT_MS');

  if (!isBindAddress(bind)) {
    throw createConfigurationError(
      `Invalid SPA_PROXY_BIND: ${bind}. Must be '127.0.0.1', '0.0.0.0', or 'localhost'.`,
      { received: bind }
    );
  }

  return {
    SPA_PROXY_UPSTREAM: getEnvByKey('SPA_PROXY_UPSTREAM'),
    SPA_PROXY_PORT: portEnv !== undefined ? parsePort(portEnv, 'SPA_PROXY_PORT') : PROXY_SERVER_DEFAULTS.PORT,
    SPA_PROXY_BIND: bind,
    SPA_PROXY_NAME: getEnvByKey('SPA_PROXY_NAME') ?? DEFAULT_PROXY_NAME,
    SPA_PROXY_TIMEOUT_MS: timeoutEnv !== undefined ? parseTimeout(timeoutEnv, 'SPA_PROXY_TIMEOUT_MS') : undefined,
  };
}
