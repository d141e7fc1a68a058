/**
 * Structured logging utility for the proxy
 *
 * Features:
 * - Sensitive data filtering (sanitize)
 * - Log level threshold and text/JSON output
 * - Request ID generation
 *
 * @example
 * ```typescript
 * const logger = createLogger('proxy-server');
 * logger.debug('listen:start', { port: 8080 });
 *
 * const log = logger.withContext({ upstream: 'http://localhost:5173', requestId: generateRequestId() });
 * log.info('request:complete', { status: 200 });
 * ```
 */

import { randomUUID } from 'crypto';
import { getLogConfig } from './env';
import type { LogLevel } from './env';

export type { LogLevel } from './env';

// ============================================================
// Type Definitions
// ============================================================

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  module: string;
  action: string;
  data?: Record<string, unknown>;
  timestamp: string;
  upstream?: string;
  requestId?: string;
}

/**
 * Logger context
 */
export interface LoggerContext {
  upstream?: string;
  requestId?: string;
}

/**
 * Logger instance type
 */
export interface Logger {
  debug: (action: string, data?: Record<string, unknown>) => void;
  info: (action: string, data?: Record<string, unknown>) => void;
  warn: (action: string, data?: Record<string, unknown>) => void;
  error: (action: string, data?: Record<string, unknown>) => void;
  /** Generate context-attached logger */
  withContext: (context: LoggerContext) => Logger;
}

// ============================================================
// Sensitive Data Filtering
// ============================================================

/**
 * Sensitive data patterns
 */
const SENSITIVE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  // Bearer token
  { pattern: /Bearer\s+[A-Za-z0-9\-._~+/]+=*/gi, replacement: 'Bearer [REDACTED]' },
  // Password related
  { pattern: /(password|passwd|pwd)[=:]\s*\S+/gi, replacement: '$1=[REDACTED]' },
  // Token/secret related
  { pattern: /(token|secret|api_key|apikey|auth)[=:]\s*\S+/gi, replacement: '$1=[REDACTED]' },
  // Authorization header
  { pattern: /Authorization:\s*\S+/gi, replacement: 'Authorization: [REDACTED]' },
  // Cookie headers
  { pattern: /(Set-Cookie|Cookie):\s*[^\r\n]+/gi, replacement: '$1: [REDACTED]' },
];

/**
 * Sensitive key name patterns
 */
const SENSITIVE_KEY_PATTERN = /password|secret|token|key|auth|cookie/i;

/**
 * Sanitize value (mask sensitive data)
 */
function sanitize(value: unknown): unknown {
  if (typeof value === 'string') {
    let sanitized = value;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized;
  }

  if (typeof value === 'object' && value !== null) {
    if (Array.isArray(value)) {
      return value.map(sanitize);
    }
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      // Mask if key name is sensitive
      if (SENSITIVE_KEY_PATTERN.test(k)) {
        result[k] = '[REDACTED]';
      } else {
        result[k] = sanitize(v);
      }
    }
    return result;
  }

  return value;
}

function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(data)) {
    result[k] = SENSITIVE_KEY_PATTERN.test(k) ? '[REDACTED]' : sanitize(v);
  }
  return result;
}

// ============================================================
// Log Level Control
// ============================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ============================================================
// Log Output
// ============================================================

/**
 * Format log entry
 */
function formatLogEntry(entry: LogEntry, format: 'json' | 'text'): string {
  if (format === 'json') {
    return JSON.stringify(entry);
  }

  // Text format
  const { timestamp, level, module, action, data, upstream, requestId } = entry;
  const upstreamStr = upstream ? ` [${upstream}]` : '';
  const requestIdStr = requestId ? ` (${requestId.slice(0, 8)})` : '';
  const dataStr = data ? ` ${JSON.stringify(data)}` : '';

  return `[${timestamp}] [${level.toUpperCase()}] [${module}]${upstreamStr}${requestIdStr} ${action}${dataStr}`;
}

/**
 * Execute log output
 */
function log(
  level: LogLevel,
  module: string,
  action: string,
  data?: Record<string, unknown>,
  context?: LoggerContext
): void {
  const config = getLogConfig();
  if (LOG_LEVELS[level] < LOG_LEVELS[config.level]) {
    return;
  }

  const sanitizedData = data ? sanitizeData(data) : undefined;

  const entry: LogEntry = {
    level,
    module,
    action,
    timestamp: new Date().toISOString(),
    ...context,
    ...(sanitizedData && { data: sanitizedData }),
  };

  const formatted = formatLogEntry(entry, config.format);

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

// ============================================================
// Request ID Generation
// ============================================================

/**
 * Generate request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

// ============================================================
// Logger Factory
// ============================================================

/**
 * Create module-specific logger
 *
 * @param module - Module name (e.g., 'proxy', 'proxy-server')
 * @returns Logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger('proxy-server');
 *
 * logger.info('listen:ready');
 *
 * const log = logger.withContext({ requestId: generateRequestId() });
 * log.info('request:complete');
 * ```
 */
export function createLogger(module: string): Logger {
  const createLoggerWithContext = (context?: LoggerContext): Logger => ({
    debug: (action, data) => log('debug', module, action, data, context),
    info: (action, data) => log('info', module, action, data, context),
    warn: (action, data) => log('warn', module, action, data, context),
    error: (action, data) => log('error', module, action, data, context),
    withContext: (newContext) => createLoggerWithContext({ ...context, ...newContext }),
  });

  return createLoggerWithContext();
}
