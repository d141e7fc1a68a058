/**
 * Error Definitions
 *
 * Centralized error handling for the proxy.
 * Separates client-facing and internal error messages.
 *
 * @module errors
 */

/**
 * Standard error codes used throughout the proxy
 * These codes are safe to expose to clients.
 */
export const ErrorCode = {
  // Configuration errors
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',

  // Upstream errors
  UPSTREAM_UNREACHABLE: 'UPSTREAM_UNREACHABLE',
  UPSTREAM_TIMEOUT: 'UPSTREAM_TIMEOUT',

  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Application-specific error class
 *
 * @example
 * ```typescript
 * throw new AppError('INVALID_CONFIGURATION', 'Upstream must be a URL or a URL string', { received: 42 });
 * ```
 */
export class AppError extends Error {
  /**
   * Error code - safe to expose to clients
   */
  readonly code: ErrorCodeType;

  /**
   * Additional details - may contain sensitive info, log only
   */
  readonly details?: Record<string, unknown>;

  /**
   * Timestamp when error occurred
   */
  readonly timestamp: string;

  constructor(
    code: ErrorCodeType,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /**
   * Create a client-safe representation (excludes sensitive details)
   */
  toClientError(): { code: ErrorCodeType; message: string } {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Factory for the error raised when the proxy is configured with values it cannot use
 *
 * @param message - Human-readable error message
 * @param details - Optional additional details (logged, not sent to client)
 */
export function createConfigurationError(
  message: string,
  details?: Record<string, unknown>
): AppError {
  return new AppError(ErrorCode.INVALID_CONFIGURATION, message, details);
}

/**
 * Type guard to check if an error is an AppError
 *
 * @param error - Error to check
 * @returns true if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Wrap unknown error into AppError
 *
 * @param error - Unknown error
 * @param defaultCode - Default error code if error is not AppError
 * @returns AppError instance
 */
export function wrapError(error: unknown, defaultCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(defaultCode, error.message, { originalError: error.name });
  }

  return new AppError(defaultCode, String(error));
}

/**
 * Get error message from unknown error
 *
 * @param error - Unknown error
 * @returns Error message string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
