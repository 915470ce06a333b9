/**
 * Structured Error Classes for the Organization Dependency Scanner
 *
 * Provides a hierarchy of error classes with metadata so the CLI can tell
 * configuration mistakes, GitHub failures and report write failures apart.
 */

/**
 * Error codes for standardized error handling
 */
export const ErrorCodes = {
  // Configuration errors
  CONFIGURATION_INVALID: 'CONFIGURATION_INVALID',
  UNSUPPORTED_LANGUAGE: 'UNSUPPORTED_LANGUAGE',
  ENV_FILE_NOT_FOUND: 'ENV_FILE_NOT_FOUND',

  // GitHub errors
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  NETWORK_ERROR: 'NETWORK_ERROR',

  // File system errors
  REPORT_WRITE_FAILED: 'REPORT_WRITE_FAILED',

  // Generic errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all scanner errors
 */
export class ScanError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'ScanError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date();

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      timestamp: this.timestamp,
      stack: this.stack,
      cause: this.cause
        ? {
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }

  /**
   * Get a user-friendly error message
   */
  getUserMessage(): string {
    return `${this.message} (${this.code})`;
  }
}

/**
 * Invalid or missing configuration
 */
export class ConfigurationError extends ScanError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.CONFIGURATION_INVALID,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, details, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * GitHub rejected the access token
 */
export class AuthenticationError extends ScanError {
  public readonly url: string;

  constructor(message: string, url: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.AUTHENTICATION_FAILED, { ...details, url });
    this.name = 'AuthenticationError';
    this.url = url;
  }
}

/**
 * A request never produced an HTTP response
 */
export class TransportError extends ScanError {
  public readonly url: string;

  constructor(message: string, url: string, cause?: Error) {
    super(message, ErrorCodes.NETWORK_ERROR, { url }, cause);
    this.name = 'TransportError';
    this.url = url;
  }
}

/**
 * File system errors
 */
export class FileSystemError extends ScanError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.REPORT_WRITE_FAILED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, details, cause);
    this.name = 'FileSystemError';
  }
}

/**
 * Type guard to check if an error is a ScanError
 */
export function isScanError(error: unknown): error is ScanError {
  return error instanceof ScanError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
