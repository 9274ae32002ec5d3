/**
 * Error types and codes.
 * Every error raised at an I/O boundary extends PathOrderError.
 */

/**
 * Base error class for all pathorder errors.
 */
export class PathOrderError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PathOrderError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends PathOrderError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends PathOrderError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // System errors
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
  UNSUPPORTED_FILE: 'S003',

  // Configuration errors
  INVALID_CONFIG: 'C001',
  CONFIG_LOAD_ERROR: 'C002',
  CONFIG_EXISTS: 'C003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Type guard for pathorder errors.
 */
export function isPathOrderError(error: unknown): error is PathOrderError {
  return error instanceof PathOrderError;
}

/**
 * Message of any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
