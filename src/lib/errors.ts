/**
 * Structured Error Classes for the Teradata MCP server
 *
 * Tool handlers report failures as Result values; these classes are thrown
 * from the infrastructure layer (configuration, driver, vector store) and
 * converted at the tool boundary.
 */

export const ErrorCodes = {
  // Configuration
  CONFIGURATION_INVALID: 'CONFIGURATION_INVALID',
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',

  // Validation
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_IDENTIFIER: 'INVALID_IDENTIFIER',

  // Database
  DATABASE_CONNECTION_FAILED: 'DATABASE_CONNECTION_FAILED',
  DATABASE_DRIVER_UNAVAILABLE: 'DATABASE_DRIVER_UNAVAILABLE',
  DATABASE_QUERY_FAILED: 'DATABASE_QUERY_FAILED',

  // Enterprise Vector Store
  VECTOR_STORE_UNAVAILABLE: 'VECTOR_STORE_UNAVAILABLE',
  VECTOR_STORE_REQUEST_FAILED: 'VECTOR_STORE_REQUEST_FAILED',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all server errors
 */
export class ApplicationError extends Error {
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
    this.name = 'ApplicationError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date();
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      timestamp: this.timestamp,
      cause: this.cause ? { message: this.cause.message } : undefined,
    };
  }
}

export class ConfigurationError extends ApplicationError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCodes.CONFIGURATION_INVALID, details, cause);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.VALIDATION_FAILED,
    details?: Record<string, unknown>,
  ) {
    super(message, code, details);
    this.name = 'ValidationError';
  }
}

export class DatabaseError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.DATABASE_QUERY_FAILED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, details, cause);
    this.name = 'DatabaseError';
  }
}

/**
 * Vector store failures keep the HTTP status so callers can tell an expired
 * session (401) from other failures.
 */
export class VectorStoreError extends ApplicationError {
  public readonly status: number | undefined;

  constructor(message: string, status?: number, cause?: Error) {
    super(
      message,
      ErrorCodes.VECTOR_STORE_REQUEST_FAILED,
      status !== undefined ? { status } : {},
      cause,
    );
    this.name = 'VectorStoreError';
    this.status = status;
  }
}

export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
