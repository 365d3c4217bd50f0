/**
 * Typed error classes for data layer failures
 * Enables proper error discrimination, structured logging, and user-friendly handling
 */

import { logger } from '@/lib/logger';

/**
 * Base error for all data layer failures
 */
export class DataError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;
  public readonly cause?: Error;

  constructor(
    message: string,
    options: {
      code: string;
      retryable?: boolean;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'DataError';
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Log the error with structured metadata
   */
  log(context?: Record<string, unknown>): void {
    logger.sync.error(this.message, {
      errorCode: this.code,
      errorName: this.name,
      retryable: this.retryable,
      cause: this.cause?.message,
      stack: this.stack,
      ...context,
    });
  }
}

/**
 * Database query execution failed
 */
export class QueryError extends DataError {
  constructor(operation: string, cause?: Error) {
    super(`Database query failed: ${operation}`, {
      code: 'QUERY_ERROR',
      retryable: true,
      cause,
    });
    this.name = 'QueryError';
  }
}

/**
 * Database connection or timeout error
 */
export class ConnectionError extends DataError {
  constructor(cause?: Error) {
    super('Database connection failed', {
      code: 'CONNECTION_ERROR',
      retryable: true,
      cause,
    });
    this.name = 'ConnectionError';
  }
}

/**
 * Row could not be mapped into its domain shape
 */
export class DataTransformError extends DataError {
  constructor(operation: string, cause?: Error) {
    super(`Data transformation failed: ${operation}`, {
      code: 'TRANSFORM_ERROR',
      retryable: false,
      cause,
    });
    this.name = 'DataTransformError';
  }
}

export type IntegrityViolation = 'unique' | 'foreign_key' | 'not_null' | 'check';

/**
 * A storage constraint rejected the write
 */
export class IntegrityError extends DataError {
  public readonly violation: IntegrityViolation;
  public readonly constraint?: string;

  constructor(
    operation: string,
    violation: IntegrityViolation,
    options: { constraint?: string; cause?: Error } = {}
  ) {
    super(`Integrity constraint violated (${violation}): ${operation}`, {
      code: 'INTEGRITY_ERROR',
      retryable: false,
      cause: options.cause,
    });
    this.name = 'IntegrityError';
    this.violation = violation;
    this.constraint = options.constraint;
  }
}

export function isDataError(error: unknown): error is DataError {
  return error instanceof DataError;
}

export function isIntegrityError(
  error: unknown,
  violation?: IntegrityViolation
): error is IntegrityError {
  return error instanceof IntegrityError && (violation === undefined || error.violation === violation);
}

// SQLSTATE codes (class 23: integrity constraint violation)
const INTEGRITY_CODES: Record<string, IntegrityViolation> = {
  '23505': 'unique',
  '23503': 'foreign_key',
  '23502': 'not_null',
  '23514': 'check',
};

// Socket-level errno codes surfaced by the driver
const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND']);

function readStringProperty(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const property: unknown = Reflect.get(value, key);
  return typeof property === 'string' ? property : undefined;
}

/**
 * Wrap unknown errors into typed DataError instances
 *
 * Classifies by SQLSTATE first (driver errors carry `code`), then falls back
 * to message heuristics for connection failures.
 */
export function wrapDatabaseError(error: unknown, operation: string): DataError {
  if (isDataError(error)) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const code = readStringProperty(error, 'code');

  if (code) {
    const violation = INTEGRITY_CODES[code];
    if (violation) {
      return new IntegrityError(operation, violation, {
        constraint: readStringProperty(error, 'constraint'),
        cause,
      });
    }

    // Class 08: connection exception; 57P01-57P03: server shutting down
    if (code.startsWith('08') || code.startsWith('57P') || NETWORK_CODES.has(code)) {
      return new ConnectionError(cause);
    }
  }

  const message = cause.message.toLowerCase();

  if (
    message.includes('connection') ||
    message.includes('timeout') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('etimedout') ||
    message.includes('pool') ||
    message.includes('socket')
  ) {
    return new ConnectionError(cause);
  }

  return new QueryError(operation, cause);
}
