/**
 * Error hierarchy for showcull
 *
 * Every error raised by the engine carries:
 * - A machine-readable error code
 * - Context metadata for structured logging
 * - A retry hint consumed by RetryStrategy
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',

  // Resource Errors
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',

  // Authentication
  AUTH_AUTHENTICATION_FAILED = 'AUTH_AUTHENTICATION_FAILED',

  // Database Errors
  DATABASE_CONNECTION_FAILED = 'DATABASE_CONNECTION_FAILED',
  DATABASE_QUERY_FAILED = 'DATABASE_QUERY_FAILED',
  DATABASE_DUPLICATE_KEY = 'DATABASE_DUPLICATE_KEY',
  DATABASE_FOREIGN_KEY_VIOLATION = 'DATABASE_FOREIGN_KEY_VIOLATION',
  DATABASE_TRANSACTION_FAILED = 'DATABASE_TRANSACTION_FAILED',
  DATABASE_CORRUPTED = 'DATABASE_CORRUPTED',

  // Network Errors (retryable)
  NETWORK_CONNECTION_FAILED = 'NETWORK_CONNECTION_FAILED',
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',

  // Source Errors
  SOURCE_RATE_LIMIT = 'SOURCE_RATE_LIMIT',
  SOURCE_RATE_LIMIT_TIMEOUT = 'SOURCE_RATE_LIMIT_TIMEOUT',
  SOURCE_SERVER_ERROR = 'SOURCE_SERVER_ERROR',
  SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
  SOURCE_INVALID_RESPONSE = 'SOURCE_INVALID_RESPONSE',

  // Identity Errors
  IDENTITY_AMBIGUOUS = 'IDENTITY_AMBIGUOUS',

  // Configuration Errors
  CONFIG_INVALID = 'CONFIG_INVALID',

  // System Errors
  SYSTEM_INVALID_STATE = 'SYSTEM_INVALID_STATE',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'listShows', 'transaction') */
  operation?: string;

  /** Entity type being operated on (e.g., 'watch', 'show') */
  entityType?: string;

  /** Canonical or source id if applicable */
  entityId?: string | number;

  /** Attempt number if retrying */
  attemptNumber?: number;

  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 */
export abstract class ApplicationError extends Error {
  public readonly code: ErrorCode;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  public readonly retryable: boolean;

  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public readonly cause?: Error;

  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      isOperational?: boolean;
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }
}

// ============================================
// VALIDATION / RESOURCE ERRORS
// ============================================

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, {
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ResourceNotFoundError extends ApplicationError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string | number,
    message?: string,
    context?: ErrorContext
  ) {
    super(message || `${resourceType} not found: ${resourceId}`, ErrorCode.RESOURCE_NOT_FOUND, {
      retryable: false,
      context: { ...context, entityType: resourceType, entityId: resourceId },
    });
  }
}

export class AuthenticationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.AUTH_AUTHENTICATION_FAILED, {
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// ============================================
// OPERATIONAL ERRORS
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      isOperational: true,
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// Database Errors
export class DatabaseError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DATABASE_QUERY_FAILED,
    retryable = true,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, retryable, context, cause);
  }
}

export class DuplicateKeyError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly key: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Duplicate key in table '${table}': ${key}`,
      ErrorCode.DATABASE_DUPLICATE_KEY,
      false,
      { ...context, metadata: { ...context?.metadata, table, key } }
    );
  }
}

export class ForeignKeyViolationError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly constraint: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Foreign key violation in table '${table}': ${constraint}`,
      ErrorCode.DATABASE_FOREIGN_KEY_VIOLATION,
      false,
      { ...context, metadata: { ...context?.metadata, table, constraint } }
    );
  }
}

/**
 * A store write that did not commit after its retry. Fatal for the run:
 * action history must never be left inconsistent.
 */
export class TransactionFailureError extends DatabaseError {
  constructor(
    public readonly attempts: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Transaction failed after ${attempts} attempt(s)`,
      ErrorCode.DATABASE_TRANSACTION_FAILED,
      false,
      { ...context, metadata: { ...context?.metadata, attempts } },
      cause
    );
  }
}

export class CacheCorruptionError extends DatabaseError {
  constructor(
    public readonly problems: string[],
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Cache store integrity check failed: ${problems.length} problem(s)`,
      ErrorCode.DATABASE_CORRUPTED,
      false,
      { ...context, metadata: { ...context?.metadata, problems } }
    );
  }
}

// Network Errors
export class NetworkError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    public readonly url?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      true,
      { ...context, metadata: { ...context?.metadata, url } },
      cause
    );
  }
}

// Source Errors
export class SourceError extends OperationalError {
  constructor(
    message: string,
    public readonly sourceName: string,
    code: ErrorCode,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, retryable, { ...context, service: sourceName }, cause);
  }
}

export class RateLimitError extends SourceError {
  constructor(
    sourceName: string,
    public readonly retryAfter?: number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Rate limit exceeded for source: ${sourceName}`,
      sourceName,
      ErrorCode.SOURCE_RATE_LIMIT,
      true,
      { ...context, metadata: { ...context?.metadata, retryAfter } }
    );
  }
}

/**
 * A permit was not granted within the configured wait. Retried like any
 * other outage and, once retries run out, reported as AdapterUnavailableError.
 */
export class RateLimitTimeoutError extends SourceError {
  constructor(
    sourceName: string,
    public readonly waitedMs: number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `No ${sourceName} permit granted within ${waitedMs}ms`,
      sourceName,
      ErrorCode.SOURCE_RATE_LIMIT_TIMEOUT,
      true,
      { ...context, metadata: { ...context?.metadata, waitedMs } }
    );
  }
}

export class SourceServerError extends SourceError {
  constructor(
    sourceName: string,
    public readonly httpStatusCode: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Source server error (${httpStatusCode}): ${sourceName}`,
      sourceName,
      ErrorCode.SOURCE_SERVER_ERROR,
      httpStatusCode >= 500,
      { ...context, metadata: { ...context?.metadata, httpStatusCode } },
      cause
    );
  }
}

export class InvalidResponseError extends SourceError {
  constructor(sourceName: string, message?: string, context?: ErrorContext, cause?: Error) {
    super(
      message || `Unexpected response from ${sourceName}`,
      sourceName,
      ErrorCode.SOURCE_INVALID_RESPONSE,
      false,
      context,
      cause
    );
  }
}

/**
 * A source could not be reached after every retry. The affected show is
 * skipped and kept.
 */
export class AdapterUnavailableError extends SourceError {
  constructor(
    sourceName: string,
    public readonly attempts: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Source unavailable after ${attempts} attempt(s): ${sourceName}`,
      sourceName,
      ErrorCode.SOURCE_UNAVAILABLE,
      false,
      { ...context, attemptNumber: attempts },
      cause
    );
  }
}

// Identity Errors
export class AmbiguousIdentityError extends OperationalError {
  constructor(
    public readonly sourceName: string,
    public readonly sourceId: string,
    public readonly candidates: string[],
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message ||
        `Ambiguous identity for ${sourceName}:${sourceId} (${candidates.length} candidates)`,
      ErrorCode.IDENTITY_AMBIGUOUS,
      false,
      { ...context, entityId: `${sourceName}:${sourceId}`, metadata: { ...context?.metadata, candidates } }
    );
  }
}

// ============================================
// PERMANENT ERRORS (Not Retryable)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, cause?: Error) {
    super(message, code, {
      isOperational: false,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}

export class InvalidStateError extends PermanentError {
  constructor(
    public readonly expectedState: string,
    public readonly actualState: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Invalid state: expected '${expectedState}', got '${actualState}'`,
      ErrorCode.SYSTEM_INVALID_STATE,
      { ...context, metadata: { ...context?.metadata, expectedState, actualState } }
    );
  }
}
