/**
 * Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export { ApplicationError, ErrorCode, type ErrorContext } from './ApplicationError.js';

// Validation / resource / auth errors
export { ValidationError, ResourceNotFoundError, AuthenticationError } from './ApplicationError.js';

// Operational errors
export {
  OperationalError,
  DatabaseError,
  DuplicateKeyError,
  ForeignKeyViolationError,
  TransactionFailureError,
  CacheCorruptionError,
  NetworkError,
  SourceError,
  RateLimitError,
  RateLimitTimeoutError,
  SourceServerError,
  InvalidResponseError,
  AdapterUnavailableError,
  AmbiguousIdentityError,
} from './ApplicationError.js';

// Permanent errors
export { PermanentError, ConfigurationError, InvalidStateError } from './ApplicationError.js';

// Retry strategies
export {
  RetryStrategy,
  SOURCE_RETRY_POLICY,
  createRetryStrategy,
} from './RetryStrategy.js';

export type { RetryPolicy, RetryResult } from './RetryStrategy.js';
