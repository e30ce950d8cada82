/**
 * Error Classification System
 *
 * Typed error classes that classify failures by root cause. The classification
 * decides how a failure is handled by the token manager and the sync orchestrator:
 *
 * - NotConnectedError → user must (re)authorize, sync short-circuits
 * - AuthError → a revoked grant deletes the credential, anything else keeps it
 * - NetworkError, RateLimitError → transport failures, retried or reported
 * - PermissionError, LogicError, StorageError → reported per metric
 * - InternalError → bug in our code
 */

/** Error type enum for classification */
export type ErrorType =
  | 'auth'
  | 'not_connected'
  | 'permission'
  | 'network'
  | 'rate_limit'
  | 'storage'
  | 'logic'
  | 'internal';

/** Base class for classified errors */
export abstract class ClassifiedError extends Error {
  abstract readonly type: ErrorType;

  /** Original error that caused this classified error */
  declare readonly cause?: Error;

  /** Component that produced this error */
  readonly source?: string;

  constructor(message: string, options?: { cause?: Error; source?: string }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;
    this.source = options?.source;

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Convert to a plain object for serialization */
  toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      name: this.name,
      message: this.message,
      source: this.source,
    };
  }
}

/**
 * Authentication error - rejected token, failed grant, invalid OAuth state.
 *
 * `transient` separates failures worth retrying (network, 5xx, 429 at the token
 * endpoint) from terminal ones (revoked or invalid refresh token, bad code).
 *
 * HTTP triggers: 401 Unauthorized, OAuth error responses
 */
export class AuthError extends ClassifiedError {
  readonly type = 'auth' as const;

  /** OAuth error code if available (e.g., 'invalid_grant') */
  readonly errorCode?: string;

  readonly transient: boolean;

  /** The provider rejected the grant itself; the stored credential is unusable */
  readonly revoked: boolean;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      source?: string;
      errorCode?: string;
      transient?: boolean;
      revoked?: boolean;
    }
  ) {
    super(message, options);
    this.errorCode = options?.errorCode;
    this.transient = options?.transient ?? false;
    this.revoked = options?.revoked ?? false;
  }

  toJSON() {
    return {
      ...super.toJSON(),
      errorCode: this.errorCode,
      transient: this.transient,
      revoked: this.revoked,
    };
  }
}

/**
 * No usable credential for the account. The user has to authorize again;
 * nothing re-authorizes implicitly.
 */
export class NotConnectedError extends ClassifiedError {
  readonly type = 'not_connected' as const;

  readonly accountKey: string;

  constructor(accountKey: string, options?: { cause?: Error; source?: string; message?: string }) {
    super(options?.message ?? `Account "${accountKey}" is not connected`, options);
    this.accountKey = accountKey;
  }

  toJSON() {
    return {
      ...super.toJSON(),
      accountKey: this.accountKey,
    };
  }
}

/**
 * Permission error - insufficient scope, intraday access not granted, etc.
 *
 * HTTP triggers: 403 Forbidden
 * File triggers: EACCES
 */
export class PermissionError extends ClassifiedError {
  readonly type = 'permission' as const;

  constructor(message: string, options?: { cause?: Error; source?: string }) {
    super(message, options);
  }
}

/**
 * Network error - connection failed, timeout, service unavailable, etc.
 *
 * Auto-retry: Yes (bounded, exponential backoff)
 *
 * HTTP triggers: 5xx, 408, timeout, connection refused
 */
export class NetworkError extends ClassifiedError {
  readonly type: ErrorType = 'network';

  /** HTTP status code if applicable */
  readonly statusCode?: number;

  constructor(message: string, options?: { cause?: Error; source?: string; statusCode?: number }) {
    super(message, options);
    this.statusCode = options?.statusCode;
  }

  toJSON() {
    return {
      ...super.toJSON(),
      statusCode: this.statusCode,
    };
  }
}

/**
 * Rate limit hit at the provider. Not retried in-process; the hint tells the
 * caller how long to back off.
 *
 * HTTP triggers: 429 Too Many Requests
 */
export class RateLimitError extends NetworkError {
  readonly type: ErrorType = 'rate_limit';

  /** Back-off hint in milliseconds, when the provider sent one */
  readonly retryAfterMs?: number;

  constructor(message: string, options?: { cause?: Error; source?: string; retryAfterMs?: number }) {
    super(message, { cause: options?.cause, source: options?.source, statusCode: 429 });
    this.retryAfterMs = options?.retryAfterMs;
  }

  toJSON() {
    return {
      ...super.toJSON(),
      retryAfterMs: this.retryAfterMs,
    };
  }
}

/**
 * Storage error - a credential or artifact could not be written or read back.
 */
export class StorageError extends ClassifiedError {
  readonly type = 'storage' as const;

  constructor(message: string, options?: { cause?: Error; source?: string }) {
    super(message, options);
  }
}

/**
 * Logic error - bad request from our side, unexpected data, invalid input.
 *
 * HTTP triggers: 4xx (except 401, 403, 408, 429)
 */
export class LogicError extends ClassifiedError {
  readonly type = 'logic' as const;

  constructor(message: string, options?: { cause?: Error; source?: string }) {
    super(message, options);
  }
}

/**
 * Internal error - bugs in our code, unexpected internal state.
 */
export class InternalError extends ClassifiedError {
  readonly type = 'internal' as const;

  constructor(message: string, options?: { cause?: Error; source?: string }) {
    super(message, options);
  }
}

/**
 * Sync cancelled error - thrown when the caller aborts a sync.
 *
 * This is NOT a failure of the metric - it's a clean abort signal.
 */
export class SyncCancelledError extends Error {
  constructor(reason = 'Sync was cancelled') {
    super(reason);
    this.name = 'SyncCancelledError';

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Check if an error is a SyncCancelledError
 */
export function isSyncCancelledError(error: unknown): error is SyncCancelledError {
  return error instanceof SyncCancelledError;
}

/**
 * Check if an error is a ClassifiedError
 */
export function isClassifiedError(error: unknown): error is ClassifiedError {
  return error instanceof ClassifiedError;
}

/**
 * Check if an error is of a specific type
 */
export function isErrorType<T extends ErrorType>(
  error: unknown,
  type: T
): error is ClassifiedError & { type: T } {
  return isClassifiedError(error) && error.type === type;
}

/**
 * Parse a Retry-After header value (delta-seconds or HTTP date) into milliseconds.
 *
 * @param value Header value
 * @param now Reference time for HTTP-date values
 */
export function parseRetryAfter(value: string | null | undefined, now = Date.now()): number | undefined {
  if (!value) return undefined;

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (!isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}

/**
 * Classify an HTTP response error into typed error
 *
 * @param statusCode HTTP status code
 * @param message Error message
 * @param options Additional error options
 */
export function classifyHttpError(
  statusCode: number,
  message: string,
  options?: { cause?: Error; source?: string; retryAfterMs?: number }
): ClassifiedError {
  if (statusCode === 401) {
    return new AuthError(message, options);
  }

  if (statusCode === 403) {
    return new PermissionError(message, options);
  }

  if (statusCode === 429) {
    return new RateLimitError(message, options);
  }

  if (statusCode >= 500 || statusCode === 408) {
    return new NetworkError(message, { ...options, statusCode });
  }

  // Remaining 4xx client errors mean we made a bad request
  return new LogicError(message, options);
}

/**
 * Classify a file system error as StorageError, naming the errno
 *
 * @param err The original error
 * @param source The component that produced the error
 */
export function classifyFileError(
  err: Error & { code?: unknown },
  source?: string
): ClassifiedError {
  const code = err.code;
  const message =
    typeof code === 'string' && !err.message.startsWith(code)
      ? `${code}: ${err.message}`
      : err.message;

  return new StorageError(message, { cause: err, source });
}

/**
 * Classify anything thrown by a storage operation. Already-classified errors
 * pass through, everything else becomes a StorageError.
 *
 * @param err The thrown value
 * @param source The component that produced the error
 */
export function classifyStorageFailure(err: unknown, source?: string): ClassifiedError {
  if (isClassifiedError(err)) {
    return err;
  }

  if (err instanceof Error) {
    return classifyFileError(err, source);
  }

  return new StorageError(String(err), { source });
}

/**
 * Wrap an error in a ClassifiedError if it isn't already classified.
 * Anything unclassified is a bug in our code and becomes InternalError.
 *
 * @param err The error to wrap
 * @param source The component that produced the error
 */
export function ensureClassified(err: unknown, source?: string): ClassifiedError {
  if (isClassifiedError(err)) {
    return err;
  }

  if (err instanceof Error) {
    return new InternalError(err.message, { cause: err, source });
  }

  return new InternalError(
    `Unclassified non-Error thrown${source ? ` in ${source}` : ''}: ${String(err)}`,
    { source }
  );
}
