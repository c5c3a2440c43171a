/**
 * Application error types. Each maps to an HTTP status code so the error
 * handler can answer without knowing where the error came from.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation errors from client input (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: string[]) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * A uniqueness constraint rejected a write. Retrying the same write cannot succeed.
 */
export class ConstraintConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONSTRAINT_CONFLICT', 409, details);
  }
}

/**
 * Connection drops, failovers, timeouts: expected to clear up on their own.
 */
export class TransientStorageError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORAGE_UNAVAILABLE', 503, details);
  }
}

/**
 * A transient failure outlived every retry attempt. The caller may resubmit
 * later with the same idempotency key.
 */
export class RetryExhaustedError extends AppError {
  constructor(
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(
      `Storage still unavailable after ${attempts} attempts: ${lastError.message}`,
      'STORAGE_UNAVAILABLE',
      503,
      { attempts }
    );
  }
}

/**
 * Any other storage failure (500 Internal Server Error)
 */
export class StorageError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORAGE_ERROR', 500, details);
  }
}

/**
 * Configuration errors - fail fast on startup
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: string[]) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
