/**
 * Review error taxonomy.
 *
 * Core operations hand these back inside a Result instead of throwing,
 * so routes map them onto HTTP statuses in one place.
 */

export type ReviewErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'INVALID_STATE_TRANSITION'
  | 'CONCURRENCY_CONFLICT'
  | 'PERSISTENCE_ERROR'
  | 'REQUEST_ABORTED';

export abstract class ReviewError extends Error {
  abstract readonly code: ReviewErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, readonly details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): { code: ReviewErrorCode; message: string; retryable: boolean; details?: Record<string, unknown> } {
    return { code: this.code, message: this.message, retryable: this.retryable, details: this.details };
  }
}

export class ValidationError extends ReviewError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly retryable = false;
}

export class NotFoundError extends ReviewError {
  readonly code = 'NOT_FOUND' as const;
  readonly retryable = false;
}

export class InvalidStateTransitionError extends ReviewError {
  readonly code = 'INVALID_STATE_TRANSITION' as const;
  readonly retryable = false;
}

export class ConcurrencyConflictError extends ReviewError {
  readonly code = 'CONCURRENCY_CONFLICT' as const;
  readonly retryable = true;
}

export class PersistenceError extends ReviewError {
  readonly code = 'PERSISTENCE_ERROR' as const;
  readonly retryable = true;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.cause = cause;
  }
}

export class RequestAbortedError extends ReviewError {
  readonly code = 'REQUEST_ABORTED' as const;
  readonly retryable = true;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: ReviewError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: ReviewError): Result<T> {
  return { ok: false, error };
}

/**
 * Run an operation and fold ReviewErrors it throws into a Result.
 * Anything else is a bug and keeps propagating.
 */
export async function capture<T>(operation: () => Promise<Result<T>>): Promise<Result<T>> {
  try {
    return await operation();
  } catch (err) {
    if (err instanceof ReviewError) return fail(err);
    throw err;
  }
}

export const HTTP_STATUS: Record<ReviewErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  INVALID_STATE_TRANSITION: 409,
  CONCURRENCY_CONFLICT: 409,
  PERSISTENCE_ERROR: 503,
  REQUEST_ABORTED: 499,
};
