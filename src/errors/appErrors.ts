/**
 * Application Errors
 *
 * Every failure that crosses a service boundary is one of these.
 * The onError handler in middleware/errorHandler.ts maps `status` and
 * `code` onto the JSON error envelope.
 */

export type ErrorCode =
  | 'CONFLICT'
  | 'UNAUTHENTICATED'
  | 'NOT_FOUND'
  | 'INVALID_REFERENCE'
  | 'INVALID_ARGUMENT'
  | 'SERVICE_UNAVAILABLE'
  | 'INTERNAL_ERROR';

export type ErrorStatus = 400 | 401 | 404 | 409 | 500 | 503;

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: ErrorStatus;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Extra fields safe to show the caller */
  details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

export class ConflictError extends AppError {
  readonly code = 'CONFLICT' as const;
  readonly status = 409 as const;
}

export class UnauthorizedError extends AppError {
  readonly code = 'UNAUTHENTICATED' as const;
  readonly status = 401 as const;

  constructor(message = 'Authentication required', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class NotFoundError extends AppError {
  readonly code: ErrorCode = 'NOT_FOUND';
  readonly status = 404 as const;
}

/**
 * A write referenced a row that does not exist (foreign-key violation).
 * Callers that only care about "the user is gone" can catch NotFoundError.
 */
export class InvalidReferenceError extends NotFoundError {
  readonly code = 'INVALID_REFERENCE' as const;
}

export class InvalidArgumentError extends AppError {
  readonly code = 'INVALID_ARGUMENT' as const;
  readonly status = 400 as const;
}

/** Which external call failed while answering a question */
export type ProviderStep = 'embedding' | 'search' | 'generation';

export class ServiceUnavailableError extends AppError {
  readonly code = 'SERVICE_UNAVAILABLE' as const;
  readonly status = 503 as const;

  constructor(
    readonly step: ProviderStep,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  override details() {
    return { step: this.step };
  }
}

export class InternalError extends AppError {
  readonly code = 'INTERNAL_ERROR' as const;
  readonly status = 500 as const;
}
