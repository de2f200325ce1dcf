/**
 * Base of every error the services raise on purpose. Each subclass fixes
 * the HTTP status and the `error` label of the response body; the error
 * handler needs nothing else to answer it.
 */
export abstract class DomainError extends Error {
  abstract readonly statusCode: number;
  abstract readonly title: string;

  /** Extra response payload, if any. */
  details(): unknown {
    return undefined;
  }
}

export class NotFoundError extends DomainError {
  readonly statusCode = 404;
  readonly title = 'Not Found';

  constructor(resource: string, id?: string | number) {
    super(id !== undefined ? `${resource} with id '${id}' not found` : `${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends DomainError {
  readonly statusCode = 400;
  readonly title = 'Validation Error';

  constructor(
    message: string,
    public readonly fields?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  override details(): unknown {
    return this.fields;
  }
}

/** The target exists but its lifecycle state forbids the action (edit a HISTORICAL version, delete a used unit). */
export class InvalidStateError extends DomainError {
  readonly statusCode = 422;
  readonly title = 'Invalid State';

  constructor(
    message: string,
    public readonly currentStatus?: string,
    public readonly attemptedAction?: string,
  ) {
    super(message);
    this.name = 'InvalidStateError';
  }

  override details(): unknown {
    return { currentStatus: this.currentStatus, attemptedAction: this.attemptedAction };
  }
}

export class ConflictError extends DomainError {
  readonly statusCode = 409;
  readonly title = 'Conflict';

  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

export class ForbiddenError extends DomainError {
  readonly statusCode = 403;
  readonly title = 'Forbidden';

  constructor(message = 'Forbidden') {
    super(message);
    this.name = 'ForbiddenError';
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}
