export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'INVALID_STATE'
  | 'INTERNAL_ERROR';

/** Field-level detail attached to validation failures. */
export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Operational error surfaced to the caller.
 * `status` is 'fail' for 4xx and 'error' for 5xx, matching the response envelope.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly status: 'fail' | 'error';
  public readonly code: ErrorCode;
  public readonly isOperational = true;
  public readonly details?: FieldIssue[];

  constructor(message: string, statusCode = 500, code: ErrorCode = 'INTERNAL_ERROR', details?: FieldIssue[]) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.status = statusCode >= 500 ? 'error' : 'fail';
    this.code = code;
    if (details && details.length > 0) this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, new.target);
  }

  static badRequest(message: string, details?: FieldIssue[]) {
    return new ValidationError(message, details);
  }

  static unauthorized(message = 'You are not logged in') {
    return new UnauthorizedError(message);
  }

  static forbidden(message = 'You do not have permission to perform this action') {
    return new ForbiddenError(message);
  }

  static notFound(message = 'Resource not found') {
    return new NotFoundError(message);
  }

  static conflict(message: string) {
    return new ConflictError(message);
  }

  static invalidState(message: string) {
    return new InvalidStateError(message);
  }

  static internal(message = 'Something went wrong') {
    return new AppError(message, 500, 'INTERNAL_ERROR');
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: FieldIssue[]) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }

  static forField(field: string, message: string) {
    return new ValidationError(message, [{ field, message }]);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string) {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(message, 403, 'FORBIDDEN');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
  }
}

// Illegal lifecycle transition, e.g. completing an enrollment twice
export class InvalidStateError extends AppError {
  constructor(message: string) {
    super(message, 409, 'INVALID_STATE');
  }
}
