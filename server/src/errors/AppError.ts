import type { ErrorCode } from '@estimator/shared';

/**
 * Base application error with a typed error code and HTTP status.
 * All known application errors should extend this class.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    statusCode: number,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', 404, message, details);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', 400, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * The parent referenced by a create or list call does not exist at the expected level.
 */
export class ParentNotFoundError extends AppError {
  constructor(message = 'Parent not found', details?: Record<string, unknown>) {
    super('PARENT_NOT_FOUND', 404, message, details);
    this.name = 'ParentNotFoundError';
  }
}

/**
 * The node exists but belongs to a different parent than the one in the request path.
 */
export class OwnershipMismatchError extends AppError {
  constructor(
    message = 'Node does not belong to the given parent',
    details?: Record<string, unknown>,
  ) {
    super('OWNERSHIP_MISMATCH', 404, message, details);
    this.name = 'OwnershipMismatchError';
  }
}
