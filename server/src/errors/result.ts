import {
  AppError,
  NotFoundError,
  OwnershipMismatchError,
  ParentNotFoundError,
  ValidationError,
} from './AppError.js';

/**
 * Expected failure kinds of the hierarchy core. Storage faults are not part of
 * this list; they are thrown and propagate unchanged.
 */
export type HierarchyErrorKind = 'ValidationError' | 'ParentNotFound' | 'OwnershipMismatch' | 'NotFound';

export interface HierarchyError {
  kind: HierarchyErrorKind;
  message: string;
  details?: Record<string, unknown>;
}

export type Result<T> = { success: true; data: T } | { success: false; error: HierarchyError };

export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

export function fail(
  kind: HierarchyErrorKind,
  message: string,
  details?: Record<string, unknown>,
): Result<never> {
  return { success: false, error: { kind, message, ...(details && { details }) } };
}

/**
 * Map a core failure onto the AppError the HTTP layer knows how to render.
 */
export function toAppError(error: HierarchyError): AppError {
  switch (error.kind) {
    case 'ValidationError':
      return new ValidationError(error.message, error.details);
    case 'ParentNotFound':
      return new ParentNotFoundError(error.message, error.details);
    case 'OwnershipMismatch':
      return new OwnershipMismatchError(error.message, error.details);
    case 'NotFound':
      return new NotFoundError(error.message, error.details);
  }
}

/**
 * Return the value of a successful result.
 * @throws AppError matching the failure kind
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.success) {
    throw toAppError(result.error);
  }
  return result.data;
}
