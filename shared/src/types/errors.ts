/**
 * Machine-readable error codes used across all API error responses.
 */
export type ErrorCode =
  | 'NOT_FOUND'
  | 'ROUTE_NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'INVALID_REQUEST'
  | 'PARENT_NOT_FOUND'
  | 'OWNERSHIP_MISMATCH'
  | 'INTERNAL_ERROR';
