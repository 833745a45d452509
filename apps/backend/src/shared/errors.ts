export const ERROR_CODES = {
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  ALLOCATION_NOT_FOUND: 'ALLOCATION_NOT_FOUND',
  IDENTIFIER_NOT_FOUND: 'IDENTIFIER_NOT_FOUND',
  CONFLICT: 'CONFLICT',
  KEYSPACE_EXHAUSTED: 'KEYSPACE_EXHAUSTED',
  STORAGE_UNAVAILABLE: 'STORAGE_UNAVAILABLE',
  INTEGRITY_VIOLATION: 'INTEGRITY_VIOLATION',
  ALLOCATION_CANCELLED: 'ALLOCATION_CANCELLED',
  RATE_LIMITED: 'RATE_LIMITED',
  TIMEOUT: 'TIMEOUT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  BAD_REQUEST: 'Bad request',
  VALIDATION_ERROR: 'Validation failed',
  UNAUTHORIZED: 'Unauthorized',
  FORBIDDEN: 'Forbidden',
  NOT_FOUND: 'Not found',
  ALLOCATION_NOT_FOUND: 'No allocation for this fingerprint',
  IDENTIFIER_NOT_FOUND: 'Unknown identifier',
  CONFLICT: 'Conflict',
  KEYSPACE_EXHAUSTED: 'Identifier keyspace exhausted',
  STORAGE_UNAVAILABLE: 'Storage temporarily unavailable',
  INTEGRITY_VIOLATION: 'Storage integrity violation',
  ALLOCATION_CANCELLED: 'Allocation cancelled',
  RATE_LIMITED: 'Too many requests',
  TIMEOUT: 'Request timed out',
  INTERNAL_ERROR: 'Internal server error',
};

export type ApiErrorResponse = {
  errorCode: ErrorCode;
  error: string;
  requestId?: string;
  details?: unknown;
};
