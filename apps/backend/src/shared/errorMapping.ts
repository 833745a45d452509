import { ZodError } from 'zod';
import { ApiError } from './apiError.js';
import { AllocationError } from './allocationErrors.js';
import { ERROR_CODES, ERROR_MESSAGES, type ErrorCode } from './errors.js';

export type MappedError = {
  status: number;
  errorCode: ErrorCode;
  message: string;
  details?: unknown;
};

function mapAllocationError(error: AllocationError): MappedError {
  switch (error.code) {
    case 'KEYSPACE_EXHAUSTED':
      return { status: 507, errorCode: ERROR_CODES.KEYSPACE_EXHAUSTED, message: error.message };
    case 'TRANSIENT_STORAGE':
      return { status: 503, errorCode: ERROR_CODES.STORAGE_UNAVAILABLE, message: ERROR_MESSAGES.STORAGE_UNAVAILABLE };
    case 'ALLOCATION_CANCELLED':
      return { status: 499, errorCode: ERROR_CODES.ALLOCATION_CANCELLED, message: error.message };
    case 'INVALID_STATUS_TRANSITION':
      return { status: 409, errorCode: ERROR_CODES.CONFLICT, message: error.message, details: error.details };
    case 'STORE_CONFLICT':
      return { status: 409, errorCode: ERROR_CODES.CONFLICT, message: error.message, details: error.details };
    case 'INTEGRITY_VIOLATION':
    case 'SCHEMA_VERSION':
      return { status: 500, errorCode: ERROR_CODES.INTEGRITY_VIOLATION, message: ERROR_MESSAGES.INTEGRITY_VIOLATION };
  }
}

/** Known error → HTTP status and stable code. Unknown errors become a bare 500. */
export function mapError(error: unknown): MappedError {
  if (error instanceof ApiError) {
    return { status: error.status, errorCode: error.errorCode, message: error.message, details: error.details };
  }
  if (error instanceof ZodError) {
    return {
      status: 400,
      errorCode: ERROR_CODES.VALIDATION_ERROR,
      message: ERROR_MESSAGES.VALIDATION_ERROR,
      details: error.flatten(),
    };
  }
  if (error instanceof AllocationError) return mapAllocationError(error);
  return { status: 500, errorCode: ERROR_CODES.INTERNAL_ERROR, message: ERROR_MESSAGES.INTERNAL_ERROR };
}
