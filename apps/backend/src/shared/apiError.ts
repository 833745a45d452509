import { ERROR_CODES, ERROR_MESSAGES, type ErrorCode } from './errors.js';

/** An error that already knows its HTTP status and stable error code. */
export class ApiError extends Error {
  public readonly status: number;
  public readonly errorCode: ErrorCode;
  public readonly details?: unknown;

  constructor(params: { status: number; errorCode: ErrorCode; message?: string; details?: unknown }) {
    super(params.message || ERROR_MESSAGES[params.errorCode]);
    this.name = 'ApiError';
    this.status = params.status;
    this.errorCode = params.errorCode;
    this.details = params.details;
  }

  static notFound(errorCode: ErrorCode = ERROR_CODES.NOT_FOUND, details?: unknown): ApiError {
    return new ApiError({ status: 404, errorCode, details });
  }

  static unauthorized(): ApiError {
    return new ApiError({ status: 401, errorCode: ERROR_CODES.UNAUTHORIZED });
  }

  static forbidden(): ApiError {
    return new ApiError({ status: 403, errorCode: ERROR_CODES.FORBIDDEN });
  }

  static rateLimited(): ApiError {
    return new ApiError({ status: 429, errorCode: ERROR_CODES.RATE_LIMITED });
  }
}
