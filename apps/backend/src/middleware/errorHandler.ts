import type { NextFunction, Request, Response } from 'express';
import { mapError } from '../shared/errorMapping.js';
import { ERROR_CODES, ERROR_MESSAGES, type ApiErrorResponse } from '../shared/errors.js';
import { logger } from '../utils/logger.js';

function bodyParserStatus(err: unknown): number | null {
  if (!(err instanceof Error) || !('type' in err) || !('status' in err)) return null;
  return typeof err.status === 'number' && typeof err.type === 'string' ? err.status : null;
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  const requestId = req.requestId;

  // Don't send response if headers already sent
  if (res.headersSent) {
    logger.warn('http.error.headersSent', { requestId, method: req.method, path: req.path });
    return next(err);
  }

  // express.json() failures: malformed JSON (400) or oversized body (413)
  const parserStatus = bodyParserStatus(err);
  if (parserStatus !== null && parserStatus < 500) {
    const payload: ApiErrorResponse = {
      errorCode: ERROR_CODES.BAD_REQUEST,
      error: parserStatus === 413 ? 'Request body too large' : 'Malformed JSON body',
      requestId,
    };
    return res.status(parserStatus).json(payload);
  }

  const mapped = mapError(err);
  const meta = {
    requestId,
    method: req.method,
    path: req.path,
    status: mapped.status,
    errorCode: mapped.errorCode,
    errorName: err instanceof Error ? err.name : typeof err,
    errorMessage: err instanceof Error ? err.message : String(err),
  };
  if (mapped.status >= 500) {
    // Stack can contain sensitive paths; keep it only outside production.
    logger.error('http.error', {
      ...meta,
      ...(process.env.NODE_ENV === 'production' || !(err instanceof Error) ? {} : { stack: err.stack }),
    });
  } else {
    logger.warn('http.error', meta);
  }

  const payload: ApiErrorResponse = {
    errorCode: mapped.errorCode,
    error: mapped.message || ERROR_MESSAGES[mapped.errorCode],
    requestId,
    ...(mapped.details !== undefined ? { details: mapped.details } : {}),
  };
  return res.status(mapped.status).json(payload);
}

export function notFoundHandler(req: Request, res: Response) {
  const payload: ApiErrorResponse = {
    errorCode: ERROR_CODES.NOT_FOUND,
    error: `Route ${req.method} ${req.path} not found`,
    requestId: req.requestId,
  };
  res.status(404).json(payload);
}
