import crypto from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ApiError } from '../shared/apiError.js';
import { logger } from '../utils/logger.js';

export function safeEqual(a: string, b: string): boolean {
  const ab = Buffer.from(a);
  const bb = Buffer.from(b);
  if (ab.length !== bb.length) return false;
  return crypto.timingSafeEqual(ab, bb);
}

function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header) return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match?.[1] ? match[1].trim() : null;
}

/** Admin routes are hidden (404) unless a token is configured. */
export function requireAdminToken(adminToken: string | null): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!adminToken) {
      next(ApiError.notFound());
      return;
    }
    const token = bearerToken(req);
    if (!token) {
      next(ApiError.unauthorized());
      return;
    }
    if (!safeEqual(token, adminToken)) {
      logger.warn('security.admin_token.rejected', { requestId: req.requestId, path: req.path });
      next(ApiError.forbidden());
      return;
    }
    next();
  };
}
