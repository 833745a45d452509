import rateLimit from 'express-rate-limit';
import type { RequestHandler } from 'express';
import { ApiError } from '../shared/apiError.js';
import { logger } from '../utils/logger.js';

export type RateLimitConfig = { windowMs: number; max: number };

// Global rate limiter for all routes (prevents abuse). max = 0 disables it.
export function createGlobalLimiter(cfg: RateLimitConfig): RequestHandler | null {
  if (cfg.max <= 0) return null;
  return rateLimit({
    windowMs: cfg.windowMs,
    limit: cfg.max,
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.path === '/health' || req.path === '/metrics',
    handler: (req, _res, next) => {
      logger.warn('security.rate_limit.blocked', { requestId: req.requestId, path: req.path, method: req.method });
      next(ApiError.rateLimited());
    },
  });
}
