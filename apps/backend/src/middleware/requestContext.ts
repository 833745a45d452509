import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';
import { logger } from '../utils/logger.js';
import { recordHttpRequest } from '../utils/metrics.js';
import { runWithRequestContext, type RequestContextStore } from '../utils/asyncContext.js';

const SLOW_REQUEST_MS = 1000;
const MAX_REQUEST_ID_LENGTH = 128;

function requestIdFrom(req: Request): string {
  for (const header of ['x-request-id', 'x-correlation-id']) {
    const raw = req.headers[header];
    const value = (Array.isArray(raw) ? raw[0] : raw)?.trim();
    if (value) return value.slice(0, MAX_REQUEST_ID_LENGTH);
  }
  return randomUUID();
}

/** Route template for the metrics label, so `/s/Ab3x` and `/s/Zz9q` share a series. */
function routeLabel(req: Request): string {
  const template: unknown = req.route?.path;
  if (typeof template === 'string') return `${req.baseUrl}${template}`;
  return req.baseUrl || 'unmatched';
}

/**
 * Tags the request with an id (echoed as X-Request-Id), runs the rest of the
 * chain inside its async context, and on finish records latency and writes one
 * access log line.
 */
export function requestContext(req: Request, res: Response, next: NextFunction) {
  const requestId = requestIdFrom(req);
  req.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  const store: RequestContextStore = {
    requestId,
    db: { checkoutCount: 0, totalMs: 0, slowCount: 0 },
  };
  const startedAt = process.hrtime.bigint();

  res.on('finish', () => {
    const elapsedNs = process.hrtime.bigint() - startedAt;
    const durationMs = Math.round(Number(elapsedNs) / 1e6);
    const status = res.statusCode;
    const route = routeLabel(req);

    recordHttpRequest({ method: req.method, route, status, durationSeconds: Number(elapsedNs) / 1e9 });

    const line = {
      requestId,
      method: req.method,
      path: req.path,
      route,
      status,
      durationMs,
      dbCheckouts: store.db.checkoutCount,
      dbWaitMs: Math.round(store.db.totalMs),
      dbSlowCheckouts: store.db.slowCount,
    };
    if (status >= 500) logger.error('http.request', line);
    else if (durationMs >= SLOW_REQUEST_MS) logger.warn('http.slow', { ...line, slowMs: SLOW_REQUEST_MS });
    else logger.info('http.request', line);
  });

  runWithRequestContext(store, () => next());
}
