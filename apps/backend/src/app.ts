import express, { type Express, type Request, type Response } from 'express';
import compression from 'compression';
import helmet from 'helmet';
import path from 'path';
import type { AppContext } from './context.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createGlobalLimiter } from './middleware/rateLimit.js';
import { requestContext } from './middleware/requestContext.js';
import { setupRoutes } from './routes/index.js';

export function createApp(ctx: AppContext): Express {
  const { config } = ctx;
  const app = express();

  app.disable('x-powered-by');
  // Trust the first proxy (nginx) for req.ip in the rate limiter.
  app.set('trust proxy', 1);

  // Request id, access log and latency metrics for everything below.
  app.use(requestContext);
  app.use(
    compression({
      threshold: config.nodeEnv === 'production' ? 2048 : 0,
      filter: (req: Request, res: Response) => {
        // Stored objects are served as-is.
        if (req.path.startsWith('/uploads')) return false;
        return compression.filter(req, res);
      },
    })
  );
  app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));
  app.use(express.json({ limit: config.jsonBodyLimit }));

  const limiter = createGlobalLimiter(config.rateLimit);
  if (limiter) app.use(limiter);

  if (config.storage.kind === 'local') {
    app.use('/uploads', express.static(path.resolve(process.cwd(), config.storage.uploadDir), { immutable: true, maxAge: '365d' }));
  }

  setupRoutes(app, ctx);

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
