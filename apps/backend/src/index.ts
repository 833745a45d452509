import './config/loadEnv.js';
import { createServer } from 'http';
import { createApp } from './app.js';
import { buildAppConfig } from './config/allocation.js';
import { env } from './config/env.js';
import { closeAppContext, createAppContext } from './context.js';
import { SqlJsDatabase } from './db/sqlJsDatabase.js';
import { setupShutdownHandlers } from './server/shutdown.js';
import { errorMessage, logger } from './utils/logger.js';

async function startServer() {
  const config = buildAppConfig(env);
  const db = await SqlJsDatabase.open({
    filePath: config.database.path,
    acquireTimeoutMs: config.database.acquireTimeoutMs,
  });
  const ctx = await createAppContext(config, { db });
  const app = createApp(ctx);

  const httpServer = createServer(app);
  httpServer.keepAliveTimeout = 65000;
  httpServer.headersTimeout = 66000; // must be > keepAliveTimeout

  setupShutdownHandlers({
    httpServer,
    shutdownTimeoutMs: config.shutdownTimeoutMs,
    httpDrainTimeoutMs: Math.max(1000, Math.floor(config.shutdownTimeoutMs / 2)),
    closeDatabase: () => closeAppContext(ctx),
  });

  httpServer.listen(config.port, () => {
    logger.info('server.started', {
      port: config.port,
      nodeEnv: config.nodeEnv,
      database: config.database.path,
      storage: config.storage.kind,
      shortIdsEnabled: config.allocation.shortIdsEnabled,
    });
  });
}

startServer().catch((error: unknown) => {
  logger.error('server.start_failed', { errorMessage: errorMessage(error) });
  process.exit(1);
});
