import type { Server as HttpServer } from 'http';
import type { Socket } from 'net';
import { errorMessage, logger } from '../utils/logger.js';
import { beginDrain, markStopped } from '../utils/lifecycle.js';

type ShutdownDeps = {
  httpServer: HttpServer;
  /** Hard deadline for the whole sequence; the process exits with 1 when it passes. */
  shutdownTimeoutMs: number;
  httpDrainTimeoutMs: number;
  closeDatabase: () => Promise<void>;
  exit?: (code: number) => void;
};

type ShutdownStep = {
  name: string;
  maxMs: number;
  run: () => Promise<void>;
};

// Left for logging and exit once the steps have used their budgets.
const DEADLINE_MARGIN_MS = 250;

function trackConnections(server: HttpServer): Set<Socket> {
  const sockets = new Set<Socket>();
  server.on('connection', (socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });
  return sockets;
}

/** Stops accepting connections, waits for in-flight requests, then destroys whatever is still open. */
function drainHttp(server: HttpServer, sockets: Set<Socket>, timeoutMs: number): Promise<void> {
  if (!server.listening) return Promise.resolve();
  return new Promise((resolve) => {
    const forceClose = setTimeout(() => {
      logger.warn('shutdown.http_drain_timeout', { timeoutMs, openConnections: sockets.size });
      for (const socket of sockets) socket.destroy();
      resolve();
    }, timeoutMs);
    forceClose.unref();

    server.close((err) => {
      if (err) logger.error('shutdown.http_close_failed', { errorMessage: err.message });
      clearTimeout(forceClose);
      resolve();
    });
    server.closeIdleConnections();
  });
}

function timeLimit(ms: number, label: string): { expired: Promise<never>; cancel: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  return { expired, cancel: () => clearTimeout(timer) };
}

/** A step that fails or overruns is logged and skipped; the next one still runs. */
async function runStep(step: ShutdownStep, deadlineAt: number): Promise<void> {
  const budget = Math.min(step.maxMs, deadlineAt - Date.now() - DEADLINE_MARGIN_MS);
  if (budget <= 0) {
    logger.warn('shutdown.step_skipped', { step: step.name, reason: 'deadline_reached' });
    return;
  }
  const limit = timeLimit(budget, step.name);
  try {
    await Promise.race([step.run(), limit.expired]);
    logger.debug('shutdown.step_done', { step: step.name });
  } catch (error) {
    logger.warn('shutdown.step_failed', { step: step.name, errorMessage: errorMessage(error), budgetMs: budget });
  } finally {
    limit.cancel();
  }
}

export function setupShutdownHandlers(deps: ShutdownDeps) {
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  const sockets = trackConnections(deps.httpServer);

  const steps: ShutdownStep[] = [
    {
      name: 'http_drain',
      maxMs: deps.httpDrainTimeoutMs + 1000,
      run: () => drainHttp(deps.httpServer, sockets, deps.httpDrainTimeoutMs),
    },
    // Runs after the drain so the final write-back sees every committed allocation.
    { name: 'db_close', maxMs: 5000, run: () => deps.closeDatabase() },
  ];

  async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (!beginDrain(signal)) return;
    logger.info('shutdown.start', { signal, timeoutMs: deps.shutdownTimeoutMs });

    const deadlineAt = Date.now() + deps.shutdownTimeoutMs;
    const watchdog = setTimeout(() => {
      logger.error('shutdown.timeout', { signal, timeoutMs: deps.shutdownTimeoutMs });
      exit(1);
    }, deps.shutdownTimeoutMs);
    watchdog.unref();

    for (const step of steps) {
      await runStep(step, deadlineAt);
    }

    clearTimeout(watchdog);
    markStopped();
    logger.info('shutdown.complete', { signal });
    exit(0);
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => void shutdown(signal));
  }

  return { shutdown };
}
