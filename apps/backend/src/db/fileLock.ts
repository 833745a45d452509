import { lock } from 'proper-lockfile';
import { TransientStorageError } from '../shared/allocationErrors.js';
import { errorMessage, logger } from '../utils/logger.js';

const RETRY_INTERVAL_MS = 25;
// A holder that stops refreshing its lock for this long is presumed dead.
const STALE_MS = 10_000;

/**
 * Runs `fn` while holding the cross-process lock for `filePath` (a `<file>.lock`
 * directory beside it). Gives up with TransientStorageError after `timeoutMs`.
 */
export async function withFileLock<T>(filePath: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
  let release: () => Promise<void>;
  try {
    release = await lock(filePath, {
      realpath: false,
      stale: STALE_MS,
      retries: {
        retries: Math.max(1, Math.ceil(timeoutMs / RETRY_INTERVAL_MS)),
        factor: 1,
        minTimeout: RETRY_INTERVAL_MS,
        maxTimeout: RETRY_INTERVAL_MS,
      },
      onCompromised: (error) => {
        logger.error('db.lock_compromised', { filePath, errorMessage: errorMessage(error) });
      },
    });
  } catch (error) {
    throw new TransientStorageError(`timed out after ${timeoutMs}ms waiting for the database file lock`, {
      cause: error,
    });
  }

  try {
    return await fn();
  } finally {
    await release().catch((error: unknown) => {
      logger.warn('db.lock_release_failed', { filePath, errorMessage: errorMessage(error) });
    });
  }
}
