import { noteDbCheckout } from '../utils/asyncContext.js';
import { logger } from '../utils/logger.js';
import { recordDbCheckoutTimeout } from '../utils/metrics.js';
import { Semaphore, SemaphoreTimeoutError } from '../utils/semaphore.js';
import { TransientStorageError } from '../shared/allocationErrors.js';

const SLOW_CHECKOUT_MS = 200;

export type ConnectionPoolOptions = {
  name: string;
  acquireTimeoutMs: number;
};

/**
 * Fixed set of connections handed out one caller at a time.
 * `use()` is the only way to get at a connection; it is returned on every exit path.
 */
export class ConnectionPool<C> {
  private readonly idle: C[];
  private readonly permits: Semaphore;
  private closed = false;

  constructor(
    connections: readonly C[],
    private readonly options: ConnectionPoolOptions
  ) {
    if (connections.length === 0) throw new Error('connection pool needs at least one connection');
    this.idle = [...connections];
    this.permits = new Semaphore(connections.length);
  }

  get size(): number {
    return this.permits.capacity;
  }

  async use<T>(fn: (connection: C) => Promise<T>): Promise<T> {
    if (this.closed) throw new TransientStorageError(`connection pool ${this.options.name} is closed`);

    const startedAt = Date.now();
    let release: () => void;
    try {
      release = await this.permits.acquire(this.options.acquireTimeoutMs);
    } catch (error) {
      if (error instanceof SemaphoreTimeoutError) {
        recordDbCheckoutTimeout();
        logger.warn('db.checkout_timeout', {
          pool: this.options.name,
          timeoutMs: error.timeoutMs,
          waiting: this.permits.pending,
        });
        throw new TransientStorageError(`timed out after ${error.timeoutMs}ms waiting for a database connection`, {
          cause: error,
        });
      }
      throw error;
    }
    this.trackCheckout(Date.now() - startedAt);

    const connection = this.idle.pop();
    if (connection === undefined) {
      release();
      throw new Error(`connection pool ${this.options.name} handed out a permit without a connection`);
    }
    try {
      return await fn(connection);
    } finally {
      this.idle.push(connection);
      release();
    }
  }

  /** Waits for every connection to come back, then passes them all to `fn` and refuses further checkouts. */
  async drain(fn: (connections: C[]) => Promise<void>): Promise<void> {
    if (this.closed) return;
    const releases: Array<() => void> = [];
    for (let i = 0; i < this.size; i += 1) {
      releases.push(await this.permits.acquire());
    }
    this.closed = true;
    try {
      await fn([...this.idle]);
    } finally {
      for (const release of releases) release();
    }
  }

  private trackCheckout(waitedMs: number): void {
    const slow = waitedMs >= SLOW_CHECKOUT_MS;
    noteDbCheckout(waitedMs, slow);
    if (slow) logger.debug('db.slow_checkout', { pool: this.options.name, waitedMs });
  }
}
