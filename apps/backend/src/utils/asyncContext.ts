import { AsyncLocalStorage } from 'node:async_hooks';

export type DbCheckoutStats = {
  checkoutCount: number;
  /** Total time spent waiting for a connection, not running statements. */
  totalMs: number;
  slowCount: number;
};

export type RequestContextStore = {
  requestId: string;
  db: DbCheckoutStats;
};

const requestStore = new AsyncLocalStorage<RequestContextStore>();

export function runWithRequestContext<T>(store: RequestContextStore, fn: () => T): T {
  return requestStore.run(store, fn);
}

export function getRequestContext(): RequestContextStore | undefined {
  return requestStore.getStore();
}

/** Adds one connection checkout to the current request's totals; a no-op outside a request. */
export function noteDbCheckout(waitedMs: number, slow: boolean): void {
  const stats = requestStore.getStore()?.db;
  if (!stats) return;
  stats.checkoutCount += 1;
  stats.totalMs += waitedMs;
  if (slow) stats.slowCount += 1;
}
