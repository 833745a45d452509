import { recordRetryAttempt, recordRetryOutcome } from './metrics.js';

export type Jitter = 'full' | 'none';

export type ServiceRetryConfig = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
  jitter: Jitter;
};

export type RetryOptions = Partial<Pick<ServiceRetryConfig, 'factor' | 'jitter'>> &
  Omit<ServiceRetryConfig, 'factor' | 'jitter'> & {
    /** Metrics label. */
    service: string;
    /** Errors for which this returns false are rethrown at once. Defaults to retrying everything. */
    retryOnError?: (error: unknown) => boolean;
    onRetry?: (info: { attempt: number; nextDelayMs: number; error: unknown }) => void;
    /** Once aborted, no further attempt is started and a pending backoff ends early. */
    signal?: AbortSignal;
  };

const LIMITS = {
  maxAttempts: [1, 10],
  baseDelayMs: [0, 30_000],
  maxDelayMs: [0, 120_000],
} as const;

function readInt(raw: string | undefined, [min, max]: readonly [number, number], fallback: number): number {
  const n = Number.parseInt(raw ?? '', 10);
  if (!Number.isFinite(n)) return fallback;
  return Math.min(max, Math.max(min, n));
}

/**
 * Retry policy for a named service. `<SERVICE>_RETRY_MAX_ATTEMPTS`,
 * `_BASE_DELAY_MS` and `_MAX_DELAY_MS` override the defaults, clamped to sane
 * bounds; the max delay is never below the base delay.
 */
export function getServiceRetryConfig(
  service: string,
  defaults: { maxAttempts: number; baseDelayMs: number; maxDelayMs: number; factor?: number; jitter?: Jitter },
  source: NodeJS.ProcessEnv = process.env
): ServiceRetryConfig {
  const prefix = `${service.toUpperCase()}_RETRY`;
  const baseDelayMs = readInt(source[`${prefix}_BASE_DELAY_MS`], LIMITS.baseDelayMs, defaults.baseDelayMs);
  const maxDelayMs = Math.max(
    baseDelayMs,
    readInt(source[`${prefix}_MAX_DELAY_MS`], LIMITS.maxDelayMs, defaults.maxDelayMs)
  );
  return {
    maxAttempts: readInt(source[`${prefix}_MAX_ATTEMPTS`], LIMITS.maxAttempts, defaults.maxAttempts),
    baseDelayMs,
    maxDelayMs,
    factor: defaults.factor ?? 2,
    jitter: defaults.jitter ?? 'full',
  };
}

/** Backoff before retry number `retryIndex` (1-based): exponential, capped, optionally full-jittered. */
export function computeDelayMs(opts: Omit<ServiceRetryConfig, 'maxAttempts'>, retryIndex: number): number {
  const raw = opts.baseDelayMs * opts.factor ** Math.max(0, retryIndex - 1);
  const capped = Math.min(opts.maxDelayMs, Math.max(0, raw));
  return Math.floor(opts.jitter === 'full' ? Math.random() * capped : capped);
}

function backoff(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `action` until it resolves, an error is not retryable, attempts run
 * out or the signal aborts. The last error is rethrown unchanged.
 */
export async function withRetry<T>(action: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const delays: Omit<ServiceRetryConfig, 'maxAttempts'> = {
    baseDelayMs: options.baseDelayMs,
    maxDelayMs: options.maxDelayMs,
    factor: options.factor ?? 2,
    jitter: options.jitter ?? 'full',
  };
  const retryable = options.retryOnError ?? (() => true);

  for (let attempt = 1; ; attempt += 1) {
    try {
      const result = await action(attempt);
      recordRetryOutcome({ service: options.service, outcome: 'success' });
      return result;
    } catch (error) {
      const canRetry = attempt < options.maxAttempts && !options.signal?.aborted && retryable(error);
      if (!canRetry) {
        recordRetryOutcome({ service: options.service, outcome: 'failure' });
        throw error;
      }
      const nextDelayMs = computeDelayMs(delays, attempt);
      recordRetryAttempt(options.service);
      options.onRetry?.({ attempt, nextDelayMs, error });
      await backoff(nextDelayMs, options.signal);
      if (options.signal?.aborted) {
        recordRetryOutcome({ service: options.service, outcome: 'failure' });
        throw error;
      }
    }
  }
}
