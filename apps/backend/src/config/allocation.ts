import type { Env } from './env.js';
import { getServiceRetryConfig, type ServiceRetryConfig } from '../utils/retry.js';

export type KeyspacePolicy = {
  minLength: number;
  maxLength: number;
  reservedRatio: number;
  /** Fixed capacities per length, taking precedence over the derived ones. */
  capacityOverrides?: Readonly<Record<number, number>>;
};

export type AllocatorPolicy = {
  maxAttemptsPerLength: number;
  maxReservedRejections: number;
  maxEscalations: number;
};

export type AllocationConfig = {
  keyspace: KeyspacePolicy;
  allocator: AllocatorPolicy;
  shortIdsEnabled: boolean;
  reservedRefreshMs: number;
  retry: ServiceRetryConfig;
  batchConcurrency: number;
};

export type StorageConfig =
  | { kind: 'local'; uploadDir: string; publicBaseUrl: string | null }
  | {
      kind: 's3';
      bucket: string;
      accessKeyId: string;
      secretAccessKey: string;
      publicBaseUrl: string;
      endpoint: string | null;
      region: string;
      keyPrefix: string;
      forcePathStyle: boolean;
    };

export type AppConfig = {
  nodeEnv: Env['NODE_ENV'];
  port: number;
  jsonBodyLimit: string;
  rateLimit: { windowMs: number; max: number };
  shutdownTimeoutMs: number;
  database: { path: string; acquireTimeoutMs: number };
  allocation: AllocationConfig;
  fileHashConcurrency: number;
  adminToken: string | null;
  storage: StorageConfig;
};

export const ALLOCATION_RETRY_DEFAULTS = { maxAttempts: 3, baseDelayMs: 50, maxDelayMs: 1000 } as const;

export const DEFAULT_ALLOCATION_CONFIG: AllocationConfig = {
  keyspace: { minLength: 4, maxLength: 12, reservedRatio: 0.001 },
  allocator: { maxAttemptsPerLength: 10, maxReservedRejections: 100, maxEscalations: 4 },
  shortIdsEnabled: true,
  reservedRefreshMs: 300_000,
  retry: { ...ALLOCATION_RETRY_DEFAULTS, factor: 2, jitter: 'full' },
  batchConcurrency: 5,
};

function storageConfigFromEnv(env: Env): StorageConfig {
  if (env.UPLOAD_STORAGE === 's3' && env.S3_BUCKET && env.S3_ACCESS_KEY_ID && env.S3_SECRET_ACCESS_KEY && env.S3_PUBLIC_BASE_URL) {
    return {
      kind: 's3',
      bucket: env.S3_BUCKET,
      accessKeyId: env.S3_ACCESS_KEY_ID,
      secretAccessKey: env.S3_SECRET_ACCESS_KEY,
      publicBaseUrl: env.S3_PUBLIC_BASE_URL,
      endpoint: env.S3_ENDPOINT ?? null,
      region: env.S3_REGION ?? (env.S3_ENDPOINT ? 'auto' : 'us-east-1'),
      keyPrefix: env.S3_KEY_PREFIX ?? '',
      forcePathStyle: env.S3_FORCE_PATH_STYLE ?? Boolean(env.S3_ENDPOINT),
    };
  }
  return { kind: 'local', uploadDir: env.UPLOAD_DIR, publicBaseUrl: env.PUBLIC_BASE_URL ?? null };
}

export function buildAppConfig(env: Env, source: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    jsonBodyLimit: env.JSON_BODY_LIMIT ?? '1mb',
    rateLimit: { windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX },
    shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
    database: { path: env.DATABASE_PATH, acquireTimeoutMs: env.DB_ACQUIRE_TIMEOUT_MS },
    allocation: {
      keyspace: {
        minLength: env.SHORT_ID_MIN_LENGTH,
        maxLength: env.SHORT_ID_MAX_LENGTH,
        reservedRatio: env.SHORT_ID_RESERVED_RATIO,
      },
      allocator: {
        maxAttemptsPerLength: env.SHORT_ID_MAX_ATTEMPTS_PER_LENGTH,
        maxReservedRejections: env.SHORT_ID_MAX_RESERVED_REJECTIONS,
        maxEscalations: env.SHORT_ID_MAX_ESCALATIONS,
      },
      shortIdsEnabled: env.SHORT_IDS_ENABLED,
      reservedRefreshMs: env.RESERVED_REFRESH_MS,
      retry: getServiceRetryConfig('ALLOCATION', ALLOCATION_RETRY_DEFAULTS, source),
      batchConcurrency: env.ALLOCATION_BATCH_CONCURRENCY,
    },
    fileHashConcurrency: env.FILE_HASH_CONCURRENCY,
    adminToken: env.ADMIN_TOKEN ?? null,
    storage: storageConfigFromEnv(env),
  };
}
