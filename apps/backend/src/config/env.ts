import { z } from 'zod';
import { logger } from '../utils/logger.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .optional()
  .transform((v) => (v === undefined ? undefined : v === 'true' || v === '1' || v === 'yes'));

const envSchemaBase = z.object({
  PORT: z.coerce.number().int().optional().default(3001),
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  JSON_BODY_LIMIT: z.string().min(1).optional(),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().optional().default(60_000),
  // 0 disables the limiter.
  RATE_LIMIT_MAX: z.coerce.number().int().min(0).optional().default(600),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(10_000),

  DATABASE_PATH: z.string().min(1).optional().default('./data/keymint.sqlite'),
  DB_ACQUIRE_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(5000),

  SHORT_IDS_ENABLED: booleanFlag.transform((v) => v ?? true),
  SHORT_ID_MIN_LENGTH: z.coerce.number().int().min(1).max(32).optional().default(4),
  SHORT_ID_MAX_LENGTH: z.coerce.number().int().min(1).max(32).optional().default(12),
  SHORT_ID_RESERVED_RATIO: z.coerce.number().min(0).lt(1).optional().default(0.001),
  SHORT_ID_MAX_ATTEMPTS_PER_LENGTH: z.coerce.number().int().min(1).max(1000).optional().default(10),
  SHORT_ID_MAX_RESERVED_REJECTIONS: z.coerce.number().int().min(1).max(10_000).optional().default(100),
  SHORT_ID_MAX_ESCALATIONS: z.coerce.number().int().min(0).max(32).optional().default(4),
  RESERVED_REFRESH_MS: z.coerce.number().int().min(0).optional().default(300_000),

  ALLOCATION_RETRY_MAX_ATTEMPTS: z.coerce.number().int().optional(),
  ALLOCATION_RETRY_BASE_DELAY_MS: z.coerce.number().int().optional(),
  ALLOCATION_RETRY_MAX_DELAY_MS: z.coerce.number().int().optional(),
  ALLOCATION_BATCH_CONCURRENCY: z.coerce.number().int().min(1).max(64).optional().default(5),
  FILE_HASH_CONCURRENCY: z.coerce.number().int().min(1).max(64).optional().default(4),

  ADMIN_TOKEN: z.string().min(16).optional(),

  UPLOAD_STORAGE: z.enum(['local', 's3']).optional().default('local'),
  UPLOAD_DIR: z.string().min(1).optional().default('./uploads'),
  PUBLIC_BASE_URL: z.string().url().optional(),
  S3_BUCKET: z.string().min(1).optional(),
  S3_ACCESS_KEY_ID: z.string().min(1).optional(),
  S3_SECRET_ACCESS_KEY: z.string().min(1).optional(),
  S3_PUBLIC_BASE_URL: z.string().url().optional(),
  S3_ENDPOINT: z.string().url().optional(),
  S3_REGION: z.string().min(1).optional(),
  S3_KEY_PREFIX: z.string().min(1).optional(),
  S3_FORCE_PATH_STYLE: booleanFlag,
});

const envSchema = envSchemaBase.superRefine((env, ctx) => {
  if (env.SHORT_ID_MAX_LENGTH < env.SHORT_ID_MIN_LENGTH) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'SHORT_ID_MAX_LENGTH must be >= SHORT_ID_MIN_LENGTH',
      path: ['SHORT_ID_MAX_LENGTH'],
    });
  }

  if (env.UPLOAD_STORAGE === 's3') {
    for (const key of ['S3_BUCKET', 'S3_ACCESS_KEY_ID', 'S3_SECRET_ACCESS_KEY', 'S3_PUBLIC_BASE_URL'] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${key} is required when UPLOAD_STORAGE=s3`,
          path: [key],
        });
      }
    }
  }

  if (env.NODE_ENV === 'production' && env.DATABASE_PATH === ':memory:') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'DATABASE_PATH must point at a file in production',
      path: ['DATABASE_PATH'],
    });
  }
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(source);
}

export function validateEnv(): Env {
  const result = parseEnv(process.env);
  if (!result.success) {
    logger.error('env.invalid', { errors: result.error.format() });
    process.exit(1);
  }
  return result.data;
}

export const env = validateEnv();
