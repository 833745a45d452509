import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const ORIGINAL_ENV = process.env;

beforeEach(() => {
  vi.resetModules();
  process.env = { ...ORIGINAL_ENV };
});

afterEach(() => {
  process.env = ORIGINAL_ENV;
  vi.restoreAllMocks();
});

function issuePaths(result: { success: boolean; error?: { issues: Array<{ path: Array<string | number> }> } }) {
  return (result.error?.issues ?? []).map((issue) => issue.path.join('.')).sort();
}

describe('env validation', () => {
  it('exits on invalid env at import time', async () => {
    process.env = { PATH: ORIGINAL_ENV.PATH, NODE_ENV: 'test', LOG_LEVEL: 'error', SHORT_ID_MIN_LENGTH: 'many' };

    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(((code?: number) => {
      throw new Error(`process.exit:${code ?? 'unknown'}`);
    }) as never);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await expect(import('../src/config/env.js')).rejects.toThrow('process.exit:1');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('passes with defaults only', async () => {
    process.env = { PATH: ORIGINAL_ENV.PATH, NODE_ENV: 'test' };

    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(((code?: number) => {
      throw new Error(`process.exit:${code ?? 'unknown'}`);
    }) as never);

    const mod = await import('../src/config/env.js');
    expect(mod.env.SHORT_ID_MIN_LENGTH).toBe(4);
    expect(mod.env.SHORT_ID_MAX_LENGTH).toBe(12);
    expect(mod.env.SHORT_IDS_ENABLED).toBe(true);
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it('rejects a max length below the min length', async () => {
    const { parseEnv } = await import('../src/config/env.js');
    const result = parseEnv({ SHORT_ID_MIN_LENGTH: '8', SHORT_ID_MAX_LENGTH: '6' });
    expect(result.success).toBe(false);
    expect(issuePaths(result)).toEqual(['SHORT_ID_MAX_LENGTH']);
  });

  it('requires the S3 settings when S3 storage is selected', async () => {
    const { parseEnv } = await import('../src/config/env.js');
    const result = parseEnv({ UPLOAD_STORAGE: 's3', S3_BUCKET: 'bucket' });
    expect(issuePaths(result)).toEqual(['S3_ACCESS_KEY_ID', 'S3_PUBLIC_BASE_URL', 'S3_SECRET_ACCESS_KEY']);
  });

  it('refuses an in-memory database in production', async () => {
    const { parseEnv } = await import('../src/config/env.js');
    const result = parseEnv({ NODE_ENV: 'production', DATABASE_PATH: ':memory:' });
    expect(issuePaths(result)).toEqual(['DATABASE_PATH']);
  });

  it('accepts yes/no style flags', async () => {
    const { parseEnv } = await import('../src/config/env.js');
    const result = parseEnv({ SHORT_IDS_ENABLED: 'no' });
    expect(result.success && result.data.SHORT_IDS_ENABLED).toBe(false);
  });
});

describe('buildAppConfig', () => {
  it('derives the allocation and storage config', async () => {
    const { parseEnv } = await import('../src/config/env.js');
    const { buildAppConfig } = await import('../src/config/allocation.js');
    const source = { SHORT_ID_MIN_LENGTH: '3', ALLOCATION_RETRY_MAX_ATTEMPTS: '5', RATE_LIMIT_MAX: '0' };
    const parsed = parseEnv(source);
    if (!parsed.success) throw parsed.error;

    const config = buildAppConfig(parsed.data, source);
    expect(config.allocation.keyspace).toEqual({ minLength: 3, maxLength: 12, reservedRatio: 0.001 });
    expect(config.allocation.retry).toEqual({ maxAttempts: 5, baseDelayMs: 50, maxDelayMs: 1000, factor: 2, jitter: 'full' });
    expect(config.rateLimit).toEqual({ windowMs: 60_000, max: 0 });
    expect(config.storage).toEqual({ kind: 'local', uploadDir: './uploads', publicBaseUrl: null });
    expect(config.adminToken).toBeNull();
    expect(config.jsonBodyLimit).toBe('1mb');
  });

  it('fills S3 defaults from the endpoint', async () => {
    const { parseEnv } = await import('../src/config/env.js');
    const { buildAppConfig } = await import('../src/config/allocation.js');
    const source = {
      UPLOAD_STORAGE: 's3',
      S3_BUCKET: 'bucket',
      S3_ACCESS_KEY_ID: 'test-key',
      S3_SECRET_ACCESS_KEY: 'test-secret',
      S3_PUBLIC_BASE_URL: 'https://cdn.test',
      S3_ENDPOINT: 'https://storage.test',
    };
    const parsed = parseEnv(source);
    if (!parsed.success) throw parsed.error;

    expect(buildAppConfig(parsed.data, source).storage).toEqual({
      kind: 's3',
      bucket: 'bucket',
      accessKeyId: 'test-key',
      secretAccessKey: 'test-secret',
      publicBaseUrl: 'https://cdn.test',
      endpoint: 'https://storage.test',
      region: 'auto',
      keyPrefix: '',
      forcePathStyle: true,
    });
  });
});
