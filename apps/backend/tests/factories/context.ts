import { DEFAULT_ALLOCATION_CONFIG, type AllocationConfig, type AppConfig } from '../../src/config/allocation.js';
import { createAppContext, type AppContext } from '../../src/context.js';
import { IN_MEMORY } from '../../src/db/sqlJsDatabase.js';
import type { StorageProvider } from '../../src/storage/types.js';
import { openTestDatabase } from './database.js';
import { MemoryStorageProvider } from './storage.js';

type AllocationOverrides = {
  [K in keyof AllocationConfig]?: AllocationConfig[K] extends object ? Partial<AllocationConfig[K]> : AllocationConfig[K];
};

export type TestConfigOverrides = Partial<Omit<AppConfig, 'allocation'>> & { allocation?: AllocationOverrides };

export function testConfig(overrides: TestConfigOverrides = {}): AppConfig {
  const { allocation = {}, ...rest } = overrides;
  const base = DEFAULT_ALLOCATION_CONFIG;
  return {
    nodeEnv: 'test',
    port: 0,
    jsonBodyLimit: '1mb',
    rateLimit: { windowMs: 60_000, max: 0 },
    shutdownTimeoutMs: 1000,
    database: { path: IN_MEMORY, acquireTimeoutMs: 2000 },
    fileHashConcurrency: 2,
    adminToken: null,
    storage: { kind: 'local', uploadDir: './uploads', publicBaseUrl: null },
    ...rest,
    allocation: {
      keyspace: { ...base.keyspace, ...allocation.keyspace },
      allocator: { ...base.allocator, ...allocation.allocator },
      shortIdsEnabled: allocation.shortIdsEnabled ?? base.shortIdsEnabled,
      reservedRefreshMs: allocation.reservedRefreshMs ?? base.reservedRefreshMs,
      // No backoff waits in tests.
      retry: { ...base.retry, baseDelayMs: 0, maxDelayMs: 0, ...allocation.retry },
      batchConcurrency: allocation.batchConcurrency ?? base.batchConcurrency,
    },
  };
}

export type TestContextOptions = Omit<TestConfigOverrides, 'storage'> & {
  generateCandidate?: (length: number) => string;
  storage?: StorageProvider;
  /** Seed the bundled reserved list (default) or start empty. */
  seedReserved?: boolean;
};

export async function createTestContext(options: TestContextOptions = {}): Promise<AppContext> {
  const { generateCandidate, storage, seedReserved = true, ...overrides } = options;
  const db = await openTestDatabase({ migrate: false });
  return createAppContext(testConfig(overrides), {
    db,
    storage: storage ?? new MemoryStorageProvider(),
    generateCandidate,
    reservedSeed: seedReserved ? undefined : null,
  });
}
