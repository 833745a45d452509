import type { AppConfig } from '../config/allocation.js';
import type { RepositoryContext } from '../repositories/types.js';
import type { StorageProvider } from '../storage/types.js';
import { createFileHasher } from '../utils/fileHash.js';
import { createAllocationService, type AllocationService } from './AllocationService.js';
import { createFingerprintRegister, type FingerprintRegister } from './FingerprintRegister.js';
import { createKeyspaceLedger, type KeyspaceLedger } from './KeyspaceLedger.js';
import { ReservedWordFilter } from './ReservedWordFilter.js';
import { createShortIdAllocator, type ShortIdAllocator } from './ShortIdAllocator.js';
import { createUploadPipeline, type UploadPipeline } from './UploadPipeline.js';

export type ServiceContext = {
  register: FingerprintRegister;
  ledger: KeyspaceLedger;
  reservedWords: ReservedWordFilter;
  allocator: ShortIdAllocator;
  allocations: AllocationService;
  uploads: UploadPipeline;
};

export type ServiceContextOptions = {
  storage: StorageProvider;
  /** Candidate source override, for deterministic allocation in tests. */
  generateCandidate?: (length: number) => string;
  now?: () => number;
};

export function createServiceContext(
  repos: RepositoryContext,
  config: AppConfig,
  options: ServiceContextOptions
): ServiceContext {
  const { allocation } = config;
  const register = createFingerprintRegister(repos.allocations);
  const ledger = createKeyspaceLedger(repos.ledger, allocation.keyspace);
  const reservedWords = new ReservedWordFilter(repos.reserved, {
    refreshMs: allocation.reservedRefreshMs,
    now: options.now,
  });
  const allocator = createShortIdAllocator(
    { ledger, reservedWords, records: repos.allocations, register },
    { policy: allocation.allocator, generateCandidate: options.generateCandidate }
  );
  const allocations = createAllocationService({
    repos,
    register,
    ledger,
    reservedWords,
    allocator,
    storage: options.storage,
    config: allocation,
  });
  const uploads = createUploadPipeline({
    allocations,
    storage: options.storage,
    hasher: createFileHasher(config.fileHashConcurrency),
    shortIdsEnabled: allocation.shortIdsEnabled,
    batchConcurrency: allocation.batchConcurrency,
  });

  return { register, ledger, reservedWords, allocator, allocations, uploads };
}
