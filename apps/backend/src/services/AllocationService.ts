import {
  CreateAllocationBodySchema,
  type CreateAllocationBody,
  type KeyspaceStatistics,
} from '@keymint/api-contracts';
import type { AllocationConfig } from '../config/allocation.js';
import type {
  AllocationRecord,
  OperationLogEntry,
  RepositoryContext,
  RetiredStatus,
} from '../repositories/types.js';
import {
  AllocationCancelledError,
  KeyspaceExhaustedError,
  isStoreConflict,
  isTransientStorageError,
} from '../shared/allocationErrors.js';
import { mapError } from '../shared/errorMapping.js';
import type { StorageProvider } from '../storage/types.js';
import { CHARSET_SIZE } from '../utils/identifierCharset.js';
import { errorMessage, logger } from '../utils/logger.js';
import { recordAllocation, type AllocationOutcome } from '../utils/metrics.js';
import { withRetry } from '../utils/retry.js';
import { Semaphore } from '../utils/semaphore.js';
import type { FingerprintRegister } from './FingerprintRegister.js';
import type { KeyspaceLedger } from './KeyspaceLedger.js';
import type { ReservedWordFilter } from './ReservedWordFilter.js';
import type { AllocationRequest, AllocationResult, ShortIdAllocator } from './ShortIdAllocator.js';

export type BatchItemResult =
  | { index: number; fingerprint: string; ok: true; result: AllocationResult }
  | { index: number; fingerprint: string; ok: false; errorCode: string; error: string };

export type RegisterResult = { kind: 'pending'; record: AllocationRecord } | { kind: 'dedupHit'; record: AllocationRecord };

export type AllocationServiceDeps = {
  repos: RepositoryContext;
  register: FingerprintRegister;
  ledger: KeyspaceLedger;
  reservedWords: ReservedWordFilter;
  allocator: ShortIdAllocator;
  storage: StorageProvider;
  config: AllocationConfig;
};

export type AllocationService = {
  allocate: (input: CreateAllocationBody, options?: { signal?: AbortSignal }) => Promise<AllocationResult>;
  /** Each item succeeds or fails on its own; one failure never aborts the others. */
  allocateBatch: (inputs: CreateAllocationBody[], options?: { signal?: AbortSignal }) => Promise<BatchItemResult[]>;
  /** Records the fingerprint without minting an identifier. */
  registerPending: (input: CreateAllocationBody) => Promise<RegisterResult>;
  lookup: (fingerprint: string) => Promise<AllocationRecord | null>;
  history: (fingerprint: string) => Promise<{ record: AllocationRecord; entries: OperationLogEntry[] } | null>;
  /** Active record behind a short identifier, counted as an access. */
  resolve: (identifier: string) => Promise<AllocationRecord | null>;
  updateUploadMetadata: (
    fingerprint: string,
    upload: { storageKey: string; publicUrl: string }
  ) => Promise<AllocationRecord | null>;
  /** Deleting also removes the stored object; archiving keeps it. */
  retire: (fingerprint: string, status: RetiredStatus) => Promise<AllocationRecord | null>;
  statistics: () => Promise<KeyspaceStatistics>;
};

function toRequest(body: CreateAllocationBody): AllocationRequest {
  return {
    fingerprint: body.fingerprint,
    file: {
      originalFilename: body.originalFilename ?? null,
      fileExtension: body.fileExtension ?? null,
      fileSize: body.fileSize ?? null,
      mediaType: body.mediaType ?? null,
    },
    metadata: body.metadata ?? null,
    tags: body.tags ?? null,
  };
}

function outcomeForError(error: unknown): AllocationOutcome {
  if (error instanceof KeyspaceExhaustedError) return 'exhausted';
  if (error instanceof AllocationCancelledError) return 'cancelled';
  return 'failed';
}

export function createAllocationService(deps: AllocationServiceDeps): AllocationService {
  const { repos, register, ledger, reservedWords, allocator, storage, config } = deps;

  const allocateOnce = async (request: AllocationRequest, signal?: AbortSignal): Promise<AllocationResult> => {
    await reservedWords.ensureFresh();
    const existing = await register.lookup(request.fingerprint);
    if (!existing) return allocator.allocate(request, signal);

    if (existing.identifier === null && existing.status === 'active') {
      return allocator.assignExisting(existing, signal);
    }
    await repos.allocations.appendLog(existing.id, 'dedupHit', { via: 'lookup' });
    logger.debug('allocation.dedup_hit', { fingerprint: request.fingerprint, identifier: existing.identifier });
    return { kind: 'dedupHit', record: existing };
  };

  const allocate: AllocationService['allocate'] = async (input, options = {}) => {
    const request = toRequest(CreateAllocationBodySchema.parse(input));
    try {
      const result = await withRetry(() => allocateOnce(request, options.signal), {
        service: 'allocation',
        ...config.retry,
        signal: options.signal,
        retryOnError: isTransientStorageError,
        onRetry: ({ attempt, nextDelayMs, error }) => {
          logger.warn('allocation.retry', {
            fingerprint: request.fingerprint,
            attempt,
            nextDelayMs,
            errorMessage: errorMessage(error),
          });
        },
      });
      recordAllocation(result.kind === 'assigned' ? 'assigned' : 'dedup_hit');
      return result;
    } catch (error) {
      const outcome = outcomeForError(error);
      recordAllocation(outcome);
      logger.warn('allocation.failed', { fingerprint: request.fingerprint, outcome, errorMessage: errorMessage(error) });
      throw error;
    }
  };

  const batchLimiter = new Semaphore(config.batchConcurrency);

  return {
    allocate,

    allocateBatch: (inputs, options) =>
      Promise.all(
        inputs.map((input, index) =>
          batchLimiter.use(async (): Promise<BatchItemResult> => {
            try {
              const result = await allocate(input, options);
              return { index, fingerprint: result.record.fingerprint, ok: true, result };
            } catch (error) {
              const mapped = mapError(error);
              return { index, fingerprint: input.fingerprint, ok: false, errorCode: mapped.errorCode, error: mapped.message };
            }
          })
        )
      ),

    registerPending: async (input) => {
      const request = toRequest(CreateAllocationBodySchema.parse(input));
      const existing = await register.lookup(request.fingerprint);
      if (existing) return { kind: 'dedupHit', record: existing };
      try {
        return { kind: 'pending', record: await repos.allocations.registerPending(request) };
      } catch (error) {
        if (!isStoreConflict(error, 'fingerprint')) throw error;
        const raced = await register.lookup(request.fingerprint);
        if (!raced) throw error;
        return { kind: 'dedupHit', record: raced };
      }
    },

    lookup: (fingerprint) => register.lookup(fingerprint),

    history: async (fingerprint) => {
      const record = await register.lookup(fingerprint);
      if (!record) return null;
      return { record, entries: await repos.allocations.history(record.id) };
    },

    resolve: async (identifier) => {
      const record = await register.lookupByIdentifier(identifier);
      if (!record || record.status !== 'active') return null;
      return repos.allocations.markAccessed(record.fingerprint);
    },

    updateUploadMetadata: (fingerprint, upload) =>
      repos.allocations.updateUploadMetadata(fingerprint.toLowerCase(), upload),

    retire: async (fingerprint, status) => {
      const record = await repos.allocations.setStatus(fingerprint.toLowerCase(), status);
      if (!record) return null;
      logger.info('allocation.retired', { fingerprint: record.fingerprint, status, storageKey: record.storageKey });
      if (status === 'deleted' && record.storageKey) {
        await storage.deleteByKey(record.storageKey);
      }
      return record;
    },

    statistics: async () => {
      const [lengths, currentLength, reservedCount, records] = await Promise.all([
        ledger.snapshot(),
        ledger.peekCurrentLength(),
        repos.reserved.count(),
        repos.allocations.statistics(),
      ]);
      return {
        charsetSize: CHARSET_SIZE,
        minLength: ledger.policy.minLength,
        maxLength: ledger.policy.maxLength,
        currentLength,
        lengths,
        reservedCount,
        records,
      };
    },
  };
}
