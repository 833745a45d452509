import type { CreateAllocationBody, IngestOutcome } from '@keymint/api-contracts';
import type { AllocationRecord } from '../repositories/types.js';
import { mapError } from '../shared/errorMapping.js';
import { contentKeyFor, storageKeyFor, type StorageProvider } from '../storage/types.js';
import type { FileHasher } from '../utils/fileHash.js';
import { getFileFacts } from '../utils/fileHash.js';
import { errorMessage, logger } from '../utils/logger.js';
import { Semaphore } from '../utils/semaphore.js';
import type { AllocationService } from './AllocationService.js';

export type IngestResult = {
  path: string;
  fingerprint: string | null;
  outcome: IngestOutcome;
  identifier: string | null;
  url: string | null;
  errorCode?: string;
  error?: string;
};

export type UploadPipelineDeps = {
  allocations: AllocationService;
  storage: StorageProvider;
  hasher: FileHasher;
  shortIdsEnabled: boolean;
  batchConcurrency: number;
};

export type UploadPipeline = {
  ingestFile: (filePath: string, options?: { signal?: AbortSignal }) => Promise<IngestResult>;
  ingestBatch: (filePaths: string[], options?: { signal?: AbortSignal }) => Promise<IngestResult[]>;
};

export function createUploadPipeline(deps: UploadPipelineDeps): UploadPipeline {
  const { allocations, storage, hasher } = deps;

  // Identified records live under their identifier; the rest under a key derived from the content.
  const keyFor = (record: AllocationRecord): string =>
    record.identifier !== null
      ? storageKeyFor(record.identifier, record.fileExtension)
      : contentKeyFor(record.fingerprint, record.fileExtension);

  // Stores the bytes, records where they went and drops an object kept under an earlier key.
  const publish = async (filePath: string, record: AllocationRecord): Promise<string> => {
    const stored = await storage.storeFile({
      sourcePath: filePath,
      key: keyFor(record),
      mediaType: record.mediaType,
    });
    const updated = await allocations.updateUploadMetadata(record.fingerprint, {
      storageKey: stored.key,
      publicUrl: stored.publicUrl,
    });
    logger.info('upload.stored', {
      fingerprint: record.fingerprint,
      identifier: record.identifier,
      key: stored.key,
      storage: storage.kind,
    });
    if (record.storageKey !== null && record.storageKey !== stored.key) {
      logger.info('upload.superseded', { fingerprint: record.fingerprint, previousKey: record.storageKey, key: stored.key });
      await storage.deleteByKey(record.storageKey);
    }
    return updated?.publicUrl ?? stored.publicUrl;
  };

  const ingestFile: UploadPipeline['ingestFile'] = async (filePath, options = {}) => {
    const [fingerprint, facts] = await Promise.all([hasher.hash(filePath), getFileFacts(filePath)]);
    const body: CreateAllocationBody = {
      fingerprint,
      originalFilename: facts.originalFilename,
      fileExtension: facts.fileExtension ?? undefined,
      fileSize: facts.fileSize,
      mediaType: facts.mediaType,
    };

    if (!deps.shortIdsEnabled) {
      const registered = await allocations.registerPending(body);
      const { record } = registered;
      let url = record.publicUrl;
      if (url === null && record.status === 'active') {
        url = await publish(filePath, record);
      }
      return { path: filePath, fingerprint, outcome: registered.kind, identifier: record.identifier, url };
    }

    const result = await allocations.allocate(body, { signal: options.signal });
    const { record } = result;
    if (result.kind === 'assigned') {
      const url = await publish(filePath, record);
      return { path: filePath, fingerprint, outcome: 'assigned', identifier: result.identifier, url };
    }

    // Dedup hit: the bytes are already stored, unless an earlier upload never finished or
    // predates the identifier and still sits under its content key.
    let url = record.publicUrl;
    if (record.identifier !== null && record.status === 'active' && record.storageKey !== keyFor(record)) {
      logger.warn('upload.dedup.repair_missing_object', { fingerprint, identifier: record.identifier });
      url = await publish(filePath, record);
    }
    return { path: filePath, fingerprint, outcome: 'dedupHit', identifier: record.identifier, url };
  };

  const limiter = new Semaphore(deps.batchConcurrency);

  return {
    ingestFile,

    ingestBatch: (filePaths, options) =>
      Promise.all(
        filePaths.map((filePath) =>
          limiter.use(async (): Promise<IngestResult> => {
            try {
              return await ingestFile(filePath, options);
            } catch (error) {
              const mapped = mapError(error);
              logger.warn('upload.ingest_failed', {
                path: filePath,
                errorCode: mapped.errorCode,
                errorMessage: errorMessage(error),
              });
              return {
                path: filePath,
                fingerprint: null,
                outcome: 'failed',
                identifier: null,
                url: null,
                errorCode: mapped.errorCode,
                error: mapped.status === 500 ? errorMessage(error) : mapped.message,
              };
            }
          })
        )
      ),
  };
}
