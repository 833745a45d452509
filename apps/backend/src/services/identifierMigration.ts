import type { AllocationRecordRepository } from '../repositories/types.js';
import { mapError } from '../shared/errorMapping.js';
import { logger } from '../utils/logger.js';
import type { ReservedWordFilter } from './ReservedWordFilter.js';
import type { ShortIdAllocator } from './ShortIdAllocator.js';

const DEFAULT_PAGE_SIZE = 200;

export type MigrationReport = {
  scanned: number;
  assigned: number;
  skipped: number;
  failed: number;
  errors: Array<{ fingerprint: string; errorCode: string; error: string }>;
};

export type IdentifierMigrationDeps = {
  records: AllocationRecordRepository;
  allocator: ShortIdAllocator;
  reservedWords: ReservedWordFilter;
};

/**
 * Gives active records without an identifier one, through the same allocator as new uploads.
 * Records that gained an identifier meanwhile are skipped, so re-running is a no-op.
 * Reads `pageSize` records at a time until `limit` have been scanned.
 */
export async function assignMissingIdentifiers(
  deps: IdentifierMigrationDeps,
  options: { limit: number; pageSize?: number; signal?: AbortSignal }
): Promise<MigrationReport> {
  await deps.reservedWords.ensureFresh();
  const pageSize = Math.max(1, options.pageSize ?? DEFAULT_PAGE_SIZE);
  const report: MigrationReport = { scanned: 0, assigned: 0, skipped: 0, failed: 0, errors: [] };
  let cursor = 0;
  let halted = false;

  while (!halted && report.scanned < options.limit) {
    const page = await deps.records.listMissingIdentifiers(Math.min(pageSize, options.limit - report.scanned), cursor);
    for (const record of page) {
      if (halted) break;
      report.scanned += 1;
      cursor = record.id;
      try {
        const result = await deps.allocator.assignExisting(record, options.signal);
        if (result.kind === 'assigned') {
          report.assigned += 1;
        } else {
          report.skipped += 1;
        }
      } catch (error) {
        const mapped = mapError(error);
        report.failed += 1;
        report.errors.push({ fingerprint: record.fingerprint, errorCode: mapped.errorCode, error: mapped.message });
        logger.warn('migration.assign_failed', { fingerprint: record.fingerprint, errorCode: mapped.errorCode });
        if (mapped.errorCode === 'KEYSPACE_EXHAUSTED' || mapped.errorCode === 'ALLOCATION_CANCELLED') halted = true;
      }
    }
    if (halted || page.length < pageSize) break;
    logger.debug('migration.assign_missing.page', { scanned: report.scanned, cursor });
  }

  logger.info('migration.assign_missing.completed', {
    scanned: report.scanned,
    assigned: report.assigned,
    skipped: report.skipped,
    failed: report.failed,
  });
  return report;
}
