import {
  AllocationError,
  IntegrityViolationError,
  StoreConflictError,
  TransientStorageError,
} from '../shared/allocationErrors.js';
import { errorMessage } from '../utils/logger.js';

const UNIQUE_FINGERPRINT = /UNIQUE constraint failed: allocation_records\.fingerprint/;
const UNIQUE_IDENTIFIER = /UNIQUE constraint failed: allocation_records\.identifier/;
const CONSTRAINT = /constraint failed/i;
const TRANSIENT = /database is locked|database table is locked|SQLITE_BUSY|disk I\/O error|out of memory|unable to open database/i;

/**
 * Maps a driver error onto the allocation error taxonomy.
 * Errors that are already classified, and SQL programming errors, pass through unchanged.
 */
export function translateSqlError(error: unknown): unknown {
  if (error instanceof AllocationError) return error;
  const message = errorMessage(error);
  if (UNIQUE_FINGERPRINT.test(message)) return new StoreConflictError('fingerprint', { cause: error });
  if (UNIQUE_IDENTIFIER.test(message)) return new StoreConflictError('identifier', { cause: error });
  if (CONSTRAINT.test(message)) return new IntegrityViolationError(message, { cause: error });
  if (TRANSIENT.test(message)) return new TransientStorageError(message, { cause: error });
  return error;
}
