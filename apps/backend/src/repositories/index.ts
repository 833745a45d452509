import type { Database } from '../db/client.js';
import type { RepositoryContext } from './types.js';
import { createAllocationRecordRepository } from './AllocationRecordRepository.js';
import { createKeyspaceLedgerRepository } from './KeyspaceLedgerRepository.js';
import { createReservedIdentifierRepository } from './ReservedIdentifierRepository.js';

export function createRepositoryContext(db: Database): RepositoryContext {
  return {
    allocations: createAllocationRecordRepository(db),
    ledger: createKeyspaceLedgerRepository(db),
    reserved: createReservedIdentifierRepository(db),
  };
}
