import type { AllocationRecord, AllocationRecordRepository } from '../repositories/types.js';
import { AllocationError, TransientStorageError } from '../shared/allocationErrors.js';

export type FingerprintRegister = {
  /** Null means "not registered"; a storage failure rejects with TransientStorageError instead. */
  lookup: (fingerprint: string) => Promise<AllocationRecord | null>;
  lookupByIdentifier: (identifier: string) => Promise<AllocationRecord | null>;
};

export function normalizeFingerprint(fingerprint: string): string {
  return fingerprint.trim().toLowerCase();
}

async function asStorageRead<T>(what: string, read: () => Promise<T>): Promise<T> {
  try {
    return await read();
  } catch (error) {
    if (error instanceof AllocationError) throw error;
    throw new TransientStorageError(`${what} failed`, { cause: error });
  }
}

export function createFingerprintRegister(records: AllocationRecordRepository): FingerprintRegister {
  return {
    lookup: (fingerprint) =>
      asStorageRead('fingerprint lookup', () => records.findByFingerprint(normalizeFingerprint(fingerprint))),
    lookupByIdentifier: (identifier) =>
      asStorageRead('identifier lookup', () => records.findByIdentifier(identifier)),
  };
}
