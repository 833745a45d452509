import type { AllocatorPolicy } from '../config/allocation.js';
import type {
  AllocationRecord,
  AllocationRecordRepository,
  FileFacts,
  RecordMetadata,
} from '../repositories/types.js';
import {
  AllocationCancelledError,
  IntegrityViolationError,
  KeyspaceExhaustedError,
  isStoreConflict,
} from '../shared/allocationErrors.js';
import { generateIdentifier, generateSalt } from '../utils/identifierCharset.js';
import { logger } from '../utils/logger.js';
import { recordIdentifierCollision, recordKeyspaceEscalation, recordReservedRejection } from '../utils/metrics.js';
import type { FingerprintRegister } from './FingerprintRegister.js';
import type { KeyspaceLedger } from './KeyspaceLedger.js';
import type { ReservedWordFilter } from './ReservedWordFilter.js';

export type AllocationRequest = {
  fingerprint: string;
  file?: FileFacts;
  metadata?: RecordMetadata | null;
  tags?: string[] | null;
};

export type AllocationResult =
  | { kind: 'assigned'; identifier: string; length: number; salt: string; record: AllocationRecord }
  | { kind: 'dedupHit'; record: AllocationRecord };

export type ShortIdAllocatorDeps = {
  ledger: KeyspaceLedger;
  reservedWords: ReservedWordFilter;
  records: AllocationRecordRepository;
  register: FingerprintRegister;
};

export type ShortIdAllocatorOptions = {
  policy: AllocatorPolicy;
  generateCandidate?: (length: number) => string;
  generateSalt?: () => string;
};

export type ShortIdAllocator = {
  /** Mints an identifier for an unregistered fingerprint. Losing a registration race yields a dedup hit. */
  allocate: (request: AllocationRequest, signal?: AbortSignal) => Promise<AllocationResult>;
  /** Gives an existing identifier-less record an identifier; a record that already has one is a dedup hit. */
  assignExisting: (record: AllocationRecord, signal?: AbortSignal) => Promise<AllocationResult>;
};

type Attempt = { identifier: string; length: number; salt: string; slot: number };

type CommitOutcome =
  | { kind: 'committed'; record: AllocationRecord }
  | { kind: 'collision' }
  | { kind: 'dedupHit'; record: AllocationRecord };

type LengthOutcome =
  | { kind: 'done'; result: AllocationResult }
  | { kind: 'escalate'; reason: 'exhausted' | 'attempt_budget' };

function throwIfAborted(signal: AbortSignal | undefined, details: Record<string, unknown>): void {
  if (signal?.aborted) throw new AllocationCancelledError(details);
}

export function createShortIdAllocator(deps: ShortIdAllocatorDeps, options: ShortIdAllocatorOptions): ShortIdAllocator {
  const { ledger, reservedWords, records, register } = deps;
  const { policy } = options;
  const nextCandidate = options.generateCandidate ?? generateIdentifier;
  const nextSalt = options.generateSalt ?? generateSalt;

  // Reserved candidates are redrawn without consuming a ledger slot.
  const drawCandidate = (length: number, budget: { reservedRejections: number }): string | null => {
    while (budget.reservedRejections < policy.maxReservedRejections) {
      const candidate = nextCandidate(length);
      if (!reservedWords.isReserved(candidate)) return candidate;
      budget.reservedRejections += 1;
      recordReservedRejection();
      logger.debug('allocation.reserved_rejected', { length });
    }
    return null;
  };

  const tryLength = async (
    length: number,
    fingerprint: string,
    commit: (attempt: Attempt) => Promise<CommitOutcome>,
    signal: AbortSignal | undefined
  ): Promise<LengthOutcome> => {
    const budget = { reservedRejections: 0 };
    for (let attempt = 1; attempt <= policy.maxAttemptsPerLength; attempt += 1) {
      throwIfAborted(signal, { fingerprint, length, attempt });

      const slot = await ledger.reserveSlot(length);
      if (slot === null) return { kind: 'escalate', reason: 'exhausted' };

      const identifier = drawCandidate(length, budget);
      if (identifier === null) return { kind: 'escalate', reason: 'attempt_budget' };

      if (await records.identifierExists(identifier)) {
        recordIdentifierCollision(length);
        logger.debug('allocation.collision', { length, attempt, stage: 'precheck' });
        continue;
      }

      const salt = nextSalt();
      const outcome = await commit({ identifier, length, salt, slot });
      if (outcome.kind === 'collision') {
        recordIdentifierCollision(length);
        logger.debug('allocation.collision', { length, attempt, stage: 'commit' });
        continue;
      }
      if (outcome.kind === 'dedupHit') {
        return { kind: 'done', result: { kind: 'dedupHit', record: outcome.record } };
      }

      logger.info('allocation.assigned', {
        fingerprint,
        identifier,
        length,
        slot,
        attempt,
        reservedRejections: budget.reservedRejections,
      });
      return { kind: 'done', result: { kind: 'assigned', identifier, length, salt, record: outcome.record } };
    }
    return { kind: 'escalate', reason: 'attempt_budget' };
  };

  const run = async (
    fingerprint: string,
    commit: (attempt: Attempt) => Promise<CommitOutcome>,
    signal: AbortSignal | undefined
  ): Promise<AllocationResult> => {
    let escalations = 0;
    let length = await ledger.currentLength();
    while (true) {
      const outcome = await tryLength(length, fingerprint, commit, signal);
      if (outcome.kind === 'done') return outcome.result;

      if (outcome.reason === 'attempt_budget') {
        await ledger.exhaust(length);
      }
      recordKeyspaceEscalation({ fromLength: length, reason: outcome.reason });
      if (escalations >= policy.maxEscalations) {
        throw new KeyspaceExhaustedError(`allocation gave up after ${escalations} length escalations`, {
          fingerprint,
          lastLength: length,
          maxEscalations: policy.maxEscalations,
        });
      }
      escalations += 1;
      throwIfAborted(signal, { fingerprint, length, escalations });

      const previous = length;
      length = await ledger.currentLength();
      logger.warn('keyspace.escalated', { fingerprint, from: previous, to: length, reason: outcome.reason });
    }
  };

  return {
    allocate: (request, signal) =>
      run(
        request.fingerprint,
        async (attempt) => {
          try {
            const record = await records.commitNew({
              fingerprint: request.fingerprint,
              identifier: attempt.identifier,
              length: attempt.length,
              salt: attempt.salt,
              file: request.file,
              metadata: request.metadata,
              tags: request.tags,
            });
            return { kind: 'committed', record };
          } catch (error) {
            if (isStoreConflict(error, 'identifier')) return { kind: 'collision' };
            if (!isStoreConflict(error, 'fingerprint')) throw error;

            const existing = await register.lookup(request.fingerprint);
            if (!existing) {
              throw new IntegrityViolationError('fingerprint conflict reported but no record is registered', {
                cause: error,
              });
            }
            await records.appendLog(existing.id, 'dedupHit', { via: 'commit_race' });
            logger.info('allocation.dedup_race', { fingerprint: request.fingerprint, identifier: existing.identifier });
            return { kind: 'dedupHit', record: existing };
          }
        },
        signal
      ),

    assignExisting: async (record, signal) => {
      if (record.identifier !== null) return { kind: 'dedupHit', record };
      return run(
        record.fingerprint,
        async (attempt) => {
          let updated: AllocationRecord | null;
          try {
            updated = await records.assignIdentifier({
              recordId: record.id,
              identifier: attempt.identifier,
              length: attempt.length,
              salt: attempt.salt,
            });
          } catch (error) {
            if (isStoreConflict(error, 'identifier')) return { kind: 'collision' };
            throw error;
          }
          if (updated) return { kind: 'committed', record: updated };

          const current = await records.findById(record.id);
          if (!current) throw new IntegrityViolationError(`allocation record ${record.id} disappeared`);
          return { kind: 'dedupHit', record: current };
        },
        signal
      );
    },
  };
}
