import type { KeyspacePolicy } from '../config/allocation.js';
import type { KeyspaceLedgerRepository } from '../repositories/types.js';
import { KeyspaceExhaustedError } from '../shared/allocationErrors.js';
import { CHARSET_SIZE, computeCapacity } from '../utils/identifierCharset.js';
import { logger } from '../utils/logger.js';

export type LedgerSnapshotEntry = {
  length: number;
  consumed: number;
  capacity: number;
  exhausted: boolean;
  usagePercent: number;
};

export type KeyspaceLedger = {
  readonly policy: KeyspacePolicy;
  capacityFor: (length: number) => number;
  /** Smallest non-exhausted length >= minLength, opening the next one when every known length is spent. */
  currentLength: () => Promise<number>;
  /** Like currentLength, but never opens a length. */
  peekCurrentLength: () => Promise<number | null>;
  reserveSlot: (length: number) => Promise<number | null>;
  exhaust: (length: number) => Promise<void>;
  snapshot: () => Promise<LedgerSnapshotEntry[]>;
};

function usagePercent(consumed: number, capacity: number): number {
  if (capacity <= 0) return 100;
  return Math.min(100, Math.round((consumed / capacity) * 10_000) / 100);
}

export function createKeyspaceLedger(repo: KeyspaceLedgerRepository, policy: KeyspacePolicy): KeyspaceLedger {
  const capacityFor = (length: number): number =>
    policy.capacityOverrides?.[length] ?? computeCapacity(length, policy.reservedRatio, CHARSET_SIZE);

  const exhaustedError = (details: Record<string, unknown>) =>
    new KeyspaceExhaustedError(
      `every identifier length from ${policy.minLength} to ${policy.maxLength} is exhausted`,
      details
    );

  return {
    policy,
    capacityFor,

    currentLength: async () => {
      // Each pass either returns or opens a strictly longer length, so the range bounds the loop.
      for (let pass = 0; pass <= policy.maxLength - policy.minLength + 1; pass += 1) {
        const open = await repo.findSmallestOpen(policy.minLength);
        if (open) {
          if (open.length > policy.maxLength) throw exhaustedError({ length: open.length });
          return open.length;
        }

        const previousMax = await repo.findMaxLength();
        const next = Math.max((previousMax ?? policy.minLength - 1) + 1, policy.minLength);
        if (next > policy.maxLength) throw exhaustedError({ previousMax });

        const capacity = capacityFor(next);
        await repo.create(next, capacity);
        logger.info('keyspace.length_opened', { length: next, capacity });
      }
      throw exhaustedError({});
    },

    peekCurrentLength: async () => {
      const open = await repo.findSmallestOpen(policy.minLength);
      return open && open.length <= policy.maxLength ? open.length : null;
    },

    reserveSlot: (length) => repo.reserveSlot(length),

    exhaust: async (length) => {
      await repo.exhaust(length);
      logger.info('keyspace.length_exhausted', { length });
    },

    snapshot: async () => {
      const entries = await repo.list();
      return entries.map((entry) => ({
        length: entry.length,
        consumed: entry.consumed,
        capacity: entry.capacity,
        exhausted: entry.exhausted,
        usagePercent: usagePercent(entry.consumed, entry.capacity),
      }));
    },
  };
}
