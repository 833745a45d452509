import { describe, expect, it } from 'vitest';
import { createKeyspaceLedgerRepository } from '../src/repositories/KeyspaceLedgerRepository.js';
import { createKeyspaceLedger } from '../src/services/KeyspaceLedger.js';
import { KeyspaceExhaustedError } from '../src/shared/allocationErrors.js';
import { CHARSET_SIZE, computeCapacity } from '../src/utils/identifierCharset.js';
import { openTestDatabase } from './factories/index.js';

async function makeLedger(policy: Partial<Parameters<typeof createKeyspaceLedger>[1]> = {}) {
  const db = await openTestDatabase();
  const repo = createKeyspaceLedgerRepository(db);
  const ledger = createKeyspaceLedger(repo, { minLength: 4, maxLength: 12, reservedRatio: 0.001, ...policy });
  return { db, repo, ledger };
}

describe('computeCapacity', () => {
  it('keeps (1 - ratio) of the keyspace, rounded down', () => {
    expect(CHARSET_SIZE).toBe(62);
    expect(computeCapacity(4, 0.001)).toBe(14761559);
    expect(computeCapacity(1, 0)).toBe(62);
    expect(computeCapacity(2, 0.5)).toBe(1922);
  });

  it('clamps lengths past 2^53 to MAX_SAFE_INTEGER', () => {
    expect(computeCapacity(12, 0.001)).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('returns 0 for non-positive lengths', () => {
    expect(computeCapacity(0, 0.001)).toBe(0);
    expect(computeCapacity(-3, 0.001)).toBe(0);
  });
});

describe('keyspace ledger', () => {
  it('opens the minimum length on first use', async () => {
    const { ledger, repo, db } = await makeLedger();

    expect(await ledger.peekCurrentLength()).toBeNull();
    expect(await ledger.currentLength()).toBe(4);

    const entry = await repo.get(4);
    expect(entry).toMatchObject({ length: 4, consumed: 0, capacity: 14761559, exhausted: false });
    await db.close();
  });

  it('hands out increasing slot numbers and flags the length when the last slot goes', async () => {
    const { ledger, repo, db } = await makeLedger({ capacityOverrides: { 4: 2 } });
    await ledger.currentLength();

    expect(await ledger.reserveSlot(4)).toBe(0);
    expect((await repo.get(4))?.exhausted).toBe(false);
    expect(await ledger.reserveSlot(4)).toBe(1);
    expect(await repo.get(4)).toMatchObject({ consumed: 2, exhausted: true });
    expect(await ledger.reserveSlot(4)).toBeNull();
    expect((await repo.get(4))?.consumed).toBe(2);
    await db.close();
  });

  it('moves to the next length once the current one is exhausted', async () => {
    const { ledger, db } = await makeLedger({ capacityOverrides: { 4: 1 } });
    expect(await ledger.currentLength()).toBe(4);
    await ledger.reserveSlot(4);

    expect(await ledger.currentLength()).toBe(5);
    const snapshot = await ledger.snapshot();
    expect(snapshot.map((e) => [e.length, e.exhausted])).toEqual([
      [4, true],
      [5, false],
    ]);
    expect(snapshot[0]?.usagePercent).toBe(100);
    await db.close();
  });

  it('never reopens an exhausted length', async () => {
    const { ledger, repo, db } = await makeLedger();
    await ledger.currentLength();
    await ledger.reserveSlot(4);
    await ledger.exhaust(4);

    expect(await repo.get(4)).toMatchObject({ consumed: 14761559, exhausted: true });
    await repo.create(4, 10);
    expect((await repo.get(4))?.exhausted).toBe(true);
    expect(await ledger.reserveSlot(4)).toBeNull();
    expect(await ledger.currentLength()).toBe(5);
    await db.close();
  });

  it('treats a zero-capacity length as exhausted on creation', async () => {
    const { ledger, repo, db } = await makeLedger({ capacityOverrides: { 4: 0 } });
    expect(await ledger.currentLength()).toBe(5);
    expect((await repo.get(4))?.exhausted).toBe(true);
    await db.close();
  });

  it('throws KeyspaceExhaustedError past the maximum length', async () => {
    const { ledger, db } = await makeLedger({ minLength: 4, maxLength: 5, capacityOverrides: { 4: 1, 5: 1 } });
    await ledger.currentLength();
    await ledger.reserveSlot(4);
    await ledger.currentLength();
    await ledger.reserveSlot(5);

    await expect(ledger.currentLength()).rejects.toBeInstanceOf(KeyspaceExhaustedError);
    expect(await ledger.peekCurrentLength()).toBeNull();
    await db.close();
  });
});
