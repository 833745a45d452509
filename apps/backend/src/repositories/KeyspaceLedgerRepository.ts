import type { Database } from '../db/client.js';
import { firstOrNull, scalarNumber, toLedgerEntry } from './rows.js';
import type { KeyspaceLedgerRepository } from './types.js';

const nowIso = () => new Date().toISOString();

export function createKeyspaceLedgerRepository(db: Database): KeyspaceLedgerRepository {
  return {
    findSmallestOpen: async (minLength) => {
      const rows = await db.query(
        'SELECT * FROM keyspace_ledger WHERE length >= ? AND exhausted = 0 ORDER BY length ASC LIMIT 1',
        [minLength]
      );
      return firstOrNull(rows, toLedgerEntry);
    },

    findMaxLength: async () => {
      const rows = await db.query('SELECT MAX(length) AS max_length FROM keyspace_ledger');
      return scalarNumber(rows, 'max_length');
    },

    create: async (length, capacity) => {
      const timestamp = nowIso();
      await db.execute(
        `INSERT OR IGNORE INTO keyspace_ledger (length, consumed, capacity, exhausted, created_at, updated_at)
         VALUES (?, 0, ?, ?, ?, ?)`,
        [length, capacity, capacity === 0 ? 1 : 0, timestamp, timestamp]
      );
    },

    reserveSlot: (length) =>
      db.transaction(async (tx) => {
        const updated = await tx.execute(
          `UPDATE keyspace_ledger
             SET consumed = consumed + 1,
                 exhausted = CASE WHEN consumed + 1 >= capacity THEN 1 ELSE 0 END,
                 updated_at = ?
           WHERE length = ? AND exhausted = 0 AND consumed < capacity`,
          [nowIso(), length]
        );
        if (updated.changes === 0) return null;
        const rows = await tx.query('SELECT consumed FROM keyspace_ledger WHERE length = ?', [length]);
        const consumed = scalarNumber(rows, 'consumed');
        return consumed === null ? null : consumed - 1;
      }),

    exhaust: async (length) => {
      await db.execute(
        `UPDATE keyspace_ledger
           SET consumed = MAX(consumed, capacity), exhausted = 1, updated_at = ?
         WHERE length = ? AND exhausted = 0`,
        [nowIso(), length]
      );
    },

    get: async (length) => {
      const rows = await db.query('SELECT * FROM keyspace_ledger WHERE length = ?', [length]);
      return firstOrNull(rows, toLedgerEntry);
    },

    list: async () => {
      const rows = await db.query('SELECT * FROM keyspace_ledger ORDER BY length ASC');
      return rows.map(toLedgerEntry);
    },
  };
}
