import type { Database } from '../db/client.js';
import { scalarNumber, toReservedIdentifier } from './rows.js';
import type { ReservedIdentifierRepository } from './types.js';

export function createReservedIdentifierRepository(db: Database): ReservedIdentifierRepository {
  return {
    list: async () => {
      const rows = await db.query('SELECT * FROM reserved_identifiers ORDER BY value');
      return rows.map(toReservedIdentifier);
    },

    add: async (value, reason) => {
      const result = await db.execute(
        'INSERT OR IGNORE INTO reserved_identifiers (value, reason, created_at) VALUES (?, ?, ?)',
        [value.toLowerCase(), reason, new Date().toISOString()]
      );
      return result.changes > 0;
    },

    seed: (entries) =>
      db.transaction(async (tx) => {
        const createdAt = new Date().toISOString();
        let inserted = 0;
        for (const entry of entries) {
          const result = await tx.execute(
            'INSERT OR IGNORE INTO reserved_identifiers (value, reason, created_at) VALUES (?, ?, ?)',
            [entry.value.toLowerCase(), entry.reason, createdAt]
          );
          inserted += result.changes;
        }
        return inserted;
      }),

    count: async () => {
      const rows = await db.query('SELECT COUNT(*) AS total FROM reserved_identifiers');
      return scalarNumber(rows, 'total') ?? 0;
    },
  };
}
