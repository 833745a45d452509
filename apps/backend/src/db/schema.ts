import type { Database } from './client.js';
import { SchemaVersionError } from '../shared/allocationErrors.js';
import { logger } from '../utils/logger.js';

export interface Migration {
  version: number;
  name: string;
  statements: string[];
}

export const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    statements: [
      `CREATE TABLE IF NOT EXISTS allocation_records (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        fingerprint TEXT NOT NULL UNIQUE,
        identifier TEXT UNIQUE,
        identifier_length INTEGER,
        generation_salt TEXT,
        identifier_assigned_at TEXT,
        original_filename TEXT,
        file_extension TEXT,
        file_size INTEGER,
        media_type TEXT,
        storage_key TEXT,
        public_url TEXT,
        status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'deleted', 'archived')),
        access_count INTEGER NOT NULL DEFAULT 0,
        last_accessed_at TEXT,
        metadata TEXT,
        tags TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )`,
      'CREATE INDEX IF NOT EXISTS allocation_records_status_idx ON allocation_records(status)',
      `CREATE TABLE IF NOT EXISTS keyspace_ledger (
        length INTEGER PRIMARY KEY,
        consumed INTEGER NOT NULL DEFAULT 0 CHECK (consumed >= 0),
        capacity INTEGER NOT NULL CHECK (capacity >= 0),
        exhausted INTEGER NOT NULL DEFAULT 0 CHECK (exhausted IN (0, 1)),
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        CHECK (consumed <= capacity)
      )`,
      `CREATE TABLE IF NOT EXISTS reserved_identifiers (
        value TEXT PRIMARY KEY,
        reason TEXT,
        created_at TEXT NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS operation_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        record_id INTEGER NOT NULL REFERENCES allocation_records(id),
        operation_kind TEXT NOT NULL CHECK (operation_kind IN ('assign', 'dedupHit', 'access', 'delete', 'update')),
        details TEXT,
        timestamp TEXT NOT NULL
      )`,
      'CREATE INDEX IF NOT EXISTS operation_log_record_idx ON operation_log(record_id)',
    ],
  },
];

export const SCHEMA_VERSION = migrations.reduce((max, m) => Math.max(max, m.version), 0);

export async function getSchemaVersion(db: Database): Promise<number> {
  await db.execute(
    'CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY, applied_at TEXT NOT NULL)'
  );
  const rows = await db.query('SELECT MAX(version) AS version FROM schema_version');
  const version = rows[0]?.version;
  return typeof version === 'number' ? version : 0;
}

/** Applies pending migrations in order. A database written by a newer build is refused. */
export async function initializeSchema(db: Database): Promise<number> {
  const current = await getSchemaVersion(db);
  if (current > SCHEMA_VERSION) {
    throw new SchemaVersionError(current, SCHEMA_VERSION);
  }

  for (const migration of migrations) {
    if (migration.version <= current) continue;
    const applied = await db.transaction(async (tx) => {
      // Another process sharing the file may have applied it since the version was read.
      const done = await tx.query('SELECT 1 AS hit FROM schema_version WHERE version = ?', [migration.version]);
      if (done.length > 0) return false;
      for (const statement of migration.statements) {
        await tx.execute(statement);
      }
      await tx.execute('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)', [
        migration.version,
        new Date().toISOString(),
      ]);
      return true;
    });
    if (applied) logger.info('db.migration_applied', { version: migration.version, name: migration.name });
  }
  return SCHEMA_VERSION;
}
