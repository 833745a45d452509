import type { Database, DbExecutor } from '../db/client.js';
import { IntegrityViolationError, InvalidStatusTransitionError } from '../shared/allocationErrors.js';
import { firstOrNull, jsonOrNull, scalarNumber, toAllocationRecord, toOperationLogEntry } from './rows.js';
import type { AllocationRecord, AllocationRecordRepository, OperationKind, PendingAllocation } from './types.js';

const nowIso = () => new Date().toISOString();

async function readById(executor: DbExecutor, id: number): Promise<AllocationRecord | null> {
  const rows = await executor.query('SELECT * FROM allocation_records WHERE id = ?', [id]);
  return firstOrNull(rows, toAllocationRecord);
}

async function readByFingerprint(executor: DbExecutor, fingerprint: string): Promise<AllocationRecord | null> {
  const rows = await executor.query('SELECT * FROM allocation_records WHERE fingerprint = ?', [fingerprint]);
  return firstOrNull(rows, toAllocationRecord);
}

async function requireById(executor: DbExecutor, id: number): Promise<AllocationRecord> {
  const record = await readById(executor, id);
  if (!record) throw new IntegrityViolationError(`allocation record ${id} vanished inside its own transaction`);
  return record;
}

async function insertLog(
  executor: DbExecutor,
  recordId: number,
  kind: OperationKind,
  details: Record<string, unknown> | undefined,
  timestamp: string
): Promise<void> {
  await executor.execute(
    'INSERT INTO operation_log (record_id, operation_kind, details, timestamp) VALUES (?, ?, ?, ?)',
    [recordId, kind, jsonOrNull(details), timestamp]
  );
}

async function insertRecord(
  executor: DbExecutor,
  input: PendingAllocation,
  assignment: { identifier: string; length: number; salt: string } | null,
  timestamp: string
): Promise<number> {
  const file = input.file ?? {};
  const result = await executor.execute(
    `INSERT INTO allocation_records (
      fingerprint, identifier, identifier_length, generation_salt, identifier_assigned_at,
      original_filename, file_extension, file_size, media_type,
      status, access_count, metadata, tags, created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 'active', 0, ?, ?, ?, ?)`,
    [
      input.fingerprint,
      assignment?.identifier ?? null,
      assignment?.length ?? null,
      assignment?.salt ?? null,
      assignment ? timestamp : null,
      file.originalFilename ?? null,
      file.fileExtension ?? null,
      file.fileSize ?? null,
      file.mediaType ?? null,
      jsonOrNull(input.metadata),
      jsonOrNull(input.tags),
      timestamp,
      timestamp,
    ]
  );
  return result.lastInsertRowId;
}

export function createAllocationRecordRepository(db: Database): AllocationRecordRepository {
  return {
    findByFingerprint: (fingerprint) => readByFingerprint(db, fingerprint),

    findByIdentifier: async (identifier) => {
      const rows = await db.query('SELECT * FROM allocation_records WHERE identifier = ?', [identifier]);
      return firstOrNull(rows, toAllocationRecord);
    },

    findById: (id) => readById(db, id),

    identifierExists: async (identifier) => {
      const rows = await db.query('SELECT 1 AS hit FROM allocation_records WHERE identifier = ? LIMIT 1', [identifier]);
      return rows.length > 0;
    },

    commitNew: (input) =>
      db.transaction(async (tx) => {
        const timestamp = nowIso();
        const assignment = { identifier: input.identifier, length: input.length, salt: input.salt };
        const id = await insertRecord(tx, input, assignment, timestamp);
        await insertLog(tx, id, 'assign', assignment, timestamp);
        return requireById(tx, id);
      }),

    registerPending: (input) =>
      db.transaction(async (tx) => {
        const id = await insertRecord(tx, input, null, nowIso());
        return requireById(tx, id);
      }),

    assignIdentifier: (input) =>
      db.transaction(async (tx) => {
        const timestamp = nowIso();
        const updated = await tx.execute(
          `UPDATE allocation_records
             SET identifier = ?, identifier_length = ?, generation_salt = ?, identifier_assigned_at = ?, updated_at = ?
           WHERE id = ? AND identifier IS NULL`,
          [input.identifier, input.length, input.salt, timestamp, timestamp, input.recordId]
        );
        if (updated.changes === 0) return null;
        await insertLog(
          tx,
          input.recordId,
          'assign',
          { identifier: input.identifier, length: input.length, salt: input.salt, retroactive: true },
          timestamp
        );
        return requireById(tx, input.recordId);
      }),

    appendLog: async (recordId, kind, details) => {
      await insertLog(db, recordId, kind, details, nowIso());
    },

    markAccessed: (fingerprint) =>
      db.transaction(async (tx) => {
        const timestamp = nowIso();
        const updated = await tx.execute(
          `UPDATE allocation_records
             SET access_count = access_count + 1, last_accessed_at = ?, updated_at = ?
           WHERE fingerprint = ?`,
          [timestamp, timestamp, fingerprint]
        );
        if (updated.changes === 0) return null;
        const record = await readByFingerprint(tx, fingerprint);
        if (!record) return null;
        await insertLog(tx, record.id, 'access', { accessCount: record.accessCount }, timestamp);
        return record;
      }),

    updateUploadMetadata: (fingerprint, upload) =>
      db.transaction(async (tx) => {
        const timestamp = nowIso();
        const updated = await tx.execute(
          'UPDATE allocation_records SET storage_key = ?, public_url = ?, updated_at = ? WHERE fingerprint = ?',
          [upload.storageKey, upload.publicUrl, timestamp, fingerprint]
        );
        if (updated.changes === 0) return null;
        const record = await readByFingerprint(tx, fingerprint);
        if (!record) return null;
        await insertLog(tx, record.id, 'update', { storageKey: upload.storageKey, publicUrl: upload.publicUrl }, timestamp);
        return record;
      }),

    setStatus: (fingerprint, status) =>
      db.transaction(async (tx) => {
        const timestamp = nowIso();
        const updated = await tx.execute(
          "UPDATE allocation_records SET status = ?, updated_at = ? WHERE fingerprint = ? AND status = 'active'",
          [status, timestamp, fingerprint]
        );
        const record = await readByFingerprint(tx, fingerprint);
        if (!record) return null;
        if (updated.changes === 0) {
          throw new InvalidStatusTransitionError(fingerprint, record.status, status);
        }
        await insertLog(tx, record.id, status === 'deleted' ? 'delete' : 'update', { from: 'active', to: status }, timestamp);
        return record;
      }),

    listMissingIdentifiers: async (limit, afterId = 0) => {
      const rows = await db.query(
        "SELECT * FROM allocation_records WHERE identifier IS NULL AND status = 'active' AND id > ? ORDER BY id LIMIT ?",
        [afterId, limit]
      );
      return rows.map(toAllocationRecord);
    },

    history: async (recordId) => {
      const rows = await db.query('SELECT * FROM operation_log WHERE record_id = ? ORDER BY id', [recordId]);
      return rows.map(toOperationLogEntry);
    },

    statistics: async () => {
      const rows = await db.query(
        `SELECT
           COUNT(*) AS total,
           SUM(CASE WHEN identifier IS NOT NULL THEN 1 ELSE 0 END) AS with_identifier,
           SUM(CASE WHEN status = 'active' THEN 1 ELSE 0 END) AS active,
           SUM(CASE WHEN status = 'deleted' THEN 1 ELSE 0 END) AS deleted,
           SUM(CASE WHEN status = 'archived' THEN 1 ELSE 0 END) AS archived
         FROM allocation_records`
      );
      const total = scalarNumber(rows, 'total') ?? 0;
      const withIdentifier = scalarNumber(rows, 'with_identifier') ?? 0;
      return {
        total,
        withIdentifier,
        withoutIdentifier: total - withIdentifier,
        byStatus: {
          active: scalarNumber(rows, 'active') ?? 0,
          deleted: scalarNumber(rows, 'deleted') ?? 0,
          archived: scalarNumber(rows, 'archived') ?? 0,
        },
      };
    },
  };
}
