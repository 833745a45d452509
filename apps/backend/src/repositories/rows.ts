import { z } from 'zod';
import type { SqlRow, SqlValue } from '../db/client.js';
import { IntegrityViolationError } from '../shared/allocationErrors.js';
import type {
  AllocationRecord,
  LedgerEntry,
  OperationLogEntry,
  RecordMetadata,
  ReservedIdentifier,
} from './types.js';

const metadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const metadataSchema = z.record(metadataValueSchema);
const tagsSchema = z.array(z.string());
const detailsSchema = z.record(z.unknown());

const jsonColumn = <T extends z.ZodTypeAny>(schema: T) =>
  z
    .string()
    .nullable()
    .transform((raw, ctx): z.infer<T> | null => {
      if (raw === null) return null;
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'invalid JSON column' });
        return z.NEVER;
      }
      const result = schema.safeParse(parsed);
      if (!result.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error.message });
        return z.NEVER;
      }
      return result.data;
    });

const allocationRecordRowSchema = z
  .object({
    id: z.number().int(),
    fingerprint: z.string(),
    identifier: z.string().nullable(),
    identifier_length: z.number().int().nullable(),
    generation_salt: z.string().nullable(),
    identifier_assigned_at: z.string().nullable(),
    original_filename: z.string().nullable(),
    file_extension: z.string().nullable(),
    file_size: z.number().int().nullable(),
    media_type: z.string().nullable(),
    storage_key: z.string().nullable(),
    public_url: z.string().nullable(),
    status: z.enum(['active', 'deleted', 'archived']),
    access_count: z.number().int(),
    last_accessed_at: z.string().nullable(),
    metadata: jsonColumn(metadataSchema),
    tags: jsonColumn(tagsSchema),
    created_at: z.string(),
    updated_at: z.string(),
  })
  .transform(
    (row): AllocationRecord => ({
      id: row.id,
      fingerprint: row.fingerprint,
      identifier: row.identifier,
      identifierLength: row.identifier_length,
      generationSalt: row.generation_salt,
      identifierAssignedAt: row.identifier_assigned_at,
      originalFilename: row.original_filename,
      fileExtension: row.file_extension,
      fileSize: row.file_size,
      mediaType: row.media_type,
      storageKey: row.storage_key,
      publicUrl: row.public_url,
      status: row.status,
      accessCount: row.access_count,
      lastAccessedAt: row.last_accessed_at,
      metadata: row.metadata,
      tags: row.tags,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    })
  );

const operationLogRowSchema = z
  .object({
    id: z.number().int(),
    record_id: z.number().int(),
    operation_kind: z.enum(['assign', 'dedupHit', 'access', 'delete', 'update']),
    details: jsonColumn(detailsSchema),
    timestamp: z.string(),
  })
  .transform(
    (row): OperationLogEntry => ({
      id: row.id,
      recordId: row.record_id,
      operationKind: row.operation_kind,
      details: row.details,
      timestamp: row.timestamp,
    })
  );

const ledgerRowSchema = z
  .object({
    length: z.number().int(),
    consumed: z.number().int(),
    capacity: z.number().int(),
    exhausted: z.union([z.literal(0), z.literal(1)]),
    created_at: z.string(),
    updated_at: z.string(),
  })
  .transform(
    (row): LedgerEntry => ({
      length: row.length,
      consumed: row.consumed,
      capacity: row.capacity,
      exhausted: row.exhausted === 1,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    })
  );

const reservedRowSchema = z
  .object({
    value: z.string(),
    reason: z.string().nullable(),
    created_at: z.string(),
  })
  .transform((row): ReservedIdentifier => ({ value: row.value, reason: row.reason, createdAt: row.created_at }));

function parseRow<S extends z.ZodTypeAny>(schema: S, table: string, row: SqlRow): z.output<S> {
  const result = schema.safeParse(row);
  if (!result.success) {
    throw new IntegrityViolationError(`unreadable ${table} row: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

export const toAllocationRecord = (row: SqlRow): AllocationRecord =>
  parseRow(allocationRecordRowSchema, 'allocation_records', row);
export const toOperationLogEntry = (row: SqlRow): OperationLogEntry =>
  parseRow(operationLogRowSchema, 'operation_log', row);
export const toLedgerEntry = (row: SqlRow): LedgerEntry => parseRow(ledgerRowSchema, 'keyspace_ledger', row);
export const toReservedIdentifier = (row: SqlRow): ReservedIdentifier =>
  parseRow(reservedRowSchema, 'reserved_identifiers', row);

export function firstOrNull<T>(rows: SqlRow[], map: (row: SqlRow) => T): T | null {
  const row = rows[0];
  return row ? map(row) : null;
}

/** Reads a numeric aggregate (COUNT, MAX) out of a single-row result. */
export function scalarNumber(rows: SqlRow[], column: string): number | null {
  const value = rows[0]?.[column];
  return typeof value === 'number' ? value : null;
}

export function jsonOrNull(value: RecordMetadata | string[] | Record<string, unknown> | null | undefined): SqlValue {
  if (value === null || value === undefined) return null;
  return JSON.stringify(value);
}
