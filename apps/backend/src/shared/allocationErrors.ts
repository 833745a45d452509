export type ConflictKind = 'fingerprint' | 'identifier';

export type AllocationErrorCode =
  | 'STORE_CONFLICT'
  | 'KEYSPACE_EXHAUSTED'
  | 'TRANSIENT_STORAGE'
  | 'INTEGRITY_VIOLATION'
  | 'ALLOCATION_CANCELLED'
  | 'INVALID_STATUS_TRANSITION'
  | 'SCHEMA_VERSION';

export class AllocationError extends Error {
  public readonly code: AllocationErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: AllocationErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AllocationError';
    this.code = code;
    this.details = details;
  }
}

/** A uniqueness constraint on allocation_records rejected the write. */
export class StoreConflictError extends AllocationError {
  public readonly kind: ConflictKind;

  constructor(kind: ConflictKind, options?: { cause?: unknown }) {
    super('STORE_CONFLICT', `unique constraint violated on ${kind}`, { kind }, options);
    this.name = 'StoreConflictError';
    this.kind = kind;
  }
}

export class KeyspaceExhaustedError extends AllocationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('KEYSPACE_EXHAUSTED', message, details);
    this.name = 'KeyspaceExhaustedError';
  }
}

export class TransientStorageError extends AllocationError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super('TRANSIENT_STORAGE', message, options?.details, { cause: options?.cause });
    this.name = 'TransientStorageError';
  }
}

export class IntegrityViolationError extends AllocationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INTEGRITY_VIOLATION', message, undefined, options);
    this.name = 'IntegrityViolationError';
  }
}

export class AllocationCancelledError extends AllocationError {
  constructor(details?: Record<string, unknown>) {
    super('ALLOCATION_CANCELLED', 'allocation cancelled', details);
    this.name = 'AllocationCancelledError';
  }
}

export class InvalidStatusTransitionError extends AllocationError {
  constructor(fingerprint: string, from: string, to: string) {
    super('INVALID_STATUS_TRANSITION', `cannot move record from ${from} to ${to}`, { fingerprint, from, to });
    this.name = 'InvalidStatusTransitionError';
  }
}

export class SchemaVersionError extends AllocationError {
  constructor(found: number, supported: number) {
    super('SCHEMA_VERSION', `database schema version ${found} is newer than supported version ${supported}`, {
      found,
      supported,
    });
    this.name = 'SchemaVersionError';
  }
}

export function isTransientStorageError(error: unknown): error is TransientStorageError {
  return error instanceof TransientStorageError;
}

export function isStoreConflict(error: unknown, kind?: ConflictKind): error is StoreConflictError {
  return error instanceof StoreConflictError && (kind === undefined || error.kind === kind);
}
