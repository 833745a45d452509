export type RecordStatus = 'active' | 'deleted' | 'archived';
export type RetiredStatus = Exclude<RecordStatus, 'active'>;

export type OperationKind = 'assign' | 'dedupHit' | 'access' | 'delete' | 'update';

export type MetadataValue = string | number | boolean | null;
export type RecordMetadata = Record<string, MetadataValue>;

export type FileFacts = {
  originalFilename?: string | null;
  fileExtension?: string | null;
  fileSize?: number | null;
  mediaType?: string | null;
};

export type AllocationRecord = {
  id: number;
  fingerprint: string;
  identifier: string | null;
  identifierLength: number | null;
  generationSalt: string | null;
  identifierAssignedAt: string | null;
  originalFilename: string | null;
  fileExtension: string | null;
  fileSize: number | null;
  mediaType: string | null;
  storageKey: string | null;
  publicUrl: string | null;
  status: RecordStatus;
  accessCount: number;
  lastAccessedAt: string | null;
  metadata: RecordMetadata | null;
  tags: string[] | null;
  createdAt: string;
  updatedAt: string;
};

export type PendingAllocation = {
  fingerprint: string;
  file?: FileFacts;
  metadata?: RecordMetadata | null;
  tags?: string[] | null;
};

export type NewAllocation = PendingAllocation & {
  identifier: string;
  length: number;
  salt: string;
};

export type IdentifierAssignment = {
  recordId: number;
  identifier: string;
  length: number;
  salt: string;
};

export type OperationLogEntry = {
  id: number;
  recordId: number;
  operationKind: OperationKind;
  details: Record<string, unknown> | null;
  timestamp: string;
};

export type RecordStatistics = {
  total: number;
  withIdentifier: number;
  withoutIdentifier: number;
  byStatus: Record<RecordStatus, number>;
};

export type LedgerEntry = {
  length: number;
  consumed: number;
  capacity: number;
  exhausted: boolean;
  createdAt: string;
  updatedAt: string;
};

export type ReservedIdentifier = {
  value: string;
  reason: string | null;
  createdAt: string;
};

export type AllocationRecordRepository = {
  findByFingerprint: (fingerprint: string) => Promise<AllocationRecord | null>;
  findByIdentifier: (identifier: string) => Promise<AllocationRecord | null>;
  findById: (id: number) => Promise<AllocationRecord | null>;
  identifierExists: (identifier: string) => Promise<boolean>;
  /** Inserts the record and its `assign` log entry in one transaction. */
  commitNew: (input: NewAllocation) => Promise<AllocationRecord>;
  registerPending: (input: PendingAllocation) => Promise<AllocationRecord>;
  /** Sets the identifier on a record that has none. Resolves null when the record already had one. */
  assignIdentifier: (input: IdentifierAssignment) => Promise<AllocationRecord | null>;
  appendLog: (recordId: number, kind: OperationKind, details?: Record<string, unknown>) => Promise<void>;
  markAccessed: (fingerprint: string) => Promise<AllocationRecord | null>;
  updateUploadMetadata: (
    fingerprint: string,
    upload: { storageKey: string; publicUrl: string }
  ) => Promise<AllocationRecord | null>;
  setStatus: (fingerprint: string, status: RetiredStatus) => Promise<AllocationRecord | null>;
  /** Active records without an identifier and with `id > afterId`, oldest first. */
  listMissingIdentifiers: (limit: number, afterId?: number) => Promise<AllocationRecord[]>;
  history: (recordId: number) => Promise<OperationLogEntry[]>;
  statistics: () => Promise<RecordStatistics>;
};

export type KeyspaceLedgerRepository = {
  findSmallestOpen: (minLength: number) => Promise<LedgerEntry | null>;
  findMaxLength: () => Promise<number | null>;
  /** INSERT OR IGNORE: creating a length that already exists is a no-op. */
  create: (length: number, capacity: number) => Promise<void>;
  /** Resolves the pre-increment `consumed`, or null when the length is exhausted or unknown. */
  reserveSlot: (length: number) => Promise<number | null>;
  exhaust: (length: number) => Promise<void>;
  get: (length: number) => Promise<LedgerEntry | null>;
  list: () => Promise<LedgerEntry[]>;
};

export type ReservedIdentifierRepository = {
  list: () => Promise<ReservedIdentifier[]>;
  /** Resolves false when the value was already reserved. */
  add: (value: string, reason: string | null) => Promise<boolean>;
  seed: (entries: ReadonlyArray<{ value: string; reason: string | null }>) => Promise<number>;
  count: () => Promise<number>;
};

export type RepositoryContext = {
  allocations: AllocationRecordRepository;
  ledger: KeyspaceLedgerRepository;
  reserved: ReservedIdentifierRepository;
};
