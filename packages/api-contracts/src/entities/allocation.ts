import { z } from 'zod';

import { OperationKindSchema, RecordStatusSchema } from '../common/enums.js';

export const MAX_METADATA_KEYS = 32;
export const MAX_TAGS = 32;

/** Lowercase hex SHA-256 or SHA-512 digest. Uppercase input is normalised. */
export const FingerprintSchema = z
  .string()
  .trim()
  .toLowerCase()
  .regex(/^(?:[0-9a-f]{64}|[0-9a-f]{128})$/, 'fingerprint must be a hex SHA-256 or SHA-512 digest');

export const IdentifierSchema = z.string().regex(/^[0-9A-Za-z]{1,32}$/, 'identifier must be alphanumeric');

export const FileExtensionSchema = z
  .string()
  .trim()
  .toLowerCase()
  .regex(/^\.[a-z0-9]{1,15}$/, 'extension must look like ".png"');

export const MetadataValueSchema = z.union([z.string().max(1024), z.number().finite(), z.boolean(), z.null()]);

export const RecordMetadataSchema = z
  .record(z.string().min(1).max(64), MetadataValueSchema)
  .refine((value) => Object.keys(value).length <= MAX_METADATA_KEYS, {
    message: `metadata accepts at most ${MAX_METADATA_KEYS} keys`,
  });

export const TagsSchema = z.array(z.string().trim().min(1).max(64)).max(MAX_TAGS);

export const FileFactsSchema = z.object({
  originalFilename: z.string().min(1).max(1024).optional(),
  fileExtension: FileExtensionSchema.optional(),
  fileSize: z.number().int().nonnegative().optional(),
  mediaType: z.string().min(1).max(255).optional(),
});

export const AllocationRecordSchema = z.object({
  id: z.number().int(),
  fingerprint: z.string(),
  identifier: z.string().nullable(),
  identifierLength: z.number().int().nullable(),
  generationSalt: z.string().nullable(),
  identifierAssignedAt: z.string().nullable(),
  originalFilename: z.string().nullable(),
  fileExtension: z.string().nullable(),
  fileSize: z.number().int().nullable(),
  mediaType: z.string().nullable(),
  storageKey: z.string().nullable(),
  publicUrl: z.string().nullable(),
  status: RecordStatusSchema,
  accessCount: z.number().int().nonnegative(),
  lastAccessedAt: z.string().nullable(),
  metadata: RecordMetadataSchema.nullable(),
  tags: TagsSchema.nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const OperationLogEntrySchema = z.object({
  id: z.number().int(),
  recordId: z.number().int(),
  operationKind: OperationKindSchema,
  details: z.record(z.unknown()).nullable(),
  timestamp: z.string(),
});

export type MetadataValue = z.infer<typeof MetadataValueSchema>;
export type RecordMetadata = z.infer<typeof RecordMetadataSchema>;
export type FileFacts = z.infer<typeof FileFactsSchema>;
export type AllocationRecordDto = z.infer<typeof AllocationRecordSchema>;
export type OperationLogEntryDto = z.infer<typeof OperationLogEntrySchema>;
