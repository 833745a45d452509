import { z } from 'zod';

import {
  AllocationRecordSchema,
  FileFactsSchema,
  FingerprintSchema,
  RecordMetadataSchema,
  TagsSchema,
} from '../../entities/allocation.js';

export const CreateAllocationBodySchema = FileFactsSchema.extend({
  fingerprint: FingerprintSchema,
  metadata: RecordMetadataSchema.optional(),
  tags: TagsSchema.optional(),
});

export const AssignedAllocationSchema = z.object({
  kind: z.literal('assigned'),
  identifier: z.string(),
  length: z.number().int().positive(),
  salt: z.string(),
  record: AllocationRecordSchema,
});

export const DedupHitAllocationSchema = z.object({
  kind: z.literal('dedupHit'),
  record: AllocationRecordSchema,
});

export const CreateAllocationResponseSchema = z.discriminatedUnion('kind', [
  AssignedAllocationSchema,
  DedupHitAllocationSchema,
]);

export type CreateAllocationBody = z.infer<typeof CreateAllocationBodySchema>;
export type CreateAllocationResponse = z.infer<typeof CreateAllocationResponseSchema>;
