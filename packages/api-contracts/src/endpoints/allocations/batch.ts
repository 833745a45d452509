import { z } from 'zod';

import { CreateAllocationBodySchema, CreateAllocationResponseSchema } from './create.js';

export const MAX_BATCH_ITEMS = 100;

export const BatchAllocationBodySchema = z.object({
  items: z.array(CreateAllocationBodySchema).min(1).max(MAX_BATCH_ITEMS),
});

export const BatchAllocationItemResultSchema = z.discriminatedUnion('ok', [
  z.object({
    index: z.number().int().nonnegative(),
    fingerprint: z.string(),
    ok: z.literal(true),
    result: CreateAllocationResponseSchema,
  }),
  z.object({
    index: z.number().int().nonnegative(),
    fingerprint: z.string(),
    ok: z.literal(false),
    errorCode: z.string(),
    error: z.string(),
  }),
]);

export const BatchAllocationResponseSchema = z.object({
  results: z.array(BatchAllocationItemResultSchema),
  assigned: z.number().int().nonnegative(),
  dedupHits: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
});

export type BatchAllocationBody = z.infer<typeof BatchAllocationBodySchema>;
export type BatchAllocationItemResult = z.infer<typeof BatchAllocationItemResultSchema>;
export type BatchAllocationResponse = z.infer<typeof BatchAllocationResponseSchema>;
