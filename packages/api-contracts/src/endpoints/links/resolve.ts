import { z } from 'zod';

import { AllocationRecordSchema, IdentifierSchema } from '../../entities/allocation.js';

export const ResolveIdentifierParamsSchema = z.object({
  identifier: IdentifierSchema,
});

/** Body returned when the record has no public URL to redirect to. */
export const ResolveIdentifierResponseSchema = z.object({
  record: AllocationRecordSchema,
});

export type ResolveIdentifierParams = z.infer<typeof ResolveIdentifierParamsSchema>;
export type ResolveIdentifierResponse = z.infer<typeof ResolveIdentifierResponseSchema>;
