import { z } from 'zod';

import { AllocationRecordSchema, FingerprintSchema } from '../../entities/allocation.js';

export const FingerprintParamsSchema = z.object({
  fingerprint: FingerprintSchema,
});

export const GetAllocationResponseSchema = z.object({
  record: AllocationRecordSchema,
});

export type FingerprintParams = z.infer<typeof FingerprintParamsSchema>;
export type GetAllocationResponse = z.infer<typeof GetAllocationResponseSchema>;
