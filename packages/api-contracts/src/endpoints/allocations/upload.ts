import { z } from 'zod';

import { AllocationRecordSchema } from '../../entities/allocation.js';

export const UpdateUploadBodySchema = z.object({
  storageKey: z.string().min(1).max(512),
  publicUrl: z.string().url().max(2048),
});

export const UpdateUploadResponseSchema = z.object({
  record: AllocationRecordSchema,
});

export type UpdateUploadBody = z.infer<typeof UpdateUploadBodySchema>;
export type UpdateUploadResponse = z.infer<typeof UpdateUploadResponseSchema>;
