import { z } from 'zod';

import { AllocationRecordSchema } from '../../entities/allocation.js';

export const ChangeStatusResponseSchema = z.object({
  record: AllocationRecordSchema,
});

export type ChangeStatusResponse = z.infer<typeof ChangeStatusResponseSchema>;
