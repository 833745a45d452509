import { z } from 'zod';

import { AllocationRecordSchema, OperationLogEntrySchema } from '../../entities/allocation.js';

export const AllocationHistoryResponseSchema = z.object({
  record: AllocationRecordSchema,
  entries: z.array(OperationLogEntrySchema),
});

export type AllocationHistoryResponse = z.infer<typeof AllocationHistoryResponseSchema>;
