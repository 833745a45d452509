import { z } from 'zod';

export const RecordStatusSchema = z.enum(['active', 'deleted', 'archived']);

export const OperationKindSchema = z.enum(['assign', 'dedupHit', 'access', 'delete', 'update']);

export const AllocationKindSchema = z.enum(['assigned', 'dedupHit']);

export const IngestOutcomeSchema = z.enum(['assigned', 'dedupHit', 'pending', 'failed']);

export type RecordStatus = z.infer<typeof RecordStatusSchema>;
export type OperationKind = z.infer<typeof OperationKindSchema>;
export type AllocationKind = z.infer<typeof AllocationKindSchema>;
export type IngestOutcome = z.infer<typeof IngestOutcomeSchema>;
