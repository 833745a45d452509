import { z } from 'zod';

export const LedgerEntryStatsSchema = z.object({
  length: z.number().int().positive(),
  consumed: z.number().int().nonnegative(),
  capacity: z.number().int().nonnegative(),
  exhausted: z.boolean(),
  usagePercent: z.number().min(0).max(100),
});

export const RecordCountsSchema = z.object({
  total: z.number().int().nonnegative(),
  withIdentifier: z.number().int().nonnegative(),
  withoutIdentifier: z.number().int().nonnegative(),
  byStatus: z.object({
    active: z.number().int().nonnegative(),
    deleted: z.number().int().nonnegative(),
    archived: z.number().int().nonnegative(),
  }),
});

export const KeyspaceStatisticsSchema = z.object({
  charsetSize: z.number().int().positive(),
  minLength: z.number().int().positive(),
  maxLength: z.number().int().positive(),
  currentLength: z.number().int().positive().nullable(),
  lengths: z.array(LedgerEntryStatsSchema),
  reservedCount: z.number().int().nonnegative(),
  records: RecordCountsSchema,
});

export const ReservedIdentifierSchema = z.object({
  value: z.string(),
  reason: z.string().nullable(),
  createdAt: z.string(),
});

export type LedgerEntryStats = z.infer<typeof LedgerEntryStatsSchema>;
export type RecordCounts = z.infer<typeof RecordCountsSchema>;
export type KeyspaceStatistics = z.infer<typeof KeyspaceStatisticsSchema>;
export type ReservedIdentifierDto = z.infer<typeof ReservedIdentifierSchema>;
