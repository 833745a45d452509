import { z } from 'zod';

export const AssignMissingBodySchema = z.object({
  limit: z.number().int().min(1).max(10_000).default(1000),
});

export const AssignMissingResponseSchema = z.object({
  scanned: z.number().int().nonnegative(),
  assigned: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  errors: z.array(
    z.object({
      fingerprint: z.string(),
      errorCode: z.string(),
      error: z.string(),
    })
  ),
});

export type AssignMissingBody = z.infer<typeof AssignMissingBodySchema>;
export type AssignMissingResponse = z.infer<typeof AssignMissingResponseSchema>;
