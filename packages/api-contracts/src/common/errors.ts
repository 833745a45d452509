import { z } from 'zod';

export const ApiErrorResponseSchema = z.object({
  errorCode: z.string(),
  error: z.string(),
  requestId: z.string().optional(),
  details: z.unknown().optional(),
});

export type ApiErrorResponse = z.infer<typeof ApiErrorResponseSchema>;
