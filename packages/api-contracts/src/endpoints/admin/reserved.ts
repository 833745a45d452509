import { z } from 'zod';

import { IdentifierSchema } from '../../entities/allocation.js';
import { ReservedIdentifierSchema } from '../../entities/keyspace.js';

export const ListReservedResponseSchema = z.object({
  items: z.array(ReservedIdentifierSchema),
  count: z.number().int().nonnegative(),
});

export const AddReservedBodySchema = z.object({
  value: IdentifierSchema,
  reason: z.string().trim().min(1).max(200).optional(),
});

export const AddReservedResponseSchema = z.object({
  added: z.boolean(),
  count: z.number().int().nonnegative(),
});

export const ReloadReservedResponseSchema = z.object({
  count: z.number().int().nonnegative(),
});

export type ListReservedResponse = z.infer<typeof ListReservedResponseSchema>;
export type AddReservedBody = z.infer<typeof AddReservedBodySchema>;
export type AddReservedResponse = z.infer<typeof AddReservedResponseSchema>;
export type ReloadReservedResponse = z.infer<typeof ReloadReservedResponseSchema>;
