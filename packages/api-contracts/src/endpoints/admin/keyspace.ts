import { z } from 'zod';

import { KeyspaceStatisticsSchema } from '../../entities/keyspace.js';

export const GetKeyspaceResponseSchema = z.object({
  statistics: KeyspaceStatisticsSchema,
});

export type GetKeyspaceResponse = z.infer<typeof GetKeyspaceResponseSchema>;
