import {
  AddReservedBodySchema,
  AssignMissingBodySchema,
  type AddReservedResponse,
  type AssignMissingResponse,
  type GetKeyspaceResponse,
  type ListReservedResponse,
  type ReloadReservedResponse,
} from '@keymint/api-contracts';
import type { ServiceContext } from '../services/index.js';
import { assignMissingIdentifiers } from '../services/identifierMigration.js';
import type { AllocationRecordRepository } from '../repositories/types.js';
import { requestSignal, route } from '../shared/route.js';

export function createAdminController(services: ServiceContext, records: AllocationRecordRepository) {
  const { allocations, reservedWords, allocator } = services;

  return {
    keyspace: route(async (_req, res) => {
      const body: GetKeyspaceResponse = { statistics: await allocations.statistics() };
      res.setHeader('Cache-Control', 'no-store');
      return res.json(body);
    }),

    listReserved: route(async (_req, res) => {
      const items = await reservedWords.list();
      const body: ListReservedResponse = { items, count: items.length };
      return res.json(body);
    }),

    addReserved: route(async (req, res) => {
      const { value, reason } = AddReservedBodySchema.parse(req.body);
      const added = await reservedWords.add(value, reason ?? null);
      const body: AddReservedResponse = { added, count: reservedWords.size };
      return res.status(added ? 201 : 200).json(body);
    }),

    reloadReserved: route(async (_req, res) => {
      const body: ReloadReservedResponse = { count: await reservedWords.reload() };
      return res.json(body);
    }),

    assignMissing: route(async (req, res) => {
      const { limit } = AssignMissingBodySchema.parse(req.body ?? {});
      const report = await assignMissingIdentifiers(
        { records, allocator, reservedWords },
        { limit, signal: requestSignal(res) }
      );
      const body: AssignMissingResponse = report;
      return res.json(body);
    }),
  };
}

export type AdminController = ReturnType<typeof createAdminController>;
