import type { Request, Response } from 'express';
import {
  BatchAllocationBodySchema,
  FingerprintParamsSchema,
  ResolveIdentifierParamsSchema,
  UpdateUploadBodySchema,
  type AllocationHistoryResponse,
  type BatchAllocationResponse,
  type ChangeStatusResponse,
  type CreateAllocationResponse,
  type GetAllocationResponse,
  type ResolveIdentifierResponse,
  type UpdateUploadResponse,
} from '@keymint/api-contracts';
import type { RetiredStatus } from '../repositories/types.js';
import type { AllocationService } from '../services/AllocationService.js';
import { ApiError } from '../shared/apiError.js';
import { ERROR_CODES } from '../shared/errors.js';
import { requestSignal, route } from '../shared/route.js';

const allocationNotFound = (fingerprint: string) => ApiError.notFound(ERROR_CODES.ALLOCATION_NOT_FOUND, { fingerprint });

export function createAllocationController(allocations: AllocationService) {
  const changeStatus = (status: RetiredStatus) =>
    route(async (req: Request, res: Response) => {
      const { fingerprint } = FingerprintParamsSchema.parse(req.params);
      const record = await allocations.retire(fingerprint, status);
      if (!record) throw allocationNotFound(fingerprint);
      const body: ChangeStatusResponse = { record };
      return res.json(body);
    });

  return {
    create: route(async (req, res) => {
      const result = await allocations.allocate(req.body, { signal: requestSignal(res) });
      const body: CreateAllocationResponse = result;
      return res.status(result.kind === 'assigned' ? 201 : 200).json(body);
    }),

    createBatch: route(async (req, res) => {
      const { items } = BatchAllocationBodySchema.parse(req.body);
      const results = await allocations.allocateBatch(items, { signal: requestSignal(res) });
      const body: BatchAllocationResponse = {
        results,
        assigned: results.filter((r) => r.ok && r.result.kind === 'assigned').length,
        dedupHits: results.filter((r) => r.ok && r.result.kind === 'dedupHit').length,
        failed: results.filter((r) => !r.ok).length,
      };
      return res.json(body);
    }),

    get: route(async (req, res) => {
      const { fingerprint } = FingerprintParamsSchema.parse(req.params);
      const record = await allocations.lookup(fingerprint);
      if (!record) throw allocationNotFound(fingerprint);
      const body: GetAllocationResponse = { record };
      return res.json(body);
    }),

    history: route(async (req, res) => {
      const { fingerprint } = FingerprintParamsSchema.parse(req.params);
      const found = await allocations.history(fingerprint);
      if (!found) throw allocationNotFound(fingerprint);
      const body: AllocationHistoryResponse = found;
      return res.json(body);
    }),

    updateUpload: route(async (req, res) => {
      const { fingerprint } = FingerprintParamsSchema.parse(req.params);
      const upload = UpdateUploadBodySchema.parse(req.body);
      const record = await allocations.updateUploadMetadata(fingerprint, upload);
      if (!record) throw allocationNotFound(fingerprint);
      const body: UpdateUploadResponse = { record };
      return res.json(body);
    }),

    archive: changeStatus('archived'),
    remove: changeStatus('deleted'),

    // Short link: redirect to the stored object when it has a public URL.
    resolve: route(async (req, res) => {
      const parsed = ResolveIdentifierParamsSchema.safeParse(req.params);
      const record = parsed.success ? await allocations.resolve(parsed.data.identifier) : null;
      if (!record) throw ApiError.notFound(ERROR_CODES.IDENTIFIER_NOT_FOUND);
      if (record.publicUrl) return res.redirect(302, record.publicUrl);
      const body: ResolveIdentifierResponse = { record };
      return res.json(body);
    }),
  };
}

export type AllocationController = ReturnType<typeof createAllocationController>;
