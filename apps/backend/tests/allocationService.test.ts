import { describe, expect, it, vi } from 'vitest';
import {
  InvalidStatusTransitionError,
  KeyspaceExhaustedError,
  TransientStorageError,
} from '../src/shared/allocationErrors.js';
import { createTestContext, fingerprintFor, MemoryStorageProvider, scriptedCandidates } from './factories/index.js';

describe('allocation service', () => {
  it('returns the existing identifier for a known fingerprint and logs the dedup hit', async () => {
    const ctx = await createTestContext({ generateCandidate: scriptedCandidates(['Ab3x']) });
    const { allocations } = ctx.services;
    const fingerprint = fingerprintFor('same-bytes');

    const first = await allocations.allocate({ fingerprint, originalFilename: 'cat.png', fileExtension: '.png' });
    const second = await allocations.allocate({ fingerprint: fingerprint.toUpperCase() });

    expect(first.kind).toBe('assigned');
    expect(second.kind).toBe('dedupHit');
    expect(second.record.identifier).toBe('Ab3x');
    expect(second.record.originalFilename).toBe('cat.png');

    const history = await allocations.history(fingerprint);
    expect(history?.entries.map((e) => e.operationKind)).toEqual(['assign', 'dedupHit']);
    expect(history?.entries[1]?.details).toEqual({ via: 'lookup' });
    await ctx.db.close();
  });

  it('yields one record for concurrent allocations of the same fingerprint', async () => {
    const ctx = await createTestContext();
    const { allocations } = ctx.services;
    const fingerprint = fingerprintFor('concurrent');

    const [a, b] = await Promise.all([allocations.allocate({ fingerprint }), allocations.allocate({ fingerprint })]);

    expect([a.kind, b.kind].sort()).toEqual(['assigned', 'dedupHit']);
    expect(a.record.identifier).toBe(b.record.identifier);
    expect(a.record.identifierLength).toBe(b.record.identifierLength);

    const stats = await ctx.repos.allocations.statistics();
    expect(stats.total).toBe(1);
    const history = await allocations.history(fingerprint);
    expect(history?.entries.map((e) => e.operationKind).sort()).toEqual(['assign', 'dedupHit']);
    await ctx.db.close();
  });

  it('turns a fingerprint conflict at commit into a dedup hit', async () => {
    const ctx = await createTestContext({ generateCandidate: scriptedCandidates(['Ab3x', 'Zz9q']) });
    const { allocations } = ctx.services;
    const fingerprint = fingerprintFor('lost-race');
    await allocations.allocate({ fingerprint });
    // The record lands between this caller's lookup and its insert.
    vi.spyOn(ctx.services.register, 'lookup').mockResolvedValueOnce(null);

    const result = await allocations.allocate({ fingerprint });

    expect(result.kind).toBe('dedupHit');
    expect(result.record.identifier).toBe('Ab3x');
    expect((await ctx.repos.allocations.statistics()).total).toBe(1);
    expect(await ctx.repos.allocations.identifierExists('Zz9q')).toBe(false);
    const history = await allocations.history(fingerprint);
    expect(history?.entries.map((e) => e.operationKind)).toEqual(['assign', 'dedupHit']);
    expect(history?.entries[1]?.details).toEqual({ via: 'commit_race' });
    await ctx.db.close();
  });

  it('keeps identifiers unique across many allocations', async () => {
    const ctx = await createTestContext({ allocation: { keyspace: { minLength: 2 } } });
    const results = await Promise.all(
      Array.from({ length: 40 }, (_, i) => ctx.services.allocations.allocate({ fingerprint: fingerprintFor(`bulk-${i}`) }))
    );

    const identifiers = results.map((r) => r.record.identifier);
    expect(new Set(identifiers).size).toBe(40);
    for (const id of identifiers) {
      expect(ctx.services.reservedWords.isReserved(id ?? '')).toBe(false);
    }
    await ctx.db.close();
  });

  it('rejects malformed input before touching storage', async () => {
    const ctx = await createTestContext();
    await expect(ctx.services.allocations.allocate({ fingerprint: 'not-a-hash' })).rejects.toMatchObject({
      name: 'ZodError',
    });
    expect(await ctx.repos.ledger.list()).toEqual([]);
    await ctx.db.close();
  });

  it('stores metadata and tags with the record', async () => {
    const ctx = await createTestContext();
    const fingerprint = fingerprintFor('meta');
    const result = await ctx.services.allocations.allocate({
      fingerprint,
      metadata: { album: 'summer', rating: 4, public: true, note: null },
      tags: ['beach', 'dog'],
    });

    const stored = await ctx.services.allocations.lookup(fingerprint);
    expect(stored?.metadata).toEqual({ album: 'summer', rating: 4, public: true, note: null });
    expect(stored?.tags).toEqual(['beach', 'dog']);
    expect(stored?.id).toBe(result.record.id);
    await ctx.db.close();
  });

  it('retries transient storage failures and then succeeds', async () => {
    const ctx = await createTestContext();
    const commit = vi
      .spyOn(ctx.repos.allocations, 'commitNew')
      .mockRejectedValueOnce(new TransientStorageError('database is locked'));

    const result = await ctx.services.allocations.allocate({ fingerprint: fingerprintFor('flaky') });

    expect(result.kind).toBe('assigned');
    expect(commit).toHaveBeenCalledTimes(2);
    await ctx.db.close();
  });

  it('surfaces transient failures once the retry budget is spent', async () => {
    const ctx = await createTestContext({ allocation: { retry: { maxAttempts: 2 } } });
    const commit = vi
      .spyOn(ctx.repos.allocations, 'commitNew')
      .mockRejectedValue(new TransientStorageError('database is locked'));

    await expect(ctx.services.allocations.allocate({ fingerprint: fingerprintFor('down') })).rejects.toBeInstanceOf(
      TransientStorageError
    );
    expect(commit).toHaveBeenCalledTimes(2);
    await ctx.db.close();
  });

  it('reports each batch item on its own', async () => {
    const ctx = await createTestContext({
      allocation: { keyspace: { minLength: 4, maxLength: 4, capacityOverrides: { 4: 1 } }, batchConcurrency: 1 },
    });
    const winner = fingerprintFor('winner');

    const results = await ctx.services.allocations.allocateBatch([
      { fingerprint: winner },
      { fingerprint: fingerprintFor('no-room') },
      { fingerprint: winner },
    ]);

    expect(results.map((r) => (r.ok ? r.result.kind : r.errorCode))).toEqual([
      'assigned',
      'KEYSPACE_EXHAUSTED',
      'dedupHit',
    ]);
    expect(results.map((r) => r.index)).toEqual([0, 1, 2]);
    await ctx.db.close();
  });

  it('registers a fingerprint without an identifier and assigns one later', async () => {
    const ctx = await createTestContext({ generateCandidate: scriptedCandidates(['Late']) });
    const { allocations } = ctx.services;
    const fingerprint = fingerprintFor('pending');

    const registered = await allocations.registerPending({ fingerprint });
    expect(registered.kind).toBe('pending');
    expect(registered.record.identifier).toBeNull();
    expect((await allocations.registerPending({ fingerprint })).kind).toBe('dedupHit');

    const assigned = await allocations.allocate({ fingerprint });
    expect(assigned.kind === 'assigned' && assigned.identifier).toBe('Late');

    const history = await allocations.history(fingerprint);
    expect(history?.entries).toHaveLength(1);
    expect(history?.entries[0]).toMatchObject({ operationKind: 'assign', details: { retroactive: true } });
    await ctx.db.close();
  });

  it('resolves active identifiers and counts each access', async () => {
    const ctx = await createTestContext({ generateCandidate: scriptedCandidates(['Gx7p']) });
    const { allocations } = ctx.services;
    const fingerprint = fingerprintFor('resolve');
    await allocations.allocate({ fingerprint });

    expect((await allocations.resolve('Gx7p'))?.accessCount).toBe(1);
    const again = await allocations.resolve('Gx7p');
    expect(again?.accessCount).toBe(2);
    expect(again?.lastAccessedAt).not.toBeNull();
    expect(await allocations.resolve('gx7p')).toBeNull();

    await allocations.retire(fingerprint, 'archived');
    expect(await allocations.resolve('Gx7p')).toBeNull();
    await ctx.db.close();
  });

  it('only retires active records', async () => {
    const ctx = await createTestContext();
    const { allocations } = ctx.services;
    const fingerprint = fingerprintFor('retire');
    await allocations.allocate({ fingerprint });

    const deleted = await allocations.retire(fingerprint, 'deleted');
    expect(deleted?.status).toBe('deleted');
    await expect(allocations.retire(fingerprint, 'archived')).rejects.toBeInstanceOf(InvalidStatusTransitionError);
    expect(await allocations.retire(fingerprintFor('unknown'), 'deleted')).toBeNull();

    const history = await allocations.history(fingerprint);
    expect(history?.entries.map((e) => e.operationKind)).toEqual(['assign', 'delete']);
    expect(history?.entries[1]?.details).toEqual({ from: 'active', to: 'deleted' });
    await ctx.db.close();
  });

  it('removes the stored object when a record is deleted but not when archived', async () => {
    const storage = new MemoryStorageProvider();
    const ctx = await createTestContext({ storage });
    const { allocations } = ctx.services;
    const deleted = fingerprintFor('delete-object');
    const archived = fingerprintFor('archive-object');
    for (const [fingerprint, key] of [
      [deleted, 'Dd11.png'],
      [archived, 'Aa22.png'],
    ]) {
      await allocations.allocate({ fingerprint });
      await allocations.updateUploadMetadata(fingerprint, { storageKey: key, publicUrl: `https://cdn.test/${key}` });
    }

    await allocations.retire(deleted, 'deleted');
    await allocations.retire(archived, 'archived');

    expect(storage.deleted).toEqual(['Dd11.png']);
    await ctx.db.close();
  });

  it('never hands a retired record a new identifier on re-upload', async () => {
    const ctx = await createTestContext({ generateCandidate: scriptedCandidates(['Old1']) });
    const { allocations } = ctx.services;
    const fingerprint = fingerprintFor('gone');
    await allocations.allocate({ fingerprint });
    await allocations.retire(fingerprint, 'deleted');

    const again = await allocations.allocate({ fingerprint });
    expect(again.kind).toBe('dedupHit');
    expect(again.record).toMatchObject({ identifier: 'Old1', status: 'deleted' });
    await ctx.db.close();
  });

  it('summarises the keyspace and the records', async () => {
    const ctx = await createTestContext();
    const { allocations } = ctx.services;
    await allocations.allocate({ fingerprint: fingerprintFor('s1') });
    await allocations.allocate({ fingerprint: fingerprintFor('s2') });
    await allocations.registerPending({ fingerprint: fingerprintFor('s3') });

    const stats = await allocations.statistics();

    expect(stats).toEqual({
      charsetSize: 62,
      minLength: 4,
      maxLength: 12,
      currentLength: 4,
      lengths: [{ length: 4, consumed: 2, capacity: 14761559, exhausted: false, usagePercent: 0 }],
      reservedCount: 20,
      records: {
        total: 3,
        withIdentifier: 2,
        withoutIdentifier: 1,
        byStatus: { active: 3, deleted: 0, archived: 0 },
      },
    });
    await ctx.db.close();
  });

  it('maps exhaustion of every length to KeyspaceExhaustedError', async () => {
    const ctx = await createTestContext({
      allocation: { keyspace: { minLength: 4, maxLength: 4, capacityOverrides: { 4: 1 } } },
    });
    await ctx.services.allocations.allocate({ fingerprint: fingerprintFor('only') });
    await expect(
      ctx.services.allocations.allocate({ fingerprint: fingerprintFor('overflow') })
    ).rejects.toBeInstanceOf(KeyspaceExhaustedError);
    await ctx.db.close();
  });
});
