import { describe, expect, it } from 'vitest';
import { AllocationCancelledError, KeyspaceExhaustedError } from '../src/shared/allocationErrors.js';
import { isIdentifierShaped } from '../src/utils/identifierCharset.js';
import { createTestContext, fingerprintFor, scriptedCandidates } from './factories/index.js';

describe('short identifier allocator', () => {
  it('gives the first allocation on a fresh ledger a minimum-length identifier', async () => {
    const ctx = await createTestContext();
    const result = await ctx.services.allocator.allocate({ fingerprint: fingerprintFor('first') });

    expect(result.kind).toBe('assigned');
    if (result.kind !== 'assigned') return;
    expect(result.length).toBe(4);
    expect(isIdentifierShaped(result.identifier, 4)).toBe(true);
    expect(result.salt).toMatch(/^[0-9a-f]{32}$/);
    expect(result.record.identifier).toBe(result.identifier);
    expect(result.record.generationSalt).toBe(result.salt);
    expect((await ctx.repos.ledger.get(4))?.consumed).toBe(1);
    await ctx.db.close();
  });

  it('escalates to the next length when the current one fills up', async () => {
    const ctx = await createTestContext({
      allocation: { keyspace: { capacityOverrides: { 4: 2 } } },
      generateCandidate: scriptedCandidates(),
    });
    const { allocator } = ctx.services;

    const a = await allocator.allocate({ fingerprint: fingerprintFor('a') });
    const b = await allocator.allocate({ fingerprint: fingerprintFor('b') });
    const c = await allocator.allocate({ fingerprint: fingerprintFor('c') });

    expect([a, b, c].map((r) => (r.kind === 'assigned' ? r.identifier : null))).toEqual(['qqq1', 'qqq2', 'qqqq3']);
    expect(await ctx.repos.ledger.get(4)).toMatchObject({ consumed: 2, exhausted: true });
    expect(await ctx.repos.ledger.get(5)).toMatchObject({ consumed: 1, exhausted: false });
    await ctx.db.close();
  });

  it('never draws a candidate of an exhausted length', async () => {
    const requested: number[] = [];
    const next = scriptedCandidates();
    const ctx = await createTestContext({
      allocation: { keyspace: { capacityOverrides: { 4: 1 } } },
      generateCandidate: (length) => {
        requested.push(length);
        return next(length);
      },
    });

    await ctx.services.allocator.allocate({ fingerprint: fingerprintFor('one') });
    await ctx.services.allocator.allocate({ fingerprint: fingerprintFor('two') });
    await ctx.services.allocator.allocate({ fingerprint: fingerprintFor('three') });

    expect(requested).toEqual([4, 5, 5]);
    await ctx.db.close();
  });

  it('redraws reserved candidates without spending a ledger slot', async () => {
    const ctx = await createTestContext({
      allocation: { keyspace: { minLength: 5 } },
      generateCandidate: scriptedCandidates(['admin', 'Zq9xY']),
    });

    const result = await ctx.services.allocator.allocate({ fingerprint: fingerprintFor('reserved') });

    expect(result.kind === 'assigned' && result.identifier).toBe('Zq9xY');
    expect((await ctx.repos.ledger.get(5))?.consumed).toBe(1);
    expect(await ctx.repos.allocations.findByIdentifier('admin')).toBeNull();
    await ctx.db.close();
  });

  it('matches reserved words case-insensitively', async () => {
    const ctx = await createTestContext({
      allocation: { keyspace: { minLength: 3 } },
      generateCandidate: scriptedCandidates(['WWW', 'Api', 'x7Q']),
    });

    const result = await ctx.services.allocator.allocate({ fingerprint: fingerprintFor('case') });
    expect(result.kind === 'assigned' && result.identifier).toBe('x7Q');
    await ctx.db.close();
  });

  it('retries on an identifier collision with a fresh slot', async () => {
    const ctx = await createTestContext({ generateCandidate: scriptedCandidates(['abcd', 'abcd', 'wxyz']) });
    const { allocator } = ctx.services;

    await allocator.allocate({ fingerprint: fingerprintFor('owner') });
    const second = await allocator.allocate({ fingerprint: fingerprintFor('collider') });

    expect(second.kind === 'assigned' && second.identifier).toBe('wxyz');
    expect((await ctx.repos.ledger.get(4))?.consumed).toBe(3);
    await ctx.db.close();
  });

  it('gives up with KeyspaceExhaustedError after the escalation ceiling', async () => {
    const ctx = await createTestContext({
      allocation: { allocator: { maxAttemptsPerLength: 2, maxEscalations: 1 } },
      generateCandidate: () => 'aaaa',
    });
    const { allocator } = ctx.services;
    await allocator.allocate({ fingerprint: fingerprintFor('holder') });

    await expect(allocator.allocate({ fingerprint: fingerprintFor('loser') })).rejects.toBeInstanceOf(
      KeyspaceExhaustedError
    );
    expect((await ctx.repos.ledger.get(4))?.exhausted).toBe(true);
    expect((await ctx.repos.ledger.get(5))?.exhausted).toBe(true);
    expect(await ctx.repos.allocations.findByFingerprint(fingerprintFor('loser'))).toBeNull();
    await ctx.db.close();
  });

  it('exhausts a length whose reserved-rejection budget runs out', async () => {
    const ctx = await createTestContext({
      allocation: { keyspace: { minLength: 3 }, allocator: { maxReservedRejections: 3 } },
      generateCandidate: scriptedCandidates(['api', 'www', 'sys', 'abcd']),
    });

    const result = await ctx.services.allocator.allocate({ fingerprint: fingerprintFor('budget') });

    expect(result.kind === 'assigned' && result.identifier).toBe('abcd');
    expect((await ctx.repos.ledger.get(3))?.exhausted).toBe(true);
    await ctx.db.close();
  });

  it('stops between attempts when the caller aborts', async () => {
    const ctx = await createTestContext();
    const controller = new AbortController();
    controller.abort();

    await expect(
      ctx.services.allocator.allocate({ fingerprint: fingerprintFor('aborted') }, controller.signal)
    ).rejects.toBeInstanceOf(AllocationCancelledError);
    expect((await ctx.repos.ledger.get(4))?.consumed).toBe(0);
    await ctx.db.close();
  });

  it('returns a dedup hit when an identifier-less record already got one', async () => {
    const ctx = await createTestContext({ generateCandidate: scriptedCandidates(['Kp2m']) });
    const pending = await ctx.repos.allocations.registerPending({ fingerprint: fingerprintFor('pending') });

    const first = await ctx.services.allocator.assignExisting(pending);
    const second = await ctx.services.allocator.assignExisting(pending);

    expect(first.kind === 'assigned' && first.identifier).toBe('Kp2m');
    expect(second.kind).toBe('dedupHit');
    expect(second.record.identifier).toBe('Kp2m');
    await ctx.db.close();
  });
});
