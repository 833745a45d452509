import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { closeAppContext, createAppContext, type AppContext } from '../src/context.js';
import { SqlJsDatabase } from '../src/db/sqlJsDatabase.js';
import { fingerprintFor, MemoryStorageProvider, scriptedCandidates, testConfig } from './factories/index.js';

const tempDirs: string[] = [];
const contexts: AppContext[] = [];

async function tempDatabasePath(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'keymint-shared-'));
  tempDirs.push(dir);
  return path.join(dir, 'keymint.sqlite');
}

/** One worker: its own handle on the shared file and its own candidate source. */
async function openWorker(filePath: string, candidates: string[]): Promise<AppContext> {
  const db = await SqlJsDatabase.open({ filePath, acquireTimeoutMs: 5000 });
  const ctx = await createAppContext(testConfig(), {
    db,
    storage: new MemoryStorageProvider(),
    generateCandidate: scriptedCandidates(candidates),
    reservedSeed: null,
  });
  contexts.push(ctx);
  return ctx;
}

async function persistedIdentifiers(filePath: string): Promise<unknown[]> {
  const db = await SqlJsDatabase.open({ filePath, acquireTimeoutMs: 1000 });
  try {
    const rows = await db.query('SELECT identifier FROM allocation_records ORDER BY identifier');
    return rows.map((row) => row.identifier);
  } finally {
    await db.close();
  }
}

afterEach(async () => {
  await Promise.all(contexts.splice(0).map((ctx) => closeAppContext(ctx)));
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

describe('workers sharing one database file', () => {
  it('never hand out the same identifier twice', async () => {
    const filePath = await tempDatabasePath();
    const a = await openWorker(filePath, ['Same']);
    const b = await openWorker(filePath, ['Same', 'Diff']);

    const first = await a.services.allocations.allocate({ fingerprint: fingerprintFor('worker-a') });
    const second = await b.services.allocations.allocate({ fingerprint: fingerprintFor('worker-b') });

    expect(first.kind === 'assigned' && first.identifier).toBe('Same');
    expect(second.kind === 'assigned' && second.identifier).toBe('Diff');
    expect((await a.services.ledger.snapshot())[0]?.consumed).toBe(3);

    await Promise.all(contexts.splice(0).map((ctx) => closeAppContext(ctx)));
    expect(await persistedIdentifiers(filePath)).toEqual(['Diff', 'Same']);
  });

  it('settle a fingerprint raced by two workers on a single record', async () => {
    const filePath = await tempDatabasePath();
    const a = await openWorker(filePath, ['Aaaa']);
    const b = await openWorker(filePath, ['Bbbb']);
    const fingerprint = fingerprintFor('raced');

    const [fromA, fromB] = await Promise.all([
      a.services.allocations.allocate({ fingerprint }),
      b.services.allocations.allocate({ fingerprint }),
    ]);

    expect([fromA.kind, fromB.kind].sort()).toEqual(['assigned', 'dedupHit']);
    expect(fromA.record.identifier).toBe(fromB.record.identifier);

    await Promise.all(contexts.splice(0).map((ctx) => closeAppContext(ctx)));
    expect(await persistedIdentifiers(filePath)).toEqual([fromA.record.identifier]);
  });

  it('reports an assignment whose first commit never reached the file as assigned', async () => {
    const filePath = await tempDatabasePath();
    const ctx = await openWorker(filePath, ['Fst1', 'Snd2']);
    const blocker = `${filePath}.${process.pid}.tmp`;
    const commitNew = ctx.repos.allocations.commitNew;
    const spy = vi.spyOn(ctx.repos.allocations, 'commitNew').mockImplementationOnce(async (input) => {
      await fs.mkdir(blocker);
      try {
        return await commitNew(input);
      } finally {
        await fs.rm(blocker, { recursive: true, force: true });
      }
    });
    const fingerprint = fingerprintFor('flaky-disk');

    const result = await ctx.services.allocations.allocate({ fingerprint });

    expect(spy).toHaveBeenCalledTimes(2);
    expect(result.kind === 'assigned' && result.identifier).toBe('Snd2');
    const history = await ctx.services.allocations.history(fingerprint);
    expect(history?.entries.map((e) => e.operationKind)).toEqual(['assign']);
  });
});
