import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ReservedIdentifier, ReservedIdentifierRepository } from '../repositories/types.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_RESERVED_SEED = new URL('../../data/reserved-identifiers.json', import.meta.url);

const seedSchema = z.array(
  z.object({
    value: z.string().min(1).max(32),
    reason: z.string().min(1).nullable().optional(),
  })
);

export type ReservedSeedEntry = { value: string; reason: string | null };

export async function readReservedSeed(file: URL | string = DEFAULT_RESERVED_SEED): Promise<ReservedSeedEntry[]> {
  const raw: unknown = JSON.parse(await readFile(file, 'utf8'));
  return seedSchema.parse(raw).map((entry) => ({ value: entry.value, reason: entry.reason ?? null }));
}

export type ReservedWordFilterOptions = {
  /** Cached set is reloaded once it is older than this; 0 keeps it until reload(). */
  refreshMs: number;
  now?: () => number;
};

/**
 * Case-insensitive denylist held in memory. Allocation reads it synchronously;
 * `ensureFresh()` is awaited once per allocation to pick up timed refreshes.
 */
export class ReservedWordFilter {
  private values: ReadonlySet<string> = new Set();
  private loadedAt: number | null = null;
  private inflight: Promise<number> | null = null;
  private readonly now: () => number;

  constructor(
    private readonly repo: ReservedIdentifierRepository,
    private readonly options: ReservedWordFilterOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.values.size;
  }

  get isLoaded(): boolean {
    return this.loadedAt !== null;
  }

  isReserved(candidate: string): boolean {
    return this.values.has(candidate.toLowerCase());
  }

  async ensureFresh(): Promise<void> {
    if (this.loadedAt === null) {
      await this.reload();
      return;
    }
    if (this.options.refreshMs > 0 && this.now() - this.loadedAt >= this.options.refreshMs) {
      await this.reload();
    }
  }

  /** Concurrent callers share one in-flight load. */
  async reload(): Promise<number> {
    if (!this.inflight) {
      this.inflight = this.load().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  async add(value: string, reason: string | null): Promise<boolean> {
    const added = await this.repo.add(value, reason);
    // A load that started before the insert would miss the new value.
    if (this.inflight) await this.inflight;
    await this.reload();
    if (added) logger.info('reserved.added', { value: value.toLowerCase(), reason });
    return added;
  }

  list(): Promise<ReservedIdentifier[]> {
    return this.repo.list();
  }

  private async load(): Promise<number> {
    const entries = await this.repo.list();
    this.values = new Set(entries.map((entry) => entry.value.toLowerCase()));
    this.loadedAt = this.now();
    logger.debug('reserved.loaded', { count: this.values.size });
    return this.values.size;
  }
}
