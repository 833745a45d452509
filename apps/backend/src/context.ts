import type { AppConfig } from './config/allocation.js';
import type { Database } from './db/client.js';
import { initializeSchema } from './db/schema.js';
import { createRepositoryContext } from './repositories/index.js';
import type { RepositoryContext } from './repositories/types.js';
import { createServiceContext, type ServiceContext, type ServiceContextOptions } from './services/index.js';
import { readReservedSeed } from './services/ReservedWordFilter.js';
import { createStorageProvider } from './storage/index.js';
import { logger } from './utils/logger.js';

export type AppContext = {
  config: AppConfig;
  db: Database;
  repos: RepositoryContext;
  services: ServiceContext;
};

export type CreateAppContextOptions = Partial<ServiceContextOptions> & {
  db: Database;
  /** Seed file for the reserved set; defaults to the bundled list. Pass null to skip seeding. */
  reservedSeed?: URL | string | null;
};

/** Migrates the store, seeds the reserved set and wires services around one database handle. */
export async function createAppContext(config: AppConfig, options: CreateAppContextOptions): Promise<AppContext> {
  const { db } = options;
  await initializeSchema(db);

  const repos = createRepositoryContext(db);
  if (options.reservedSeed !== null) {
    const seed = await readReservedSeed(options.reservedSeed);
    const inserted = await repos.reserved.seed(seed);
    if (inserted > 0) logger.info('reserved.seeded', { inserted });
  }

  const services = createServiceContext(repos, config, {
    storage: options.storage ?? createStorageProvider(config.storage),
    generateCandidate: options.generateCandidate,
    now: options.now,
  });
  await services.reservedWords.reload();

  return { config, db, repos, services };
}

export async function closeAppContext(ctx: AppContext): Promise<void> {
  await ctx.db.close();
}
