import '../src/config/loadEnv.js';
import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { buildAppConfig } from '../src/config/allocation.js';
import { env } from '../src/config/env.js';
import { closeAppContext, createAppContext } from '../src/context.js';
import { SqlJsDatabase } from '../src/db/sqlJsDatabase.js';
import {
  DEFAULT_INGEST_FORMATS,
  formatResultsCsv,
  scanFiles,
  summarizeIngest,
} from '../src/services/directoryIngest.js';
import { logger } from '../src/utils/logger.js';

/**
 * Ingest every supported file under a directory: fingerprint, allocate and store.
 *
 * Usage:
 *   npm run ingest -- ./photos --dry-run
 *   npm run ingest -- ./photos --csv=ingest-results.csv
 *   npm run ingest -- ./photos --formats=png,webp
 */

type IngestOptions = {
  dir: string | null;
  dryRun: boolean;
  csvPath: string | null;
  formats: string[];
};

export function parseArgs(argv: string[]): IngestOptions {
  const dryRun = argv.includes('--dry-run');
  const csvArg = argv.find((arg) => arg.startsWith('--csv='));
  const formatsArg = argv.find((arg) => arg.startsWith('--formats='));
  const formats = (formatsArg?.slice('--formats='.length) ?? '')
    .split(',')
    .map((format) => format.trim())
    .filter(Boolean);
  const dir = argv.find((arg) => !arg.startsWith('--')) ?? null;
  return {
    dir,
    dryRun,
    csvPath: csvArg ? csvArg.slice('--csv='.length) || null : null,
    formats: formats.length > 0 ? formats : [...DEFAULT_INGEST_FORMATS],
  };
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  if (!options.dir) {
    console.error('[ingest] usage: ingest-directory <dir> [--dry-run] [--csv=<file>] [--formats=jpg,png]');
    process.exitCode = 1;
    return;
  }

  const files = await scanFiles(options.dir, options.formats);
  console.log(`[ingest] ${files.length} file(s) under ${options.dir} (${options.formats.join(',')})`);
  if (files.length === 0) {
    process.exitCode = 1;
    return;
  }
  if (options.dryRun) {
    for (const file of files) console.log(`  ${file}`);
    return;
  }

  const config = buildAppConfig(env);
  const db = await SqlJsDatabase.open({
    filePath: config.database.path,
    acquireTimeoutMs: config.database.acquireTimeoutMs,
  });
  const ctx = await createAppContext(config, { db });
  try {
    const startedAt = Date.now();
    logger.info('ingest.start', { dir: options.dir, files: files.length, shortIdsEnabled: config.allocation.shortIdsEnabled });
    const results = await ctx.services.uploads.ingestBatch(files);
    const summary = summarizeIngest(results, Date.now() - startedAt);
    logger.info('ingest.completed', summary);

    console.log(
      `[ingest] total=${summary.total} assigned=${summary.assigned} dedupHit=${summary.dedupHit} ` +
        `pending=${summary.pending} failed=${summary.failed} ` +
        `success=${(summary.successRate * 100).toFixed(1)}% elapsed=${summary.elapsedMs}ms`
    );
    for (const failed of results.filter((result) => result.outcome === 'failed')) {
      console.error(`- ${failed.path}: ${failed.errorCode ?? 'ERROR'} ${failed.error ?? ''}`.trimEnd());
    }

    if (options.csvPath) {
      await fs.writeFile(options.csvPath, formatResultsCsv(results), 'utf8');
      console.log(`[ingest] results written to ${options.csvPath}`);
    }
    if (summary.failed > 0) process.exitCode = 1;
  } finally {
    await closeAppContext(ctx);
  }
}

const entryPath = process.argv[1] ? path.resolve(process.argv[1]) : '';
const isDirectRun = entryPath && fileURLToPath(import.meta.url) === entryPath;
if (isDirectRun) {
  main().catch((error: unknown) => {
    console.error('[ingest] ERROR', error);
    process.exitCode = 1;
  });
}
