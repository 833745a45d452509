import fs from 'fs/promises';
import path from 'path';
import type { IngestResult } from './UploadPipeline.js';

export const DEFAULT_INGEST_FORMATS = ['jpg', 'jpeg', 'png', 'gif', 'bmp', 'tiff', 'webp'] as const;

export type IngestSummary = {
  total: number;
  assigned: number;
  dedupHit: number;
  pending: number;
  failed: number;
  /** Share of files that did not fail, 0..1 (1 for an empty run). */
  successRate: number;
  elapsedMs: number;
};

/** Files under `dir` (recursively) whose extension is one of `formats`, in sorted order. */
export async function scanFiles(dir: string, formats: readonly string[] = DEFAULT_INGEST_FORMATS): Promise<string[]> {
  const wanted = new Set(formats.map((format) => format.toLowerCase().replace(/^\./, '')));
  const found: string[] = [];

  const walk = async (current: string): Promise<void> => {
    const entries = await fs.readdir(current, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (entry.isFile() && wanted.has(path.extname(entry.name).slice(1).toLowerCase())) {
        found.push(full);
      }
    }
  };

  await walk(dir);
  return found;
}

export function summarizeIngest(results: readonly IngestResult[], elapsedMs: number): IngestSummary {
  const summary: IngestSummary = {
    total: results.length,
    assigned: 0,
    dedupHit: 0,
    pending: 0,
    failed: 0,
    successRate: 1,
    elapsedMs,
  };
  for (const result of results) {
    summary[result.outcome] += 1;
  }
  if (summary.total > 0) {
    summary.successRate = (summary.total - summary.failed) / summary.total;
  }
  return summary;
}

const CSV_COLUMNS = ['path', 'outcome', 'identifier', 'fingerprint', 'url', 'errorCode', 'error'] as const;

function csvCell(value: string | null | undefined): string {
  if (value === null || value === undefined) return '';
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** One header row plus one row per result; CRLF line endings. */
export function formatResultsCsv(results: readonly IngestResult[]): string {
  const rows = results.map((result) => CSV_COLUMNS.map((column) => csvCell(result[column])).join(','));
  return [CSV_COLUMNS.join(','), ...rows].map((row) => `${row}\r\n`).join('');
}
