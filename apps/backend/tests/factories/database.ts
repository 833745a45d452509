import type { Database } from '../../src/db/client.js';
import { initializeSchema } from '../../src/db/schema.js';
import { IN_MEMORY, SqlJsDatabase } from '../../src/db/sqlJsDatabase.js';

export async function openTestDatabase(options: { migrate?: boolean } = {}): Promise<Database> {
  const db = await SqlJsDatabase.open({ filePath: IN_MEMORY, acquireTimeoutMs: 2000 });
  if (options.migrate !== false) await initializeSchema(db);
  return db;
}
