import { mkdir, readFile, rename, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Database as SqlJsHandle, SqlJsStatic } from 'sql.js';
import type { Database, DbExecutor, ExecuteResult, SqlRow, SqlValue } from './client.js';
import { translateSqlError } from './errors.js';
import { withFileLock } from './fileLock.js';
import { ConnectionPool } from './pool.js';
import { TransientStorageError } from '../shared/allocationErrors.js';
import { errorMessage, logger } from '../utils/logger.js';

export const IN_MEMORY = ':memory:';

export type SqlJsDatabaseOptions = {
  /** File the database is loaded from and written back to; `:memory:` keeps it in process only. */
  filePath: string;
  acquireTimeoutMs: number;
  sqlJs?: SqlJsStatic;
};

let sqlJsModule: Promise<SqlJsStatic> | null = null;

async function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsModule) {
    // sql.js is CommonJS: the namespace default is module.exports, which re-exports itself as `default`.
    sqlJsModule = import('sql.js').then((mod) => mod.default.default());
  }
  return sqlJsModule;
}

/** Synchronous sql.js handle behind the async executor interface. */
class SqlJsConnection implements DbExecutor {
  constructor(public handle: SqlJsHandle) {
    handle.run('PRAGMA foreign_keys = ON');
  }

  /** Swaps in a freshly loaded image of the database file. */
  replace(next: SqlJsHandle): void {
    this.handle.close();
    this.handle = next;
    next.run('PRAGMA foreign_keys = ON');
  }

  async query(sql: string, params: SqlValue[] = []): Promise<SqlRow[]> {
    return this.querySync(sql, params);
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<ExecuteResult> {
    return this.executeSync(sql, params);
  }

  querySync(sql: string, params: SqlValue[] = []): SqlRow[] {
    try {
      const stmt = this.handle.prepare(sql);
      try {
        if (params.length > 0) stmt.bind(params);
        const rows: SqlRow[] = [];
        while (stmt.step()) {
          rows.push(stmt.getAsObject());
        }
        return rows;
      } finally {
        stmt.free();
      }
    } catch (error) {
      throw translateSqlError(error);
    }
  }

  executeSync(sql: string, params: SqlValue[] = []): ExecuteResult {
    try {
      this.handle.run(sql, params.length > 0 ? params : null);
    } catch (error) {
      throw translateSqlError(error);
    }
    const changes = this.handle.getRowsModified();
    const idRow = this.querySync('SELECT last_insert_rowid() AS id')[0];
    const lastInsertRowId = typeof idRow?.id === 'number' ? idRow.id : 0;
    return { lastInsertRowId, changes };
  }
}

/** Executor handed to a transaction body; refuses to be used once the transaction has ended. */
class TransactionExecutor implements DbExecutor {
  private open = true;

  constructor(private readonly connection: SqlJsConnection) {}

  end(): void {
    this.open = false;
  }

  async query(sql: string, params?: SqlValue[]): Promise<SqlRow[]> {
    this.assertOpen();
    return this.connection.querySync(sql, params);
  }

  async execute(sql: string, params?: SqlValue[]): Promise<ExecuteResult> {
    this.assertOpen();
    return this.connection.executeSync(sql, params);
  }

  private assertOpen(): void {
    if (!this.open) throw new Error('transaction executor used after its transaction ended');
  }
}

type FileSignature = { ino: number; size: number; mtimeMs: number };

function sameFile(a: FileSignature | null, b: FileSignature | null): boolean {
  if (a === null || b === null) return a === b;
  return a.ino === b.ino && a.size === b.size && a.mtimeMs === b.mtimeMs;
}

/**
 * SQLite store on sql.js. SQLite allows a single writer, so the pool holds one
 * connection and every statement is serialised through it.
 *
 * A file-backed database may be shared by several processes. Each write takes
 * the file lock, reloads the image when another process replaced the file,
 * runs, then exports and atomically replaces the file before the lock is
 * released. A write counts as committed only once the file is replaced.
 */
export class SqlJsDatabase implements Database {
  /** File as of the last load or write; null when it did not exist. */
  private seen: FileSignature | null = null;
  /** The in-memory image may hold a write that never reached the file. */
  private stale = false;

  private constructor(
    private readonly SQL: SqlJsStatic,
    private readonly pool: ConnectionPool<SqlJsConnection>,
    private readonly options: SqlJsDatabaseOptions
  ) {}

  static async open(options: SqlJsDatabaseOptions): Promise<SqlJsDatabase> {
    const SQL = options.sqlJs ?? (await loadSqlJs());
    let handle: SqlJsHandle = new SQL.Database();
    let seen: FileSignature | null = null;
    if (options.filePath !== IN_MEMORY) {
      await mkdir(path.dirname(options.filePath), { recursive: true });
      seen = await statFile(options.filePath);
      const existing = seen ? await readExisting(options.filePath) : null;
      if (existing) {
        handle.close();
        handle = new SQL.Database(existing);
      }
    }
    const pool = new ConnectionPool([new SqlJsConnection(handle)], {
      name: 'sqlite',
      acquireTimeoutMs: options.acquireTimeoutMs,
    });
    const db = new SqlJsDatabase(SQL, pool, options);
    db.seen = seen;
    logger.info('db.opened', { filePath: options.filePath });
    return db;
  }

  private get shared(): boolean {
    return this.options.filePath !== IN_MEMORY;
  }

  async query(sql: string, params?: SqlValue[]): Promise<SqlRow[]> {
    return this.pool.use(async (conn) => {
      // Files are replaced by rename, so a read never sees half a write.
      if (this.shared) await this.refresh(conn);
      return conn.querySync(sql, params);
    });
  }

  async execute(sql: string, params?: SqlValue[]): Promise<ExecuteResult> {
    return this.pool.use((conn) =>
      this.write(conn, async () => {
        const result = conn.executeSync(sql, params);
        await this.persist(conn);
        return result;
      })
    );
  }

  async transaction<T>(fn: (tx: DbExecutor) => Promise<T>): Promise<T> {
    return this.pool.use((conn) =>
      this.write(conn, async () => {
        conn.executeSync('BEGIN IMMEDIATE');
        const tx = new TransactionExecutor(conn);
        let result: T;
        try {
          result = await fn(tx);
          conn.executeSync('COMMIT');
        } catch (error) {
          rollbackQuietly(conn, error);
          throw error;
        } finally {
          tx.end();
        }
        await this.persist(conn);
        return result;
      })
    );
  }

  async close(): Promise<void> {
    await this.pool.drain(async ([conn]) => {
      if (!conn) return;
      conn.handle.close();
      logger.info('db.closed', { filePath: this.options.filePath });
    });
  }

  private async write<T>(conn: SqlJsConnection, fn: () => Promise<T>): Promise<T> {
    if (!this.shared) return fn();
    return withFileLock(this.options.filePath, this.options.acquireTimeoutMs, async () => {
      await this.refresh(conn);
      return fn();
    });
  }

  /** Reloads the image when the file changed under us or our last write never reached it. */
  private async refresh(conn: SqlJsConnection): Promise<void> {
    const current = await statFile(this.options.filePath);
    if (!this.stale && sameFile(current, this.seen)) return;

    const bytes = current ? await readExisting(this.options.filePath) : null;
    conn.replace(bytes ? new this.SQL.Database(bytes) : new this.SQL.Database());
    this.seen = current;
    this.stale = false;
    logger.debug('db.reloaded', { filePath: this.options.filePath, bytes: bytes?.length ?? 0 });
  }

  private async persist(conn: SqlJsConnection): Promise<void> {
    if (!this.shared) return;
    const { filePath } = this.options;
    const bytes = conn.handle.export();
    // export() resets connection pragmas
    conn.handle.run('PRAGMA foreign_keys = ON');
    const tmp = `${filePath}.${process.pid}.tmp`;
    try {
      await writeFile(tmp, bytes);
      await rename(tmp, filePath);
    } catch (error) {
      // The file still holds the previous state; the next access reloads it.
      this.stale = true;
      logger.error('db.persist_failed', { filePath, errorMessage: errorMessage(error) });
      throw new TransientStorageError(`write was not persisted: ${errorMessage(error)}`, { cause: error });
    }
    this.seen = await statFile(filePath).catch((error: unknown) => {
      // Unknown signature: the next access reloads, which is harmless.
      logger.warn('db.stat_failed', { filePath, errorMessage: errorMessage(error) });
      return null;
    });
  }
}

function rollbackQuietly(conn: SqlJsConnection, original: unknown): void {
  try {
    conn.handle.run('ROLLBACK');
  } catch (rollbackError) {
    // A failed statement may already have ended the transaction.
    logger.debug('db.rollback_skipped', {
      reason: errorMessage(rollbackError),
      original: errorMessage(original),
    });
  }
}

async function statFile(filePath: string): Promise<FileSignature | null> {
  try {
    const info = await stat(filePath);
    return { ino: info.ino, size: info.size, mtimeMs: info.mtimeMs };
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw new TransientStorageError(`failed to stat database file: ${errorMessage(error)}`, { cause: error });
  }
}

async function readExisting(filePath: string): Promise<Uint8Array | null> {
  try {
    return await readFile(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw new TransientStorageError(`failed to read database file: ${errorMessage(error)}`, { cause: error });
  }
}
