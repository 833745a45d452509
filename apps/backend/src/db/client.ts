/**
 * Minimal SQL access used by the repositories.
 *
 * Positional `?` placeholders only. Values map one-to-one onto SQLite storage
 * classes, so rows come back untyped and are parsed by each repository.
 */

export type SqlValue = string | number | Uint8Array | null;

export type SqlRow = Record<string, SqlValue>;

export interface ExecuteResult {
  lastInsertRowId: number;
  changes: number;
}

export interface DbExecutor {
  query(sql: string, params?: SqlValue[]): Promise<SqlRow[]>;
  execute(sql: string, params?: SqlValue[]): Promise<ExecuteResult>;
}

export interface Database extends DbExecutor {
  /**
   * Runs `fn` inside one write transaction on a checked-out connection.
   * Commits when `fn` resolves, rolls back when it throws. The executor handed
   * to `fn` cannot open another transaction.
   */
  transaction<T>(fn: (tx: DbExecutor) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
