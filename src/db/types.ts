export type SqlValue = string | number | boolean | Date | Buffer | null;

export type SqlParams = Record<string, SqlValue>;

export type Row = Record<string, unknown>;

export interface ColumnMeta {
  name: string;
  type: string;
}

export interface QueryOutput {
  /** First result set. */
  rows: Row[];
  columns: ColumnMeta[];
  recordsets: Row[][];
  rowsAffected: number[];
}

/** Anything that can run a parameterized statement: a session or an open transaction. */
export interface SqlExecutor {
  query(text: string, params?: SqlParams): Promise<QueryOutput>;
}

export interface DbSession extends SqlExecutor {
  /** Runs a parameterless batch; used for session-scoped SET statements. */
  batch(text: string): Promise<void>;
  /** Runs work inside a transaction, committing on success and rolling back on failure. */
  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  /** Cancels the request currently running on this session, if any. */
  cancel(): void;
  close(): Promise<void>;
}

export interface SessionFactory {
  open(): Promise<DbSession>;
  readonly target: { server: string; database: string };
}
