/**
 * Storage Connection Port
 *
 * Handle to one storage target. Created by a ConnectionFactory, owned by the
 * connection manager, and threaded through every encoder/decoder call.
 */

export type QueryRow = Record<string, unknown>;

export interface QueryResultRows {
  rows: QueryRow[];
  rowCount: number;
}

/**
 * Rows come back untyped; callers validate them before use.
 */
export interface StorageExecutor {
  query(text: string, params?: readonly unknown[]): Promise<QueryResultRows>;
}

export interface StorageConnection extends StorageExecutor {
  /** Connection target (URL or DSN) the handle was created for */
  readonly target: string;

  /**
   * Run `work` as one atomic unit. Commits when it resolves, rolls back
   * and rethrows when it rejects.
   */
  transaction<T>(work: (executor: StorageExecutor) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}

/**
 * Custom constructor for a connection to `target`
 */
export type ConnectionFactory = (target: string) => StorageConnection;
