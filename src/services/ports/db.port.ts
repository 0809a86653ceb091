export interface DbQueryOptions {
  /**
   * Optional label for metrics/logging to indicate logical operation (e.g., selectMeetingByCode).
   */
  operation?: string;
}

export interface DbTransactionPort {
  query<T = unknown>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T[]>;
  queryOne<T = unknown>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T | null>;
  /** Inserts a row and returns it as stored (`RETURNING *`). */
  insert<T = unknown>(tableFqn: string, row: Record<string, unknown>, options?: DbQueryOptions): Promise<T>;
  /** Returns the number of rows changed. */
  update(
    tableFqn: string,
    id: number | string,
    patch: Record<string, unknown>,
    idColumn?: string,
    options?: DbQueryOptions
  ): Promise<number>;
  upsert<T = unknown>(
    tableFqn: string,
    keyColumns: string[],
    row: Record<string, unknown>,
    options?: DbQueryOptions
  ): Promise<T>;
}

export interface DbPort extends DbTransactionPort {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  withTransaction<T>(handler: (tx: DbTransactionPort) => Promise<T>): Promise<T>;
}
