export type QueryParams = Readonly<Record<string, unknown>>;

export interface DBQueryResult<T> {
  rows: T[];
  rowCount: number;
}

/**
 * A single acquired connection. Statements use `@name` placeholders that are
 * bound from `params`, never interpolated.
 */
export interface IDBConnection {
  query<T = unknown>(sql: string, params?: QueryParams): Promise<DBQueryResult<T>>;
}

export interface IConnectionProvider {
  /**
   * Acquires a connection for the duration of `fn` and releases it on every
   * exit path.
   */
  withConnection<R>(fn: (conn: IDBConnection) => Promise<R>): Promise<R>;
}
