import type { Pool, PoolClient, QueryResultRow } from 'pg';
import type { Logger } from 'pino';
import { logger as rootLogger } from '../../../config/logger';
import type {
  DBQueryResult,
  IConnectionProvider,
  IDBConnection,
  QueryParams,
} from '../../../shared/interfaces/db-store.interface';
import { compileNamedQuery } from '../../../shared/utils/named-params';

export interface DatabaseHealth {
  connected: boolean;
  latencyMs: number;
  poolSize: number;
  idleCount: number;
  waitingCount: number;
}

export class PostgresConnectionProvider implements IConnectionProvider {
  private pool: Pool;
  private log: Logger;
  private closed = false;

  constructor(pool: Pool, log: Logger = rootLogger) {
    this.pool = pool;
    this.log = log.child({ module: 'postgres' });
  }

  async withConnection<R>(fn: (conn: IDBConnection) => Promise<R>): Promise<R> {
    const client = await this.pool.connect();
    try {
      return await fn(this.bind(client));
    } finally {
      client.release();
    }
  }

  /**
   * Runs `SELECT 1` and reports pool counters. A failed probe is reported as
   * disconnected rather than thrown.
   */
  async checkHealth(): Promise<DatabaseHealth> {
    const start = Date.now();
    try {
      await this.pool.query('SELECT 1');
      return this.health(true, Date.now() - start);
    } catch (err) {
      this.log.warn({ err }, 'Database health check failed');
      return this.health(false, -1);
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.pool.end();
  }

  private health(connected: boolean, latencyMs: number): DatabaseHealth {
    return {
      connected,
      latencyMs,
      poolSize: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
    };
  }

  private bind(client: PoolClient): IDBConnection {
    const log = this.log;
    return {
      async query<T = unknown>(
        sql: string,
        params?: QueryParams,
      ): Promise<DBQueryResult<T>> {
        const { text, values } = compileNamedQuery(sql, params);
        const start = Date.now();
        try {
          const result = await client.query<QueryResultRow & T>(text, values);
          log.debug(
            { sql: text, durationMs: Date.now() - start, rowCount: result.rowCount },
            'Query executed',
          );
          return { rows: result.rows, rowCount: result.rowCount ?? 0 };
        } catch (err) {
          log.debug({ err, sql: text }, 'Query failed');
          throw err;
        }
      },
    };
  }
}
