import { Pool } from 'pg';
import type { Logger } from 'pino';
import type { DatabaseConfig } from '../../../config/database.config';
import { logger as rootLogger } from '../../../config/logger';

/**
 * Creates a pg Pool from an explicit config. Pool sizing and timeouts are
 * left at the driver defaults.
 */
export function createPool(
  config: DatabaseConfig,
  log: Logger = rootLogger,
): Pool {
  const pool = new Pool({
    connectionString: config.connectionString,
    ssl: config.ssl,
  });

  // An idle client can fail (server restart, network drop); without a
  // listener the pool would crash the process.
  pool.on('error', (err) => {
    log.error({ err }, 'Unexpected error on idle database client');
  });

  return pool;
}
