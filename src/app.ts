import type { Logger } from 'pino';
import type { DatabaseConfig } from './config/database.config';
import { logger as rootLogger } from './config/logger';
import { createPool } from './infrastructure/database/repositories/db.repo';
import { PostgresConnectionProvider } from './infrastructure/database/repositories/postgres.repository';
import { RoomRepository } from './infrastructure/database/repositories/room.repository';

export interface RoomStore {
  rooms: RoomRepository;
  provider: PostgresConnectionProvider;
  close(): Promise<void>;
}

export interface RoomStoreOptions {
  logger?: Logger;
}

export function createRoomStore(
  config: DatabaseConfig,
  options: RoomStoreOptions = {},
): RoomStore {
  const log = options.logger ?? rootLogger;
  const provider = new PostgresConnectionProvider(createPool(config, log), log);
  const rooms = new RoomRepository(provider, log);

  log.info('Room store initialized.');

  return {
    rooms,
    provider,
    close: () => provider.close(),
  };
}
