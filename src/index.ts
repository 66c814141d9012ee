export type { Room } from './shared/types/room';
export type { IRoomStore } from './shared/interfaces/room-store.interface';
export type {
  DBQueryResult,
  IConnectionProvider,
  IDBConnection,
  QueryParams,
} from './shared/interfaces/db-store.interface';
export {
  RoomRepository,
  ROOM_SQL,
} from './infrastructure/database/repositories/room.repository';
export {
  PostgresConnectionProvider,
  type DatabaseHealth,
} from './infrastructure/database/repositories/postgres.repository';
export { createPool } from './infrastructure/database/repositories/db.repo';
export { compileNamedQuery, type CompiledQuery } from './shared/utils/named-params';
export {
  loadDatabaseConfig,
  type DatabaseConfig,
  type SSLConfig,
} from './config/database.config';
export { createRoomStore, type RoomStore, type RoomStoreOptions } from './app';
export { logger } from './config/logger';
