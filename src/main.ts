import 'dotenv/config';
import { createRoomStore, type RoomStore } from './app';
import { loadDatabaseConfig } from './config/database.config';
import { logger } from './config/logger';

async function main(): Promise<void> {
  let store: RoomStore | undefined;
  try {
    logger.info('Loading database configuration...');
    store = createRoomStore(loadDatabaseConfig());

    const health = await store.provider.checkHealth();
    if (!health.connected) {
      throw new Error('Failed to connect to database');
    }
    logger.info({ latencyMs: health.latencyMs }, 'Connected to database.');

    const rooms = await store.rooms.getAll();
    logger.info({ count: rooms.length }, 'Rooms loaded.');
    for (const room of rooms) {
      logger.info({ room }, `${room.name} (max ${room.maxOccupancy})`);
    }
  } finally {
    await store?.close();
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Room listing failed. Shutting down.');
  process.exitCode = 1;
});
