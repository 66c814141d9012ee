import type { Logger } from 'pino';
import { logger as rootLogger } from '../../../config/logger';
import type { IConnectionProvider } from '../../../shared/interfaces/db-store.interface';
import type { IRoomStore } from '../../../shared/interfaces/room-store.interface';
import type { Room } from '../../../shared/types/room';

export const ROOM_SQL = {
  insert:
    'INSERT INTO Room (Name, MaxOccupancy) VALUES (@name, @maxOccupancy) RETURNING Id',
  getById: 'SELECT Name, MaxOccupancy FROM Room WHERE Id = @idparam',
  getAll: 'SELECT Id, Name, MaxOccupancy FROM Room',
  update:
    'UPDATE Room SET Name = @name, MaxOccupancy = @maxOccupancy WHERE Id = @id',
  delete: 'DELETE FROM Room WHERE Id = @id',
} as const;

// Postgres folds unquoted identifiers, so result columns come back lower case.
interface InsertedIdRow {
  id: number;
}

interface RoomDetailsRow {
  name: string;
  maxoccupancy: number;
}

interface RoomRow extends RoomDetailsRow {
  id: number;
}

function rowToRoom(row: RoomRow): Room {
  return {
    id: row.id,
    name: row.name,
    maxOccupancy: row.maxoccupancy,
  };
}

export class RoomRepository implements IRoomStore {
  private db: IConnectionProvider;
  private log: Logger;

  constructor(db: IConnectionProvider, log: Logger = rootLogger) {
    this.db = db;
    this.log = log.child({ module: 'room-repository' });
  }

  /**
   * Inserts the room and writes the generated id back onto it.
   */
  async insert(room: Room): Promise<Room> {
    const { rows } = await this.db.withConnection((conn) =>
      conn.query<InsertedIdRow>(ROOM_SQL.insert, {
        name: room.name,
        maxOccupancy: room.maxOccupancy,
      }),
    );

    const inserted = rows[0];
    if (!inserted) {
      throw new Error('Insert into Room returned no id');
    }

    room.id = inserted.id;
    return room;
  }

  /**
   * The returned room carries the id that was asked for; the statement does
   * not select the Id column.
   */
  async getById(id: number): Promise<Room | null> {
    const { rows } = await this.db.withConnection((conn) =>
      conn.query<RoomDetailsRow>(ROOM_SQL.getById, { idparam: id }),
    );

    const row = rows[0];
    if (!row) {
      return null;
    }

    return rowToRoom({ ...row, id });
  }

  async getAll(): Promise<Room[]> {
    const { rows } = await this.db.withConnection((conn) =>
      conn.query<RoomRow>(ROOM_SQL.getAll),
    );
    return rows.map(rowToRoom);
  }

  /**
   * Replaces every mutable column. Resolves the number of rows changed; an
   * unknown id is not an error.
   */
  async update(room: Room): Promise<number> {
    const { rowCount } = await this.db.withConnection((conn) =>
      conn.query(ROOM_SQL.update, {
        name: room.name,
        maxOccupancy: room.maxOccupancy,
        id: room.id,
      }),
    );

    if (rowCount === 0) {
      this.log.debug({ id: room.id }, 'Room update matched no rows');
    }
    return rowCount;
  }

  // Rows that reference the room (roommates) are not cleaned up; a foreign
  // key violation rejects with the driver error.
  async delete(id: number): Promise<number> {
    const { rowCount } = await this.db.withConnection((conn) =>
      conn.query(ROOM_SQL.delete, { id }),
    );

    if (rowCount === 0) {
      this.log.debug({ id }, 'Room delete matched no rows');
    }
    return rowCount;
  }
}
