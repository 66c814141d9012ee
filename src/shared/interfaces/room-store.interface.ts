import type { Room } from '../types/room';

export interface IRoomStore {
  insert(room: Room): Promise<Room>;
  getById(id: number): Promise<Room | null>;
  getAll(): Promise<Room[]>;
  update(room: Room): Promise<number>;
  delete(id: number): Promise<number>;
}
