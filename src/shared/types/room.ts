export interface Room {
  /** Assigned by the database; 0 until the room is inserted. */
  id: number;
  name: string;
  maxOccupancy: number;
}
