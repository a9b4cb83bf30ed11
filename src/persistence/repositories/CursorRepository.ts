import type { Database } from 'better-sqlite3';
import type { ConnectionPool } from '../database.js';
import { systemClock, type Clock } from '../../utils/clock.js';

export const CURSOR_ID = 'main';

export function readCursor(db: Database): number {
  const row = db.prepare('SELECT last_update_id FROM cursor WHERE id = ?').get(CURSOR_ID) as
    | { last_update_id: number }
    | undefined;
  return row?.last_update_id ?? 0;
}

/** Raises the stored cursor to `updateId` unless it is already higher. Returns the stored value. */
export function advanceCursor(db: Database, updateId: number, now: number): number {
  db.prepare(
    `INSERT INTO cursor (id, last_update_id, updated_at) VALUES (?, ?, ?)
     ON CONFLICT(id) DO UPDATE SET
       last_update_id = MAX(cursor.last_update_id, excluded.last_update_id),
       updated_at = excluded.updated_at`
  ).run(CURSOR_ID, updateId, now);
  return readCursor(db);
}

export class CursorRepository {
  constructor(
    private readonly pool: ConnectionPool,
    private readonly clock: Clock = systemClock
  ) {}

  get(): number {
    return this.pool.use((db) => readCursor(db));
  }

  advance(updateId: number): number {
    return this.pool.use((db) => advanceCursor(db, updateId, this.clock.now()));
  }
}
