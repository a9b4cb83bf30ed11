import type { Database } from 'better-sqlite3';
import type { ConnectionPool } from '../database.js';
import type {
  DeliveryStatus,
  OutboundDraft,
  OutboundMessage,
  OutboundStore,
} from '../../ports/OutboundStore.js';
import { systemClock, type Clock } from '../../utils/clock.js';

interface OutboundRow {
  id: number;
  dedupe_key: string;
  update_id: number | null;
  chat_id: string;
  body: string;
  reply_to: number | null;
  status: DeliveryStatus;
  attempts: number;
  last_error: string | null;
  created_at: number;
}

function toMessage(row: OutboundRow): OutboundMessage {
  const message: OutboundMessage = {
    id: row.id,
    dedupeKey: row.dedupe_key,
    updateId: row.update_id,
    chatId: row.chat_id,
    body: row.body,
    status: row.status,
    attempts: row.attempts,
    createdAt: row.created_at,
  };
  if (row.reply_to !== null) {
    message.replyTo = row.reply_to;
  }
  if (row.last_error !== null) {
    message.lastError = row.last_error;
  }
  return message;
}

export function outboundDedupeKey(updateId: number, index: number): string {
  return `update:${updateId}:${index}`;
}

/**
 * Persists the replies produced for one update as `pending`. Keyed by update id and
 * position, so re-running the same update cannot queue a second copy.
 */
export function insertOutbound(
  db: Database,
  updateId: number,
  drafts: readonly OutboundDraft[],
  now: number
): OutboundMessage[] {
  const insert = db.prepare(
    `INSERT OR IGNORE INTO outbound_messages
       (dedupe_key, update_id, chat_id, body, reply_to, status, attempts, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, 'pending', 0, ?, ?)`
  );
  const select = db.prepare('SELECT * FROM outbound_messages WHERE dedupe_key = ?');

  return drafts.map((draft, index) => {
    const key = outboundDedupeKey(updateId, index);
    insert.run(key, updateId, draft.chatId, draft.body, draft.replyTo ?? null, now, now);
    return toMessage(select.get(key) as OutboundRow);
  });
}

export class OutboundRepository implements OutboundStore {
  constructor(
    private readonly pool: ConnectionPool,
    private readonly clock: Clock = systemClock
  ) {}

  get(id: number): OutboundMessage | null {
    return this.pool.use((db) => {
      const row = db.prepare('SELECT * FROM outbound_messages WHERE id = ?').get(id) as OutboundRow | undefined;
      return row ? toMessage(row) : null;
    });
  }

  /** Pending messages in enqueue order, for recovery after a restart. */
  listPending(): OutboundMessage[] {
    return this.pool.use((db) => {
      const rows = db
        .prepare("SELECT * FROM outbound_messages WHERE status = 'pending' ORDER BY id")
        .all() as OutboundRow[];
      return rows.map(toMessage);
    });
  }

  countByStatus(): Record<DeliveryStatus, number> {
    return this.pool.use((db) => {
      const rows = db
        .prepare('SELECT status, COUNT(*) AS count FROM outbound_messages GROUP BY status')
        .all() as Array<{ status: DeliveryStatus; count: number }>;
      const counts: Record<DeliveryStatus, number> = { pending: 0, sent: 0, failed: 0 };
      for (const row of rows) {
        counts[row.status] = row.count;
      }
      return counts;
    });
  }

  markSent(id: number, attempts: number, platformMessageId: number): void {
    this.pool.use((db) =>
      db
        .prepare(
          `UPDATE outbound_messages
           SET status = 'sent', attempts = ?, platform_message_id = ?, last_error = NULL, updated_at = ?
           WHERE id = ? AND status = 'pending'`
        )
        .run(attempts, platformMessageId, this.clock.now(), id)
    );
  }

  recordAttempt(id: number, attempts: number, error: string): void {
    this.pool.use((db) =>
      db
        .prepare(
          `UPDATE outbound_messages SET attempts = ?, last_error = ?, updated_at = ?
           WHERE id = ? AND status = 'pending'`
        )
        .run(attempts, error, this.clock.now(), id)
    );
  }

  markFailed(id: number, attempts: number, error: string): void {
    this.pool.use((db) =>
      db
        .prepare(
          `UPDATE outbound_messages SET status = 'failed', attempts = ?, last_error = ?, updated_at = ?
           WHERE id = ? AND status = 'pending'`
        )
        .run(attempts, error, this.clock.now(), id)
    );
  }
}
