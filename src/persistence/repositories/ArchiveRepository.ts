import type { Database } from 'better-sqlite3';
import type { ConnectionPool } from '../database.js';
import type { ArchiveHit, ArchiveLookup, ArchiveOp } from '../../ports/ArchivePort.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** `#tag` as a whole token: not followed by another word character. */
export function hashtagPattern(hashtag: string): RegExp {
  return new RegExp(`(^|[^\\p{L}\\p{N}_])${escapeRegExp(hashtag)}(?![\\p{L}\\p{N}_])`, 'iu');
}

/** Applies archive operations inside the caller's transaction. */
export function applyArchiveOps(db: Database, ops: readonly ArchiveOp[], now: number): void {
  if (ops.length === 0) {
    return;
  }

  const upsertUser = db.prepare(
    `INSERT INTO archive_users (user_id, username, updated_at) VALUES (?, ?, ?)
     ON CONFLICT(user_id) DO UPDATE SET
       username = COALESCE(excluded.username, archive_users.username),
       updated_at = excluded.updated_at`
  );
  const insertMessage = db.prepare(
    `INSERT OR IGNORE INTO archived_messages (chat_id, message_id, user_id, text, sent_at)
     VALUES (?, ?, ?, ?, ?)`
  );
  const insertVersion = db.prepare(
    `INSERT OR IGNORE INTO message_versions (chat_id, message_id, text, edited_at)
     SELECT chat_id, message_id, ?, ? FROM archived_messages WHERE chat_id = ? AND message_id = ?`
  );
  const flagEdited = db.prepare(
    'UPDATE archived_messages SET is_edited = 1 WHERE chat_id = ? AND message_id = ?'
  );
  const flagDeleted = db.prepare(
    'UPDATE archived_messages SET is_deleted = 1 WHERE chat_id = ? AND message_id = ?'
  );

  for (const op of ops) {
    switch (op.kind) {
      case 'record':
        upsertUser.run(op.userId, op.username ?? null, now);
        insertMessage.run(op.chatId, op.messageId, op.userId, op.text, op.sentAt);
        break;
      case 'edit': {
        // Edits of messages that were never archived are dropped
        const result = insertVersion.run(op.text, op.editedAt, op.chatId, op.messageId);
        if (result.changes > 0) {
          flagEdited.run(op.chatId, op.messageId);
        }
        break;
      }
      case 'markDeleted':
        flagDeleted.run(op.chatId, op.messageId);
        break;
    }
  }
}

interface HitRow {
  message_id: number;
  text: string;
  user_id: string;
  username: string | null;
  is_edited: number;
}

export class ArchiveRepository implements ArchiveLookup {
  constructor(private readonly pool: ConnectionPool) {}

  /**
   * Original texts and edited versions in the chat containing the hashtag, oldest first.
   * Deleted messages are excluded.
   */
  searchHashtag(chatId: string, hashtag: string, limit: number): ArchiveHit[] {
    if (!hashtag.startsWith('#')) {
      return [];
    }
    // SQLite LIKE folds ASCII case only, so the tag itself is matched by the pattern below
    const pattern = hashtagPattern(hashtag);

    const rows = this.pool.use((db) =>
      db
        .prepare(
          `SELECT m.message_id, m.text, m.user_id, u.username, 0 AS is_edited, m.sent_at AS at, 0 AS seq
             FROM archived_messages m
             JOIN archive_users u ON u.user_id = m.user_id
            WHERE m.chat_id = ? AND m.is_deleted = 0 AND m.text LIKE '%#%'
           UNION ALL
           SELECT v.message_id, v.text, m.user_id, u.username, 1 AS is_edited, v.edited_at AS at, v.id AS seq
             FROM message_versions v
             JOIN archived_messages m ON m.chat_id = v.chat_id AND m.message_id = v.message_id
             JOIN archive_users u ON u.user_id = m.user_id
            WHERE v.chat_id = ? AND m.is_deleted = 0 AND v.text LIKE '%#%'
           ORDER BY at, message_id, seq`
        )
        .all(chatId, chatId) as HitRow[]
    );

    return rows
      .filter((row) => pattern.test(row.text))
      .slice(0, limit)
      .map((row) => ({
        messageId: row.message_id,
        text: row.text,
        author: row.username ?? row.user_id,
        edited: row.is_edited === 1,
      }));
  }

  latestMessageBy(chatId: string, userId: string): number | null {
    const row = this.pool.use(
      (db) =>
        db
          .prepare(
            `SELECT message_id FROM archived_messages
              WHERE chat_id = ? AND user_id = ? AND is_deleted = 0
              ORDER BY message_id DESC LIMIT 1`
          )
          .get(chatId, userId) as { message_id: number } | undefined
    );
    return row?.message_id ?? null;
  }

  isDeleted(chatId: string, messageId: number): boolean | null {
    const row = this.pool.use(
      (db) =>
        db
          .prepare('SELECT is_deleted FROM archived_messages WHERE chat_id = ? AND message_id = ?')
          .get(chatId, messageId) as { is_deleted: number } | undefined
    );
    return row ? row.is_deleted === 1 : null;
  }
}
