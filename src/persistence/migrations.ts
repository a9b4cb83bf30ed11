import type { Database } from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { SchemaError } from '../utils/errors.js';

const logger = createLogger({ component: 'migrations' });

export interface Migration {
  version: number;
  name: string;
  up: string;
}

export const migrations: readonly Migration[] = [
  {
    version: 1,
    name: 'conversations_and_cursor',
    up: `
      CREATE TABLE conversations (
        key TEXT PRIMARY KEY,
        chat_id TEXT NOT NULL,
        state TEXT NOT NULL,
        context_json TEXT NOT NULL DEFAULT '{}',
        context_version INTEGER NOT NULL DEFAULT 1,
        version INTEGER NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );
      CREATE INDEX idx_conversations_chat ON conversations(chat_id);

      CREATE TABLE cursor (
        id TEXT PRIMARY KEY,
        last_update_id INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE processed_updates (
        update_id INTEGER PRIMARY KEY,
        conversation_key TEXT NOT NULL,
        processed_at INTEGER NOT NULL
      );
    `,
  },
  {
    version: 2,
    name: 'outbound_messages',
    up: `
      CREATE TABLE outbound_messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        dedupe_key TEXT NOT NULL UNIQUE,
        update_id INTEGER,
        chat_id TEXT NOT NULL,
        body TEXT NOT NULL,
        reply_to INTEGER,
        status TEXT NOT NULL CHECK (status IN ('pending', 'sent', 'failed')),
        attempts INTEGER NOT NULL DEFAULT 0,
        last_error TEXT,
        platform_message_id INTEGER,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );
      CREATE INDEX idx_outbound_status ON outbound_messages(status, id);
    `,
  },
  {
    version: 3,
    name: 'message_archive',
    up: `
      CREATE TABLE archive_users (
        user_id TEXT PRIMARY KEY,
        username TEXT,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE archived_messages (
        chat_id TEXT NOT NULL,
        message_id INTEGER NOT NULL,
        user_id TEXT NOT NULL REFERENCES archive_users(user_id),
        text TEXT NOT NULL,
        sent_at INTEGER NOT NULL,
        is_edited INTEGER NOT NULL DEFAULT 0,
        is_deleted INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (chat_id, message_id)
      );
      CREATE INDEX idx_archived_messages_author ON archived_messages(chat_id, user_id, message_id);

      CREATE TABLE message_versions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        chat_id TEXT NOT NULL,
        message_id INTEGER NOT NULL,
        text TEXT NOT NULL,
        edited_at INTEGER NOT NULL,
        UNIQUE (chat_id, message_id, edited_at),
        FOREIGN KEY (chat_id, message_id) REFERENCES archived_messages(chat_id, message_id)
      );
    `,
  },
];

export const LATEST_SCHEMA_VERSION = migrations.reduce((max, m) => Math.max(max, m.version), 0);

function ensureMigrationTable(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    );
  `);
}

function appliedVersions(db: Database): number[] {
  const rows = db.prepare('SELECT version FROM schema_migrations ORDER BY version').all() as Array<{
    version: number;
  }>;
  return rows.map((row) => row.version);
}

/**
 * Applies every migration not yet recorded in schema_migrations, in version order,
 * each in its own transaction. Returns the versions applied by this call.
 */
export function runMigrations(db: Database, list: readonly Migration[] = migrations): number[] {
  ensureMigrationTable(db);
  const applied = new Set(appliedVersions(db));
  const pending = [...list].filter((m) => !applied.has(m.version)).sort((a, b) => a.version - b.version);

  if (pending.length === 0) {
    logger.debug('Schema is up to date');
    return [];
  }

  const record = db.prepare('INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)');
  for (const migration of pending) {
    db.transaction(() => {
      db.exec(migration.up);
      record.run(migration.version, migration.name, Date.now());
    })();
    logger.info({ version: migration.version, name: migration.name }, 'Applied migration');
  }
  return pending.map((m) => m.version);
}

/** Refuses to run against a schema that is missing migrations or is newer than this build. */
export function verifySchema(db: Database, list: readonly Migration[] = migrations): void {
  const table = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_migrations'")
    .get();
  if (!table) {
    throw new SchemaError('Database has no schema_migrations table; run migrations first');
  }

  const applied = new Set(appliedVersions(db));
  const missing = list.filter((m) => !applied.has(m.version)).map((m) => `${m.version}_${m.name}`);
  if (missing.length > 0) {
    throw new SchemaError(`Database is missing migrations: ${missing.join(', ')}`);
  }

  const known = new Set(list.map((m) => m.version));
  const unknown = [...applied].filter((v) => !known.has(v));
  if (unknown.length > 0) {
    throw new SchemaError(`Database has migrations this build does not know: ${unknown.join(', ')}`);
  }
}
