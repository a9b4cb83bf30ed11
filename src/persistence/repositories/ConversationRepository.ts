import type { Database } from 'better-sqlite3';
import { z } from 'zod';
import type { ConnectionPool } from '../database.js';
import type {
  CommitRequest,
  CommitResult,
  ContextPatch,
  ConversationContext,
  ConversationSnapshot,
  ConversationStore,
  JsonValue,
} from '../../ports/ConversationStore.js';
import { applyArchiveOps } from './ArchiveRepository.js';
import { advanceCursor, readCursor } from './CursorRepository.js';
import { insertOutbound } from './OutboundRepository.js';
import { VersionConflict } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { systemClock, type Clock } from '../../utils/clock.js';

/** Layout version of context_json, stored per row. */
export const CONTEXT_SCHEMA_VERSION = 1;

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

const contextSchema = z.record(z.string(), jsonValueSchema);

interface ConversationRow {
  key: string;
  chat_id: string;
  state: string;
  context_json: string;
  context_version: number;
  version: number;
  updated_at: number;
}

export function applyContextPatch(context: ConversationContext, patch: ContextPatch): ConversationContext {
  const next: ConversationContext = { ...context };
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete next[key];
    } else {
      next[key] = value;
    }
  }
  return next;
}

export class ConversationRepository implements ConversationStore {
  private readonly logger = createLogger({ repository: 'ConversationRepository' });

  constructor(
    private readonly pool: ConnectionPool,
    private readonly clock: Clock = systemClock
  ) {}

  load(key: string): ConversationSnapshot | null {
    const row = this.pool.use(
      (db) => db.prepare('SELECT * FROM conversations WHERE key = ?').get(key) as ConversationRow | undefined
    );
    if (!row) return null;

    return {
      key: row.key,
      chatId: row.chat_id,
      state: row.state,
      context: this.parseContext(row),
      version: row.version,
      updatedAt: row.updated_at,
    };
  }

  isProcessed(updateId: number): boolean {
    return this.pool.use((db) => this.isProcessedWithin(db, updateId));
  }

  /**
   * Binds the conversation change, its archive writes, its outbound messages and the
   * cursor advance into one transaction. An update that was already committed leaves
   * everything untouched.
   */
  commit(request: CommitRequest): CommitResult {
    const now = this.clock.now();

    return this.pool.use((db) =>
      db.transaction((): CommitResult => {
        if (this.isProcessedWithin(db, request.updateId)) {
          return { status: 'duplicate' };
        }

        const version = this.writeConversation(db, request, now);

        db.prepare(
          'INSERT INTO processed_updates (update_id, conversation_key, processed_at) VALUES (?, ?, ?)'
        ).run(request.updateId, request.key, now);

        applyArchiveOps(db, request.archive, now);
        const outbound = insertOutbound(db, request.updateId, request.outbound, now);

        const cursor = advanceCursor(db, request.cursorAdvance, now);
        db.prepare('DELETE FROM processed_updates WHERE update_id <= ?').run(cursor);

        return { status: 'committed', version, outbound };
      })()
    );
  }

  /**
   * Puts a conversation back in `state` with an empty context. The row is kept and
   * its version bumped, so a handler working from an older snapshot conflicts.
   * Returns false when there is no such conversation.
   */
  reset(key: string, state: string): boolean {
    const now = this.clock.now();
    const result = this.pool.use((db) =>
      db
        .prepare(
          `UPDATE conversations
              SET state = ?, context_json = '{}', context_version = ?, version = version + 1, updated_at = ?
            WHERE key = ?`
        )
        .run(state, CONTEXT_SCHEMA_VERSION, now, key)
    );
    if (result.changes > 0) {
      this.logger.info({ key, state }, 'Conversation reset');
    }
    return result.changes > 0;
  }

  private isProcessedWithin(db: Database, updateId: number): boolean {
    if (updateId <= readCursor(db)) {
      return true;
    }
    const row = db.prepare('SELECT 1 AS hit FROM processed_updates WHERE update_id = ?').get(updateId);
    return row !== undefined;
  }

  /** Returns the conversation version after the write. */
  private writeConversation(db: Database, request: CommitRequest, now: number): number {
    const current = db
      .prepare('SELECT state, context_json, context_version, version FROM conversations WHERE key = ?')
      .get(request.key) as Pick<ConversationRow, 'state' | 'context_json' | 'context_version' | 'version'> | undefined;

    if (!current) {
      if (request.expectedVersion !== 0) {
        throw new VersionConflict(request.key, request.expectedVersion, null);
      }
      const context = applyContextPatch({}, request.contextPatch);
      db.prepare(
        `INSERT INTO conversations (key, chat_id, state, context_json, context_version, version, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, 1, ?, ?)`
      ).run(request.key, request.chatId, request.nextState, JSON.stringify(context), CONTEXT_SCHEMA_VERSION, now, now);
      return 1;
    }

    if (current.version !== request.expectedVersion) {
      throw new VersionConflict(request.key, request.expectedVersion, current.version);
    }

    const hasPatch = Object.keys(request.contextPatch).length > 0;
    if (current.state === request.nextState && !hasPatch) {
      return current.version;
    }

    const context = applyContextPatch(
      this.parseContext({ ...current, key: request.key }),
      request.contextPatch
    );
    const result = db
      .prepare(
        `UPDATE conversations
            SET state = ?, context_json = ?, context_version = ?, version = version + 1, updated_at = ?
          WHERE key = ? AND version = ?`
      )
      .run(request.nextState, JSON.stringify(context), CONTEXT_SCHEMA_VERSION, now, request.key, request.expectedVersion);
    if (result.changes === 0) {
      throw new VersionConflict(request.key, request.expectedVersion, null);
    }
    return current.version + 1;
  }

  private parseContext(row: Pick<ConversationRow, 'key' | 'context_json' | 'context_version'>): ConversationContext {
    let raw: unknown;
    try {
      raw = JSON.parse(row.context_json);
    } catch (error) {
      this.logger.warn({ key: row.key, error }, 'Unreadable conversation context; starting from empty');
      return {};
    }

    const parsed = contextSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(
        { key: row.key, contextVersion: row.context_version, issues: parsed.error.issues.length },
        'Conversation context does not match schema; starting from empty'
      );
      return {};
    }
    return parsed.data;
  }
}
