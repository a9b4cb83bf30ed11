import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { createLogger } from '../utils/logger.js';
import { ConfigError, EngineError } from '../utils/errors.js';
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';

const logger = createLogger({ component: 'database' });

export const MEMORY_DATABASE = ':memory:';

/**
 * Turns DATABASE_URL into a SQLite location. Accepts `file:` and `sqlite:` URLs,
 * plain paths and `:memory:`.
 */
export function resolveDatabasePath(url: string): string {
  const trimmed = url.trim();
  if (trimmed === MEMORY_DATABASE || trimmed === 'file::memory:' || trimmed === 'sqlite::memory:') {
    return MEMORY_DATABASE;
  }

  const scheme = /^([a-z][a-z0-9+.-]*):/i.exec(trimmed)?.[1]?.toLowerCase();
  if (scheme === undefined || scheme.length === 1) {
    // No scheme, or a Windows drive letter
    return resolve(trimmed);
  }
  if (scheme !== 'file' && scheme !== 'sqlite') {
    throw new ConfigError(`Unsupported database scheme "${scheme}:"; expected file: or sqlite:`);
  }

  const path = trimmed.slice(scheme.length + 1).replace(/^\/\/(?=\/)/, '');
  if (path === '') {
    throw new ConfigError('DATABASE_URL names no database file');
  }
  return resolve(path);
}

export interface ConnectionPoolOptions {
  path: string;
  maxSize: number;
  idleTimeoutMs: number;
  busyTimeoutMs?: number;
  clock?: Clock;
}

interface IdleConnection {
  db: Database.Database;
  idleSince: number;
}

/**
 * Bounded set of connections to one SQLite database. better-sqlite3 is synchronous,
 * so a connection is only held for the duration of `use`; the bound matters for
 * nested use and for how many file handles stay open. Connections idle for longer
 * than `idleTimeoutMs` are closed. An in-memory database is a single connection
 * that is never reaped, because closing it discards the data.
 */
export class ConnectionPool {
  private readonly idle: IdleConnection[] = [];
  private readonly clock: Clock;
  private readonly maxSize: number;
  private inUse = 0;
  private sweepTimer: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(private readonly options: ConnectionPoolOptions) {
    this.clock = options.clock ?? systemClock;
    this.maxSize = options.path === MEMORY_DATABASE ? 1 : options.maxSize;

    if (options.path !== MEMORY_DATABASE) {
      mkdirSync(dirname(options.path), { recursive: true });
      this.sweepTimer = setInterval(() => this.sweepIdle(), options.idleTimeoutMs);
      this.sweepTimer.unref();
    }
    logger.info({ path: options.path, maxSize: this.maxSize }, 'Connection pool created');
  }

  get size(): number {
    return this.idle.length + this.inUse;
  }

  use<T>(fn: (db: Database.Database) => T): T {
    const db = this.acquire();
    try {
      return fn(db);
    } finally {
      this.release(db);
    }
  }

  /** Closes connections idle past the timeout. Returns how many were closed. */
  sweepIdle(): number {
    if (this.options.path === MEMORY_DATABASE) {
      return 0;
    }
    const cutoff = this.clock.now() - this.options.idleTimeoutMs;
    let closedCount = 0;
    for (let i = this.idle.length - 1; i >= 0; i--) {
      const entry = this.idle[i];
      if (entry && entry.idleSince <= cutoff) {
        this.idle.splice(i, 1);
        entry.db.close();
        closedCount++;
      }
    }
    if (closedCount > 0) {
      logger.debug({ closedCount }, 'Closed idle connections');
    }
    return closedCount;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const entry of this.idle.splice(0)) {
      entry.db.close();
    }
    logger.info('Connection pool closed');
  }

  private acquire(): Database.Database {
    if (this.closed) {
      throw new EngineError('Connection pool is closed', 'POOL_CLOSED');
    }
    const reused = this.idle.pop();
    if (reused) {
      this.inUse++;
      return reused.db;
    }
    if (this.size >= this.maxSize) {
      throw new EngineError(`Connection pool exhausted (max ${this.maxSize})`, 'POOL_EXHAUSTED');
    }
    const db = this.open();
    this.inUse++;
    return db;
  }

  private release(db: Database.Database): void {
    this.inUse--;
    if (this.closed) {
      db.close();
      return;
    }
    this.idle.push({ db, idleSince: this.clock.now() });
  }

  private open(): Database.Database {
    const db = new Database(this.options.path);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma(`busy_timeout = ${Math.trunc(this.options.busyTimeoutMs ?? 5000)}`);
    return db;
  }
}
