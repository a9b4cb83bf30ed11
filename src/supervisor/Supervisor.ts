import type { ConnectionPool } from '../persistence/database.js';
import { migrations, runMigrations, verifySchema } from '../persistence/migrations.js';
import type { CursorRepository } from '../persistence/repositories/CursorRepository.js';
import type { UpdateSource } from '../ports/UpdateSource.js';
import type { Update } from '../ports/Update.js';
import type { UpdateProcessor } from '../core/engine/UpdateProcessor.js';
import type { OutboundSender } from '../core/outbound/OutboundSender.js';
import { CursorTracker } from '../core/engine/CursorTracker.js';
import { runPartitioned } from '../core/engine/partition.js';
import { partitionKeyFor } from '../core/engine/conversationKey.js';
import { SchemaError } from '../utils/errors.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { createLogger } from '../utils/logger.js';

export type SupervisorStatus = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped' | 'failed';

export interface SupervisorDependencies {
  pool: ConnectionPool;
  source: UpdateSource;
  processor: UpdateProcessor;
  sender: OutboundSender;
  cursor: CursorRepository;
  clock?: Clock;
}

export interface SupervisorOptions {
  autoMigrate: boolean;
  workerConcurrency: number;
  shutdownGraceMs: number;
}

export interface HealthReport {
  status: SupervisorStatus;
  mode: UpdateSource['mode'];
  cursor: number;
  processed: number;
  duplicates: number;
  ignored: number;
  conflicts: number;
  outboundDepth: number;
}

/**
 * Owns the engine's lifecycle: checks the schema, resumes from the stored cursor,
 * re-queues undelivered messages, then consumes batches until stopped. A stop lets
 * in-flight updates finish and gives the sender what is left of the grace period.
 */
export class Supervisor {
  private readonly logger = createLogger({ component: 'Supervisor' });
  private readonly clock: Clock;
  private status: SupervisorStatus = 'idle';
  private controller: AbortController | null = null;
  private finished: Promise<void> | null = null;
  private stopRequestedAt: number | null = null;
  private cursorValue = 0;
  private counts = { processed: 0, duplicates: 0, ignored: 0 };

  constructor(
    private readonly deps: SupervisorDependencies,
    private readonly options: SupervisorOptions
  ) {
    this.clock = deps.clock ?? systemClock;
  }

  get currentStatus(): SupervisorStatus {
    return this.status;
  }

  health(): HealthReport {
    return {
      status: this.status,
      mode: this.deps.source.mode,
      cursor: this.cursorValue,
      ...this.counts,
      conflicts: this.deps.processor.conflictCount,
      outboundDepth: this.deps.sender.depth,
    };
  }

  /** Applies pending migrations when allowed, then verifies the schema. Returns the stored cursor. */
  prepare(): number {
    this.deps.pool.use((db) => {
      if (this.options.autoMigrate) {
        try {
          runMigrations(db, migrations);
        } catch (error) {
          throw new SchemaError('Applying migrations failed', { cause: error });
        }
      }
      verifySchema(db, migrations);
    });
    this.cursorValue = this.deps.cursor.get();
    return this.cursorValue;
  }

  /** Runs until `stop` is called or a fatal error occurs; fatal errors are rethrown. */
  run(): Promise<void> {
    if (this.finished) {
      return this.finished;
    }
    this.finished = this.loop().finally(() => {
      this.finished = null;
    });
    return this.finished;
  }

  async stop(): Promise<void> {
    if (!this.controller || this.status === 'stopping') {
      await this.finished;
      return;
    }
    this.logger.info('Stopping update processing');
    this.status = 'stopping';
    this.stopRequestedAt = this.clock.now();
    this.controller.abort();
    await this.finished;
  }

  private async loop(): Promise<void> {
    this.status = 'starting';
    this.stopRequestedAt = null;
    this.controller = new AbortController();
    const signal = this.controller.signal;
    const { source, sender } = this.deps;

    try {
      const start = this.prepare();
      sender.recover();
      sender.start();
      this.status = 'running';
      this.logger.info({ cursor: start, mode: source.mode }, 'Update processing started');

      for await (const batch of source.batches(start, signal)) {
        await this.processBatch(batch, signal);
        if (signal.aborted) {
          break;
        }
      }
    } catch (error) {
      this.status = 'failed';
      this.logger.error({ error }, 'Update processing failed');
      throw error;
    } finally {
      await sender.stop(this.remainingGrace());
      this.controller = null;
      if (this.status !== 'failed') {
        this.status = 'stopped';
      }
      this.logger.info({ cursor: this.cursorValue, ...this.counts }, 'Update processing stopped');
    }
  }

  private async processBatch(batch: Update[], signal: AbortSignal): Promise<void> {
    const tracker = new CursorTracker(
      batch.map((update) => update.id),
      this.cursorValue
    );
    const { processor } = this.deps;

    let failure: { error: unknown } | null = null;
    try {
      await runPartitioned(
        batch,
        partitionKeyFor,
        this.options.workerConcurrency,
        async (update) => {
          const outcome = await processor.process(update, tracker);
          if (outcome.status === 'committed') this.counts.processed++;
          else if (outcome.status === 'duplicate') this.counts.duplicates++;
          else this.counts.ignored++;
        },
        signal
      );
    } catch (error) {
      failure = { error };
    }

    // Ignored and duplicate updates at the end of a batch are never committed, so move past them here
    const watermark = tracker.watermark();
    if (watermark > this.cursorValue) {
      this.cursorValue = this.deps.cursor.advance(watermark);
    }
    this.deps.source.acknowledge(tracker.completedIds());

    if (failure) {
      throw failure.error;
    }
  }

  private remainingGrace(): number {
    if (this.stopRequestedAt === null) {
      return this.options.shutdownGraceMs;
    }
    const elapsed = this.clock.now() - this.stopRequestedAt;
    return Math.max(0, this.options.shutdownGraceMs - elapsed);
  }
}
