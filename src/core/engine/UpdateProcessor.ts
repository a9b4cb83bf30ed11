import type { ArchiveLookup } from '../../ports/ArchivePort.js';
import type { BotApiPort } from '../../ports/BotApiPort.js';
import type { ConversationStore } from '../../ports/ConversationStore.js';
import type { OutboundQueue } from '../../ports/OutboundStore.js';
import type { Update } from '../../ports/Update.js';
import type { Dispatcher } from '../dispatch/Dispatcher.js';
import { CursorTracker } from './CursorTracker.js';
import { conversationKeyFor, type ConversationScope } from './conversationKey.js';
import { AuthError, VersionConflict } from '../../utils/errors.js';
import { createLogger, createUpdateLogger, type Logger } from '../../utils/logger.js';

export type MemberDirectory = Pick<BotApiPort, 'getChatMember' | 'getChatAdministrators'>;

export interface UpdateProcessorDependencies {
  store: ConversationStore;
  dispatcher: Dispatcher;
  lookup: ArchiveLookup;
  queue: OutboundQueue;
  members: MemberDirectory;
}

export interface UpdateProcessorOptions {
  /** Re-runs allowed after a VersionConflict before the update fails. */
  maxCommitRetries: number;
  conversationScope: ConversationScope;
}

export type ProcessOutcome =
  | { status: 'committed'; key: string; state: string; version: number; outbound: number; route: string; retries: number }
  | { status: 'duplicate' }
  | { status: 'ignored'; reason: string };

/**
 * load → dispatch → commit for one update. Handlers are pure given the snapshot,
 * so a VersionConflict is resolved by loading again and re-running the handler.
 * Chat membership a route needs is looked up once, before the first dispatch.
 */
export class UpdateProcessor {
  private readonly logger = createLogger({ component: 'UpdateProcessor' });
  private conflicts = 0;

  constructor(
    private readonly deps: UpdateProcessorDependencies,
    private readonly options: UpdateProcessorOptions
  ) {}

  get conflictCount(): number {
    return this.conflicts;
  }

  async process(update: Update, tracker: CursorTracker = new CursorTracker([update.id])): Promise<ProcessOutcome> {
    const logger = createUpdateLogger(this.logger, update);

    if (update.payload.kind === 'ignored') {
      logger.debug({ reason: update.payload.reason }, 'Update ignored');
      tracker.complete(update.id);
      return { status: 'ignored', reason: update.payload.reason };
    }

    const { store, dispatcher, lookup, queue } = this.deps;
    if (store.isProcessed(update.id)) {
      logger.info('Update already processed; skipping');
      tracker.complete(update.id);
      return { status: 'duplicate' };
    }

    const enriched = await this.withMemberInfo(update, logger);
    const key = conversationKeyFor(update, this.options.conversationScope);
    for (let retries = 0; ; retries++) {
      const snapshot = store.load(key) ?? dispatcher.emptySnapshot(key, update.chatId);
      const result = dispatcher.handle(enriched, snapshot, lookup);
      logger.debug({ route: result.route, from: snapshot.state, to: result.nextState }, 'Dispatched update');

      try {
        const committed = store.commit({
          key,
          chatId: update.chatId,
          expectedVersion: snapshot.version,
          nextState: result.nextState,
          contextPatch: result.contextPatch,
          updateId: update.id,
          cursorAdvance: tracker.watermarkWith(update.id),
          outbound: result.outbound,
          archive: result.archive,
        });
        tracker.complete(update.id);

        if (committed.status === 'duplicate') {
          logger.info('Update committed concurrently elsewhere; skipping');
          return { status: 'duplicate' };
        }

        for (const message of committed.outbound) {
          queue.enqueue(message);
        }
        logger.info(
          { key, state: result.nextState, version: committed.version, outbound: committed.outbound.length, route: result.route },
          'Update committed'
        );
        return {
          status: 'committed',
          key,
          state: result.nextState,
          version: committed.version,
          outbound: committed.outbound.length,
          route: result.route,
          retries,
        };
      } catch (error) {
        if (!(error instanceof VersionConflict)) {
          throw error;
        }
        this.conflicts++;
        if (retries >= this.options.maxCommitRetries) {
          logger.error({ error, retries }, 'Version conflicts exhausted commit retries');
          throw error;
        }
        logger.warn({ expected: error.expectedVersion, actual: error.actualVersion }, 'Version conflict; reloading');
      }
    }
  }

  /** A failed lookup leaves the sender without a status and the chat without administrators. */
  private async withMemberInfo(update: Update, logger: Logger): Promise<Update> {
    const needs = this.deps.dispatcher.memberLookups(update);
    if (!needs.senderStatus && !needs.chatAdmins) {
      return update;
    }

    const { members } = this.deps;
    const enriched: Update = { ...update };
    if (needs.senderStatus) {
      try {
        enriched.senderStatus = await members.getChatMember(update.chatId, update.userId);
      } catch (error) {
        if (error instanceof AuthError) {
          throw error;
        }
        logger.error({ error }, 'Failed to read the sender status; treating them as a regular member');
      }
    }
    if (needs.chatAdmins) {
      try {
        const admins = await members.getChatAdministrators(update.chatId);
        enriched.chatAdminIds = admins.filter((admin) => !admin.isBot).map((admin) => admin.userId);
      } catch (error) {
        if (error instanceof AuthError) {
          throw error;
        }
        logger.error({ error }, 'Failed to list chat administrators; nobody is notified');
        enriched.chatAdminIds = [];
      }
    }
    return enriched;
  }
}
