import type { ArchiveLookup, ArchiveOp } from '../../ports/ArchivePort.js';
import type { ContextPatch, ConversationSnapshot } from '../../ports/ConversationStore.js';
import type { OutboundDraft } from '../../ports/OutboundStore.js';
import type { Update } from '../../ports/Update.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import { isAdminStatus, matchesPattern, type Flow, type Handler, type HandlerEffects } from './flow.js';

export interface DispatchResult {
  nextState: string;
  contextPatch: ContextPatch;
  outbound: OutboundDraft[];
  archive: ArchiveOp[];
  /** Which route produced the result, for logs and tests: `command:start`, `state:awaiting_name#0`, ... */
  route: string;
}

/** Chat membership facts a route reads from the update; the caller looks them up before `handle`. */
export interface MemberLookups {
  senderStatus: boolean;
  chatAdmins: boolean;
}

/**
 * Maps an update and the conversation snapshot to the next state and its effects.
 * Commands pre-empt the current state; otherwise the first matching rule of the
 * current state runs; otherwise the fallback answers without touching state.
 * Admin-only commands from anyone else get the `forbidden` answer instead.
 * Performs no I/O beyond the lookup it is given.
 */
export class Dispatcher {
  private readonly logger: Logger;

  constructor(
    private readonly flow: Flow,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger({ component: 'Dispatcher' });
  }

  emptySnapshot(key: string, chatId: string): ConversationSnapshot {
    return { key, chatId, state: this.flow.idle, context: {}, version: 0, updatedAt: null };
  }

  memberLookups(update: Update): MemberLookups {
    const { payload } = update;
    return {
      senderStatus: payload.kind === 'command' && this.flow.commands[payload.token]?.adminOnly === true,
      chatAdmins: payload.kind === 'member' && this.flow.onMemberChange !== undefined,
    };
  }

  handle(update: Update, snapshot: ConversationSnapshot, lookup: ArchiveLookup): DispatchResult {
    const state = this.flow.hasState(snapshot.state) ? snapshot.state : this.flow.idle;
    if (state !== snapshot.state) {
      this.logger.warn(
        { key: snapshot.key, state: snapshot.state },
        'Conversation is in an undeclared state; treating it as idle'
      );
    }
    const current: ConversationSnapshot = { ...snapshot, state };
    const observed = this.observe(update);

    const { payload } = update;
    if (payload.kind === 'edit' || payload.kind === 'ignored') {
      return this.unchanged(current, observed, [], 'observe');
    }

    if (payload.kind === 'member') {
      const { onMemberChange } = this.flow;
      return onMemberChange
        ? this.run(onMemberChange, state, 'member', update, current, lookup, observed)
        : this.unchanged(current, observed, [], 'observe');
    }

    if (payload.kind === 'command') {
      const command = this.flow.commands[payload.token];
      if (command?.adminOnly && !isAdminStatus(update.senderStatus)) {
        const route = `forbidden:${payload.token}`;
        this.logger.info({ route, userId: update.userId, status: update.senderStatus }, 'Admin-only command refused');
        return this.flow.forbidden
          ? this.run(this.flow.forbidden, state, route, update, current, lookup, observed)
          : this.fallback(update, current, lookup, observed, route);
      }
      if (command) {
        return this.run(command.handle, command.next ?? state, `command:${payload.token}`, update, current, lookup, observed);
      }
    }

    const rules = this.flow.transitions[state] ?? [];
    for (const [index, rule] of rules.entries()) {
      if (matchesPattern(rule.on, update)) {
        return this.run(rule.handle, rule.next, `state:${state}#${index}`, update, current, lookup, observed);
      }
    }

    return this.fallback(update, current, lookup, observed, 'fallback');
  }

  private run(
    handler: Handler | undefined,
    nextState: string,
    route: string,
    update: Update,
    snapshot: ConversationSnapshot,
    lookup: ArchiveLookup,
    observed: ArchiveOp[]
  ): DispatchResult {
    let effects: HandlerEffects;
    try {
      effects = handler ? handler({ update, snapshot, lookup }) : {};
    } catch (error) {
      this.logger.error({ error, route, updateId: update.id }, 'Handler failed; answering with fallback');
      return this.fallback(update, snapshot, lookup, observed, `error:${route}`);
    }

    return {
      nextState,
      contextPatch: effects.contextPatch ?? {},
      outbound: this.toDrafts(update, effects),
      archive: [...observed, ...(effects.archive ?? [])],
      route,
    };
  }

  private fallback(
    update: Update,
    snapshot: ConversationSnapshot,
    lookup: ArchiveLookup,
    observed: ArchiveOp[],
    route: string
  ): DispatchResult {
    let effects: HandlerEffects = {};
    try {
      effects = this.flow.fallback({ update, snapshot, lookup });
    } catch (error) {
      this.logger.error({ error, updateId: update.id }, 'Fallback handler failed; sending nothing');
    }
    return this.unchanged(snapshot, observed, this.toDrafts(update, effects), route);
  }

  private unchanged(
    snapshot: ConversationSnapshot,
    archive: ArchiveOp[],
    outbound: OutboundDraft[],
    route: string
  ): DispatchResult {
    return { nextState: snapshot.state, contextPatch: {}, outbound, archive, route };
  }

  private observe(update: Update): ArchiveOp[] {
    if (!this.flow.observe) return [];
    try {
      return this.flow.observe(update);
    } catch (error) {
      this.logger.error({ error, updateId: update.id }, 'Observer failed; nothing archived');
      return [];
    }
  }

  private toDrafts(update: Update, effects: HandlerEffects): OutboundDraft[] {
    return (effects.replies ?? [])
      .filter((reply) => reply.text.trim() !== '')
      .map((reply) => {
        const draft: OutboundDraft = { chatId: reply.chatId ?? update.chatId, body: reply.text };
        if (reply.replyTo !== undefined) {
          draft.replyTo = reply.replyTo;
        }
        return draft;
      });
  }
}
