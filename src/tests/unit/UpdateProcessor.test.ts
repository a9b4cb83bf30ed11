import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { ConnectionPool } from '../../persistence/database.js';
import { ConversationRepository } from '../../persistence/repositories/ConversationRepository.js';
import { ArchiveRepository } from '../../persistence/repositories/ArchiveRepository.js';
import { CursorRepository } from '../../persistence/repositories/CursorRepository.js';
import { Dispatcher } from '../../core/dispatch/Dispatcher.js';
import { createDefaultFlow } from '../../core/flows/defaultFlow.js';
import { CursorTracker } from '../../core/engine/CursorTracker.js';
import { UpdateProcessor, type UpdateProcessorOptions } from '../../core/engine/UpdateProcessor.js';
import type { CommitRequest, CommitResult, ConversationSnapshot, ConversationStore } from '../../ports/ConversationStore.js';
import type { OutboundMessage, OutboundQueue } from '../../ports/OutboundStore.js';
import { AuthError, TransientSourceError, VersionConflict } from '../../utils/errors.js';
import { FakeClock } from '../helpers/FakeClock.js';
import { FakeBotApi } from '../helpers/fakes.js';
import { createTestPool } from '../helpers/database.js';
import { makeUpdate } from '../helpers/updates.js';

class CollectingQueue implements OutboundQueue {
  readonly messages: OutboundMessage[] = [];
  enqueue(message: OutboundMessage): void {
    this.messages.push(message);
  }
}

/** Lets another writer commit to the same conversation just before the next `commits` commits. */
class RacingStore implements ConversationStore {
  races = 0;

  constructor(
    private readonly inner: ConversationRepository,
    private readonly racer: (inner: ConversationRepository) => void,
    private remaining: number
  ) {}

  load(key: string): ConversationSnapshot | null {
    return this.inner.load(key);
  }

  isProcessed(updateId: number): boolean {
    return this.inner.isProcessed(updateId);
  }

  commit(request: CommitRequest): CommitResult {
    if (this.remaining > 0) {
      this.remaining--;
      this.races++;
      this.racer(this.inner);
    }
    return this.inner.commit(request);
  }
}

describe('UpdateProcessor', () => {
  const options: UpdateProcessorOptions = { maxCommitRetries: 3, conversationScope: 'chat' };
  let clock: FakeClock;
  let pool: ConnectionPool;
  let conversations: ConversationRepository;
  let cursor: CursorRepository;
  let queue: CollectingQueue;
  let dispatcher: Dispatcher;
  let api: FakeBotApi;

  const processorWith = (store: ConversationStore, overrides: Partial<UpdateProcessorOptions> = {}): UpdateProcessor =>
    new UpdateProcessor(
      { store, dispatcher, lookup: new ArchiveRepository(pool), queue, members: api },
      { ...options, ...overrides }
    );

  beforeEach(() => {
    clock = new FakeClock();
    pool = createTestPool(clock);
    conversations = new ConversationRepository(pool, clock);
    cursor = new CursorRepository(pool, clock);
    queue = new CollectingQueue();
    dispatcher = new Dispatcher(createDefaultFlow());
    api = new FakeBotApi(clock);
  });

  afterEach(() => {
    pool.close();
  });

  it('walks a conversation through /start and a name', async () => {
    const processor = processorWith(conversations);

    const first = await processor.process(makeUpdate(1, '/start'));
    const second = await processor.process(makeUpdate(2, 'Alice'));

    expect(first).toMatchObject({ status: 'committed', key: '42', state: 'awaiting_name', version: 1, outbound: 1 });
    expect(second).toMatchObject({ status: 'committed', key: '42', state: 'idle', version: 2, outbound: 1 });
    expect(queue.messages.map((m) => m.body)).toEqual(['What is your name?', 'Nice to meet you, Alice!']);
    expect(conversations.load('42')).toMatchObject({ state: 'idle', context: { name: 'Alice' }, version: 2 });
    expect(cursor.get()).toBe(2);
  });

  it('skips an update that was already committed', async () => {
    const processor = processorWith(conversations);
    const update = makeUpdate(1, '/start');

    await processor.process(update);
    const again = await processor.process(update);

    expect(again).toEqual({ status: 'duplicate' });
    expect(queue.messages).toHaveLength(1);
    expect(conversations.load('42')?.version).toBe(1);
  });

  it('completes ignored updates without a commit', async () => {
    const processor = processorWith(conversations);
    const tracker = new CursorTracker([5]);
    const update = makeUpdate(5, 'x', { payload: { kind: 'ignored', reason: 'non_text_message' } });

    const outcome = await processor.process(update, tracker);

    expect(outcome).toEqual({ status: 'ignored', reason: 'non_text_message' });
    expect(tracker.isComplete(5)).toBe(true);
    expect(conversations.load('42')).toBeNull();
  });

  it('reloads and re-dispatches after a version conflict', async () => {
    conversations.commit({
      key: '42',
      chatId: '42',
      expectedVersion: 0,
      nextState: 'idle',
      contextPatch: {},
      updateId: 1,
      cursorAdvance: 1,
      outbound: [],
      archive: [],
    });
    // Another writer moves the conversation to awaiting_name between our load and commit
    const store = new RacingStore(
      conversations,
      (inner) => {
        const current = inner.load('42');
        inner.commit({
          key: '42',
          chatId: '42',
          expectedVersion: current?.version ?? 0,
          nextState: 'awaiting_name',
          contextPatch: {},
          updateId: 50,
          cursorAdvance: 0,
          outbound: [],
          archive: [],
        });
      },
      1
    );
    const processor = processorWith(store);

    const outcome = await processor.process(makeUpdate(2, 'Alice'));

    expect(store.races).toBe(1);
    expect(processor.conflictCount).toBe(1);
    expect(outcome).toMatchObject({ status: 'committed', state: 'idle', version: 3, retries: 1 });
    // The second run saw awaiting_name, so the text was taken as the name
    expect(queue.messages.map((m) => m.body)).toEqual(['Nice to meet you, Alice!']);
  });

  it('gives up after the configured number of conflicts', async () => {
    const store: ConversationStore = {
      load: () => null,
      isProcessed: () => false,
      commit: (request) => {
        throw new VersionConflict(request.key, request.expectedVersion, 9);
      },
    };
    const processor = processorWith(store, { maxCommitRetries: 2 });

    await expect(processor.process(makeUpdate(1, '/start'))).rejects.toBeInstanceOf(VersionConflict);
    expect(processor.conflictCount).toBe(3);
    expect(queue.messages).toEqual([]);
  });

  it('keys group conversations per member under chat_user scope', async () => {
    const processor = processorWith(conversations, { conversationScope: 'chat_user' });
    const outcome = await processor.process(makeUpdate(1, '/start', { chatId: '-100', chatType: 'group' }));

    expect(outcome).toMatchObject({ status: 'committed', key: '-100:7' });
    expect(conversations.load('-100:7')?.state).toBe('awaiting_name');
  });

  it('commits the batch watermark rather than its own id', async () => {
    const processor = processorWith(conversations);
    const tracker = new CursorTracker([3, 4], 2);

    await processor.process(makeUpdate(4, '/start', { chatId: '43' }), tracker);
    expect(cursor.get()).toBe(2);

    await processor.process(makeUpdate(3, '/start'), tracker);
    expect(cursor.get()).toBe(4);
  });

  describe('chat membership', () => {
    const search = (id: number) =>
      makeUpdate(id, '/search_hashtag #news', { chatId: '-100', chatType: 'group', messageId: 700 + id });

    it('refuses an admin-only command from a regular member', async () => {
      const outcome = await processorWith(conversations).process(search(1));

      expect(api.getChatMember).toHaveBeenCalledWith('-100', '7');
      expect(outcome).toMatchObject({ status: 'committed', route: 'forbidden:search_hashtag' });
      expect(queue.messages.map((m) => [m.chatId, m.body, m.replyTo])).toEqual([
        ['-100', 'This command is only available to chat administrators.', 701],
      ]);
    });

    it('runs an admin-only command for an administrator', async () => {
      api.memberStatuses.set('7', 'administrator');
      const outcome = await processorWith(conversations).process(search(2));

      expect(outcome).toMatchObject({ status: 'committed', route: 'command:search_hashtag' });
      expect(queue.messages.map((m) => [m.chatId, m.body])).toEqual([['7', 'No messages with that hashtag were found.']]);
    });

    it('treats a failed status lookup as a regular member', async () => {
      api.getChatMember.mockRejectedValueOnce(new TransientSourceError('timeout'));
      const outcome = await processorWith(conversations).process(search(3));

      expect(outcome).toMatchObject({ status: 'committed', route: 'forbidden:search_hashtag' });
    });

    it('fails the update when the token is rejected during the lookup', async () => {
      api.getChatMember.mockRejectedValueOnce(new AuthError('Unauthorized'));

      await expect(processorWith(conversations).process(search(4))).rejects.toBeInstanceOf(AuthError);
      expect(conversations.isProcessed(4)).toBe(false);
    });

    it('does not look anything up for ordinary updates', async () => {
      await processorWith(conversations).process(makeUpdate(5, '/start'));

      expect(api.getChatMember).not.toHaveBeenCalled();
      expect(api.getChatAdministrators).not.toHaveBeenCalled();
    });

    it('notifies the human administrators when someone joins', async () => {
      api.administrators = [
        { userId: '1', isBot: false },
        { userId: '99', isBot: true },
        { userId: '2', isBot: false },
      ];
      const joined = makeUpdate(6, 'x', {
        chatId: '-100',
        chatType: 'supergroup',
        payload: { kind: 'member', memberId: '9', memberName: 'Carol', isBotMember: false, chatTitle: 'Book club', from: 'left', to: 'member' },
      });

      const outcome = await processorWith(conversations).process(joined);

      expect(api.getChatAdministrators).toHaveBeenCalledWith('-100');
      expect(outcome).toMatchObject({ status: 'committed', route: 'member', outbound: 2 });
      expect(queue.messages.map((m) => [m.chatId, m.body])).toEqual([
        ['1', "User Carol joined the chat 'Book club'."],
        ['2', "User Carol joined the chat 'Book club'."],
      ]);
    });

    it('notifies nobody when the administrators cannot be listed', async () => {
      api.getChatAdministrators.mockRejectedValueOnce(new TransientSourceError('Bad Gateway'));
      const left = makeUpdate(7, 'x', {
        chatId: '-100',
        payload: { kind: 'member', memberId: '9', memberName: 'Carol', isBotMember: false, from: 'member', to: 'left' },
      });

      const outcome = await processorWith(conversations).process(left);

      expect(outcome).toMatchObject({ status: 'committed', route: 'member', outbound: 0 });
      expect(queue.messages).toEqual([]);
    });
  });
});
