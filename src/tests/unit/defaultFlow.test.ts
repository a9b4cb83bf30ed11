import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Dispatcher } from '../../core/dispatch/Dispatcher.js';
import { archiveObserver, createDefaultFlow } from '../../core/flows/defaultFlow.js';
import {
  ADMIN_ONLY,
  ASK_NAME,
  CANCELLED,
  DELETE_DONE,
  DELETE_NOT_FOUND,
  NOTHING_TO_CANCEL,
  SEARCH_EMPTY,
  SEARCH_USAGE,
  UNRECOGNIZED,
  packMessages,
} from '../../core/flows/messages.js';
import type { ArchiveHit, ArchiveLookup } from '../../ports/ArchivePort.js';
import type { ConversationSnapshot } from '../../ports/ConversationStore.js';
import type { Update, UpdatePayload } from '../../ports/Update.js';
import { makeUpdate } from '../helpers/updates.js';

const HELP = [
  'Here is what I can do:',
  '/start - introduce yourself',
  '/cancel - stop what we are doing',
  '/delete - mark your message (or the one you reply to) as deleted',
  '/search_hashtag - search this chat for a hashtag (admins only), e.g. /search_hashtag #news',
  '/help - show this message',
].join('\n');

function snapshot(state: string): ConversationSnapshot {
  return { key: '42', chatId: '42', state, context: {}, version: 1, updatedAt: 1 };
}

describe('default conversation flow', () => {
  const dispatcher = new Dispatcher(createDefaultFlow());
  let hits: ArchiveHit[];
  let latest: number | null;
  let archived: Map<number, boolean>;
  let lookup: ArchiveLookup;

  beforeEach(() => {
    hits = [];
    latest = null;
    archived = new Map();
    lookup = {
      searchHashtag: vi.fn(() => hits),
      latestMessageBy: vi.fn(() => latest),
      isDeleted: vi.fn((_chatId: string, messageId: number) => archived.get(messageId) ?? null),
    };
  });

  it('asks for a name on /start', () => {
    const result = dispatcher.handle(makeUpdate(1, '/start'), snapshot('idle'), lookup);

    expect(result.nextState).toBe('awaiting_name');
    expect(result.outbound).toEqual([{ chatId: '42', body: ASK_NAME }]);
  });

  it('remembers the name and greets', () => {
    const update = makeUpdate(2, 'Alice', { messageId: 77 });
    const result = dispatcher.handle(update, snapshot('awaiting_name'), lookup);

    expect(result.nextState).toBe('idle');
    expect(result.contextPatch).toEqual({ name: 'Alice' });
    expect(result.outbound).toEqual([{ chatId: '42', body: 'Nice to meet you, Alice!' }]);
    expect(result.archive).toEqual([
      { kind: 'record', chatId: '42', messageId: 77, userId: '7', username: 'alice', text: 'Alice', sentAt: update.receivedAt },
    ]);
  });

  it('tidies whitespace in the name', () => {
    const result = dispatcher.handle(makeUpdate(3, '  Bob   Smith '), snapshot('awaiting_name'), lookup);
    expect(result.contextPatch).toEqual({ name: 'Bob Smith' });
  });

  it('cuts a long name on code points', () => {
    const result = dispatcher.handle(makeUpdate(18, `${'a'.repeat(63)}😀😀`), snapshot('awaiting_name'), lookup);
    expect(result.contextPatch).toEqual({ name: `${'a'.repeat(63)}😀` });
  });

  it('keeps waiting when the answer is blank', () => {
    const result = dispatcher.handle(makeUpdate(4, '   '), snapshot('awaiting_name'), lookup);

    expect(result.nextState).toBe('awaiting_name');
    expect(result.outbound).toEqual([{ chatId: '42', body: `${UNRECOGNIZED}\n${HELP}` }]);
  });

  it('cancels back to idle', () => {
    const cancelled = dispatcher.handle(makeUpdate(5, '/cancel'), snapshot('awaiting_name'), lookup);
    expect(cancelled.nextState).toBe('idle');
    expect(cancelled.outbound[0]?.body).toBe(CANCELLED);

    const nothing = dispatcher.handle(makeUpdate(6, '/cancel'), snapshot('idle'), lookup);
    expect(nothing.outbound[0]?.body).toBe(NOTHING_TO_CANCEL);
  });

  it('lists every command on /help', () => {
    const result = dispatcher.handle(makeUpdate(7, '/help'), snapshot('awaiting_name'), lookup);

    expect(result.nextState).toBe('awaiting_name');
    expect(result.outbound).toEqual([{ chatId: '42', body: HELP }]);
  });

  it('archives idle chatter without answering', () => {
    const result = dispatcher.handle(makeUpdate(8, 'just chatting'), snapshot('idle'), lookup);

    expect(result.route).toBe('state:idle#0');
    expect(result.outbound).toEqual([]);
    expect(result.archive).toHaveLength(1);
  });

  describe('/delete', () => {
    it('marks the replied-to message when it is the caller’s own', () => {
      archived.set(10, false);
      const update = makeUpdate(9, '/delete', { messageId: 500, replyTo: { messageId: 10, userId: '7' } });
      const result = dispatcher.handle(update, snapshot('idle'), lookup);

      expect(result.archive).toEqual([{ kind: 'markDeleted', chatId: '42', messageId: 10 }]);
      expect(result.outbound).toEqual([{ chatId: '42', body: DELETE_DONE, replyTo: 500 }]);
      expect(lookup.latestMessageBy).not.toHaveBeenCalled();
    });

    it('refuses a replied-to message that was never archived', () => {
      const update = makeUpdate(16, '/delete', { messageId: 503, replyTo: { messageId: 999, userId: '7' } });
      const result = dispatcher.handle(update, snapshot('idle'), lookup);

      expect(lookup.isDeleted).toHaveBeenCalledWith('42', 999);
      expect(result.archive).toEqual([]);
      expect(result.outbound).toEqual([{ chatId: '42', body: DELETE_NOT_FOUND, replyTo: 503 }]);
    });

    it('refuses a replied-to message that is already deleted', () => {
      archived.set(10, true);
      const update = makeUpdate(17, '/delete', { messageId: 504, replyTo: { messageId: 10, userId: '7' } });
      const result = dispatcher.handle(update, snapshot('idle'), lookup);

      expect(result.archive).toEqual([]);
      expect(result.outbound).toEqual([{ chatId: '42', body: DELETE_NOT_FOUND, replyTo: 504 }]);
    });

    it('falls back to the caller’s latest message when replying to someone else', () => {
      latest = 33;
      const update = makeUpdate(10, '/delete', { messageId: 501, replyTo: { messageId: 10, userId: '8' } });
      const result = dispatcher.handle(update, snapshot('idle'), lookup);

      expect(lookup.latestMessageBy).toHaveBeenCalledWith('42', '7');
      expect(result.archive).toEqual([{ kind: 'markDeleted', chatId: '42', messageId: 33 }]);
    });

    it('says so when there is nothing to delete', () => {
      const result = dispatcher.handle(makeUpdate(11, '/delete', { messageId: 502 }), snapshot('idle'), lookup);

      expect(result.archive).toEqual([]);
      expect(result.outbound).toEqual([{ chatId: '42', body: DELETE_NOT_FOUND, replyTo: 502 }]);
    });
  });

  describe('/search_hashtag', () => {
    const admin: Partial<Update> = { senderStatus: 'administrator' };

    it('refuses callers who are not chat administrators', () => {
      const update = makeUpdate(19, '/search_hashtag #news', { chatId: '-100', chatType: 'group', messageId: 600, senderStatus: 'member' });
      const result = dispatcher.handle(update, snapshot('idle'), lookup);

      expect(result.route).toBe('forbidden:search_hashtag');
      expect(result.nextState).toBe('idle');
      expect(result.outbound).toEqual([{ chatId: '-100', body: ADMIN_ONLY, replyTo: 600 }]);
      expect(lookup.searchHashtag).not.toHaveBeenCalled();
    });

    it('refuses when the caller status is unknown', () => {
      const result = dispatcher.handle(makeUpdate(20, '/search_hashtag #news', { messageId: 601 }), snapshot('idle'), lookup);
      expect(result.outbound).toEqual([{ chatId: '42', body: ADMIN_ONLY, replyTo: 601 }]);
    });

    it('lets the chat creator search', () => {
      const update = makeUpdate(21, '/search_hashtag #news', { senderStatus: 'creator' });
      expect(dispatcher.handle(update, snapshot('idle'), lookup).route).toBe('command:search_hashtag');
    });

    it('explains usage when the argument is not a hashtag', () => {
      const missing = dispatcher.handle(makeUpdate(12, '/search_hashtag', admin), snapshot('idle'), lookup);
      const bare = dispatcher.handle(makeUpdate(13, '/search_hashtag news', admin), snapshot('idle'), lookup);

      expect(missing.outbound).toEqual([{ chatId: '42', body: SEARCH_USAGE }]);
      expect(bare.outbound).toEqual([{ chatId: '42', body: SEARCH_USAGE }]);
      expect(lookup.searchHashtag).not.toHaveBeenCalled();
    });

    it('sends results privately to the caller', () => {
      hits = [
        { messageId: 1, text: 'hi #news', author: 'alice', edited: false },
        { messageId: 2, text: 'x #news', author: '8', edited: true },
      ];
      const update = makeUpdate(14, '/search_hashtag #news', { chatId: '-100', chatType: 'group', ...admin });
      const result = dispatcher.handle(update, snapshot('idle'), lookup);

      expect(lookup.searchHashtag).toHaveBeenCalledWith('-100', '#news', 50);
      expect(result.outbound).toEqual([
        {
          chatId: '7',
          body: 'Hashtag search results:\n\nText: hi #news\nAuthor: alice\n\nText (edited): x #news\nAuthor: 8',
        },
      ]);
    });

    it('reports an empty search', () => {
      const result = dispatcher.handle(makeUpdate(15, '/search_hashtag #none', admin), snapshot('idle'), lookup);
      expect(result.outbound).toEqual([{ chatId: '7', body: SEARCH_EMPTY }]);
    });
  });
});

describe('membership changes', () => {
  const dispatcher = new Dispatcher(createDefaultFlow());
  const lookup: ArchiveLookup = {
    searchHashtag: vi.fn(() => []),
    latestMessageBy: vi.fn(() => null),
    isDeleted: vi.fn(() => null),
  };

  function memberUpdate(change: Partial<Extract<UpdatePayload, { kind: 'member' }>>, chatAdminIds?: string[]): Update {
    const payload: UpdatePayload = {
      kind: 'member',
      memberId: '9',
      memberName: '@carol',
      isBotMember: false,
      chatTitle: 'Book club',
      from: 'left',
      to: 'member',
      ...change,
    };
    const update = makeUpdate(30, 'x', { chatId: '-100', chatType: 'supergroup', payload });
    if (chatAdminIds !== undefined) {
      update.chatAdminIds = chatAdminIds;
    }
    return update;
  }

  it('asks for the chat administrators only for membership changes', () => {
    expect(dispatcher.memberLookups(memberUpdate({}))).toEqual({ senderStatus: false, chatAdmins: true });
    expect(dispatcher.memberLookups(makeUpdate(31, '/search_hashtag #x'))).toEqual({ senderStatus: true, chatAdmins: false });
    expect(dispatcher.memberLookups(makeUpdate(32, '/start'))).toEqual({ senderStatus: false, chatAdmins: false });
  });

  it('tells every administrator privately when someone joins', () => {
    const result = dispatcher.handle(memberUpdate({}, ['1', '2']), snapshot('awaiting_name'), lookup);

    expect(result.route).toBe('member');
    expect(result.nextState).toBe('awaiting_name');
    expect(result.archive).toEqual([]);
    expect(result.outbound).toEqual([
      { chatId: '1', body: "User @carol joined the chat 'Book club'." },
      { chatId: '2', body: "User @carol joined the chat 'Book club'." },
    ]);
  });

  it('reports a member who was kicked as having left', () => {
    const result = dispatcher.handle(memberUpdate({ from: 'restricted', to: 'kicked' }, ['1']), snapshot('idle'), lookup);
    expect(result.outbound).toEqual([{ chatId: '1', body: "User @carol left the chat 'Book club'." }]);
  });

  it('names an untitled chat', () => {
    const result = dispatcher.handle(memberUpdate({ chatTitle: undefined }, ['1']), snapshot('idle'), lookup);
    expect(result.outbound).toEqual([{ chatId: '1', body: "User @carol joined the chat 'Private Chat'." }]);
  });

  it('stays quiet for bots and for changes that keep someone in the chat', () => {
    const bot = dispatcher.handle(memberUpdate({ isBotMember: true }, ['1']), snapshot('idle'), lookup);
    const promoted = dispatcher.handle(memberUpdate({ from: 'member', to: 'administrator' }, ['1']), snapshot('idle'), lookup);

    expect(bot.outbound).toEqual([]);
    expect(promoted.outbound).toEqual([]);
  });
});

describe('archiveObserver', () => {
  it('ignores bot messages', () => {
    expect(archiveObserver(makeUpdate(1, 'beep', { isBot: true }))).toEqual([]);
  });

  it('records edits as new versions', () => {
    const edit = makeUpdate(2, 'x', { payload: { kind: 'edit', messageId: 9, text: 'fixed', editedAt: 5000 } });
    expect(archiveObserver(edit)).toEqual([{ kind: 'edit', chatId: '42', messageId: 9, text: 'fixed', editedAt: 5000 }]);
  });
});

describe('packMessages', () => {
  it('joins blocks up to the limit', () => {
    expect(packMessages(['aaaa', 'bbbb', 'cc'], 10)).toEqual(['aaaa\n\nbbbb', 'cc']);
  });

  it('cuts a block longer than the limit', () => {
    expect(packMessages(['abcdefghijk'], 5)).toEqual(['abcde', 'fghij', 'k']);
  });

  it('never splits a surrogate pair when cutting', () => {
    expect(packMessages(['😀😀'], 3)).toEqual(['😀', '😀']);
  });
});
