import type { ArchiveOp } from '../../ports/ArchivePort.js';
import type { MemberStatus, Update } from '../../ports/Update.js';
import { defineFlow, type CommandRoute, type Flow, type Handler, type Reply } from '../dispatch/flow.js';
import {
  ADMIN_ONLY,
  ASK_NAME,
  CANCELLED,
  DELETE_DONE,
  DELETE_NOT_FOUND,
  NOTHING_TO_CANCEL,
  SEARCH_EMPTY,
  SEARCH_HEADER,
  SEARCH_USAGE,
  UNRECOGNIZED,
  UNTITLED_CHAT,
  formatSearchHit,
  greeting,
  helpText,
  memberJoined,
  memberLeft,
  packMessages,
} from './messages.js';

export const STATES = ['idle', 'awaiting_name'] as const;
export type DefaultState = (typeof STATES)[number];

export const SEARCH_RESULT_LIMIT = 50;
const MAX_NAME_LENGTH = 64;
const IN_CHAT: ReadonlySet<MemberStatus> = new Set<MemberStatus>(['member', 'restricted', 'creator', 'administrator']);

/** Human text messages and their edits go to the archive. */
export function archiveObserver(update: Update): ArchiveOp[] {
  if (update.isBot) return [];
  const { payload } = update;

  if (payload.kind === 'text' && update.messageId !== undefined) {
    const op: ArchiveOp = {
      kind: 'record',
      chatId: update.chatId,
      messageId: update.messageId,
      userId: update.userId,
      text: payload.text,
      sentAt: update.receivedAt,
    };
    if (update.username !== undefined) {
      op.username = update.username;
    }
    return [op];
  }

  if (payload.kind === 'edit') {
    return [
      { kind: 'edit', chatId: update.chatId, messageId: payload.messageId, text: payload.text, editedAt: payload.editedAt },
    ];
  }
  return [];
}

const start: Handler = ({ update }) => ({
  replies: [{ text: ASK_NAME, chatId: update.chatId }],
});

const rememberName: Handler = ({ update }) => {
  const text = update.payload.kind === 'text' ? update.payload.text : '';
  // Cut on code points so a surrogate pair is never split
  const name = Array.from(text.trim().replace(/\s+/g, ' '))
    .slice(0, MAX_NAME_LENGTH)
    .join('');
  return {
    contextPatch: { name },
    replies: [{ text: greeting(name) }],
  };
};

const cancel: Handler = ({ snapshot }) => ({
  replies: [{ text: snapshot.state === 'idle' ? NOTHING_TO_CANCEL : CANCELLED }],
});

/**
 * Marks the replied-to message when it is the caller's own, else the caller's latest archived one.
 * A replied-to message must be archived and not yet deleted.
 */
const deleteMessage: Handler = ({ update, lookup }) => {
  const replyTo = update.replyTo;
  let target: number | null;
  if (replyTo !== undefined && replyTo.userId === update.userId) {
    target = lookup.isDeleted(update.chatId, replyTo.messageId) === false ? replyTo.messageId : null;
  } else {
    target = lookup.latestMessageBy(update.chatId, update.userId);
  }

  const reply: Reply = { text: target === null ? DELETE_NOT_FOUND : DELETE_DONE };
  if (update.messageId !== undefined) {
    reply.replyTo = update.messageId;
  }
  if (target === null) {
    return { replies: [reply] };
  }
  return {
    archive: [{ kind: 'markDeleted', chatId: update.chatId, messageId: target }],
    replies: [reply],
  };
};

/** Results go to the caller's private chat so a group is not flooded. */
const searchHashtag: Handler = ({ update, lookup }) => {
  const hashtag = update.payload.kind === 'command' ? update.payload.args[0] : undefined;
  if (hashtag === undefined || !/^#[\p{L}\p{N}_]+$/u.test(hashtag)) {
    return { replies: [{ text: SEARCH_USAGE }] };
  }

  const hits = lookup.searchHashtag(update.chatId, hashtag, SEARCH_RESULT_LIMIT);
  if (hits.length === 0) {
    return { replies: [{ text: SEARCH_EMPTY, chatId: update.userId }] };
  }

  const messages = packMessages([SEARCH_HEADER, ...hits.map(formatSearchHit)]);
  return { replies: messages.map((text) => ({ text, chatId: update.userId })) };
};

const refuseNonAdmin: Handler = ({ update }) => {
  const reply: Reply = { text: ADMIN_ONLY };
  if (update.messageId !== undefined) {
    reply.replyTo = update.messageId;
  }
  return { replies: [reply] };
};

/** Tells each human administrator, in private, that someone joined or left. Bots coming and going are not reported. */
const announceMemberChange: Handler = ({ update }) => {
  const { payload } = update;
  if (payload.kind !== 'member' || payload.isBotMember) {
    return {};
  }
  const wasIn = IN_CHAT.has(payload.from);
  const isIn = IN_CHAT.has(payload.to);
  if (wasIn === isIn) {
    return {};
  }

  const title = payload.chatTitle ?? UNTITLED_CHAT;
  const text = isIn ? memberJoined(payload.memberName, title) : memberLeft(payload.memberName, title);
  return { replies: (update.chatAdminIds ?? []).map((adminId) => ({ text, chatId: adminId })) };
};

export function createDefaultFlow(): Flow<DefaultState> {
  const commands: Record<string, CommandRoute<DefaultState>> = {
    start: { description: 'introduce yourself', next: 'awaiting_name', handle: start },
    cancel: { description: 'stop what we are doing', next: 'idle', handle: cancel },
    delete: { description: 'mark your message (or the one you reply to) as deleted', handle: deleteMessage },
    search_hashtag: {
      description: 'search this chat for a hashtag (admins only), e.g. /search_hashtag #news',
      adminOnly: true,
      handle: searchHashtag,
    },
  };

  const listing = () =>
    Object.entries(commands).map(([token, route]) => ({ token, description: route.description }));

  commands.help = {
    description: 'show this message',
    handle: () => ({ replies: [{ text: helpText(listing()) }] }),
  };

  return defineFlow<DefaultState>({
    states: STATES,
    idle: 'idle',
    commands,
    transitions: {
      // Plain chatter in idle is archived by the observer and needs no answer
      idle: [{ on: { kind: 'text' }, next: 'idle' }],
      awaiting_name: [{ on: { kind: 'text', match: /\S/ }, next: 'idle', handle: rememberName }],
    },
    fallback: () => ({ replies: [{ text: `${UNRECOGNIZED}\n${helpText(listing())}` }] }),
    forbidden: refuseNonAdmin,
    onMemberChange: announceMemberChange,
    observe: archiveObserver,
  });
}
