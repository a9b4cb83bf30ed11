import { MEMBER_STATUSES, type ChatType, type MemberStatus, type Update, type UpdatePayload } from '../../ports/Update.js';
import {
  telegramUpdateSchema,
  updateIdSchema,
  type TelegramCallbackQuery,
  type TelegramChatMemberUpdated,
  type TelegramMessage,
  type TelegramUser,
} from './schema.js';

export interface ParseOptions {
  /** Commands addressed to another bot (`/cmd@other_bot`) are read as plain text. */
  botUsername?: string;
  now: number;
}

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@([A-Za-z0-9_]+))?(?:\s+([\s\S]*))?$/;
const CHAT_TYPES: readonly ChatType[] = ['private', 'group', 'supergroup', 'channel'];

function chatTypeOf(type: string): ChatType {
  return CHAT_TYPES.find((known) => known === type) ?? 'unknown';
}

/** Statuses the platform adds later read as `left`. */
export function memberStatusOf(status: string): MemberStatus {
  return MEMBER_STATUSES.find((known) => known === status) ?? 'left';
}

/** `@username` when the user has one, else their full name. */
export function displayName(user: TelegramUser): string {
  if (user.username !== undefined) {
    return `@${user.username}`;
  }
  const fullName = [user.first_name, user.last_name].filter((part) => part !== undefined && part !== '').join(' ');
  return fullName !== '' ? fullName : String(user.id);
}

/**
 * Reads `/token@bot args` from a message text. Returns null for text that is not a
 * command for this bot.
 */
export function parseCommand(
  text: string,
  botUsername?: string
): Extract<UpdatePayload, { kind: 'command' }> | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  const [, token = '', addressee, rest = ''] = match;
  if (addressee !== undefined && botUsername !== undefined && addressee.toLowerCase() !== botUsername.toLowerCase()) {
    return null;
  }
  const args = rest.split(/\s+/).filter((arg) => arg !== '');
  return { kind: 'command', token: token.toLowerCase(), args, text: rest.trim() };
}

function ignored(id: number, reason: string, receivedAt: number): Update {
  return {
    id,
    chatId: '',
    chatType: 'unknown',
    userId: '',
    isBot: false,
    payload: { kind: 'ignored', reason },
    receivedAt,
  };
}

function fromMessage(id: number, message: TelegramMessage, payload: UpdatePayload): Update {
  const author: TelegramUser | undefined = message.from;
  const update: Update = {
    id,
    chatId: String(message.chat.id),
    chatType: chatTypeOf(message.chat.type),
    userId: author ? String(author.id) : String(message.chat.id),
    isBot: author?.is_bot ?? false,
    messageId: message.message_id,
    payload,
    receivedAt: message.date * 1000,
  };
  if (author?.username !== undefined) {
    update.username = author.username;
  }
  if (message.reply_to_message) {
    const replied = message.reply_to_message;
    update.replyTo = replied.from
      ? { messageId: replied.message_id, userId: String(replied.from.id) }
      : { messageId: replied.message_id };
  }
  return update;
}

function fromCallback(id: number, query: TelegramCallbackQuery, now: number): Update {
  const chat = query.message?.chat;
  const update: Update = {
    id,
    chatId: String(chat?.id ?? query.from.id),
    chatType: chat ? chatTypeOf(chat.type) : 'private',
    userId: String(query.from.id),
    isBot: query.from.is_bot,
    payload: { kind: 'callback', data: query.data ?? '', callbackId: query.id },
    receivedAt: now,
  };
  if (query.from.username !== undefined) {
    update.username = query.from.username;
  }
  if (query.message) {
    update.messageId = query.message.message_id;
  }
  return update;
}

function fromMemberChange(id: number, change: TelegramChatMemberUpdated): Update {
  const member = change.new_chat_member.user;
  const payload: Extract<UpdatePayload, { kind: 'member' }> = {
    kind: 'member',
    memberId: String(member.id),
    memberName: displayName(member),
    isBotMember: member.is_bot,
    from: memberStatusOf(change.old_chat_member.status),
    to: memberStatusOf(change.new_chat_member.status),
  };
  if (change.chat.title !== undefined) {
    payload.chatTitle = change.chat.title;
  }

  const update: Update = {
    id,
    chatId: String(change.chat.id),
    chatType: chatTypeOf(change.chat.type),
    userId: String(change.from.id),
    isBot: change.from.is_bot,
    payload,
    receivedAt: change.date * 1000,
  };
  if (change.from.username !== undefined) {
    update.username = change.from.username;
  }
  return update;
}

function parseMessage(id: number, message: TelegramMessage, botUsername: string | undefined): Update {
  const text = message.text;
  if (text === undefined) {
    return fromMessage(id, message, { kind: 'ignored', reason: 'non_text_message' });
  }
  const command = text.startsWith('/') ? parseCommand(text, botUsername) : null;
  return fromMessage(id, message, command ?? { kind: 'text', text });
}

function parseEdit(id: number, message: TelegramMessage): Update {
  const text = message.text ?? message.caption;
  if (text === undefined) {
    return fromMessage(id, message, { kind: 'ignored', reason: 'non_text_edit' });
  }
  const editedAt = (message.edit_date ?? message.date) * 1000;
  const update = fromMessage(id, message, { kind: 'edit', messageId: message.message_id, text, editedAt });
  update.receivedAt = editedAt;
  return update;
}

/**
 * Normalizes one raw Bot API update. Returns null only when not even `update_id`
 * can be read; anything else the engine does not handle comes back as an
 * `ignored` update so the cursor can move past it. Bot-authored updates are
 * ignored, except membership changes a bot made.
 */
export function parseTelegramUpdate(raw: unknown, options: ParseOptions): Update | null {
  const idOnly = updateIdSchema.safeParse(raw);
  if (!idOnly.success) {
    return null;
  }
  const id = idOnly.data.update_id;

  const parsed = telegramUpdateSchema.safeParse(raw);
  if (!parsed.success) {
    return ignored(id, 'malformed', options.now);
  }
  const body = parsed.data;

  let update: Update;
  if (body.message) {
    update = parseMessage(id, body.message, options.botUsername);
  } else if (body.edited_message) {
    update = parseEdit(id, body.edited_message);
  } else if (body.callback_query) {
    update = fromCallback(id, body.callback_query, options.now);
  } else if (body.chat_member) {
    return fromMemberChange(id, body.chat_member);
  } else if (body.channel_post || body.edited_channel_post) {
    return ignored(id, 'channel_post', options.now);
  } else {
    return ignored(id, 'unsupported_update', options.now);
  }

  if (update.isBot && update.payload.kind !== 'ignored') {
    update.payload = { kind: 'ignored', reason: 'bot_author' };
  }
  return update;
}
