import type { Update } from '../../ports/Update.js';

export type ConversationScope = 'chat' | 'chat_user';

/**
 * `chat` keys a conversation by chat alone. `chat_user` gives each member of a
 * group their own conversation; private chats are keyed by chat either way.
 */
export function conversationKeyFor(update: Update, scope: ConversationScope): string {
  if (scope === 'chat_user' && update.chatType !== 'private' && update.userId !== '') {
    return `${update.chatId}:${update.userId}`;
  }
  return update.chatId;
}

/** Work for one chat is serialized under this key. */
export function partitionKeyFor(update: Update): string {
  return update.chatId !== '' ? update.chatId : `update:${update.id}`;
}
