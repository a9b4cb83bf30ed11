import type { MemberStatus, Update } from './Update.js';

export interface BotIdentity {
  id: number;
  username?: string;
}

export interface SentMessage {
  messageId: number;
}

export interface GetUpdatesRequest {
  offset: number;
  timeoutSeconds: number;
  limit: number;
}

export interface ChatAdministrator {
  userId: string;
  isBot: boolean;
}

export interface SendOptions {
  replyToMessageId?: number;
}

/**
 * Messaging platform API. Implementations classify their failures:
 * `AuthError` for rejected credentials, `TransientSourceError` for network/5xx/429
 * while polling, `DeliveryFailure` for sends.
 */
export interface BotApiPort {
  getMe(): Promise<BotIdentity>;
  getUpdates(request: GetUpdatesRequest): Promise<Update[]>;
  sendMessage(chatId: string, text: string, options?: SendOptions): Promise<SentMessage>;
  getChatMember(chatId: string, userId: string): Promise<MemberStatus>;
  getChatAdministrators(chatId: string): Promise<ChatAdministrator[]>;
  setWebhook(url: string, secretToken: string): Promise<void>;
  deleteWebhook(): Promise<void>;
}
