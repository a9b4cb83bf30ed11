import TelegramBot from 'node-telegram-bot-api';
import type {
  BotApiPort,
  BotIdentity,
  ChatAdministrator,
  GetUpdatesRequest,
  SendOptions,
  SentMessage,
} from '../../ports/BotApiPort.js';
import type { MemberStatus, Update } from '../../ports/Update.js';
import { createLogger } from '../../utils/logger.js';
import { systemClock, type Clock } from '../../utils/clock.js';
import { classifyTelegramError } from './errorClassifier.js';
import { memberStatusOf, parseTelegramUpdate } from './updateParser.js';

const ALLOWED_UPDATES = ['message', 'edited_message', 'callback_query', 'chat_member'];

export class TelegramAdapter implements BotApiPort {
  private readonly logger = createLogger({ adapter: 'TelegramAdapter' });
  private readonly bot: TelegramBot;
  private botUsername: string | undefined;

  constructor(
    token: string,
    private readonly clock: Clock = systemClock
  ) {
    // Updates are fetched explicitly through getUpdates, never by the library's own poller
    this.bot = new TelegramBot(token, { polling: false });
  }

  async getMe(): Promise<BotIdentity> {
    try {
      const me = await this.bot.getMe();
      this.botUsername = me.username;
      this.logger.info({ botId: me.id, botUsername: me.username }, 'Telegram bot verified');
      return me.username !== undefined ? { id: me.id, username: me.username } : { id: me.id };
    } catch (error) {
      throw classifyTelegramError(error, 'call');
    }
  }

  async getUpdates(request: GetUpdatesRequest): Promise<Update[]> {
    let raw: TelegramBot.Update[];
    try {
      raw = await this.bot.getUpdates({
        offset: request.offset,
        timeout: request.timeoutSeconds,
        limit: request.limit,
        allowed_updates: ALLOWED_UPDATES,
      });
    } catch (error) {
      throw classifyTelegramError(error, 'poll');
    }

    const updates: Update[] = [];
    for (const item of raw) {
      const update = this.parse(item);
      if (update) {
        updates.push(update);
      }
    }
    return updates;
  }

  /** Normalizes a raw update body, such as a webhook request. */
  parse(raw: unknown): Update | null {
    const options = this.botUsername !== undefined ? { botUsername: this.botUsername, now: this.clock.now() } : { now: this.clock.now() };
    const update = parseTelegramUpdate(raw, options);
    if (!update) {
      this.logger.warn('Dropping update without a readable update_id');
    }
    return update;
  }

  async sendMessage(chatId: string, text: string, options?: SendOptions): Promise<SentMessage> {
    const logger = this.logger.child({ method: 'sendMessage', chatId });
    logger.debug({ textLength: text.length }, 'Sending message');

    const sendOptions: TelegramBot.SendMessageOptions = {};
    if (options?.replyToMessageId !== undefined) {
      sendOptions.reply_to_message_id = options.replyToMessageId;
    }
    try {
      const sent = await this.bot.sendMessage(chatId, text, sendOptions);
      return { messageId: sent.message_id };
    } catch (error) {
      throw classifyTelegramError(error, 'send');
    }
  }

  async getChatMember(chatId: string, userId: string): Promise<MemberStatus> {
    try {
      const member = await this.bot.getChatMember(chatId, userId);
      return memberStatusOf(member.status);
    } catch (error) {
      throw classifyTelegramError(error, 'call');
    }
  }

  async getChatAdministrators(chatId: string): Promise<ChatAdministrator[]> {
    try {
      const admins = await this.bot.getChatAdministrators(chatId);
      return admins.map((admin) => ({ userId: String(admin.user.id), isBot: admin.user.is_bot }));
    } catch (error) {
      throw classifyTelegramError(error, 'call');
    }
  }

  async setWebhook(url: string, secretToken: string): Promise<void> {
    // One connection at a time keeps webhook deliveries in update_id order.
    // secret_token is newer than the bundled option typings.
    const options: TelegramBot.SetWebHookOptions & { secret_token: string; allowed_updates: string[] } = {
      secret_token: secretToken,
      allowed_updates: ALLOWED_UPDATES,
      max_connections: 1,
    };
    try {
      await this.bot.setWebHook(url, options);
      this.logger.info({ webhookUrl: url }, 'Webhook set successfully');
    } catch (error) {
      throw classifyTelegramError(error, 'call');
    }
  }

  async deleteWebhook(): Promise<void> {
    try {
      await this.bot.deleteWebHook();
      this.logger.info('Webhook removed; updates will be polled');
    } catch (error) {
      throw classifyTelegramError(error, 'call');
    }
  }
}
