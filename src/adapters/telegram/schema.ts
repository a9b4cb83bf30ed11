import { z } from 'zod';

/** The subset of the Bot API update payload the engine reads. Unknown fields are dropped. */
export const telegramUserSchema = z.object({
  id: z.number().int(),
  is_bot: z.boolean().default(false),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  username: z.string().optional(),
});

export const telegramChatSchema = z.object({
  id: z.number().int(),
  type: z.string(),
  title: z.string().optional(),
});

const repliedMessageSchema = z.object({
  message_id: z.number().int(),
  from: telegramUserSchema.optional(),
});

export const telegramMessageSchema = z.object({
  message_id: z.number().int(),
  from: telegramUserSchema.optional(),
  chat: telegramChatSchema,
  date: z.number().int(),
  edit_date: z.number().int().optional(),
  text: z.string().optional(),
  caption: z.string().optional(),
  reply_to_message: repliedMessageSchema.optional(),
});

export const telegramCallbackQuerySchema = z.object({
  id: z.string(),
  from: telegramUserSchema,
  message: telegramMessageSchema.optional(),
  data: z.string().optional(),
});

const chatMemberSchema = z.object({
  status: z.string(),
  user: telegramUserSchema,
});

export const telegramChatMemberUpdatedSchema = z.object({
  chat: telegramChatSchema,
  from: telegramUserSchema,
  date: z.number().int(),
  old_chat_member: chatMemberSchema,
  new_chat_member: chatMemberSchema,
});

export const telegramUpdateSchema = z.object({
  update_id: z.number().int().nonnegative(),
  message: telegramMessageSchema.optional(),
  edited_message: telegramMessageSchema.optional(),
  channel_post: telegramMessageSchema.optional(),
  edited_channel_post: telegramMessageSchema.optional(),
  callback_query: telegramCallbackQuerySchema.optional(),
  chat_member: telegramChatMemberUpdatedSchema.optional(),
});

export type TelegramUser = z.infer<typeof telegramUserSchema>;
export type TelegramMessage = z.infer<typeof telegramMessageSchema>;
export type TelegramCallbackQuery = z.infer<typeof telegramCallbackQuerySchema>;
export type TelegramChatMemberUpdated = z.infer<typeof telegramChatMemberUpdatedSchema>;
export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;

/** Only the id, for payloads too broken to parse in full. */
export const updateIdSchema = z.object({ update_id: z.number().int().nonnegative() });
