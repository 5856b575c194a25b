import { z } from 'zod';

export const TelegramUserSchema = z.object({
  id: z.number().int(),
  first_name: z.string().default(''),
  username: z.string().optional(),
});

export const TelegramChatSchema = z.object({
  id: z.number().int(),
  type: z.string().optional(),
  title: z.string().optional(),
});

export const TelegramMessageSchema = z.object({
  message_id: z.number().int(),
  from: TelegramUserSchema.optional(),
  chat: TelegramChatSchema,
  text: z.string().optional(),
});

export const TelegramCallbackQuerySchema = z.object({
  id: z.string(),
  from: TelegramUserSchema,
  message: TelegramMessageSchema.optional(),
  data: z.string().optional(),
});

export const TelegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: TelegramMessageSchema.optional(),
  callback_query: TelegramCallbackQuerySchema.optional(),
});

export type TelegramUser = z.infer<typeof TelegramUserSchema>;
export type TelegramChat = z.infer<typeof TelegramChatSchema>;
export type TelegramMessage = z.infer<typeof TelegramMessageSchema>;
export type CallbackQuery = z.infer<typeof TelegramCallbackQuerySchema>;
export type Update = z.infer<typeof TelegramUpdateSchema>;

export interface InlineButton {
  text: string;
  callback_data: string;
}

export interface InlineKeyboard {
  inline_keyboard: InlineButton[][];
}

/** Back-reference to a message the transport delivered. */
export interface SentMessage {
  chat_id: number;
  message_id: number;
}

export const CALLBACK_APPROVE = 'approve';
export const CALLBACK_REJECT = 'reject';

export function approvalKeyboard(
  approveData: string = CALLBACK_APPROVE,
  rejectData: string = CALLBACK_REJECT,
): InlineKeyboard {
  return {
    inline_keyboard: [
      [
        { text: '✅ Upload', callback_data: approveData },
        { text: '❌ Reject', callback_data: rejectData },
      ],
    ],
  };
}

/**
 * Chat capabilities the approval service consumes. Text and captions use the
 * transport's Markdown subset.
 */
export interface ChatTransport {
  sendMessage(chatId: number, text: string): Promise<void>;
  sendVideo(
    chatId: number,
    videoPath: string,
    caption: string,
    keyboard?: InlineKeyboard,
  ): Promise<SentMessage>;
  /** Replace the inline buttons of a message; omit `keyboard` to clear them. */
  editMessageReplyMarkup(chatId: number, messageId: number, keyboard?: InlineKeyboard): Promise<void>;
  editMessageCaption(chatId: number, messageId: number, caption: string): Promise<void>;
  answerCallbackQuery(callbackId: string, text: string): Promise<void>;
  /** Long-poll for updates with update_id >= offset. May resolve empty. */
  getUpdates(offset: number, signal?: AbortSignal): Promise<Update[]>;
}
