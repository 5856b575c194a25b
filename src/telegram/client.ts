/**
 * Telegram Bot API client.
 * Long-poll ingress (getUpdates) plus the handful of egress calls the
 * approval flow needs. Every request is bounded by a 35s timeout; getUpdates
 * asks the server to hold the connection for up to 30s.
 */
import { openAsBlob } from 'node:fs';
import { basename } from 'node:path';
import { z } from 'zod';
import { withTimeout } from '../shared/async.js';
import { CancelledError, TransportError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import {
  TelegramMessageSchema,
  TelegramUpdateSchema,
  type ChatTransport,
  type InlineKeyboard,
  type SentMessage,
  type Update,
} from './types.js';

const TELEGRAM_API = 'https://api.telegram.org';
export const DEFAULT_TIMEOUT_MS = 35_000;
export const LONG_POLL_SECONDS = 30;

const ApiEnvelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
});

const UpdateIdSchema = z.object({ update_id: z.number().int() });

export interface TelegramClientOptions {
  token: string;
  /** Override for tests or a local Bot API server. */
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: (url: string | URL, init?: RequestInit) => Promise<Response>;
}

export class TelegramClient implements ChatTransport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly http: (url: string | URL, init?: RequestInit) => Promise<Response>;

  constructor(opts: TelegramClientOptions) {
    if (!opts.token) throw new Error('Telegram bot token is required');
    this.baseUrl = `${opts.baseUrl ?? TELEGRAM_API}/bot${opts.token}`;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.http = opts.fetch ?? fetch;
  }

  async sendMessage(chatId: number, text: string): Promise<void> {
    await this.postJson('sendMessage', { chat_id: chatId, text, parse_mode: 'Markdown' });
  }

  async sendVideo(
    chatId: number,
    videoPath: string,
    caption: string,
    keyboard?: InlineKeyboard,
  ): Promise<SentMessage> {
    let video: Blob;
    try {
      video = await openAsBlob(videoPath);
    } catch (err) {
      throw new TransportError('sendVideo', `open video: ${errorMessage(err)}`);
    }

    const form = new FormData();
    form.append('chat_id', String(chatId));
    if (caption) {
      form.append('caption', caption);
      form.append('parse_mode', 'Markdown');
    }
    if (keyboard) {
      form.append('reply_markup', JSON.stringify(keyboard));
    }
    form.append('video', video, basename(videoPath));

    const result = await this.request('sendVideo', { method: 'POST', body: form });
    const message = TelegramMessageSchema.safeParse(result);
    if (!message.success) {
      throw new TransportError('sendVideo', 'unexpected response shape');
    }
    return { chat_id: message.data.chat.id, message_id: message.data.message_id };
  }

  async editMessageReplyMarkup(
    chatId: number,
    messageId: number,
    keyboard?: InlineKeyboard,
  ): Promise<void> {
    await this.postJson('editMessageReplyMarkup', {
      chat_id: chatId,
      message_id: messageId,
      reply_markup: keyboard ?? { inline_keyboard: [] },
    });
  }

  async editMessageCaption(chatId: number, messageId: number, caption: string): Promise<void> {
    await this.postJson('editMessageCaption', {
      chat_id: chatId,
      message_id: messageId,
      caption,
      parse_mode: 'Markdown',
    });
  }

  async answerCallbackQuery(callbackId: string, text: string): Promise<void> {
    await this.postJson('answerCallbackQuery', { callback_query_id: callbackId, text });
  }

  async getUpdates(offset: number, signal?: AbortSignal): Promise<Update[]> {
    const query = `offset=${offset}&timeout=${LONG_POLL_SECONDS}`;
    const result = await this.request(`getUpdates?${query}`, { method: 'GET' }, signal);
    if (!Array.isArray(result)) {
      throw new TransportError('getUpdates', 'result is not an array');
    }

    const updates: Update[] = [];
    for (const raw of result) {
      const parsed = TelegramUpdateSchema.safeParse(raw);
      if (parsed.success) {
        updates.push(parsed.data);
        continue;
      }
      // Keep the id so the offset still advances past updates we cannot read.
      const idOnly = UpdateIdSchema.safeParse(raw);
      if (idOnly.success) {
        logger.debug('Skipping unsupported update', { update_id: idOnly.data.update_id });
        updates.push({ update_id: idOnly.data.update_id });
      }
    }
    return updates;
  }

  /**
   * Find the first chat that has messaged the bot. Used once during setup to
   * discover the admin chat id.
   */
  async getChatId(): Promise<{ chatId: number; name: string }> {
    const updates = await this.getUpdates(0);
    for (const update of updates) {
      const message = update.message;
      if (!message) continue;
      let name = message.chat.title ?? '';
      if (!name && message.from) {
        name = message.from.first_name;
        if (message.from.username) name += ` (@${message.from.username})`;
      }
      return { chatId: message.chat.id, name };
    }
    throw new Error('No messages found - send a message to your bot first');
  }

  private async postJson(method: string, payload: Record<string, unknown>): Promise<unknown> {
    return this.request(method, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
  }

  private async request(path: string, init: RequestInit, signal?: AbortSignal): Promise<unknown> {
    const method = path.split('?')[0] ?? path;
    let resp: Response;
    try {
      resp = await this.http(`${this.baseUrl}/${path}`, {
        ...init,
        signal: withTimeout(this.timeoutMs, signal),
      });
    } catch (err) {
      if (signal?.aborted) throw new CancelledError();
      throw new TransportError(method, errorMessage(err));
    }

    const text = await resp.text();
    let body: unknown = null;
    try {
      body = JSON.parse(text);
    } catch {
      body = null;
    }

    const envelope = ApiEnvelopeSchema.safeParse(body);
    if (!resp.ok || !envelope.success || !envelope.data.ok) {
      const description = envelope.success ? envelope.data.description : undefined;
      throw new TransportError(
        method,
        description ?? `${resp.status} ${text.slice(0, 200)}`.trim(),
        resp.status,
      );
    }
    return envelope.data.result;
  }
}
