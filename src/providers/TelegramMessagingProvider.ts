/**
 * Telegram Bot API messaging provider.
 * No SDK dependency. Calls sendMessage over native fetch with HTML parse mode.
 */

import type {
  IMessagingProvider,
  SendMessageOptions,
  SentMessage,
} from './IMessagingProvider.js';
import {
  DeliveryError,
  RateLimitedError,
  TransientFailureError,
  errorMessage,
} from '../errors.js';

const API_BASE = 'https://api.telegram.org';
const MAX_MESSAGE_LENGTH = 4096;

interface TelegramResponse {
  ok: boolean;
  result?: { message_id: number };
  error_code?: number;
  description?: string;
  parameters?: { retry_after?: number; migrate_to_chat_id?: number };
}

export class TelegramMessagingProvider implements IMessagingProvider {
  readonly maxMessageLength = MAX_MESSAGE_LENGTH;
  private readonly token: string;

  constructor(opts?: { token?: string }) {
    this.token = opts?.token ?? process.env.TELEGRAM_BOT_TOKEN ?? '';
  }

  async sendMessage(
    chatId: number,
    html: string,
    options?: SendMessageOptions
  ): Promise<SentMessage> {
    let res: Response;
    try {
      res = await fetch(`${API_BASE}/bot${this.token}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: chatId,
          text: html,
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        }),
        signal: options?.signal,
      });
    } catch (err) {
      if (options?.signal?.aborted) throw options.signal.reason;
      throw new TransientFailureError(`Telegram request failed: ${errorMessage(err)}`, {
        chatId,
      });
    }

    const body = (await res.json().catch(() => ({ ok: false }))) as TelegramResponse;

    if (res.ok && body.ok && body.result) {
      return { messageId: body.result.message_id };
    }

    const status = body.error_code ?? res.status;
    const detail = body.description ?? 'Unknown error';
    const message = `Telegram API error (${status}): ${detail}`;

    if (status === 429) {
      throw new RateLimitedError(message, body.parameters?.retry_after ?? null);
    }
    if (status >= 500) {
      throw new TransientFailureError(message, { chatId, status });
    }
    throw new DeliveryError(message, {
      chatId,
      status,
      ...(body.parameters?.migrate_to_chat_id !== undefined && {
        migrateToChatId: body.parameters.migrate_to_chat_id,
      }),
    });
  }
}
