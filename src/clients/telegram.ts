/**
 * Telegram Bot API client.
 *
 * Uses the HTTP API directly through fetch. `TelegramTransport` is the
 * outbound notification transport: each message gets a bounded number of
 * attempts with a fixed pause between them.
 */

import type { NotificationTransport, SendResult } from '../alerts/dispatcher.js';
import { errorMessage } from '../alerts/errors.js';

const API_BASE = 'https://api.telegram.org';

export interface TelegramResponse<T> {
  ok: boolean;
  result?: T;
  description?: string;
}

/**
 * POST one Bot API method with a JSON body.
 */
export async function callTelegram<T>(
  token: string,
  method: string,
  body: Record<string, unknown>,
  timeoutMs = 10_000,
): Promise<TelegramResponse<T>> {
  const response = await fetch(`${API_BASE}/bot${token}/${method}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(timeoutMs),
  });
  return (await response.json()) as TelegramResponse<T>;
}

/**
 * Send a message via the Telegram Bot API (single attempt).
 */
export async function sendTelegramMessage(
  token: string,
  chatId: string | number,
  text: string,
): Promise<SendResult> {
  if (!token) {
    return { ok: false, error: 'TELEGRAM_BOT_TOKEN not configured' };
  }
  if (!chatId) {
    return { ok: false, error: 'TELEGRAM_CHAT_ID not configured' };
  }

  try {
    const result = await callTelegram<{ message_id: number }>(token, 'sendMessage', {
      chat_id: chatId,
      text,
    });

    if (!result.ok) {
      return { ok: false, error: result.description || 'Telegram API error' };
    }
    return { ok: true, messageId: result.result?.message_id };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export interface TelegramTransportOptions {
  token: string;
  chatId: string;
  attempts: number;
  retryDelayMs: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class TelegramTransport implements NotificationTransport {
  constructor(private readonly options: TelegramTransportOptions) {}

  isConfigured(): boolean {
    return Boolean(this.options.token && this.options.chatId);
  }

  async send(text: string): Promise<SendResult> {
    if (!this.isConfigured()) {
      console.warn('[Telegram] Not configured, message not sent');
      return { ok: false, error: 'Telegram not configured' };
    }

    const attempts = Number.isFinite(this.options.attempts) ? Math.max(1, Math.floor(this.options.attempts)) : 1;
    let last: SendResult = { ok: false, error: 'no attempt made' };

    for (let attempt = 1; attempt <= attempts; attempt++) {
      last = await sendTelegramMessage(this.options.token, this.options.chatId, text);
      if (last.ok) {
        return last;
      }
      console.warn(`[Telegram] Send attempt ${attempt}/${attempts} failed: ${last.error}`);
      if (attempt < attempts) {
        await sleep(this.options.retryDelayMs);
      }
    }
    return last;
  }
}
