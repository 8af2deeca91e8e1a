import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TelegramTransport, sendTelegramMessage } from '../clients/telegram.js';

function telegramReply(body: unknown): Response {
  return new Response(JSON.stringify(body), { headers: { 'Content-Type': 'application/json' } });
}

describe('sendTelegramMessage', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the text to sendMessage for the chat', async () => {
    fetchMock.mockResolvedValueOnce(telegramReply({ ok: true, result: { message_id: 42 } }));

    const result = await sendTelegramMessage('test-token', '12345', 'hello');

    expect(result).toEqual({ ok: true, messageId: 42 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({ chat_id: '12345', text: 'hello' });
  });

  it('returns the API description on a rejected request', async () => {
    fetchMock.mockResolvedValueOnce(telegramReply({ ok: false, description: 'Bad Request: chat not found' }));

    const result = await sendTelegramMessage('test-token', '12345', 'hello');

    expect(result).toEqual({ ok: false, error: 'Bad Request: chat not found' });
  });

  it('does not call the API without a token', async () => {
    const result = await sendTelegramMessage('', '12345', 'hello');

    expect(result).toEqual({ ok: false, error: 'TELEGRAM_BOT_TOKEN not configured' });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('TelegramTransport', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const options = { token: 'test-token', chatId: '12345', attempts: 3, retryDelayMs: 0 };

  it('retries until an attempt succeeds', async () => {
    fetchMock
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce(telegramReply({ ok: false, description: 'Too Many Requests' }))
      .mockResolvedValueOnce(telegramReply({ ok: true, result: { message_id: 9 } }));

    const result = await new TelegramTransport(options).send('⚠️ CPU usage: 95% (threshold 90%)');

    expect(result).toEqual({ ok: true, messageId: 9 });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('gives up after the configured attempts with the last error', async () => {
    fetchMock.mockImplementation(async () => telegramReply({ ok: false, description: 'Bad Gateway' }));

    const result = await new TelegramTransport({ ...options, attempts: 2 }).send('hello');

    expect(result).toEqual({ ok: false, error: 'Bad Gateway' });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('makes one attempt when the attempt count is not a number', async () => {
    fetchMock.mockResolvedValueOnce(telegramReply({ ok: true, result: { message_id: 3 } }));

    const result = await new TelegramTransport({ ...options, attempts: parseInt('x', 10) }).send('hello');

    expect(result).toEqual({ ok: true, messageId: 3 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports itself unconfigured without a chat id', async () => {
    const transport = new TelegramTransport({ ...options, chatId: '' });

    expect(transport.isConfigured()).toBe(false);
    expect(await transport.send('hello')).toEqual({ ok: false, error: 'Telegram not configured' });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
