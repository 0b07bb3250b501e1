/**
 * Tests for replies through the Telegram Bot API
 */

jest.mock('../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
  maskIdentifier: (value: string) => value,
}));

import { TelegramChannel, telegramUpdateSchema, type FetchLike } from '../channels/telegram.channel';

function answering(status: number, body: Record<string, unknown>) {
  const calls: Array<{ url: string; init: RequestInit }> = [];
  const fetchFn: FetchLike = async (url, init) => {
    calls.push({ url, init });
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
  };
  return { calls, fetchFn };
}

describe('TelegramChannel', () => {
  it('posts the reply to sendMessage for the chat', async () => {
    const { calls, fetchFn } = answering(200, { ok: true, result: {} });

    await new TelegramChannel('test-token', fetchFn).deliver('42', 'See you at 10:00');

    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(calls[0].init.method).toBe('POST');
    expect(calls[0].init.body).toBe(JSON.stringify({ chat_id: '42', text: 'See you at 10:00' }));
  });

  it('throws with the API description on a rejected call', async () => {
    const { fetchFn } = answering(400, { ok: false, description: 'Bad Request: chat not found' });

    await expect(new TelegramChannel('test-token', fetchFn).deliver('42', 'Hi')).rejects.toThrow(
      'Telegram API error: 400 - Bad Request: chat not found'
    );
  });

  it('refuses to send without a bot token', async () => {
    const { calls, fetchFn } = answering(200, { ok: true });

    await expect(new TelegramChannel('', fetchFn).deliver('42', 'Hi')).rejects.toThrow(
      'Telegram bot token is not configured'
    );
    expect(calls).toHaveLength(0);
  });
});

describe('telegramUpdateSchema', () => {
  it('reads the chat and text of a message update', () => {
    const update = telegramUpdateSchema.parse({
      update_id: 10,
      message: { message_id: 5, chat: { id: 42, type: 'private' }, from: { first_name: 'Ann' }, text: 'Hi' },
    });
    expect(update.message?.chat.id).toBe(42);
    expect(update.message?.text).toBe('Hi');
  });

  it('accepts updates that carry no message', () => {
    expect(telegramUpdateSchema.safeParse({ update_id: 11, edited_message: {} }).success).toBe(true);
  });
});
