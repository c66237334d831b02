/**
 * Telegram Bot API adapters
 */

import { describe, it, expect, vi } from 'vitest';

import {
  TelegramApiError,
  createTelegramClient,
  createTelegramMembershipLookup,
  createTelegramMessenger,
} from '@/lib/telegram.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('createTelegramClient', () => {
  it('posts the payload to the bot method', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValue(jsonResponse({ ok: true, result: { message_id: 1 } }));
    const client = createTelegramClient({ botToken: 'test-bot-token', fetchImpl });

    const result = await client.call('sendMessage', { chat_id: 5, text: 'hi' });

    expect(result).toEqual({ message_id: 1 });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://api.telegram.org/bottest-bot-token/sendMessage');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ chat_id: 5, text: 'hi' }));
  });

  it('throws the API description on failure', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValue(
        jsonResponse({ ok: false, error_code: 403, description: 'bot was blocked' }, 403)
      );
    const client = createTelegramClient({ botToken: 'test-bot-token', fetchImpl });

    const call = client.call('sendMessage', { chat_id: 5, text: 'hi' });

    await expect(call).rejects.toBeInstanceOf(TelegramApiError);
    await expect(call).rejects.toThrow('Telegram sendMessage failed: bot was blocked');
  });
});

describe('createTelegramMessenger', () => {
  it('sends without link previews', async () => {
    const call = vi.fn().mockResolvedValue({});
    const messenger = createTelegramMessenger({ call });

    await messenger.sendMessage(7, 'Hello');

    expect(call).toHaveBeenCalledWith(
      'sendMessage',
      { chat_id: 7, text: 'Hello', disable_web_page_preview: true },
      undefined
    );
  });
});

describe('createTelegramMembershipLookup', () => {
  it.each([
    [{ status: 'member' }, true],
    [{ status: 'creator' }, true],
    [{ status: 'restricted', is_member: true }, true],
    [{ status: 'restricted', is_member: false }, false],
    [{ status: 'left' }, false],
    [{ status: 'kicked' }, false],
    [{ status: 'something-new' }, null],
    [{ unexpected: true }, null],
  ])('maps %j to %s', async (member, expected) => {
    const lookup = createTelegramMembershipLookup({
      call: vi.fn().mockResolvedValue(member),
    });

    expect(await lookup.isMember('@news', 9)).toBe(expected);
  });

  it('passes the abort signal to the API call', async () => {
    const call = vi.fn().mockResolvedValue({ status: 'member' });
    const lookup = createTelegramMembershipLookup({ call });
    const controller = new AbortController();

    await lookup.isMember('@news', 9, { signal: controller.signal });

    expect(call).toHaveBeenCalledWith(
      'getChatMember',
      { chat_id: '@news', user_id: 9 },
      controller.signal
    );
  });
});
