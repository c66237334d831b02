/**
 * Telegram Bot API client
 *
 * Only the two calls the core needs: sending a message and looking up
 * channel membership. Both adapters below are what the services see.
 */

import { z } from 'zod';

const API_BASE = 'https://api.telegram.org';

/**
 * Outbound chat messages
 */
export interface ChatMessenger {
  sendMessage: (
    chatId: number,
    text: string,
    options?: { signal?: AbortSignal }
  ) => Promise<void>;
}

const apiResponse = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

const chatMember = z.object({
  status: z.string(),
  is_member: z.boolean().optional(),
});

export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    readonly errorCode: number | null,
    description: string
  ) {
    super(`Telegram ${method} failed: ${description}`);
    this.name = 'TelegramApiError';
  }
}

export interface TelegramClient {
  call(
    method: string,
    payload: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<unknown>;
}

export function createTelegramClient(config: {
  botToken: string;
  fetchImpl?: typeof fetch;
}): TelegramClient {
  const fetchImpl = config.fetchImpl ?? fetch;

  return {
    async call(
      method: string,
      payload: Record<string, unknown>,
      signal?: AbortSignal
    ): Promise<unknown> {
      const response = await fetchImpl(`${API_BASE}/bot${config.botToken}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        ...(signal !== undefined && { signal }),
      });

      const parsed = apiResponse.safeParse(await response.json());
      if (!parsed.success) {
        throw new TelegramApiError(method, response.status, 'malformed response');
      }
      if (!parsed.data.ok) {
        throw new TelegramApiError(
          method,
          parsed.data.error_code ?? response.status,
          parsed.data.description ?? 'unknown error'
        );
      }
      return parsed.data.result;
    },
  };
}

export function createTelegramMessenger(client: TelegramClient): ChatMessenger {
  return {
    async sendMessage(
      chatId: number,
      text: string,
      options?: { signal?: AbortSignal }
    ): Promise<void> {
      await client.call(
        'sendMessage',
        { chat_id: chatId, text, disable_web_page_preview: true },
        options?.signal
      );
    },
  };
}

/**
 * Membership of a user in a channel.
 * creator, administrator and member pass; restricted passes while still
 * a member; anything unrecognised is reported as unknown (null).
 */
export function createTelegramMembershipLookup(client: TelegramClient): {
  isMember: (
    channel: string,
    userId: number,
    options?: { signal?: AbortSignal }
  ) => Promise<boolean | null>;
} {
  return {
    async isMember(
      channel: string,
      userId: number,
      options?: { signal?: AbortSignal }
    ): Promise<boolean | null> {
      const result = chatMember.safeParse(
        await client.call(
          'getChatMember',
          { chat_id: channel, user_id: userId },
          options?.signal
        )
      );
      if (!result.success) {
        return null;
      }

      switch (result.data.status) {
        case 'creator':
        case 'administrator':
        case 'member':
          return true;
        case 'restricted':
          return result.data.is_member === true;
        case 'left':
        case 'kicked':
          return false;
        default:
          return null;
      }
    },
  };
}
