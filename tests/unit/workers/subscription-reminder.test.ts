/**
 * Subscription Reminder Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import type { SubscriptionReminder } from '@/workers/index.js';
import { createSubscriptionReminder, formatReminder } from '@/workers/index.js';

import type { TestServices } from '../../helpers/e2e-utils.js';
import { createTestServices } from '../../helpers/e2e-utils.js';
import { DAY_MS, createTestUser } from '../../helpers/test-utils.js';

describe('SubscriptionReminder', () => {
  let services: TestServices;
  let reminder: SubscriptionReminder;

  function seedPaid(id: number, expiresInMs: number): void {
    services.db.users.seed(
      createTestUser({
        id,
        tier: 'basic',
        subscriptionExpiresAt: new Date(services.clock.nowMs() + expiresInMs),
      })
    );
  }

  beforeEach(() => {
    services = createTestServices();
    reminder = createSubscriptionReminder({
      users: services.userService,
      messenger: services.messenger,
      settings: services.settingsService,
      now: services.clock.now,
    });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  describe('formatReminder', () => {
    it('names the plan, the days left and the date', () => {
      const now = new Date('2025-01-01T00:00:00.000Z');

      expect(
        formatReminder(
          createTestUser({ tier: 'premium' }),
          new Date('2025-01-03T12:00:00.000Z'),
          now
        )
      ).toBe(
        'Your Premium subscription ends in 3 days (2025-01-03). ' +
          'Renew to keep uploading and sharing files.'
      );
      expect(
        formatReminder(
          createTestUser({ tier: 'basic' }),
          new Date('2025-01-01T03:00:00.000Z'),
          now
        )
      ).toBe(
        'Your Basic subscription ends in 1 day (2025-01-01). ' +
          'Renew to keep uploading and sharing files.'
      );
    });
  });

  it('reminds each expiry date once', async () => {
    seedPaid(1, 2 * DAY_MS);
    seedPaid(2, 10 * DAY_MS);
    services.db.users.seed(createTestUser({ id: 3 }));

    const first = await reminder.runOnce();
    const second = await reminder.runOnce();

    expect(first).toEqual({ candidates: 1, sent: 1, failed: 0 });
    expect(second).toEqual({ candidates: 0, sent: 0, failed: 0 });
    expect(services.messenger.sendMessage).toHaveBeenCalledTimes(1);
    expect(services.messenger.sendMessage).toHaveBeenCalledWith(
      1,
      'Your Basic subscription ends in 2 days (2025-01-03). ' +
        'Renew to keep uploading and sharing files.',
      expect.objectContaining({ signal: expect.any(AbortSignal) })
    );
  });

  it('pages past the first batch in a single run', async () => {
    for (let id = 1; id <= 501; id++) {
      seedPaid(id, DAY_MS);
    }

    const first = await reminder.runOnce();
    const second = await reminder.runOnce();

    expect(first).toEqual({ candidates: 501, sent: 501, failed: 0 });
    expect(second).toEqual({ candidates: 0, sent: 0, failed: 0 });
    expect(services.db.users.rows.get(501)?.reminderSentFor).toEqual(
      new Date(services.clock.nowMs() + DAY_MS)
    );
  });

  it('reaches later users when earlier sends keep failing', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    for (let id = 1; id <= 501; id++) {
      seedPaid(id, DAY_MS);
    }
    services.messenger.sendMessage.mockImplementation(async (userId: number) => {
      if (userId <= 500) throw new Error('chat not found');
    });

    const stats = await reminder.runOnce();

    expect(stats).toEqual({ candidates: 501, sent: 1, failed: 500 });
    expect(services.db.users.rows.get(501)?.reminderSentFor).not.toBeNull();
  });

  it('reminds again when the expiry moves', async () => {
    seedPaid(1, 2 * DAY_MS);
    await reminder.runOnce();
    const user = services.db.users.rows.get(1);
    if (user === undefined) throw new Error('user missing');
    services.db.users.seed({
      ...user,
      subscriptionExpiresAt: new Date(services.clock.nowMs() + DAY_MS),
    });

    const stats = await reminder.runOnce();

    expect(stats.sent).toBe(1);
  });

  it('retries a failed send on the next run', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    seedPaid(1, 2 * DAY_MS);
    services.messenger.sendMessage.mockRejectedValueOnce(new Error('network down'));

    const failed = await reminder.runOnce();
    const retried = await reminder.runOnce();

    expect(failed).toEqual({ candidates: 1, sent: 0, failed: 1 });
    expect(retried).toEqual({ candidates: 1, sent: 1, failed: 0 });
  });

  it('does nothing when reminders are turned off', async () => {
    services = createTestServices({ settings: { SUBSCRIPTION_REMINDER_DAYS: 0 } });
    reminder = createSubscriptionReminder({
      users: services.userService,
      messenger: services.messenger,
      settings: services.settingsService,
      now: services.clock.now,
    });
    seedPaid(1, DAY_MS);

    expect(await reminder.runOnce()).toEqual({ candidates: 0, sent: 0, failed: 0 });
    expect(services.messenger.sendMessage).not.toHaveBeenCalled();
  });
});
