/**
 * Subscription Reminder
 *
 * Hourly by default. Paid subscriptions ending within
 * SUBSCRIPTION_REMINDER_DAYS get one message per expiry date; moving
 * the expiry makes the user eligible again. Failed sends are retried
 * on the next run.
 */

import cron, { type ScheduledTask } from 'node-cron';

import type { ChatMessenger } from '../lib/telegram.js';
import type { SettingKey, SettingValues, User } from '../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ReminderUsers {
  listExpiringSubscriptions: (from: Date, to: Date) => AsyncIterable<User>;
  markReminderSent: (userId: number, expiresAt: Date) => Promise<void>;
}

export interface ReminderSettings {
  get<K extends SettingKey>(key: K): Promise<SettingValues[K]>;
}

export interface ReminderStats {
  candidates: number;
  sent: number;
  failed: number;
}

export interface SubscriptionReminder {
  runOnce(): Promise<ReminderStats>;
  start(): void;
  stop(): void;
}

export function formatReminder(user: User, expiresAt: Date, now: Date): string {
  const days = Math.max(1, Math.ceil((expiresAt.getTime() - now.getTime()) / DAY_MS));
  const plan = user.tier === 'premium' ? 'Premium' : 'Basic';
  const unit = days === 1 ? 'day' : 'days';
  const date = expiresAt.toISOString().slice(0, 10);
  return (
    `Your ${plan} subscription ends in ${days} ${unit} (${date}). ` +
    'Renew to keep uploading and sharing files.'
  );
}

export function createSubscriptionReminder(deps: {
  users: ReminderUsers;
  messenger: ChatMessenger;
  settings: ReminderSettings;
  schedule?: string;
  sendTimeoutMs?: number;
  now?: () => Date;
}): SubscriptionReminder {
  const { users, messenger, settings } = deps;
  const schedule = deps.schedule ?? '0 * * * *';
  const sendTimeoutMs = deps.sendTimeoutMs ?? 10_000;
  const now = deps.now ?? (() => new Date());
  let task: ScheduledTask | null = null;

  async function runOnce(): Promise<ReminderStats> {
    const current = now();
    const days = await settings.get('SUBSCRIPTION_REMINDER_DAYS');
    const stats: ReminderStats = { candidates: 0, sent: 0, failed: 0 };
    if (days === 0) {
      return stats;
    }

    const horizon = new Date(current.getTime() + days * DAY_MS);
    for await (const user of users.listExpiringSubscriptions(current, horizon)) {
      const expiresAt = user.subscriptionExpiresAt;
      if (expiresAt === null) {
        continue;
      }
      stats.candidates++;

      try {
        await messenger.sendMessage(user.id, formatReminder(user, expiresAt, current), {
          signal: AbortSignal.timeout(sendTimeoutMs),
        });
        await users.markReminderSent(user.id, expiresAt);
        stats.sent++;
      } catch (err) {
        stats.failed++;
        console.error(`[reminder] could not remind user ${user.id}:`, err);
      }
    }

    if (stats.candidates > 0) {
      console.log(`[reminder] sent ${stats.sent}, failed ${stats.failed}`);
    }
    return stats;
  }

  return {
    runOnce,

    start(): void {
      if (task !== null) {
        return;
      }
      if (!cron.validate(schedule)) {
        throw new Error(`Invalid reminder schedule: ${schedule}`);
      }
      task = cron.schedule(schedule, () => {
        runOnce().catch((err: unknown) => {
          console.error('[reminder] run failed:', err);
        });
      });
      console.log(`[reminder] scheduled: ${schedule}`);
    },

    stop(): void {
      task?.stop();
      task = null;
    },
  };
}
