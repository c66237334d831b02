/**
 * Background Workers Exports
 *
 * Both workers are idempotent: a pass can be repeated or interrupted
 * without duplicate side effects.
 */

export type {
  ExpirySweeper,
  SweepStats,
  StorageCleanupStats,
  SweeperDb,
  SweeperAudit,
} from './expiry-sweeper.js';
export { createExpirySweeper } from './expiry-sweeper.js';
export type {
  SubscriptionReminder,
  ReminderStats,
  ReminderUsers,
} from './subscription-reminder.js';
export {
  createSubscriptionReminder,
  formatReminder,
} from './subscription-reminder.js';
