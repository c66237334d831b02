/**
 * Application Entry Point
 *
 * Wires together all services, starts the background workers and the
 * Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import { socketAddress } from './api/utils/client-address.js';
import {
  checkUrlSafety,
  createHttpUrlFetcher,
  createPauseSwitch,
  createSupabaseAdmin,
  createTelegramClient,
  createTelegramMembershipLookup,
  createTelegramMessenger,
  getRedis,
  loadConfig,
} from './lib/index.js';
import {
  createAdminService,
  createAuditService,
  createAuditServiceDb,
  createFileService,
  createFileServiceDb,
  createInMemoryRateLimitStore,
  createLinkService,
  createLocalFileStorage,
  createRateLimitService,
  createRedisRateLimitStore,
  createRegistrationService,
  createSettingsService,
  createSettingsServiceDb,
  createSubscriptionService,
  createUserService,
  createUserServiceDb,
} from './services/index.js';
import {
  createExpirySweeper,
  createSubscriptionReminder,
} from './workers/index.js';

const config = loadConfig();

// Create Supabase client
const supabase = createSupabaseAdmin(config.supabase);

// Wire all database adapters
const auditDb = createAuditServiceDb(supabase);
const settingsDb = createSettingsServiceDb(supabase);
const userDb = createUserServiceDb(supabase);
const fileDb = createFileServiceDb(supabase);

// Chat transport
const telegram = createTelegramClient({ botToken: config.botToken });
const messenger = createTelegramMessenger(telegram);

// Wire all services
const auditService = createAuditService({ db: auditDb });

const settingsService = createSettingsService({
  db: settingsDb,
  auditService,
  defaults: config.settingDefaults,
});

const userService = createUserService({
  db: userDb,
  auditService,
});

const subscriptionService = createSubscriptionService({
  users: userService,
  settings: settingsService,
  auditService,
  membership: createTelegramMembershipLookup(telegram),
  membershipTimeoutMs: config.membershipTimeoutMs,
});

const rateLimitService = createRateLimitService({
  store:
    config.redis !== null
      ? createRedisRateLimitStore(getRedis(config.redis))
      : createInMemoryRateLimitStore(),
  rules: config.rateLimits,
});

const fileService = createFileService({
  db: fileDb,
  auditService,
  users: userService,
  plans: subscriptionService,
  settings: settingsService,
});

const linkService = createLinkService({
  db: fileDb,
  auditService,
  settings: settingsService,
  users: userService,
});

const storage = createLocalFileStorage({ rootDir: config.uploadDir });

const registrationService = createRegistrationService({
  users: userService,
  gate: subscriptionService,
  rateLimiter: rateLimitService,
  files: fileService,
  links: linkService,
  storage,
  fetcher: createHttpUrlFetcher({ isSafe: checkUrlSafety }),
  settings: settingsService,
  transferTimeoutMs: config.transferTimeoutMs,
});

const pause = createPauseSwitch();

const adminService = createAdminService({
  users: userService,
  files: fileService,
  links: linkService,
  settings: settingsService,
  rateLimiter: rateLimitService,
  messenger,
  pause,
  auditService,
  broadcastConcurrency: config.broadcastConcurrency,
  sendTimeoutMs: config.sendTimeoutMs,
});

// Background workers
const sweeper = createExpirySweeper({
  db: fileDb,
  storage,
  auditService,
  schedule: config.sweepCron,
  storageSchedule: config.storageCleanupCron,
  batchSize: config.sweepBatchSize,
  orphanGraceMs: config.orphanGraceMs,
});

const reminder = createSubscriptionReminder({
  users: userService,
  messenger,
  settings: settingsService,
  schedule: config.reminderCron,
  sendTimeoutMs: config.sendTimeoutMs,
});

// Create the API application
const app = createApp({
  services: {
    userService,
    fileService,
    linkService,
    subscriptionService,
    rateLimitService,
    registrationService,
    settingsService,
    adminService,
    auditService,
    storage,
    sweeper,
  },
  botApiToken: config.botApiToken,
  adminApiToken: config.adminApiToken,
  allowedOrigins: config.allowedOrigins,
  clientAddress: {
    remoteAddress: socketAddress,
    trustedProxies: config.trustedProxies,
  },
});

sweeper.start();
reminder.start();

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

console.log(`[server] listening on port ${config.port} (${config.env})`);
console.log(
  `[server] rate-limit store: ${config.redis !== null ? 'redis' : 'memory'}`
);

function shutdown(signal: string): void {
  console.log(`[server] ${signal} received, shutting down`);
  sweeper.stop();
  reminder.stop();
  server.close();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export { app };
