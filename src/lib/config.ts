/**
 * Environment Configuration
 *
 * Values read once at startup. Settings that can change at runtime are
 * seeded from here and then served by SettingsService.
 */

import { z } from 'zod';

import type { RateLimitRules, SettingValues } from '../types/index.js';
import { ACTION_CLASSES, DEFAULT_RATE_LIMIT_RULES } from '../types/index.js';

const csv = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part !== '')
  );

const idList = csv.pipe(z.array(z.coerce.number().int().positive()));

const boolFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

// Unset and empty (`KEY=`) mean the same thing
const optionalString = z.preprocess(
  (value) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value,
  z.string().min(1).optional()
);

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(3000),

  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1),

  BOT_TOKEN: z.string().min(1),
  BOT_API_TOKEN: z.string().min(16),
  ADMIN_API_TOKEN: z.string().min(16),

  UPLOAD_DIR: z.string().min(1).default('./uploads'),
  DOWNLOAD_DOMAIN: z.string().min(1).default('localhost:3000'),
  ADMIN_IDS: idList,
  REQUIRED_CHANNEL: z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === '' ? null : value.trim()
    ),
  SUBSCRIPTION_REMINDER_DAYS: z.coerce.number().int().min(0).default(3),
  TRIAL_DAYS: z.coerce.number().int().min(0).default(7),
  BLOCKED_EXTENSIONS: csv,
  ALLOWED_EXTENSIONS: csv,
  MAX_UPLOAD_SIZE_MB: positiveInt(2048),
  DEFAULT_EXPIRY_DAYS: positiveInt(7),
  DEDUP_ENABLED: boolFlag,

  TRANSFER_TIMEOUT_MS: positiveInt(10 * 60 * 1000),
  SEND_TIMEOUT_MS: positiveInt(10_000),
  MEMBERSHIP_TIMEOUT_MS: positiveInt(5_000),
  BROADCAST_CONCURRENCY: positiveInt(5),
  SWEEP_CRON: z.string().default('*/10 * * * *'),
  SWEEP_BATCH_SIZE: positiveInt(100),
  STORAGE_CLEANUP_CRON: z.string().default('30 3 * * *'),
  ORPHAN_GRACE_MINUTES: positiveInt(60),
  REMINDER_CRON: z.string().default('0 * * * *'),

  UPSTASH_REDIS_URL: optionalString.pipe(z.string().url().optional()),
  UPSTASH_REDIS_TOKEN: optionalString,

  ALLOWED_ORIGINS: csv,
  TRUSTED_PROXIES: csv,
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  env: string;
  port: number;
  supabase: { url: string; serviceKey: string };
  botToken: string;
  botApiToken: string;
  adminApiToken: string;
  uploadDir: string;
  transferTimeoutMs: number;
  sendTimeoutMs: number;
  membershipTimeoutMs: number;
  broadcastConcurrency: number;
  sweepCron: string;
  sweepBatchSize: number;
  storageCleanupCron: string;
  orphanGraceMs: number;
  reminderCron: string;
  redis: { url: string; token: string } | null;
  allowedOrigins: string[];
  trustedProxies: string[];
  rateLimits: RateLimitRules;
  settingDefaults: SettingValues;
}

/**
 * Files that are never accepted, whatever the settings say
 */
export const BUILTIN_BLOCKED_EXTENSIONS = [
  '.exe',
  '.bat',
  '.cmd',
  '.sh',
  '.msi',
  '.dll',
  '.scr',
  '.ps1',
];

function readRateLimits(
  source: Record<string, string | undefined>
): RateLimitRules {
  const rules: RateLimitRules = { ...DEFAULT_RATE_LIMIT_RULES };
  for (const actionClass of ACTION_CLASSES) {
    const prefix = `RATE_LIMIT_${actionClass.toUpperCase()}`;
    const fallback = DEFAULT_RATE_LIMIT_RULES[actionClass];
    const limit = positiveInt(fallback.limit).parse(source[`${prefix}_MAX`]);
    const windowSeconds = positiveInt(fallback.windowMs / 1000).parse(
      source[`${prefix}_WINDOW_SECONDS`]
    );
    rules[actionClass] = { limit, windowMs: windowSeconds * 1000 };
  }

  return rules;
}

/**
 * Parse and validate the process environment
 * Throws with every invalid variable listed
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${problems}`);
  }

  const env = parsed.data;
  const redis =
    env.UPSTASH_REDIS_URL !== undefined && env.UPSTASH_REDIS_TOKEN !== undefined
      ? { url: env.UPSTASH_REDIS_URL, token: env.UPSTASH_REDIS_TOKEN }
      : null;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    supabase: { url: env.SUPABASE_URL, serviceKey: env.SUPABASE_SERVICE_KEY },
    botToken: env.BOT_TOKEN,
    botApiToken: env.BOT_API_TOKEN,
    adminApiToken: env.ADMIN_API_TOKEN,
    uploadDir: env.UPLOAD_DIR,
    transferTimeoutMs: env.TRANSFER_TIMEOUT_MS,
    sendTimeoutMs: env.SEND_TIMEOUT_MS,
    membershipTimeoutMs: env.MEMBERSHIP_TIMEOUT_MS,
    broadcastConcurrency: env.BROADCAST_CONCURRENCY,
    sweepCron: env.SWEEP_CRON,
    sweepBatchSize: env.SWEEP_BATCH_SIZE,
    storageCleanupCron: env.STORAGE_CLEANUP_CRON,
    orphanGraceMs: env.ORPHAN_GRACE_MINUTES * 60 * 1000,
    reminderCron: env.REMINDER_CRON,
    redis,
    allowedOrigins:
      env.ALLOWED_ORIGINS.length > 0
        ? env.ALLOWED_ORIGINS
        : ['http://localhost:3000'],
    trustedProxies: env.TRUSTED_PROXIES,
    rateLimits: readRateLimits(source),
    settingDefaults: {
      DOWNLOAD_DOMAIN: env.DOWNLOAD_DOMAIN,
      ADMIN_IDS: env.ADMIN_IDS,
      REQUIRED_CHANNEL: env.REQUIRED_CHANNEL,
      SUBSCRIPTION_REMINDER_DAYS: env.SUBSCRIPTION_REMINDER_DAYS,
      TRIAL_DAYS: env.TRIAL_DAYS,
      BLOCKED_EXTENSIONS: normalizeExtensions(env.BLOCKED_EXTENSIONS),
      ALLOWED_EXTENSIONS: normalizeExtensions(env.ALLOWED_EXTENSIONS),
      MAX_UPLOAD_SIZE_MB: env.MAX_UPLOAD_SIZE_MB,
      DEFAULT_EXPIRY_DAYS: env.DEFAULT_EXPIRY_DAYS,
      DEDUP_ENABLED: env.DEDUP_ENABLED,
    },
  };
}

function normalizeExtensions(list: string[]): string[] {
  return list.map((ext) =>
    (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()
  );
}
