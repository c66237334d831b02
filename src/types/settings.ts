/**
 * Runtime Settings
 *
 * Keys an administrator may change from the panel. Values are validated
 * with zod on write and on read. Secrets and restart-bound values
 * (bot token, upload directory, API tokens, database credentials) live
 * only in the environment.
 */

import { z } from 'zod';

const extensionList = z
  .array(z.string().trim().min(1).max(16))
  .transform((list) =>
    list.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase())
  );

export const SETTING_SCHEMAS = {
  DOWNLOAD_DOMAIN: z.string().trim().min(1).max(253),
  ADMIN_IDS: z.array(z.number().int().positive()),
  REQUIRED_CHANNEL: z.string().trim().min(1).nullable(),
  SUBSCRIPTION_REMINDER_DAYS: z.number().int().min(0).max(60),
  TRIAL_DAYS: z.number().int().min(0).max(365),
  BLOCKED_EXTENSIONS: extensionList,
  ALLOWED_EXTENSIONS: extensionList,
  MAX_UPLOAD_SIZE_MB: z.number().int().positive().max(4096),
  DEFAULT_EXPIRY_DAYS: z.number().int().positive().max(365),
  DEDUP_ENABLED: z.boolean(),
};

export type SettingKey = keyof typeof SETTING_SCHEMAS;

export type SettingValues = {
  [K in SettingKey]: z.output<(typeof SETTING_SCHEMAS)[K]>;
};

const SCHEMAS_BY_KEY: {
  [K in SettingKey]: z.ZodType<SettingValues[K], z.ZodTypeDef, unknown>;
} = SETTING_SCHEMAS;

/**
 * Schema for one key, typed by the key
 */
export function settingSchema<K extends SettingKey>(
  key: K
): z.ZodType<SettingValues[K], z.ZodTypeDef, unknown> {
  return SCHEMAS_BY_KEY[key];
}

export const SETTING_KEYS = Object.keys(SETTING_SCHEMAS).filter(isSettingKey);

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(SETTING_SCHEMAS, key);
}

export interface SettingEntry {
  key: SettingKey;
  value: unknown;
  source: 'store' | 'default';
  updatedAt: Date | null;
}
