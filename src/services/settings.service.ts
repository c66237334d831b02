/**
 * SettingsService Implementation
 *
 * Typed access to runtime settings. Every read goes to the store so a
 * change made from the admin panel applies on the next call. Missing or
 * invalid stored values fall back to the environment defaults.
 *
 * Owns: settings
 * Dependencies: AuditService
 */

import type {
  ActorContext,
  AuditEvent,
  Result,
  SettingEntry,
  SettingKey,
  SettingValues,
} from '../types/index.js';
import {
  success,
  failure,
  isPrivilegedActor,
  isSettingKey,
  settingSchema,
  SETTING_KEYS,
} from '../types/index.js';

export interface StoredSetting {
  key: string;
  value: unknown;
  updatedAt: Date;
}

/**
 * Database abstraction interface for SettingsService
 */
export interface SettingsServiceDb {
  getSetting: (key: string) => Promise<StoredSetting | null>;
  listSettings: () => Promise<StoredSetting[]>;
  upsertSetting: (key: string, value: unknown) => Promise<StoredSetting>;
}

export interface SettingsServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

export interface SettingsService {
  get<K extends SettingKey>(key: K): Promise<SettingValues[K]>;
  list(actor: ActorContext): Promise<Result<SettingEntry[]>>;
  update(
    actor: ActorContext,
    key: string,
    value: unknown
  ): Promise<Result<SettingEntry>>;
}

function parseSetting<K extends SettingKey>(
  key: K,
  value: unknown
): SettingValues[K] | null {
  const parsed = settingSchema(key).safeParse(value);
  if (!parsed.success) {
    return null;
  }
  return parsed.data;
}

/**
 * Create SettingsService instance
 */
export function createSettingsService(deps: {
  db: SettingsServiceDb;
  auditService: SettingsServiceAudit;
  defaults: SettingValues;
}): SettingsService {
  const { db, auditService, defaults } = deps;

  return {
    async get<K extends SettingKey>(key: K): Promise<SettingValues[K]> {
      const stored = await db.getSetting(key);
      if (stored === null) {
        return defaults[key];
      }

      const value = parseSetting(key, stored.value);
      if (value === null) {
        console.error(`[settings] stored value for ${key} is invalid, using default`);
        return defaults[key];
      }
      return value;
    },

    /**
     * Effective value of every key (admin only)
     */
    async list(actor: ActorContext): Promise<Result<SettingEntry[]>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'Settings are restricted to admins');
      }

      const stored = new Map(
        (await db.listSettings()).map((row) => [row.key, row])
      );

      const entries = SETTING_KEYS.map((key): SettingEntry => {
        const row = stored.get(key);
        const value = row !== undefined ? parseSetting(key, row.value) : null;
        if (row === undefined || value === null) {
          return { key, value: defaults[key], source: 'default', updatedAt: null };
        }
        return { key, value, source: 'store', updatedAt: row.updatedAt };
      });

      return success(entries);
    },

    /**
     * Validate and persist a setting (admin only)
     * Unknown keys are rejected, which covers secrets and restart-bound values
     */
    async update(
      actor: ActorContext,
      key: string,
      value: unknown
    ): Promise<Result<SettingEntry>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'Settings are restricted to admins');
      }

      if (!isSettingKey(key)) {
        return failure('VALIDATION_ERROR', `Setting ${key} cannot be changed at runtime`, {
          allowedKeys: SETTING_KEYS,
        });
      }

      const parsed = settingSchema(key).safeParse(value);
      if (!parsed.success) {
        return failure('VALIDATION_ERROR', `Invalid value for ${key}`, {
          issues: parsed.error.issues.map((issue) => issue.message),
        });
      }

      const saved = await db.upsertSetting(key, parsed.data);

      await auditService.log(actor, {
        action: 'setting:updated',
        resourceType: 'setting',
        resourceId: key,
        details: { value: parsed.data },
      });

      return success({
        key,
        value: parsed.data,
        source: 'store',
        updatedAt: saved.updatedAt,
      });
    },
  };
}
