/**
 * SettingsService Database Adapter
 * Key-value rows in the settings table, values stored as jsonb
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { SettingsServiceDb, StoredSetting } from './settings.service.js';

interface SettingRow {
  key: string;
  value: unknown;
  updated_at: string;
}

function mapRowToSetting(row: SettingRow): StoredSetting {
  return {
    key: row.key,
    value: row.value,
    updatedAt: new Date(row.updated_at),
  };
}

export function createSettingsServiceDb(
  supabase: SupabaseClient
): SettingsServiceDb {
  return {
    async getSetting(key: string): Promise<StoredSetting | null> {
      const { data, error } = await supabase
        .from('settings')
        .select('*')
        .eq('key', key)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get setting: ${error.message}`);
      }

      return data !== null ? mapRowToSetting(data as SettingRow) : null;
    },

    async listSettings(): Promise<StoredSetting[]> {
      const { data, error } = await supabase
        .from('settings')
        .select('*')
        .order('key', { ascending: true });

      if (error !== null) {
        throw new Error(`Failed to list settings: ${error.message}`);
      }

      return ((data ?? []) as SettingRow[]).map(mapRowToSetting);
    },

    async upsertSetting(key: string, value: unknown): Promise<StoredSetting> {
      const { data, error } = await supabase
        .from('settings')
        .upsert(
          { key, value, updated_at: new Date().toISOString() },
          { onConflict: 'key' }
        )
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to save setting: ${error.message}`);
      }

      return mapRowToSetting(data as SettingRow);
    },
  };
}
