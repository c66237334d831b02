/**
 * UserService Database Adapter
 * Implements UserServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  PaginatedResult,
  SearchUsersParams,
  SubscriptionStatus,
  SubscriptionTier,
  User,
  UserCounts,
  UserUpdate,
} from '../types/index.js';

import type { UserServiceDb } from './user.service.js';

interface UserRow {
  id: number;
  username: string | null;
  full_name: string | null;
  tier: string;
  subscription_status: string;
  subscription_expires_at: string | null;
  trial_started_at: string;
  is_blocked: boolean;
  block_reason: string | null;
  blocked_at: string | null;
  blocked_until: string | null;
  is_active: boolean;
  upload_count: number;
  download_count: number;
  reminder_sent_for: string | null;
  created_at: string;
  updated_at: string;
}

function toTier(value: string): SubscriptionTier {
  return value === 'basic' || value === 'premium' ? value : 'trial';
}

function toStatus(value: string): SubscriptionStatus {
  return value === 'expired' ? 'expired' : 'active';
}

function toDate(value: string | null): Date | null {
  return value !== null ? new Date(value) : null;
}

function mapRowToUser(row: UserRow): User {
  return {
    id: Number(row.id),
    username: row.username,
    fullName: row.full_name,
    tier: toTier(row.tier),
    subscriptionStatus: toStatus(row.subscription_status),
    subscriptionExpiresAt: toDate(row.subscription_expires_at),
    trialStartedAt: new Date(row.trial_started_at),
    isBlocked: row.is_blocked,
    blockReason: row.block_reason,
    blockedAt: toDate(row.blocked_at),
    blockedUntil: toDate(row.blocked_until),
    isActive: row.is_active,
    uploadCount: row.upload_count,
    downloadCount: row.download_count,
    reminderSentFor: toDate(row.reminder_sent_for),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function mapUpdateToRow(update: UserUpdate): Record<string, unknown> {
  const row: Record<string, unknown> = {
    updated_at: new Date().toISOString(),
  };
  if (update.username !== undefined) row.username = update.username;
  if (update.fullName !== undefined) row.full_name = update.fullName;
  if (update.tier !== undefined) row.tier = update.tier;
  if (update.subscriptionStatus !== undefined) {
    row.subscription_status = update.subscriptionStatus;
  }
  if (update.subscriptionExpiresAt !== undefined) {
    row.subscription_expires_at =
      update.subscriptionExpiresAt?.toISOString() ?? null;
  }
  if (update.isBlocked !== undefined) row.is_blocked = update.isBlocked;
  if (update.blockReason !== undefined) row.block_reason = update.blockReason;
  if (update.blockedAt !== undefined) {
    row.blocked_at = update.blockedAt?.toISOString() ?? null;
  }
  if (update.blockedUntil !== undefined) {
    row.blocked_until = update.blockedUntil?.toISOString() ?? null;
  }
  if (update.isActive !== undefined) row.is_active = update.isActive;
  if (update.reminderSentFor !== undefined) {
    row.reminder_sent_for = update.reminderSentFor?.toISOString() ?? null;
  }
  return row;
}

/**
 * Create UserServiceDb implementation using Supabase
 */
export function createUserServiceDb(supabase: SupabaseClient): UserServiceDb {
  return {
    async getUser(userId: number): Promise<User | null> {
      const { data, error } = await supabase
        .from('users')
        .select('*')
        .eq('id', userId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get user: ${error.message}`);
      }

      return data !== null ? mapRowToUser(data as UserRow) : null;
    },

    async insertUser(params: {
      id: number;
      username: string | null;
      fullName: string | null;
      trialStartedAt: Date;
    }): Promise<User> {
      const { data, error } = await supabase
        .from('users')
        .insert({
          id: params.id,
          username: params.username,
          full_name: params.fullName,
          tier: 'trial',
          subscription_status: 'active',
          trial_started_at: params.trialStartedAt.toISOString(),
        })
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to create user: ${error.message}`);
      }

      return mapRowToUser(data as UserRow);
    },

    async updateUser(userId: number, update: UserUpdate): Promise<User> {
      const { data, error } = await supabase
        .from('users')
        .update(mapUpdateToRow(update))
        .eq('id', userId)
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to update user: ${error.message}`);
      }

      return mapRowToUser(data as UserRow);
    },

    async incrementCounters(
      userId: number,
      delta: { uploads?: number; downloads?: number }
    ): Promise<void> {
      const { error } = await supabase.rpc('increment_user_counters', {
        p_user_id: userId,
        p_uploads: delta.uploads ?? 0,
        p_downloads: delta.downloads ?? 0,
      });

      if (error !== null) {
        throw new Error(`Failed to update user counters: ${error.message}`);
      }
    },

    async searchUsers(
      params: SearchUsersParams
    ): Promise<PaginatedResult<User>> {
      let query = supabase
        .from('users')
        .select('*')
        .order('created_at', { ascending: false });

      if (params.search !== undefined) {
        const term = params.search.replace(/[%,()]/g, '');
        query = /^\d+$/.test(term)
          ? query.or(`id.eq.${term},username.ilike.%${term}%`)
          : query.or(`username.ilike.%${term}%,full_name.ilike.%${term}%`);
      }
      if (params.cursor !== undefined) {
        query = query.lt('created_at', params.cursor);
      }

      const { data, error } = await query.limit(params.limit + 1);

      if (error !== null) {
        throw new Error(`Failed to search users: ${error.message}`);
      }

      const rows = (data ?? []) as UserRow[];
      const hasMore = rows.length > params.limit;
      const items = rows.slice(0, params.limit).map(mapRowToUser);

      const result: PaginatedResult<User> = { items, hasMore };
      const lastItem = items[items.length - 1];
      if (hasMore && lastItem !== undefined) {
        result.nextCursor = lastItem.createdAt.toISOString();
      }
      return result;
    },

    async listActiveUsers(params: {
      cursor?: string;
      limit: number;
    }): Promise<PaginatedResult<User>> {
      let query = supabase
        .from('users')
        .select('*')
        .eq('is_active', true)
        .eq('is_blocked', false)
        .order('id', { ascending: true });

      // Cursor is the id of the last user seen
      if (params.cursor !== undefined) {
        query = query.gt('id', Number(params.cursor));
      }

      const { data, error } = await query.limit(params.limit + 1);

      if (error !== null) {
        throw new Error(`Failed to list active users: ${error.message}`);
      }

      const rows = (data ?? []) as UserRow[];
      const hasMore = rows.length > params.limit;
      const items = rows.slice(0, params.limit).map(mapRowToUser);

      const result: PaginatedResult<User> = { items, hasMore };
      const lastItem = items[items.length - 1];
      if (hasMore && lastItem !== undefined) {
        result.nextCursor = String(lastItem.id);
      }
      return result;
    },

    async listExpiringSubscriptions(params: {
      from: Date;
      to: Date;
      limit: number;
      afterId?: number;
    }): Promise<User[]> {
      // reminder_due: reminder_sent_for differs from the current expiry
      let query = supabase
        .from('users')
        .select('*')
        .neq('tier', 'trial')
        .eq('subscription_status', 'active')
        .eq('is_blocked', false)
        .eq('reminder_due', true)
        .gte('subscription_expires_at', params.from.toISOString())
        .lte('subscription_expires_at', params.to.toISOString())
        .order('id', { ascending: true });

      if (params.afterId !== undefined) {
        query = query.gt('id', params.afterId);
      }

      const { data, error } = await query.limit(params.limit);

      if (error !== null) {
        throw new Error(`Failed to list expiring subscriptions: ${error.message}`);
      }

      return ((data ?? []) as UserRow[]).map(mapRowToUser);
    },

    async countUsers(): Promise<UserCounts> {
      const [total, blocked, active] = await Promise.all([
        supabase.from('users').select('id', { count: 'exact', head: true }),
        supabase
          .from('users')
          .select('id', { count: 'exact', head: true })
          .eq('is_blocked', true),
        supabase
          .from('users')
          .select('id', { count: 'exact', head: true })
          .eq('is_active', true),
      ]);

      for (const response of [total, blocked, active]) {
        if (response.error !== null) {
          throw new Error(`Failed to count users: ${response.error.message}`);
        }
      }

      return {
        total: total.count ?? 0,
        blocked: blocked.count ?? 0,
        active: active.count ?? 0,
      };
    },
  };
}
