/**
 * AuditService Database Adapter
 * Implements AuditServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  AuditActorType,
  AuditLog,
  AuditQueryParams,
  PaginatedResult,
} from '../types/index.js';

import type { AuditLogEntry, AuditServiceDb } from './audit.service.js';

interface AuditLogRow {
  id: string;
  timestamp: string;
  actor_id: string | null;
  actor_type: string;
  action: string;
  resource_type: string;
  resource_id: string | null;
  details: Record<string, unknown> | null;
  ip_address: string | null;
  request_id: string | null;
}

function toActorType(value: string): AuditActorType {
  switch (value) {
    case 'user':
    case 'admin':
    case 'system':
    case 'anonymous':
      return value;
    default:
      return 'system';
  }
}

function mapRowToAuditLog(row: AuditLogRow): AuditLog {
  return {
    id: row.id,
    timestamp: new Date(row.timestamp),
    actorId: row.actor_id,
    actorType: toActorType(row.actor_type),
    action: row.action,
    resourceType: row.resource_type,
    resourceId: row.resource_id,
    details: row.details ?? {},
    ipAddress: row.ip_address,
    requestId: row.request_id,
  };
}

/**
 * Create AuditServiceDb implementation using Supabase
 */
export function createAuditServiceDb(supabase: SupabaseClient): AuditServiceDb {
  return {
    async insertLog(entry: AuditLogEntry): Promise<{ id: string }> {
      const { data, error } = await supabase
        .from('audit_logs')
        .insert({
          actor_id: entry.actorId,
          actor_type: entry.actorType,
          action: entry.action,
          resource_type: entry.resourceType,
          resource_id: entry.resourceId,
          details: entry.details,
          ip_address: entry.ipAddress,
          request_id: entry.requestId,
        })
        .select('id')
        .single();

      if (error !== null) {
        throw new Error(`Failed to insert audit log: ${error.message}`);
      }

      return { id: (data as { id: string }).id };
    },

    async queryLogs(
      params: AuditQueryParams
    ): Promise<PaginatedResult<AuditLog>> {
      let query = supabase
        .from('audit_logs')
        .select('*')
        .order('timestamp', { ascending: false });

      if (params.actorId !== undefined) {
        query = query.eq('actor_id', params.actorId);
      }
      if (params.action !== undefined) {
        query = query.eq('action', params.action);
      }
      if (params.resourceType !== undefined) {
        query = query.eq('resource_type', params.resourceType);
      }
      if (params.resourceId !== undefined) {
        query = query.eq('resource_id', params.resourceId);
      }
      if (params.cursor !== undefined) {
        query = query.lt('timestamp', params.cursor);
      }

      // Fetch one more than limit to determine hasMore
      const limit = params.limit;
      const { data, error } = await query.limit(limit + 1);

      if (error !== null) {
        throw new Error(`Failed to query audit logs: ${error.message}`);
      }

      const rows = (data ?? []) as AuditLogRow[];
      const hasMore = rows.length > limit;
      const items = rows.slice(0, limit).map(mapRowToAuditLog);

      const result: PaginatedResult<AuditLog> = { items, hasMore };
      const lastItem = items[items.length - 1];
      if (hasMore && lastItem !== undefined) {
        result.nextCursor = lastItem.timestamp.toISOString();
      }
      return result;
    },

    async getLogsByResource(
      resourceType: string,
      resourceId: string
    ): Promise<AuditLog[]> {
      const { data, error } = await supabase
        .from('audit_logs')
        .select('*')
        .eq('resource_type', resourceType)
        .eq('resource_id', resourceId)
        .order('timestamp', { ascending: false });

      if (error !== null) {
        throw new Error(`Failed to get logs by resource: ${error.message}`);
      }

      return ((data ?? []) as AuditLogRow[]).map(mapRowToAuditLog);
    },
  };
}
