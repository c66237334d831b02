/**
 * AuditService Implementation
 *
 * Purpose: Append-only audit trail for every state change.
 * Owns: audit_logs
 * Dependencies: None (lowest level service)
 */

import type {
  ActorContext,
  AuditEvent,
  AuditLog,
  AuditQueryParams,
  PaginatedResult,
  Result,
} from '../types/index.js';
import {
  success,
  failure,
  isPrivilegedActor,
  normalizePaginationParams,
} from '../types/index.js';

export interface AuditLogEntry {
  actorId: string | null;
  actorType: ActorContext['type'];
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  ipAddress: string | null;
  requestId: string | null;
}

/**
 * Database abstraction interface for AuditService
 * Allows mocking in tests
 */
export interface AuditServiceDb {
  insertLog: (entry: AuditLogEntry) => Promise<{ id: string }>;
  queryLogs: (params: AuditQueryParams) => Promise<PaginatedResult<AuditLog>>;
  getLogsByResource: (
    resourceType: string,
    resourceId: string
  ) => Promise<AuditLog[]>;
}

export interface AuditService {
  log(actor: ActorContext, event: AuditEvent): Promise<Result<void>>;
  queryLogs(
    actor: ActorContext,
    params: AuditQueryParams
  ): Promise<Result<PaginatedResult<AuditLog>>>;
  getResourceHistory(
    actor: ActorContext,
    resourceType: string,
    resourceId: string
  ): Promise<Result<AuditLog[]>>;
}

function buildLogEntry(actor: ActorContext, event: AuditEvent): AuditLogEntry {
  return {
    actorId: actor.userId !== undefined ? String(actor.userId) : null,
    actorType: actor.type,
    action: event.action,
    resourceType: event.resourceType,
    resourceId: event.resourceId ?? null,
    details: event.details ?? {},
    ipAddress: actor.ip ?? null,
    requestId: actor.requestId,
  };
}

/**
 * Create AuditService instance
 */
export function createAuditService(deps: { db: AuditServiceDb }): AuditService {
  const { db } = deps;

  return {
    /**
     * Log an audit event
     * No permission check - all services can log
     */
    async log(actor: ActorContext, event: AuditEvent): Promise<Result<void>> {
      try {
        await db.insertLog(buildLogEntry(actor, event));
        return success(undefined);
      } catch (err) {
        console.error(`[audit] failed to write ${event.action}:`, err);
        return failure('INTERNAL_ERROR', 'Failed to write audit log');
      }
    },

    /**
     * Query audit logs (admin only)
     */
    async queryLogs(
      actor: ActorContext,
      params: AuditQueryParams
    ): Promise<Result<PaginatedResult<AuditLog>>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'Audit logs are restricted to admins');
      }

      const result = await db.queryLogs({
        ...params,
        ...normalizePaginationParams(params),
      });
      return success(result);
    },

    /**
     * History of a single resource, newest first (admin only)
     */
    async getResourceHistory(
      actor: ActorContext,
      resourceType: string,
      resourceId: string
    ): Promise<Result<AuditLog[]>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'Audit logs are restricted to admins');
      }

      const logs = await db.getLogsByResource(resourceType, resourceId);
      return success(logs);
    },
  };
}
