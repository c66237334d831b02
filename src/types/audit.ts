/**
 * Audit Types
 */

import type { PaginationParams } from './pagination.js';

export type AuditActorType = 'user' | 'admin' | 'system' | 'anonymous';

/**
 * Event to be logged to the audit system
 * Used as input to AuditService.log()
 */
export interface AuditEvent {
  action: string; // e.g., 'file:expired', 'link:regenerated'
  resourceType: string; // e.g., 'file', 'user', 'setting'
  resourceId?: string;
  details?: Record<string, unknown>;
}

/**
 * Full audit log record (from database)
 */
export interface AuditLog {
  id: string;
  timestamp: Date;
  actorId: string | null; // NULL for system actions
  actorType: AuditActorType;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  ipAddress: string | null;
  requestId: string | null;
}

export interface AuditQueryParams extends PaginationParams {
  actorId?: string;
  action?: string;
  resourceType?: string;
  resourceId?: string;
}
