/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type {
  AdminService,
  AuditService,
  FileService,
  FileStorage,
  LinkService,
  RateLimitService,
  RegistrationService,
  SettingsService,
  SubscriptionService,
  UserService,
} from '../services/index.js';
import type { ActorContext, ErrorCode } from '../types/index.js';
import type { SweepStats } from '../workers/index.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta?: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
    requestId: string;
  };
}

/**
 * Cursor page as returned in `data`
 */
export interface PageResponse<T> {
  items: T[];
  nextCursor: string | null;
  hasMore: boolean;
}

/**
 * Services the HTTP layer delegates to
 */
export interface ApiServices {
  userService: UserService;
  fileService: FileService;
  linkService: LinkService;
  subscriptionService: SubscriptionService;
  rateLimitService: RateLimitService;
  registrationService: RegistrationService;
  settingsService: SettingsService;
  adminService: AdminService;
  auditService: AuditService;
  storage: Pick<FileStorage, 'publicPath'>;
  sweeper: { runOnce(): Promise<SweepStats> };
}
