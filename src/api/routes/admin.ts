/**
 * Admin Routes
 * Moderation, settings, bot control and diagnostics for the web panel
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type { AdminService, AuditService } from '../../services/index.js';
import type { ActorContext, AuditLog } from '../../types/index.js';
import type { SweepStats } from '../../workers/index.js';
import { formatAdminFile, formatUser } from '../utils/format.js';
import {
  errorResponse,
  paginatedResponse,
  successResponse,
} from '../utils/response.js';

/**
 * Max pagination limit
 */
const MAX_LIMIT = 100;
const DEFAULT_LIMIT = 20;

interface AdminRoutesDeps {
  adminService: AdminService;
  auditService: Pick<AuditService, 'queryLogs'>;
  sweeper: { runOnce(): Promise<SweepStats> };
}

/**
 * Helper to get actor from context
 */
function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Helper to get request ID from context
 */
function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

/**
 * Parse limit query param
 */
function parseLimit(value: string | undefined): number {
  if (!value) {
    return DEFAULT_LIMIT;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    return DEFAULT_LIMIT;
  }
  return Math.min(parsed, MAX_LIMIT);
}

/**
 * Chat-platform user ids are positive integers
 */
function parseUserId(value: string): number | null {
  if (!/^[1-9]\d{0,15}$/.test(value)) {
    return null;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return {};
  }
}

function formatAuditLog(log: AuditLog) {
  return {
    id: log.id,
    timestamp: log.timestamp.toISOString(),
    actorType: log.actorType,
    actorId: log.actorId,
    action: log.action,
    resourceType: log.resourceType,
    resourceId: log.resourceId,
    details: log.details,
    requestId: log.requestId,
  };
}

// Zod Schemas
const blockSchema = z.object({
  reason: z.string().trim().min(1).max(500).optional(),
  durationHours: z.number().int().min(1).max(24 * 365).optional(),
});

const subscriptionSchema = z.object({
  tier: z.enum(['trial', 'basic', 'premium']),
  expiresAt: z.string().datetime({ offset: true }).nullable(),
});

const settingValueSchema = z.object({
  value: z.unknown(),
});

const broadcastSchema = z.object({
  message: z.string().min(1, 'Message is required'),
});

/**
 * Create admin routes
 */
export function createAdminRoutes(deps: AdminRoutesDeps): Hono {
  const { adminService, auditService, sweeper } = deps;
  const app = new Hono();

  function invalidUserId(c: Context, requestId: string): Response {
    return errorResponse(
      c,
      {
        code: 'VALIDATION_ERROR',
        message: 'User ID must be a positive integer',
      },
      requestId
    );
  }

  // ─────────────────────────────────────────────────────────────
  // ADMIN USERS
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /admin/users
   * Search users by id, username or name (admin)
   */
  app.get('/admin/users', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const cursor = c.req.query('cursor');
    const search = c.req.query('search');
    const result = await adminService.searchUsers(actor, {
      limit: parseLimit(c.req.query('limit')),
      ...(cursor !== undefined && { cursor }),
      ...(search !== undefined && { search }),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return paginatedResponse(c, result.data, formatUser, requestId);
  });

  /**
   * POST /admin/users/:id/block
   */
  app.post('/admin/users/:id/block', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const userId = parseUserId(c.req.param('id'));
    if (userId === null) {
      return invalidUserId(c, requestId);
    }

    const validation = blockSchema.safeParse(await readJson(c));
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: validation.error.issues[0]?.message ?? 'Invalid block request',
        },
        requestId
      );
    }

    const { reason, durationHours } = validation.data;
    const result = await adminService.blockUser(actor, userId, {
      ...(reason !== undefined && { reason }),
      ...(durationHours !== undefined && { durationHours }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatUser(result.data), requestId);
  });

  /**
   * POST /admin/users/:id/unblock
   */
  app.post('/admin/users/:id/unblock', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const userId = parseUserId(c.req.param('id'));
    if (userId === null) {
      return invalidUserId(c, requestId);
    }

    const result = await adminService.unblockUser(actor, userId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatUser(result.data), requestId);
  });

  /**
   * PUT /admin/users/:id/subscription
   * Body: { tier, expiresAt } where a null expiry means lifetime
   */
  app.put('/admin/users/:id/subscription', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const userId = parseUserId(c.req.param('id'));
    if (userId === null) {
      return invalidUserId(c, requestId);
    }

    const validation = subscriptionSchema.safeParse(await readJson(c));
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message:
            validation.error.issues[0]?.message ?? 'Invalid subscription data',
        },
        requestId
      );
    }

    const body = validation.data;
    const result = await adminService.setSubscription(actor, userId, {
      tier: body.tier,
      expiresAt: body.expiresAt !== null ? new Date(body.expiresAt) : null,
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatUser(result.data), requestId);
  });

  // ─────────────────────────────────────────────────────────────
  // ADMIN FILES AND LINKS
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /admin/files
   * Filename search across owners (admin)
   */
  app.get('/admin/files', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const cursor = c.req.query('cursor');
    const search = c.req.query('search');
    const rawOwner = c.req.query('owner_id');
    const ownerId = rawOwner !== undefined ? parseUserId(rawOwner) : undefined;
    if (ownerId === null) {
      return invalidUserId(c, requestId);
    }

    const result = await adminService.searchFiles(actor, {
      limit: parseLimit(c.req.query('limit')),
      includeDeleted: c.req.query('include_deleted') === 'true',
      ...(cursor !== undefined && { cursor }),
      ...(search !== undefined && { search }),
      ...(ownerId !== undefined && { ownerId }),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return paginatedResponse(c, result.data, formatAdminFile, requestId);
  });

  /**
   * DELETE /admin/files/:id
   */
  app.delete('/admin/files/:id', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await adminService.deleteFile(actor, c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        file: formatAdminFile(result.data.file),
        alreadyDeleted: result.data.alreadyDeleted,
      },
      requestId
    );
  });

  /**
   * GET /admin/links/:token
   * Why a link does or does not resolve
   */
  app.get('/admin/links/:token', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await adminService.inspectLink(actor, c.req.param('token'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        valid: result.data.valid,
        reason: result.data.reason,
        file:
          result.data.file !== null ? formatAdminFile(result.data.file) : null,
      },
      requestId
    );
  });

  // ─────────────────────────────────────────────────────────────
  // ADMIN SETTINGS
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /admin/settings
   */
  app.get('/admin/settings', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await adminService.listSettings(actor);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      result.data.map((entry) => ({
        key: entry.key,
        value: entry.value,
        source: entry.source,
        updatedAt: entry.updatedAt ? entry.updatedAt.toISOString() : null,
      })),
      requestId
    );
  });

  /**
   * PUT /admin/settings/:key
   * Body: { value }
   */
  app.put('/admin/settings/:key', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = settingValueSchema.safeParse(await readJson(c));
    if (!validation.success || validation.data.value === undefined) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'A value is required' },
        requestId
      );
    }

    const result = await adminService.updateSetting(
      actor,
      c.req.param('key'),
      validation.data.value
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        key: result.data.key,
        value: result.data.value,
        source: result.data.source,
        updatedAt: result.data.updatedAt
          ? result.data.updatedAt.toISOString()
          : null,
      },
      requestId
    );
  });

  // ─────────────────────────────────────────────────────────────
  // ADMIN BOT CONTROL
  // ─────────────────────────────────────────────────────────────

  app.post('/admin/bot/pause', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await adminService.pauseBot(actor);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  app.post('/admin/bot/resume', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await adminService.resumeBot(actor);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  app.get('/admin/bot/status', (c) => {
    return successResponse(
      c,
      { paused: adminService.isPaused() },
      getRequestId(c)
    );
  });

  /**
   * POST /admin/broadcast
   * Body: { message }. Responds once every recipient has been tried.
   */
  app.post('/admin/broadcast', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = broadcastSchema.safeParse(await readJson(c));
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: validation.error.issues[0]?.message ?? 'Invalid message',
        },
        requestId
      );
    }

    const result = await adminService.broadcast(actor, validation.data.message);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * POST /admin/sweeper/run
   * Run an expiry pass now
   */
  app.post('/admin/sweeper/run', async (c) => {
    const requestId = getRequestId(c);
    const stats = await sweeper.runOnce();

    return successResponse(
      c,
      {
        ...stats,
        startedAt: stats.startedAt.toISOString(),
      },
      requestId
    );
  });

  // ─────────────────────────────────────────────────────────────
  // ADMIN AUDIT AND STATS
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /admin/audit
   * Query audit logs (admin)
   */
  app.get('/admin/audit', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const cursor = c.req.query('cursor');
    const actorId = c.req.query('actor_id');
    const action = c.req.query('action');
    const resourceType = c.req.query('resource_type');
    const resourceId = c.req.query('resource_id');

    const result = await auditService.queryLogs(actor, {
      limit: parseLimit(c.req.query('limit')),
      ...(cursor !== undefined && { cursor }),
      ...(actorId !== undefined && { actorId }),
      ...(action !== undefined && { action }),
      ...(resourceType !== undefined && { resourceType }),
      ...(resourceId !== undefined && { resourceId }),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return paginatedResponse(c, result.data, formatAuditLog, requestId);
  });

  /**
   * GET /admin/stats
   */
  app.get('/admin/stats', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await adminService.getStats(actor);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  return app;
}
