/**
 * User Routes
 * First interaction and the bot's "my account" view
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type {
  FileService,
  SubscriptionService,
  UserService,
} from '../../services/index.js';
import type { ActorContext } from '../../types/index.js';
import { formatSummary, formatUser } from '../utils/format.js';
import { errorResponse, successResponse } from '../utils/response.js';

interface UserRoutesDeps {
  userService: Pick<UserService, 'ensureUser' | 'getUser'>;
  subscriptionService: Pick<SubscriptionService, 'getSummary'>;
  fileService: Pick<FileService, 'getStorageUsage'>;
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

// Zod Schemas
const registerSchema = z.object({
  username: z.string().trim().max(64).nullable().optional(),
  fullName: z.string().trim().max(256).nullable().optional(),
});

/**
 * Create user routes
 */
export function createUserRoutes(deps: UserRoutesDeps): Hono {
  const { userService, subscriptionService, fileService } = deps;
  const app = new Hono();

  /**
   * POST /users/register
   * First interaction: create the user on a trial, or refresh their names
   */
  app.post('/users/register', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const userId = actor.userId;

    if (userId === undefined) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'User ID not found in request' },
        requestId
      );
    }

    let rawBody: unknown;
    try {
      rawBody = await c.req.json();
    } catch {
      rawBody = {};
    }

    const validation = registerSchema.safeParse(rawBody);
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: validation.error.issues[0]?.message ?? 'Invalid user data',
        },
        requestId
      );
    }

    const body = validation.data;
    const result = await userService.ensureUser(actor, {
      id: userId,
      ...(body.username !== undefined && { username: body.username }),
      ...(body.fullName !== undefined && { fullName: body.fullName }),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const { user, created } = result.data;
    if (user.isBlocked) {
      return errorResponse(
        c,
        { code: 'USER_BLOCKED', message: 'User is blocked' },
        requestId
      );
    }

    const summary = await subscriptionService.getSummary(user);
    return successResponse(
      c,
      { user: formatUser(user), subscription: formatSummary(summary), created },
      requestId,
      created ? 201 : 200
    );
  });

  /**
   * GET /users/me
   * Profile, subscription state and storage usage
   */
  app.get('/users/me', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const userId = actor.userId;

    if (userId === undefined) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'User ID not found in request' },
        requestId
      );
    }

    const result = await userService.getUser(actor, userId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    if (result.data.isBlocked) {
      return errorResponse(
        c,
        { code: 'USER_BLOCKED', message: 'User is blocked' },
        requestId
      );
    }

    const summary = await subscriptionService.getSummary(result.data);
    const usage = await fileService.getStorageUsage(actor, userId);
    if (!usage.success) {
      return errorResponse(c, usage.error, requestId);
    }

    return successResponse(
      c,
      {
        user: formatUser(result.data),
        subscription: formatSummary(summary),
        usage: usage.data,
      },
      requestId
    );
  });

  return app;
}
