/**
 * Auth Middleware
 * Constructs ActorContext from shared-secret bearer tokens
 *
 * Bot requests carry BOT_API_TOKEN plus the acting user in X-User-Id.
 * Panel requests carry ADMIN_API_TOKEN and act as an administrator.
 */

import { timingSafeEqual } from 'node:crypto';

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { ActorContext, SettingValues } from '../../types/index.js';
import { ADMIN_PERMISSIONS } from '../../types/index.js';
import type { ClientAddressOptions } from '../utils/client-address.js';
import { resolveClientAddress } from '../utils/client-address.js';

const USER_ID_PATTERN = /^[1-9]\d{0,15}$/;

interface BotAuthMiddlewareDeps {
  botApiToken: string;
  settings: {
    get: (key: 'ADMIN_IDS') => Promise<SettingValues['ADMIN_IDS']>;
  };
  clientAddress?: ClientAddressOptions;
}

interface AdminAuthMiddlewareDeps {
  adminApiToken: string;
  clientAddress?: ClientAddressOptions;
}

interface PublicMiddlewareDeps {
  clientAddress?: ClientAddressOptions;
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

/**
 * Constant-time comparison of the presented bearer token
 */
export function tokenMatches(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function extractBearer(c: Context): string | null {
  const authHeader = c.req.header('Authorization');
  if (authHeader === undefined || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.slice(7).trim();
  return token === '' ? null : token;
}

function clientInfo(
  c: Context,
  options: ClientAddressOptions | undefined
): { ip?: string; userAgent?: string } {
  const ip = resolveClientAddress(c, options);
  const userAgent = c.req.header('user-agent');
  return {
    ...(ip !== undefined && { ip }),
    ...(userAgent !== undefined && { userAgent }),
  };
}

function unauthorized(
  c: Context,
  requestId: string,
  message: string
): Response {
  return c.json(
    {
      error: {
        code: 'UNAUTHORIZED',
        message,
        requestId,
      },
    },
    401
  );
}

/**
 * Create auth middleware for bot-facing routes
 */
export function createBotAuthMiddleware(deps: BotAuthMiddlewareDeps) {
  const { botApiToken, settings, clientAddress } = deps;

  return async function botAuthMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    // 1. Verify the bot's shared secret
    const token = extractBearer(c);
    if (token === null || !tokenMatches(token, botApiToken)) {
      return unauthorized(
        c,
        requestId,
        'Missing or invalid authorization header'
      );
    }

    // 2. Acting user
    const rawUserId = c.req.header('X-User-Id')?.trim();
    if (rawUserId === undefined || !USER_ID_PATTERN.test(rawUserId)) {
      return unauthorized(c, requestId, 'Missing or invalid X-User-Id header');
    }
    const userId = Number(rawUserId);
    if (!Number.isSafeInteger(userId)) {
      return unauthorized(c, requestId, 'Missing or invalid X-User-Id header');
    }

    // 3. Admin ids act with admin privileges from the bot too
    const adminIds = await settings.get('ADMIN_IDS');
    const isAdmin = adminIds.includes(userId);

    const actor: ActorContext = {
      type: isAdmin ? 'admin' : 'user',
      userId,
      requestId,
      permissions: isAdmin ? [...ADMIN_PERMISSIONS] : [],
      ...clientInfo(c, clientAddress),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}

/**
 * Create auth middleware for the admin panel
 */
export function createAdminAuthMiddleware(deps: AdminAuthMiddlewareDeps) {
  const { adminApiToken, clientAddress } = deps;

  return async function adminAuthMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const token = extractBearer(c);
    if (token === null || !tokenMatches(token, adminApiToken)) {
      return unauthorized(
        c,
        requestId,
        'Missing or invalid authorization header'
      );
    }

    const actor: ActorContext = {
      type: 'admin',
      requestId,
      permissions: [...ADMIN_PERMISSIONS],
      ...clientInfo(c, clientAddress),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}

/**
 * Create public middleware for routes that don't require auth
 * Creates an anonymous actor
 */
export function createPublicMiddleware(deps: PublicMiddlewareDeps = {}) {
  const { clientAddress } = deps;

  return function publicMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const actor: ActorContext = {
      type: 'anonymous',
      requestId,
      permissions: [],
      ...clientInfo(c, clientAddress),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}
