/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import { createAccessMiddleware } from './middleware/access.js';
import {
  createAdminAuthMiddleware,
  createBotAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
import { createPausedMiddleware } from './middleware/paused.js';
import { createRateLimitMiddleware } from './middleware/rateLimit.js';
import { createAdminRoutes } from './routes/admin.js';
import { createDownloadRoutes } from './routes/download.js';
import { createFileRoutes } from './routes/files.js';
import { createHealthRoutes } from './routes/health.js';
import { createUserRoutes } from './routes/users.js';
import type { ApiServices } from './types.js';
import type { ClientAddressOptions } from './utils/client-address.js';

/**
 * App configuration
 */
export interface AppConfig {
  services: ApiServices;
  botApiToken: string;
  adminApiToken: string;
  allowedOrigins?: string[];
  clientAddress?: ClientAddressOptions;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { services, botApiToken, adminApiToken, allowedOrigins, clientAddress } =
    config;
  const app = new Hono();

  // Global middleware
  app.use('*', logger());
  app.use(
    '/api/v1/admin/*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  const publicMiddleware = createPublicMiddleware({
    ...(clientAddress !== undefined && { clientAddress }),
  });
  app.use('/api/v1/health', publicMiddleware);
  app.route(
    '/api/v1',
    createHealthRoutes({ isPaused: () => services.adminService.isPaused() })
  );

  app.use('/d/*', publicMiddleware);
  app.use(
    '/d/*',
    createRateLimitMiddleware(services.rateLimitService, {
      actionClass: 'download',
      getSubject: (c) => `ip:${c.get('actor').ip ?? 'unknown'}`,
    })
  );
  app.route(
    '/',
    createDownloadRoutes({
      linkService: services.linkService,
      storage: services.storage,
    })
  );

  // Bot-facing routes
  const botAuth = createBotAuthMiddleware({
    botApiToken,
    settings: services.settingsService,
    ...(clientAddress !== undefined && { clientAddress }),
  });
  const paused = createPausedMiddleware({
    isPaused: () => services.adminService.isPaused(),
  });
  const commandLimit = createRateLimitMiddleware(services.rateLimitService, {
    actionClass: 'command',
  });
  const access = createAccessMiddleware({
    userService: services.userService,
    subscriptionService: services.subscriptionService,
  });

  app.use('/api/v1/users/*', botAuth, paused, commandLimit);
  app.route(
    '/api/v1',
    createUserRoutes({
      userService: services.userService,
      subscriptionService: services.subscriptionService,
      fileService: services.fileService,
    })
  );

  // '/files/*' also matches '/files'
  app.use('/api/v1/files/*', botAuth, paused);
  app.route(
    '/api/v1',
    createFileRoutes({
      fileService: services.fileService,
      linkService: services.linkService,
      registrationService: services.registrationService,
      access,
      commandLimit,
    })
  );

  // Admin routes
  app.use('/api/v1/admin/*', createAdminAuthMiddleware({
      adminApiToken,
      ...(clientAddress !== undefined && { clientAddress }),
    }));
  app.route(
    '/api/v1',
    createAdminRoutes({
      adminService: services.adminService,
      auditService: services.auditService,
      sweeper: services.sweeper,
    })
  );

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId') ?? 'unknown',
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId: c.get('requestId') ?? 'unknown',
        },
      },
      500
    );
  });

  return app;
}
