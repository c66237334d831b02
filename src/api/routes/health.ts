/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

interface HealthRoutesDeps {
  isPaused: () => boolean;
}

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: HealthRoutesDeps): Hono {
  const app = new Hono();

  /**
   * GET /health
   * Health check - no authentication required
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      paused: deps.isPaused(),
      timestamp: new Date().toISOString(),
      version: 'v1',
    });
  });

  return app;
}
