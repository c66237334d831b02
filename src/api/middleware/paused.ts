/**
 * Pause Middleware
 * While the bot is paused, only admins get through
 */

import type { Context, Next } from 'hono';

import { isPrivilegedActor } from '../../types/index.js';

export function createPausedMiddleware(pause: { isPaused(): boolean }) {
  return async function pausedMiddleware(c: Context, next: Next) {
    const actor = c.get('actor');
    if (pause.isPaused() && !isPrivilegedActor(actor)) {
      return c.json(
        {
          error: {
            code: 'BOT_PAUSED',
            message: 'The service is paused for maintenance',
            requestId: actor.requestId,
          },
        },
        503
      );
    }
    return next();
  };
}
