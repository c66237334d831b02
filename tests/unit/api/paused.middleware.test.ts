/**
 * Pause Middleware Unit Tests
 */

import type { Context, Next } from 'hono';
import { Hono } from 'hono';
import { describe, it, expect } from 'vitest';

import { createPausedMiddleware } from '@/api/middleware/paused.js';
import { createPauseSwitch } from '@/lib/pause.js';
import type { ActorContext } from '@/types/index.js';

import { createAdminActor, createUserActor } from '../../helpers/test-utils.js';

function appFor(actor: ActorContext, paused: boolean): Hono {
  const app = new Hono();
  app.use('*', async (c: Context, next: Next) => {
    c.set('actor', actor);
    await next();
  });
  app.use('*', createPausedMiddleware(createPauseSwitch(paused)));
  app.get('/test', (c) => c.json({ ok: true }));
  return app;
}

describe('Pause Middleware', () => {
  it('lets everyone through while running', async () => {
    const res = await appFor(createUserActor(1), false).request('/test');

    expect(res.status).toBe(200);
  });

  it('answers users with 503 while paused', async () => {
    const actor = createUserActor(1, { requestId: 'req-9' });

    const res = await appFor(actor, true).request('/test');

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: {
        code: 'BOT_PAUSED',
        message: 'The service is paused for maintenance',
        requestId: 'req-9',
      },
    });
  });

  it('still admits admins while paused', async () => {
    const res = await appFor(createAdminActor(), true).request('/test');

    expect(res.status).toBe(200);
  });
});
