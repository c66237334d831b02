/**
 * Download Route
 * Public link resolution. The bytes are served by the static file server
 * through X-Accel-Redirect; this route only decides whether to hand off.
 *
 * Every denial (unknown, expired, deleted) looks the same to the caller.
 */

import type { Context } from 'hono';
import { Hono } from 'hono';

import type { FileStorage, LinkService } from '../../services/index.js';
import { maskToken } from '../../services/index.js';
import type { ActorContext } from '../../types/index.js';
import { errorResponse } from '../utils/response.js';

interface DownloadRoutesDeps {
  linkService: Pick<LinkService, 'resolve' | 'recordDownload'>;
  storage: Pick<FileStorage, 'publicPath'>;
}

/**
 * Helper to get actor from context
 */
function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * attachment with an ASCII fallback and the UTF-8 name
 */
export function contentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, '_');
  const encoded = encodeURIComponent(fileName).replace(
    /['()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

/**
 * Create download routes
 */
export function createDownloadRoutes(deps: DownloadRoutesDeps): Hono {
  const { linkService, storage } = deps;
  const app = new Hono();

  /**
   * GET /d/:token
   */
  app.get('/d/:token', async (c) => {
    const actor = getActor(c);
    const token = c.req.param('token');

    const result = await linkService.resolve(token);
    if (!result.success) {
      const reason = result.error.details?.reason ?? result.error.code;
      console.log(`[download] denied ${maskToken(token)}: ${String(reason)}`);
      return errorResponse(
        c,
        { code: 'LINK_UNAVAILABLE', message: 'This link is not available' },
        actor.requestId
      );
    }

    const file = result.data;
    try {
      await linkService.recordDownload(file);
    } catch (err) {
      // Counters lag; the link still serves
      console.error(`[download] could not count download of ${file.id}:`, err);
    }

    c.header(
      'X-Accel-Redirect',
      encodeURI(storage.publicPath(file.storageKey))
    );
    c.header('Content-Type', 'application/octet-stream');
    c.header('Content-Disposition', contentDisposition(file.originalName));
    c.header('Cache-Control', 'no-store');
    return c.body(null, 200);
  });

  return app;
}
