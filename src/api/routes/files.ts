/**
 * File Routes
 * Bot-facing upload, listing, deletion and link regeneration
 *
 * Upload and from-url run their own admission (blocked, upload rate
 * limit, subscription gate) inside RegistrationService. Every other route
 * runs behind the access check and the command rate limit.
 */

import type { Context, MiddlewareHandler } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type {
  FileService,
  LinkService,
  RegistrationService,
} from '../../services/index.js';
import { MAX_BULK_DELETE } from '../../services/index.js';
import type { ActorContext, File } from '../../types/index.js';
import { formatFile } from '../utils/format.js';
import {
  errorResponse,
  paginatedResponse,
  successResponse,
} from '../utils/response.js';

const MAX_LIMIT = 100;
const DEFAULT_LIMIT = 20;

interface FileRoutesDeps {
  fileService: Pick<
    FileService,
    'get' | 'listFiles' | 'softDelete' | 'softDeleteMany' | 'getStorageUsage'
  >;
  linkService: Pick<LinkService, 'regenerate' | 'buildDownloadUrl'>;
  registrationService: RegistrationService;
  access: MiddlewareHandler;
  commandLimit: MiddlewareHandler;
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
 * Non-negative integer header, null when absent or malformed
 */
function parseSizeHeader(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return null;
  }
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * File names may arrive percent-encoded since headers are ASCII
 */
function decodeFileName(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

// Zod Schemas
const expiryDaysSchema = z.coerce.number().int().positive();

const fromUrlSchema = z.object({
  url: z.string().min(1, 'URL is required'),
  name: z.string().min(1).optional(),
  expiryDays: expiryDaysSchema.optional(),
});

const bulkDeleteSchema = z.object({
  ids: z
    .array(z.string().min(1))
    .min(1, 'At least one file ID is required')
    .max(
      MAX_BULK_DELETE,
      `At most ${MAX_BULK_DELETE} files can be deleted at once`
    ),
});

/**
 * Create file routes
 */
export function createFileRoutes(deps: FileRoutesDeps): Hono {
  const { fileService, linkService, registrationService } = deps;
  // Blocked and expired users are refused before the command limit
  const { access, commandLimit } = deps;
  const app = new Hono();

  async function withUrl(file: File) {
    return {
      ...formatFile(file),
      url:
        file.downloadToken !== null && !file.isDeleted
          ? await linkService.buildDownloadUrl(file.downloadToken)
          : null,
    };
  }

  function missingUser(c: Context, requestId: string): Response {
    return errorResponse(
      c,
      { code: 'UNAUTHORIZED', message: 'User ID not found in request' },
      requestId
    );
  }

  /**
   * POST /files/upload
   * Raw body; X-File-Name, Content-Length and optional X-Expiry-Days
   */
  app.post('/files/upload', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const rawName = c.req.header('X-File-Name');
    if (rawName === undefined || rawName.trim() === '') {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: 'X-File-Name header is required',
        },
        requestId
      );
    }

    const rawExpiry = c.req.header('X-Expiry-Days');
    let expiryDays: number | undefined;
    if (rawExpiry !== undefined) {
      const parsed = expiryDaysSchema.safeParse(rawExpiry);
      if (!parsed.success) {
        return errorResponse(
          c,
          {
            code: 'VALIDATION_ERROR',
            message: 'X-Expiry-Days must be a positive integer',
          },
          requestId
        );
      }
      expiryDays = parsed.data;
    }

    const body = c.req.raw.body;
    if (body === null) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'Request body is required' },
        requestId
      );
    }

    const result = await registrationService.registerUpload(actor, {
      name: decodeFileName(rawName.trim()),
      declaredSize: parseSizeHeader(c.req.header('Content-Length')),
      body,
      mimeType: c.req.header('Content-Type') ?? null,
      signal: c.req.raw.signal,
      ...(expiryDays !== undefined && { expiryDays }),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        file: formatFile(result.data.file),
        url: result.data.url,
        deduplicated: result.data.deduplicated,
      },
      requestId,
      201
    );
  });

  /**
   * POST /files/from-url
   * Fetch a remote file and register it
   */
  app.post('/files/from-url', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    let rawBody: unknown;
    try {
      rawBody = await c.req.json();
    } catch {
      rawBody = {};
    }

    const validation = fromUrlSchema.safeParse(rawBody);
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message:
            validation.error.issues[0]?.message ?? 'Invalid request body',
        },
        requestId
      );
    }

    const body = validation.data;
    const result = await registrationService.registerFromUrl(actor, {
      url: body.url,
      signal: c.req.raw.signal,
      ...(body.name !== undefined && { name: body.name }),
      ...(body.expiryDays !== undefined && { expiryDays: body.expiryDays }),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        file: formatFile(result.data.file),
        url: result.data.url,
        deduplicated: result.data.deduplicated,
      },
      requestId,
      201
    );
  });

  /**
   * GET /files
   * The acting user's live files, newest first
   */
  app.get('/files', access, commandLimit, async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    if (actor.userId === undefined) {
      return missingUser(c, requestId);
    }

    const cursor = c.req.query('cursor');
    const search = c.req.query('search');
    const result = await fileService.listFiles(actor, actor.userId, {
      limit: parseLimit(c.req.query('limit')),
      ...(cursor !== undefined && { cursor }),
      ...(search !== undefined && { search }),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return paginatedResponse(c, result.data, formatFile, requestId);
  });

  /**
   * GET /files/usage
   * Storage used against the plan
   */
  app.get('/files/usage', access, commandLimit, async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    if (actor.userId === undefined) {
      return missingUser(c, requestId);
    }

    const result = await fileService.getStorageUsage(actor, actor.userId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /files/:id
   */
  app.get('/files/:id', access, commandLimit, async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await fileService.get(actor, c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, await withUrl(result.data), requestId);
  });

  /**
   * POST /files/bulk-delete
   * Soft delete several files at once; ids that cannot be deleted are skipped
   */
  app.post('/files/bulk-delete', access, commandLimit, async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    let rawBody: unknown;
    try {
      rawBody = await c.req.json();
    } catch {
      rawBody = {};
    }

    const validation = bulkDeleteSchema.safeParse(rawBody);
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message:
            validation.error.issues[0]?.message ?? 'Invalid request body',
        },
        requestId
      );
    }

    const result = await fileService.softDeleteMany(actor, validation.data.ids);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * DELETE /files/:id
   * Soft delete; repeating it is not an error
   */
  app.delete('/files/:id', access, commandLimit, async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await fileService.softDelete(actor, c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      { id: result.data.file.id, alreadyDeleted: result.data.alreadyDeleted },
      requestId
    );
  });

  /**
   * POST /files/:id/regenerate
   * New link; the previous one stops working immediately
   */
  app.post('/files/:id/regenerate', access, commandLimit, async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await linkService.regenerate(actor, c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        file: formatFile(result.data.file),
        url: await linkService.buildDownloadUrl(result.data.token),
        previousDownloadCount: result.data.previousDownloadCount,
      },
      requestId
    );
  });

  return app;
}
