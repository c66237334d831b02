/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { Failure, PaginatedResult } from '../../types/index.js';
import { getErrorStatus } from '../../types/index.js';
import type {
  ErrorResponse,
  PageResponse,
  SuccessResponse,
} from '../types.js';

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: Failure['error'],
  requestId: string
): Response {
  const body: ErrorResponse = {
    error: {
      code: error.code,
      message: error.message,
      ...(error.details !== undefined && { details: error.details }),
      requestId,
    },
  };
  return c.json(body, getErrorStatus(error.code));
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  const body: SuccessResponse<T> = {
    data,
    meta: { requestId },
  };
  return c.json(body, status);
}

/**
 * Create paginated success response from a cursor page
 */
export function paginatedResponse<T, R>(
  c: Context,
  page: PaginatedResult<T>,
  format: (item: T) => R,
  requestId: string
): Response {
  const body: SuccessResponse<PageResponse<R>> = {
    data: {
      items: page.items.map(format),
      nextCursor: page.nextCursor ?? null,
      hasMore: page.hasMore,
    },
    meta: { requestId },
  };
  return c.json(body);
}
