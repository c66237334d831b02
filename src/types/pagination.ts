/**
 * Pagination Types
 * Cursor-based paging shared by all list operations
 */

export interface PaginationParams {
  cursor?: string; // created_at of the last item seen
  limit: number; // Max items per page (default: 20, max: 100)
}

export interface PaginatedResult<T> {
  items: T[];
  nextCursor?: string; // Undefined if no more items
  hasMore: boolean;
}

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

/**
 * Normalize pagination params with defaults
 */
export function normalizePaginationParams(
  params: Partial<PaginationParams>
): PaginationParams {
  const limit = Math.min(
    Math.max(params.limit ?? DEFAULT_PAGE_LIMIT, 1),
    MAX_PAGE_LIMIT
  );
  const result: PaginationParams = { limit };
  if (params.cursor !== undefined) {
    result.cursor = params.cursor;
  }
  return result;
}

/**
 * Position after the last item of a page ordered by created_at, id
 * (both descending). Rows sharing a timestamp stay distinct.
 */
export interface KeysetCursor {
  createdAt: string;
  id: string;
}

const CURSOR_ID = /^[A-Za-z0-9_-]+$/;

export function encodeKeysetCursor(createdAt: Date, id: string): string {
  return `${createdAt.toISOString()}|${id}`;
}

/**
 * Null when the cursor was not produced by encodeKeysetCursor
 */
export function decodeKeysetCursor(cursor: string): KeysetCursor | null {
  const separator = cursor.indexOf('|');
  if (separator === -1) {
    return null;
  }
  const createdAt = cursor.slice(0, separator);
  const id = cursor.slice(separator + 1);
  const parsed = new Date(createdAt);
  if (
    Number.isNaN(parsed.getTime()) ||
    parsed.toISOString() !== createdAt ||
    !CURSOR_ID.test(id)
  ) {
    return null;
  }
  return { createdAt, id };
}
