/**
 * Error Catalog
 *
 * Every failure a service can return carries one of these codes.
 * Each code maps to exactly one HTTP status and one message category,
 * so the bot front end can pick a reply without looking at internals.
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'OWNER_MISMATCH'
  | 'QUOTA_EXCEEDED'
  | 'SUBSCRIPTION_EXPIRED'
  | 'USER_BLOCKED'
  | 'CHANNEL_MEMBERSHIP_REQUIRED'
  | 'RATE_LIMITED'
  | 'SIZE_TOO_LARGE'
  | 'EXTENSION_BLOCKED'
  | 'INVALID_TOKEN'
  | 'STORAGE_IO_FAILURE'
  | 'VALIDATION_ERROR'
  | 'UNSAFE_URL'
  | 'FETCH_FAILED'
  | 'TRANSFER_ABORTED'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'BOT_PAUSED'
  | 'LINK_UNAVAILABLE'
  | 'INTERNAL_ERROR';

/**
 * User-facing reply categories
 */
export type MessageCategory =
  | 'not_found'
  | 'not_allowed'
  | 'limit_reached'
  | 'subscription_required'
  | 'blocked'
  | 'join_channel'
  | 'slow_down'
  | 'invalid_file'
  | 'link_unavailable'
  | 'invalid_request'
  | 'maintenance'
  | 'try_again_later';

export type ErrorStatus = 400 | 401 | 402 | 403 | 404 | 413 | 429 | 500 | 502 | 503;

export interface ErrorCatalogEntry {
  status: ErrorStatus;
  category: MessageCategory;
}

export const ERROR_CATALOG: Record<ErrorCode, ErrorCatalogEntry> = {
  NOT_FOUND: { status: 404, category: 'not_found' },
  OWNER_MISMATCH: { status: 403, category: 'not_allowed' },
  QUOTA_EXCEEDED: { status: 402, category: 'limit_reached' },
  SUBSCRIPTION_EXPIRED: { status: 402, category: 'subscription_required' },
  USER_BLOCKED: { status: 403, category: 'blocked' },
  CHANNEL_MEMBERSHIP_REQUIRED: { status: 403, category: 'join_channel' },
  RATE_LIMITED: { status: 429, category: 'slow_down' },
  SIZE_TOO_LARGE: { status: 413, category: 'invalid_file' },
  EXTENSION_BLOCKED: { status: 400, category: 'invalid_file' },
  INVALID_TOKEN: { status: 404, category: 'link_unavailable' },
  STORAGE_IO_FAILURE: { status: 500, category: 'try_again_later' },
  VALIDATION_ERROR: { status: 400, category: 'invalid_request' },
  UNSAFE_URL: { status: 400, category: 'invalid_request' },
  FETCH_FAILED: { status: 502, category: 'try_again_later' },
  TRANSFER_ABORTED: { status: 400, category: 'try_again_later' },
  UNAUTHORIZED: { status: 401, category: 'not_allowed' },
  FORBIDDEN: { status: 403, category: 'not_allowed' },
  BOT_PAUSED: { status: 503, category: 'maintenance' },
  LINK_UNAVAILABLE: { status: 404, category: 'link_unavailable' },
  INTERNAL_ERROR: { status: 500, category: 'try_again_later' },
};

export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_CATALOG[code].status;
}

export function getMessageCategory(code: ErrorCode): MessageCategory {
  return ERROR_CATALOG[code].category;
}
