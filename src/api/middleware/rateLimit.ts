/**
 * Rate Limiting Middleware
 * Admits each request through RateLimitService for one action class
 */

import type { Context, Next } from 'hono';

import type {
  ActionClass,
  RateDecision,
  Result,
} from '../../types/index.js';
import { errorResponse } from '../utils/response.js';

/**
 * Rate limiter interface (injectable for testing)
 */
export interface RateLimiter {
  admit: (
    subject: string,
    actionClass: ActionClass
  ) => Promise<Result<RateDecision>>;
}

export interface RateLimitConfig {
  actionClass: ActionClass;

  /**
   * Optional: Get subject from context (defaults to user, then IP)
   */
  getSubject?: (c: Context) => string;
}

/**
 * Get subject from context
 * Priority: userId > IP > 'unknown'
 */
export function defaultGetSubject(c: Context): string {
  const actor = c.get('actor');
  if (actor.userId !== undefined) {
    return `user:${actor.userId}`;
  }
  return `ip:${actor.ip ?? 'unknown'}`;
}

/**
 * Create rate limit middleware
 */
export function createRateLimitMiddleware(
  rateLimiter: RateLimiter,
  config: RateLimitConfig
) {
  const getSubject = config.getSubject ?? defaultGetSubject;

  return async function rateLimitMiddleware(c: Context, next: Next) {
    const result = await rateLimiter.admit(getSubject(c), config.actionClass);

    if (!result.success) {
      const details = result.error.details;
      if (typeof details?.limit === 'number') {
        c.header('X-RateLimit-Limit', details.limit.toString());
      }
      c.header('X-RateLimit-Remaining', '0');
      if (typeof details?.retryAfter === 'number') {
        c.header('Retry-After', details.retryAfter.toString());
      }
      return errorResponse(c, result.error, c.get('requestId'));
    }

    c.header('X-RateLimit-Limit', result.data.limit.toString());
    c.header('X-RateLimit-Remaining', result.data.remaining.toString());
    return next();
  };
}
