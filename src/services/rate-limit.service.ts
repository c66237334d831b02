/**
 * RateLimitService Implementation
 *
 * Sliding-log limiter: per (subject, action class) an ordered list of
 * admission timestamps, pruned to the window on every check. The
 * (N+1)th request inside the window is denied with the time until the
 * oldest entry leaves it.
 *
 * Stores:
 * - in-memory, for a single process and tests
 * - Redis sorted sets, for several processes (see rate-limit.redis.ts)
 */

import type {
  ActionClass,
  RateDecision,
  RateLimitRules,
  Result,
} from '../types/index.js';
import { success, failure, DEFAULT_RATE_LIMIT_RULES } from '../types/index.js';

export interface SlidingLogResult {
  allowed: boolean;
  count: number; // entries in the window after this call
  oldestAt: number | null; // epoch ms of the oldest entry in the window
}

/**
 * Atomic check-and-record over one key
 */
export interface RateLimitStore {
  hit: (
    key: string,
    nowMs: number,
    windowMs: number,
    limit: number
  ) => Promise<SlidingLogResult>;
}

export interface RateLimitService {
  admit(subject: string, actionClass: ActionClass): Promise<Result<RateDecision>>;
  getRule(actionClass: ActionClass): { limit: number; windowMs: number };
}

export interface InMemoryRateLimitStore extends RateLimitStore {
  /** Keys currently held */
  size(): number;
}

interface SlidingLog {
  stamps: number[];
  // Every stamp has left the window by then
  idleAt: number;
}

/**
 * In-process store
 * Each key holds its timestamps oldest first. Keys whose window has
 * emptied are dropped by a sweep at most once per sweepIntervalMs.
 */
export function createInMemoryRateLimitStore(
  options: { sweepIntervalMs?: number } = {}
): InMemoryRateLimitStore {
  const sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
  const logs = new Map<string, SlidingLog>();
  let lastSweepAt: number | null = null;

  function sweep(nowMs: number): void {
    if (lastSweepAt !== null && nowMs - lastSweepAt < sweepIntervalMs) {
      return;
    }
    lastSweepAt = nowMs;
    for (const [key, log] of logs) {
      if (log.idleAt <= nowMs) {
        logs.delete(key);
      }
    }
  }

  return {
    async hit(
      key: string,
      nowMs: number,
      windowMs: number,
      limit: number
    ): Promise<SlidingLogResult> {
      sweep(nowMs);

      const cutoff = nowMs - windowMs;
      const stamps = (logs.get(key)?.stamps ?? []).filter((at) => at > cutoff);

      const allowed = stamps.length < limit;
      if (allowed) {
        stamps.push(nowMs);
      }

      const newest = stamps[stamps.length - 1];
      if (newest === undefined) {
        logs.delete(key);
      } else {
        logs.set(key, { stamps, idleAt: newest + windowMs });
      }

      return { allowed, count: stamps.length, oldestAt: stamps[0] ?? null };
    },

    size(): number {
      return logs.size;
    },
  };
}

/**
 * Create RateLimitService instance
 */
export function createRateLimitService(deps: {
  store: RateLimitStore;
  rules?: RateLimitRules;
  now?: () => number;
}): RateLimitService {
  const { store } = deps;
  const rules = deps.rules ?? DEFAULT_RATE_LIMIT_RULES;
  const now = deps.now ?? (() => Date.now());

  return {
    async admit(
      subject: string,
      actionClass: ActionClass
    ): Promise<Result<RateDecision>> {
      const rule = rules[actionClass];
      const nowMs = now();
      const result = await store.hit(
        `ratelimit:${actionClass}:${subject}`,
        nowMs,
        rule.windowMs,
        rule.limit
      );

      if (!result.allowed) {
        const oldest = result.oldestAt ?? nowMs;
        const retryAfterMs = Math.min(
          rule.windowMs,
          Math.max(1, oldest + rule.windowMs - nowMs)
        );
        return failure('RATE_LIMITED', 'Too many requests', {
          actionClass,
          limit: rule.limit,
          retryAfterMs,
          retryAfter: Math.ceil(retryAfterMs / 1000),
        });
      }

      return success({
        actionClass,
        limit: rule.limit,
        remaining: Math.max(0, rule.limit - result.count),
        windowMs: rule.windowMs,
      });
    },

    getRule(actionClass: ActionClass) {
      return rules[actionClass];
    },
  };
}
