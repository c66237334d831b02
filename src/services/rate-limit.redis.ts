/**
 * Redis RateLimitStore
 * One sorted set per key, scored by admission time. The Lua script
 * prunes, counts and records in a single round trip.
 */

import type { Redis } from '@upstash/redis';
import { nanoid } from 'nanoid';
import { z } from 'zod';

import type { RateLimitStore, SlidingLogResult } from './rate-limit.service.js';

const SLIDING_LOG_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])
redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)
local allowed = 0
if count < limit then
  redis.call('ZADD', key, now, ARGV[4])
  count = count + 1
  allowed = 1
end
redis.call('PEXPIRE', key, window)
local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
local oldestAt = -1
if oldest[2] then
  oldestAt = tonumber(oldest[2])
end
return { allowed, count, oldestAt }
`;

const scriptReply = z.tuple([z.number(), z.number(), z.number()]);

export function createRedisRateLimitStore(
  redis: Pick<Redis, 'eval'>
): RateLimitStore {
  return {
    async hit(
      key: string,
      nowMs: number,
      windowMs: number,
      limit: number
    ): Promise<SlidingLogResult> {
      const reply = await redis.eval(
        SLIDING_LOG_SCRIPT,
        [key],
        [nowMs, windowMs, limit, `${nowMs}-${nanoid(8)}`]
      );

      const parsed = scriptReply.safeParse(reply);
      if (!parsed.success) {
        throw new Error(`Unexpected rate limit script reply for ${key}`);
      }

      const [allowed, count, oldestAt] = parsed.data;
      return {
        allowed: allowed === 1,
        count,
        oldestAt: oldestAt >= 0 ? oldestAt : null,
      };
    },
  };
}
