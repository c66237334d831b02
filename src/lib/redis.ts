/**
 * Upstash Redis Client Configuration
 * Backs the shared rate-limit store when several processes serve traffic
 */

import { Redis } from '@upstash/redis';

let redisInstance: Redis | null = null;

/**
 * Get the Redis client instance (lazy initialization)
 */
export function getRedis(config: { url: string; token: string }): Redis {
  if (redisInstance === null) {
    redisInstance = new Redis({
      url: config.url,
      token: config.token,
    });
  }
  return redisInstance;
}
