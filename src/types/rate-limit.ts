/**
 * Rate Limit Types
 */

/**
 * Independent counters are kept per action class
 */
export type ActionClass = 'command' | 'upload' | 'download' | 'broadcast';

export const ACTION_CLASSES: readonly ActionClass[] = [
  'command',
  'upload',
  'download',
  'broadcast',
];

export interface RateLimitRule {
  limit: number;
  windowMs: number;
}

export type RateLimitRules = Record<ActionClass, RateLimitRule>;

export const DEFAULT_RATE_LIMIT_RULES: RateLimitRules = {
  command: { limit: 30, windowMs: 60_000 },
  upload: { limit: 10, windowMs: 60_000 },
  download: { limit: 60, windowMs: 60_000 },
  broadcast: { limit: 1, windowMs: 1_000 },
};

/**
 * Outcome of an admitted action
 */
export interface RateDecision {
  actionClass: ActionClass;
  limit: number;
  remaining: number;
  windowMs: number;
}
