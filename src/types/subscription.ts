/**
 * Subscription Types
 * Quota plans per tier and the authorization grant returned by the gate
 */

import type { SubscriptionTier } from './user.js';

const MB = 1024 * 1024;
const GB = 1024 * MB;

/**
 * Limits that apply to a user's registered files
 */
export interface QuotaPlan {
  tier: SubscriptionTier;
  maxFileBytes: number;
  maxStorageBytes: number;
  maxFiles: number;
  maxLinkDays: number;
}

export const DEFAULT_PLANS: Record<SubscriptionTier, QuotaPlan> = {
  trial: {
    tier: 'trial',
    maxFileBytes: 50 * MB,
    maxStorageBytes: 100 * MB,
    maxFiles: 10,
    maxLinkDays: 7,
  },
  basic: {
    tier: 'basic',
    maxFileBytes: 512 * MB,
    maxStorageBytes: 5 * GB,
    maxFiles: 100,
    maxLinkDays: 14,
  },
  premium: {
    tier: 'premium',
    maxFileBytes: 2 * GB,
    maxStorageBytes: 50 * GB,
    maxFiles: 1000,
    maxLinkDays: 30,
  },
};

/**
 * Returned by SubscriptionService.authorize on success
 */
export interface AuthorizationGrant {
  userId: number;
  tier: SubscriptionTier;
  plan: QuotaPlan;
  isAdmin: boolean;
  expiresAt: Date | null;
}

/**
 * Subscription state as seen by the bot
 */
export interface SubscriptionSummary {
  tier: SubscriptionTier;
  active: boolean;
  onTrial: boolean;
  expiresAt: Date | null;
  daysRemaining: number | null; // null = lifetime
}
