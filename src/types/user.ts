/**
 * User Types
 *
 * Users are created on first interaction with the bot and are never
 * hard-deleted, only flagged inactive or blocked.
 */

export type SubscriptionTier = 'trial' | 'basic' | 'premium';

/**
 * Stored subscription state
 * Re-derived from timestamps by the subscription gate on every call
 */
export type SubscriptionStatus = 'active' | 'expired';

export interface User {
  id: number;
  username: string | null;
  fullName: string | null;
  tier: SubscriptionTier;
  subscriptionStatus: SubscriptionStatus;
  subscriptionExpiresAt: Date | null; // null = lifetime (paid tiers only)
  trialStartedAt: Date;
  isBlocked: boolean;
  blockReason: string | null;
  blockedAt: Date | null;
  blockedUntil: Date | null; // null = until an admin lifts it
  isActive: boolean;
  uploadCount: number;
  downloadCount: number;
  reminderSentFor: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * First-interaction registration
 */
export interface EnsureUserParams {
  id: number;
  username?: string | null;
  fullName?: string | null;
}

export interface UserUpdate {
  username?: string | null;
  fullName?: string | null;
  tier?: SubscriptionTier;
  subscriptionStatus?: SubscriptionStatus;
  subscriptionExpiresAt?: Date | null;
  isBlocked?: boolean;
  blockReason?: string | null;
  blockedAt?: Date | null;
  blockedUntil?: Date | null;
  isActive?: boolean;
  reminderSentFor?: Date | null;
}

export interface BlockParams {
  reason?: string;
  durationHours?: number; // omitted = permanent
}

/**
 * A temporary block stops counting once blockedUntil has passed
 */
export function isBlockActive(user: User, at: Date): boolean {
  return (
    user.isBlocked &&
    (user.blockedUntil === null || at.getTime() < user.blockedUntil.getTime())
  );
}

export interface SetSubscriptionParams {
  tier: SubscriptionTier;
  expiresAt: Date | null;
}

export interface SearchUsersParams {
  search?: string;
  cursor?: string;
  limit: number;
}

export interface UserCounts {
  total: number;
  blocked: number;
  active: number;
}
