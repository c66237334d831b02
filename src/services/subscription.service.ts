/**
 * SubscriptionService Implementation (subscription gate)
 *
 * SCOPE: Authorization of user actions, quota plans, trial handling
 *
 * Checks run in this order on every call, with nothing cached:
 * 1. blocked users are denied (admins included)
 * 2. channel membership, when a required channel is configured
 * 3. subscription state, derived from timestamps
 *
 * The stored status is only a record of the last evaluation. It flips to
 * 'expired' when a check fails and back to 'active' when an admin has
 * moved the expiry into the future.
 *
 * Dependencies: UserService (status write-back), SettingsService,
 * ChannelMembershipLookup, AuditService
 */

import type {
  ActionClass,
  ActorContext,
  AuditEvent,
  AuthorizationGrant,
  QuotaPlan,
  Result,
  SettingKey,
  SettingValues,
  SubscriptionStatus,
  SubscriptionSummary,
  SubscriptionTier,
  User,
} from '../types/index.js';
import {
  success,
  failure,
  isBlockActive,
  DEFAULT_PLANS,
  SYSTEM_ACTOR,
} from '../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Answers whether a user belongs to a channel.
 * null means the platform could not say.
 */
export interface ChannelMembershipLookup {
  isMember: (
    channel: string,
    userId: number,
    options?: { signal?: AbortSignal }
  ) => Promise<boolean | null>;
}

export interface SubscriptionServiceUsers {
  recordSubscriptionStatus: (
    userId: number,
    status: SubscriptionStatus
  ) => Promise<void>;
}

export interface SubscriptionServiceSettings {
  get<K extends SettingKey>(key: K): Promise<SettingValues[K]>;
}

export interface SubscriptionServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

export interface SubscriptionService {
  authorize(
    user: User,
    action: ActionClass
  ): Promise<Result<AuthorizationGrant>>;
  getSummary(user: User): Promise<SubscriptionSummary>;
  getPlan(user: User): QuotaPlan;
  isAdmin(userId: number): Promise<boolean>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

/**
 * When the current entitlement ends; null = never
 */
function entitlementEnd(user: User, trialDays: number): Date | null {
  if (user.tier === 'trial') {
    return new Date(user.trialStartedAt.getTime() + trialDays * DAY_MS);
  }
  return user.subscriptionExpiresAt;
}

function daysUntil(end: Date, now: Date): number {
  return Math.max(0, Math.ceil((end.getTime() - now.getTime()) / DAY_MS));
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create SubscriptionService instance
 */
export function createSubscriptionService(deps: {
  users: SubscriptionServiceUsers;
  settings: SubscriptionServiceSettings;
  auditService: SubscriptionServiceAudit;
  membership?: ChannelMembershipLookup;
  membershipTimeoutMs?: number;
  plans?: Record<SubscriptionTier, QuotaPlan>;
  now?: () => Date;
}): SubscriptionService {
  const { users, settings, auditService, membership } = deps;
  const membershipTimeoutMs = deps.membershipTimeoutMs ?? 5_000;
  const plans = deps.plans ?? DEFAULT_PLANS;
  const now = deps.now ?? (() => new Date());

  async function isAdmin(userId: number): Promise<boolean> {
    const adminIds = await settings.get('ADMIN_IDS');
    return adminIds.includes(userId);
  }

  /**
   * Rejects once membershipTimeoutMs passes, whether or not the lookup
   * honours the abort signal
   */
  function lookupMembership(
    lookup: ChannelMembershipLookup,
    channel: string,
    userId: number
  ): Promise<boolean | null> {
    const controller = new AbortController();
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        controller.abort();
        reject(new Error(`Membership lookup timed out after ${membershipTimeoutMs}ms`));
      }, membershipTimeoutMs);

      lookup.isMember(channel, userId, { signal: controller.signal }).then(
        (answer) => {
          clearTimeout(timeout);
          resolve(answer);
        },
        (err: unknown) => {
          clearTimeout(timeout);
          reject(err);
        }
      );
    });
  }

  /**
   * Fails closed: a lookup error, a timeout or an unknown answer is a denial
   */
  async function checkMembership(
    channel: string,
    userId: number
  ): Promise<boolean> {
    if (membership === undefined) {
      console.error('[gate] required channel set but no membership lookup configured');
      return false;
    }
    try {
      return (await lookupMembership(membership, channel, userId)) === true;
    } catch (err) {
      console.error(`[gate] membership lookup failed for user ${userId}:`, err);
      return false;
    }
  }

  async function syncStatus(user: User, active: boolean): Promise<void> {
    const status: SubscriptionStatus = active ? 'active' : 'expired';
    if (user.subscriptionStatus === status) {
      return;
    }
    await users.recordSubscriptionStatus(user.id, status);
    await auditService.log(SYSTEM_ACTOR, {
      action: active ? 'subscription:restored' : 'subscription:expired',
      resourceType: 'user',
      resourceId: String(user.id),
      details: { tier: user.tier },
    });
  }

  return {
    async authorize(
      user: User,
      action: ActionClass
    ): Promise<Result<AuthorizationGrant>> {
      if (isBlockActive(user, now())) {
        return failure('USER_BLOCKED', 'User is blocked', { action });
      }

      const admin = await isAdmin(user.id);
      const plan = plans[user.tier];

      if (!admin) {
        const channel = await settings.get('REQUIRED_CHANNEL');
        if (channel !== null && !(await checkMembership(channel, user.id))) {
          return failure(
            'CHANNEL_MEMBERSHIP_REQUIRED',
            'Join the required channel first',
            { channel, action }
          );
        }
      }

      const trialDays = await settings.get('TRIAL_DAYS');
      const end = entitlementEnd(user, trialDays);
      const active = end === null || now() < end;

      if (!admin) {
        await syncStatus(user, active);
        if (!active) {
          return failure('SUBSCRIPTION_EXPIRED', 'Subscription has expired', {
            tier: user.tier,
            expiredAt: end?.toISOString() ?? null,
            action,
          });
        }
      }

      return success({
        userId: user.id,
        tier: user.tier,
        plan,
        isAdmin: admin,
        expiresAt: end,
      });
    },

    async getSummary(user: User): Promise<SubscriptionSummary> {
      const trialDays = await settings.get('TRIAL_DAYS');
      const end = entitlementEnd(user, trialDays);
      const current = now();

      return {
        tier: user.tier,
        active: end === null || current < end,
        onTrial: user.tier === 'trial',
        expiresAt: end,
        daysRemaining: end === null ? null : daysUntil(end, current),
      };
    },

    getPlan(user: User): QuotaPlan {
      return plans[user.tier];
    },

    isAdmin,
  };
}
