/**
 * UserService Implementation
 *
 * Purpose: Users of the bot, their block flags and subscription fields.
 * Owns: users
 * Dependencies: AuditService
 *
 * GUARDRAILS:
 * - Users are created on first interaction, starting a trial
 * - Users are never hard-deleted
 * - Only admins (or the system actor) may block, unblock or change plans
 * - Every admin mutation emits an audit event; no-op repeats do not
 */

import type {
  ActorContext,
  AuditEvent,
  BlockParams,
  EnsureUserParams,
  PaginatedResult,
  Result,
  SearchUsersParams,
  SetSubscriptionParams,
  SubscriptionStatus,
  User,
  UserCounts,
  UserUpdate,
} from '../types/index.js';
import {
  success,
  failure,
  canActFor,
  isPrivilegedActor,
  isBlockActive,
  normalizePaginationParams,
  SYSTEM_ACTOR,
} from '../types/index.js';

/**
 * Database abstraction interface for UserService
 */
export interface UserServiceDb {
  getUser: (userId: number) => Promise<User | null>;
  insertUser: (params: {
    id: number;
    username: string | null;
    fullName: string | null;
    trialStartedAt: Date;
  }) => Promise<User>;
  updateUser: (userId: number, update: UserUpdate) => Promise<User>;
  incrementCounters: (
    userId: number,
    delta: { uploads?: number; downloads?: number }
  ) => Promise<void>;
  searchUsers: (params: SearchUsersParams) => Promise<PaginatedResult<User>>;
  listActiveUsers: (params: {
    cursor?: string;
    limit: number;
  }) => Promise<PaginatedResult<User>>;
  listExpiringSubscriptions: (params: {
    from: Date;
    to: Date;
    limit: number;
    afterId?: number;
  }) => Promise<User[]>;
  countUsers: () => Promise<UserCounts>;
}

export interface UserServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

export interface UserService {
  ensureUser(
    actor: ActorContext,
    params: EnsureUserParams
  ): Promise<Result<{ user: User; created: boolean }>>;
  getUser(actor: ActorContext, userId: number): Promise<Result<User>>;
  searchUsers(
    actor: ActorContext,
    params: Partial<SearchUsersParams>
  ): Promise<Result<PaginatedResult<User>>>;
  setBlocked(
    actor: ActorContext,
    userId: number,
    blocked: boolean,
    params?: BlockParams
  ): Promise<Result<User>>;
  setSubscription(
    actor: ActorContext,
    userId: number,
    params: SetSubscriptionParams
  ): Promise<Result<User>>;
  recordSubscriptionStatus(
    userId: number,
    status: SubscriptionStatus
  ): Promise<void>;
  recordActivity(
    userId: number,
    delta: { uploads?: number; downloads?: number }
  ): Promise<void>;
  markReminderSent(userId: number, expiresAt: Date): Promise<void>;
  listActiveUsers(params: {
    cursor?: string;
    limit: number;
  }): Promise<PaginatedResult<User>>;
  listExpiringSubscriptions(from: Date, to: Date): AsyncIterable<User>;
  getCounts(actor: ActorContext): Promise<Result<UserCounts>>;
}

const EXPIRING_PAGE_SIZE = 500;
const HOUR_MS = 60 * 60 * 1000;
const MAX_BLOCK_HOURS = 24 * 365;

/**
 * Create UserService instance
 */
export function createUserService(deps: {
  db: UserServiceDb;
  auditService: UserServiceAudit;
  now?: () => Date;
}): UserService {
  const { db, auditService } = deps;
  const now = deps.now ?? (() => new Date());

  /**
   * Write back a temporary block whose time has run out
   */
  async function releaseLapsedBlock(user: User): Promise<User> {
    if (!user.isBlocked || isBlockActive(user, now())) {
      return user;
    }
    const released = await db.updateUser(user.id, {
      isBlocked: false,
      blockReason: null,
      blockedAt: null,
      blockedUntil: null,
    });
    await auditService.log(SYSTEM_ACTOR, {
      action: 'user:unblocked',
      resourceType: 'user',
      resourceId: String(user.id),
      details: { reason: 'temporary block expired' },
    });
    return released;
  }

  return {
    /**
     * First interaction: create the user on a fresh trial, or refresh
     * the display fields of an existing one
     */
    async ensureUser(
      actor: ActorContext,
      params: EnsureUserParams
    ): Promise<Result<{ user: User; created: boolean }>> {
      if (!Number.isSafeInteger(params.id) || params.id <= 0) {
        return failure('VALIDATION_ERROR', 'User ID must be a positive integer');
      }
      if (!canActFor(actor, params.id)) {
        return failure('FORBIDDEN', 'Cannot register another user');
      }

      const stored = await db.getUser(params.id);
      if (stored !== null) {
        const existing = await releaseLapsedBlock(stored);
        const update: UserUpdate = {};
        if (params.username !== undefined && params.username !== existing.username) {
          update.username = params.username;
        }
        if (params.fullName !== undefined && params.fullName !== existing.fullName) {
          update.fullName = params.fullName;
        }
        if (!existing.isActive) {
          update.isActive = true;
        }
        if (Object.keys(update).length === 0) {
          return success({ user: existing, created: false });
        }
        const user = await db.updateUser(params.id, update);
        return success({ user, created: false });
      }

      const user = await db.insertUser({
        id: params.id,
        username: params.username ?? null,
        fullName: params.fullName ?? null,
        trialStartedAt: now(),
      });

      await auditService.log(actor, {
        action: 'user:registered',
        resourceType: 'user',
        resourceId: String(user.id),
        details: { tier: user.tier },
      });

      return success({ user, created: true });
    },

    /**
     * Get a user - self or admin
     */
    async getUser(actor: ActorContext, userId: number): Promise<Result<User>> {
      if (!canActFor(actor, userId)) {
        return failure('FORBIDDEN', 'Cannot access another user');
      }

      const user = await db.getUser(userId);
      if (user === null) {
        return failure('NOT_FOUND', 'User not found');
      }
      return success(await releaseLapsedBlock(user));
    },

    async searchUsers(
      actor: ActorContext,
      params: Partial<SearchUsersParams>
    ): Promise<Result<PaginatedResult<User>>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'User search is restricted to admins');
      }

      const page = normalizePaginationParams(params);
      const search = params.search?.trim();
      const result = await db.searchUsers({
        ...page,
        ...(search !== undefined && search !== '' && { search }),
      });
      return success(result);
    },

    /**
     * Block or unblock a user, optionally for a number of hours
     * Idempotent: repeating the current state returns the user unchanged
     */
    async setBlocked(
      actor: ActorContext,
      userId: number,
      blocked: boolean,
      params: BlockParams = {}
    ): Promise<Result<User>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'Only admins can block users');
      }
      const { reason, durationHours } = params;
      if (
        durationHours !== undefined &&
        (!Number.isInteger(durationHours) ||
          durationHours < 1 ||
          durationHours > MAX_BLOCK_HOURS)
      ) {
        return failure(
          'VALIDATION_ERROR',
          `Block duration must be between 1 and ${MAX_BLOCK_HOURS} hours`
        );
      }

      const stored = await db.getUser(userId);
      if (stored === null) {
        return failure('NOT_FOUND', 'User not found');
      }
      const user = await releaseLapsedBlock(stored);
      const at = now();
      const until =
        blocked && durationHours !== undefined
          ? new Date(at.getTime() + durationHours * HOUR_MS)
          : null;
      if (user.isBlocked === blocked && (!blocked || durationHours === undefined)) {
        return success(user);
      }

      const updated = await db.updateUser(
        userId,
        blocked
          ? {
              isBlocked: true,
              blockReason: reason ?? null,
              blockedAt: at,
              blockedUntil: until,
            }
          : { isBlocked: false, blockReason: null, blockedAt: null, blockedUntil: null }
      );

      const details = {
        ...(reason !== undefined && { reason }),
        ...(until !== null && { until: until.toISOString() }),
      };
      await auditService.log(actor, {
        action: blocked ? 'user:blocked' : 'user:unblocked',
        resourceType: 'user',
        resourceId: String(userId),
        ...(Object.keys(details).length > 0 && { details }),
      });

      return success(updated);
    },

    /**
     * Set tier and expiry (admin only)
     * A null expiry on a paid tier means lifetime access
     */
    async setSubscription(
      actor: ActorContext,
      userId: number,
      params: SetSubscriptionParams
    ): Promise<Result<User>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'Only admins can change subscriptions');
      }
      if (params.tier === 'trial' && params.expiresAt !== null) {
        return failure(
          'VALIDATION_ERROR',
          'Trial length comes from TRIAL_DAYS, not an expiry date'
        );
      }

      const user = await db.getUser(userId);
      if (user === null) {
        return failure('NOT_FOUND', 'User not found');
      }

      const updated = await db.updateUser(userId, {
        tier: params.tier,
        subscriptionExpiresAt: params.expiresAt,
        subscriptionStatus: 'active',
        reminderSentFor: null,
      });

      await auditService.log(actor, {
        action: 'subscription:updated',
        resourceType: 'user',
        resourceId: String(userId),
        details: {
          previousTier: user.tier,
          previousExpiresAt: user.subscriptionExpiresAt?.toISOString() ?? null,
          tier: params.tier,
          expiresAt: params.expiresAt?.toISOString() ?? null,
        },
      });

      return success(updated);
    },

    async recordSubscriptionStatus(
      userId: number,
      status: SubscriptionStatus
    ): Promise<void> {
      await db.updateUser(userId, { subscriptionStatus: status });
    },

    async recordActivity(
      userId: number,
      delta: { uploads?: number; downloads?: number }
    ): Promise<void> {
      await db.incrementCounters(userId, delta);
    },

    async markReminderSent(userId: number, expiresAt: Date): Promise<void> {
      await db.updateUser(userId, { reminderSentFor: expiresAt });
    },

    /**
     * Unblocked, active users - broadcast recipients
     */
    async listActiveUsers(params: {
      cursor?: string;
      limit: number;
    }): Promise<PaginatedResult<User>> {
      return db.listActiveUsers(normalizePaginationParams(params));
    },

    /**
     * Paid subscriptions ending within [from, to] that have not been
     * reminded for their current expiry, in id order
     */
    listExpiringSubscriptions(from: Date, to: Date): AsyncIterable<User> {
      return {
        async *[Symbol.asyncIterator]() {
          let afterId: number | undefined;
          for (;;) {
            const page = await db.listExpiringSubscriptions({
              from,
              to,
              limit: EXPIRING_PAGE_SIZE,
              ...(afterId !== undefined && { afterId }),
            });
            yield* page;
            const last = page[page.length - 1];
            if (page.length < EXPIRING_PAGE_SIZE || last === undefined) {
              return;
            }
            afterId = last.id;
          }
        },
      };
    },

    async getCounts(actor: ActorContext): Promise<Result<UserCounts>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'Statistics are restricted to admins');
      }
      return success(await db.countUsers());
    },
  };
}
