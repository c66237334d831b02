/**
 * AdminService Implementation (admin moderation)
 *
 * Operator actions from the web panel. Everything here is idempotent
 * except broadcast. Reads and writes go through the owning services so
 * their audit events and guards still apply.
 *
 * Broadcast goes through the rate limiter's broadcast class, one key per
 * recipient, with bounded concurrency and a per-send timeout. A failed
 * recipient is reported, never fatal to the batch.
 *
 * Dependencies: UserService, FileService, LinkService, SettingsService,
 * RateLimitService, ChatMessenger, PauseSwitch, AuditService
 */

import type { PauseSwitch } from '../lib/pause.js';
import type { ChatMessenger } from '../lib/telegram.js';
import type {
  ActorContext,
  AuditEvent,
  BlockParams,
  File,
  FileTotals,
  PaginatedResult,
  Result,
  SearchUsersParams,
  SetSubscriptionParams,
  SettingEntry,
  User,
  UserCounts,
} from '../types/index.js';
import { success, failure, isPrivilegedActor } from '../types/index.js';

import type { FileService, SearchFilesParams } from './file.service.js';
import type { InvalidTokenReason, LinkService } from './link.service.js';
import type { RateLimitService } from './rate-limit.service.js';
import type { SettingsService } from './settings.service.js';
import type { UserService } from './user.service.js';

const BROADCAST_PAGE_SIZE = 100;
const MAX_BROADCAST_LENGTH = 4096;

export type BroadcastFailureCode = 'RATE_LIMITED' | 'SEND_FAILED' | 'TIMEOUT';

export interface BroadcastReport {
  total: number;
  sent: number;
  failed: Array<{ userId: number; code: BroadcastFailureCode }>;
}

export interface LinkInspection {
  valid: boolean;
  reason: InvalidTokenReason | null;
  file: File | null;
}

export interface BotStatus {
  paused: boolean;
}

export interface AdminStats {
  users: UserCounts;
  files: FileTotals;
  paused: boolean;
}

export interface AdminServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

export interface AdminService {
  blockUser(
    actor: ActorContext,
    userId: number,
    params?: BlockParams
  ): Promise<Result<User>>;
  unblockUser(actor: ActorContext, userId: number): Promise<Result<User>>;
  searchUsers(
    actor: ActorContext,
    params: Partial<SearchUsersParams>
  ): Promise<Result<PaginatedResult<User>>>;
  setSubscription(
    actor: ActorContext,
    userId: number,
    params: SetSubscriptionParams
  ): Promise<Result<User>>;
  searchFiles(
    actor: ActorContext,
    params: Partial<SearchFilesParams>
  ): Promise<Result<PaginatedResult<File>>>;
  deleteFile(
    actor: ActorContext,
    fileId: string
  ): Promise<Result<{ file: File; alreadyDeleted: boolean }>>;
  inspectLink(actor: ActorContext, token: string): Promise<Result<LinkInspection>>;
  listSettings(actor: ActorContext): Promise<Result<SettingEntry[]>>;
  updateSetting(
    actor: ActorContext,
    key: string,
    value: unknown
  ): Promise<Result<SettingEntry>>;
  pauseBot(actor: ActorContext): Promise<Result<BotStatus>>;
  resumeBot(actor: ActorContext): Promise<Result<BotStatus>>;
  isPaused(): boolean;
  broadcast(actor: ActorContext, message: string): Promise<Result<BroadcastReport>>;
  getStats(actor: ActorContext): Promise<Result<AdminStats>>;
}

function isTimeout(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === 'TimeoutError' || err.name === 'AbortError')
  );
}

/**
 * Create AdminService instance
 */
export function createAdminService(deps: {
  users: Pick<
    UserService,
    'setBlocked' | 'searchUsers' | 'setSubscription' | 'listActiveUsers' | 'getCounts'
  >;
  files: Pick<FileService, 'searchFiles' | 'softDelete' | 'getTotals'>;
  links: Pick<LinkService, 'resolve'>;
  settings: Pick<SettingsService, 'list' | 'update'>;
  rateLimiter: Pick<RateLimitService, 'admit'>;
  messenger: ChatMessenger;
  pause: PauseSwitch;
  auditService: AdminServiceAudit;
  broadcastConcurrency?: number;
  sendTimeoutMs?: number;
}): AdminService {
  const { users, files, links, settings, rateLimiter, messenger, pause, auditService } =
    deps;
  const concurrency = Math.max(1, deps.broadcastConcurrency ?? 5);
  const sendTimeoutMs = deps.sendTimeoutMs ?? 10_000;

  async function sendOne(
    userId: number,
    message: string
  ): Promise<BroadcastFailureCode | null> {
    try {
      const admitted = await rateLimiter.admit(`recipient:${userId}`, 'broadcast');
      if (!admitted.success) {
        return 'RATE_LIMITED';
      }
      await messenger.sendMessage(userId, message, {
        signal: AbortSignal.timeout(sendTimeoutMs),
      });
      return null;
    } catch (err) {
      if (isTimeout(err)) {
        return 'TIMEOUT';
      }
      console.error(`[broadcast] send to ${userId} failed:`, err);
      return 'SEND_FAILED';
    }
  }

  /**
   * Send to one page of recipients, at most `concurrency` at a time
   */
  async function sendPage(
    recipients: User[],
    message: string,
    report: BroadcastReport
  ): Promise<void> {
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < recipients.length) {
        const recipient = recipients[next++];
        if (recipient === undefined) {
          return;
        }
        report.total++;
        const code = await sendOne(recipient.id, message);
        if (code === null) {
          report.sent++;
        } else {
          report.failed.push({ userId: recipient.id, code });
        }
      }
    };
    await Promise.all(
      Array.from({ length: Math.min(concurrency, recipients.length) }, worker)
    );
  }

  return {
    async blockUser(
      actor: ActorContext,
      userId: number,
      params: BlockParams = {}
    ): Promise<Result<User>> {
      return users.setBlocked(actor, userId, true, params);
    },

    async unblockUser(actor: ActorContext, userId: number): Promise<Result<User>> {
      return users.setBlocked(actor, userId, false);
    },

    async searchUsers(
      actor: ActorContext,
      params: Partial<SearchUsersParams>
    ): Promise<Result<PaginatedResult<User>>> {
      return users.searchUsers(actor, params);
    },

    async setSubscription(
      actor: ActorContext,
      userId: number,
      params: SetSubscriptionParams
    ): Promise<Result<User>> {
      return users.setSubscription(actor, userId, params);
    },

    /**
     * Search across all owners, deleted files included on request
     */
    async searchFiles(
      actor: ActorContext,
      params: Partial<SearchFilesParams>
    ): Promise<Result<PaginatedResult<File>>> {
      return files.searchFiles(actor, params);
    },

    async deleteFile(
      actor: ActorContext,
      fileId: string
    ): Promise<Result<{ file: File; alreadyDeleted: boolean }>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'Admin access required');
      }
      return files.softDelete(actor, fileId);
    },

    /**
     * Resolve a token without serving it, exposing the denial reason
     */
    async inspectLink(
      actor: ActorContext,
      token: string
    ): Promise<Result<LinkInspection>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'Admin access required');
      }

      const resolved = await links.resolve(token);
      if (resolved.success) {
        return success({ valid: true, reason: null, file: resolved.data });
      }
      const reason = resolved.error.details?.reason;
      return success({
        valid: false,
        reason:
          reason === 'expired' || reason === 'deleted' ? reason : 'unknown',
        file: null,
      });
    },

    async listSettings(actor: ActorContext): Promise<Result<SettingEntry[]>> {
      return settings.list(actor);
    },

    async updateSetting(
      actor: ActorContext,
      key: string,
      value: unknown
    ): Promise<Result<SettingEntry>> {
      return settings.update(actor, key, value);
    },

    async pauseBot(actor: ActorContext): Promise<Result<BotStatus>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'Admin access required');
      }
      if (pause.pause()) {
        await auditService.log(actor, { action: 'bot:paused', resourceType: 'bot' });
      }
      return success({ paused: true });
    },

    async resumeBot(actor: ActorContext): Promise<Result<BotStatus>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'Admin access required');
      }
      if (pause.resume()) {
        await auditService.log(actor, { action: 'bot:resumed', resourceType: 'bot' });
      }
      return success({ paused: false });
    },

    isPaused(): boolean {
      return pause.isPaused();
    },

    async broadcast(
      actor: ActorContext,
      message: string
    ): Promise<Result<BroadcastReport>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'Admin access required');
      }
      const text = message.trim();
      if (text === '' || text.length > MAX_BROADCAST_LENGTH) {
        return failure('VALIDATION_ERROR', 'Message must be 1-4096 characters');
      }

      const report: BroadcastReport = { total: 0, sent: 0, failed: [] };
      let cursor: string | undefined;
      for (;;) {
        const page = await users.listActiveUsers({
          limit: BROADCAST_PAGE_SIZE,
          ...(cursor !== undefined && { cursor }),
        });
        await sendPage(page.items, text, report);
        if (!page.hasMore || page.nextCursor === undefined) {
          break;
        }
        cursor = page.nextCursor;
      }

      await auditService.log(actor, {
        action: 'broadcast:sent',
        resourceType: 'bot',
        details: {
          total: report.total,
          sent: report.sent,
          failed: report.failed.length,
        },
      });

      return success(report);
    },

    async getStats(actor: ActorContext): Promise<Result<AdminStats>> {
      const userCounts = await users.getCounts(actor);
      if (!userCounts.success) {
        return userCounts;
      }
      const fileTotals = await files.getTotals(actor);
      if (!fileTotals.success) {
        return fileTotals;
      }
      return success({
        users: userCounts.data,
        files: fileTotals.data,
        paused: pause.isPaused(),
      });
    },
  };
}
