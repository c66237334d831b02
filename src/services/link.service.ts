/**
 * LinkService Implementation (link issuer)
 *
 * A file has at most one valid download token. Tokens are 256 bits from
 * the OS CSPRNG, base64url encoded, and never derived from file data.
 * Replacing a token is one compare-and-swap UPDATE on the file row, so
 * the previous token stops resolving the moment the call returns.
 *
 * Full tokens never reach the logs; use maskToken.
 *
 * Dependencies: file registry DB, AuditService, SettingsService, UserService
 */

import { randomBytes } from 'node:crypto';

import type {
  ActorContext,
  AuditEvent,
  Failure,
  File,
  Result,
  SettingKey,
  SettingValues,
} from '../types/index.js';
import { success, failure, canActFor } from '../types/index.js';

import type { FileServiceDb } from './file.service.js';

const TOKEN_BYTES = 32;
const TOKEN_PATTERN = /^[A-Za-z0-9_-]{43}$/;
const MAX_SWAP_ATTEMPTS = 5;

export type InvalidTokenReason = 'unknown' | 'expired' | 'deleted';

export type LinkServiceDb = Pick<
  FileServiceDb,
  'getFile' | 'getFileByToken' | 'swapToken' | 'incrementDownloadCount'
>;

export interface LinkServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

export interface LinkServiceSettings {
  get<K extends SettingKey>(key: K): Promise<SettingValues[K]>;
}

export interface LinkServiceUsers {
  recordActivity: (
    userId: number,
    delta: { uploads?: number; downloads?: number }
  ) => Promise<void>;
}

export interface RegeneratedLink {
  token: string;
  file: File;
  previousDownloadCount: number;
}

export interface LinkService {
  issue(actor: ActorContext, file: File): Promise<Result<string>>;
  regenerate(
    actor: ActorContext,
    fileId: string
  ): Promise<Result<RegeneratedLink>>;
  resolve(token: string): Promise<Result<File>>;
  recordDownload(file: File): Promise<void>;
  buildDownloadUrl(token: string): Promise<string>;
}

export function generateToken(): string {
  return randomBytes(TOKEN_BYTES).toString('base64url');
}

/**
 * First and last four characters only
 */
export function maskToken(token: string): string {
  if (token.length <= 8) {
    return '****';
  }
  return `${token.slice(0, 4)}…${token.slice(-4)}`;
}

function invalidToken(reason: InvalidTokenReason): Failure {
  return failure('INVALID_TOKEN', 'Link is not valid', { reason });
}

/**
 * Create LinkService instance
 */
export function createLinkService(deps: {
  db: LinkServiceDb;
  auditService: LinkServiceAudit;
  settings: LinkServiceSettings;
  users: LinkServiceUsers;
  now?: () => Date;
  tokenFactory?: () => string;
}): LinkService {
  const { db, auditService, settings, users } = deps;
  const now = deps.now ?? (() => new Date());
  const nextToken = deps.tokenFactory ?? generateToken;

  /**
   * Swap whatever token the row holds for a fresh one.
   * A failed compare means another writer got there first; re-read and
   * try again so the last writer wins.
   */
  async function replaceToken(
    file: File
  ): Promise<Result<{ token: string; file: File; previous: File }>> {
    let current: File = file;

    for (let attempt = 0; attempt < MAX_SWAP_ATTEMPTS; attempt++) {
      if (current.isDeleted) {
        return failure('NOT_FOUND', 'File has been deleted');
      }

      const token = nextToken();
      const updated = await db.swapToken(
        current.id,
        current.downloadToken,
        token,
        now()
      );
      if (updated !== null) {
        return success({ token, file: updated, previous: current });
      }

      const reread = await db.getFile(current.id);
      if (reread === null) {
        return failure('NOT_FOUND', 'File not found');
      }
      current = reread;
    }

    throw new Error(`Token swap for file ${file.id} kept losing to concurrent writers`);
  }

  return {
    /**
     * Mint the first token for a newly created file
     */
    async issue(actor: ActorContext, file: File): Promise<Result<string>> {
      if (!canActFor(actor, file.ownerId)) {
        return failure('OWNER_MISMATCH', 'File belongs to another user');
      }
      if (file.isDeleted) {
        return failure('NOT_FOUND', 'File has been deleted');
      }

      const swapped = await replaceToken(file);
      if (!swapped.success) {
        return swapped;
      }

      await auditService.log(actor, {
        action: 'link:issued',
        resourceType: 'file',
        resourceId: file.id,
        details: { token: maskToken(swapped.data.token) },
      });

      return success(swapped.data.token);
    },

    /**
     * Replace the token and reset the download counter
     * The previous counter is kept in the audit record
     */
    async regenerate(
      actor: ActorContext,
      fileId: string
    ): Promise<Result<RegeneratedLink>> {
      const file = await db.getFile(fileId);
      if (file === null || file.isDeleted) {
        return failure('NOT_FOUND', 'File not found');
      }
      if (!canActFor(actor, file.ownerId)) {
        return failure('OWNER_MISMATCH', 'File belongs to another user');
      }
      if (file.expiresAt.getTime() <= now().getTime()) {
        return failure('NOT_FOUND', 'File has expired');
      }

      const swapped = await replaceToken(file);
      if (!swapped.success) {
        return swapped;
      }
      const previousDownloadCount = swapped.data.previous.downloadCount;

      await auditService.log(actor, {
        action: 'link:regenerated',
        resourceType: 'file',
        resourceId: fileId,
        details: {
          previousDownloadCount,
          previousToken:
            swapped.data.previous.downloadToken !== null
              ? maskToken(swapped.data.previous.downloadToken)
              : null,
          token: maskToken(swapped.data.token),
        },
      });

      return success({
        token: swapped.data.token,
        file: swapped.data.file,
        previousDownloadCount,
      });
    },

    /**
     * Look up the file behind a token.
     * The failure reason is for admin diagnostics; public callers must
     * not reveal it.
     */
    async resolve(token: string): Promise<Result<File>> {
      if (!TOKEN_PATTERN.test(token)) {
        return invalidToken('unknown');
      }

      const file = await db.getFileByToken(token);
      if (file === null || file.downloadToken !== token) {
        return invalidToken('unknown');
      }
      // A file swept after its expiry reports 'expired'
      const removedEarly =
        file.deletedAt === null ||
        file.deletedAt.getTime() < file.expiresAt.getTime();
      if (file.isDeleted && removedEarly) {
        return invalidToken('deleted');
      }
      if (file.isDeleted || now().getTime() >= file.expiresAt.getTime()) {
        return invalidToken('expired');
      }
      return success(file);
    },

    async recordDownload(file: File): Promise<void> {
      await db.incrementDownloadCount(file.id);
      await users.recordActivity(file.ownerId, { downloads: 1 });
    },

    async buildDownloadUrl(token: string): Promise<string> {
      const domain = await settings.get('DOWNLOAD_DOMAIN');
      const base = /^https?:\/\//.test(domain) ? domain : `https://${domain}`;
      return `${base.replace(/\/+$/, '')}/d/${token}`;
    },
  };
}
