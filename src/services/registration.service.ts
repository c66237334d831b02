/**
 * RegistrationService Implementation
 *
 * Turns an upload or a URL into a registered file with a download link:
 *   rate limit -> subscription gate -> registry precheck -> bounded
 *   byte transfer -> registry create -> link issue
 *
 * All-or-nothing: a failure after bytes were written removes them, and a
 * failure after the row was created removes the row. No partial File is
 * ever visible.
 *
 * Dependencies: UserService, SubscriptionService, RateLimitService,
 * FileService, LinkService, FileStorage, UrlFetcher, SettingsService
 */

import { readChunks } from '../lib/streams.js';
import type { FetchedObject, UrlFetcher } from '../lib/url-fetch.js';
import { fileNameFromUrl } from '../lib/url-fetch.js';
import { checkUrlSafety } from '../lib/validation.js';
import type {
  ActionClass,
  ActorContext,
  AuthorizationGrant,
  File,
  FileSource,
  RateDecision,
  Result,
  SettingKey,
  SettingValues,
  User,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

import type { FileService } from './file.service.js';
import type { FileStorage, StoredObject } from './file.storage.js';
import type { LinkService } from './link.service.js';

const FALLBACK_URL_FILE_NAME = 'download.bin';

export interface RegistrationUsers {
  getUser: (actor: ActorContext, userId: number) => Promise<Result<User>>;
  recordActivity: (
    userId: number,
    delta: { uploads?: number; downloads?: number }
  ) => Promise<void>;
}

export interface RegistrationGate {
  authorize: (
    user: User,
    action: ActionClass
  ) => Promise<Result<AuthorizationGrant>>;
}

export interface RegistrationRateLimiter {
  admit: (
    subject: string,
    actionClass: ActionClass
  ) => Promise<Result<RateDecision>>;
}

export interface RegistrationSettings {
  get<K extends SettingKey>(key: K): Promise<SettingValues[K]>;
}

export interface UploadParams {
  name: string;
  declaredSize: number | null;
  body: ReadableStream<Uint8Array>;
  mimeType?: string | null;
  expiryDays?: number;
  signal?: AbortSignal;
}

export interface UrlParams {
  url: string;
  name?: string;
  expiryDays?: number;
  signal?: AbortSignal;
}

export interface RegisteredFile {
  file: File;
  token: string;
  url: string;
  deduplicated: boolean;
}

export interface RegistrationService {
  registerUpload(
    actor: ActorContext,
    params: UploadParams
  ): Promise<Result<RegisteredFile>>;
  registerFromUrl(
    actor: ActorContext,
    params: UrlParams
  ): Promise<Result<RegisteredFile>>;
}

/**
 * What the shared pipeline needs once the bytes are reachable
 */
interface PendingTransfer {
  name: string;
  declaredSize: number | null;
  mimeType: string | null;
  chunks: AsyncIterable<Uint8Array>;
  source: FileSource;
  sourceUrl: string | null;
  expiryDays: number | undefined;
}

/**
 * Create RegistrationService instance
 */
export function createRegistrationService(deps: {
  users: RegistrationUsers;
  gate: RegistrationGate;
  rateLimiter: RegistrationRateLimiter;
  files: Pick<FileService, 'checkRegistration' | 'create' | 'discard' | 'findDuplicate'>;
  links: Pick<LinkService, 'issue' | 'buildDownloadUrl'>;
  storage: Pick<FileStorage, 'write' | 'remove'>;
  fetcher: UrlFetcher;
  settings: RegistrationSettings;
  transferTimeoutMs: number;
}): RegistrationService {
  const { users, gate, rateLimiter, files, links, storage, fetcher, settings } = deps;

  /**
   * Blocked users are refused before the rate limiter sees them
   */
  async function admitUser(
    actor: ActorContext
  ): Promise<Result<{ user: User; grant: AuthorizationGrant }>> {
    if (actor.userId === undefined) {
      return failure('UNAUTHORIZED', 'A user is required to register files');
    }

    const userResult = await users.getUser(actor, actor.userId);
    if (!userResult.success) {
      return userResult;
    }
    const user = userResult.data;
    if (user.isBlocked) {
      return failure('USER_BLOCKED', 'User is blocked');
    }

    const admitted = await rateLimiter.admit(`user:${user.id}`, 'upload');
    if (!admitted.success) {
      return admitted;
    }

    const grant = await gate.authorize(user, 'upload');
    if (!grant.success) {
      return grant;
    }

    return success({ user, grant: grant.data });
  }

  async function removeQuietly(storageKey: string): Promise<void> {
    try {
      await storage.remove(storageKey);
    } catch (err) {
      console.error(`[registration] could not remove ${storageKey} during rollback:`, err);
    }
  }

  /**
   * Same content already registered by this owner: point the new row at
   * the existing bytes and drop the copy just written
   */
  async function reuseExisting(
    ownerId: number,
    stored: StoredObject
  ): Promise<string> {
    if (!(await settings.get('DEDUP_ENABLED'))) {
      return stored.storageKey;
    }
    const duplicate = await files.findDuplicate(ownerId, stored.contentHash);
    if (duplicate === null || duplicate.storageKey === stored.storageKey) {
      return stored.storageKey;
    }
    await removeQuietly(stored.storageKey);
    return duplicate.storageKey;
  }

  async function complete(
    actor: ActorContext,
    user: User,
    grant: AuthorizationGrant,
    transfer: PendingTransfer,
    abort: AbortController
  ): Promise<Result<RegisteredFile>> {
    const limits = await files.checkRegistration(user, {
      name: transfer.name,
      sizeBytes: transfer.declaredSize,
    });
    if (!limits.success) {
      abort.abort();
      return limits;
    }

    const written = await storage.write({
      ownerId: user.id,
      fileName: limits.data.name,
      chunks: transfer.chunks,
      maxBytes: limits.data.maxBytes,
      signal: abort.signal,
    });
    if (!written.success) {
      abort.abort();
      return written;
    }

    const stored = written.data;
    let storageKey = stored.storageKey;
    let ownsBytes = true;
    let created: File | null = null;

    try {
      storageKey = await reuseExisting(user.id, stored);
      ownsBytes = storageKey === stored.storageKey;

      const defaultDays = await settings.get('DEFAULT_EXPIRY_DAYS');
      const days =
        transfer.expiryDays ?? Math.min(defaultDays, grant.plan.maxLinkDays);

      const file = await files.create(actor, {
        ownerId: user.id,
        name: limits.data.name,
        sizeBytes: stored.sizeBytes,
        storageKey,
        expiryPolicy: { type: 'relative', days },
        contentHash: stored.contentHash,
        mimeType: transfer.mimeType,
        source: transfer.source,
        sourceUrl: transfer.sourceUrl,
      });
      if (!file.success) {
        if (ownsBytes) {
          await removeQuietly(storageKey);
        }
        return file;
      }
      created = file.data;

      const token = await links.issue(actor, created);
      if (!token.success) {
        await files.discard(created.id);
        if (ownsBytes) {
          await removeQuietly(storageKey);
        }
        return token;
      }

      await users.recordActivity(user.id, { uploads: 1 });
      const url = await links.buildDownloadUrl(token.data);

      return success({
        file: { ...created, downloadToken: token.data },
        token: token.data,
        url,
        deduplicated: !ownsBytes,
      });
    } catch (err) {
      console.error('[registration] failed after bytes were stored, rolling back:', err);
      if (created !== null) {
        await files.discard(created.id);
      }
      if (ownsBytes) {
        await removeQuietly(storageKey);
      }
      throw err;
    }
  }

  /**
   * Abort after the transfer budget, or when the caller gives up
   */
  function transferController(signal?: AbortSignal): {
    controller: AbortController;
    release: () => void;
  } {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error('Transfer timed out')),
      deps.transferTimeoutMs
    );
    const onCallerAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    return {
      controller,
      release: () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onCallerAbort);
      },
    };
  }

  return {
    async registerUpload(
      actor: ActorContext,
      params: UploadParams
    ): Promise<Result<RegisteredFile>> {
      const admitted = await admitUser(actor);
      if (!admitted.success) {
        await params.body.cancel();
        return admitted;
      }

      const { controller, release } = transferController(params.signal);
      try {
        return await complete(
          actor,
          admitted.data.user,
          admitted.data.grant,
          {
            name: params.name,
            declaredSize: params.declaredSize,
            mimeType: params.mimeType ?? null,
            chunks: readChunks(params.body, controller.signal),
            source: 'upload',
            sourceUrl: null,
            expiryDays: params.expiryDays,
          },
          controller
        );
      } finally {
        release();
      }
    },

    async registerFromUrl(
      actor: ActorContext,
      params: UrlParams
    ): Promise<Result<RegisteredFile>> {
      const safeUrl = checkUrlSafety(params.url.trim());
      if (!safeUrl.success) {
        return safeUrl;
      }

      const admitted = await admitUser(actor);
      if (!admitted.success) {
        return admitted;
      }

      const { controller, release } = transferController(params.signal);
      try {
        const opened = await fetcher.open(safeUrl.data, controller.signal);
        if (!opened.success) {
          return opened;
        }
        const remote: FetchedObject = opened.data;

        return await complete(
          actor,
          admitted.data.user,
          admitted.data.grant,
          {
            name:
              params.name ??
              remote.fileName ??
              fileNameFromUrl(safeUrl.data) ??
              FALLBACK_URL_FILE_NAME,
            declaredSize: remote.contentLength,
            mimeType: remote.contentType,
            chunks: remote.chunks,
            source: 'url',
            sourceUrl: safeUrl.data.toString(),
            expiryDays: params.expiryDays,
          },
          controller
        );
      } finally {
        release();
      }
    },
  };
}
