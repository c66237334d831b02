/**
 * FileService Implementation (file registry)
 *
 * SCOPE: Durable file metadata, ownership checks, quota enforcement
 * NOT IN SCOPE: Token minting (LinkService), byte transfer (FileStorage)
 *
 * GUARDRAILS:
 * - Owner must exist and not be blocked when a file is created
 * - Name, extension and size are checked before anything is written
 * - expiresAt is always after createdAt
 * - Only the owner or an admin may read or delete a file
 * - Deletion is soft; the token stays on the row but no longer resolves
 * - All mutations emit audit events
 *
 * Dependencies: AuditService, UserService, SubscriptionService (plans),
 * SettingsService
 */

import { BUILTIN_BLOCKED_EXTENSIONS } from '../lib/config.js';
import { getExtension, validateFileName } from '../lib/validation.js';
import type {
  ActorContext,
  AuditEvent,
  BulkDeleteOutcome,
  CreateFileParams,
  ExpiryPolicy,
  File,
  FileSource,
  FileTotals,
  ListFilesParams,
  PaginatedResult,
  QuotaPlan,
  Result,
  SettingKey,
  SettingValues,
  SoftDeleteOutcome,
  StorageUsage,
  User,
} from '../types/index.js';
import {
  success,
  failure,
  canActFor,
  isPrivilegedActor,
  normalizePaginationParams,
  decodeKeysetCursor,
  SYSTEM_ACTOR,
} from '../types/index.js';

const MB = 1024 * 1024;
const DAY_MS = 24 * 60 * 60 * 1000;
const LIST_PAGE_SIZE = 50;
export const MAX_BULK_DELETE = 100;

export interface NewFileRecord {
  ownerId: number;
  originalName: string;
  sizeBytes: number;
  storageKey: string;
  contentHash: string | null;
  mimeType: string | null;
  source: FileSource;
  sourceUrl: string | null;
  createdAt: Date;
  expiresAt: Date;
}

export interface SearchFilesParams extends ListFilesParams {
  ownerId?: number;
  includeDeleted?: boolean;
}

/**
 * Database abstraction interface for the file registry.
 * Conditional updates return null when the guard did not match.
 */
export interface FileServiceDb {
  insertFile: (record: NewFileRecord) => Promise<File>;
  getFile: (fileId: string) => Promise<File | null>;
  getFileByToken: (token: string) => Promise<File | null>;
  listFilesByOwner: (
    ownerId: number,
    params: ListFilesParams
  ) => Promise<PaginatedResult<File>>;
  searchFiles: (params: SearchFilesParams) => Promise<PaginatedResult<File>>;
  softDeleteFile: (
    fileId: string,
    at: Date,
    guard?: { notUpdatedSince?: Date }
  ) => Promise<File | null>;
  swapToken: (
    fileId: string,
    expected: string | null,
    next: string,
    at: Date
  ) => Promise<File | null>;
  incrementDownloadCount: (fileId: string) => Promise<void>;
  listExpired: (params: {
    now: Date;
    notUpdatedSince: Date;
    afterId: string | null;
    limit: number;
  }) => Promise<File[]>;
  listPendingPurge: (params: {
    afterId: string | null;
    limit: number;
  }) => Promise<File[]>;
  markPurged: (fileId: string, at: Date) => Promise<void>;
  countLiveReferences: (storageKey: string, excludeId: string) => Promise<number>;
  /** True while any row whose bytes are not yet purged points at the key */
  isStorageKeyTracked: (storageKey: string) => Promise<boolean>;
  findLiveByHash: (ownerId: number, contentHash: string) => Promise<File | null>;
  getStorageUsage: (
    ownerId: number
  ) => Promise<{ usedBytes: number; fileCount: number }>;
  getTotals: () => Promise<FileTotals>;
  deleteFileRow: (fileId: string) => Promise<void>;
}

export interface FileServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

export interface FileServiceUsers {
  getUser: (actor: ActorContext, userId: number) => Promise<Result<User>>;
}

export interface FileServicePlans {
  getPlan: (user: User) => QuotaPlan;
}

export interface FileServiceSettings {
  get<K extends SettingKey>(key: K): Promise<SettingValues[K]>;
}

/**
 * Limits that apply to one pending registration
 */
export interface RegistrationLimits {
  name: string;
  plan: QuotaPlan;
  maxBytes: number; // per-file cap, already reduced to what the quota leaves
}

export interface FileService {
  checkRegistration(
    owner: User,
    params: { name: string; sizeBytes: number | null }
  ): Promise<Result<RegistrationLimits>>;
  create(actor: ActorContext, params: CreateFileParams): Promise<Result<File>>;
  get(actor: ActorContext, fileId: string): Promise<Result<File>>;
  listByOwner(ownerId: number, search?: string): AsyncIterable<File>;
  listFiles(
    actor: ActorContext,
    ownerId: number,
    params: Partial<ListFilesParams>
  ): Promise<Result<PaginatedResult<File>>>;
  searchFiles(
    actor: ActorContext,
    params: Partial<SearchFilesParams>
  ): Promise<Result<PaginatedResult<File>>>;
  softDelete(
    actor: ActorContext,
    fileId: string
  ): Promise<Result<SoftDeleteOutcome>>;
  softDeleteMany(
    actor: ActorContext,
    fileIds: readonly string[]
  ): Promise<Result<BulkDeleteOutcome>>;
  discard(fileId: string): Promise<void>;
  findDuplicate(ownerId: number, contentHash: string): Promise<File | null>;
  getStorageUsage(
    actor: ActorContext,
    ownerId: number
  ): Promise<Result<StorageUsage>>;
  getTotals(actor: ActorContext): Promise<Result<FileTotals>>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

function resolveExpiry(
  policy: ExpiryPolicy,
  createdAt: Date,
  plan: QuotaPlan
): Result<Date> {
  const latest = createdAt.getTime() + plan.maxLinkDays * DAY_MS;

  if (policy.type === 'relative') {
    if (!Number.isInteger(policy.days) || policy.days < 1) {
      return failure('VALIDATION_ERROR', 'Expiry must be at least one day');
    }
    if (policy.days > plan.maxLinkDays) {
      return failure('VALIDATION_ERROR', 'Expiry is longer than the plan allows', {
        maxDays: plan.maxLinkDays,
      });
    }
    return success(new Date(createdAt.getTime() + policy.days * DAY_MS));
  }

  const at = policy.expiresAt.getTime();
  if (Number.isNaN(at) || at <= createdAt.getTime()) {
    return failure('VALIDATION_ERROR', 'Expiry must be in the future');
  }
  if (at > latest) {
    return failure('VALIDATION_ERROR', 'Expiry is longer than the plan allows', {
      maxDays: plan.maxLinkDays,
    });
  }
  return success(new Date(at));
}

function cleanSearch(search: string | undefined): string | undefined {
  const term = search?.trim();
  return term !== undefined && term !== '' ? term : undefined;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create FileService instance
 */
export function createFileService(deps: {
  db: FileServiceDb;
  auditService: FileServiceAudit;
  users: FileServiceUsers;
  plans: FileServicePlans;
  settings: FileServiceSettings;
  now?: () => Date;
}): FileService {
  const { db, auditService, users, plans, settings } = deps;
  const now = deps.now ?? (() => new Date());

  async function checkRegistration(
    owner: User,
    params: { name: string; sizeBytes: number | null }
  ): Promise<Result<RegistrationLimits>> {
    const nameResult = validateFileName(params.name);
    if (!nameResult.success) {
      return nameResult;
    }
    const name = nameResult.data;

    const extension = getExtension(name);
    const blocked = [
      ...BUILTIN_BLOCKED_EXTENSIONS,
      ...(await settings.get('BLOCKED_EXTENSIONS')),
    ];
    if (blocked.includes(extension)) {
      return failure('EXTENSION_BLOCKED', `Files of type ${extension} are not accepted`, {
        extension,
      });
    }
    const allowed = await settings.get('ALLOWED_EXTENSIONS');
    if (allowed.length > 0 && !allowed.includes(extension)) {
      return failure('EXTENSION_BLOCKED', `Files of type ${extension} are not accepted`, {
        extension,
      });
    }

    const plan = plans.getPlan(owner);
    const globalMax = (await settings.get('MAX_UPLOAD_SIZE_MB')) * MB;
    const maxFileBytes = Math.min(plan.maxFileBytes, globalMax);

    if (params.sizeBytes !== null) {
      if (!Number.isSafeInteger(params.sizeBytes) || params.sizeBytes <= 0) {
        return failure('VALIDATION_ERROR', 'File size must be positive');
      }
      if (params.sizeBytes > maxFileBytes) {
        return failure('SIZE_TOO_LARGE', 'File exceeds the allowed size', {
          maxBytes: maxFileBytes,
          sizeBytes: params.sizeBytes,
        });
      }
    }

    const usage = await db.getStorageUsage(owner.id);
    const remainingBytes = plan.maxStorageBytes - usage.usedBytes;
    if (usage.fileCount >= plan.maxFiles) {
      return failure('QUOTA_EXCEEDED', 'File count limit reached', {
        maxFiles: plan.maxFiles,
        fileCount: usage.fileCount,
      });
    }
    if (remainingBytes <= 0 || (params.sizeBytes ?? 0) > remainingBytes) {
      return failure('QUOTA_EXCEEDED', 'Storage quota would be exceeded', {
        maxStorageBytes: plan.maxStorageBytes,
        usedBytes: usage.usedBytes,
      });
    }

    return success({
      name,
      plan,
      maxBytes: Math.min(maxFileBytes, remainingBytes),
    });
  }

  /**
   * Soft delete - owner or admin
   * A repeat call succeeds with alreadyDeleted: true
   */
  async function softDelete(
    actor: ActorContext,
    fileId: string
  ): Promise<Result<SoftDeleteOutcome>> {
    const file = await db.getFile(fileId);
    if (file === null) {
      return failure('NOT_FOUND', 'File not found');
    }
    if (!canActFor(actor, file.ownerId)) {
      return failure('OWNER_MISMATCH', 'File belongs to another user');
    }
    if (file.isDeleted) {
      return success({ file, alreadyDeleted: true });
    }

    const deleted = await db.softDeleteFile(fileId, now());
    if (deleted === null) {
      // Lost the race to another delete
      const current = await db.getFile(fileId);
      return success({ file: current ?? file, alreadyDeleted: true });
    }

    await auditService.log(actor, {
      action: 'file:deleted',
      resourceType: 'file',
      resourceId: fileId,
      details: { ownerId: file.ownerId, byOwner: actor.userId === file.ownerId },
    });

    return success({ file: deleted, alreadyDeleted: false });
  }

  return {
    checkRegistration,

    /**
     * Register file metadata
     * Bytes are expected to be stored already under storageKey
     */
    async create(
      actor: ActorContext,
      params: CreateFileParams
    ): Promise<Result<File>> {
      if (!canActFor(actor, params.ownerId)) {
        return failure('OWNER_MISMATCH', 'Cannot create files for another user');
      }

      const ownerResult = await users.getUser(SYSTEM_ACTOR, params.ownerId);
      if (!ownerResult.success) {
        return ownerResult;
      }
      const owner = ownerResult.data;
      if (owner.isBlocked) {
        return failure('USER_BLOCKED', 'User is blocked');
      }

      const limits = await checkRegistration(owner, {
        name: params.name,
        sizeBytes: params.sizeBytes,
      });
      if (!limits.success) {
        return limits;
      }

      if (params.storageKey.trim() === '') {
        return failure('VALIDATION_ERROR', 'storageKey is required');
      }

      const createdAt = now();
      const expiresAt = resolveExpiry(params.expiryPolicy, createdAt, limits.data.plan);
      if (!expiresAt.success) {
        return expiresAt;
      }

      const file = await db.insertFile({
        ownerId: owner.id,
        originalName: limits.data.name,
        sizeBytes: params.sizeBytes,
        storageKey: params.storageKey,
        contentHash: params.contentHash ?? null,
        mimeType: params.mimeType ?? null,
        source: params.source ?? 'upload',
        sourceUrl: params.sourceUrl ?? null,
        createdAt,
        expiresAt: expiresAt.data,
      });

      await auditService.log(actor, {
        action: 'file:created',
        resourceType: 'file',
        resourceId: file.id,
        details: {
          ownerId: file.ownerId,
          name: file.originalName,
          sizeBytes: file.sizeBytes,
          expiresAt: file.expiresAt.toISOString(),
          source: file.source,
        },
      });

      return success(file);
    },

    /**
     * Get a live file - owner or admin
     * Admins can also see soft-deleted files
     */
    async get(actor: ActorContext, fileId: string): Promise<Result<File>> {
      if (fileId.trim() === '') {
        return failure('VALIDATION_ERROR', 'File ID is required');
      }

      const file = await db.getFile(fileId);
      if (file === null || (file.isDeleted && !isPrivilegedActor(actor))) {
        return failure('NOT_FOUND', 'File not found');
      }
      if (!canActFor(actor, file.ownerId)) {
        return failure('OWNER_MISMATCH', 'File belongs to another user');
      }
      return success(file);
    },

    /**
     * Every live file of an owner, newest first.
     * Each iteration starts a fresh walk over the store.
     */
    listByOwner(ownerId: number, search?: string): AsyncIterable<File> {
      const term = cleanSearch(search);
      return {
        async *[Symbol.asyncIterator]() {
          let cursor: string | undefined;
          for (;;) {
            const page = await db.listFilesByOwner(ownerId, {
              limit: LIST_PAGE_SIZE,
              ...(cursor !== undefined && { cursor }),
              ...(term !== undefined && { search: term }),
            });
            yield* page.items;
            if (!page.hasMore || page.nextCursor === undefined) {
              return;
            }
            cursor = page.nextCursor;
          }
        },
      };
    },

    async listFiles(
      actor: ActorContext,
      ownerId: number,
      params: Partial<ListFilesParams>
    ): Promise<Result<PaginatedResult<File>>> {
      if (!canActFor(actor, ownerId)) {
        return failure('OWNER_MISMATCH', 'Cannot list files of another user');
      }
      if (params.cursor !== undefined && decodeKeysetCursor(params.cursor) === null) {
        return failure('VALIDATION_ERROR', 'Invalid cursor');
      }

      const term = cleanSearch(params.search);
      const result = await db.listFilesByOwner(ownerId, {
        ...normalizePaginationParams(params),
        ...(term !== undefined && { search: term }),
      });
      return success(result);
    },

    async searchFiles(
      actor: ActorContext,
      params: Partial<SearchFilesParams>
    ): Promise<Result<PaginatedResult<File>>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'File search is restricted to admins');
      }
      if (params.cursor !== undefined && decodeKeysetCursor(params.cursor) === null) {
        return failure('VALIDATION_ERROR', 'Invalid cursor');
      }

      const term = cleanSearch(params.search);
      const result = await db.searchFiles({
        ...normalizePaginationParams(params),
        ...(term !== undefined && { search: term }),
        ...(params.ownerId !== undefined && { ownerId: params.ownerId }),
        ...(params.includeDeleted !== undefined && {
          includeDeleted: params.includeDeleted,
        }),
      });
      return success(result);
    },

    softDelete,

    /**
     * Same checks as softDelete per id. A missing or foreign id is
     * skipped and the rest of the batch still goes through.
     */
    async softDeleteMany(
      actor: ActorContext,
      fileIds: readonly string[]
    ): Promise<Result<BulkDeleteOutcome>> {
      const unique = [...new Set(fileIds.map((id) => id.trim()))].filter(
        (id) => id !== ''
      );
      if (unique.length === 0) {
        return failure('VALIDATION_ERROR', 'At least one file ID is required');
      }
      if (unique.length > MAX_BULK_DELETE) {
        return failure(
          'VALIDATION_ERROR',
          `At most ${MAX_BULK_DELETE} files can be deleted at once`,
          { maxFiles: MAX_BULK_DELETE }
        );
      }

      const outcome: BulkDeleteOutcome = {
        deleted: [],
        alreadyDeleted: [],
        skipped: [],
      };
      for (const fileId of unique) {
        const result = await softDelete(actor, fileId);
        if (!result.success) {
          outcome.skipped.push(fileId);
        } else if (result.data.alreadyDeleted) {
          outcome.alreadyDeleted.push(fileId);
        } else {
          outcome.deleted.push(fileId);
        }
      }
      return success(outcome);
    },

    /**
     * Remove a row that never became visible (registration rollback)
     */
    async discard(fileId: string): Promise<void> {
      await db.deleteFileRow(fileId);
    },

    async findDuplicate(
      ownerId: number,
      contentHash: string
    ): Promise<File | null> {
      return db.findLiveByHash(ownerId, contentHash);
    },

    async getStorageUsage(
      actor: ActorContext,
      ownerId: number
    ): Promise<Result<StorageUsage>> {
      if (!canActFor(actor, ownerId)) {
        return failure('OWNER_MISMATCH', 'Cannot read usage of another user');
      }

      const ownerResult = await users.getUser(SYSTEM_ACTOR, ownerId);
      if (!ownerResult.success) {
        return ownerResult;
      }

      const plan = plans.getPlan(ownerResult.data);
      const usage = await db.getStorageUsage(ownerId);
      return success({
        usedBytes: usage.usedBytes,
        limitBytes: plan.maxStorageBytes,
        fileCount: usage.fileCount,
        fileLimit: plan.maxFiles,
      });
    },

    async getTotals(actor: ActorContext): Promise<Result<FileTotals>> {
      if (!isPrivilegedActor(actor)) {
        return failure('FORBIDDEN', 'Statistics are restricted to admins');
      }
      return success(await db.getTotals());
    },
  };
}
