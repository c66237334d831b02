/**
 * Test Mocks
 * In-memory stand-ins for the Supabase adapters and the chat platform.
 * Guarded updates behave like the SQL WHERE clauses they replace.
 */

import { createHash, randomUUID } from 'node:crypto';

import { vi } from 'vitest';

import type { ChatMessenger } from '@/lib/telegram.js';
import type { AuditLogEntry, AuditServiceDb } from '@/services/audit.service.js';
import type {
  FileServiceDb,
  NewFileRecord,
  SearchFilesParams,
} from '@/services/file.service.js';
import type {
  FileStorage,
  StorageEntry,
  StoredObject,
} from '@/services/file.storage.js';
import type { SettingsServiceDb, StoredSetting } from '@/services/settings.service.js';
import type { UserServiceDb } from '@/services/user.service.js';
import type {
  AuditLog,
  AuditQueryParams,
  File,
  ListFilesParams,
  PaginatedResult,
  Result,
  SearchUsersParams,
  User,
  UserCounts,
  UserUpdate,
} from '@/types/index.js';
import {
  success,
  failure,
  decodeKeysetCursor,
  encodeKeysetCursor,
} from '@/types/index.js';

type Clock = () => Date;

function pageByCreatedAt<T extends { createdAt: Date }>(
  rows: T[],
  params: { cursor?: string; limit: number }
): PaginatedResult<T> {
  const sorted = [...rows].sort(
    (a, b) => b.createdAt.getTime() - a.createdAt.getTime()
  );
  const after =
    params.cursor !== undefined
      ? sorted.filter((row) => row.createdAt.toISOString() < (params.cursor ?? ''))
      : sorted;
  const items = after.slice(0, params.limit);
  const hasMore = after.length > params.limit;

  const result: PaginatedResult<T> = { items, hasMore };
  const lastItem = items[items.length - 1];
  if (hasMore && lastItem !== undefined) {
    result.nextCursor = lastItem.createdAt.toISOString();
  }
  return result;
}

/**
 * (createdAt, id) descending, matching the files keyset cursor
 */
function pageByCreatedAtAndId<T extends { createdAt: Date; id: string }>(
  rows: T[],
  params: { cursor?: string; limit: number }
): PaginatedResult<T> {
  const key = (row: T): string => encodeKeysetCursor(row.createdAt, row.id);
  const sorted = [...rows].sort(
    (a, b) =>
      b.createdAt.getTime() - a.createdAt.getTime() ||
      (a.id < b.id ? 1 : a.id > b.id ? -1 : 0)
  );
  const cursor = params.cursor !== undefined ? decodeKeysetCursor(params.cursor) : null;
  const after =
    cursor !== null
      ? sorted.filter(
          (row) =>
            row.createdAt.toISOString() < cursor.createdAt ||
            (row.createdAt.toISOString() === cursor.createdAt && row.id < cursor.id)
        )
      : sorted;
  const items = after.slice(0, params.limit);
  const hasMore = after.length > params.limit;

  const result: PaginatedResult<T> = { items, hasMore };
  const lastItem = items[items.length - 1];
  if (hasMore && lastItem !== undefined) {
    result.nextCursor = key(lastItem);
  }
  return result;
}

// ─────────────────────────────────────────────────────────────
// USERS
// ─────────────────────────────────────────────────────────────

export interface InMemoryUserDb extends UserServiceDb {
  rows: Map<number, User>;
  seed: (user: User) => void;
}

export function createInMemoryUserDb(now: Clock = () => new Date()): InMemoryUserDb {
  const rows = new Map<number, User>();

  function requireUser(userId: number): User {
    const user = rows.get(userId);
    if (user === undefined) {
      throw new Error(`Failed to update user: ${userId} not found`);
    }
    return user;
  }

  return {
    rows,

    seed(user: User): void {
      rows.set(user.id, { ...user });
    },

    async getUser(userId: number): Promise<User | null> {
      const user = rows.get(userId);
      return user !== undefined ? { ...user } : null;
    },

    async insertUser(params): Promise<User> {
      if (rows.has(params.id)) {
        throw new Error('Failed to create user: duplicate key');
      }
      const at = now();
      const user: User = {
        id: params.id,
        username: params.username,
        fullName: params.fullName,
        tier: 'trial',
        subscriptionStatus: 'active',
        subscriptionExpiresAt: null,
        trialStartedAt: params.trialStartedAt,
        isBlocked: false,
        blockReason: null,
        blockedAt: null,
        blockedUntil: null,
        isActive: true,
        uploadCount: 0,
        downloadCount: 0,
        reminderSentFor: null,
        createdAt: at,
        updatedAt: at,
      };
      rows.set(user.id, user);
      return { ...user };
    },

    async updateUser(userId: number, update: UserUpdate): Promise<User> {
      const current = requireUser(userId);
      const next: User = { ...current, ...update, updatedAt: now() };
      rows.set(userId, next);
      return { ...next };
    },

    async incrementCounters(userId, delta): Promise<void> {
      const current = requireUser(userId);
      rows.set(userId, {
        ...current,
        uploadCount: current.uploadCount + (delta.uploads ?? 0),
        downloadCount: current.downloadCount + (delta.downloads ?? 0),
      });
    },

    async searchUsers(params: SearchUsersParams): Promise<PaginatedResult<User>> {
      const term = params.search?.toLowerCase();
      const matches = [...rows.values()].filter(
        (user) =>
          term === undefined ||
          String(user.id) === term ||
          (user.username?.toLowerCase().includes(term) ?? false) ||
          (user.fullName?.toLowerCase().includes(term) ?? false)
      );
      return pageByCreatedAt(matches, params);
    },

    async listActiveUsers(params): Promise<PaginatedResult<User>> {
      const after = params.cursor !== undefined ? Number(params.cursor) : 0;
      const active = [...rows.values()]
        .filter((user) => user.isActive && !user.isBlocked && user.id > after)
        .sort((a, b) => a.id - b.id);
      const items = active.slice(0, params.limit);
      const hasMore = active.length > params.limit;

      const result: PaginatedResult<User> = { items, hasMore };
      const lastItem = items[items.length - 1];
      if (hasMore && lastItem !== undefined) {
        result.nextCursor = String(lastItem.id);
      }
      return result;
    },

    async listExpiringSubscriptions(params): Promise<User[]> {
      return [...rows.values()]
        .filter((user) => {
          const at = user.subscriptionExpiresAt?.getTime();
          return (
            user.tier !== 'trial' &&
            user.subscriptionStatus === 'active' &&
            !user.isBlocked &&
            at !== undefined &&
            at >= params.from.getTime() &&
            at <= params.to.getTime() &&
            user.reminderSentFor?.getTime() !== at &&
            (params.afterId === undefined || user.id > params.afterId)
          );
        })
        .sort((a, b) => a.id - b.id)
        .slice(0, params.limit);
    },

    async countUsers(): Promise<UserCounts> {
      const all = [...rows.values()];
      return {
        total: all.length,
        blocked: all.filter((user) => user.isBlocked).length,
        active: all.filter((user) => user.isActive).length,
      };
    },
  };
}

// ─────────────────────────────────────────────────────────────
// FILES
// ─────────────────────────────────────────────────────────────

export interface InMemoryFileDb extends FileServiceDb {
  rows: Map<string, File>;
}

export function createInMemoryFileDb(): InMemoryFileDb {
  const rows = new Map<string, File>();

  function update(fileId: string, patch: Partial<File>): File {
    const current = rows.get(fileId);
    if (current === undefined) {
      throw new Error(`Failed to update file: ${fileId} not found`);
    }
    const next: File = { ...current, ...patch };
    rows.set(fileId, next);
    return { ...next };
  }

  function live(): File[] {
    return [...rows.values()].filter((file) => !file.isDeleted);
  }

  function matchesName(file: File, search: string | undefined): boolean {
    return (
      search === undefined ||
      file.originalName.toLowerCase().includes(search.toLowerCase())
    );
  }

  return {
    rows,

    async insertFile(record: NewFileRecord): Promise<File> {
      const file: File = {
        id: randomUUID(),
        ownerId: record.ownerId,
        originalName: record.originalName,
        sizeBytes: record.sizeBytes,
        storageKey: record.storageKey,
        contentHash: record.contentHash,
        mimeType: record.mimeType,
        source: record.source,
        sourceUrl: record.sourceUrl,
        createdAt: record.createdAt,
        expiresAt: record.expiresAt,
        downloadToken: null,
        downloadCount: 0,
        isDeleted: false,
        deletedAt: null,
        purgedAt: null,
        updatedAt: record.createdAt,
      };
      rows.set(file.id, file);
      return { ...file };
    },

    async getFile(fileId: string): Promise<File | null> {
      const file = rows.get(fileId);
      return file !== undefined ? { ...file } : null;
    },

    async getFileByToken(token: string): Promise<File | null> {
      const file = [...rows.values()].find((row) => row.downloadToken === token);
      return file !== undefined ? { ...file } : null;
    },

    async listFilesByOwner(
      ownerId: number,
      params: ListFilesParams
    ): Promise<PaginatedResult<File>> {
      return pageByCreatedAtAndId(
        live().filter(
          (file) => file.ownerId === ownerId && matchesName(file, params.search)
        ),
        params
      );
    },

    async searchFiles(params: SearchFilesParams): Promise<PaginatedResult<File>> {
      return pageByCreatedAtAndId(
        [...rows.values()].filter(
          (file) =>
            (params.includeDeleted === true || !file.isDeleted) &&
            (params.ownerId === undefined || file.ownerId === params.ownerId) &&
            matchesName(file, params.search)
        ),
        params
      );
    },

    async softDeleteFile(fileId, at, guard): Promise<File | null> {
      const file = rows.get(fileId);
      if (file === undefined || file.isDeleted) {
        return null;
      }
      if (
        guard?.notUpdatedSince !== undefined &&
        file.updatedAt.getTime() >= guard.notUpdatedSince.getTime()
      ) {
        return null;
      }
      return update(fileId, {
        isDeleted: true,
        deletedAt: at,
        updatedAt: at,
      });
    },

    async swapToken(fileId, expected, next, at): Promise<File | null> {
      const file = rows.get(fileId);
      if (file === undefined || file.isDeleted || file.downloadToken !== expected) {
        return null;
      }
      return update(fileId, { downloadToken: next, downloadCount: 0, updatedAt: at });
    },

    async incrementDownloadCount(fileId: string): Promise<void> {
      const file = rows.get(fileId);
      if (file !== undefined) {
        update(fileId, { downloadCount: file.downloadCount + 1 });
      }
    },

    async listExpired(params): Promise<File[]> {
      return live()
        .filter(
          (file) =>
            file.expiresAt.getTime() <= params.now.getTime() &&
            file.updatedAt.getTime() < params.notUpdatedSince.getTime() &&
            (params.afterId === null || file.id > params.afterId)
        )
        .sort((a, b) => (a.id < b.id ? -1 : 1))
        .slice(0, params.limit);
    },

    async listPendingPurge(params): Promise<File[]> {
      return [...rows.values()]
        .filter(
          (file) =>
            file.isDeleted &&
            file.purgedAt === null &&
            (params.afterId === null || file.id > params.afterId)
        )
        .sort((a, b) => (a.id < b.id ? -1 : 1))
        .slice(0, params.limit);
    },

    async markPurged(fileId: string, at: Date): Promise<void> {
      update(fileId, { purgedAt: at });
    },

    async countLiveReferences(storageKey, excludeId): Promise<number> {
      return live().filter(
        (file) => file.storageKey === storageKey && file.id !== excludeId
      ).length;
    },

    async isStorageKeyTracked(storageKey): Promise<boolean> {
      return [...rows.values()].some(
        (file) => file.storageKey === storageKey && file.purgedAt === null
      );
    },

    async findLiveByHash(ownerId, contentHash): Promise<File | null> {
      const match = live()
        .filter((file) => file.ownerId === ownerId && file.contentHash === contentHash)
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())[0];
      return match !== undefined ? { ...match } : null;
    },

    async getStorageUsage(ownerId: number) {
      const owned = live().filter((file) => file.ownerId === ownerId);
      return {
        usedBytes: owned.reduce((sum, file) => sum + file.sizeBytes, 0),
        fileCount: owned.length,
      };
    },

    async getTotals() {
      const all = live();
      return {
        liveFiles: all.length,
        liveBytes: all.reduce((sum, file) => sum + file.sizeBytes, 0),
      };
    },

    async deleteFileRow(fileId: string): Promise<void> {
      rows.delete(fileId);
    },
  };
}

// ─────────────────────────────────────────────────────────────
// AUDIT
// ─────────────────────────────────────────────────────────────

export interface InMemoryAuditDb extends AuditServiceDb {
  entries: AuditLogEntry[];
  actions: () => string[];
}

export function createInMemoryAuditDb(now: Clock = () => new Date()): InMemoryAuditDb {
  const logs: AuditLog[] = [];
  const entries: AuditLogEntry[] = [];

  return {
    entries,

    actions: () => entries.map((entry) => entry.action),

    async insertLog(entry: AuditLogEntry): Promise<{ id: string }> {
      const id = randomUUID();
      entries.push(entry);
      logs.push({
        id,
        timestamp: now(),
        actorId: entry.actorId,
        actorType: entry.actorType,
        action: entry.action,
        resourceType: entry.resourceType,
        resourceId: entry.resourceId,
        details: entry.details,
        ipAddress: entry.ipAddress,
        requestId: entry.requestId,
      });
      return { id };
    },

    async queryLogs(params: AuditQueryParams): Promise<PaginatedResult<AuditLog>> {
      const matches = logs
        .filter(
          (log) =>
            (params.actorId === undefined || log.actorId === params.actorId) &&
            (params.action === undefined || log.action === params.action) &&
            (params.resourceType === undefined ||
              log.resourceType === params.resourceType) &&
            (params.resourceId === undefined || log.resourceId === params.resourceId)
        )
        .reverse();
      const items = matches.slice(0, params.limit);
      return { items, hasMore: matches.length > params.limit };
    },

    async getLogsByResource(resourceType, resourceId): Promise<AuditLog[]> {
      return logs
        .filter(
          (log) => log.resourceType === resourceType && log.resourceId === resourceId
        )
        .reverse();
    },
  };
}

// ─────────────────────────────────────────────────────────────
// SETTINGS
// ─────────────────────────────────────────────────────────────

export function createInMemorySettingsDb(
  now: Clock = () => new Date()
): SettingsServiceDb & { rows: Map<string, StoredSetting> } {
  const rows = new Map<string, StoredSetting>();

  return {
    rows,

    async getSetting(key: string): Promise<StoredSetting | null> {
      return rows.get(key) ?? null;
    },

    async listSettings(): Promise<StoredSetting[]> {
      return [...rows.values()].sort((a, b) => a.key.localeCompare(b.key));
    },

    async upsertSetting(key: string, value: unknown): Promise<StoredSetting> {
      const saved: StoredSetting = { key, value, updatedAt: now() };
      rows.set(key, saved);
      return saved;
    },
  };
}

// ─────────────────────────────────────────────────────────────
// STORAGE AND MESSAGING
// ─────────────────────────────────────────────────────────────

export interface InMemoryStorage extends FileStorage {
  objects: Map<string, Uint8Array>;
  modifiedAt: Map<string, Date>;
  emptyDirectories: Set<string>;
  removed: string[];
  /** Put bytes in place without a write, as a crash or stray copy would */
  place(storageKey: string, content: Uint8Array, modifiedAt: Date): void;
}

/**
 * Byte store with the same budget rules as the local volume adapter
 */
export function createInMemoryStorage(): InMemoryStorage {
  const objects = new Map<string, Uint8Array>();
  const modifiedAt = new Map<string, Date>();
  const emptyDirectories = new Set<string>();
  const removed: string[] = [];
  let sequence = 0;

  return {
    objects,
    modifiedAt,
    emptyDirectories,
    removed,

    place(storageKey: string, content: Uint8Array, at: Date): void {
      objects.set(storageKey, content);
      modifiedAt.set(storageKey, at);
    },

    async write(params): Promise<Result<StoredObject>> {
      const parts: Uint8Array[] = [];
      let sizeBytes = 0;
      for await (const chunk of params.chunks) {
        sizeBytes += chunk.byteLength;
        if (sizeBytes > params.maxBytes) {
          return failure('SIZE_TOO_LARGE', 'File exceeds the allowed size', {
            maxBytes: params.maxBytes,
          });
        }
        parts.push(chunk);
      }
      if (params.signal?.aborted === true) {
        return failure('TRANSFER_ABORTED', 'Transfer took too long');
      }

      const bytes = Buffer.concat(parts);
      const storageKey = `users/${params.ownerId}/${++sequence}_${params.fileName}`;
      objects.set(storageKey, bytes);
      modifiedAt.set(storageKey, params.now ?? new Date());
      return success({
        storageKey,
        sizeBytes,
        contentHash: createHash('sha256').update(bytes).digest('hex'),
      });
    },

    async remove(storageKey: string): Promise<void> {
      removed.push(storageKey);
      objects.delete(storageKey);
      modifiedAt.delete(storageKey);
    },

    scan(): AsyncIterable<StorageEntry> {
      return {
        async *[Symbol.asyncIterator]() {
          for (const [storageKey, content] of [...objects]) {
            yield {
              storageKey,
              sizeBytes: content.byteLength,
              modifiedAt: modifiedAt.get(storageKey) ?? new Date(0),
              partial: storageKey.endsWith('.part'),
            };
          }
        },
      };
    },

    async removeEmptyDirectories(): Promise<number> {
      const count = emptyDirectories.size;
      emptyDirectories.clear();
      return count;
    },

    async exists(storageKey: string): Promise<boolean> {
      return objects.has(storageKey);
    },

    publicPath(storageKey: string): string {
      return `/protected/${storageKey}`;
    },
  };
}

export function createMockMessenger(): ChatMessenger & {
  sendMessage: ReturnType<typeof vi.fn>;
} {
  return {
    sendMessage: vi.fn().mockResolvedValue(undefined),
  };
}
