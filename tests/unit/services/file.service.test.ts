/**
 * FileService Unit Tests (file registry)
 */

import { describe, it, expect, beforeEach } from 'vitest';

import type { CreateFileParams, File } from '@/types/index.js';
import { SYSTEM_ACTOR } from '@/types/index.js';

import type { TestServices } from '../../helpers/e2e-utils.js';
import { createTestServices } from '../../helpers/e2e-utils.js';
import {
  DAY_MS,
  MB,
  createAdminActor,
  createTestUser,
  createUserActor,
} from '../../helpers/test-utils.js';

const OWNER_ID = 1001;

describe('FileService', () => {
  let services: TestServices;
  let keySequence: number;

  beforeEach(() => {
    services = createTestServices();
    services.db.users.seed(createTestUser({ id: OWNER_ID }));
    keySequence = 0;
  });

  async function createFile(overrides?: Partial<CreateFileParams>): Promise<File> {
    const result = await services.fileService.create(SYSTEM_ACTOR, {
      ownerId: OWNER_ID,
      name: 'report.pdf',
      sizeBytes: 1024,
      storageKey: `users/${OWNER_ID}/${++keySequence}_report.pdf`,
      expiryPolicy: { type: 'relative', days: 7 },
      ...overrides,
    });
    if (!result.success) {
      throw new Error(result.error.message);
    }
    return result.data;
  }

  describe('create', () => {
    it('stores the file with expiry relative to creation', async () => {
      const file = await createFile({ expiryPolicy: { type: 'relative', days: 3 } });

      expect(file.ownerId).toBe(OWNER_ID);
      expect(file.originalName).toBe('report.pdf');
      expect(file.createdAt).toEqual(services.clock.now());
      expect(file.expiresAt.getTime() - file.createdAt.getTime()).toBe(3 * DAY_MS);
      expect(file.downloadToken).toBeNull();
      expect(file.isDeleted).toBe(false);
      expect(services.db.audit.entries[0]).toMatchObject({
        action: 'file:created',
        resourceId: file.id,
        details: {
          ownerId: OWNER_ID,
          name: 'report.pdf',
          sizeBytes: 1024,
          expiresAt: '2025-01-04T00:00:00.000Z',
          source: 'upload',
        },
      });
    });

    it('accepts an absolute expiry inside the plan window', async () => {
      const expiresAt = new Date('2025-01-05T12:00:00.000Z');

      const file = await createFile({ expiryPolicy: { type: 'absolute', expiresAt } });

      expect(file.expiresAt).toEqual(expiresAt);
    });

    it('rejects an expiry longer than the plan allows', async () => {
      const result = await services.fileService.create(SYSTEM_ACTOR, {
        ownerId: OWNER_ID,
        name: 'report.pdf',
        sizeBytes: 1024,
        storageKey: 'users/x/report.pdf',
        expiryPolicy: { type: 'relative', days: 8 },
      });

      expect(result).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Expiry is longer than the plan allows',
          details: { maxDays: 7 },
        },
      });
      expect(services.db.files.rows.size).toBe(0);
    });

    it('rejects an expiry that is not after creation', async () => {
      const result = await services.fileService.create(SYSTEM_ACTOR, {
        ownerId: OWNER_ID,
        name: 'report.pdf',
        sizeBytes: 1024,
        storageKey: 'users/x/report.pdf',
        expiryPolicy: { type: 'absolute', expiresAt: services.clock.now() },
      });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.message).toBe('Expiry must be in the future');
    });

    it('refuses to create files for another user', async () => {
      const result = await services.fileService.create(createUserActor(2), {
        ownerId: OWNER_ID,
        name: 'report.pdf',
        sizeBytes: 1024,
        storageKey: 'users/x/report.pdf',
        expiryPolicy: { type: 'relative', days: 1 },
      });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('OWNER_MISMATCH');
    });

    it('refuses blocked owners', async () => {
      services.db.users.seed(createTestUser({ id: OWNER_ID, isBlocked: true }));

      await expect(createFile()).rejects.toThrow('User is blocked');
    });
  });

  describe('checkRegistration', () => {
    it('rejects files over the plan size before any bytes move', async () => {
      const owner = createTestUser({ id: OWNER_ID });

      const result = await services.fileService.checkRegistration(owner, {
        name: 'movie.mp4',
        sizeBytes: 60 * MB,
      });

      expect(result).toEqual({
        success: false,
        error: {
          code: 'SIZE_TOO_LARGE',
          message: 'File exceeds the allowed size',
          details: { maxBytes: 50 * MB, sizeBytes: 60 * MB },
        },
      });
    });

    it('always blocks executable extensions', async () => {
      const result = await services.fileService.checkRegistration(
        createTestUser({ id: OWNER_ID }),
        { name: 'setup.EXE', sizeBytes: 10 }
      );

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('EXTENSION_BLOCKED');
      expect(result.error.details).toEqual({ extension: '.exe' });
    });

    it('applies the allow list when one is configured', async () => {
      services = createTestServices({ settings: { ALLOWED_EXTENSIONS: ['.pdf'] } });
      const owner = createTestUser({ id: OWNER_ID });

      const zip = await services.fileService.checkRegistration(owner, {
        name: 'archive.zip',
        sizeBytes: 10,
      });
      const pdf = await services.fileService.checkRegistration(owner, {
        name: 'report.pdf',
        sizeBytes: 10,
      });

      expect(zip.success).toBe(false);
      expect(pdf.success).toBe(true);
    });

    it('rejects names without an extension', async () => {
      const result = await services.fileService.checkRegistration(
        createTestUser({ id: OWNER_ID }),
        { name: 'README', sizeBytes: 10 }
      );

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.message).toBe('File name must have an extension');
    });

    it('stops at the file count limit', async () => {
      for (let i = 0; i < 10; i++) {
        await createFile();
      }

      const result = await services.fileService.checkRegistration(
        createTestUser({ id: OWNER_ID }),
        { name: 'one-more.pdf', sizeBytes: 10 }
      );

      expect(result).toEqual({
        success: false,
        error: {
          code: 'QUOTA_EXCEEDED',
          message: 'File count limit reached',
          details: { maxFiles: 10, fileCount: 10 },
        },
      });
    });

    it('stops when the storage quota would be exceeded', async () => {
      await createFile({ sizeBytes: 45 * MB });
      await createFile({ sizeBytes: 45 * MB });

      const result = await services.fileService.checkRegistration(
        createTestUser({ id: OWNER_ID }),
        { name: 'big.pdf', sizeBytes: 20 * MB }
      );

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('QUOTA_EXCEEDED');
      expect(result.error.message).toBe('Storage quota would be exceeded');
    });

    it('caps the streaming budget at what the quota leaves when size is unknown', async () => {
      await createFile({ sizeBytes: 45 * MB });
      await createFile({ sizeBytes: 45 * MB });

      const result = await services.fileService.checkRegistration(
        createTestUser({ id: OWNER_ID }),
        { name: 'unknown.pdf', sizeBytes: null }
      );

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.maxBytes).toBe(10 * MB);
      expect(result.data.name).toBe('unknown.pdf');
    });

    it('applies the global upload cap below the plan cap', async () => {
      services = createTestServices({ settings: { MAX_UPLOAD_SIZE_MB: 5 } });

      const result = await services.fileService.checkRegistration(
        createTestUser({ id: OWNER_ID }),
        { name: 'report.pdf', sizeBytes: null }
      );

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.maxBytes).toBe(5 * MB);
    });
  });

  describe('get', () => {
    it('returns the file to its owner', async () => {
      const file = await createFile();

      const result = await services.fileService.get(createUserActor(OWNER_ID), file.id);

      expect(result).toEqual({ success: true, data: file });
    });

    it('refuses other users', async () => {
      const file = await createFile();

      const result = await services.fileService.get(createUserActor(2), file.id);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('OWNER_MISMATCH');
    });

    it('hides deleted files from owners but not from admins', async () => {
      const file = await createFile();
      await services.fileService.softDelete(createUserActor(OWNER_ID), file.id);

      const owner = await services.fileService.get(createUserActor(OWNER_ID), file.id);
      const admin = await services.fileService.get(createAdminActor(), file.id);

      expect(owner.success).toBe(false);
      if (owner.success) return;
      expect(owner.error.code).toBe('NOT_FOUND');
      expect(admin.success && admin.data.isDeleted).toBe(true);
    });
  });

  describe('listByOwner', () => {
    it('yields live files newest first and restarts on each iteration', async () => {
      const first = await createFile({ name: 'first.pdf' });
      services.clock.advance(1_000);
      const second = await createFile({ name: 'second.pdf' });
      services.clock.advance(1_000);
      const gone = await createFile({ name: 'gone.pdf' });
      await services.fileService.softDelete(SYSTEM_ACTOR, gone.id);

      const listing = services.fileService.listByOwner(OWNER_ID);
      const names: string[] = [];
      for await (const file of listing) {
        names.push(file.originalName);
      }
      const again: string[] = [];
      for await (const file of listing) {
        again.push(file.id);
      }

      expect(names).toEqual(['second.pdf', 'first.pdf']);
      expect(again).toEqual([second.id, first.id]);
    });

  });

  describe('listFiles', () => {
    it('pages through files that share a creation time', async () => {
      const created = [
        await createFile({ name: 'a.pdf' }),
        await createFile({ name: 'b.pdf' }),
        await createFile({ name: 'c.pdf' }),
      ];
      const actor = createUserActor(OWNER_ID);

      const first = await services.fileService.listFiles(actor, OWNER_ID, { limit: 2 });
      if (!first.success) throw new Error(first.error.message);
      const second = await services.fileService.listFiles(actor, OWNER_ID, {
        limit: 2,
        ...(first.data.nextCursor !== undefined && { cursor: first.data.nextCursor }),
      });
      if (!second.success) throw new Error(second.error.message);

      expect(first.data.items).toHaveLength(2);
      expect(first.data.hasMore).toBe(true);
      expect(second.data.items).toHaveLength(1);
      expect(second.data.hasMore).toBe(false);
      expect(
        [...first.data.items, ...second.data.items].map((file) => file.id).sort()
      ).toEqual(created.map((file) => file.id).sort());
    });

    it('rejects a cursor it did not issue', async () => {
      const result = await services.fileService.listFiles(
        createUserActor(OWNER_ID),
        OWNER_ID,
        { cursor: '2025-01-01T00:00:00.000Z' }
      );

      expect(result).toEqual({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Invalid cursor' },
      });
    });
  });

  describe('listByOwner search', () => {
    it('filters by a case-insensitive name search', async () => {
      await createFile({ name: 'Holiday-Photos.zip' });
      await createFile({ name: 'taxes.pdf' });

      const names: string[] = [];
      for await (const file of services.fileService.listByOwner(OWNER_ID, ' photos ')) {
        names.push(file.originalName);
      }

      expect(names).toEqual(['Holiday-Photos.zip']);
    });
  });

  describe('softDelete', () => {
    it('kills the link, audits once and is idempotent', async () => {
      const file = await createFile();
      const token = await services.linkService.issue(SYSTEM_ACTOR, file);
      expect(token.success).toBe(true);

      const first = await services.fileService.softDelete(createUserActor(OWNER_ID), file.id);
      const second = await services.fileService.softDelete(createUserActor(OWNER_ID), file.id);

      expect(first.success && first.data.alreadyDeleted).toBe(false);
      expect(first.success && first.data.file.isDeleted).toBe(true);
      expect(second.success && second.data.alreadyDeleted).toBe(true);
      if (!token.success) return;
      expect(await services.linkService.resolve(token.data)).toEqual({
        success: false,
        error: {
          code: 'INVALID_TOKEN',
          message: 'Link is not valid',
          details: { reason: 'deleted' },
        },
      });
      expect(
        services.db.audit.actions().filter((action) => action === 'file:deleted')
      ).toHaveLength(1);
    });

    it('refuses other users', async () => {
      const file = await createFile();

      const result = await services.fileService.softDelete(createUserActor(2), file.id);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('OWNER_MISMATCH');
      expect(services.db.files.rows.get(file.id)?.isDeleted).toBe(false);
    });
  });

  describe('softDeleteMany', () => {
    it('deletes own files and skips the ones it may not touch', async () => {
      services.db.users.seed(createTestUser({ id: 2 }));
      const mine = await createFile();
      const gone = await createFile();
      const theirs = await createFile({ ownerId: 2 });
      await services.fileService.softDelete(createUserActor(OWNER_ID), gone.id);

      const result = await services.fileService.softDeleteMany(createUserActor(OWNER_ID), [
        mine.id,
        gone.id,
        theirs.id,
        'missing',
        mine.id,
      ]);

      expect(result).toEqual({
        success: true,
        data: {
          deleted: [mine.id],
          alreadyDeleted: [gone.id],
          skipped: [theirs.id, 'missing'],
        },
      });
      expect(services.db.files.rows.get(theirs.id)?.isDeleted).toBe(false);
      expect(
        services.db.audit.actions().filter((action) => action === 'file:deleted')
      ).toHaveLength(2);
    });

    it('rejects an empty batch and one over 100 ids', async () => {
      const actor = createUserActor(OWNER_ID);

      const empty = await services.fileService.softDeleteMany(actor, [' ']);
      const tooMany = await services.fileService.softDeleteMany(
        actor,
        Array.from({ length: 101 }, (_, i) => `file-${i}`)
      );

      expect(empty.success).toBe(false);
      expect(!empty.success && empty.error.code).toBe('VALIDATION_ERROR');
      expect(tooMany.success).toBe(false);
      expect(!tooMany.success && tooMany.error.details).toEqual({ maxFiles: 100 });
    });
  });

  describe('admin reads', () => {
    it('searches across owners, including deleted files on request', async () => {
      services.db.users.seed(createTestUser({ id: 2002 }));
      const mine = await createFile({ name: 'notes.txt' });
      await createFile({ ownerId: 2002, name: 'notes-2.txt' });
      await services.fileService.softDelete(SYSTEM_ACTOR, mine.id);

      const live = await services.fileService.searchFiles(createAdminActor(), {
        search: 'notes',
      });
      const all = await services.fileService.searchFiles(createAdminActor(), {
        search: 'notes',
        includeDeleted: true,
      });

      expect(live.success && live.data.items.map((file) => file.ownerId)).toEqual([2002]);
      expect(all.success && all.data.items).toHaveLength(2);
    });

    it('refuses search and totals to users', async () => {
      const search = await services.fileService.searchFiles(createUserActor(OWNER_ID), {});
      const totals = await services.fileService.getTotals(createUserActor(OWNER_ID));

      expect(search.success).toBe(false);
      expect(totals.success).toBe(false);
    });

    it('reports storage usage against the plan', async () => {
      await createFile({ sizeBytes: 3 * MB });
      await createFile({ sizeBytes: 2 * MB });

      const result = await services.fileService.getStorageUsage(
        createUserActor(OWNER_ID),
        OWNER_ID
      );

      expect(result).toEqual({
        success: true,
        data: {
          usedBytes: 5 * MB,
          limitBytes: 100 * MB,
          fileCount: 2,
          fileLimit: 10,
        },
      });
    });
  });
});
