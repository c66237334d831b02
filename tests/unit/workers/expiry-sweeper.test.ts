/**
 * Expiry Sweeper Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import type { File } from '@/types/index.js';
import { SYSTEM_ACTOR } from '@/types/index.js';
import { createExpirySweeper } from '@/workers/index.js';

import type { TestServices } from '../../helpers/e2e-utils.js';
import { createTestServices } from '../../helpers/e2e-utils.js';
import { createTestUser } from '../../helpers/test-utils.js';

describe('ExpirySweeper', () => {
  let services: TestServices;

  beforeEach(() => {
    services = createTestServices();
    services.db.users.seed(createTestUser({ id: 1001 }));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  async function fileWith(storageKey: string, days: number): Promise<File> {
    services.storage.objects.set(storageKey, new Uint8Array(10));
    const created = await services.fileService.create(SYSTEM_ACTOR, {
      ownerId: 1001,
      name: 'report.pdf',
      sizeBytes: 10,
      storageKey,
      expiryPolicy: { type: 'relative', days },
    });
    if (!created.success) throw new Error(created.error.message);
    return created.data;
  }

  function countOf(action: string): number {
    return services.db.audit.actions().filter((entry) => entry === action).length;
  }

  it('expires and purges past-due files exactly once', async () => {
    const due = await fileWith('users/1001/due.pdf', 1);
    const live = await fileWith('users/1001/live.pdf', 7);
    services.clock.advanceDays(2);

    const first = await services.sweeper.runOnce();
    const second = await services.sweeper.runOnce();

    expect(first).toMatchObject({ checked: 1, expired: 1, purged: 1, failed: 0 });
    expect(second).toMatchObject({ checked: 0, expired: 0, purged: 0, failed: 0 });
    expect(countOf('file:expired')).toBe(1);
    expect(countOf('file:purged')).toBe(1);
    expect(services.storage.removed).toEqual(['users/1001/due.pdf']);
    expect(services.db.files.rows.get(due.id)).toMatchObject({
      isDeleted: true,
      downloadToken: null,
      purgedAt: services.clock.now(),
    });
    expect(services.db.files.rows.get(live.id)?.isDeleted).toBe(false);
  });

  it('keeps bytes another live file still points at', async () => {
    const shared = 'users/1001/shared.pdf';
    const early = await fileWith(shared, 1);
    await fileWith(shared, 7);
    services.clock.advanceDays(2);

    await services.sweeper.runOnce();

    expect(services.storage.removed).toEqual([]);
    expect(services.db.audit.entries.at(-1)).toMatchObject({
      action: 'file:purged',
      resourceId: early.id,
      details: { bytesRemoved: false },
    });

    services.clock.advanceDays(6);
    await services.sweeper.runOnce();

    expect(services.storage.removed).toEqual([shared]);
  });

  it('counts a storage failure and retries it on the next pass', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const due = await fileWith('users/1001/due.pdf', 1);
    services.clock.advanceDays(2);
    vi.spyOn(services.storage, 'remove').mockRejectedValueOnce(new Error('EIO'));

    const first = await services.sweeper.runOnce();

    expect(first).toMatchObject({ expired: 1, purged: 0, failed: 1 });
    expect(services.db.files.rows.get(due.id)?.purgedAt).toBeNull();

    const second = await services.sweeper.runOnce();

    expect(second).toMatchObject({ expired: 0, purged: 1, failed: 0 });
    expect(countOf('file:expired')).toBe(1);
  });

  it('skips a pass while another is running', async () => {
    await fileWith('users/1001/due.pdf', 1);
    services.clock.advanceDays(2);

    const running = services.sweeper.runOnce();
    const overlapping = await services.sweeper.runOnce();

    expect(overlapping.skipped).toBe(true);
    expect((await running).expired).toBe(1);
  });

  it('refuses an invalid schedule', () => {
    const sweeper = createExpirySweeper({
      db: services.db.files,
      storage: services.storage,
      auditService: services.auditService,
      schedule: 'every ten minutes',
    });

    expect(() => sweeper.start()).toThrow('Invalid sweep schedule: every ten minutes');
  });

  describe('cleanStorage', () => {
    const HOUR_MS = 60 * 60 * 1000;

    function placeAged(storageKey: string, size: number, ageMs: number): void {
      services.storage.place(
        storageKey,
        new Uint8Array(size),
        new Date(services.clock.nowMs() - ageMs)
      );
    }

    it('removes stale partial writes and untracked objects past the grace period', async () => {
      await fileWith('users/1001/kept.pdf', 7);
      placeAged('users/1001/stale.pdf.part', 3, 2 * HOUR_MS);
      placeAged('users/1001/fresh.pdf.part', 4, 10 * 60 * 1000);
      placeAged('users/1001/stray.pdf', 5, 2 * HOUR_MS);
      services.storage.emptyDirectories.add('users/1001/2024/12/31');

      const stats = await services.sweeper.cleanStorage();

      expect(stats).toEqual({
        scanned: 4,
        partialsRemoved: 1,
        orphansRemoved: 1,
        bytesFreed: 8,
        directoriesRemoved: 1,
        failed: 0,
        skipped: false,
      });
      expect(services.storage.removed).toEqual([
        'users/1001/stale.pdf.part',
        'users/1001/stray.pdf',
      ]);
      expect([...services.storage.objects.keys()]).toEqual([
        'users/1001/kept.pdf',
        'users/1001/fresh.pdf.part',
      ]);
    });

    it('keeps the bytes of a deleted file until the purge pass takes them', async () => {
      const file = await fileWith('users/1001/deleted.pdf', 7);
      await services.fileService.softDelete(SYSTEM_ACTOR, file.id);

      const stats = await services.sweeper.cleanStorage();

      expect(stats.orphansRemoved).toBe(0);
      expect(services.storage.objects.has('users/1001/deleted.pdf')).toBe(true);
    });

    it('counts a failed removal and carries on', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      placeAged('users/1001/a.pdf', 1, 2 * HOUR_MS);
      placeAged('users/1001/b.pdf', 1, 2 * HOUR_MS);
      vi.spyOn(services.storage, 'remove').mockRejectedValueOnce(new Error('EACCES'));

      const stats = await services.sweeper.cleanStorage();

      expect(stats).toMatchObject({ scanned: 2, orphansRemoved: 1, failed: 1 });
      expect([...services.storage.objects.keys()]).toEqual(['users/1001/a.pdf']);
    });
  });
});
