/**
 * Expiry Sweeper
 *
 * Periodic pass over the file registry:
 * 1. files past expiresAt are soft-deleted (token cleared) and get one
 *    'file:expired' audit record, written only when this pass made the
 *    transition
 * 2. soft-deleted files whose bytes are still on disk are purged, unless
 *    another live file points at the same bytes
 *
 *
 * A separate, less frequent storage pass walks the volume and removes
 * ".part" leftovers and objects no unpurged row points at, once they are
 * older than the grace period, then prunes empty directories.
 *
 * Rows updated after the pass started are left for the next pass.
 * Storage errors are logged and retried next cycle; they never abort
 * the pass.
 */

import cron, { type ScheduledTask } from 'node-cron';

import type { FileServiceDb } from '../services/file.service.js';
import type { FileStorage } from '../services/file.storage.js';
import type { ActorContext, AuditEvent, File, Result } from '../types/index.js';
import { SYSTEM_ACTOR } from '../types/index.js';

export type SweeperDb = Pick<
  FileServiceDb,
  | 'listExpired'
  | 'softDeleteFile'
  | 'listPendingPurge'
  | 'markPurged'
  | 'countLiveReferences'
  | 'isStorageKeyTracked'
>;

export interface SweeperAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

export interface SweepStats {
  startedAt: Date;
  checked: number;
  expired: number;
  purged: number;
  failed: number;
  skipped: boolean;
  durationMs: number;
}

export interface StorageCleanupStats {
  scanned: number;
  partialsRemoved: number;
  orphansRemoved: number;
  bytesFreed: number;
  directoriesRemoved: number;
  failed: number;
  skipped: boolean;
}

export interface ExpirySweeper {
  runOnce(): Promise<SweepStats>;
  cleanStorage(): Promise<StorageCleanupStats>;
  start(): void;
  stop(): void;
}

const DEFAULT_BATCH_SIZE = 100;
const DEFAULT_ORPHAN_GRACE_MS = 60 * 60 * 1000;

export function createExpirySweeper(deps: {
  db: SweeperDb;
  storage: Pick<FileStorage, 'remove' | 'scan' | 'removeEmptyDirectories'>;
  auditService: SweeperAudit;
  schedule?: string;
  storageSchedule?: string;
  batchSize?: number;
  /** Objects younger than this are left alone; an upload may still be registering */
  orphanGraceMs?: number;
  now?: () => Date;
}): ExpirySweeper {
  const { db, storage, auditService } = deps;
  const schedule = deps.schedule ?? '*/10 * * * *';
  const storageSchedule = deps.storageSchedule ?? '30 3 * * *';
  const batchSize = deps.batchSize ?? DEFAULT_BATCH_SIZE;
  const orphanGraceMs = deps.orphanGraceMs ?? DEFAULT_ORPHAN_GRACE_MS;
  const now = deps.now ?? (() => new Date());

  let running = false;
  let cleaning = false;
  let tasks: ScheduledTask[] = [];

  async function expireOne(
    file: File,
    startedAt: Date,
    stats: SweepStats
  ): Promise<void> {
    try {
      const deleted = await db.softDeleteFile(file.id, now(), {
        notUpdatedSince: startedAt,
      });
      if (deleted === null) {
        return;
      }
      stats.expired++;
      await auditService.log(SYSTEM_ACTOR, {
        action: 'file:expired',
        resourceType: 'file',
        resourceId: file.id,
        details: {
          ownerId: file.ownerId,
          expiresAt: file.expiresAt.toISOString(),
          downloadCount: file.downloadCount,
        },
      });
    } catch (err) {
      stats.failed++;
      console.error(`[sweeper] could not expire file ${file.id}:`, err);
    }
  }

  async function purge(file: File, stats: SweepStats): Promise<void> {
    try {
      const references = await db.countLiveReferences(file.storageKey, file.id);
      if (references === 0) {
        await storage.remove(file.storageKey);
      }
      await db.markPurged(file.id, now());
      stats.purged++;
      await auditService.log(SYSTEM_ACTOR, {
        action: 'file:purged',
        resourceType: 'file',
        resourceId: file.id,
        details: { bytesRemoved: references === 0 },
      });
    } catch (err) {
      stats.failed++;
      console.error(`[sweeper] could not purge file ${file.id}, will retry:`, err);
    }
  }

  async function runOnce(): Promise<SweepStats> {
    const startedAt = now();
    const stats: SweepStats = {
      startedAt,
      checked: 0,
      expired: 0,
      purged: 0,
      failed: 0,
      skipped: false,
      durationMs: 0,
    };

    if (running) {
      stats.skipped = true;
      return stats;
    }
    running = true;

    try {
      let afterId: string | null = null;
      for (;;) {
        const batch: File[] = await db.listExpired({
          now: startedAt,
          notUpdatedSince: startedAt,
          afterId,
          limit: batchSize,
        });
        for (const file of batch) {
          stats.checked++;
          await expireOne(file, startedAt, stats);
        }
        const last = batch[batch.length - 1];
        if (batch.length < batchSize || last === undefined) break;
        afterId = last.id;
      }

      afterId = null;
      for (;;) {
        const batch: File[] = await db.listPendingPurge({
          afterId,
          limit: batchSize,
        });
        for (const file of batch) {
          await purge(file, stats);
        }
        const last = batch[batch.length - 1];
        if (batch.length < batchSize || last === undefined) break;
        afterId = last.id;
      }
    } finally {
      running = false;
      stats.durationMs = now().getTime() - startedAt.getTime();
    }

    if (stats.expired > 0 || stats.purged > 0 || stats.failed > 0) {
      console.log(
        `[sweeper] expired ${stats.expired}, purged ${stats.purged}, ` +
          `failed ${stats.failed} in ${stats.durationMs}ms`
      );
    }
    return stats;
  }

  async function cleanStorage(): Promise<StorageCleanupStats> {
    const stats: StorageCleanupStats = {
      scanned: 0,
      partialsRemoved: 0,
      orphansRemoved: 0,
      bytesFreed: 0,
      directoriesRemoved: 0,
      failed: 0,
      skipped: false,
    };

    if (cleaning) {
      stats.skipped = true;
      return stats;
    }
    cleaning = true;

    try {
      const cutoffMs = now().getTime() - orphanGraceMs;
      for await (const entry of storage.scan()) {
        stats.scanned++;
        if (entry.modifiedAt.getTime() > cutoffMs) continue;
        try {
          if (entry.partial) {
            await storage.remove(entry.storageKey);
            stats.partialsRemoved++;
          } else if (!(await db.isStorageKeyTracked(entry.storageKey))) {
            await storage.remove(entry.storageKey);
            stats.orphansRemoved++;
            console.log(`[sweeper] removed orphaned object ${entry.storageKey}`);
          } else {
            continue;
          }
          stats.bytesFreed += entry.sizeBytes;
        } catch (err) {
          stats.failed++;
          console.error(`[sweeper] could not clean ${entry.storageKey}:`, err);
        }
      }
      stats.directoriesRemoved = await storage.removeEmptyDirectories();
    } finally {
      cleaning = false;
    }

    console.log(
      `[sweeper] storage: scanned ${stats.scanned}, removed ` +
        `${stats.partialsRemoved} partial and ${stats.orphansRemoved} orphaned ` +
        `(${stats.bytesFreed} bytes), ${stats.directoriesRemoved} empty directories`
    );
    return stats;
  }

  return {
    runOnce,
    cleanStorage,

    start(): void {
      if (tasks.length > 0) {
        return;
      }
      if (!cron.validate(schedule)) {
        throw new Error(`Invalid sweep schedule: ${schedule}`);
      }
      if (!cron.validate(storageSchedule)) {
        throw new Error(`Invalid storage cleanup schedule: ${storageSchedule}`);
      }
      tasks = [
        cron.schedule(schedule, () => {
          runOnce().catch((err: unknown) => {
            console.error('[sweeper] pass failed:', err);
          });
        }),
        cron.schedule(storageSchedule, () => {
          cleanStorage().catch((err: unknown) => {
            console.error('[sweeper] storage pass failed:', err);
          });
        }),
      ];
      console.log(`[sweeper] scheduled: ${schedule}, storage: ${storageSchedule}`);
    },

    stop(): void {
      for (const task of tasks) {
        task.stop();
      }
      tasks = [];
    },
  };
}
