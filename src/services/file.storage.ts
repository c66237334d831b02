/**
 * Local Volume Storage Adapter
 *
 * Bytes live under one root directory:
 *   users/<owner hash>/<yyyy>/<mm>/<dd>/<uuid>_<sanitized name>
 *
 * Writes go to a ".part" file first and are renamed into place only
 * when the whole stream arrived within the byte and time budgets.
 * Anything else removes the partial file. A crash mid-write can still
 * leave one behind; scan() reports those so the sweeper can remove them.
 */

import { createHash, randomUUID } from 'node:crypto';
import type { Dirent, Stats } from 'node:fs';
import { mkdir, open, readdir, rename, rm, rmdir, stat } from 'node:fs/promises';
import path from 'node:path';

import { sanitizeFileName } from '../lib/validation.js';
import type { Result } from '../types/index.js';
import { success, failure } from '../types/index.js';

export interface StoredObject {
  storageKey: string;
  sizeBytes: number;
  contentHash: string;
}

export interface StorageEntry {
  storageKey: string;
  sizeBytes: number;
  modifiedAt: Date;
  /** An unfinished ".part" write */
  partial: boolean;
}

export interface WriteObjectParams {
  ownerId: number;
  fileName: string;
  chunks: AsyncIterable<Uint8Array>;
  maxBytes: number;
  signal?: AbortSignal;
  now?: Date;
}

/**
 * Storage abstraction used by registration and the sweeper
 */
export interface FileStorage {
  write: (params: WriteObjectParams) => Promise<Result<StoredObject>>;
  remove: (storageKey: string) => Promise<void>;
  exists: (storageKey: string) => Promise<boolean>;
  /**
   * Every object under users/, including unfinished writes
   */
  scan: () => AsyncIterable<StorageEntry>;
  /**
   * Remove directories under users/ left empty; returns how many went
   */
  removeEmptyDirectories: () => Promise<number>;
  /**
   * Path the static file server serves the object from
   */
  publicPath: (storageKey: string) => string;
}

class ByteLimitExceeded extends Error {
  constructor(readonly maxBytes: number) {
    super(`Upload exceeds ${maxBytes} bytes`);
  }
}

export const PARTIAL_SUFFIX = '.part';

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string'
    ? err.code
    : undefined;
}

function ownerDirectory(ownerId: number): string {
  return createHash('sha256').update(String(ownerId)).digest('hex').slice(0, 8);
}

export function buildStorageKey(
  ownerId: number,
  fileName: string,
  at: Date
): string {
  const yyyy = String(at.getUTCFullYear());
  const mm = String(at.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(at.getUTCDate()).padStart(2, '0');
  const unique = randomUUID().replace(/-/g, '');
  return [
    'users',
    ownerDirectory(ownerId),
    yyyy,
    mm,
    dd,
    `${unique}_${sanitizeFileName(fileName)}`,
  ].join('/');
}

/**
 * Create local-volume storage rooted at rootDir
 */
export function createLocalFileStorage(config: {
  rootDir: string;
  publicPrefix?: string;
}): FileStorage {
  const rootDir = path.resolve(config.rootDir);
  const publicPrefix = config.publicPrefix ?? '/protected';

  function resolveKey(storageKey: string): string {
    const resolved = path.resolve(rootDir, storageKey);
    if (!resolved.startsWith(rootDir + path.sep)) {
      throw new Error(`Storage key escapes the storage root: ${storageKey}`);
    }
    return resolved;
  }

  return {
    async write(params: WriteObjectParams): Promise<Result<StoredObject>> {
      const storageKey = buildStorageKey(
        params.ownerId,
        params.fileName,
        params.now ?? new Date()
      );
      const finalPath = resolveKey(storageKey);
      const partPath = `${finalPath}${PARTIAL_SUFFIX}`;
      const hash = createHash('sha256');
      let sizeBytes = 0;

      try {
        await mkdir(path.dirname(finalPath), { recursive: true });
        const handle = await open(partPath, 'wx');
        try {
          for await (const chunk of params.chunks) {
            if (params.signal?.aborted === true) {
              break;
            }
            sizeBytes += chunk.byteLength;
            if (sizeBytes > params.maxBytes) {
              throw new ByteLimitExceeded(params.maxBytes);
            }
            hash.update(chunk);
            await handle.write(chunk);
          }
        } finally {
          await handle.close();
        }

        if (params.signal?.aborted === true) {
          await rm(partPath, { force: true });
          return failure('TRANSFER_ABORTED', 'Transfer took too long');
        }

        await rename(partPath, finalPath);
      } catch (err) {
        await rm(partPath, { force: true });
        if (err instanceof ByteLimitExceeded) {
          return failure('SIZE_TOO_LARGE', 'File exceeds the allowed size', {
            maxBytes: err.maxBytes,
          });
        }
        if (params.signal?.aborted === true) {
          return failure('TRANSFER_ABORTED', 'Transfer took too long');
        }
        console.error('[storage] write failed:', err);
        return failure('STORAGE_IO_FAILURE', 'Could not store the file');
      }

      return success({
        storageKey,
        sizeBytes,
        contentHash: hash.digest('hex'),
      });
    },

    async remove(storageKey: string): Promise<void> {
      await rm(resolveKey(storageKey), { force: true });
    },

    async exists(storageKey: string): Promise<boolean> {
      try {
        const info = await stat(resolveKey(storageKey));
        return info.isFile();
      } catch (err) {
        if (errorCode(err) === 'ENOENT') {
          return false;
        }
        throw err;
      }
    },

    scan(): AsyncIterable<StorageEntry> {
      async function* walk(dir: string): AsyncGenerator<StorageEntry> {
        let entries: Dirent[];
        try {
          entries = await readdir(dir, { withFileTypes: true });
        } catch (err) {
          if (errorCode(err) === 'ENOENT') return;
          throw err;
        }
        for (const entry of entries) {
          const fullPath = path.join(dir, entry.name);
          if (entry.isDirectory()) {
            yield* walk(fullPath);
            continue;
          }
          if (!entry.isFile()) continue;
          let info: Stats;
          try {
            info = await stat(fullPath);
          } catch (err) {
            // Renamed or removed since readdir
            if (errorCode(err) === 'ENOENT') continue;
            throw err;
          }
          yield {
            storageKey: path.relative(rootDir, fullPath).split(path.sep).join('/'),
            sizeBytes: info.size,
            modifiedAt: info.mtime,
            partial: entry.name.endsWith(PARTIAL_SUFFIX),
          };
        }
      }

      return {
        [Symbol.asyncIterator]: () => walk(path.join(rootDir, 'users')),
      };
    },

    async removeEmptyDirectories(): Promise<number> {
      async function prune(dir: string, isRoot: boolean): Promise<number> {
        let entries: Dirent[];
        try {
          entries = await readdir(dir, { withFileTypes: true });
        } catch (err) {
          if (errorCode(err) === 'ENOENT') return 0;
          throw err;
        }
        let removed = 0;
        for (const entry of entries) {
          if (entry.isDirectory()) {
            removed += await prune(path.join(dir, entry.name), false);
          }
        }
        if (isRoot || (await readdir(dir)).length > 0) {
          return removed;
        }
        try {
          await rmdir(dir);
          return removed + 1;
        } catch (err) {
          // A write landed in it meanwhile
          if (errorCode(err) === 'ENOTEMPTY' || errorCode(err) === 'ENOENT') {
            return removed;
          }
          throw err;
        }
      }

      return prune(path.join(rootDir, 'users'), true);
    },

    publicPath(storageKey: string): string {
      return `${publicPrefix}/${storageKey}`;
    },
  };
}
