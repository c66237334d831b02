/**
 * FileService Database Adapter
 * Implements FileServiceDb interface using Supabase
 *
 * Guarded updates (soft delete, token swap) are single UPDATE statements
 * with the guard in the WHERE clause; an empty result means the guard
 * did not hold.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  File,
  FileTotals,
  ListFilesParams,
  PaginatedResult,
} from '../types/index.js';
import { decodeKeysetCursor, encodeKeysetCursor } from '../types/index.js';

import type {
  FileServiceDb,
  NewFileRecord,
  SearchFilesParams,
} from './file.service.js';

interface FileRow {
  id: string;
  owner_id: number;
  original_name: string;
  size_bytes: number;
  storage_key: string;
  content_hash: string | null;
  mime_type: string | null;
  source: string;
  source_url: string | null;
  created_at: string;
  expires_at: string;
  download_token: string | null;
  download_count: number;
  is_deleted: boolean;
  deleted_at: string | null;
  purged_at: string | null;
  updated_at: string;
}

function mapRowToFile(row: FileRow): File {
  return {
    id: row.id,
    ownerId: Number(row.owner_id),
    originalName: row.original_name,
    sizeBytes: Number(row.size_bytes),
    storageKey: row.storage_key,
    contentHash: row.content_hash,
    mimeType: row.mime_type,
    source: row.source === 'url' ? 'url' : 'upload',
    sourceUrl: row.source_url,
    createdAt: new Date(row.created_at),
    expiresAt: new Date(row.expires_at),
    downloadToken: row.download_token,
    downloadCount: row.download_count,
    isDeleted: row.is_deleted,
    deletedAt: row.deleted_at !== null ? new Date(row.deleted_at) : null,
    purgedAt: row.purged_at !== null ? new Date(row.purged_at) : null,
    updatedAt: new Date(row.updated_at),
  };
}

function toPage(rows: FileRow[], limit: number): PaginatedResult<File> {
  const hasMore = rows.length > limit;
  const items = rows.slice(0, limit).map(mapRowToFile);

  const result: PaginatedResult<File> = { items, hasMore };
  const lastItem = items[items.length - 1];
  if (hasMore && lastItem !== undefined) {
    result.nextCursor = encodeKeysetCursor(lastItem.createdAt, lastItem.id);
  }
  return result;
}

/**
 * PostgREST filter for rows after the cursor in (created_at, id) desc order
 */
function afterCursor(cursor: string): string {
  const position = decodeKeysetCursor(cursor);
  if (position === null) {
    throw new Error(`Invalid cursor: ${cursor}`);
  }
  const at = `"${position.createdAt}"`;
  return `created_at.lt.${at},and(created_at.eq.${at},id.lt.${position.id})`;
}

function escapeLike(term: string): string {
  return term.replace(/[%_\\]/g, (char) => `\\${char}`);
}

/**
 * Create FileServiceDb implementation using Supabase
 */
export function createFileServiceDb(supabase: SupabaseClient): FileServiceDb {
  return {
    async insertFile(record: NewFileRecord): Promise<File> {
      const { data, error } = await supabase
        .from('files')
        .insert({
          owner_id: record.ownerId,
          original_name: record.originalName,
          size_bytes: record.sizeBytes,
          storage_key: record.storageKey,
          content_hash: record.contentHash,
          mime_type: record.mimeType,
          source: record.source,
          source_url: record.sourceUrl,
          created_at: record.createdAt.toISOString(),
          expires_at: record.expiresAt.toISOString(),
          updated_at: record.createdAt.toISOString(),
        })
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to create file: ${error.message}`);
      }

      return mapRowToFile(data as FileRow);
    },

    async getFile(fileId: string): Promise<File | null> {
      const { data, error } = await supabase
        .from('files')
        .select('*')
        .eq('id', fileId)
        .single();

      if (error !== null) {
        // PGRST116: no rows; 22P02: not a uuid
        if (error.code === 'PGRST116' || error.code === '22P02') {
          return null;
        }
        throw new Error(`Failed to get file: ${error.message}`);
      }

      return mapRowToFile(data as FileRow);
    },

    async getFileByToken(token: string): Promise<File | null> {
      const { data, error } = await supabase
        .from('files')
        .select('*')
        .eq('download_token', token)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to resolve token: ${error.message}`);
      }

      return data !== null ? mapRowToFile(data as FileRow) : null;
    },

    async listFilesByOwner(
      ownerId: number,
      params: ListFilesParams
    ): Promise<PaginatedResult<File>> {
      let query = supabase
        .from('files')
        .select('*')
        .eq('owner_id', ownerId)
        .eq('is_deleted', false)
        .order('created_at', { ascending: false });

      if (params.search !== undefined) {
        query = query.ilike('original_name', `%${escapeLike(params.search)}%`);
      }
      if (params.cursor !== undefined) {
        query = query.or(afterCursor(params.cursor));
      }

      const { data, error } = await query
        .order('id', { ascending: false })
        .limit(params.limit + 1);

      if (error !== null) {
        throw new Error(`Failed to list files: ${error.message}`);
      }

      return toPage((data ?? []) as FileRow[], params.limit);
    },

    async searchFiles(
      params: SearchFilesParams
    ): Promise<PaginatedResult<File>> {
      let query = supabase
        .from('files')
        .select('*')
        .order('created_at', { ascending: false });

      if (params.includeDeleted !== true) {
        query = query.eq('is_deleted', false);
      }
      if (params.ownerId !== undefined) {
        query = query.eq('owner_id', params.ownerId);
      }
      if (params.search !== undefined) {
        query = query.ilike('original_name', `%${escapeLike(params.search)}%`);
      }
      if (params.cursor !== undefined) {
        query = query.or(afterCursor(params.cursor));
      }

      const { data, error } = await query
        .order('id', { ascending: false })
        .limit(params.limit + 1);

      if (error !== null) {
        throw new Error(`Failed to search files: ${error.message}`);
      }

      return toPage((data ?? []) as FileRow[], params.limit);
    },

    async softDeleteFile(
      fileId: string,
      at: Date,
      guard?: { notUpdatedSince?: Date }
    ): Promise<File | null> {
      let query = supabase
        .from('files')
        .update({
          is_deleted: true,
          deleted_at: at.toISOString(),
          updated_at: at.toISOString(),
        })
        .eq('id', fileId)
        .eq('is_deleted', false);

      if (guard?.notUpdatedSince !== undefined) {
        query = query.lt('updated_at', guard.notUpdatedSince.toISOString());
      }

      const { data, error } = await query.select('*').maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to delete file: ${error.message}`);
      }

      return data !== null ? mapRowToFile(data as FileRow) : null;
    },

    async swapToken(
      fileId: string,
      expected: string | null,
      next: string,
      at: Date
    ): Promise<File | null> {
      let query = supabase
        .from('files')
        .update({
          download_token: next,
          download_count: 0,
          updated_at: at.toISOString(),
        })
        .eq('id', fileId)
        .eq('is_deleted', false);

      query =
        expected === null
          ? query.is('download_token', null)
          : query.eq('download_token', expected);

      const { data, error } = await query.select('*').maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to replace download token: ${error.message}`);
      }

      return data !== null ? mapRowToFile(data as FileRow) : null;
    },

    async incrementDownloadCount(fileId: string): Promise<void> {
      const { error } = await supabase.rpc('increment_file_downloads', {
        p_file_id: fileId,
      });

      if (error !== null) {
        throw new Error(`Failed to count download: ${error.message}`);
      }
    },

    async listExpired(params: {
      now: Date;
      notUpdatedSince: Date;
      afterId: string | null;
      limit: number;
    }): Promise<File[]> {
      let query = supabase
        .from('files')
        .select('*')
        .eq('is_deleted', false)
        .lte('expires_at', params.now.toISOString())
        .lt('updated_at', params.notUpdatedSince.toISOString())
        .order('id', { ascending: true });

      if (params.afterId !== null) {
        query = query.gt('id', params.afterId);
      }

      const { data, error } = await query.limit(params.limit);

      if (error !== null) {
        throw new Error(`Failed to list expired files: ${error.message}`);
      }

      return ((data ?? []) as FileRow[]).map(mapRowToFile);
    },

    async listPendingPurge(params: {
      afterId: string | null;
      limit: number;
    }): Promise<File[]> {
      let query = supabase
        .from('files')
        .select('*')
        .eq('is_deleted', true)
        .is('purged_at', null)
        .order('id', { ascending: true });

      if (params.afterId !== null) {
        query = query.gt('id', params.afterId);
      }

      const { data, error } = await query.limit(params.limit);

      if (error !== null) {
        throw new Error(`Failed to list files to purge: ${error.message}`);
      }

      return ((data ?? []) as FileRow[]).map(mapRowToFile);
    },

    async markPurged(fileId: string, at: Date): Promise<void> {
      const { error } = await supabase
        .from('files')
        .update({ purged_at: at.toISOString() })
        .eq('id', fileId);

      if (error !== null) {
        throw new Error(`Failed to mark file purged: ${error.message}`);
      }
    },

    async countLiveReferences(
      storageKey: string,
      excludeId: string
    ): Promise<number> {
      const { count, error } = await supabase
        .from('files')
        .select('id', { count: 'exact', head: true })
        .eq('storage_key', storageKey)
        .eq('is_deleted', false)
        .neq('id', excludeId);

      if (error !== null) {
        throw new Error(`Failed to count storage references: ${error.message}`);
      }

      return count ?? 0;
    },

    async isStorageKeyTracked(storageKey: string): Promise<boolean> {
      const { count, error } = await supabase
        .from('files')
        .select('id', { count: 'exact', head: true })
        .eq('storage_key', storageKey)
        .is('purged_at', null);

      if (error !== null) {
        throw new Error(`Failed to look up storage key: ${error.message}`);
      }

      return (count ?? 0) > 0;
    },

    async findLiveByHash(
      ownerId: number,
      contentHash: string
    ): Promise<File | null> {
      const { data, error } = await supabase
        .from('files')
        .select('*')
        .eq('owner_id', ownerId)
        .eq('content_hash', contentHash)
        .eq('is_deleted', false)
        .order('created_at', { ascending: false })
        .limit(1)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to look up duplicate: ${error.message}`);
      }

      return data !== null ? mapRowToFile(data as FileRow) : null;
    },

    async getStorageUsage(
      ownerId: number
    ): Promise<{ usedBytes: number; fileCount: number }> {
      const { data, error } = await supabase
        .from('files')
        .select('size_bytes')
        .eq('owner_id', ownerId)
        .eq('is_deleted', false);

      if (error !== null) {
        throw new Error(`Failed to get storage usage: ${error.message}`);
      }

      const rows = (data ?? []) as Array<{ size_bytes: number }>;
      return {
        usedBytes: rows.reduce((sum, row) => sum + Number(row.size_bytes), 0),
        fileCount: rows.length,
      };
    },

    async getTotals(): Promise<FileTotals> {
      const { data, error } = await supabase.rpc('live_file_totals').single();

      if (error !== null) {
        throw new Error(`Failed to get file totals: ${error.message}`);
      }

      const row = data as { live_files: number; live_bytes: number };
      return {
        liveFiles: Number(row.live_files),
        liveBytes: Number(row.live_bytes),
      };
    },

    async deleteFileRow(fileId: string): Promise<void> {
      const { error } = await supabase.from('files').delete().eq('id', fileId);

      if (error !== null) {
        throw new Error(`Failed to remove file row: ${error.message}`);
      }
    },
  };
}
