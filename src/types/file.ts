/**
 * File Types
 *
 * A File is a registered upload with a single download token.
 * Deletion is soft first (token cleared, isDeleted set) and physical
 * later, once the sweeper has removed the bytes (purgedAt set).
 */

export type FileSource = 'upload' | 'url';

export interface File {
  id: string;
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
  downloadToken: string | null;
  downloadCount: number;
  isDeleted: boolean;
  deletedAt: Date | null;
  purgedAt: Date | null;
  updatedAt: Date;
}

/**
 * How long a file stays downloadable
 */
export type ExpiryPolicy =
  | { type: 'relative'; days: number }
  | { type: 'absolute'; expiresAt: Date };

export interface CreateFileParams {
  ownerId: number;
  name: string;
  sizeBytes: number;
  storageKey: string;
  expiryPolicy: ExpiryPolicy;
  contentHash?: string | null;
  mimeType?: string | null;
  source?: FileSource;
  sourceUrl?: string | null;
}

export interface ListFilesParams {
  cursor?: string;
  limit: number;
  search?: string;
}

export interface StorageUsage {
  usedBytes: number;
  limitBytes: number;
  fileCount: number;
  fileLimit: number;
}

export interface FileTotals {
  liveFiles: number;
  liveBytes: number;
}

export interface SoftDeleteOutcome {
  file: File;
  alreadyDeleted: boolean;
}

/**
 * Per-id outcome of a bulk delete. Ids that are missing or belong to
 * someone else are reported together as skipped.
 */
export interface BulkDeleteOutcome {
  deleted: string[];
  alreadyDeleted: string[];
  skipped: string[];
}
