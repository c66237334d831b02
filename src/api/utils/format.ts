/**
 * Response shapes for domain records
 * Dates become ISO strings; tokens and storage paths stay server-side
 */

import type {
  File,
  SubscriptionSummary,
  User,
} from '../../types/index.js';

function formatOptionalDate(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function formatFile(file: File) {
  return {
    id: file.id,
    name: file.originalName,
    sizeBytes: file.sizeBytes,
    mimeType: file.mimeType,
    source: file.source,
    createdAt: file.createdAt.toISOString(),
    expiresAt: file.expiresAt.toISOString(),
    downloadCount: file.downloadCount,
    isDeleted: file.isDeleted,
  };
}

/**
 * Admin view: adds owner, storage and lifecycle fields
 */
export function formatAdminFile(file: File) {
  return {
    ...formatFile(file),
    ownerId: file.ownerId,
    storageKey: file.storageKey,
    contentHash: file.contentHash,
    sourceUrl: file.sourceUrl,
    hasLink: file.downloadToken !== null && !file.isDeleted,
    deletedAt: formatOptionalDate(file.deletedAt),
    purgedAt: formatOptionalDate(file.purgedAt),
  };
}

export function formatUser(user: User) {
  return {
    id: user.id,
    username: user.username,
    fullName: user.fullName,
    tier: user.tier,
    subscriptionStatus: user.subscriptionStatus,
    subscriptionExpiresAt: formatOptionalDate(user.subscriptionExpiresAt),
    trialStartedAt: user.trialStartedAt.toISOString(),
    isBlocked: user.isBlocked,
    blockReason: user.blockReason,
    blockedAt: formatOptionalDate(user.blockedAt),
    blockedUntil: formatOptionalDate(user.blockedUntil),
    isActive: user.isActive,
    uploadCount: user.uploadCount,
    downloadCount: user.downloadCount,
    createdAt: user.createdAt.toISOString(),
  };
}

export function formatSummary(summary: SubscriptionSummary) {
  return {
    tier: summary.tier,
    active: summary.active,
    onTrial: summary.onTrial,
    expiresAt: formatOptionalDate(summary.expiresAt),
    daysRemaining: summary.daysRemaining,
  };
}
