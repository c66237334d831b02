/**
 * Core type definitions
 * Shared types used across services, workers and the API layer
 */

export type { Result, Success, Failure } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type {
  ErrorCode,
  ErrorStatus,
  MessageCategory,
  ErrorCatalogEntry,
} from './errors.js';
export { ERROR_CATALOG, getErrorStatus, getMessageCategory } from './errors.js';
export type { ActorContext } from './auth.js';
export {
  SYSTEM_ACTOR,
  ADMIN_PERMISSIONS,
  isPrivilegedActor,
  canActFor,
} from './auth.js';
export type {
  KeysetCursor,
  PaginationParams,
  PaginatedResult,
} from './pagination.js';
export {
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  normalizePaginationParams,
  encodeKeysetCursor,
  decodeKeysetCursor,
} from './pagination.js';
export type {
  AuditActorType,
  AuditEvent,
  AuditLog,
  AuditQueryParams,
} from './audit.js';
export type {
  User,
  SubscriptionTier,
  SubscriptionStatus,
  EnsureUserParams,
  UserUpdate,
  BlockParams,
  SetSubscriptionParams,
  SearchUsersParams,
  UserCounts,
} from './user.js';
export { isBlockActive } from './user.js';
export type {
  File,
  FileSource,
  ExpiryPolicy,
  CreateFileParams,
  ListFilesParams,
  StorageUsage,
  FileTotals,
  SoftDeleteOutcome,
  BulkDeleteOutcome,
} from './file.js';
export type {
  QuotaPlan,
  AuthorizationGrant,
  SubscriptionSummary,
} from './subscription.js';
export { DEFAULT_PLANS } from './subscription.js';
export type {
  ActionClass,
  RateLimitRule,
  RateLimitRules,
  RateDecision,
} from './rate-limit.js';
export { ACTION_CLASSES, DEFAULT_RATE_LIMIT_RULES } from './rate-limit.js';
export type { SettingKey, SettingValues, SettingEntry } from './settings.js';
export {
  SETTING_SCHEMAS,
  SETTING_KEYS,
  isSettingKey,
  settingSchema,
} from './settings.js';
