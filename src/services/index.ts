/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database.
 * All business logic lives here.
 */

// AuditService
export type { AuditService, AuditServiceDb, AuditLogEntry } from './audit.service.js';
export { createAuditService } from './audit.service.js';
export { createAuditServiceDb } from './audit.db.js';

// SettingsService
export type {
  SettingsService,
  SettingsServiceDb,
  StoredSetting,
} from './settings.service.js';
export { createSettingsService } from './settings.service.js';
export { createSettingsServiceDb } from './settings.db.js';

// UserService
export type {
  UserService,
  UserServiceDb,
  UserServiceAudit,
} from './user.service.js';
export { createUserService } from './user.service.js';
export { createUserServiceDb } from './user.db.js';

// SubscriptionService (subscription gate)
export type {
  SubscriptionService,
  ChannelMembershipLookup,
} from './subscription.service.js';
export { createSubscriptionService } from './subscription.service.js';

// RateLimitService
export type {
  InMemoryRateLimitStore,
  RateLimitService,
  RateLimitStore,
  SlidingLogResult,
} from './rate-limit.service.js';
export {
  createRateLimitService,
  createInMemoryRateLimitStore,
} from './rate-limit.service.js';
export { createRedisRateLimitStore } from './rate-limit.redis.js';

// FileService (file registry)
export type {
  FileService,
  FileServiceDb,
  FileServiceAudit,
  NewFileRecord,
  RegistrationLimits,
  SearchFilesParams,
} from './file.service.js';
export { createFileService, MAX_BULK_DELETE } from './file.service.js';
export { createFileServiceDb } from './file.db.js';

// FileStorage
export type {
  FileStorage,
  StorageEntry,
  StoredObject,
  WriteObjectParams,
} from './file.storage.js';
export { createLocalFileStorage, buildStorageKey } from './file.storage.js';

// LinkService (link issuer)
export type {
  LinkService,
  LinkServiceDb,
  InvalidTokenReason,
  RegeneratedLink,
} from './link.service.js';
export { createLinkService, generateToken, maskToken } from './link.service.js';

// RegistrationService
export type {
  RegistrationService,
  RegisteredFile,
  UploadParams,
  UrlParams,
} from './registration.service.js';
export { createRegistrationService } from './registration.service.js';

// AdminService (admin moderation)
export type {
  AdminService,
  AdminStats,
  BotStatus,
  BroadcastReport,
  BroadcastFailureCode,
  LinkInspection,
} from './admin.service.js';
export { createAdminService } from './admin.service.js';
