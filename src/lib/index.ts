/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { loadConfig, BUILTIN_BLOCKED_EXTENSIONS } from './config.js';
export type { AppConfig } from './config.js';
export { createSupabaseAdmin } from './supabase.js';
export { getRedis } from './redis.js';
export { createPauseSwitch } from './pause.js';
export type { PauseSwitch } from './pause.js';
export {
  createTelegramClient,
  createTelegramMessenger,
  createTelegramMembershipLookup,
  TelegramApiError,
} from './telegram.js';
export type { ChatMessenger, TelegramClient } from './telegram.js';
export { createHttpUrlFetcher } from './url-fetch.js';
export type { UrlFetcher, FetchedObject } from './url-fetch.js';
export {
  checkUrlSafety,
  getExtension,
  sanitizeFileName,
  validateFileName,
} from './validation.js';
