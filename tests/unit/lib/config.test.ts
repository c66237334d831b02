/**
 * Environment configuration
 */

import { describe, it, expect } from 'vitest';

import { loadConfig } from '@/lib/config.js';

const REQUIRED = {
  SUPABASE_URL: 'https://db.example.test',
  SUPABASE_SERVICE_KEY: 'test-service-key',
  BOT_TOKEN: 'test-bot-token',
  BOT_API_TOKEN: 'test-bot-api-token',
  ADMIN_API_TOKEN: 'test-admin-api-token',
};

describe('loadConfig', () => {
  it('applies defaults around the required variables', () => {
    const config = loadConfig(REQUIRED);

    expect(config.port).toBe(3000);
    expect(config.uploadDir).toBe('./uploads');
    expect(config.redis).toBeNull();
    expect(config.allowedOrigins).toEqual(['http://localhost:3000']);
    expect(config.trustedProxies).toEqual([]);
    expect(config.membershipTimeoutMs).toBe(5_000);
    expect(config.storageCleanupCron).toBe('30 3 * * *');
    expect(config.orphanGraceMs).toBe(3_600_000);
    expect(config.rateLimits.upload).toEqual({ limit: 10, windowMs: 60_000 });
    expect(config.settingDefaults).toEqual({
      DOWNLOAD_DOMAIN: 'localhost:3000',
      ADMIN_IDS: [],
      REQUIRED_CHANNEL: null,
      SUBSCRIPTION_REMINDER_DAYS: 3,
      TRIAL_DAYS: 7,
      BLOCKED_EXTENSIONS: [],
      ALLOWED_EXTENSIONS: [],
      MAX_UPLOAD_SIZE_MB: 2048,
      DEFAULT_EXPIRY_DAYS: 7,
      DEDUP_ENABLED: false,
    });
  });

  it('parses lists, flags and rate limit overrides', () => {
    const config = loadConfig({
      ...REQUIRED,
      ADMIN_IDS: '11, 22,',
      BLOCKED_EXTENSIONS: 'APK,.iso',
      REQUIRED_CHANNEL: ' @news ',
      DEDUP_ENABLED: '1',
      RATE_LIMIT_DOWNLOAD_MAX: '5',
      RATE_LIMIT_DOWNLOAD_WINDOW_SECONDS: '10',
      UPSTASH_REDIS_URL: 'https://redis.example.test',
      UPSTASH_REDIS_TOKEN: 'test-redis-token',
      TRUSTED_PROXIES: '10.0.0.1, 10.0.0.2',
    });

    expect(config.trustedProxies).toEqual(['10.0.0.1', '10.0.0.2']);
    expect(config.settingDefaults.ADMIN_IDS).toEqual([11, 22]);
    expect(config.settingDefaults.BLOCKED_EXTENSIONS).toEqual(['.apk', '.iso']);
    expect(config.settingDefaults.REQUIRED_CHANNEL).toBe('@news');
    expect(config.settingDefaults.DEDUP_ENABLED).toBe(true);
    expect(config.rateLimits.download).toEqual({ limit: 5, windowMs: 10_000 });
    expect(config.redis).toEqual({
      url: 'https://redis.example.test',
      token: 'test-redis-token',
    });
  });

  it('treats empty redis variables as unset', () => {
    const config = loadConfig({
      ...REQUIRED,
      UPSTASH_REDIS_URL: '',
      UPSTASH_REDIS_TOKEN: ' ',
    });

    expect(config.redis).toBeNull();
  });

  it('lists every invalid variable', () => {
    expect(() =>
      loadConfig({ ...REQUIRED, SUPABASE_URL: 'nope', BOT_API_TOKEN: 'short' })
    ).toThrow(/^Invalid environment: SUPABASE_URL: .+; BOT_API_TOKEN: .+$/);
  });
});
