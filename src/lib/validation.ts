/**
 * File name and URL safety rules
 */

import { isIP } from 'node:net';

import type { Result } from '../types/index.js';
import { success, failure } from '../types/index.js';

const MAX_FILENAME_LENGTH = 255;
const MAX_STORED_NAME_LENGTH = 200;
const MAX_URL_LENGTH = 2048;

const FORBIDDEN_NAME_CHARS = /[/\\<>:"|?*\x00-\x1f]/;
const RESERVED_NAMES = new Set([
  'CON',
  'PRN',
  'AUX',
  'NUL',
  'COM1',
  'COM2',
  'LPT1',
  'LPT2',
]);

const ILLEGAL_URL_PATTERNS = ['magnet:', '.torrent'];
const SUSPICIOUS_URL_WORDS = [
  'malware',
  'virus',
  'trojan',
  'keylogger',
  'ransomware',
];
const LOCAL_HOSTNAMES = new Set(['localhost', '0.0.0.0']);

/**
 * Lower-cased extension including the dot, or '' when there is none
 */
export function getExtension(name: string): string {
  const dot = name.lastIndexOf('.');
  if (dot <= 0 || dot === name.length - 1) {
    return '';
  }
  return name.slice(dot).toLowerCase();
}

export function validateFileName(name: string): Result<string> {
  const trimmed = name.trim();
  if (trimmed === '') {
    return failure('VALIDATION_ERROR', 'File name is required');
  }
  if (trimmed.length > MAX_FILENAME_LENGTH) {
    return failure('VALIDATION_ERROR', 'File name is too long', {
      maxLength: MAX_FILENAME_LENGTH,
    });
  }
  if (FORBIDDEN_NAME_CHARS.test(trimmed) || trimmed.includes('..')) {
    return failure('VALIDATION_ERROR', 'File name contains invalid characters');
  }
  if (getExtension(trimmed) === '') {
    return failure('VALIDATION_ERROR', 'File name must have an extension');
  }

  const stem = trimmed.slice(0, trimmed.lastIndexOf('.')).toUpperCase();
  if (RESERVED_NAMES.has(stem)) {
    return failure('VALIDATION_ERROR', 'File name is reserved');
  }
  return success(trimmed);
}

/**
 * Name used on disk: unsafe characters replaced, length capped
 * with the extension kept
 */
export function sanitizeFileName(name: string): string {
  const cleaned = name.replace(/[<>:"/\\|?*\x00-\x1f]/g, '_').replace(/\.\.+/g, '_');
  if (cleaned.length <= MAX_STORED_NAME_LENGTH) {
    return cleaned;
  }
  const ext = getExtension(cleaned).slice(0, 16);
  return cleaned.slice(0, MAX_STORED_NAME_LENGTH - ext.length) + ext;
}

function isPrivateIPv4(address: string): boolean {
  const parts = address.split('.').map(Number);
  const [a = 0, b = 0] = parts;
  return (
    a === 0 ||
    a === 10 ||
    a === 127 ||
    (a === 169 && b === 254) ||
    (a === 172 && b >= 16 && b <= 31) ||
    (a === 192 && b === 168) ||
    (a === 100 && b >= 64 && b <= 127)
  );
}

function isPrivateIPv6(address: string): boolean {
  const lower = address.toLowerCase();
  if (lower === '::1' || lower === '::') {
    return true;
  }
  const mapped = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/.exec(lower);
  if (mapped?.[1] !== undefined) {
    return isPrivateIPv4(mapped[1]);
  }
  // WHATWG URL parsing rewrites ::ffff:a.b.c.d as two hex groups
  const mappedHex = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/.exec(lower);
  if (mappedHex?.[1] !== undefined && mappedHex[2] !== undefined) {
    const high = parseInt(mappedHex[1], 16);
    const low = parseInt(mappedHex[2], 16);
    return isPrivateIPv4(
      [high >> 8, high & 0xff, low >> 8, low & 0xff].join('.')
    );
  }
  return /^f[cd]/.test(lower) || /^fe[89ab]/.test(lower);
}

/**
 * Reject URLs the fetcher must never touch
 */
export function checkUrlSafety(rawUrl: string): Result<URL> {
  if (rawUrl.length >= MAX_URL_LENGTH) {
    return failure('UNSAFE_URL', 'URL is too long', {
      maxLength: MAX_URL_LENGTH,
    });
  }

  const lowered = rawUrl.toLowerCase();
  if (ILLEGAL_URL_PATTERNS.some((pattern) => lowered.includes(pattern))) {
    return failure('UNSAFE_URL', 'Torrent and magnet links are not accepted');
  }
  if (SUSPICIOUS_URL_WORDS.some((word) => lowered.includes(word))) {
    return failure('UNSAFE_URL', 'URL looks malicious');
  }

  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    return failure('UNSAFE_URL', 'URL is not valid');
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return failure('UNSAFE_URL', 'Only http and https URLs are accepted');
  }

  const hostname = url.hostname.replace(/^\[|\]$/g, '').toLowerCase();
  if (hostname === '') {
    return failure('UNSAFE_URL', 'URL has no host');
  }
  if (LOCAL_HOSTNAMES.has(hostname) || hostname.endsWith('.localhost')) {
    return failure('UNSAFE_URL', 'Local addresses are not accepted');
  }

  const family = isIP(hostname);
  if (
    (family === 4 && isPrivateIPv4(hostname)) ||
    (family === 6 && isPrivateIPv6(hostname))
  ) {
    return failure('UNSAFE_URL', 'Private addresses are not accepted');
  }

  return success(url);
}
