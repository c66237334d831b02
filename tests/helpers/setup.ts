/**
 * Vitest Global Setup
 * This file runs before all tests
 */

import { config } from 'dotenv';
import { afterEach, vi } from 'vitest';

// Optional test overrides; nothing here may point at a real service
config({ path: '.env.test' });

afterEach(() => {
  vi.restoreAllMocks();
});
