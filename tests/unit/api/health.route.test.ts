/**
 * Health Route Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import { createHealthRoutes } from '@/api/routes/health.js';

const healthBody = z.object({
  status: z.string(),
  paused: z.boolean(),
  timestamp: z.string(),
  version: z.string(),
});

describe('Health Route', () => {
  describe('GET /health', () => {
    it('should return 200 with status ok', async () => {
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes({ isPaused: () => false }));

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
      const body = healthBody.parse(await res.json());
      expect(body.status).toBe('ok');
      expect(body.version).toBe('v1');
      expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp);
    });

    it('should report the pause switch', async () => {
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes({ isPaused: () => true }));

      const res = await app.request('/api/v1/health');

      expect(healthBody.parse(await res.json()).paused).toBe(true);
    });
  });
});
