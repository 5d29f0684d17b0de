/**
 * Health API
 * Static liveness probe; does not touch the database
 */

import { Hono } from 'hono';
import { SERVICE_NAME, SERVICE_VERSION } from '../../core/types.js';

export const healthRouter = new Hono();

// GET /api/v1/health
healthRouter.get('/', (c) => c.json({
  status: 'healthy',
  service: SERVICE_NAME,
  version: SERVICE_VERSION
}));
