/**
 * API Router
 * Central router for all v1 endpoints
 */

import { Hono } from 'hono';
import type { TaskService } from '../../services/task-service.js';
import { createTasksRouter } from './tasks.js';
import { healthRouter } from './health.js';

export function createApiRouter(taskService: TaskService) {
  return new Hono()
    .route('/tasks', createTasksRouter(taskService))
    .route('/health', healthRouter);
}
