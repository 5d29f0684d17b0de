/**
 * Core types for the task API
 * Zod schemas are the single source of truth; TS types are inferred from them
 */

import { z } from 'zod';

// ============================================================
// Constants
// ============================================================

export const SERVICE_NAME = 'task-api';
export const SERVICE_VERSION = '1.0.0';

/** Status every task is created with. Nothing transitions it. */
export const TASK_STATUS_PENDING = 'pending';

/** The one task type whose display view carries a synthesized result */
export const OPTIMIZE_ROUTE_TYPE = 'optimize_route';

// ============================================================
// Task
// ============================================================

export const TaskPayloadSchema = z.record(z.unknown());
export type TaskPayload = z.infer<typeof TaskPayloadSchema>;

/**
 * Plain JSON object check. Used where the parsed value must be kept as-is:
 * zod's record parser rebuilds the object and drops a `__proto__` key.
 */
export function isTaskPayload(value: unknown): value is TaskPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface Task {
  id: string;
  type: string;
  payload: TaskPayload;
  status: string;
  createdAt: Date;
  updatedAt: Date;
}

// Request body for POST /tasks. Any type string is accepted.
export const TaskCreateSchema = z.object({
  type: z.string(),
  payload: TaskPayloadSchema
});
export type TaskCreate = z.infer<typeof TaskCreateSchema>;

// ============================================================
// Views (wire format, snake_case)
// ============================================================

export interface TaskView {
  id: string;
  type: string;
  payload: TaskPayload;
  status: string;
  created_at: string;
  updated_at: string;
}

export interface OptimizationDetails {
  algorithm: string;
  time_saved: string;
  fuel_saved: string;
}

export interface RouteOptimizationResult {
  total_distance: number;
  suggested_order: number[];
  timestamp: string;
  optimization_details: OptimizationDetails;
}

export interface OptimizedTaskView extends TaskView {
  result: RouteOptimizationResult;
}

export type DisplayView = TaskView | OptimizedTaskView;

export function isOptimizedView(view: DisplayView): view is OptimizedTaskView {
  return 'result' in view;
}

// ============================================================
// Injectable sources
// ============================================================

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

export type Clock = () => Date;

// ============================================================
// Config
// ============================================================

export const ConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(8002)
  }).default({}),
  database: z.object({
    path: z.string().min(1).default('~/.task-api/tasks.sqlite')
  }).default({}),
  cors: z.object({
    origins: z.array(z.string().min(1)).default([
      'http://localhost:3002',
      'http://frontend:3000'
    ])
  }).default({})
});
export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
