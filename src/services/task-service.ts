/**
 * Task Service - Main entry point for task operations
 * Wraps the TaskStore in per-call sessions and builds display views
 */

import { SQLiteTaskStore } from '../core/task-store.js';
import {
  OPTIMIZE_ROUTE_TYPE,
  type Clock,
  type DisplayView,
  type OptimizedTaskView,
  type RandomSource,
  type RouteOptimizationResult,
  type Task,
  type TaskPayload,
  type TaskView
} from '../core/types.js';

export interface TaskServiceOptions {
  random?: RandomSource;
  now?: Clock;
}

// Bounds for the synthesized optimization result
const DISTANCE_RANGE = { min: 10.5, max: 150.8 };
const LOCATION_COUNT_RANGE = { min: 3, max: 8 };
const TIME_SAVED_RANGE = { min: 5, max: 45 };
const FUEL_SAVED_RANGE = { min: 2.1, max: 8.5 };
const OPTIMIZATION_ALGORITHM = 'greedy_nearest_neighbor';

export class TaskService {
  private readonly random: RandomSource;
  private readonly now: Clock;

  constructor(private readonly store: SQLiteTaskStore, options: TaskServiceOptions = {}) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  async createTask(type: string, payload: TaskPayload): Promise<Task> {
    return this.store.withSession(session => session.insert(type, payload));
  }

  async getTask(id: string): Promise<Task | null> {
    return this.store.withSession(session => session.findById(id));
  }

  /**
   * Serialize a task for display. optimize_route tasks get a mock
   * `result` block; it is regenerated on every call.
   */
  buildDisplayView(task: Task): DisplayView {
    const view = toTaskView(task);
    if (task.type !== OPTIMIZE_ROUTE_TYPE) {
      return view;
    }

    const optimized: OptimizedTaskView = {
      ...view,
      result: this.generateRouteResult(task.payload)
    };
    return optimized;
  }

  private generateRouteResult(payload: TaskPayload): RouteOptimizationResult {
    const locations = payload.locations;
    const locationCount = Array.isArray(locations) && locations.length > 0
      ? locations.length
      : this.randomInt(LOCATION_COUNT_RANGE.min, LOCATION_COUNT_RANGE.max);

    return {
      total_distance: roundTo(this.uniform(DISTANCE_RANGE.min, DISTANCE_RANGE.max), 2),
      suggested_order: Array.from({ length: locationCount }, (_, i) => i + 1),
      timestamp: this.now().toISOString(),
      optimization_details: {
        algorithm: OPTIMIZATION_ALGORITHM,
        time_saved: `${this.randomInt(TIME_SAVED_RANGE.min, TIME_SAVED_RANGE.max)} minutes`,
        fuel_saved: `${roundTo(this.uniform(FUEL_SAVED_RANGE.min, FUEL_SAVED_RANGE.max), 1).toFixed(1)} liters`
      }
    };
  }

  private uniform(min: number, max: number): number {
    return min + this.random() * (max - min);
  }

  /** Inclusive on both ends */
  private randomInt(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }
}

export function toTaskView(task: Task): TaskView {
  return {
    id: task.id,
    type: task.type,
    payload: task.payload,
    status: task.status,
    created_at: task.createdAt.toISOString(),
    updated_at: task.updatedAt.toISOString()
  };
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
