/**
 * SQLite-based TaskStore implementation
 * Append-only: tasks are inserted once and only ever read afterwards
 */

import { randomUUID } from 'crypto';
import {
  TASK_STATUS_PENDING,
  isTaskPayload,
  type Clock,
  type Task,
  type TaskPayload
} from './types.js';
import {
  createSQLiteDatabase,
  sqliteClose,
  sqliteExec,
  sqliteGet,
  sqliteRun,
  toDateFromSQLite,
  toSQLiteTimestamp,
  type SQLiteDatabase,
  type SQLiteOptions
} from './sqlite-wrapper.js';

export interface SQLiteTaskStoreOptions extends Pick<SQLiteOptions, 'walMode'> {
  /** Source of creation timestamps (default: wall clock) */
  now?: Clock;
}

interface TaskRow {
  id: string;
  type: string;
  payload: string;
  status: string;
  created_at: string;
  updated_at: string;
}

export class SessionReleasedError extends Error {
  constructor() {
    super('Task session has already been released');
    this.name = 'SessionReleasedError';
  }
}

/**
 * Unit of work handed to a withSession() callback.
 * Only valid while the callback runs; afterwards every call throws.
 */
export class TaskSession {
  private released = false;

  constructor(
    private readonly db: SQLiteDatabase,
    private readonly now: Clock
  ) {}

  insert(type: string, payload: TaskPayload): Task {
    this.assertActive();

    const id = randomUUID();
    const timestamp = toSQLiteTimestamp(this.now());

    sqliteRun(
      this.db,
      `INSERT INTO tasks (id, type, payload, status, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [id, type, JSON.stringify(payload), TASK_STATUS_PENDING, timestamp, timestamp]
    );

    // Re-read so the caller sees exactly what was persisted
    const task = this.findById(id);
    if (!task) {
      throw new Error(`Inserted task ${id} could not be read back`);
    }
    return task;
  }

  findById(id: string): Task | null {
    this.assertActive();

    const row = sqliteGet<TaskRow>(
      this.db,
      `SELECT id, type, payload, status, created_at, updated_at FROM tasks WHERE id = ?`,
      [id]
    );

    return row ? rowToTask(row) : null;
  }

  get isReleased(): boolean {
    return this.released;
  }

  release(): void {
    this.released = true;
  }

  private assertActive(): void {
    if (this.released) {
      throw new SessionReleasedError();
    }
  }
}

export class SQLiteTaskStore {
  private readonly db: SQLiteDatabase;
  private readonly now: Clock;
  private initialized = false;

  constructor(dbPath: string, options?: SQLiteTaskStoreOptions) {
    this.db = createSQLiteDatabase(dbPath, {
      walMode: options?.walMode ?? true
    });
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Create the tasks table if it does not exist yet
   */
  async initialize(): Promise<void> {
    this.ensureSchema();
  }

  /**
   * Run `work` inside a transaction.
   * Commits when it returns, rolls back and rethrows when it throws,
   * and releases the session on every path. `work` must be synchronous.
   */
  withSession<T>(work: (session: TaskSession) => T): T {
    this.ensureSchema();

    const session = new TaskSession(this.db, this.now);
    try {
      return this.db.transaction(() => work(session))();
    } finally {
      session.release();
    }
  }

  async close(): Promise<void> {
    sqliteClose(this.db);
  }

  private ensureSchema(): void {
    if (this.initialized) return;

    sqliteExec(this.db, `
      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        type TEXT NOT NULL,
        payload TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);

    this.initialized = true;
  }
}

function rowToTask(row: TaskRow): Task {
  const payload: unknown = JSON.parse(row.payload);
  if (!isTaskPayload(payload)) {
    throw new TypeError(`Task ${row.id} has a non-object payload`);
  }

  return {
    id: row.id,
    type: row.type,
    payload,
    status: row.status,
    createdAt: toDateFromSQLite(row.created_at),
    updatedAt: toDateFromSQLite(row.updated_at)
  };
}
