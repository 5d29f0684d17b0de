/**
 * Thin helpers over better-sqlite3
 * Keeps statement preparation and timestamp encoding in one place
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

export type SQLiteDatabase = Database.Database;

export interface SQLiteOptions {
  /** Enable WAL journal mode (ignored for in-memory databases) */
  walMode?: boolean;
}

export const IN_MEMORY_PATH = ':memory:';

export function createSQLiteDatabase(dbPath: string, options: SQLiteOptions = {}): SQLiteDatabase {
  const inMemory = dbPath === IN_MEMORY_PATH;

  if (!inMemory) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  if (options.walMode && !inMemory) {
    db.pragma('journal_mode = WAL');
  }

  return db;
}

export function sqliteExec(db: SQLiteDatabase, sql: string): void {
  db.exec(sql);
}

export function sqliteRun(db: SQLiteDatabase, sql: string, params: unknown[] = []): Database.RunResult {
  return db.prepare(sql).run(...params);
}

export function sqliteGet<T>(db: SQLiteDatabase, sql: string, params: unknown[] = []): T | undefined {
  return db.prepare<unknown[], T>(sql).get(...params);
}

export function sqliteClose(db: SQLiteDatabase): void {
  if (db.open) {
    db.close();
  }
}

export function toSQLiteTimestamp(date: Date): string {
  return date.toISOString();
}

export function toDateFromSQLite(value: unknown): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    return new Date(value);
  }
  throw new TypeError(`Unexpected SQLite timestamp value: ${String(value)}`);
}
