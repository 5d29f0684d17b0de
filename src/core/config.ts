/**
 * Runtime configuration
 * Read from environment variables and validated against ConfigSchema.
 */

import * as os from 'os';
import * as path from 'path';

import { ConfigSchema, type Config, type ConfigInput } from './types.js';
import { IN_MEMORY_PATH } from './sqlite-wrapper.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function asNonEmptyString(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const s = value.trim();
  return s.length > 0 ? s : undefined;
}

function asNumber(value: string | undefined): number | undefined {
  const s = asNonEmptyString(value);
  return s === undefined ? undefined : Number(s);
}

function splitList(value: string | undefined): string[] | undefined {
  const s = asNonEmptyString(value);
  if (!s) return undefined;
  return s.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Expand a leading ~ and resolve to an absolute path.
 * ':memory:' is passed through untouched.
 */
export function resolveDatabasePath(dbPath: string): string {
  if (dbPath === IN_MEMORY_PATH) return dbPath;
  const expanded = dbPath.startsWith('~')
    ? path.join(os.homedir(), dbPath.slice(1))
    : dbPath;
  return path.resolve(expanded);
}

export function parseConfig(input: ConfigInput): Config {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return {
    ...parsed.data,
    database: { path: resolveDatabasePath(parsed.data.database.path) }
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return parseConfig({
    server: {
      host: asNonEmptyString(env.HOST),
      port: asNumber(env.PORT)
    },
    database: {
      path: asNonEmptyString(env.DATABASE_PATH)
    },
    cors: {
      origins: splitList(env.CORS_ORIGINS)
    }
  });
}
