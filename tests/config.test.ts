/**
 * Tests for environment-driven configuration
 */

import { describe, it, expect } from 'vitest';
import * as os from 'os';
import * as path from 'path';

import { ConfigError, loadConfig, resolveDatabasePath } from '../src/core/config.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      server: { host: '127.0.0.1', port: 8002 },
      database: { path: path.join(os.homedir(), '.task-api', 'tasks.sqlite') },
      cors: { origins: ['http://localhost:3002', 'http://frontend:3000'] }
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      HOST: '0.0.0.0',
      PORT: '9000',
      DATABASE_PATH: ':memory:',
      CORS_ORIGINS: 'http://a.test, http://b.test,'
    });

    expect(config.server).toEqual({ host: '0.0.0.0', port: 9000 });
    expect(config.database.path).toBe(':memory:');
    expect(config.cors.origins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ HOST: '   ', PORT: '' });
    expect(config.server).toEqual({ host: '127.0.0.1', port: 8002 });
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/server\.port/);
  });

  it('rejects an out-of-range port', () => {
    expect(() => loadConfig({ PORT: '70000' })).toThrow(/server\.port/);
  });
});

describe('resolveDatabasePath', () => {
  it('expands a leading tilde', () => {
    expect(resolveDatabasePath('~/data/tasks.sqlite')).toBe(path.join(os.homedir(), 'data', 'tasks.sqlite'));
  });

  it('resolves relative paths against the working directory', () => {
    expect(resolveDatabasePath('tasks.sqlite')).toBe(path.resolve('tasks.sqlite'));
  });

  it('passes the in-memory marker through', () => {
    expect(resolveDatabasePath(':memory:')).toBe(':memory:');
  });
});
