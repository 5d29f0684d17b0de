#!/usr/bin/env node
/**
 * Task API CLI
 * Run the server, or create and inspect tasks against a local database
 */

import { Command } from 'commander';
import { loadConfig, parseConfig } from '../core/config.js';
import { SQLiteTaskStore } from '../core/task-store.js';
import { SERVICE_NAME, SERVICE_VERSION, type Config, type TaskPayload } from '../core/types.js';
import { TaskService, toTaskView } from '../services/task-service.js';
import { startServer, stopServer } from '../server/index.js';
import { parsePayloadOption } from './options.js';

interface DatabaseOption {
  db?: string;
}

interface ServeOptions extends DatabaseOption {
  host?: string;
  port?: string;
}

interface CreateOptions extends DatabaseOption {
  payload: TaskPayload;
}

const program = new Command();

program
  .name(SERVICE_NAME)
  .description('Task tracking API with mock route optimization')
  .version(SERVICE_VERSION);

/**
 * Environment config with command-line overrides applied on top
 */
function resolveConfig(options: ServeOptions): Config {
  const base = loadConfig();
  return parseConfig({
    server: {
      host: options.host ?? base.server.host,
      port: options.port !== undefined ? Number(options.port) : base.server.port
    },
    database: { path: options.db ?? base.database.path },
    cors: base.cors
  });
}

async function withTaskService<T>(options: DatabaseOption, run: (service: TaskService) => Promise<T>): Promise<T> {
  const config = resolveConfig(options);
  const store = new SQLiteTaskStore(config.database.path);
  try {
    await store.initialize();
    return await run(new TaskService(store));
  } finally {
    await store.close();
  }
}

/**
 * Serve command
 */
program
  .command('serve')
  .description('Start the HTTP server')
  .option('-p, --port <number>', 'Port to listen on')
  .option('-H, --host <host>', 'Interface to bind')
  .option('--db <path>', 'SQLite database path')
  .action(async (options: ServeOptions) => {
    try {
      const running = await startServer(resolveConfig(options));

      const shutdown = () => {
        stopServer(running)
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            console.error('[server] shutdown failed:', error);
            process.exit(1);
          });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    } catch (error) {
      console.error('Failed to start server:', error);
      process.exit(1);
    }
  });

/**
 * Create command
 */
program
  .command('create <type>')
  .description('Create a task and print it as JSON')
  .option('--payload <json>', 'Task payload (JSON object)', parsePayloadOption, {})
  .option('--db <path>', 'SQLite database path')
  .action(async (type: string, options: CreateOptions) => {
    try {
      const task = await withTaskService(options, service => service.createTask(type, options.payload));
      console.log(JSON.stringify(toTaskView(task), null, 2));
    } catch (error) {
      console.error('Create failed:', error);
      process.exit(1);
    }
  });

/**
 * Get command
 */
program
  .command('get <id>')
  .description('Print a task, with a mock result for optimize_route tasks')
  .option('--db <path>', 'SQLite database path')
  .action(async (id: string, options: DatabaseOption) => {
    try {
      const view = await withTaskService(options, async service => {
        const task = await service.getTask(id);
        return task ? service.buildDisplayView(task) : null;
      });

      if (!view) {
        console.error(`Task with id '${id}' not found`);
        process.exit(1);
      }

      console.log(JSON.stringify(view, null, 2));
    } catch (error) {
      console.error('Get failed:', error);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
