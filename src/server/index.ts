/**
 * Task API HTTP Server
 * Wires the Hono app to a TaskService and serves it on Node
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { HTTPException } from 'hono/http-exception';
import { serve, type ServerType } from '@hono/node-server';

import { createApiRouter } from './api/index.js';
import { SQLiteTaskStore } from '../core/task-store.js';
import { TaskService } from '../services/task-service.js';
import { SERVICE_NAME, type Config } from '../core/types.js';

export interface AppOptions {
  taskService: TaskService;
  corsOrigins: string[];
  /** Log each request line (default: true) */
  logRequests?: boolean;
}

export function createApp(options: AppOptions): Hono {
  const app = new Hono();

  // Middleware
  app.use('/*', cors({
    origin: options.corsOrigins,
    credentials: true
  }));
  if (options.logRequests ?? true) {
    app.use('/*', logger());
  }

  // API routes
  app.route('/api/v1', createApiRouter(options.taskService));

  app.get('/', (c) => c.json({
    message: 'Welcome to Task API',
    health: '/api/v1/health'
  }));

  app.notFound((c) => c.json({ detail: 'Not Found' }, 404));

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ detail: err.message }, err.status);
    }
    console.error(`[server] ${c.req.method} ${c.req.path} failed:`, err);
    return c.json({ detail: 'Internal Server Error' }, 500);
  });

  return app;
}

export interface RunningServer {
  server: ServerType;
  store: SQLiteTaskStore;
  app: Hono;
}

/**
 * Open the store, build the app and start listening
 */
export async function startServer(config: Config): Promise<RunningServer> {
  const store = new SQLiteTaskStore(config.database.path);
  await store.initialize();

  const app = createApp({
    taskService: new TaskService(store),
    corsOrigins: config.cors.origins
  });

  const server = serve({
    fetch: app.fetch,
    hostname: config.server.host,
    port: config.server.port
  });

  console.log(`[server] ${SERVICE_NAME} listening at http://${config.server.host}:${config.server.port}`);

  return { server, store, app };
}

/**
 * Stop accepting connections, then close the store
 */
export async function stopServer(running: RunningServer): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    running.server.close((err) => (err ? reject(err) : resolve()));
  });
  await running.store.close();
}
