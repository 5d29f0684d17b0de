/**
 * Tasks API
 * Create a task and fetch it back by id
 */

import { Hono } from 'hono';
import { TaskCreateSchema, isTaskPayload } from '../../core/types.js';
import { TaskService, toTaskView } from '../../services/task-service.js';
import { readJsonBody, toValidationIssues, validationError } from './utils.js';

export function createTasksRouter(taskService: TaskService) {
  const tasksRouter = new Hono();

  // POST /api/v1/tasks - Create a task
  tasksRouter.post('/', async (c) => {
    const body = await readJsonBody(c);
    if (!body.ok) {
      return validationError(c, [
        { loc: ['body'], msg: 'JSON decode error', type: 'json_invalid' }
      ]);
    }

    const parsed = TaskCreateSchema.safeParse(body.value);
    if (!parsed.success) {
      return validationError(c, toValidationIssues(parsed.error.issues));
    }

    // Store the payload as sent; the parsed copy has lost any __proto__ key
    const raw = body.value;
    const payload = isTaskPayload(raw) && isTaskPayload(raw.payload)
      ? raw.payload
      : parsed.data.payload;

    const task = await taskService.createTask(parsed.data.type, payload);

    return c.json({
      message: 'Task created successfully',
      task: toTaskView(task)
    }, 201);
  });

  // GET /api/v1/tasks/:id - Get a task, with a mock result for optimize_route
  tasksRouter.get('/:id', async (c) => {
    const id = c.req.param('id');
    const task = await taskService.getTask(id);

    if (!task) {
      return c.json({ detail: `Task with id '${id}' not found` }, 404);
    }

    return c.json(taskService.buildDisplayView(task));
  });

  return tasksRouter;
}
