import { Hono } from 'hono';
import type { AutomationService } from '../app';
import { errorResponse } from './respond';

export function taskRoutes(service: AutomationService): Hono {
  const tasks = new Hono();

  tasks.get('/', c => {
    return c.json({ success: true, data: service.tasks.list() });
  });

  tasks.get('/:taskId', c => {
    try {
      return c.json({ success: true, data: service.tasks.get(c.req.param('taskId')) });
    } catch (error) {
      return errorResponse(c, error, 'getting task');
    }
  });

  tasks.post('/:taskId/cancel', c => {
    try {
      return c.json({ success: true, data: service.tasks.cancel(c.req.param('taskId')) });
    } catch (error) {
      return errorResponse(c, error, 'cancelling task');
    }
  });

  return tasks;
}
