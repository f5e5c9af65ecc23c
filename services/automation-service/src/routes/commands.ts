import { Hono } from 'hono';
import { z } from 'zod';
import type { AutomationService } from '../app';
import { errorResponse, readBody } from './respond';

const CommandBodySchema = z.object({
  command: z.string().trim().min(1, 'command must not be empty'),
  require_confirmation: z.boolean().optional(),
  wait: z.boolean().optional(),
});

const ParseBodySchema = z.object({
  command: z.string().trim().min(1, 'command must not be empty'),
});

export function commandRoutes(service: AutomationService): Hono {
  const commands = new Hono();

  // Submit a command; `wait` holds the response until the task finishes
  commands.post('/commands', async c => {
    try {
      const body = await readBody(c, CommandBodySchema);
      const taskId = service.tasks.submit(body.command, { requireConfirmation: body.require_confirmation });

      if (body.wait) {
        const task = await service.tasks.waitFor(taskId);
        return c.json({ success: true, data: task });
      }
      return c.json({ success: true, data: { task_id: taskId, status: service.tasks.get(taskId).status } }, 202);
    } catch (error) {
      return errorResponse(c, error, 'submitting command');
    }
  });

  // Interpret without executing
  commands.post('/parse', async c => {
    try {
      const body = await readBody(c, ParseBodySchema);
      const plan = await service.interpreter.interpret(body.command);
      return c.json({ success: true, data: { plan } });
    } catch (error) {
      return errorResponse(c, error, 'parsing command');
    }
  });

  return commands;
}
