import { Hono } from 'hono';
import { z } from 'zod';
import type { AutomationService } from '../app';
import { ConfirmationNotFoundError } from '../errors';
import { errorResponse, readBody } from './respond';

const DecisionBodySchema = z.object({
  approved: z.boolean(),
});

export function confirmationRoutes(service: AutomationService): Hono {
  const confirmations = new Hono();

  confirmations.get('/', c => {
    return c.json({ success: true, data: service.gate.listPending() });
  });

  // Approve or deny a pending sensitive action
  confirmations.post('/:confirmationId', async c => {
    try {
      const confirmationId = c.req.param('confirmationId');
      const { approved } = await readBody(c, DecisionBodySchema);
      if (!service.gate.resolve(confirmationId, approved)) {
        throw new ConfirmationNotFoundError(confirmationId);
      }
      return c.json({ success: true, data: { confirmation_id: confirmationId, approved } });
    } catch (error) {
      return errorResponse(c, error, 'resolving confirmation');
    }
  });

  return confirmations;
}
