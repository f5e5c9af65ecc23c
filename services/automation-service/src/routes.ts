import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from '@autopilot/shared-utils';
import type { AutomationService } from './app';
import { listActionDefinitions } from './components/action-schema';
import { healthHandler } from './routes/health';
import { commandRoutes } from './routes/commands';
import { taskRoutes } from './routes/tasks';
import { confirmationRoutes } from './routes/confirmations';

/**
 * HTTP surface of the automation service. Every JSON response uses the
 * `{ success, data }` / `{ success, error }` envelope.
 */
export function createRoutes(service: AutomationService): Hono {
  const app = new Hono();
  app.use('*', cors());

  app.get('/health', c => c.json(healthHandler(service)));

  app.route('/api', commandRoutes(service));
  app.route('/api/tasks', taskRoutes(service));
  app.route('/api/confirmations', confirmationRoutes(service));

  app.get('/api/actions', c => c.json({ success: true, data: listActionDefinitions() }));

  app.notFound(c => c.json({ success: false, error: { code: 'NOT_FOUND', message: `No route for ${c.req.method} ${c.req.path}` } }, 404));

  app.onError((error, c) => {
    logger.error('Unhandled route error', error);
    return c.json({ success: false, error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } }, 500);
  });

  return app;
}
