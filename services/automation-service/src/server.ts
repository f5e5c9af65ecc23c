import { createServer, type Server } from 'node:http';
import { getRequestListener } from '@hono/node-server';
import type { WebSocketServer } from 'ws';
import { logger } from '@autopilot/shared-utils';
import type { AutomationService } from './app';
import { createRoutes } from './routes';
import { attachWebSocket, TaskEventHub } from './websocket';

export interface RunningServer {
  server: Server;
  wss: WebSocketServer;
  hub: TaskEventHub;
  stop(): Promise<void>;
}

/**
 * Serve the HTTP API and the `/ws` event stream on one port.
 */
export async function startServer(service: AutomationService): Promise<RunningServer> {
  const { host, port } = service.config.server;
  const app = createRoutes(service);
  const hub = new TaskEventHub(service.events);

  const server = createServer(getRequestListener(app.fetch));
  const wss = attachWebSocket(server, hub);

  service.start();
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  logger.info(`Automation service listening on http://${host}:${port}`);
  logger.info('Available routes:');
  logger.info('  - POST /api/commands');
  logger.info('  - POST /api/parse');
  logger.info('  - GET  /api/tasks[/:taskId]');
  logger.info('  - POST /api/tasks/:taskId/cancel');
  logger.info('  - GET  /api/confirmations');
  logger.info('  - POST /api/confirmations/:confirmationId');
  logger.info('  - GET  /api/actions');
  logger.info(`WebSocket endpoint: ws://${host}:${port}/ws`);

  let stopping: Promise<void> | undefined;
  const stop = () => {
    stopping ??= (async () => {
      hub.close();
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>(resolve => wss.close(() => resolve()));
      await service.stop();
      await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
      logger.info('Automation service stopped');
    })();
    return stopping;
  };

  return { server, wss, hub, stop };
}
