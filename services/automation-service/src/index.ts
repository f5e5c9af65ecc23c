import { logger } from '@autopilot/shared-utils';
import { loadConfig } from './config';
import { createAutomationService } from './app';
import { startServer } from './server';

async function main() {
  try {
    const config = loadConfig();
    const service = createAutomationService(config);
    const running = await startServer(service);

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`);
      running.stop().then(
        () => process.exit(0),
        error => {
          logger.error('Shutdown failed', error);
          process.exit(1);
        }
      );
    };
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start automation service', error);
    process.exit(1);
  }
}

void main();
