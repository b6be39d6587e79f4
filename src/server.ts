/**
 * Node.js entry point
 */

import { serve } from '@hono/node-server';
import { createApp } from './index';
import { loadConfig } from './lib/config';
import { logger } from './lib/logger';

const config = loadConfig();
logger.level = config.LOG_LEVEL;

const app = createApp(config);

const server = serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST }, (info) => {
  logger.info({ port: info.port, host: config.HOST }, 'Social card API listening');
});

function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down');
  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Error closing server');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
