#!/usr/bin/env node

import { Server } from 'http';
import { createApp } from './api/app.js';
import { createJobStore, parseStoreKind } from './database/store-factory.js';
import { JobControl } from './jobs/job-control.js';
import { config } from './utils/config.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { flushSentry } from './utils/sentry.js';

function startServer(): Server {
  const store = createJobStore(parseStoreKind(process.argv.slice(2)));
  const app = createApp({ control: new JobControl(store), adminToken: config.api.adminToken });

  if (!config.api.adminToken) {
    logger.warn('ADMIN_API_TOKEN is not set; /api/jobs will answer 503');
  }

  return app.listen(config.api.port, () => {
    logger.info('API server started', { port: config.api.port });
  });
}

function shutdown(server: Server, signal: string): void {
  logger.info(`Received ${signal}, shutting down gracefully`);
  server.close((error) => {
    if (error) {
      logger.error('Error while closing the API server', { error: errorMessage(error) });
    }
    flushSentry()
      .catch((flushError: unknown) => {
        logger.error('Failed to flush Sentry', { error: errorMessage(flushError) });
      })
      .finally(() => process.exit(error ? 1 : 0));
  });
}

const server = startServer();
process.on('SIGINT', () => shutdown(server, 'SIGINT'));
process.on('SIGTERM', () => shutdown(server, 'SIGTERM'));
