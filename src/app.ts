/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import express from 'express';

import * as config from './config.js';
import log from './log.js';
import { createAbortSignalMiddleware } from './middleware/abort-signal.js';
import {
  createGatewayErrorHandler,
  createGatewayHandler,
} from './middleware/gateway.js';
import { createAdminRouter } from './routes/admin.js';
import * as system from './system.js';

// HTTP server
const app = express();

app.disable('x-powered-by');

if (config.TRUST_PROXY) {
  log.info('[app] trusting X-Forwarded-* headers');
  app.set('trust proxy', true);
}

app.use(createAbortSignalMiddleware({ log }));
app.use(
  createAdminRouter({
    prefix: config.ADMIN_PATH_PREFIX,
    table: system.ruleTable,
  }),
);
app.use(
  createGatewayHandler({
    log,
    director: system.responseDirector,
    backendClient: system.backendClient,
    exposeRoutingHeaders: config.EXPOSE_ROUTING_HEADERS,
  }),
);
app.use(createGatewayErrorHandler({ log }));

const server = app.listen(config.PORT, () => {
  log.info(`Listening on port ${config.PORT}`, {
    documentRoot: config.DOCUMENT_ROOT,
    cacheRoot: config.CACHE_ROOT,
    backendUrl: config.BACKEND_URL,
  });
});

let isShuttingDown = false;

const shutdown = (signal: string) => {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;

  log.info('Shutting down', { signal });
  server.close((error) => {
    if (error) {
      log.error('Error closing HTTP server', { message: error.message });
      process.exit(1);
    }
    log.info('Shutdown complete');
    process.exit(0);
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export { server };
