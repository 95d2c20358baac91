// src/server.ts
// What: HTTP server entrypoint.
// How: Loads config, builds the service container, creates the Express app and listens on the configured
//      port. Closes the pg pool on SIGINT/SIGTERM.

import { loadConfig } from './config/env.js';
import { createContainer } from './container.js';
import logger from './logging.js';
import { createApp } from './app.js';

function main(): void {
  const config = loadConfig();
  const container = createContainer(config);
  const app = createApp(container);

  const server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT }, 'Server listening');
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      container.pool.end().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Failed to close database pool');
          process.exit(1);
        },
      );
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
