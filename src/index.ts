/**
 * @fileoverview HTTP server entry point for the intent guard.
 *
 * Exposes the security proxy to agents that run out of process. Agents
 * embedding the proxy directly import `domains/intent-guard` instead.
 */

import config, { validateConfig } from './config.js';
import { createApp } from './app.js';
import { createLogger, initObservability } from './utils/observability/index.js';

// Fail fast if configuration is invalid
validateConfig();
initObservability();

const logger = createLogger({ domain: 'server' });
const app = createApp();

const server = app.listen(config.port, () => {
  logger.info('server_started', { port: config.port, env: config.nodeEnv });
});

let isShuttingDown = false;

function shutdown(signal: string): void {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info('server_shutdown', { signal });

  server.close((err) => {
    if (err) {
      logger.error('server_close_failed', { error: err.message });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
