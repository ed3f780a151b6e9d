/**
 * @fileoverview Express application factory.
 *
 * Kept separate from the server entry point so tests can mount the app
 * without listening on a port.
 */

import express from 'express';
import { errorHandler } from './routes/errors.js';
import { healthHandler } from './routes/health.js';
import { createValidateRouter } from './routes/validate.js';
import type { ResponseGenerator } from './domains/intent-guard/index.js';

export type AppOptions = {
  responseGenerator?: ResponseGenerator;
};

export function createApp(options: AppOptions = {}): express.Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', healthHandler);
  app.use(createValidateRouter(options.responseGenerator));
  app.use(errorHandler);

  return app;
}
