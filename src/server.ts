/**
 * Express app serving the liveness probe.
 */

import express, { type Express } from 'express';
import type { Server } from 'node:http';
import type { Container } from './container.js';
import { createRouter } from './api/router.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { errorHandler } from './middleware/error-handler.js';
import { NotFoundError } from './errors.js';

export function createHealthApp(container: Container): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(createLoggingMiddleware(container.logProvider));
  app.use(createRouter(container));
  app.use((req, _res, next) => {
    next(new NotFoundError(`No route matches ${req.method} ${req.path}`));
  });
  app.use(errorHandler);

  return app;
}

export function listen(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}

export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
