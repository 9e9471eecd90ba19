/**
 * Probe routes. Only GET is served; other methods on a known path get 405.
 */

import express, { type Router } from 'express';
import type { Container } from '../container.js';
import { AppError } from '../errors.js';
import { createHealthHandler } from './health.js';

const PROBE_PATHS = ['/health', '/'];

export function createRouter(container: Container): Router {
  const router = express.Router();
  const health = createHealthHandler(container.healthService);

  router.get(PROBE_PATHS, health);
  router.all(PROBE_PATHS, (req, res, next) => {
    res.set('Allow', 'GET, HEAD');
    next(new AppError('INVALID_REQUEST', `Method ${req.method} not allowed`, 405));
  });

  return router;
}
