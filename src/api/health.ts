/**
 * GET /health: scheduler and store status. 200 when healthy, 503 otherwise.
 */

import type { RequestHandler } from 'express';
import type { HealthService } from '../services/HealthService.js';

export function createHealthHandler(healthService: HealthService): RequestHandler {
  return (_req, res, next) => {
    healthService
      .check()
      .then((report) => {
        res
          .status(report.status === 'ok' ? 200 : 503)
          .set('Cache-Control', 'no-store')
          .json(report);
      })
      .catch(next);
  };
}
