/**
 * Error handler for the probe app.
 * AppError subclasses keep their code, status and details; anything else is
 * a 500 that does not leak its message.
 */

import type { ErrorRequestHandler } from 'express';
import { AppError, errorMessage } from '../errors.js';
import { recordRequestError } from './logging.js';

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  recordRequestError(res, errorMessage(err));

  if (err instanceof AppError) {
    const body: ErrorResponse = {
      error: {
        code: err.code,
        message: err.message,
        ...(err.details && { details: err.details }),
      },
    };
    res.status(err.statusCode).json(body);
    return;
  }

  const body: ErrorResponse = {
    error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
  };
  res.status(500).json(body);
};
