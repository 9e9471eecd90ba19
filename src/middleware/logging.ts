/**
 * Request logging middleware.
 * Tags every probe request with an id and logs one RequestLogEvent when the
 * response has been written.
 *
 *   2xx/3xx → debug (orchestrators probe every few seconds)
 *   4xx     → warn
 *   5xx     → error, with the message the error handler recorded
 */

import { randomUUID } from 'node:crypto';
import type { RequestHandler, Response } from 'express';
import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'debug';
}

/** Set by the error handler so the request log can carry the cause of a 5xx. */
export function recordRequestError(res: Response, message: string): void {
  res.locals.errorMessage = message;
}

export function createLoggingMiddleware(logProvider: ILogProvider): RequestHandler {
  return (req, res, next) => {
    const requestId = randomUUID();
    const start = performance.now();
    res.locals.requestId = requestId;
    res.set(REQUEST_ID_HEADER, requestId);

    res.on('finish', () => {
      const durationMs = Math.round(performance.now() - start);
      const status = res.statusCode;
      const fields: Record<string, unknown> = { requestId };
      const errorMessage: unknown = res.locals.errorMessage;
      if (typeof errorMessage === 'string') fields.error = errorMessage;

      const event: RequestLogEvent = {
        level: levelForStatus(status),
        message: `${req.method} ${req.path} → ${status} (${durationMs}ms)`,
        method: req.method,
        path: req.path,
        status,
        durationMs,
        fields,
      };
      logProvider.log(event);
    });

    next();
  };
}
