import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { runWithLogContext } from './log-context';
import { logger } from './logger';

export const CORRELATION_HEADER = 'x-correlation-id';

const firstHeader = (req: Request, name: string): string | undefined => {
  const value = req.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim().length > 0 ? first.trim() : undefined;
};

/**
 * Tag each request with a correlation id (taken from `x-correlation-id` or
 * `x-request-id` when the client sends one) and echo it on the response.
 * Handlers run inside a log context carrying the id.
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId =
    firstHeader(req, CORRELATION_HEADER) ?? firstHeader(req, 'x-request-id') ?? uuid();
  const startedAt = Date.now();

  res.setHeader(CORRELATION_HEADER, correlationId);

  runWithLogContext({ correlationId }, () => {
    logger.debug({ method: req.method, path: req.path }, 'Request started');

    res.on('finish', () => {
      const fields = {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt,
      };
      if (res.statusCode >= 500) {
        logger.error(fields, 'Request failed');
      } else {
        logger.info(fields, 'Request completed');
      }
    });

    next();
  });
};
