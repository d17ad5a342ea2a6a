/**
 * Request logging middleware: one line per response with status and timing.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Logger } from '../../types/logger.js';

export function createLoggingMiddleware(logger: Logger): RequestHandler {
  const log = logger.child({ component: 'http' });

  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();

    res.on('finish', () => {
      const entry = {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - startTime,
      };
      if (res.statusCode >= 500) {
        log.error(entry, 'Request failed');
      } else {
        log.debug(entry, 'Request handled');
      }
    });

    next();
  };
}
