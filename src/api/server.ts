/**
 * HTTP app factory.
 */

import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import type { Logger } from '../types/logger.js';
import { describeError } from '../core/errors.js';
import { createApiRouter, type ApiDeps } from './routes.js';
import { createLoggingMiddleware } from './middleware/logging.js';

export function createApp(deps: ApiDeps, logger: Logger): Express {
  const app = express();
  const log = logger.child({ component: 'api' });

  app.use(createLoggingMiddleware(logger));
  app.use('/api', createApiRouter(deps));

  // Four parameters mark this as the error handler
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    log.error({ path: req.originalUrl, error: describeError(error) }, 'Unhandled API error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
