/**
 * API Routes
 *
 * GET /api/health   - liveness, store backend, replay state
 * GET /api/breaking - current breaking news (?topic= filter)
 * GET /api/stats    - counters, clock and processing rate
 * GET /api/topics   - topics with active windows
 */

import { Router } from 'express';
import type { Request, Response, NextFunction, RequestHandler, Router as RouterType } from 'express';
import type { StateStore } from '../ports/state-store.js';
import type { ReplayStatus } from '../core/feed-replayer.js';
import { getBreakingNewsView, getHealthView, getStatsView, getTopicsView } from './projections.js';

export interface ApiDeps {
  store: StateStore;
  replayStatus: () => ReplayStatus;
}

/**
 * Forward async handler rejections to the express error chain.
 */
function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function createApiRouter(deps: ApiDeps): RouterType {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json(getHealthView(deps.store.backend, deps.replayStatus().state === 'running'));
  });

  router.get(
    '/breaking',
    asyncHandler(async (req, res) => {
      const topic = typeof req.query['topic'] === 'string' ? req.query['topic'] : undefined;
      res.json(await getBreakingNewsView(deps.store, { topic }));
    })
  );

  router.get(
    '/stats',
    asyncHandler(async (_req, res) => {
      res.json(await getStatsView(deps.store, deps.replayStatus()));
    })
  );

  router.get(
    '/topics',
    asyncHandler(async (_req, res) => {
      res.json(await getTopicsView(deps.store));
    })
  );

  return router;
}
