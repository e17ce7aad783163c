import { Router } from 'express';
import type { ApiContext } from '../context.js';
import { createError } from '../middleware/error.js';
import { HealthHistoryQuerySchema } from '../schemas.js';

const DEFAULT_HISTORY_WINDOW_MS = 24 * 60 * 60 * 1000;

export function createHealthRouter(ctx: ApiContext): Router {
  const router = Router();

  // GET /api/environments/:envId/health - Latest status of every stack
  router.get('/:envId/health', (req, res) => {
    const { envId } = req.params;
    ctx.runtimes.get(envId);
    res.json(ctx.aggregator.summarizeEnvironment(envId, ctx.store.listByEnvironment(envId)));
  });

  // GET /api/environments/:envId/stacks/:stackName/health[?refresh=true]
  router.get('/:envId/stacks/:stackName/health', (req, res, next) => {
    const record = ctx.controller.load(req.params.envId, req.params.stackName);

    if (req.query.refresh === 'true') {
      void ctx.aggregator.capture(record)
        .then(snapshot => res.json(snapshot))
        .catch(next);
      return;
    }

    const latest = ctx.history.latest(record.stackId);
    if (!latest) {
      return next(createError(`No health captured yet for ${record.stackName}`, 404, 'NO_HEALTH_DATA'));
    }
    res.json(latest);
  });

  // GET /api/environments/:envId/stacks/:stackName/health/history?since=&limit=
  router.get('/:envId/stacks/:stackName/health/history', (req, res) => {
    const record = ctx.controller.load(req.params.envId, req.params.stackName);
    const { since, limit } = HealthHistoryQuerySchema.parse(req.query);
    const from = since ? new Date(since) : new Date(Date.now() - DEFAULT_HISTORY_WINDOW_MS);
    res.json(ctx.history.history(record.stackId, from, limit));
  });

  // GET /api/environments/:envId/stacks/:stackName/maintenance-observer - Last observer verdict
  router.get('/:envId/stacks/:stackName/maintenance-observer', (req, res, next) => {
    const record = ctx.controller.load(req.params.envId, req.params.stackName);
    const result = ctx.observer?.lastResult(record.stackId) ?? null;
    if (!result) {
      return next(createError(`No maintenance check recorded for ${record.stackName}`, 404, 'NO_OBSERVER_RESULT'));
    }
    res.json(result);
  });

  return router;
}
