import { Router } from 'express';
import type { ApiContext } from '../context.js';
import { createError } from '../middleware/error.js';

export function createOperationsRouter(ctx: ApiContext): Router {
  const router = Router();

  // GET /api/operations/:id - Status, result and every event so far
  router.get('/:id', (req, res, next) => {
    const status = ctx.operations.getOperation(req.params.id);
    if (!status) {
      return next(createError('Operation not found', 404, 'OPERATION_NOT_FOUND'));
    }
    res.json(status);
  });

  // POST /api/operations/:id/cancel - Stop after the step in flight
  router.post('/:id/cancel', (req, res, next) => {
    const status = ctx.operations.getOperation(req.params.id);
    if (!status) {
      return next(createError('Operation not found', 404, 'OPERATION_NOT_FOUND'));
    }
    res.json({ operationId: status.operationId, cancelled: ctx.operations.cancel(status.operationId) });
  });

  return router;
}
