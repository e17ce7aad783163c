import { Router } from 'express';
import { getDashboardClientCount } from '../../websocket/dashboardClient.js';
import type { ApiContext } from '../context.js';
import { SelfUpdateRequestSchema } from '../schemas.js';

export function createSystemRouter(ctx: ApiContext): Router {
  const router = Router();

  // GET /api/system/status - Overall orchestrator status
  router.get('/status', (_req, res) => {
    const stacks = ctx.store.list();
    const running = ctx.operations.listOperations().filter(op => op.state === 'running');

    res.json({
      status: 'ok',
      environments: ctx.runtimes.environments(),
      locks: ctx.lock.getStats(),
      stacks: {
        total: stacks.length,
        normal: stacks.filter(s => s.operationMode === 'normal').length,
        failed: stacks.filter(s => s.operationMode === 'failed').length,
      },
      operations: {
        running: running.length,
      },
      healthMonitor: ctx.monitor?.isRunning() ?? false,
      maintenanceObserver: ctx.observer?.isRunning() ?? false,
      dashboardClients: getDashboardClientCount(),
      timestamp: new Date().toISOString(),
    });
  });

  // POST /api/system/self-update - Replace the orchestrator's own container
  router.post('/self-update', (req, res) => {
    const { version } = SelfUpdateRequestSchema.parse(req.body);
    const handle = ctx.operations.selfUpdate(version);
    res.status(202).json({
      operationId: handle.operationId,
      kind: handle.kind,
      environmentId: handle.environmentId,
      stackName: handle.stackName,
    });
  });

  return router;
}
