import express, { type Express } from 'express';
import { isServerShuttingDown } from '../lib/shutdownState.js';
import type { ApiContext } from './context.js';
import { errorHandler, notFoundHandler } from './middleware/error.js';
import { createHealthRouter } from './routes/health.js';
import { createOperationsRouter } from './routes/operations.js';
import { createStacksRouter } from './routes/stacks.js';
import { createSystemRouter } from './routes/system.js';

export type { ApiContext } from './context.js';

export function createApi(ctx: ApiContext): Express {
  const app = express();

  app.disable('x-powered-by');
  // Stack descriptions with many services can be large
  app.use(express.json({ limit: '1mb' }));

  // Liveness for load balancers and the swap helper's readiness probe
  app.get('/health', (_req, res) => {
    if (isServerShuttingDown()) {
      res.status(503).json({ status: 'shutting_down' });
      return;
    }
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api/environments', createStacksRouter(ctx));
  app.use('/api/environments', createHealthRouter(ctx));
  app.use('/api/operations', createOperationsRouter(ctx));
  app.use('/api/system', createSystemRouter(ctx));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
