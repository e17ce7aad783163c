import { Router, type Response } from 'express';
import type { OperationAccepted } from '@stackwright/shared';
import { PlanValidationError } from '../../lib/errors.js';
import type { ApiContext } from '../context.js';
import { DeployRequestSchema, MaintenanceRequestSchema, type DeployRequest } from '../schemas.js';

function accepted(res: Response, handle: OperationAccepted): void {
  const { operationId, kind, environmentId, stackName } = handle;
  res.status(202)
    .location(`/api/operations/${operationId}`)
    .json({ operationId, kind, environmentId, stackName });
}

function parseDeployRequest(body: unknown, stackName: string): DeployRequest {
  const request = DeployRequestSchema.parse(body);
  if (request.description.name !== stackName) {
    throw new PlanValidationError(
      'INVALID_DESCRIPTION',
      `Description is for stack ${request.description.name}, not ${stackName}`
    );
  }
  return request;
}

export function createStacksRouter(ctx: ApiContext): Router {
  const router = Router();

  // GET /api/environments - Known environments and whether each is busy
  router.get('/', (_req, res) => {
    res.json(ctx.runtimes.environments().map(environmentId => ({
      environmentId,
      stacks: ctx.store.listByEnvironment(environmentId).length,
      activeOperation: ctx.lock.activeOperation(environmentId)?.operation ?? null,
    })));
  });

  // GET /api/environments/:envId/stacks
  router.get('/:envId/stacks', (req, res) => {
    ctx.runtimes.get(req.params.envId);
    res.json(ctx.store.listByEnvironment(req.params.envId));
  });

  // GET /api/environments/:envId/stacks/:stackName - Record plus rollback availability
  router.get('/:envId/stacks/:stackName', (req, res) => {
    const record = ctx.controller.load(req.params.envId, req.params.stackName);
    const check = ctx.controller.checkRollback(record);
    res.json({
      ...record,
      rollback: check.allowed
        ? { available: true, version: check.snapshot.version }
        : { available: false, code: check.code, reason: check.reason },
    });
  });

  router.post('/:envId/stacks/:stackName/deploy', (req, res) => {
    const { description, organizationId, features } = parseDeployRequest(req.body, req.params.stackName);
    accepted(res, ctx.operations.deploy(description, {
      environmentId: req.params.envId,
      organizationId,
      features,
    }));
  });

  router.post('/:envId/stacks/:stackName/upgrade', (req, res) => {
    const { description, organizationId, features } = parseDeployRequest(req.body, req.params.stackName);
    accepted(res, ctx.operations.upgrade(description, {
      environmentId: req.params.envId,
      organizationId,
      features,
    }));
  });

  router.post('/:envId/stacks/:stackName/rollback', (req, res) => {
    accepted(res, ctx.operations.rollback(req.params.envId, req.params.stackName));
  });

  router.post('/:envId/stacks/:stackName/maintenance', (req, res) => {
    const { enabled } = MaintenanceRequestSchema.parse(req.body);
    accepted(res, ctx.operations.setMaintenance(req.params.envId, req.params.stackName, enabled));
  });

  router.delete('/:envId/stacks/:stackName', (req, res) => {
    accepted(res, ctx.operations.remove(req.params.envId, req.params.stackName));
  });

  // GET /api/environments/:envId/operations - Tracked operations, oldest first
  router.get('/:envId/operations', (req, res) => {
    ctx.runtimes.get(req.params.envId);
    res.json(ctx.operations.listOperations(req.params.envId).map(({ events: _events, ...status }) => status));
  });

  return router;
}
