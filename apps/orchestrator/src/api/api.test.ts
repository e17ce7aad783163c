import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, type Server } from 'http';
import Database from 'better-sqlite3';
import { z } from 'zod';
import type { DeploymentResult, OperationEvent, StackDescription } from '@stackwright/shared';
import { applySchema } from '../db/index.js';
import { LifecycleExecutor } from '../engine/lifecycleExecutor.js';
import { HealthAggregator } from '../health/healthAggregator.js';
import { EnvironmentLock } from '../lib/environmentLock.js';
import { setServerShuttingDown } from '../lib/shutdownState.js';
import { RuntimeRegistry } from '../runtime/runtimeRegistry.js';
import { HealthHistoryStore } from '../services/healthHistoryStore.js';
import { OperationModeController } from '../services/operationModeController.js';
import { StackOperations } from '../services/stackOperations.js';
import { StackStateStore } from '../services/stackStateStore.js';
import { FakeRuntime } from '../test-utils/fakeRuntime.js';
import { createApi } from './index.js';

const AcceptedBody = z.object({ operationId: z.string() });

const shop: StackDescription = {
  name: 'shop',
  version: '1.0.0',
  services: [
    { name: 'db', image: 'postgres:16' },
    { name: 'api', image: 'shop/api', dependsOn: ['db'] },
  ],
};

describe('HTTP API', () => {
  let db: Database.Database;
  let server: Server;
  let baseUrl: string;
  let store: StackStateStore;
  let lock: EnvironmentLock;
  let operations: StackOperations;
  let aggregator: HealthAggregator;

  function request(method: string, path: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? {} : { 'content-type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  function nextCompletion(operationId: string): Promise<DeploymentResult> {
    return new Promise(resolve => {
      const unsubscribe = operations.subscribe((event: OperationEvent) => {
        if (event.type === 'completed' && event.operationId === operationId) {
          unsubscribe();
          resolve(event.result);
        }
      });
    });
  }

  async function deployShop(): Promise<void> {
    const handle = operations.deploy(shop, { environmentId: 'edge-1' });
    await handle.completion;
  }

  beforeEach(async () => {
    db = new Database(':memory:');
    applySchema(db);
    store = new StackStateStore(db);
    const history = new HealthHistoryStore(db);
    const controller = new OperationModeController(store);
    lock = new EnvironmentLock();

    const runtimes = new RuntimeRegistry();
    runtimes.register('edge-1', new FakeRuntime());
    aggregator = new HealthAggregator(runtimes, history, { httpTimeoutMs: 100 }, async () => ({
      statusCode: 200,
      body: { status: 'healthy' },
      responseTimeMs: 1,
      error: null,
    }));
    operations = new StackOperations(runtimes, controller, lock,
      environmentId => new LifecycleExecutor(runtimes.get(environmentId), { initPollIntervalMs: 1 }));

    const app = createApi({ operations, controller, store, history, aggregator, runtimes, lock, monitor: null, observer: null });
    server = createServer(app);
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    setServerShuttingDown(false);
    await new Promise<void>(resolve => server.close(() => resolve()));
    db.close();
  });

  describe('GET /health', () => {
    it('answers ok while running', async () => {
      const res = await request('GET', '/health');
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'ok' });
    });

    it('answers 503 once shutdown has begun', async () => {
      setServerShuttingDown(true);
      const res = await request('GET', '/health');
      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({ status: 'shutting_down' });
    });
  });

  describe('POST deploy', () => {
    it('accepts the command and runs it in the background', async () => {
      const res = await request('POST', '/api/environments/edge-1/stacks/shop/deploy', {
        description: shop,
        organizationId: 'org-7',
      });

      expect(res.status).toBe(202);
      const json = await res.json();
      expect(json).toMatchObject({ kind: 'deploy', environmentId: 'edge-1', stackName: 'shop' });
      const body = AcceptedBody.parse(json);
      expect(res.headers.get('location')).toBe(`/api/operations/${body.operationId}`);

      const status = operations.getOperation(body.operationId);
      const result = status?.result ?? await nextCompletion(body.operationId);
      expect(result.success).toBe(true);
      expect(store.get('edge-1/shop')).toMatchObject({ operationMode: 'normal', organizationId: 'org-7' });
    });

    it('rejects a description that fails validation', async () => {
      const res = await request('POST', '/api/environments/edge-1/stacks/shop/deploy', {
        description: { ...shop, services: [] },
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: 'INVALID_REQUEST',
          message: 'Request body failed validation',
          details: ['description.services: A stack needs at least one service'],
          retryHint: 'fix-input',
        },
      });
    });

    it('rejects a description for another stack', async () => {
      const res = await request('POST', '/api/environments/edge-1/stacks/blog/deploy', { description: shop });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'INVALID_DESCRIPTION', message: 'Description is for stack shop, not blog', retryHint: 'fix-input' },
      });
    });

    it('reports a dependency cycle without touching the runtime', async () => {
      const cyclic: StackDescription = {
        ...shop,
        services: [
          { name: 'db', image: 'postgres:16', dependsOn: ['api'] },
          { name: 'api', image: 'shop/api', dependsOn: ['db'] },
        ],
      };
      const res = await request('POST', '/api/environments/edge-1/stacks/shop/deploy', { description: cyclic });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'DEPENDENCY_CYCLE', retryHint: 'fix-input' } });
      expect(store.get('edge-1/shop')).toBeNull();
    });

    it('answers 404 for an unknown environment', async () => {
      const res = await request('POST', '/api/environments/nowhere/stacks/shop/deploy', { description: shop });

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({
        error: { code: 'ENVIRONMENT_NOT_FOUND', message: 'Unknown environment: nowhere', retryHint: 'fix-input' },
      });
    });

    it('answers 409 with the active operation while the environment is busy', async () => {
      const lease = lock.acquire('edge-1', 'remove blog');

      const res = await request('POST', '/api/environments/edge-1/stacks/shop/deploy', { description: shop });

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: {
          code: 'OPERATION_IN_PROGRESS',
          message: 'Environment edge-1 is busy with remove blog',
          details: [],
          retryHint: 'retry-now',
          activeOperation: 'remove blog',
        },
      });
      lease.release();
    });

    it('answers 400 for a malformed JSON body', async () => {
      const res = await fetch(`${baseUrl}/api/environments/edge-1/stacks/shop/deploy`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '{"description":',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'INVALID_REQUEST' } });
    });
  });

  describe('stack commands', () => {
    it('refuses rollback for a stack that was never deployed', async () => {
      const res = await request('POST', '/api/environments/edge-1/stacks/shop/rollback');

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: { code: 'STACK_NOT_FOUND', retryHint: 'fix-input' } });
    });

    it('shows the record with rollback availability', async () => {
      await deployShop();

      const res = await request('GET', '/api/environments/edge-1/stacks/shop');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        stackId: 'edge-1/shop',
        operationMode: 'normal',
        currentVersion: '1.0.0',
        rollback: { available: false, code: 'ROLLBACK_NOT_APPLICABLE' },
      });
    });

    it('requires an enabled flag for maintenance', async () => {
      await deployShop();

      const res = await request('POST', '/api/environments/edge-1/stacks/shop/maintenance', { enabled: 'yes' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'INVALID_REQUEST', details: ['enabled: Expected boolean, received string'] } });
    });

    it('accepts maintenance entry and removal', async () => {
      await deployShop();

      const maintenance = await request('POST', '/api/environments/edge-1/stacks/shop/maintenance', { enabled: true });
      expect(maintenance.status).toBe(202);
      const { operationId } = AcceptedBody.parse(await maintenance.json());
      const result = operations.getOperation(operationId)?.result ?? await nextCompletion(operationId);
      expect(result.success).toBe(true);
      expect(store.get('edge-1/shop')?.operationMode).toBe('maintenance');

      const removal = await request('DELETE', '/api/environments/edge-1/stacks/shop');
      expect(removal.status).toBe(202);
      const removed = await removal.json();
      expect(removed).toMatchObject({ kind: 'remove', stackName: 'shop' });
      const removeId = AcceptedBody.parse(removed).operationId;
      const removeResult = operations.getOperation(removeId)?.result ?? await nextCompletion(removeId);
      expect(removeResult.success).toBe(true);
      expect(store.get('edge-1/shop')?.operationMode).toBe('stopped');
    });

    it('lists the stacks of an environment', async () => {
      await deployShop();

      const res = await request('GET', '/api/environments/edge-1/stacks');

      expect(await res.json()).toMatchObject([{ stackName: 'shop', operationMode: 'normal' }]);
    });
  });

  describe('operations', () => {
    it('returns the status and events of an operation', async () => {
      const handle = operations.deploy(shop, { environmentId: 'edge-1' });
      await handle.completion;

      const res = await request('GET', `/api/operations/${handle.operationId}`);
      const json = await res.json();

      expect(res.status).toBe(200);
      expect(json).toMatchObject({ operationId: handle.operationId, state: 'succeeded', kind: 'deploy' });
      const { events } = z.object({ events: z.array(z.object({ type: z.string() })) }).parse(json);
      expect(events[events.length - 1].type).toBe('completed');
    });

    it('answers 404 for an unknown operation', async () => {
      const res = await request('GET', '/api/operations/6f1c3f43-0000-4000-8000-000000000000');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: { code: 'OPERATION_NOT_FOUND', message: 'Operation not found' } });
    });

    it('does not cancel a finished operation', async () => {
      const handle = operations.deploy(shop, { environmentId: 'edge-1' });
      await handle.completion;

      const res = await request('POST', `/api/operations/${handle.operationId}/cancel`);

      expect(await res.json()).toEqual({ operationId: handle.operationId, cancelled: false });
    });
  });

  describe('health', () => {
    it('answers 404 until health has been captured', async () => {
      await deployShop();

      const res = await request('GET', '/api/environments/edge-1/stacks/shop/health');

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: { code: 'NO_HEALTH_DATA' } });
    });

    it('returns the latest snapshot and the environment summary', async () => {
      await deployShop();
      const record = store.get('edge-1/shop');
      if (!record) throw new Error('stack was not recorded');
      const snapshot = await aggregator.capture(record, new Date());

      const latest = await request('GET', '/api/environments/edge-1/stacks/shop/health');
      expect(await latest.json()).toEqual(snapshot);

      const summary = await request('GET', '/api/environments/edge-1/health');
      expect(await summary.json()).toMatchObject({
        environmentId: 'edge-1',
        overallStatus: snapshot.overallStatus,
        stacks: [{ stackName: 'shop', status: snapshot.overallStatus, capturedAt: snapshot.capturedAt }],
      });
    });

    it('returns history since a point in time', async () => {
      await deployShop();
      const record = store.get('edge-1/shop');
      if (!record) throw new Error('stack was not recorded');
      await aggregator.capture(record, new Date('2026-03-01T10:00:00.000Z'));
      await aggregator.capture(record, new Date('2026-03-01T11:00:00.000Z'));

      const res = await request('GET',
        '/api/environments/edge-1/stacks/shop/health/history?since=2026-03-01T10:30:00.000Z');
      const body = z.array(z.object({ capturedAt: z.string() })).parse(await res.json());

      expect(body.map(s => s.capturedAt)).toEqual(['2026-03-01T11:00:00.000Z']);
    });

    it('reports when no maintenance check has run', async () => {
      await deployShop();

      const res = await request('GET', '/api/environments/edge-1/stacks/shop/maintenance-observer');

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: { code: 'NO_OBSERVER_RESULT' } });
    });

    it('rejects a malformed history window', async () => {
      await deployShop();

      const res = await request('GET', '/api/environments/edge-1/stacks/shop/health/history?limit=0');

      expect(res.status).toBe(400);
    });
  });

  describe('system', () => {
    it('refuses self-update when it is not configured', async () => {
      const res = await request('POST', '/api/system/self-update', { version: '2.0.0' });

      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({
        error: { code: 'SELF_UPDATE_UNAVAILABLE', retryHint: 'needs-operator' },
      });
    });

    it('reports overall status', async () => {
      await deployShop();

      const res = await request('GET', '/api/system/status');

      expect(await res.json()).toMatchObject({
        status: 'ok',
        environments: ['edge-1'],
        stacks: { total: 1, normal: 1, failed: 0 },
        operations: { running: 0 },
        healthMonitor: false,
        maintenanceObserver: false,
      });
    });
  });

  it('answers 404 for unknown routes', async () => {
    const res = await request('GET', '/api/nothing-here');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Resource not found' } });
  });
});
