import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import type { OperationEvent, ProgressEvent, StackDescription } from '@stackwright/shared';
import { applySchema } from '../db/index.js';
import { LifecycleExecutor } from '../engine/lifecycleExecutor.js';
import { SelfReplacementCoordinator } from '../engine/selfReplacement.js';
import { EnvironmentLock } from '../lib/environmentLock.js';
import {
  EngineError,
  EnvironmentNotFoundError,
  InvalidTransitionError,
  OperationInProgressError,
  PlanValidationError,
  SelfUpdateUnavailableError,
} from '../lib/errors.js';
import { RuntimeRegistry } from '../runtime/runtimeRegistry.js';
import { FakeRuntime } from '../test-utils/fakeRuntime.js';
import { OperationModeController } from './operationModeController.js';
import { StackOperations } from './stackOperations.js';
import { StackStateStore } from './stackStateStore.js';

function shop(version: string, overrides: Partial<StackDescription> = {}): StackDescription {
  return {
    name: 'shop',
    version,
    services: [
      { name: 'db', image: 'postgres:16', ignoreInMaintenance: true },
      { name: 'api', image: 'shop/api', version, dependsOn: ['db'] },
      { name: 'gateway', image: 'traefik:v3', dependsOn: ['api'], ports: ['80:80'] },
    ],
    ingress: 'gateway',
    ...overrides,
  };
}

const edge1 = { environmentId: 'edge-1' };

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}

describe('StackOperations', () => {
  let db: Database.Database;
  let store: StackStateStore;
  let lock: EnvironmentLock;
  let runtime: FakeRuntime;
  let otherRuntime: FakeRuntime;
  let ops: StackOperations;

  function snapshotCount(): number {
    return db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM plan_snapshots').get()?.n ?? 0;
  }

  beforeEach(() => {
    db = new Database(':memory:');
    applySchema(db);
    store = new StackStateStore(db);
    lock = new EnvironmentLock();
    runtime = new FakeRuntime();
    otherRuntime = new FakeRuntime();

    const registry = new RuntimeRegistry();
    registry.register('edge-1', runtime);
    registry.register('edge-2', otherRuntime);
    ops = new StackOperations(
      registry,
      new OperationModeController(store),
      lock,
      environmentId => new LifecycleExecutor(registry.get(environmentId), { initPollIntervalMs: 1 })
    );
  });

  afterEach(() => {
    db.close();
  });

  describe('deploy', () => {
    it('brings a stack to normal and records the plan', async () => {
      const handle = ops.deploy(shop('1.0.0'), { environmentId: 'edge-1', organizationId: 'org-7' });
      expect(handle).toMatchObject({ kind: 'deploy', environmentId: 'edge-1', stackName: 'shop' });

      const result = await handle.completion;

      expect(result.success).toBe(true);
      expect(result.deployedContexts).toEqual(['db', 'api', 'gateway']);
      expect(store.get('edge-1/shop')).toMatchObject({
        operationMode: 'normal',
        deploymentStatus: 'idle',
        currentVersion: '1.0.0',
        organizationId: 'org-7',
        lastTransition: 'deploy',
      });
      expect(lock.isLocked('edge-1')).toBe(false);
    });

    it('stops at the first failing service and leaves the stack failed', async () => {
      runtime.failWhen('createContainer', 'shop_api');

      const result = await ops.deploy(shop('1.0.0'), edge1).completion;

      expect(result).toMatchObject({
        success: false,
        deployedContexts: ['db'],
        errors: ['api: createContainer shop_api failed'],
        cancelled: false,
      });
      expect(runtime.containers.get('shop_db')?.state).toBe('running');
      expect(runtime.containers.has('shop_gateway')).toBe(false);
      expect(store.get('edge-1/shop')).toMatchObject({
        operationMode: 'failed',
        deploymentStatus: 'failed',
        statusMessage: 'api: createContainer shop_api failed',
      });

      const refusal = thrown(() => ops.rollback('edge-1', 'shop'));
      expect(refusal).toBeInstanceOf(InvalidTransitionError);
      expect(refusal).toMatchObject({ code: 'ROLLBACK_NOT_APPLICABLE', retryHint: 'needs-operator' });
    });

    it('recovers a failed stack by deploying again', async () => {
      runtime.failWhen('createContainer', 'shop_api');
      await ops.deploy(shop('1.0.0'), edge1).completion;
      runtime.clearFailures();

      const result = await ops.deploy(shop('1.0.0'), edge1).completion;

      expect(result.success).toBe(true);
      expect(store.get('edge-1/shop')?.operationMode).toBe('normal');
    });

    it('rejects a structurally invalid stack before touching anything', () => {
      const cyclic = shop('1.0.0', {
        services: [
          { name: 'a', image: 'a', dependsOn: ['b'] },
          { name: 'b', image: 'b', dependsOn: ['a'] },
          { name: 'gateway', image: 'traefik:v3' },
        ],
      });

      const err = thrown(() => ops.deploy(cyclic, edge1));

      expect(err).toBeInstanceOf(PlanValidationError);
      expect(err).toMatchObject({ code: 'DEPENDENCY_CYCLE', kind: 'structural', retryHint: 'fix-input' });
      expect(runtime.calls).toEqual([]);
      expect(store.get('edge-1/shop')).toBeNull();
      expect(lock.isLocked('edge-1')).toBe(false);
    });

    it('rejects an unknown environment', () => {
      expect(() => ops.deploy(shop('1.0.0'), { environmentId: 'nowhere' })).toThrow(EnvironmentNotFoundError);
    });
  });

  describe('concurrency', () => {
    it('rejects a second operation on a busy environment', async () => {
      const first = ops.deploy(shop('1.0.0'), edge1);

      const err = thrown(() => ops.deploy(shop('1.0.0', { name: 'blog' }), edge1));
      expect(err).toBeInstanceOf(OperationInProgressError);
      expect(err).toMatchObject({ code: 'OPERATION_IN_PROGRESS', activeOperation: 'deploy shop', retryHint: 'retry-now' });

      const elsewhere = ops.deploy(shop('1.0.0'), { environmentId: 'edge-2' });

      const results = await Promise.all([first.completion, elsewhere.completion]);
      expect(results.map(r => r.success)).toEqual([true, true]);
      expect(otherRuntime.containers.has('shop_api')).toBe(true);
    });

    it('frees the environment when the controller refuses a command', () => {
      expect(() => ops.rollback('edge-1', 'shop')).toThrow(InvalidTransitionError);
      expect(lock.isLocked('edge-1')).toBe(false);
    });
  });

  describe('upgrade and rollback', () => {
    it('restores the previous version after a failed upgrade', async () => {
      await ops.deploy(shop('1.0.0'), edge1).completion;
      runtime.unpullable.add('shop/api:1.1.0');

      const upgrade = await ops.upgrade(shop('1.1.0'), edge1).completion;

      expect(upgrade).toMatchObject({
        success: false,
        deployedContexts: ['db'],
        errors: ['api: Image shop/api:1.1.0 is not available: manifest for shop/api:1.1.0 not found'],
      });
      expect(store.get('edge-1/shop')).toMatchObject({
        operationMode: 'failed',
        migrationStatus: 'failed',
        lastTransition: 'upgrade',
        currentVersion: '1.0.0',
        targetVersion: '1.1.0',
      });
      expect(snapshotCount()).toBe(1);
      expect(store.getSnapshot('edge-1/shop')?.version).toBe('1.0.0');

      const rollback = ops.rollback('edge-1', 'shop');
      expect(rollback.kind).toBe('rollback');
      const restored = await rollback.completion;

      expect(restored.success).toBe(true);
      expect(restored.stackVersion).toBe('1.0.0');
      expect(store.get('edge-1/shop')).toMatchObject({
        operationMode: 'normal',
        migrationStatus: 'succeeded',
        lastTransition: 'rollback',
        currentVersion: '1.0.0',
        targetVersion: null,
      });
      expect(runtime.containers.get('shop_api')?.spec.image).toBe('shop/api:1.0.0');
      expect(snapshotCount()).toBe(0);
    });

    it('keeps only the snapshot of the most recent upgrade', async () => {
      await ops.deploy(shop('1.0.0'), edge1).completion;
      await ops.upgrade(shop('1.1.0'), edge1).completion;
      await ops.upgrade(shop('1.2.0'), edge1).completion;

      expect(snapshotCount()).toBe(1);
      expect(store.getSnapshot('edge-1/shop')?.version).toBe('1.1.0');
      expect(store.get('edge-1/shop')?.currentVersion).toBe('1.2.0');
    });

    it('offers no rollback after a failed downgrade', async () => {
      await ops.deploy(shop('1.1.0'), edge1).completion;
      runtime.unpullable.add('shop/api:1.0.0');

      await ops.upgrade(shop('1.0.0'), edge1).completion;

      expect(store.get('edge-1/shop')?.lastTransition).toBe('downgrade');
      expect(thrown(() => ops.rollback('edge-1', 'shop'))).toMatchObject({ code: 'ROLLBACK_NOT_APPLICABLE' });
    });

    it('honours a stack that disables rollback', async () => {
      await ops.deploy(shop('1.0.0', { rollbackDisabled: true }), edge1).completion;
      runtime.unpullable.add('shop/api:1.1.0');
      await ops.upgrade(shop('1.1.0', { rollbackDisabled: true }), edge1).completion;

      expect(thrown(() => ops.rollback('edge-1', 'shop'))).toMatchObject({ code: 'ROLLBACK_DISABLED' });
    });

    it('refuses to upgrade a stack that was never deployed', () => {
      expect(thrown(() => ops.upgrade(shop('1.1.0'), edge1))).toMatchObject({ code: 'STACK_NOT_FOUND', statusCode: 404 });
    });
  });

  describe('maintenance', () => {
    it('stops all but the ignored services and restarts exactly those', async () => {
      await ops.deploy(shop('1.0.0'), edge1).completion;

      const entry = await ops.setMaintenance('edge-1', 'shop', true).completion;

      expect(entry.success).toBe(true);
      expect(store.get('edge-1/shop')).toMatchObject({
        operationMode: 'maintenance',
        maintenanceStopped: ['shop_api', 'shop_gateway'],
      });
      expect(runtime.containers.get('shop_db')?.state).toBe('running');
      expect(runtime.containers.get('shop_api')?.state).toBe('exited');
      expect(thrown(() => ops.upgrade(shop('1.1.0'), edge1))).toMatchObject({ code: 'INVALID_TRANSITION' });

      const exit = await ops.setMaintenance('edge-1', 'shop', false).completion;

      expect(exit.deployedContexts).toEqual(['shop_api', 'shop_gateway']);
      expect(store.get('edge-1/shop')).toMatchObject({ operationMode: 'normal', maintenanceStopped: [] });
      expect([...runtime.containers.values()].map(c => c.state)).toEqual(['running', 'running', 'running']);
    });

    it('restarts what a partly failed entry stopped', async () => {
      await ops.deploy(shop('1.0.0'), edge1).completion;
      runtime.failWhen('stopContainer', runtime.containers.get('shop_gateway')?.id ?? 'shop_gateway');

      const entry = await ops.setMaintenance('edge-1', 'shop', true).completion;

      expect(entry.success).toBe(false);
      expect(store.get('edge-1/shop')).toMatchObject({
        operationMode: 'failed',
        deploymentStatus: 'failed',
        maintenanceStopped: ['shop_api'],
      });

      runtime.clearFailures();
      const exit = await ops.setMaintenance('edge-1', 'shop', false).completion;

      expect(exit.deployedContexts).toEqual(['shop_api']);
      expect(store.get('edge-1/shop')).toMatchObject({ operationMode: 'normal', deploymentStatus: 'idle', maintenanceStopped: [] });
      expect(runtime.containers.get('shop_api')?.state).toBe('running');
    });

    it('refuses to leave maintenance that was never entered', async () => {
      await ops.deploy(shop('1.0.0'), edge1).completion;
      expect(thrown(() => ops.setMaintenance('edge-1', 'shop', false))).toMatchObject({ code: 'INVALID_TRANSITION' });
    });
  });

  describe('cancellation', () => {
    it('finishes the step in flight and reports the rest as not done', async () => {
      const handle = ops.deploy(shop('1.0.0'), edge1);
      expect(ops.cancel(handle.operationId)).toBe(true);

      const result = await handle.completion;

      expect(result).toMatchObject({
        success: false,
        cancelled: true,
        deployedContexts: ['db'],
        errors: ['Cancelled before step 2 (api)'],
      });
      expect(store.get('edge-1/shop')?.operationMode).toBe('failed');
      expect(ops.cancel(handle.operationId)).toBe(false);
    });
  });

  describe('remove', () => {
    it('removes every container and resets the record', async () => {
      await ops.deploy(shop('1.0.0'), edge1).completion;

      const result = await ops.remove('edge-1', 'shop').completion;

      expect(result.success).toBe(true);
      expect(runtime.containers.size).toBe(0);
      expect(store.get('edge-1/shop')).toMatchObject({
        operationMode: 'stopped',
        deploymentStatus: 'idle',
        currentVersion: null,
        currentPlan: null,
      });
    });
  });

  describe('progress', () => {
    it('streams numbered events ending in the result', async () => {
      const events: OperationEvent[] = [];
      const unsubscribe = ops.subscribe(event => events.push(event));

      const handle = ops.deploy(shop('1.0.0'), edge1);
      await handle.completion;
      unsubscribe();

      expect(events.every(e => e.operationId === handle.operationId)).toBe(true);
      expect(events.map(e => e.sequence)).toEqual(events.map((_, i) => i + 1));
      const last = events[events.length - 1];
      expect(last.type).toBe('completed');
      expect(events.filter((e): e is ProgressEvent => e.type === 'progress' && e.step === 'db').map(e => e.phase)[0]).toBe('networks');

      const status = ops.getOperation(handle.operationId);
      expect(status?.state).toBe('succeeded');
      expect(status?.events).toHaveLength(events.length);
      expect(ops.getOperation('missing')).toBeNull();
    });

    it('keeps running when a listener throws', async () => {
      ops.subscribe(() => {
        throw new Error('listener broke');
      });

      const result = await ops.deploy(shop('1.0.0'), edge1).completion;

      expect(result.success).toBe(true);
    });
  });

  describe('selfUpdate', () => {
    it('is refused when not configured', () => {
      const err = thrown(() => ops.selfUpdate('2.0.0'));
      expect(err).toBeInstanceOf(SelfUpdateUnavailableError);
      expect(err).toBeInstanceOf(EngineError);
    });

    it('hands off to the coordinator under the environment lock', async () => {
      runtime.addContainer({
        name: 'stackwright',
        image: 'stackwright/orchestrator:1.0.0',
        env: [],
        labels: {},
        exposedPorts: [],
        portBindings: {},
        binds: [],
        restartPolicy: { name: 'unless-stopped' },
        networkMode: 'bridge',
        networkAliases: [],
      });
      const registry = new RuntimeRegistry();
      registry.register('edge-1', runtime);
      const coordinator = new SelfReplacementCoordinator(runtime, {
        containerId: 'stackwright',
        image: 'stackwright/orchestrator',
        helperImage: 'stackwright/swap-helper:latest',
        dockerSocketPath: '/var/run/docker.sock',
        stopTimeoutSeconds: 10,
        readinessTimeoutMs: 1000,
        readinessUrl: null,
        statusPagePort: null,
        credentials: null,
        dockerConfigPath: null,
      });
      const selfOps = new StackOperations(
        registry,
        new OperationModeController(store),
        lock,
        () => new LifecycleExecutor(runtime),
        { environmentId: 'edge-1', coordinator }
      );

      const handle = selfOps.selfUpdate('2.0.0');
      expect(handle).toMatchObject({ kind: 'self-update', environmentId: 'edge-1', stackName: null });
      expect(() => selfOps.selfUpdate('2.0.0')).toThrow(OperationInProgressError);

      const result = await handle.completion;
      expect(result.success).toBe(true);
      expect(runtime.containers.get('stackwright-swap-helper')?.state).toBe('running');
    });
  });
});
