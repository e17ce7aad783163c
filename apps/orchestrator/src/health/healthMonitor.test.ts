import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import type { HealthSnapshot, StackRuntimeRecord } from '@stackwright/shared';
import { applySchema } from '../db/index.js';
import { EnvironmentLock } from '../lib/environmentLock.js';
import { RuntimeRegistry } from '../runtime/runtimeRegistry.js';
import { HealthHistoryStore } from '../services/healthHistoryStore.js';
import { OperationModeController } from '../services/operationModeController.js';
import { StackStateStore } from '../services/stackStateStore.js';
import { FakeRuntime } from '../test-utils/fakeRuntime.js';
import { HealthAggregator } from './healthAggregator.js';
import { HealthMonitor } from './healthMonitor.js';

const now = new Date('2026-03-01T12:00:00.000Z');

describe('HealthMonitor', () => {
  let db: Database.Database;
  let store: StackStateStore;
  let history: HealthHistoryStore;
  let lock: EnvironmentLock;
  let published: HealthSnapshot[];
  let monitor: HealthMonitor;

  function seed(stackName: string, changes: Partial<StackRuntimeRecord>): StackRuntimeRecord {
    return store.save({ ...StackStateStore.newRecord('edge-1', stackName), ...changes });
  }

  beforeEach(() => {
    db = new Database(':memory:');
    applySchema(db);
    store = new StackStateStore(db);
    history = new HealthHistoryStore(db);
    lock = new EnvironmentLock();
    published = [];

    const registry = new RuntimeRegistry();
    registry.register('edge-1', new FakeRuntime());
    const aggregator = new HealthAggregator(registry, history, { httpTimeoutMs: 1000 });
    monitor = new HealthMonitor(
      store,
      new OperationModeController(store),
      aggregator,
      history,
      lock,
      { pollIntervalMs: 30_000, retentionHours: 24, maxSnapshotsPerStack: 100 },
      snapshot => published.push(snapshot)
    );
  });

  afterEach(() => {
    monitor.stop();
    vi.useRealTimers();
    db.close();
  });

  it('fails a stack left migrating without a running operation', async () => {
    seed('shop', { operationMode: 'migrating', deploymentStatus: 'upgrading', migrationStatus: 'running' });

    const summary = await monitor.tick(now);

    expect(summary.recovered).toBe(1);
    const record = store.get('edge-1/shop');
    expect(record?.operationMode).toBe('failed');
    expect(record?.migrationStatus).toBe('failed');
    expect(record?.statusMessage).toBe(
      'Operation interrupted while upgrading; the orchestrator stopped before it finished'
    );
    expect(published.map(s => s.operationMode)).toEqual(['failed']);
  });

  it('leaves a stack alone while its environment lock is held', async () => {
    seed('shop', { operationMode: 'migrating', deploymentStatus: 'deploying' });
    const lease = lock.acquire('edge-1', 'deploy shop');

    const summary = await monitor.tick(now);
    lease.release();

    expect(summary.recovered).toBe(0);
    expect(store.get('edge-1/shop')?.operationMode).toBe('migrating');
    expect(published[0].overallStatus).toBe('unknown');
  });

  it('does not capture a stack while maintenance is stopping its containers', async () => {
    seed('shop', { operationMode: 'normal', deploymentStatus: 'entering-maintenance', lastTransition: 'maintenance' });
    const lease = lock.acquire('edge-1', 'enter maintenance shop');

    const summary = await monitor.tick(now);
    lease.release();

    expect(summary).toMatchObject({ captured: 0, recovered: 0 });
    expect(published).toEqual([]);
    expect(store.get('edge-1/shop')?.deploymentStatus).toBe('entering-maintenance');
  });

  it('fails a maintenance change abandoned by a previous process', async () => {
    seed('shop', { operationMode: 'normal', deploymentStatus: 'entering-maintenance', lastTransition: 'maintenance' });

    const summary = await monitor.tick(now);

    expect(summary.recovered).toBe(1);
    expect(store.get('edge-1/shop')).toMatchObject({
      operationMode: 'failed',
      statusMessage: 'Operation interrupted while entering-maintenance; the orchestrator stopped before it finished',
    });
  });

  it('skips stopped stacks', async () => {
    seed('shop', { operationMode: 'normal' });
    seed('blog', { operationMode: 'stopped' });

    const summary = await monitor.tick(now);

    expect(summary.captured).toBe(1);
    expect(published.map(s => s.stackName)).toEqual(['shop']);
    expect(history.latest('edge-1/blog')).toBeNull();
  });

  it('prunes history past the retention window', async () => {
    history.append({
      stackId: 'edge-1/shop',
      organizationId: null,
      environmentId: 'edge-1',
      stackName: 'shop',
      operationMode: 'normal',
      currentVersion: '1.0.0',
      targetVersion: null,
      overallStatus: 'healthy',
      statusMessage: 'All components healthy',
      components: [],
      services: [],
      bus: null,
      infra: null,
      capturedAt: '2026-02-27T12:00:00.000Z',
    });

    const summary = await monitor.tick(now);

    expect(summary.pruned).toBe(1);
  });

  it('polls on its interval until stopped', () => {
    vi.useFakeTimers();
    const tick = vi.spyOn(monitor, 'tick').mockResolvedValue({ captured: 0, failed: 0, recovered: 0, pruned: 0 });

    monitor.start();
    expect(tick).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(30_000);
    expect(tick).toHaveBeenCalledTimes(2);

    monitor.stop();
    vi.advanceTimersByTime(60_000);
    expect(tick).toHaveBeenCalledTimes(2);
    expect(monitor.isRunning()).toBe(false);
  });
});
