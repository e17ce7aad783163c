import { describe, it, expect } from 'vitest';
import type { ServiceHealth } from '@stackwright/shared';
import { aggregateHealth, describeStatus, evaluateSource } from './healthSources.js';
import { combineHealth, containerStateToHealth, minimumStatusForMode, worstOf } from './healthStatus.js';

function service(serviceName: string, status: ServiceHealth['status'], reason: string | null = null): ServiceHealth {
  return { serviceName, containerName: `shop_${serviceName}`, containerId: null, status, state: 'running', reason, restartCount: null, responseTimeMs: null };
}

describe('combineHealth', () => {
  it('returns the worse of two statuses', () => {
    expect(combineHealth('healthy', 'degraded')).toBe('degraded');
    expect(combineHealth('unhealthy', 'degraded')).toBe('unhealthy');
    expect(combineHealth('unhealthy', 'unknown')).toBe('unknown');
    expect(combineHealth('healthy', 'healthy')).toBe('healthy');
  });

  it('treats an empty list as unknown', () => {
    expect(worstOf([])).toBe('unknown');
  });
});

describe('minimumStatusForMode', () => {
  it.each([
    ['normal', 'healthy'],
    ['maintenance', 'degraded'],
    ['migrating', 'degraded'],
    ['stopped', 'degraded'],
    ['failed', 'unhealthy'],
  ] as const)('%s is at best %s', (mode, status) => {
    expect(minimumStatusForMode(mode)).toBe(status);
  });
});

describe('containerStateToHealth', () => {
  it.each([
    ['running', 'healthy', null],
    ['restarting', 'degraded', 'Container is restarting'],
    ['paused', 'degraded', 'Container is paused'],
    ['exited', 'unhealthy', 'Container exited'],
    ['dead', 'unhealthy', 'Container is dead'],
    ['created', 'unknown', 'Container is created'],
  ])('maps %s to %s', (state, status, reason) => {
    expect(containerStateToHealth(state, null)).toEqual({ status, reason });
  });

  it('lets the image health check take precedence for running containers', () => {
    expect(containerStateToHealth('running', { status: 'unhealthy', failingStreak: 4 }))
      .toEqual({ status: 'unhealthy', reason: 'Health check failing (streak: 4)' });
    expect(containerStateToHealth('running', { status: 'starting', failingStreak: 0 }))
      .toEqual({ status: 'degraded', reason: 'Health check starting' });
  });
});

describe('evaluateSource', () => {
  it('rolls services up to their worst status', () => {
    expect(evaluateSource({
      kind: 'self',
      services: [service('db', 'healthy'), service('api', 'degraded', 'Container is restarting')],
    })).toEqual({ kind: 'self', status: 'degraded', reasons: ['api: Container is restarting'] });
  });

  it('reports bus problems', () => {
    expect(evaluateSource({
      kind: 'bus',
      bus: { connected: true, transport: 'amqp', criticalError: 'queue limit reached', pendingMessages: 10 },
      error: null,
    })).toEqual({ kind: 'bus', status: 'unhealthy', reasons: ['Critical bus error: queue limit reached'] });

    expect(evaluateSource({
      kind: 'bus',
      bus: { connected: true, transport: 'amqp', criticalError: null, pendingMessages: 5000 },
      error: null,
    }).status).toBe('degraded');
  });

  it('grades infrastructure by databases and disks', () => {
    expect(evaluateSource({
      kind: 'infra',
      infra: {
        databases: [{ name: 'orders', reachable: true, latencyMs: 1500 }],
        disks: [{ mount: '/data', freePercent: 3 }],
      },
      error: null,
    })).toEqual({
      kind: 'infra',
      status: 'unhealthy',
      reasons: ['Database orders slow (1500ms)', 'Disk /data almost full (3% free)'],
    });
  });

  it('treats an unreachable source as unhealthy', () => {
    expect(evaluateSource({ kind: 'infra', infra: null, error: 'HTTP 500' }))
      .toEqual({ kind: 'infra', status: 'unhealthy', reasons: ['Infrastructure health unavailable: HTTP 500'] });
  });
});

describe('aggregateHealth', () => {
  const allHealthy = [{ kind: 'self' as const, services: [service('api', 'healthy')] }];

  it('reports healthy in normal mode when every source is healthy', () => {
    expect(aggregateHealth(allHealthy, 'normal').overallStatus).toBe('healthy');
  });

  it('never reports better than the mode allows', () => {
    expect(aggregateHealth(allHealthy, 'maintenance').overallStatus).toBe('degraded');
    expect(aggregateHealth(allHealthy, 'failed').overallStatus).toBe('unhealthy');
  });

  it('reports the worst component when it is worse than the mode floor', () => {
    const sources = [
      ...allHealthy,
      { kind: 'bus' as const, bus: null, error: 'connection refused' },
    ];
    expect(aggregateHealth(sources, 'maintenance').overallStatus).toBe('unhealthy');
  });
});

describe('describeStatus', () => {
  it('reports a healthy stack plainly', () => {
    expect(describeStatus('healthy', [{ kind: 'self', status: 'healthy', reasons: [] }], 'normal')).toBe('All components healthy');
  });

  it('uses the first reason of the component that set the status', () => {
    expect(describeStatus('unhealthy', [
      { kind: 'self', status: 'degraded', reasons: ['api: Container is restarting'] },
      { kind: 'infra', status: 'unhealthy', reasons: ['Database orders unreachable', 'Disk /data almost full (2% free)'] },
    ], 'normal')).toBe('Database orders unreachable (+1 more)');
  });

  it('names the operation mode when only the mode lowered the status', () => {
    expect(describeStatus('degraded', [{ kind: 'self', status: 'healthy', reasons: [] }], 'maintenance')).toBe('Stack is in maintenance mode');
  });
});
