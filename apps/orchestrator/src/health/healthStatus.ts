import type { HealthStatus, OperationMode } from '@stackwright/shared';

// Higher is worse. Unknown ranks last: a signal we cannot read is treated
// as the worst case.
const SEVERITY: Record<HealthStatus, number> = {
  healthy: 0,
  degraded: 1,
  unhealthy: 2,
  unknown: 3,
};

export function combineHealth(a: HealthStatus, b: HealthStatus): HealthStatus {
  return SEVERITY[a] >= SEVERITY[b] ? a : b;
}

export function worstOf(statuses: HealthStatus[]): HealthStatus {
  if (statuses.length === 0) return 'unknown';
  return statuses.reduce(combineHealth);
}

/**
 * The best status a stack can report in a given mode. A stack in
 * maintenance is never better than degraded, a failed one never better
 * than unhealthy, whatever its containers say.
 */
export function minimumStatusForMode(mode: OperationMode): HealthStatus {
  switch (mode) {
    case 'normal':
      return 'healthy';
    case 'maintenance':
    case 'migrating':
    case 'stopped':
      return 'degraded';
    case 'failed':
      return 'unhealthy';
  }
}

export interface StateHealth {
  status: HealthStatus;
  reason: string | null;
}

/**
 * Map a container state, and the image's own health check when it has
 * one, onto a health status.
 */
export function containerStateToHealth(
  state: string,
  dockerHealth: { status: string; failingStreak: number } | null
): StateHealth {
  if (state === 'running' && dockerHealth) {
    switch (dockerHealth.status) {
      case 'healthy':
        return { status: 'healthy', reason: null };
      case 'starting':
        return { status: 'degraded', reason: 'Health check starting' };
      case 'unhealthy':
        return { status: 'unhealthy', reason: `Health check failing (streak: ${dockerHealth.failingStreak})` };
    }
  }

  switch (state) {
    case 'running':
      return { status: 'healthy', reason: null };
    case 'restarting':
      return { status: 'degraded', reason: 'Container is restarting' };
    case 'paused':
      return { status: 'degraded', reason: 'Container is paused' };
    case 'exited':
      return { status: 'unhealthy', reason: 'Container exited' };
    case 'dead':
      return { status: 'unhealthy', reason: 'Container is dead' };
    default:
      return { status: 'unknown', reason: `Container is ${state}` };
  }
}
