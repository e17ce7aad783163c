import type { ComponentHealth, HealthSource, HealthStatus, OperationMode } from '@stackwright/shared';
import { combineHealth, minimumStatusForMode, worstOf } from './healthStatus.js';

const BUS_BACKLOG_DEGRADED = 1000;
const DB_LATENCY_DEGRADED_MS = 1000;
const DISK_FREE_UNHEALTHY_PERCENT = 5;
const DISK_FREE_DEGRADED_PERCENT = 15;

/**
 * Evaluate one health source. Every source kind is handled here, so adding
 * a kind is a compile error until it is evaluated.
 */
export function evaluateSource(source: HealthSource): ComponentHealth {
  switch (source.kind) {
    case 'self': {
      if (source.services.length === 0) {
        return { kind: 'self', status: 'unknown', reasons: ['No containers found'] };
      }
      const reasons = source.services
        .filter(s => s.status !== 'healthy' && s.reason)
        .map(s => `${s.serviceName}: ${s.reason}`);
      return { kind: 'self', status: worstOf(source.services.map(s => s.status)), reasons };
    }

    case 'bus': {
      if (source.error !== null) {
        return { kind: 'bus', status: 'unhealthy', reasons: [`Bus health unavailable: ${source.error}`] };
      }
      if (source.bus === null) {
        return { kind: 'bus', status: 'unknown', reasons: [] };
      }
      const { bus } = source;
      if (bus.criticalError) {
        return { kind: 'bus', status: 'unhealthy', reasons: [`Critical bus error: ${bus.criticalError}`] };
      }
      if (!bus.connected) {
        return { kind: 'bus', status: 'unhealthy', reasons: ['Bus disconnected'] };
      }
      if (bus.pendingMessages !== null && bus.pendingMessages > BUS_BACKLOG_DEGRADED) {
        return { kind: 'bus', status: 'degraded', reasons: [`Backlog of ${bus.pendingMessages} messages`] };
      }
      return { kind: 'bus', status: 'healthy', reasons: [] };
    }

    case 'infra': {
      if (source.error !== null) {
        return { kind: 'infra', status: 'unhealthy', reasons: [`Infrastructure health unavailable: ${source.error}`] };
      }
      if (source.infra === null) {
        return { kind: 'infra', status: 'unknown', reasons: [] };
      }
      let status: HealthStatus = 'healthy';
      const reasons: string[] = [];
      for (const db of source.infra.databases) {
        if (!db.reachable) {
          status = combineHealth(status, 'unhealthy');
          reasons.push(`Database ${db.name} unreachable`);
        } else if (db.latencyMs !== null && db.latencyMs > DB_LATENCY_DEGRADED_MS) {
          status = combineHealth(status, 'degraded');
          reasons.push(`Database ${db.name} slow (${db.latencyMs}ms)`);
        }
      }
      for (const disk of source.infra.disks) {
        if (disk.freePercent < DISK_FREE_UNHEALTHY_PERCENT) {
          status = combineHealth(status, 'unhealthy');
          reasons.push(`Disk ${disk.mount} almost full (${disk.freePercent}% free)`);
        } else if (disk.freePercent < DISK_FREE_DEGRADED_PERCENT) {
          status = combineHealth(status, 'degraded');
          reasons.push(`Disk ${disk.mount} low on space (${disk.freePercent}% free)`);
        }
      }
      return { kind: 'infra', status, reasons };
    }
  }
}

export interface AggregatedHealth {
  overallStatus: HealthStatus;
  statusMessage: string;
  components: ComponentHealth[];
}

/**
 * Overall status: the worst component, floored by what the operation mode
 * allows.
 */
export function aggregateHealth(sources: HealthSource[], mode: OperationMode): AggregatedHealth {
  const components = sources.map(evaluateSource);
  const worst = worstOf(components.map(c => c.status));
  const overallStatus = combineHealth(minimumStatusForMode(mode), worst);
  return {
    overallStatus,
    statusMessage: describeStatus(overallStatus, components, mode),
    components,
  };
}

/**
 * First reason of the component that set the overall status, or the
 * operation mode when the mode alone lowered it.
 */
export function describeStatus(overall: HealthStatus, components: ComponentHealth[], mode: OperationMode): string {
  if (overall === 'healthy') return 'All components healthy';

  const culprit = components.find(c => c.status === overall && c.reasons.length > 0);
  if (culprit) {
    const more = culprit.reasons.length - 1;
    return more > 0 ? `${culprit.reasons[0]} (+${more} more)` : culprit.reasons[0];
  }
  if (mode !== 'normal') return `Stack is in ${mode} mode`;
  return `Stack is ${overall}`;
}
