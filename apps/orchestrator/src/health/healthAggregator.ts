import { z } from 'zod';
import {
  BusHealthSchema,
  InfraHealthSchema,
  type BusHealth,
  type DeploymentStep,
  type EnvironmentHealthSummary,
  type HealthSnapshot,
  type HealthSource,
  type HealthStatus,
  type InfraHealth,
  type ServiceHealth,
  type StackRuntimeRecord,
} from '@stackwright/shared';
import type { ContainerRuntime, ContainerSummary } from '../runtime/types.js';
import type { RuntimeRegistry } from '../runtime/runtimeRegistry.js';
import type { HealthHistoryStore } from '../services/healthHistoryStore.js';
import { LABELS } from '../engine/naming.js';
import { errorMessage } from '../lib/errors.js';
import { healthLogger } from '../lib/logger.js';
import { aggregateHealth } from './healthSources.js';
import { combineHealth, containerStateToHealth } from './healthStatus.js';
import { fetchProbe, type HttpProbe, type ProbeResult } from './httpProbe.js';

type BusSource = Extract<HealthSource, { kind: 'bus' }>;
type InfraSource = Extract<HealthSource, { kind: 'infra' }>;

const ReportedStatusSchema = z.object({ status: z.enum(['healthy', 'degraded', 'unhealthy']) });

export interface HealthAggregatorOptions {
  httpTimeoutMs: number;
}

/**
 * Collects health signals for a stack and folds them into one snapshot.
 * Only reads: it never takes an environment lock and never changes a
 * container.
 */
export class HealthAggregator {
  constructor(
    private readonly runtimes: RuntimeRegistry,
    private readonly history: HealthHistoryStore,
    private readonly options: HealthAggregatorOptions,
    private readonly probe: HttpProbe = fetchProbe
  ) {}

  /**
   * Capture, persist and return the current health of a stack.
   */
  async capture(record: StackRuntimeRecord, now: Date = new Date()): Promise<HealthSnapshot> {
    const services = await this.collectServices(record);
    const sources: HealthSource[] = [{ kind: 'self', services }];

    let bus: BusHealth | null = null;
    let infra: InfraHealth | null = null;
    const endpoints = record.currentPlan?.healthEndpoints ?? {};
    if (endpoints.bus) {
      const source = await this.collectBus(endpoints.bus);
      bus = source.bus;
      sources.push(source);
    }
    if (endpoints.infra) {
      const source = await this.collectInfra(endpoints.infra);
      infra = source.infra;
      sources.push(source);
    }

    const { overallStatus, statusMessage, components } = aggregateHealth(sources, record.operationMode);
    const snapshot: HealthSnapshot = {
      stackId: record.stackId,
      organizationId: record.organizationId,
      environmentId: record.environmentId,
      stackName: record.stackName,
      operationMode: record.operationMode,
      currentVersion: record.currentVersion,
      targetVersion: record.targetVersion,
      overallStatus,
      statusMessage,
      components,
      services,
      bus,
      infra,
      capturedAt: now.toISOString(),
    };

    this.history.append(snapshot);
    healthLogger.debug({ stackId: record.stackId, overallStatus }, 'Health captured');
    return snapshot;
  }

  async collectServices(record: StackRuntimeRecord): Promise<ServiceHealth[]> {
    const listed = await this.listStackContainers(record);
    if (!listed) return [];
    const { runtime, containers } = listed;

    const byService = new Map<string, ContainerSummary>();
    for (const container of containers) {
      byService.set(container.labels[LABELS.service] ?? container.name, container);
    }

    const steps = record.currentPlan?.steps.filter(s => s.lifecycle === 'service');
    if (!steps) {
      return Promise.all(containers
        .filter(c => c.labels[LABELS.lifecycle] !== 'init')
        .map(c => this.serviceHealth(record, runtime, c.labels[LABELS.service] ?? c.name, c, undefined)));
    }

    return Promise.all(steps.map(step => {
      const container = byService.get(step.serviceName);
      if (!container) {
        return Promise.resolve(this.missingService(record, step));
      }
      return this.serviceHealth(record, runtime, step.serviceName, container, step);
    }));
  }

  private async listStackContainers(
    record: StackRuntimeRecord
  ): Promise<{ runtime: ContainerRuntime; containers: ContainerSummary[] } | null> {
    try {
      const runtime = this.runtimes.get(record.environmentId);
      const containers = await runtime.listContainers({
        labels: { [LABELS.stack]: record.stackName, [LABELS.environment]: record.environmentId },
      });
      return { runtime, containers };
    } catch (err) {
      healthLogger.warn({ stackId: record.stackId, err: errorMessage(err) }, 'Could not list stack containers');
      return null;
    }
  }

  private missingService(record: StackRuntimeRecord, step: DeploymentStep): ServiceHealth {
    const inProgress = record.operationMode === 'migrating';
    return {
      serviceName: step.serviceName,
      containerName: step.containerName,
      containerId: null,
      status: inProgress ? 'degraded' : 'unhealthy',
      state: 'missing',
      reason: inProgress ? 'Deployment in progress' : 'Container not found',
      restartCount: null,
      responseTimeMs: null,
    };
  }

  private async serviceHealth(
    record: StackRuntimeRecord,
    runtime: ContainerRuntime,
    serviceName: string,
    container: ContainerSummary,
    step: DeploymentStep | undefined
  ): Promise<ServiceHealth> {
    const health: ServiceHealth = {
      serviceName,
      containerName: container.name,
      containerId: container.id,
      status: 'healthy',
      state: container.state,
      reason: null,
      restartCount: null,
      responseTimeMs: null,
    };

    const stoppedOnPurpose = (record.operationMode === 'maintenance' && record.maintenanceStopped.includes(container.name))
      || record.operationMode === 'stopped';
    if (stoppedOnPurpose && container.state !== 'running') {
      return { ...health, status: 'degraded', reason: record.operationMode === 'stopped' ? 'Stack is stopped' : 'Stopped for maintenance' };
    }

    const useDockerHealth = step?.healthCheck?.type !== 'none';
    let streak = 0;
    let ipAddress: string | null = null;

    // Inspect only what is not plainly healthy, plus anything needing an HTTP check
    const needsInspect = container.state !== 'running'
      || (useDockerHealth && container.healthStatus !== null && container.healthStatus !== 'healthy')
      || step?.healthCheck?.type === 'http';
    if (needsInspect) {
      try {
        const info = await runtime.inspectContainer(container.id);
        if (info) {
          streak = info.state.health?.failingStreak ?? 0;
          health.restartCount = info.state.restartCount;
          ipAddress = Object.values(info.networks).find(n => n.ipAddress)?.ipAddress ?? null;
        }
      } catch (err) {
        healthLogger.debug({ container: container.name, err: errorMessage(err) }, 'Inspect failed during health check');
      }
    }

    const dockerHealth = useDockerHealth && container.healthStatus
      ? { status: container.healthStatus, failingStreak: streak }
      : null;
    const fromState = containerStateToHealth(container.state, dockerHealth);
    health.status = fromState.status;
    health.reason = fromState.reason;

    if (step?.healthCheck?.type === 'http' && container.state === 'running') {
      const check = step.healthCheck;
      const port = check.port ?? firstContainerPort(step.ports);
      if (port !== null) {
        const url = `${check.useHttps ? 'https' : 'http'}://${ipAddress ?? container.name}:${port}${check.path}`;
        const timeoutMs = check.timeoutSeconds ? check.timeoutSeconds * 1000 : this.options.httpTimeoutMs;
        const result = await this.probe(url, timeoutMs);
        const fromHttp = interpretHttpCheck(result, check.expectedStatusCodes);
        health.responseTimeMs = result.responseTimeMs;
        if (combineHealth(health.status, fromHttp.status) !== health.status) {
          health.status = fromHttp.status;
          health.reason = fromHttp.reason;
        }
      }
    }

    if (health.status === 'healthy') {
      health.restartCount = null;
    }
    return health;
  }

  private async collectBus(url: string): Promise<BusSource> {
    const result = await this.probe(url, this.options.httpTimeoutMs);
    if (result.error !== null) return { kind: 'bus', bus: null, error: result.error };
    if (result.statusCode !== 200) return { kind: 'bus', bus: null, error: `HTTP ${result.statusCode}` };
    const parsed = BusHealthSchema.safeParse(result.body);
    return parsed.success
      ? { kind: 'bus', bus: parsed.data, error: null }
      : { kind: 'bus', bus: null, error: 'Malformed bus health document' };
  }

  private async collectInfra(url: string): Promise<InfraSource> {
    const result = await this.probe(url, this.options.httpTimeoutMs);
    if (result.error !== null) return { kind: 'infra', infra: null, error: result.error };
    if (result.statusCode !== 200) return { kind: 'infra', infra: null, error: `HTTP ${result.statusCode}` };
    const parsed = InfraHealthSchema.safeParse(result.body);
    return parsed.success
      ? { kind: 'infra', infra: parsed.data, error: null }
      : { kind: 'infra', infra: null, error: 'Malformed infrastructure health document' };
  }

  /**
   * Roll the latest snapshots of an environment up into one summary.
   */
  summarizeEnvironment(environmentId: string, records: StackRuntimeRecord[]): EnvironmentHealthSummary {
    const latest = new Map(this.history.latestForEnvironment(environmentId).map(s => [s.stackId, s]));
    const counts: Record<HealthStatus, number> = { healthy: 0, degraded: 0, unhealthy: 0, unknown: 0 };
    let overall: HealthStatus = 'healthy';

    const stacks = records.map(record => {
      const snapshot = latest.get(record.stackId);
      const status: HealthStatus = snapshot?.overallStatus ?? 'unknown';
      counts[status]++;
      overall = combineHealth(overall, status);
      return {
        stackName: record.stackName,
        status,
        operationMode: record.operationMode,
        capturedAt: snapshot?.capturedAt ?? null,
      };
    });

    return {
      environmentId,
      overallStatus: stacks.length === 0 ? 'unknown' : overall,
      stacks,
      counts,
    };
  }
}

function firstContainerPort(ports: string[]): number | null {
  for (const mapping of ports) {
    const withoutProto = mapping.split('/')[0];
    const containerPart = withoutProto.split(':').pop() ?? '';
    const port = parseInt(containerPart.split('-')[0], 10);
    if (!Number.isNaN(port)) return port;
  }
  return null;
}

export function interpretHttpCheck(
  result: ProbeResult,
  expectedStatusCodes: number[] | undefined
): { status: HealthStatus; reason: string | null } {
  if (result.error !== null || result.statusCode === null) {
    return { status: 'unhealthy', reason: `Health endpoint unreachable: ${result.error ?? 'no response'}` };
  }

  const expected = expectedStatusCodes
    ? expectedStatusCodes.includes(result.statusCode)
    : result.statusCode >= 200 && result.statusCode < 300;
  if (!expected) {
    return { status: 'unhealthy', reason: `Health endpoint returned ${result.statusCode}` };
  }

  const reported = ReportedStatusSchema.safeParse(result.body);
  if (reported.success && reported.data.status !== 'healthy') {
    return { status: reported.data.status, reason: `Service reports ${reported.data.status}` };
  }
  return { status: 'healthy', reason: null };
}
