import type { OperationMode } from './operation.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy' | 'unknown';

export interface ServiceHealth {
  serviceName: string;
  containerName: string;
  containerId: string | null;
  status: HealthStatus;
  state: string;
  reason: string | null;
  restartCount: number | null;
  responseTimeMs: number | null;
}

export interface BusHealth {
  connected: boolean;
  transport: string | null;
  criticalError: string | null;
  pendingMessages: number | null;
}

export interface DatabaseHealth {
  name: string;
  reachable: boolean;
  latencyMs: number | null;
}

export interface DiskHealth {
  mount: string;
  freePercent: number;
}

export interface InfraHealth {
  databases: DatabaseHealth[];
  disks: DiskHealth[];
}

export type HealthSource =
  | { kind: 'self'; services: ServiceHealth[] }
  | { kind: 'bus'; bus: BusHealth | null; error: string | null }
  | { kind: 'infra'; infra: InfraHealth | null; error: string | null };

export interface ComponentHealth {
  kind: HealthSource['kind'];
  status: HealthStatus;
  reasons: string[];
}

export interface HealthSnapshot {
  stackId: string;
  organizationId: string | null;
  environmentId: string;
  stackName: string;
  operationMode: OperationMode;
  currentVersion: string | null;
  targetVersion: string | null;
  overallStatus: HealthStatus;
  /** One line for dashboards: the worst component's first reason. */
  statusMessage: string;
  components: ComponentHealth[];
  services: ServiceHealth[];
  /** Raw documents as reported by the stack, null when not configured or unreadable. */
  bus: BusHealth | null;
  infra: InfraHealth | null;
  capturedAt: string;
}

export interface EnvironmentHealthSummary {
  environmentId: string;
  overallStatus: HealthStatus;
  stacks: Array<{ stackName: string; status: HealthStatus; operationMode: OperationMode; capturedAt: string | null }>;
  counts: Record<HealthStatus, number>;
}
