import type { HealthEndpoints, MaintenanceObserverConfig, ServiceHealthCheck, ServiceLifecycle } from './stack.js';

export interface NetworkDefinition {
  external: boolean;
  resolvedName: string;
}

export interface DeploymentStep {
  order: number;
  serviceName: string;
  containerName: string;
  image: string;
  tag: string;
  /** What is pulled and run: `image:tag`, or `image@digest` for a pinned image. */
  reference: string;
  lifecycle: ServiceLifecycle;
  internal: boolean;
  envVars: Record<string, string>;
  ports: string[];
  volumes: Record<string, string>;
  /** Resolved network names, primary network first. */
  networks: string[];
  dependsOn: string[];
  ignoreInMaintenance: boolean;
  healthCheck?: ServiceHealthCheck;
}

export interface DeploymentPlan {
  stackName: string;
  stackVersion: string;
  environmentId: string;
  steps: DeploymentStep[];
  networks: Record<string, NetworkDefinition>;
  globalEnvVars: Record<string, string>;
  healthEndpoints: HealthEndpoints;
  maintenanceObserver: MaintenanceObserverConfig | null;
  rollbackDisabled: boolean;
  createdAt: string;
}

export interface DeploymentResult {
  success: boolean;
  stackVersion: string;
  deployedContexts: string[];
  errors: string[];
  warnings: string[];
  cancelled: boolean;
  completedAt: string;
}
