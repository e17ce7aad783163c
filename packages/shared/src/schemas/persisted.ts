import { z } from 'zod';
import type { DeploymentPlan } from '../types/plan.js';
import type { HealthSnapshot } from '../types/health.js';
import { OPERATION_MODES } from '../types/operation.js';
import { MaintenanceObserverSchema, ServiceHealthCheckSchema } from './stackDescription.js';

// Shapes written to and read back from storage.

export const DeploymentStepSchema = z.object({
  order: z.number().int().positive(),
  serviceName: z.string(),
  containerName: z.string(),
  image: z.string(),
  tag: z.string(),
  reference: z.string(),
  lifecycle: z.enum(['service', 'init']),
  internal: z.boolean(),
  envVars: z.record(z.string(), z.string()),
  ports: z.array(z.string()),
  volumes: z.record(z.string(), z.string()),
  networks: z.array(z.string()),
  dependsOn: z.array(z.string()),
  ignoreInMaintenance: z.boolean(),
  healthCheck: ServiceHealthCheckSchema.optional(),
});

export const DeploymentPlanSchema: z.ZodType<DeploymentPlan> = z.object({
  stackName: z.string(),
  stackVersion: z.string(),
  environmentId: z.string(),
  steps: z.array(DeploymentStepSchema),
  networks: z.record(z.string(), z.object({ external: z.boolean(), resolvedName: z.string() })),
  globalEnvVars: z.record(z.string(), z.string()),
  healthEndpoints: z.object({ bus: z.string().optional(), infra: z.string().optional() }),
  maintenanceObserver: MaintenanceObserverSchema.nullable(),
  rollbackDisabled: z.boolean(),
  createdAt: z.string(),
});

export const HealthStatusSchema = z.enum(['healthy', 'degraded', 'unhealthy', 'unknown']);

export const ServiceHealthSchema = z.object({
  serviceName: z.string(),
  containerName: z.string(),
  containerId: z.string().nullable(),
  status: HealthStatusSchema,
  state: z.string(),
  reason: z.string().nullable(),
  restartCount: z.number().nullable(),
  responseTimeMs: z.number().nullable(),
});

const StoredBusHealthSchema = z.object({
  connected: z.boolean(),
  transport: z.string().nullable(),
  criticalError: z.string().nullable(),
  pendingMessages: z.number().nullable(),
});

const StoredInfraHealthSchema = z.object({
  databases: z.array(z.object({ name: z.string(), reachable: z.boolean(), latencyMs: z.number().nullable() })),
  disks: z.array(z.object({ mount: z.string(), freePercent: z.number() })),
});

export const HealthSnapshotSchema: z.ZodType<HealthSnapshot> = z.object({
  stackId: z.string(),
  organizationId: z.string().nullable(),
  environmentId: z.string(),
  stackName: z.string(),
  operationMode: z.enum(OPERATION_MODES),
  currentVersion: z.string().nullable(),
  targetVersion: z.string().nullable(),
  overallStatus: HealthStatusSchema,
  statusMessage: z.string(),
  components: z.array(z.object({
    kind: z.enum(['self', 'bus', 'infra']),
    status: HealthStatusSchema,
    reasons: z.array(z.string()),
  })),
  services: z.array(ServiceHealthSchema),
  bus: StoredBusHealthSchema.nullable(),
  infra: StoredInfraHealthSchema.nullable(),
  capturedAt: z.string(),
});

/** Document served by a stack's bus health endpoint. */
export const BusHealthSchema = z.object({
  connected: z.boolean(),
  transport: z.string().nullable().default(null),
  criticalError: z.string().nullable().default(null),
  pendingMessages: z.number().nullable().default(null),
});

/** Document served by a stack's infrastructure health endpoint. */
export const InfraHealthSchema = z.object({
  databases: z.array(z.object({
    name: z.string(),
    reachable: z.boolean(),
    latencyMs: z.number().nullable().default(null),
  })).default([]),
  disks: z.array(z.object({
    mount: z.string(),
    freePercent: z.number().min(0).max(100),
  })).default([]),
});
