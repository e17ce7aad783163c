import type { DeploymentPlan } from './plan.js';

export const OPERATION_MODES = ['normal', 'migrating', 'maintenance', 'stopped', 'failed'] as const;
export type OperationMode = typeof OPERATION_MODES[number];

export type DeploymentStatus =
  | 'idle'
  | 'deploying'
  | 'upgrading'
  | 'rolling-back'
  | 'removing'
  | 'entering-maintenance'
  | 'leaving-maintenance'
  | 'failed';

export type MigrationStatus = 'none' | 'running' | 'succeeded' | 'failed';

export type TransitionKind = 'deploy' | 'upgrade' | 'downgrade' | 'rollback' | 'maintenance' | 'remove';

export interface StackRuntimeRecord {
  /** `<environmentId>/<stackName>` */
  stackId: string;
  environmentId: string;
  stackName: string;
  organizationId: string | null;
  operationMode: OperationMode;
  deploymentStatus: DeploymentStatus;
  migrationStatus: MigrationStatus;
  currentVersion: string | null;
  targetVersion: string | null;
  lastTransition: TransitionKind | null;
  rollbackDisabled: boolean;
  statusMessage: string | null;
  currentPlan: DeploymentPlan | null;
  /** Containers stopped on maintenance entry, restarted on exit. */
  maintenanceStopped: string[];
  updatedAt: string;
}

export interface PlanSnapshot {
  stackId: string;
  version: string;
  plan: DeploymentPlan;
  createdAt: string;
}

export type OperationKind = 'deploy' | 'upgrade' | 'rollback' | 'maintenance' | 'remove' | 'self-update';

export interface OperationAccepted {
  operationId: string;
  kind: OperationKind;
  environmentId: string;
  stackName: string | null;
}
