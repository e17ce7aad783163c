import type Database from 'better-sqlite3';
import { z } from 'zod';
import {
  DeploymentPlanSchema,
  OPERATION_MODES,
  type DeploymentPlan,
  type PlanSnapshot,
  type StackRuntimeRecord,
} from '@stackwright/shared';
import { getDb, runInTransaction } from '../db/index.js';

interface StackRuntimeRow {
  stack_id: string;
  environment_id: string;
  stack_name: string;
  organization_id: string | null;
  operation_mode: string;
  deployment_status: string;
  migration_status: string;
  current_version: string | null;
  target_version: string | null;
  last_transition: string | null;
  rollback_disabled: number;
  status_message: string | null;
  current_plan: string | null;
  maintenance_stopped: string;
  updated_at: string;
}

interface PlanSnapshotRow {
  stack_id: string;
  version: string;
  plan: string;
  created_at: string;
}

const OperationModeSchema = z.enum(OPERATION_MODES);
const DeploymentStatusSchema = z.enum([
  'idle', 'deploying', 'upgrading', 'rolling-back', 'removing', 'entering-maintenance', 'leaving-maintenance', 'failed',
]);
const MigrationStatusSchema = z.enum(['none', 'running', 'succeeded', 'failed']);
const TransitionSchema = z.enum(['deploy', 'upgrade', 'downgrade', 'rollback', 'maintenance', 'remove']);

export function toStackId(environmentId: string, stackName: string): string {
  return `${environmentId}/${stackName}`;
}

function parsePlan(json: string): DeploymentPlan {
  return DeploymentPlanSchema.parse(JSON.parse(json));
}

function rowToRecord(row: StackRuntimeRow): StackRuntimeRecord {
  return {
    stackId: row.stack_id,
    environmentId: row.environment_id,
    stackName: row.stack_name,
    organizationId: row.organization_id,
    operationMode: OperationModeSchema.parse(row.operation_mode),
    deploymentStatus: DeploymentStatusSchema.parse(row.deployment_status),
    migrationStatus: MigrationStatusSchema.parse(row.migration_status),
    currentVersion: row.current_version,
    targetVersion: row.target_version,
    lastTransition: row.last_transition === null ? null : TransitionSchema.parse(row.last_transition),
    rollbackDisabled: row.rollback_disabled === 1,
    statusMessage: row.status_message,
    currentPlan: row.current_plan === null ? null : parsePlan(row.current_plan),
    maintenanceStopped: z.array(z.string()).parse(JSON.parse(row.maintenance_stopped)),
    updatedAt: row.updated_at,
  };
}

/**
 * Persistent operational state of every managed stack, plus the single
 * rollback snapshot each stack may keep.
 */
export class StackStateStore {
  constructor(private readonly db: Database.Database = getDb()) {}

  /** Fresh record for a stack that has never been deployed. Not persisted. */
  static newRecord(environmentId: string, stackName: string, organizationId: string | null = null): StackRuntimeRecord {
    return {
      stackId: toStackId(environmentId, stackName),
      environmentId,
      stackName,
      organizationId,
      operationMode: 'stopped',
      deploymentStatus: 'idle',
      migrationStatus: 'none',
      currentVersion: null,
      targetVersion: null,
      lastTransition: null,
      rollbackDisabled: false,
      statusMessage: null,
      currentPlan: null,
      maintenanceStopped: [],
      updatedAt: new Date().toISOString(),
    };
  }

  get(stackId: string): StackRuntimeRecord | null {
    const row = this.db
      .prepare<[string], StackRuntimeRow>('SELECT * FROM stack_runtime WHERE stack_id = ?')
      .get(stackId);
    return row ? rowToRecord(row) : null;
  }

  list(): StackRuntimeRecord[] {
    return this.db
      .prepare<[], StackRuntimeRow>('SELECT * FROM stack_runtime ORDER BY environment_id, stack_name')
      .all()
      .map(rowToRecord);
  }

  listByEnvironment(environmentId: string): StackRuntimeRecord[] {
    return this.db
      .prepare<[string], StackRuntimeRow>('SELECT * FROM stack_runtime WHERE environment_id = ? ORDER BY stack_name')
      .all(environmentId)
      .map(rowToRecord);
  }

  save(record: StackRuntimeRecord): StackRuntimeRecord {
    const saved: StackRuntimeRecord = { ...record, updatedAt: new Date().toISOString() };
    this.db.prepare(`
      INSERT INTO stack_runtime (
        stack_id, environment_id, stack_name, organization_id, operation_mode, deployment_status,
        migration_status, current_version, target_version, last_transition, rollback_disabled,
        status_message, current_plan, maintenance_stopped, updated_at
      ) VALUES (
        @stackId, @environmentId, @stackName, @organizationId, @operationMode, @deploymentStatus,
        @migrationStatus, @currentVersion, @targetVersion, @lastTransition, @rollbackDisabled,
        @statusMessage, @currentPlan, @maintenanceStopped, @updatedAt
      )
      ON CONFLICT(stack_id) DO UPDATE SET
        organization_id = excluded.organization_id,
        operation_mode = excluded.operation_mode,
        deployment_status = excluded.deployment_status,
        migration_status = excluded.migration_status,
        current_version = excluded.current_version,
        target_version = excluded.target_version,
        last_transition = excluded.last_transition,
        rollback_disabled = excluded.rollback_disabled,
        status_message = excluded.status_message,
        current_plan = excluded.current_plan,
        maintenance_stopped = excluded.maintenance_stopped,
        updated_at = excluded.updated_at
    `).run({
      stackId: saved.stackId,
      environmentId: saved.environmentId,
      stackName: saved.stackName,
      organizationId: saved.organizationId,
      operationMode: saved.operationMode,
      deploymentStatus: saved.deploymentStatus,
      migrationStatus: saved.migrationStatus,
      currentVersion: saved.currentVersion,
      targetVersion: saved.targetVersion,
      lastTransition: saved.lastTransition,
      rollbackDisabled: saved.rollbackDisabled ? 1 : 0,
      statusMessage: saved.statusMessage,
      currentPlan: saved.currentPlan ? JSON.stringify(saved.currentPlan) : null,
      maintenanceStopped: JSON.stringify(saved.maintenanceStopped),
      updatedAt: saved.updatedAt,
    });
    return saved;
  }

  delete(stackId: string): void {
    this.db.prepare('DELETE FROM stack_runtime WHERE stack_id = ?').run(stackId);
  }

  getSnapshot(stackId: string): PlanSnapshot | null {
    const row = this.db
      .prepare<[string], PlanSnapshotRow>('SELECT * FROM plan_snapshots WHERE stack_id = ?')
      .get(stackId);
    if (!row) return null;
    return {
      stackId: row.stack_id,
      version: row.version,
      plan: parsePlan(row.plan),
      createdAt: row.created_at,
    };
  }

  /**
   * Save the record and replace its rollback snapshot in one transaction.
   */
  saveWithSnapshot(record: StackRuntimeRecord, snapshotPlan: DeploymentPlan): StackRuntimeRecord {
    return runInTransaction(this.db, () => {
      const saved = this.save(record);
      this.db.prepare(`
        INSERT INTO plan_snapshots (stack_id, version, plan, created_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(stack_id) DO UPDATE SET
          version = excluded.version,
          plan = excluded.plan,
          created_at = excluded.created_at
      `).run(saved.stackId, snapshotPlan.stackVersion, JSON.stringify(snapshotPlan), new Date().toISOString());
      return saved;
    });
  }

  deleteSnapshot(stackId: string): void {
    this.db.prepare('DELETE FROM plan_snapshots WHERE stack_id = ?').run(stackId);
  }
}
