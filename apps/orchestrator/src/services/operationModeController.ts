import { compareVersions, validate } from 'compare-versions';
import type {
  DeploymentPlan,
  DeploymentResult,
  OperationMode,
  PlanSnapshot,
  StackRuntimeRecord,
  TransitionKind,
} from '@stackwright/shared';
import { InvalidTransitionError } from '../lib/errors.js';
import { engineLogger } from '../lib/logger.js';
import type { MaintenanceOutcome } from '../engine/lifecycleExecutor.js';
import { StackStateStore, toStackId } from './stackStateStore.js';

const log = engineLogger.child({ module: 'operation-mode' });

export type RollbackCheck =
  | { allowed: true; snapshot: PlanSnapshot }
  | { allowed: false; code: 'ROLLBACK_DISABLED' | 'ROLLBACK_NOT_APPLICABLE' | 'NO_SNAPSHOT'; reason: string };

const MIGRATION_TRANSITIONS: ReadonlyArray<TransitionKind> = ['upgrade', 'downgrade', 'rollback'];

/**
 * Direction of a version change. Non-semver versions count as upgrades, so
 * an unparseable tag still gets a rollback snapshot.
 */
export function classifyVersionChange(from: string | null, to: string): 'upgrade' | 'downgrade' {
  if (from === null || !validate(from) || !validate(to)) return 'upgrade';
  return compareVersions(to, from) < 0 ? 'downgrade' : 'upgrade';
}

function rejectUnless(record: StackRuntimeRecord, allowed: OperationMode[], action: string): void {
  if (!allowed.includes(record.operationMode)) {
    throw new InvalidTransitionError(
      'INVALID_TRANSITION',
      `Cannot ${action} ${record.stackName} while it is ${record.operationMode}`
    );
  }
}

/**
 * State machine over a stack's operation mode. Every command asks the
 * controller first; a refused transition throws before anything touches
 * the container host.
 *
 * ```
 * stopped/normal/failed --deploy--> migrating --ok--> normal
 * normal --upgrade--> migrating --fail--> failed --rollback--> migrating
 * normal <--> maintenance
 * failed (stranded in maintenance) --leave maintenance--> normal
 * any but migrating --remove--> stopped
 * ```
 */
export class OperationModeController {
  constructor(private readonly store: StackStateStore) {}

  find(environmentId: string, stackName: string): StackRuntimeRecord | null {
    return this.store.get(toStackId(environmentId, stackName));
  }

  load(environmentId: string, stackName: string): StackRuntimeRecord {
    const record = this.find(environmentId, stackName);
    if (!record) {
      throw new InvalidTransitionError('STACK_NOT_FOUND', `Stack ${stackName} is not managed in ${environmentId}`);
    }
    return record;
  }

  beginDeploy(plan: DeploymentPlan, organizationId: string | null): StackRuntimeRecord {
    const record = this.find(plan.environmentId, plan.stackName)
      ?? StackStateStore.newRecord(plan.environmentId, plan.stackName, organizationId);
    rejectUnless(record, ['stopped', 'normal', 'failed'], 'deploy');

    return this.transition(record, {
      organizationId: organizationId ?? record.organizationId,
      operationMode: 'migrating',
      deploymentStatus: 'deploying',
      migrationStatus: 'none',
      targetVersion: plan.stackVersion,
      lastTransition: 'deploy',
      rollbackDisabled: plan.rollbackDisabled,
      statusMessage: null,
    });
  }

  /**
   * Start an upgrade or downgrade. The plan currently running becomes the
   * stack's only rollback snapshot, replacing any older one.
   */
  beginUpgrade(plan: DeploymentPlan): StackRuntimeRecord {
    const record = this.load(plan.environmentId, plan.stackName);
    rejectUnless(record, ['normal'], 'upgrade');
    if (!record.currentPlan) {
      throw new InvalidTransitionError('STACK_NOT_DEPLOYED', `Stack ${record.stackName} has no deployed plan to upgrade from`);
    }

    const direction = classifyVersionChange(record.currentVersion, plan.stackVersion);
    const next: StackRuntimeRecord = {
      ...record,
      operationMode: 'migrating',
      deploymentStatus: 'upgrading',
      migrationStatus: 'running',
      targetVersion: plan.stackVersion,
      lastTransition: direction,
      rollbackDisabled: plan.rollbackDisabled,
      statusMessage: null,
    };

    log.info({ stackId: record.stackId, from: record.currentVersion, to: plan.stackVersion, direction },
      'Beginning version change');
    return this.store.saveWithSnapshot(next, record.currentPlan);
  }

  checkRollback(record: StackRuntimeRecord): RollbackCheck {
    if (record.rollbackDisabled) {
      return { allowed: false, code: 'ROLLBACK_DISABLED', reason: `Rollback is disabled for ${record.stackName}` };
    }
    if (record.operationMode !== 'failed' || record.lastTransition !== 'upgrade') {
      return {
        allowed: false,
        code: 'ROLLBACK_NOT_APPLICABLE',
        reason: `Rollback is only offered after a failed upgrade; ${record.stackName} is ${record.operationMode}`
          + (record.lastTransition ? ` after ${record.lastTransition}` : ''),
      };
    }
    const snapshot = this.store.getSnapshot(record.stackId);
    if (!snapshot) {
      return { allowed: false, code: 'NO_SNAPSHOT', reason: `No snapshot to roll ${record.stackName} back to` };
    }
    return { allowed: true, snapshot };
  }

  beginRollback(environmentId: string, stackName: string): { record: StackRuntimeRecord; snapshot: PlanSnapshot } {
    const record = this.load(environmentId, stackName);
    const check = this.checkRollback(record);
    if (!check.allowed) {
      throw new InvalidTransitionError(check.code, check.reason);
    }

    const next = this.transition(record, {
      operationMode: 'migrating',
      deploymentStatus: 'rolling-back',
      migrationStatus: 'running',
      targetVersion: check.snapshot.version,
      lastTransition: 'rollback',
      statusMessage: null,
    });
    return { record: next, snapshot: check.snapshot };
  }

  /**
   * Record the outcome of a deploy, upgrade or rollback run.
   */
  completeExecution(record: StackRuntimeRecord, plan: DeploymentPlan, result: DeploymentResult): StackRuntimeRecord {
    const isMigration = record.lastTransition !== null && MIGRATION_TRANSITIONS.includes(record.lastTransition);

    if (result.success) {
      if (record.lastTransition === 'rollback') {
        this.store.deleteSnapshot(record.stackId);
      }
      return this.transition(record, {
        operationMode: 'normal',
        deploymentStatus: 'idle',
        migrationStatus: isMigration ? 'succeeded' : 'none',
        currentVersion: plan.stackVersion,
        targetVersion: null,
        currentPlan: plan,
        statusMessage: result.warnings.length > 0 ? result.warnings.join('; ') : null,
        maintenanceStopped: [],
      });
    }

    return this.transition(record, {
      operationMode: 'failed',
      deploymentStatus: 'failed',
      migrationStatus: isMigration ? 'failed' : 'none',
      statusMessage: result.errors.join('; ') || 'Deployment failed',
    });
  }

  /**
   * Containers are stopped while the mode is still normal, so the record
   * carries `entering-maintenance` until the outcome is known. The health
   * monitor skips a stack in that state.
   */
  beginMaintenance(environmentId: string, stackName: string): StackRuntimeRecord {
    const record = this.load(environmentId, stackName);
    rejectUnless(record, ['normal'], 'enter maintenance for');
    return this.transition(record, {
      deploymentStatus: 'entering-maintenance',
      lastTransition: 'maintenance',
      statusMessage: null,
    });
  }

  completeMaintenanceEntry(record: StackRuntimeRecord, outcome: MaintenanceOutcome): StackRuntimeRecord {
    if (outcome.errors.length > 0) {
      return this.transition(record, {
        operationMode: 'failed',
        deploymentStatus: 'failed',
        maintenanceStopped: outcome.stopped,
        lastTransition: 'maintenance',
        statusMessage: `Entering maintenance failed: ${outcome.errors.join('; ')}`,
      });
    }
    return this.transition(record, {
      operationMode: 'maintenance',
      deploymentStatus: 'idle',
      maintenanceStopped: outcome.stopped,
      lastTransition: 'maintenance',
      statusMessage: null,
    });
  }

  /**
   * Leave maintenance. A stack that failed half way into or out of
   * maintenance may also leave it, as long as containers stopped for it
   * are still on record.
   */
  beginMaintenanceExit(environmentId: string, stackName: string): StackRuntimeRecord {
    const record = this.load(environmentId, stackName);
    const stranded = record.operationMode === 'failed'
      && record.lastTransition === 'maintenance'
      && record.maintenanceStopped.length > 0;
    if (!stranded) {
      rejectUnless(record, ['maintenance'], 'leave maintenance for');
    }
    return this.transition(record, { deploymentStatus: 'leaving-maintenance' });
  }

  completeMaintenanceExit(record: StackRuntimeRecord, outcome: MaintenanceOutcome): StackRuntimeRecord {
    if (outcome.errors.length > 0) {
      return this.transition(record, {
        operationMode: 'failed',
        deploymentStatus: 'failed',
        statusMessage: `Leaving maintenance failed: ${outcome.errors.join('; ')}`,
      });
    }
    return this.transition(record, {
      operationMode: 'normal',
      deploymentStatus: 'idle',
      maintenanceStopped: [],
      lastTransition: 'maintenance',
      statusMessage: null,
    });
  }

  beginRemove(environmentId: string, stackName: string): StackRuntimeRecord {
    const record = this.load(environmentId, stackName);
    rejectUnless(record, ['normal', 'maintenance', 'stopped', 'failed'], 'remove');
    return this.transition(record, { deploymentStatus: 'removing', lastTransition: 'remove' });
  }

  completeRemove(record: StackRuntimeRecord, result: DeploymentResult): StackRuntimeRecord {
    if (!result.success) {
      return this.transition(record, {
        operationMode: 'failed',
        deploymentStatus: 'failed',
        statusMessage: result.errors.join('; '),
      });
    }
    this.store.deleteSnapshot(record.stackId);
    return this.transition(record, {
      operationMode: 'stopped',
      deploymentStatus: 'idle',
      migrationStatus: 'none',
      currentVersion: null,
      targetVersion: null,
      currentPlan: null,
      maintenanceStopped: [],
      statusMessage: null,
    });
  }

  /**
   * Force a stack into Failed, e.g. when its operation died with the process.
   */
  fail(record: StackRuntimeRecord, message: string): StackRuntimeRecord {
    log.warn({ stackId: record.stackId, mode: record.operationMode, message }, 'Marking stack as failed');
    return this.transition(record, {
      operationMode: 'failed',
      deploymentStatus: 'failed',
      migrationStatus: record.migrationStatus === 'running' ? 'failed' : record.migrationStatus,
      statusMessage: message,
    });
  }

  private transition(record: StackRuntimeRecord, changes: Partial<StackRuntimeRecord>): StackRuntimeRecord {
    const next = this.store.save({ ...record, ...changes });
    if (next.operationMode !== record.operationMode) {
      log.info({ stackId: next.stackId, from: record.operationMode, to: next.operationMode }, 'Operation mode changed');
    }
    return next;
  }
}
