import { v4 as uuidv4 } from 'uuid';
import type {
  DeploymentContext,
  DeploymentPlan,
  DeploymentResult,
  OperationAccepted,
  OperationEvent,
  OperationKind,
  StackDescription,
  StackRuntimeRecord,
} from '@stackwright/shared';
import { buildDeploymentPlan } from '../engine/planBuilder.js';
import type { ExecutionHooks, LifecycleExecutor, MaintenanceOutcome, StepProgress } from '../engine/lifecycleExecutor.js';
import type { SelfReplacementCoordinator } from '../engine/selfReplacement.js';
import type { EnvironmentLease, EnvironmentLock } from '../lib/environmentLock.js';
import { SelfUpdateUnavailableError, errorMessage } from '../lib/errors.js';
import { engineLogger } from '../lib/logger.js';
import type { RuntimeRegistry } from '../runtime/runtimeRegistry.js';
import type { OperationModeController } from './operationModeController.js';

const log = engineLogger.child({ module: 'stack-operations' });

const MAX_TRACKED_OPERATIONS = 200;

export type OperationState = 'running' | 'succeeded' | 'failed';

export interface OperationStatus extends OperationAccepted {
  state: OperationState;
  startedAt: string;
  finishedAt: string | null;
  events: OperationEvent[];
  result: DeploymentResult | null;
}

/**
 * An accepted command. `completion` resolves with the final result and
 * never rejects; failures are reported in the result.
 */
export interface OperationHandle extends OperationAccepted {
  completion: Promise<DeploymentResult>;
}

export type ExecutorFactory = (environmentId: string) => LifecycleExecutor;

export interface SelfUpdateTarget {
  environmentId: string;
  coordinator: SelfReplacementCoordinator;
}

export type OperationListener = (event: OperationEvent) => void;

interface TrackedOperation {
  status: OperationStatus;
  abort: AbortController;
  sequence: number;
}

function failedResult(stackVersion: string, message: string): DeploymentResult {
  return {
    success: false,
    stackVersion,
    deployedContexts: [],
    errors: [message],
    warnings: [],
    cancelled: false,
    completedAt: new Date().toISOString(),
  };
}

function maintenanceResult(record: StackRuntimeRecord, outcome: MaintenanceOutcome): DeploymentResult {
  return {
    success: outcome.errors.length === 0,
    stackVersion: record.currentVersion ?? '',
    deployedContexts: outcome.stopped,
    errors: outcome.errors,
    warnings: [],
    cancelled: false,
    completedAt: new Date().toISOString(),
  };
}

/**
 * Entry point for every lifecycle command. A command either throws right
 * away (bad input, busy environment, refused transition) or is accepted
 * and runs in the background under the environment lock, reporting
 * progress to subscribers.
 */
export class StackOperations {
  private operations = new Map<string, TrackedOperation>();
  private listeners = new Set<OperationListener>();

  constructor(
    private readonly runtimes: RuntimeRegistry,
    private readonly controller: OperationModeController,
    private readonly lock: EnvironmentLock,
    private readonly executorFor: ExecutorFactory,
    private readonly selfUpdateTarget: SelfUpdateTarget | null = null
  ) {}

  subscribe(listener: OperationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getOperation(operationId: string): OperationStatus | null {
    return this.operations.get(operationId)?.status ?? null;
  }

  listOperations(environmentId?: string): OperationStatus[] {
    return [...this.operations.values()]
      .map(op => op.status)
      .filter(status => !environmentId || status.environmentId === environmentId);
  }

  /**
   * Ask a running operation to stop after its current step.
   */
  cancel(operationId: string): boolean {
    const op = this.operations.get(operationId);
    if (!op || op.status.state !== 'running' || op.abort.signal.aborted) return false;
    op.abort.abort();
    log.info({ operationId }, 'Cancellation requested');
    return true;
  }

  deploy(description: StackDescription, context: DeploymentContext): OperationHandle {
    this.runtimes.get(context.environmentId);
    const plan = buildDeploymentPlan(description, context);
    const lease = this.lock.acquire(plan.environmentId, `deploy ${plan.stackName}`);
    const record = this.begin(lease, () => this.controller.beginDeploy(plan, context.organizationId ?? null));

    return this.launch('deploy', lease, plan.stackName, plan.stackVersion, hooks =>
      this.runPlan(record, plan, hooks));
  }

  upgrade(description: StackDescription, context: DeploymentContext): OperationHandle {
    this.runtimes.get(context.environmentId);
    const plan = buildDeploymentPlan(description, context);
    const lease = this.lock.acquire(plan.environmentId, `upgrade ${plan.stackName}`);
    const record = this.begin(lease, () => this.controller.beginUpgrade(plan));

    return this.launch('upgrade', lease, plan.stackName, plan.stackVersion, hooks =>
      this.runPlan(record, plan, hooks));
  }

  rollback(environmentId: string, stackName: string): OperationHandle {
    this.runtimes.get(environmentId);
    const lease = this.lock.acquire(environmentId, `rollback ${stackName}`);
    const { record, snapshot } = this.begin(lease, () => this.controller.beginRollback(environmentId, stackName));

    return this.launch('rollback', lease, stackName, snapshot.version, hooks =>
      this.runPlan(record, snapshot.plan, hooks));
  }

  setMaintenance(environmentId: string, stackName: string, enabled: boolean): OperationHandle {
    this.runtimes.get(environmentId);
    const lease = this.lock.acquire(environmentId, `${enabled ? 'enter' : 'leave'} maintenance ${stackName}`);

    if (enabled) {
      const record = this.begin(lease, () => this.controller.beginMaintenance(environmentId, stackName));
      return this.launch('maintenance', lease, stackName, record.currentVersion ?? '', async hooks => {
        const outcome = await this.guardMaintenance(() =>
          this.executorFor(environmentId).stopForMaintenance(stackName, environmentId, hooks));
        this.controller.completeMaintenanceEntry(record, outcome);
        return maintenanceResult(record, outcome);
      });
    }

    const record = this.begin(lease, () => this.controller.beginMaintenanceExit(environmentId, stackName));
    return this.launch('maintenance', lease, stackName, record.currentVersion ?? '', async hooks => {
      const outcome = await this.guardMaintenance(() =>
        this.executorFor(environmentId).restartAfterMaintenance(record.maintenanceStopped, hooks));
      this.controller.completeMaintenanceExit(record, outcome);
      return maintenanceResult(record, { ...outcome, stopped: record.maintenanceStopped });
    });
  }

  remove(environmentId: string, stackName: string): OperationHandle {
    this.runtimes.get(environmentId);
    const lease = this.lock.acquire(environmentId, `remove ${stackName}`);
    const record = this.begin(lease, () => this.controller.beginRemove(environmentId, stackName));
    const stackVersion = record.currentVersion ?? '';

    return this.launch('remove', lease, stackName, stackVersion, async hooks => {
      const result = await this.guardRun(stackVersion, () =>
        this.executorFor(environmentId).removeStack({ stackName, environmentId, stackVersion }, hooks));
      this.controller.completeRemove(record, result);
      return result;
    });
  }

  /**
   * Replace the orchestrator's own container. Runs under the lock of the
   * environment the orchestrator itself is deployed in.
   */
  selfUpdate(targetVersion: string): OperationHandle {
    const target = this.selfUpdateTarget;
    if (!target) {
      throw new SelfUpdateUnavailableError();
    }
    const lease = this.lock.acquire(target.environmentId, `self-update to ${targetVersion}`);
    return this.launch('self-update', lease, null, targetVersion, hooks =>
      target.coordinator.trigger(targetVersion, hooks));
  }

  private async runPlan(record: StackRuntimeRecord, plan: DeploymentPlan, hooks: ExecutionHooks): Promise<DeploymentResult> {
    const result = await this.guardRun(plan.stackVersion, () =>
      this.executorFor(plan.environmentId).execute(plan, hooks));
    this.controller.completeExecution(record, plan, result);
    return result;
  }

  /** Turn an unexpected throw from the executor into a failed result. */
  private async guardRun(stackVersion: string, run: () => Promise<DeploymentResult>): Promise<DeploymentResult> {
    try {
      return await run();
    } catch (err) {
      log.error({ err: errorMessage(err) }, 'Executor failed unexpectedly');
      return failedResult(stackVersion, errorMessage(err));
    }
  }

  private async guardMaintenance(run: () => Promise<MaintenanceOutcome>): Promise<MaintenanceOutcome> {
    try {
      return await run();
    } catch (err) {
      log.error({ err: errorMessage(err) }, 'Maintenance change failed unexpectedly');
      return { stopped: [], errors: [errorMessage(err)] };
    }
  }

  /** Release the lease if the controller refuses the transition. */
  private begin<T>(lease: EnvironmentLease, start: () => T): T {
    try {
      return start();
    } catch (err) {
      lease.release();
      throw err;
    }
  }

  private launch(
    kind: OperationKind,
    lease: EnvironmentLease,
    stackName: string | null,
    stackVersion: string,
    work: (hooks: ExecutionHooks) => Promise<DeploymentResult>
  ): OperationHandle {
    const accepted: OperationAccepted = {
      operationId: uuidv4(),
      kind,
      environmentId: lease.environmentId,
      stackName,
    };
    const op: TrackedOperation = {
      status: {
        ...accepted,
        state: 'running',
        startedAt: new Date().toISOString(),
        finishedAt: null,
        events: [],
        result: null,
      },
      abort: new AbortController(),
      sequence: 0,
    };
    this.track(op);
    log.info({ ...accepted }, 'Operation accepted');

    const hooks: ExecutionHooks = {
      signal: op.abort.signal,
      onProgress: progress => this.emitProgress(op, progress),
    };

    const completion = (async (): Promise<DeploymentResult> => {
      let result: DeploymentResult;
      try {
        result = await work(hooks);
      } catch (err) {
        log.error({ operationId: accepted.operationId, err: errorMessage(err) }, 'Operation failed');
        result = failedResult(stackVersion, errorMessage(err));
      } finally {
        lease.release();
      }

      op.status.state = result.success ? 'succeeded' : 'failed';
      op.status.finishedAt = result.completedAt;
      op.status.result = result;
      this.publish(op, {
        type: 'completed',
        operationId: accepted.operationId,
        kind,
        environmentId: accepted.environmentId,
        stackName,
        result,
        sequence: ++op.sequence,
        timestamp: new Date().toISOString(),
      });
      log.info({ operationId: accepted.operationId, kind, success: result.success }, 'Operation finished');
      return result;
    })();

    return { ...accepted, completion };
  }

  private emitProgress(op: TrackedOperation, progress: StepProgress): void {
    this.publish(op, {
      type: 'progress',
      operationId: op.status.operationId,
      environmentId: op.status.environmentId,
      stackName: op.status.stackName,
      step: progress.step,
      phase: progress.phase,
      outcome: progress.outcome,
      message: progress.message,
      sequence: ++op.sequence,
      timestamp: new Date().toISOString(),
    });
  }

  private publish(op: TrackedOperation, event: OperationEvent): void {
    op.status.events.push(event);
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.warn({ err: errorMessage(err) }, 'Operation listener threw');
      }
    }
  }

  private track(op: TrackedOperation): void {
    this.operations.set(op.status.operationId, op);
    if (this.operations.size <= MAX_TRACKED_OPERATIONS) return;
    for (const [id, tracked] of this.operations) {
      if (tracked.status.state !== 'running') {
        this.operations.delete(id);
        return;
      }
    }
  }
}
