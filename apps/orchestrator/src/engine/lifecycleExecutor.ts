import type {
  DeploymentPlan,
  DeploymentResult,
  DeploymentStep,
  StepOutcome,
  StepPhase,
} from '@stackwright/shared';
import type { ContainerRuntime } from '../runtime/types.js';
import { RuntimeError, isRuntimeError } from '../runtime/types.js';
import { engineLogger, type Logger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { setTimeout as wait } from 'timers/promises';
import { LABELS } from './naming.js';
import { planNetworkActions } from './networkResolver.js';
import { toContainerSpec } from './containerSpec.js';
import { resolveRegistryAuth, type RegistryCredentials } from './registryAuth.js';

export interface StepProgress {
  step: string | null;
  phase: StepPhase;
  outcome: StepOutcome;
  message: string;
}

export interface ExecutionHooks {
  /** Checked between steps; the step in flight always runs to completion. */
  signal?: AbortSignal;
  onProgress?: (progress: StepProgress) => void;
}

export interface ExecutorOptions {
  stopTimeoutSeconds: number;
  initTimeoutMs: number;
  initPollIntervalMs: number;
  /** Inspect each service after start and fail the step if it already exited */
  verifyLiveness: boolean;
  credentials: RegistryCredentials | null;
  dockerConfigPath: string | null;
}

const DEFAULT_OPTIONS: ExecutorOptions = {
  stopTimeoutSeconds: 10,
  initTimeoutMs: 5 * 60 * 1000,
  initPollIntervalMs: 1000,
  verifyLiveness: true,
  credentials: null,
  dockerConfigPath: null,
};

const INIT_LOG_TAIL = 20;

type Emit = (step: string | null, phase: StepPhase, outcome: StepOutcome, message: string) => void;

export interface StackTarget {
  stackName: string;
  environmentId: string;
  stackVersion: string;
}

class StepFailure extends Error {
  constructor(readonly phase: StepPhase, message: string) {
    super(message);
    this.name = 'StepFailure';
  }
}

export interface MaintenanceOutcome {
  stopped: string[];
  errors: string[];
}

/**
 * Carries out a deployment plan against one container host, one step at a
 * time in plan order. The first failing step stops the run; steps already
 * completed stay deployed and are reported in `deployedContexts`.
 */
export class LifecycleExecutor {
  private readonly options: ExecutorOptions;
  private readonly log: Logger;

  constructor(
    private readonly runtime: ContainerRuntime,
    options: Partial<ExecutorOptions> = {},
    logger: Logger = engineLogger
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.log = logger.child({ module: 'lifecycle-executor' });
  }

  async execute(plan: DeploymentPlan, hooks: ExecutionHooks = {}): Promise<DeploymentResult> {
    const emit = this.emitter(hooks);
    const deployedContexts: string[] = [];
    const errors: string[] = [];
    const warnings: string[] = [];
    const knownNetworks = new Set<string>();
    let cancelled = false;

    this.log.info({ stack: plan.stackName, version: plan.stackVersion, steps: plan.steps.length }, 'Executing deployment plan');

    for (const step of plan.steps) {
      if (hooks.signal?.aborted) {
        cancelled = true;
        errors.push(`Cancelled before step ${step.order} (${step.serviceName})`);
        this.log.warn({ stack: plan.stackName, step: step.serviceName }, 'Deployment cancelled');
        break;
      }

      try {
        await this.runStep(plan, step, knownNetworks, warnings, emit);
        deployedContexts.push(step.serviceName);
      } catch (err) {
        const phase = err instanceof StepFailure ? err.phase : 'create';
        const message = `${step.serviceName}: ${errorMessage(err)}`;
        errors.push(message);
        emit(step.serviceName, phase, 'failed', message);
        this.log.error({ stack: plan.stackName, step: step.serviceName, phase, err: errorMessage(err) }, 'Deployment step failed');
        break;
      }
    }

    const result: DeploymentResult = {
      success: errors.length === 0,
      stackVersion: plan.stackVersion,
      deployedContexts,
      errors,
      warnings,
      cancelled,
      completedAt: new Date().toISOString(),
    };

    this.log.info({
      stack: plan.stackName,
      success: result.success,
      deployed: deployedContexts.length,
      total: plan.steps.length,
    }, 'Deployment plan finished');

    return result;
  }

  private emitter(hooks: ExecutionHooks): Emit {
    return (step, phase, outcome, message) => {
      if (!hooks.onProgress) return;
      try {
        hooks.onProgress({ step, phase, outcome, message });
      } catch (err) {
        this.log.warn({ err }, 'Progress listener threw');
      }
    };
  }

  private async runStep(
    plan: DeploymentPlan,
    step: DeploymentStep,
    knownNetworks: Set<string>,
    warnings: string[],
    emit: Emit
  ): Promise<void> {
    const name = step.serviceName;

    emit(name, 'networks', 'started', `Ensuring networks for ${name}`);
    await this.phase('networks', () => this.ensureNetworks(plan, step, knownNetworks));
    emit(name, 'networks', 'succeeded', `Networks ready: ${step.networks.join(', ')}`);

    const { reference } = step;
    emit(name, 'pull', 'started', `Pulling ${reference}`);
    const pullWarning = await this.phase('pull', () => this.pullImage(reference));
    if (pullWarning) {
      warnings.push(pullWarning);
      emit(name, 'pull', 'warning', pullWarning);
    } else {
      emit(name, 'pull', 'succeeded', `Pulled ${reference}`);
    }

    emit(name, 'replace', 'started', `Checking for existing ${step.containerName}`);
    const replaced = await this.phase('replace', () => this.removeExisting(step.containerName));
    emit(name, 'replace', replaced ? 'succeeded' : 'skipped',
      replaced ? `Removed previous ${step.containerName}` : 'No previous container');

    emit(name, 'create', 'started', `Creating ${step.containerName}`);
    const spec = toContainerSpec(plan, step);
    const containerId = await this.phase('create', async () => {
      const id = await this.runtime.createContainer(spec);
      for (const network of step.networks.slice(1)) {
        await this.runtime.connectNetwork(network, id, [name]);
      }
      return id;
    });
    emit(name, 'create', 'succeeded', `Created ${step.containerName}`);

    emit(name, 'start', 'started', `Starting ${step.containerName}`);
    await this.phase('start', () => this.runtime.startContainer(containerId));
    emit(name, 'start', 'succeeded', `Started ${step.containerName}`);

    if (step.lifecycle === 'init') {
      emit(name, 'wait-exit', 'started', `Waiting for ${step.containerName} to complete`);
      await this.phase('wait-exit', () => this.waitForInit(step.containerName, containerId));
      emit(name, 'wait-exit', 'succeeded', `${step.containerName} completed`);
    } else if (this.options.verifyLiveness) {
      emit(name, 'verify', 'started', `Verifying ${step.containerName} is running`);
      await this.phase('verify', () => this.verifyRunning(step.containerName, containerId));
      emit(name, 'verify', 'succeeded', `${step.containerName} is running`);
    }
  }

  private async phase<T>(phase: StepPhase, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StepFailure) throw err;
      throw new StepFailure(phase, errorMessage(err));
    }
  }

  private async ensureNetworks(plan: DeploymentPlan, step: DeploymentStep, known: Set<string>): Promise<void> {
    const required = step.networks.filter(n => !known.has(n));
    if (required.length === 0) return;

    const existing = await this.runtime.listNetworks();
    const actions = planNetworkActions(plan.networks, required, existing);
    if (actions.missingExternal.length > 0) {
      throw new Error(`External network not found: ${actions.missingExternal.join(', ')}`);
    }

    for (const network of actions.create) {
      this.log.info({ network }, 'Creating network');
      try {
        await this.runtime.createNetwork(network, {
          [LABELS.managed]: 'true',
          [LABELS.stack]: plan.stackName,
          [LABELS.environment]: plan.environmentId,
        });
      } catch (err) {
        // another stack may have created it in the meantime
        if (!isRuntimeError(err, 'conflict')) throw err;
      }
    }

    for (const network of [...actions.create, ...actions.present]) {
      known.add(network);
    }
  }

  /**
   * Pull the image; fall back to a local copy when the registry is
   * unreachable. Returns a warning when the fallback was used.
   */
  private async pullImage(reference: string): Promise<string | null> {
    const auth = resolveRegistryAuth(reference, this.options.credentials, this.options.dockerConfigPath);
    try {
      await this.runtime.pullImage(reference, auth);
      return null;
    } catch (err) {
      if (await this.runtime.imageExists(reference)) {
        this.log.warn({ reference, err: errorMessage(err) }, 'Pull failed, using local image');
        return `Pull of ${reference} failed (${errorMessage(err)}); using local image`;
      }
      throw new Error(`Image ${reference} is not available: ${errorMessage(err)}`);
    }
  }

  private async removeExisting(containerName: string): Promise<boolean> {
    const existing = await this.runtime.inspectContainer(containerName);
    if (!existing) return false;

    if (existing.state.running) {
      await this.runtime.stopContainer(existing.id, this.options.stopTimeoutSeconds);
    }
    try {
      await this.runtime.removeContainer(existing.id);
    } catch (err) {
      if (!isRuntimeError(err, 'not-found')) throw err;
    }
    return true;
  }

  private async waitForInit(containerName: string, containerId: string): Promise<void> {
    const deadline = Date.now() + this.options.initTimeoutMs;

    for (;;) {
      const info = await this.runtime.inspectContainer(containerId);
      if (!info) {
        throw new RuntimeError('not-found', `Init container ${containerName} disappeared`);
      }

      const finished = !info.state.running && info.state.status !== 'created';
      const failing = info.state.status === 'restarting' && info.state.exitCode !== 0;
      if (finished || failing) {
        if (info.state.exitCode === 0 && !failing) return;
        const logs = await this.runtime.containerLogs(containerId, INIT_LOG_TAIL).catch((err: unknown) => {
          this.log.debug({ containerName, err: errorMessage(err) }, 'Could not read init container logs');
          return '';
        });
        this.log.error({ containerName, exitCode: info.state.exitCode, logs }, 'Init container failed');
        throw new Error(`Init container ${containerName} exited with code ${info.state.exitCode}`);
      }

      if (Date.now() >= deadline) {
        throw new Error(`Init container ${containerName} did not finish within ${this.options.initTimeoutMs}ms`);
      }
      await wait(this.options.initPollIntervalMs);
    }
  }

  private async verifyRunning(containerName: string, containerId: string): Promise<void> {
    const info = await this.runtime.inspectContainer(containerId);
    if (!info) {
      throw new Error(`Container ${containerName} disappeared after start`);
    }
    if (!info.state.running && info.state.status !== 'restarting') {
      throw new Error(`Container ${containerName} exited right after start (exit code ${info.state.exitCode})`);
    }
  }

  /**
   * Stop and remove every container labelled with the stack. Keeps going
   * past individual failures and reports them all.
   */
  async removeStack(target: StackTarget, hooks: ExecutionHooks = {}): Promise<DeploymentResult> {
    const { stackName, environmentId } = target;
    const emit = this.emitter(hooks);
    const removed: string[] = [];
    const errors: string[] = [];

    const containers = await this.runtime.listContainers({
      labels: { [LABELS.stack]: stackName, [LABELS.environment]: environmentId },
    });

    for (const container of containers) {
      const service = container.labels[LABELS.service] ?? container.name;
      emit(service, 'replace', 'started', `Removing ${container.name}`);
      try {
        if (container.state === 'running' || container.state === 'restarting') {
          await this.runtime.stopContainer(container.id, this.options.stopTimeoutSeconds);
        }
        await this.runtime.removeContainer(container.id, { force: true });
        removed.push(service);
        emit(service, 'replace', 'succeeded', `Removed ${container.name}`);
      } catch (err) {
        if (isRuntimeError(err, 'not-found')) {
          removed.push(service);
          continue;
        }
        const message = `${service}: ${errorMessage(err)}`;
        errors.push(message);
        emit(service, 'replace', 'failed', message);
      }
    }

    return {
      success: errors.length === 0,
      stackVersion: target.stackVersion,
      deployedContexts: removed,
      errors,
      warnings: [],
      cancelled: false,
      completedAt: new Date().toISOString(),
    };
  }

  /**
   * Stop the running containers of a stack, except those labelled to stay up
   * during maintenance.
   */
  async stopForMaintenance(stackName: string, environmentId: string, hooks: ExecutionHooks = {}): Promise<MaintenanceOutcome> {
    const emit = this.emitter(hooks);
    const outcome: MaintenanceOutcome = { stopped: [], errors: [] };

    const containers = await this.runtime.listContainers({
      labels: { [LABELS.stack]: stackName, [LABELS.environment]: environmentId },
    });

    for (const container of containers) {
      if (container.labels[LABELS.maintenanceIgnore] === 'true') {
        emit(container.name, 'maintenance', 'skipped', `${container.name} stays up during maintenance`);
        continue;
      }
      if (container.state !== 'running' && container.state !== 'restarting') continue;

      try {
        await this.runtime.stopContainer(container.id, this.options.stopTimeoutSeconds);
        outcome.stopped.push(container.name);
        emit(container.name, 'maintenance', 'succeeded', `Stopped ${container.name}`);
      } catch (err) {
        const message = `${container.name}: ${errorMessage(err)}`;
        outcome.errors.push(message);
        emit(container.name, 'maintenance', 'failed', message);
      }
    }

    return outcome;
  }

  async restartAfterMaintenance(containerNames: string[], hooks: ExecutionHooks = {}): Promise<MaintenanceOutcome> {
    const emit = this.emitter(hooks);
    const outcome: MaintenanceOutcome = { stopped: [], errors: [] };

    for (const name of containerNames) {
      try {
        await this.runtime.startContainer(name);
        emit(name, 'maintenance', 'succeeded', `Started ${name}`);
      } catch (err) {
        const message = `${name}: ${errorMessage(err)}`;
        outcome.errors.push(message);
        emit(name, 'maintenance', 'failed', message);
      }
    }

    return outcome;
  }
}
