import { hostname } from 'os';
import { encodeSwapInstructions, type DeploymentResult, type StepOutcome, type StepPhase } from '@stackwright/shared';
import type { ContainerInspection, ContainerRuntime, ContainerSpec } from '../runtime/types.js';
import { isRuntimeError } from '../runtime/types.js';
import { engineLogger, type Logger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import type { ExecutionHooks } from './lifecycleExecutor.js';
import { imageWithTag } from './imageReference.js';
import { resolveRegistryAuth, type RegistryCredentials } from './registryAuth.js';

export const REPLACEMENT_SUFFIX = '-update';
export const HELPER_SUFFIX = '-swap-helper';

export interface SelfReplacementOptions {
  /** Own container id or name; empty means the hostname, which Docker sets to the short id */
  containerId: string;
  /** Repository of the orchestrator image, without tag */
  image: string;
  helperImage: string;
  dockerSocketPath: string;
  stopTimeoutSeconds: number;
  readinessTimeoutMs: number;
  readinessUrl: string | null;
  statusPagePort: number | null;
  credentials: RegistryCredentials | null;
  dockerConfigPath: string | null;
}

// Joined through the network mode itself; connecting them again fails
const BUILTIN_NETWORKS = new Set(['default', 'bridge', 'host', 'none']);

/**
 * Create options for the replacement: everything the running container was
 * started with, on the new image and under a new name. Only the primary
 * network is set here; the others are connected after creation.
 */
export function buildReplacementSpec(inspection: ContainerInspection, image: string, name: string): ContainerSpec {
  const primary = inspection.networkMode || 'bridge';
  return {
    name,
    image,
    env: [...inspection.env],
    labels: { ...inspection.labels },
    exposedPorts: [...inspection.exposedPorts],
    portBindings: { ...inspection.portBindings },
    binds: [...inspection.binds],
    restartPolicy: { ...inspection.restartPolicy },
    networkMode: primary,
    networkAliases: inspection.networks[primary]?.aliases ?? [],
  };
}

/**
 * Replaces the orchestrator's own container with one running a newer
 * image. The orchestrator cannot stop itself and then start its successor,
 * so it prepares the successor and hands the swap to a detached helper
 * container that outlives it.
 */
export class SelfReplacementCoordinator {
  private readonly log: Logger;

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly options: SelfReplacementOptions,
    logger: Logger = engineLogger
  ) {
    this.log = logger.child({ module: 'self-replacement' });
  }

  /**
   * Prepare the replacement and start the helper. Resolves once the helper
   * is running; the swap itself happens after this process is stopped.
   */
  async trigger(targetVersion: string, hooks: ExecutionHooks = {}): Promise<DeploymentResult> {
    const warnings: string[] = [];
    const prepared: string[] = [];
    const emit = (phase: StepPhase, outcome: StepOutcome, message: string): void => {
      try {
        hooks.onProgress?.({ step: null, phase, outcome, message });
      } catch (err) {
        this.log.warn({ err }, 'Progress listener threw');
      }
    };
    const finish = (errors: string[]): DeploymentResult => ({
      success: errors.length === 0,
      stackVersion: targetVersion,
      deployedContexts: prepared,
      errors,
      warnings,
      cancelled: false,
      completedAt: new Date().toISOString(),
    });

    this.log.info({ targetVersion }, 'Self-update triggered');
    let phase: StepPhase = 'handoff';

    try {
      const ownId = this.options.containerId || hostname();
      const own = await this.runtime.inspectContainer(ownId);
      if (!own) {
        throw new Error(`Cannot find own container ${ownId}; is the orchestrator running in a container?`);
      }
      const replacementName = `${own.name}${REPLACEMENT_SUFFIX}`;
      const helperName = `${own.name}${HELPER_SUFFIX}`;
      emit('handoff', 'succeeded', `Own container is ${own.name}`);

      phase = 'pull';
      const { reference } = imageWithTag(this.options.image, targetVersion);
      emit('pull', 'started', `Pulling ${reference}`);
      await this.runtime.pullImage(
        reference,
        resolveRegistryAuth(reference, this.options.credentials, this.options.dockerConfigPath)
      );
      await this.ensureHelperImage();
      emit('pull', 'succeeded', `Pulled ${reference}`);

      phase = 'replace';
      for (const leftover of [replacementName, helperName]) {
        const warning = await this.removeLeftover(leftover);
        if (warning) warnings.push(warning);
      }

      phase = 'create';
      const spec = buildReplacementSpec(own, reference, replacementName);
      await this.runtime.createContainer(spec);
      prepared.push(replacementName);
      for (const [network, endpoint] of Object.entries(own.networks)) {
        if (network === spec.networkMode || BUILTIN_NETWORKS.has(network)) continue;
        try {
          await this.runtime.connectNetwork(network, replacementName, endpoint.aliases);
        } catch (err) {
          const warning = `Could not connect ${replacementName} to ${network}: ${errorMessage(err)}`;
          this.log.warn({ network, err: errorMessage(err) }, 'Network connect failed for replacement');
          warnings.push(warning);
        }
      }
      emit('create', 'succeeded', `Prepared ${replacementName}`);

      phase = 'start';
      await this.runtime.createContainer({
        name: helperName,
        image: this.options.helperImage,
        env: encodeSwapInstructions({
          oldContainer: own.name,
          newContainer: replacementName,
          stopTimeoutSeconds: this.options.stopTimeoutSeconds,
          readinessTimeoutMs: this.options.readinessTimeoutMs,
          readinessUrl: this.options.readinessUrl,
          statusPagePort: this.options.statusPagePort,
        }),
        labels: {},
        exposedPorts: [],
        portBindings: {},
        binds: [`${this.options.dockerSocketPath}:/var/run/docker.sock`],
        restartPolicy: { name: 'no' },
        networkMode: 'host',
        networkAliases: [],
        autoRemove: true,
      });
      await this.runtime.startContainer(helperName);
      prepared.push(helperName);
      emit('start', 'succeeded', `Started ${helperName}; the orchestrator restarts on ${targetVersion} shortly`);

      this.log.info({ replacementName, helperName, targetVersion }, 'Self-update handed off to helper');
      return finish([]);
    } catch (err) {
      const message = `Self-update to ${targetVersion} failed: ${errorMessage(err)}`;
      this.log.error({ targetVersion, phase, err: errorMessage(err) }, 'Self-update failed');
      emit(phase, 'failed', message);
      return finish([message]);
    }
  }

  private async ensureHelperImage(): Promise<void> {
    const helper = this.options.helperImage;
    if (await this.runtime.imageExists(helper)) return;
    await this.runtime.pullImage(
      helper,
      resolveRegistryAuth(helper, this.options.credentials, this.options.dockerConfigPath)
    );
  }

  private async removeLeftover(name: string): Promise<string | null> {
    try {
      await this.runtime.removeContainer(name, { force: true });
      this.log.info({ name }, 'Removed leftover container from an earlier self-update');
      return null;
    } catch (err) {
      if (isRuntimeError(err, 'not-found')) return null;
      this.log.warn({ name, err: errorMessage(err) }, 'Could not remove leftover container');
      return `Could not remove leftover ${name}: ${errorMessage(err)}`;
    }
  }
}
