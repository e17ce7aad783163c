import Docker from 'dockerode';
import { engineLogger } from '../lib/logger.js';
import { callHost, type HostCallPolicy } from './hostCall.js';
import {
  RuntimeError,
  isRuntimeError,
  type ContainerFilter,
  type ContainerInspection,
  type ContainerRuntime,
  type ContainerSpec,
  type ContainerSummary,
  type PortBinding,
  type RegistryAuth,
  type RestartPolicyName,
} from './types.js';

const log = engineLogger.child({ module: 'docker-runtime' });

const RETRY_BASE_DELAY_MS = 500;
const RETRY_MAX_DELAY_MS = 5000;

export interface DockerRuntimeOptions {
  environmentId: string;
  connection: Docker.DockerOptions;
  callTimeoutMs: number;
  pullTimeoutMs: number;
  retryAttempts: number;
}

const RESTART_POLICIES: RestartPolicyName[] = ['no', 'always', 'unless-stopped', 'on-failure'];

function toRestartPolicyName(name: string | undefined): RestartPolicyName {
  return RESTART_POLICIES.find(p => p === name) ?? 'no';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPortBindings(value: unknown): Record<string, PortBinding[]> {
  const result: Record<string, PortBinding[]> = {};
  if (!isRecord(value)) return result;
  for (const [port, bindings] of Object.entries(value)) {
    if (!Array.isArray(bindings)) continue;
    result[port] = bindings.filter(isRecord).map(b => ({
      ...(typeof b.HostIp === 'string' && b.HostIp ? { hostIp: b.HostIp } : {}),
      hostPort: typeof b.HostPort === 'string' ? b.HostPort : '',
    }));
  }
  return result;
}

/**
 * `Up 3 minutes (healthy)` and friends; list results carry no health field.
 */
export function healthFromStatus(status: string): string | null {
  const match = /\((healthy|unhealthy|health: starting)\)/.exec(status);
  if (!match) return null;
  return match[1] === 'health: starting' ? 'starting' : match[1];
}

/**
 * Split the multiplexed stdout/stderr stream returned for non-TTY containers.
 */
export function demuxLogs(buffer: Buffer): string {
  if (buffer.length < 8 || buffer[0] > 2 || buffer[1] !== 0) {
    return buffer.toString('utf8');
  }
  const chunks: string[] = [];
  let offset = 0;
  while (offset + 8 <= buffer.length) {
    const size = buffer.readUInt32BE(offset + 4);
    chunks.push(buffer.subarray(offset + 8, offset + 8 + size).toString('utf8'));
    offset += 8 + size;
  }
  return chunks.join('');
}

/**
 * ContainerRuntime over the Docker Engine API. Every call is bounded by a
 * timeout; connection-level failures are retried a few times, everything
 * else surfaces immediately as a RuntimeError.
 */
export class DockerRuntime implements ContainerRuntime {
  private docker: Docker;

  constructor(private readonly options: DockerRuntimeOptions) {
    this.docker = new Docker(options.connection);
  }

  private async call<T>(action: string, fn: () => Promise<T>, timeoutMs = this.options.callTimeoutMs): Promise<T> {
    const policy: HostCallPolicy = {
      timeoutMs,
      attempts: this.options.retryAttempts,
      baseDelayMs: RETRY_BASE_DELAY_MS,
      maxDelayMs: RETRY_MAX_DELAY_MS,
    };
    return callHost(action, fn, policy, retry => {
      log.warn({ environmentId: this.options.environmentId, action, attempt: retry.attempt, delayMs: retry.delayMs,
        err: retry.error.message }, 'Container host call failed, retrying');
    });
  }

  async listContainers(filter: ContainerFilter = {}): Promise<ContainerSummary[]> {
    const filters: Record<string, string[]> = {};
    if (filter.labels) {
      filters.label = Object.entries(filter.labels).map(([k, v]) => `${k}=${v}`);
    }
    if (filter.name) {
      filters.name = [filter.name];
    }

    const containers = await this.call('list containers', () =>
      this.docker.listContainers({ all: true, filters: JSON.stringify(filters) })
    );

    return containers.map(c => ({
      id: c.Id,
      name: (c.Names[0] ?? '').replace(/^\//, ''),
      image: c.Image,
      state: c.State,
      status: c.Status,
      labels: c.Labels ?? {},
      healthStatus: healthFromStatus(c.Status),
    }));
  }

  async inspectContainer(idOrName: string): Promise<ContainerInspection | null> {
    try {
      const info = await this.call(`inspect ${idOrName}`, () => this.docker.getContainer(idOrName).inspect());
      const networks: ContainerInspection['networks'] = {};
      for (const [name, endpoint] of Object.entries(info.NetworkSettings.Networks ?? {})) {
        networks[name] = {
          aliases: endpoint.Aliases ?? [],
          ipAddress: endpoint.IPAddress || null,
        };
      }

      return {
        id: info.Id,
        name: info.Name.replace(/^\//, ''),
        image: info.Config.Image,
        state: {
          status: info.State.Status,
          running: info.State.Running,
          exitCode: info.State.ExitCode,
          restartCount: info.RestartCount,
          health: info.State.Health
            ? { status: info.State.Health.Status, failingStreak: info.State.Health.FailingStreak }
            : null,
        },
        env: info.Config.Env ?? [],
        labels: info.Config.Labels ?? {},
        exposedPorts: Object.keys(info.Config.ExposedPorts ?? {}),
        binds: info.HostConfig.Binds ?? [],
        portBindings: toPortBindings(info.HostConfig.PortBindings),
        restartPolicy: {
          name: toRestartPolicyName(info.HostConfig.RestartPolicy?.Name),
          maximumRetryCount: info.HostConfig.RestartPolicy?.MaximumRetryCount,
        },
        networkMode: info.HostConfig.NetworkMode ?? 'default',
        networks,
      };
    } catch (err) {
      if (isRuntimeError(err, 'not-found')) return null;
      throw err;
    }
  }

  async createContainer(spec: ContainerSpec): Promise<string> {
    const portBindings: Record<string, Array<{ HostIp?: string; HostPort: string }>> = {};
    for (const [port, bindings] of Object.entries(spec.portBindings)) {
      portBindings[port] = bindings.map(b => ({
        ...(b.hostIp ? { HostIp: b.hostIp } : {}),
        HostPort: b.hostPort,
      }));
    }

    const endpointsConfig: Record<string, { Aliases: string[] }> = {};
    if (!['host', 'bridge', 'none', 'default'].includes(spec.networkMode)) {
      endpointsConfig[spec.networkMode] = { Aliases: spec.networkAliases };
    }

    const container = await this.call(`create ${spec.name}`, () =>
      this.docker.createContainer({
        name: spec.name,
        Image: spec.image,
        Env: spec.env,
        Labels: spec.labels,
        ExposedPorts: Object.fromEntries(spec.exposedPorts.map(p => [p, {}])),
        HostConfig: {
          Binds: spec.binds,
          PortBindings: portBindings,
          RestartPolicy: {
            Name: spec.restartPolicy.name,
            ...(spec.restartPolicy.maximumRetryCount !== undefined
              ? { MaximumRetryCount: spec.restartPolicy.maximumRetryCount }
              : {}),
          },
          NetworkMode: spec.networkMode,
          AutoRemove: spec.autoRemove ?? false,
        },
        NetworkingConfig: { EndpointsConfig: endpointsConfig },
      })
    );
    return container.id;
  }

  async startContainer(idOrName: string): Promise<void> {
    try {
      await this.call(`start ${idOrName}`, () => this.docker.getContainer(idOrName).start());
    } catch (err) {
      // 304: already running
      if (isRuntimeError(err) && err.statusCode === 304) return;
      throw err;
    }
  }

  async stopContainer(idOrName: string, timeoutSeconds = 10): Promise<void> {
    try {
      await this.call(
        `stop ${idOrName}`,
        () => this.docker.getContainer(idOrName).stop({ t: timeoutSeconds }),
        this.options.callTimeoutMs + timeoutSeconds * 1000
      );
    } catch (err) {
      // 304: already stopped
      if (isRuntimeError(err) && err.statusCode === 304) return;
      throw err;
    }
  }

  async removeContainer(idOrName: string, options: { force?: boolean } = {}): Promise<void> {
    await this.call(`remove ${idOrName}`, () =>
      this.docker.getContainer(idOrName).remove({ force: options.force ?? false })
    );
  }

  async renameContainer(idOrName: string, newName: string): Promise<void> {
    await this.call(`rename ${idOrName}`, () => this.docker.getContainer(idOrName).rename({ name: newName }));
  }

  async containerLogs(idOrName: string, tail: number): Promise<string> {
    const buffer = await this.call(`logs ${idOrName}`, () =>
      this.docker.getContainer(idOrName).logs({ stdout: true, stderr: true, tail, follow: false })
    );
    return demuxLogs(buffer);
  }

  async listNetworks(): Promise<string[]> {
    const networks = await this.call('list networks', () => this.docker.listNetworks());
    return networks.map(n => n.Name);
  }

  async createNetwork(name: string, labels: Record<string, string>): Promise<void> {
    await this.call(`create network ${name}`, () =>
      this.docker.createNetwork({ Name: name, Driver: 'bridge', Labels: labels, CheckDuplicate: true })
    );
  }

  async connectNetwork(network: string, container: string, aliases: string[]): Promise<void> {
    await this.call(`connect ${container} to ${network}`, () =>
      this.docker.getNetwork(network).connect({ Container: container, EndpointConfig: { Aliases: aliases } })
    );
  }

  async pullImage(reference: string, auth?: RegistryAuth): Promise<void> {
    await this.call(`pull ${reference}`, async () => {
      const stream: NodeJS.ReadableStream = await this.docker.pull(reference, auth ? { authconfig: auth } : {});
      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(stream, (err: Error | null) => (err ? reject(err) : resolve()));
      });
    }, this.options.pullTimeoutMs);
  }

  async imageExists(reference: string): Promise<boolean> {
    try {
      await this.call(`inspect image ${reference}`, () => this.docker.getImage(reference).inspect());
      return true;
    } catch (err) {
      if (isRuntimeError(err, 'not-found')) return false;
      throw err;
    }
  }
}
