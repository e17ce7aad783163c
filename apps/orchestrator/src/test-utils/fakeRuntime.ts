import {
  RuntimeError,
  type ContainerFilter,
  type ContainerInspection,
  type ContainerRuntime,
  type ContainerSpec,
  type ContainerSummary,
  type RegistryAuth,
} from '../runtime/types.js';

export interface FakeContainer {
  id: string;
  name: string;
  spec: ContainerSpec;
  state: 'created' | 'running' | 'exited' | 'restarting' | 'paused' | 'dead';
  exitCode: number;
  restartCount: number;
  health: { status: string; failingStreak: number } | null;
  networks: Map<string, string[]>;
}

export interface RuntimeCall {
  seq: number;
  method: string;
  target: string;
}

type FailurePredicate = (method: string, target: string) => Error | null;

/**
 * In-memory ContainerRuntime. Records every call in order and lets tests
 * inject failures per method and target.
 */
export class FakeRuntime implements ContainerRuntime {
  containers = new Map<string, FakeContainer>();
  networks = new Set<string>(['bridge', 'host']);
  localImages = new Set<string>();
  /** Images no registry can serve */
  unpullable = new Set<string>();
  /** Exit codes for init containers, by container name; default 0 */
  exitCodes = new Map<string, number>();
  /** Containers that die right after start */
  crashOnStart = new Set<string>();
  calls: RuntimeCall[] = [];
  pulls: Array<{ reference: string; auth?: RegistryAuth }> = [];
  private failures: FailurePredicate[] = [];
  private seq = 0;
  private nextId = 1;

  failWhen(method: string, target: string, error: Error = new RuntimeError('unknown', `${method} ${target} failed`)): void {
    this.failures.push((m, t) => (m === method && t === target ? error : null));
  }

  clearFailures(): void {
    this.failures = [];
  }

  callsOf(method: string): string[] {
    return this.calls.filter(c => c.method === method).map(c => c.target);
  }

  private record(method: string, target: string): void {
    this.calls.push({ seq: ++this.seq, method, target });
    for (const failure of this.failures) {
      const err = failure(method, target);
      if (err) throw err;
    }
  }

  private find(idOrName: string): FakeContainer | undefined {
    const byName = this.containers.get(idOrName);
    if (byName) return byName;
    for (const container of this.containers.values()) {
      if (container.id === idOrName) return container;
    }
    return undefined;
  }

  private require(idOrName: string): FakeContainer {
    const container = this.find(idOrName);
    if (!container) {
      throw new RuntimeError('not-found', `No such container: ${idOrName}`, 404);
    }
    return container;
  }

  /** Seed a container as if an earlier deployment had created it. */
  addContainer(spec: ContainerSpec, state: FakeContainer['state'] = 'running'): FakeContainer {
    const container: FakeContainer = {
      id: `c${this.nextId++}`,
      name: spec.name,
      spec,
      state,
      exitCode: 0,
      restartCount: 0,
      health: null,
      networks: new Map([[spec.networkMode, spec.networkAliases]]),
    };
    this.containers.set(spec.name, container);
    return container;
  }

  async listContainers(filter: ContainerFilter = {}): Promise<ContainerSummary[]> {
    this.record('listContainers', JSON.stringify(filter));
    return [...this.containers.values()]
      .filter(c => !filter.name || c.name.includes(filter.name))
      .filter(c => Object.entries(filter.labels ?? {}).every(([k, v]) => c.spec.labels[k] === v))
      .map(c => ({
        id: c.id,
        name: c.name,
        image: c.spec.image,
        state: c.state,
        status: c.state === 'running' ? 'Up 1 minute' : `Exited (${c.exitCode})`,
        labels: c.spec.labels,
        healthStatus: c.health?.status ?? null,
      }));
  }

  async inspectContainer(idOrName: string): Promise<ContainerInspection | null> {
    this.record('inspectContainer', idOrName);
    const c = this.find(idOrName);
    if (!c) return null;
    return {
      id: c.id,
      name: c.name,
      image: c.spec.image,
      state: {
        status: c.state,
        running: c.state === 'running',
        exitCode: c.exitCode,
        restartCount: c.restartCount,
        health: c.health,
      },
      env: c.spec.env,
      labels: c.spec.labels,
      exposedPorts: c.spec.exposedPorts,
      binds: c.spec.binds,
      portBindings: c.spec.portBindings,
      restartPolicy: c.spec.restartPolicy,
      networkMode: c.spec.networkMode,
      networks: Object.fromEntries([...c.networks].map(([name, aliases]) => [name, { aliases, ipAddress: null }])),
    };
  }

  async createContainer(spec: ContainerSpec): Promise<string> {
    this.record('createContainer', spec.name);
    if (this.containers.has(spec.name)) {
      throw new RuntimeError('conflict', `Container name ${spec.name} is already in use`, 409);
    }
    return this.addContainer(spec, 'created').id;
  }

  async startContainer(idOrName: string): Promise<void> {
    this.record('startContainer', idOrName);
    const c = this.require(idOrName);
    if (c.spec.labels['stackwright.lifecycle'] === 'init') {
      c.state = 'exited';
      c.exitCode = this.exitCodes.get(c.name) ?? 0;
    } else if (this.crashOnStart.has(c.name)) {
      c.state = 'exited';
      c.exitCode = 1;
    } else {
      c.state = 'running';
    }
  }

  async stopContainer(idOrName: string): Promise<void> {
    this.record('stopContainer', idOrName);
    const c = this.require(idOrName);
    if (c.state === 'running') {
      c.state = 'exited';
      c.exitCode = 0;
    }
  }

  async removeContainer(idOrName: string): Promise<void> {
    this.record('removeContainer', idOrName);
    const c = this.require(idOrName);
    this.containers.delete(c.name);
  }

  async renameContainer(idOrName: string, newName: string): Promise<void> {
    this.record('renameContainer', `${idOrName}->${newName}`);
    const c = this.require(idOrName);
    if (this.containers.has(newName)) {
      throw new RuntimeError('conflict', `Container name ${newName} is already in use`, 409);
    }
    this.containers.delete(c.name);
    c.name = newName;
    c.spec = { ...c.spec, name: newName };
    this.containers.set(newName, c);
  }

  async containerLogs(idOrName: string): Promise<string> {
    this.record('containerLogs', idOrName);
    this.require(idOrName);
    return `logs of ${idOrName}`;
  }

  async listNetworks(): Promise<string[]> {
    this.record('listNetworks', '');
    return [...this.networks];
  }

  async createNetwork(name: string): Promise<void> {
    this.record('createNetwork', name);
    this.networks.add(name);
  }

  async connectNetwork(network: string, container: string, aliases: string[]): Promise<void> {
    this.record('connectNetwork', `${container}@${network}`);
    this.require(container).networks.set(network, aliases);
  }

  async pullImage(reference: string, auth?: RegistryAuth): Promise<void> {
    this.record('pullImage', reference);
    if (this.unpullable.has(reference)) {
      throw new RuntimeError('not-found', `manifest for ${reference} not found`, 404);
    }
    this.pulls.push({ reference, ...(auth ? { auth } : {}) });
    this.localImages.add(reference);
  }

  async imageExists(reference: string): Promise<boolean> {
    this.record('imageExists', reference);
    return this.localImages.has(reference);
  }
}
