/**
 * Port to a container host. The engine only ever talks to this interface;
 * DockerRuntime implements it over the Docker Engine API and tests use
 * FakeRuntime.
 */

export type RuntimeErrorCode = 'not-found' | 'conflict' | 'unauthorized' | 'transient' | 'timeout' | 'unknown';

export class RuntimeError extends Error {
  readonly code: RuntimeErrorCode;
  readonly statusCode: number | null;

  constructor(code: RuntimeErrorCode, message: string, statusCode: number | null = null) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export function isRuntimeError(err: unknown, code?: RuntimeErrorCode): err is RuntimeError {
  return err instanceof RuntimeError && (code === undefined || err.code === code);
}

export interface PortBinding {
  hostIp?: string;
  hostPort: string;
}

export type RestartPolicyName = 'no' | 'always' | 'unless-stopped' | 'on-failure';

export interface ContainerSpec {
  name: string;
  image: string;
  /** `KEY=value` entries */
  env: string[];
  labels: Record<string, string>;
  /** Keys like `80/tcp` */
  exposedPorts: string[];
  portBindings: Record<string, PortBinding[]>;
  /** `source:target[:mode]` entries */
  binds: string[];
  restartPolicy: { name: RestartPolicyName; maximumRetryCount?: number };
  /** Primary network, or `host` / `bridge` */
  networkMode: string;
  networkAliases: string[];
  autoRemove?: boolean;
}

export interface ContainerSummary {
  id: string;
  name: string;
  image: string;
  /** created, running, paused, restarting, exited, dead, removing */
  state: string;
  status: string;
  labels: Record<string, string>;
  /** starting, healthy or unhealthy when the image defines a HEALTHCHECK */
  healthStatus: string | null;
}

export interface ContainerInspection {
  id: string;
  name: string;
  image: string;
  state: {
    status: string;
    running: boolean;
    exitCode: number;
    restartCount: number;
    health: { status: string; failingStreak: number } | null;
  };
  env: string[];
  labels: Record<string, string>;
  exposedPorts: string[];
  binds: string[];
  portBindings: Record<string, PortBinding[]>;
  restartPolicy: { name: RestartPolicyName; maximumRetryCount?: number };
  networkMode: string;
  networks: Record<string, { aliases: string[]; ipAddress: string | null }>;
}

export interface ContainerFilter {
  labels?: Record<string, string>;
  name?: string;
}

export interface RegistryAuth {
  username: string;
  password: string;
  serveraddress: string;
}

export interface ContainerRuntime {
  listContainers(filter?: ContainerFilter): Promise<ContainerSummary[]>;
  /** Resolves null when the container does not exist. */
  inspectContainer(idOrName: string): Promise<ContainerInspection | null>;
  createContainer(spec: ContainerSpec): Promise<string>;
  startContainer(idOrName: string): Promise<void>;
  stopContainer(idOrName: string, timeoutSeconds?: number): Promise<void>;
  removeContainer(idOrName: string, options?: { force?: boolean }): Promise<void>;
  renameContainer(idOrName: string, newName: string): Promise<void>;
  containerLogs(idOrName: string, tail: number): Promise<string>;

  listNetworks(): Promise<string[]>;
  createNetwork(name: string, labels: Record<string, string>): Promise<void>;
  connectNetwork(network: string, container: string, aliases: string[]): Promise<void>;

  pullImage(reference: string, auth?: RegistryAuth): Promise<void>;
  imageExists(reference: string): Promise<boolean>;
}
