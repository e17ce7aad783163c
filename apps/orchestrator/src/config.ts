import { dirname, join } from 'path';
import { homedir } from 'os';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export interface EnvironmentEndpoint {
  environmentId: string;
  socketPath?: string;
  host?: string;
  port?: number;
  protocol?: 'http' | 'https';
}

/**
 * Parse `id=unix:///var/run/docker.sock,edge=tcp://10.0.0.5:2375` into
 * endpoint definitions. `tcp://` maps to plain http, `https://` to TLS.
 */
export function parseEnvironmentEndpoints(value: string): EnvironmentEndpoint[] {
  const endpoints: EnvironmentEndpoint[] = [];
  for (const entry of value.split(',').map(e => e.trim()).filter(Boolean)) {
    const eq = entry.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Invalid environment endpoint '${entry}', expected <id>=<url>`);
    }
    const environmentId = entry.slice(0, eq).trim();
    const target = entry.slice(eq + 1).trim();

    if (target.startsWith('unix://')) {
      endpoints.push({ environmentId, socketPath: target.slice('unix://'.length) });
      continue;
    }

    const url = new URL(target.replace(/^tcp:\/\//, 'http://'));
    const protocol = url.protocol === 'https:' ? 'https' : 'http';
    endpoints.push({
      environmentId,
      host: url.hostname,
      port: url.port ? parseInt(url.port, 10) : protocol === 'https' ? 2376 : 2375,
      protocol,
    });
  }
  return endpoints;
}

const dockerSocket = process.env.DOCKER_SOCKET || '/var/run/docker.sock';

export const config = {
  port: parseInt(process.env.PORT || '3001', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  database: {
    path: process.env.DATABASE_PATH || join(__dirname, '../../data/stackwright.sqlite'),
  },

  docker: {
    socketPath: dockerSocket,
    configPath: process.env.DOCKER_CONFIG_PATH || join(homedir(), '.docker', 'config.json'),
    registryUsername: process.env.REGISTRY_USERNAME || '',
    registryPassword: process.env.REGISTRY_PASSWORD || '',
    callTimeoutMs: parseInt(process.env.DOCKER_CALL_TIMEOUT_MS || '60000', 10),
    pullTimeoutMs: parseInt(process.env.DOCKER_PULL_TIMEOUT_MS || '600000', 10),
    retryAttempts: parseInt(process.env.DOCKER_RETRY_ATTEMPTS || '3', 10),
  },

  environments: parseEnvironmentEndpoints(
    process.env.STACKWRIGHT_ENVIRONMENTS || `local=unix://${dockerSocket}`
  ),

  executor: {
    stopTimeoutSeconds: parseInt(process.env.STOP_TIMEOUT_SECONDS || '10', 10),
    initTimeoutMs: parseInt(process.env.INIT_CONTAINER_TIMEOUT_MS || '300000', 10),
    initPollIntervalMs: 1000,
  },

  health: {
    pollIntervalMs: parseInt(process.env.HEALTH_POLL_INTERVAL_MS || '30000', 10),
    httpTimeoutMs: parseInt(process.env.HEALTH_HTTP_TIMEOUT_MS || '5000', 10),
    retentionHours: parseInt(process.env.HEALTH_RETENTION_HOURS || '24', 10),
    maxSnapshotsPerStack: parseInt(process.env.HEALTH_MAX_SNAPSHOTS || '2880', 10),
    /** Each stack's observer keeps its own polling interval; this is how often due checks are looked for */
    observerTickMs: parseInt(process.env.MAINTENANCE_OBSERVER_TICK_MS || '5000', 10),
  },

  selfUpdate: {
    enabled: process.env.SELF_UPDATE_ENABLED === 'true',
    environmentId: process.env.SELF_ENVIRONMENT_ID || 'local',
    /** Defaults to the container hostname, which Docker sets to the short id */
    containerId: process.env.SELF_CONTAINER_ID || '',
    image: process.env.SELF_IMAGE || 'stackwright/orchestrator',
    helperImage: process.env.SWAP_HELPER_IMAGE || 'stackwright/swap-helper:latest',
    statusPagePort: process.env.SWAP_STATUS_PORT ? parseInt(process.env.SWAP_STATUS_PORT, 10) : null,
    readinessTimeoutMs: parseInt(process.env.SWAP_READINESS_TIMEOUT_MS || '120000', 10),
    /** Probed by the swap helper from the host network once the new container runs */
    readinessUrl: process.env.SWAP_READINESS_URL || null,
  },
};

export type Config = typeof config;
