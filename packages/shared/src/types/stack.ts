export type ServiceLifecycle = 'service' | 'init';

export type ServiceHealthCheck =
  | {
      type: 'http';
      path: string;
      port?: number;
      useHttps?: boolean;
      timeoutSeconds?: number;
      expectedStatusCodes?: number[];
    }
  | { type: 'docker' }
  | { type: 'none' };

export interface ServiceDescription {
  name: string;
  image: string;
  /** Image tag; falls back to the tag embedded in `image`, then `latest`. */
  version?: string;
  containerName?: string;
  internal?: boolean;
  lifecycle?: ServiceLifecycle;
  env?: Record<string, string>;
  /** Compose-style port mappings, e.g. `8080:80` or `127.0.0.1:5432:5432/tcp`. */
  ports?: string[];
  /** Volume source (named volume or host path) mapped to a container path. */
  volumes?: Record<string, string>;
  dependsOn?: string[];
  networks?: string[];
  /** Keep this container running while the stack is in maintenance. */
  ignoreInMaintenance?: boolean;
  healthCheck?: ServiceHealthCheck;
}

export interface NetworkDeclaration {
  external?: boolean;
  /** Concrete name; only meaningful for external networks. */
  name?: string;
}

export interface VolumeDeclaration {
  external?: boolean;
  name?: string;
}

export interface HealthEndpoints {
  /** URL returning the message bus health document. */
  bus?: string;
  /** URL returning the infrastructure health document. */
  infra?: string;
}

/**
 * Polls a URL the stack's operators control and switches the stack into or
 * out of maintenance when the value found there changes.
 */
export interface MaintenanceObserverConfig {
  url: string;
  /** Dot path into a JSON response such as `status.mode`; the whole body when absent. */
  jsonPath?: string;
  /** Value meaning "in maintenance", compared case-insensitively. */
  maintenanceValue: string;
  /** When set, a value matching neither counts as a failed check. */
  normalValue?: string;
  pollingIntervalSeconds?: number;
  timeoutSeconds?: number;
}

export interface StackDescription {
  name: string;
  version: string;
  services: ServiceDescription[];
  networks?: Record<string, NetworkDeclaration>;
  volumes?: Record<string, VolumeDeclaration>;
  /** Name of the gateway service, always deployed last. */
  ingress?: string;
  features?: Record<string, boolean>;
  rollbackDisabled?: boolean;
  healthEndpoints?: HealthEndpoints;
  maintenanceObserver?: MaintenanceObserverConfig;
}

/** Per-deployment inputs that are not part of the stack description itself. */
export interface DeploymentContext {
  environmentId: string;
  organizationId?: string;
  features?: Record<string, boolean>;
}
