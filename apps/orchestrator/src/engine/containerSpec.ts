import type { DeploymentPlan, DeploymentStep } from '@stackwright/shared';
import type { ContainerSpec, PortBinding } from '../runtime/types.js';
import { LABELS } from './naming.js';

export interface PortMapping {
  /** e.g. `80/tcp` */
  containerPort: string;
  hostIp?: string;
  hostPort?: string;
}

function expandRange(range: string): string[] {
  const [start, end] = range.split('-').map(p => parseInt(p, 10));
  if (end === undefined || Number.isNaN(end)) return [String(start)];
  const ports: string[] = [];
  for (let p = start; p <= end; p++) ports.push(String(p));
  return ports;
}

/**
 * Parse `[host-ip:][host-port:]container-port[/protocol]`, expanding port
 * ranges into one mapping per port.
 */
export function parsePortMapping(mapping: string): PortMapping[] {
  let rest = mapping.trim();
  let protocol = 'tcp';
  const slash = rest.lastIndexOf('/');
  if (slash !== -1) {
    protocol = rest.slice(slash + 1);
    rest = rest.slice(0, slash);
  }

  let hostIp: string | undefined;
  if (rest.startsWith('[')) {
    const close = rest.indexOf(']');
    hostIp = rest.slice(1, close);
    rest = rest.slice(close + 2);
  } else {
    const parts = rest.split(':');
    if (parts.length === 3) {
      hostIp = parts[0];
      rest = `${parts[1]}:${parts[2]}`;
    }
  }

  const [first, second] = rest.split(':');
  const containerPorts = expandRange(second ?? first);
  const hostPorts = second === undefined ? [] : expandRange(first);

  return containerPorts.map((port, i) => ({
    containerPort: `${port}/${protocol}`,
    ...(hostIp ? { hostIp } : {}),
    ...(hostPorts[i] ? { hostPort: hostPorts[i] } : {}),
  }));
}

export function stackLabels(plan: DeploymentPlan, step: DeploymentStep): Record<string, string> {
  const labels: Record<string, string> = {
    [LABELS.managed]: 'true',
    [LABELS.stack]: plan.stackName,
    [LABELS.service]: step.serviceName,
    [LABELS.context]: step.serviceName,
    [LABELS.environment]: plan.environmentId,
    [LABELS.version]: plan.stackVersion,
    [LABELS.lifecycle]: step.lifecycle,
  };
  if (step.ignoreInMaintenance) {
    labels[LABELS.maintenanceIgnore] = 'true';
  }
  return labels;
}

/**
 * Container definition for one plan step. Services restart unless stopped;
 * init containers only restart on failure. Internal services expose their
 * ports to the stack networks but publish nothing on the host.
 */
export function toContainerSpec(plan: DeploymentPlan, step: DeploymentStep): ContainerSpec {
  const exposedPorts = new Set<string>();
  const portBindings: Record<string, PortBinding[]> = {};

  for (const mapping of step.ports.flatMap(parsePortMapping)) {
    exposedPorts.add(mapping.containerPort);
    if (step.internal || !mapping.hostPort) continue;
    const bindings = portBindings[mapping.containerPort] ?? [];
    bindings.push({ hostPort: mapping.hostPort, ...(mapping.hostIp ? { hostIp: mapping.hostIp } : {}) });
    portBindings[mapping.containerPort] = bindings;
  }

  return {
    name: step.containerName,
    image: step.reference,
    env: Object.entries(step.envVars).map(([key, value]) => `${key}=${value}`),
    labels: stackLabels(plan, step),
    exposedPorts: [...exposedPorts],
    portBindings,
    binds: Object.entries(step.volumes).map(([source, target]) => `${source}:${target}`),
    restartPolicy: step.lifecycle === 'init'
      ? { name: 'on-failure', maximumRetryCount: 3 }
      : { name: 'unless-stopped' },
    networkMode: step.networks[0] ?? 'bridge',
    networkAliases: [step.serviceName],
  };
}
