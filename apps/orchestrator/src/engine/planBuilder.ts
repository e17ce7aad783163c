import type {
  DeploymentContext,
  DeploymentPlan,
  DeploymentStep,
  ServiceDescription,
  StackDescription,
} from '@stackwright/shared';
import { PlanValidationError } from '../lib/errors.js';
import { containerName, featureEnvName, volumeName } from './naming.js';
import { imageWithTag } from './imageReference.js';
import { DEFAULT_NETWORK, resolveNetworks } from './networkResolver.js';

export const GLOBAL_ENV = {
  organizationId: 'STACKWRIGHT_ORG_ID',
  environmentId: 'STACKWRIGHT_ENVIRONMENT_ID',
  stackName: 'STACKWRIGHT_STACK_NAME',
  stackVersion: 'STACKWRIGHT_STACK_VERSION',
} as const;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Turn a stack description into an ordered, immutable deployment plan.
 *
 * Services are ordered so that every dependency comes first; among services
 * that are ready at the same time the declared order wins. The ingress
 * service, when named, always comes last. Throws PlanValidationError for
 * duplicate names, unknown dependencies or networks, and cycles.
 */
export function buildDeploymentPlan(
  description: StackDescription,
  context: DeploymentContext,
  now: Date = new Date()
): DeploymentPlan {
  validateServices(description);

  const ordered = orderServices(description.services, description.ingress);

  const needsDefault = !description.networks
    || description.services.some(s => !s.networks || s.networks.length === 0 || s.networks.includes(DEFAULT_NETWORK));
  const networks = resolveNetworks(description.name, description.networks, { includeDefault: needsDefault });

  const globalEnvVars = buildGlobalEnv(description, context);

  const steps: DeploymentStep[] = ordered.map((service, index) => {
    const { image, tag, reference } = imageWithTag(service.image, service.version);
    const logicalNetworks = service.networks && service.networks.length > 0 ? service.networks : [DEFAULT_NETWORK];
    return {
      order: index + 1,
      serviceName: service.name,
      containerName: service.containerName ?? containerName(description.name, service.name),
      image,
      tag,
      reference,
      lifecycle: service.lifecycle ?? 'service',
      internal: service.internal ?? false,
      envVars: { ...globalEnvVars, ...service.env },
      ports: [...(service.ports ?? [])],
      volumes: resolveVolumes(description, service),
      networks: logicalNetworks.map(n => networks[n].resolvedName),
      dependsOn: [...new Set(service.dependsOn ?? [])],
      ignoreInMaintenance: service.ignoreInMaintenance ?? false,
      ...(service.healthCheck ? { healthCheck: { ...service.healthCheck } } : {}),
    };
  });

  return deepFreeze({
    stackName: description.name,
    stackVersion: description.version,
    environmentId: context.environmentId,
    steps,
    networks,
    globalEnvVars,
    healthEndpoints: { ...description.healthEndpoints },
    maintenanceObserver: description.maintenanceObserver ? { ...description.maintenanceObserver } : null,
    rollbackDisabled: description.rollbackDisabled ?? false,
    createdAt: now.toISOString(),
  });
}

function validateServices(description: StackDescription): void {
  const names = new Set<string>();
  const duplicates = new Set<string>();
  for (const service of description.services) {
    if (names.has(service.name)) duplicates.add(service.name);
    names.add(service.name);
  }
  if (duplicates.size > 0) {
    const list = [...duplicates].sort();
    throw new PlanValidationError('DUPLICATE_SERVICE', `Duplicate service names: ${list.join(', ')}`, list);
  }

  if (description.ingress !== undefined && !names.has(description.ingress)) {
    throw new PlanValidationError(
      'INGRESS_NOT_FOUND',
      `Ingress service '${description.ingress}' is not part of the stack`,
      [description.ingress]
    );
  }

  const missing: string[] = [];
  for (const service of description.services) {
    for (const dep of service.dependsOn ?? []) {
      if (!names.has(dep)) missing.push(`${service.name} -> ${dep}`);
    }
  }
  if (missing.length > 0) {
    throw new PlanValidationError('DEPENDENCY_MISSING', `Unknown dependencies: ${missing.join(', ')}`, missing);
  }

  const declaredNetworks = new Set(Object.keys(description.networks ?? {}));
  declaredNetworks.add(DEFAULT_NETWORK);
  const undeclared: string[] = [];
  for (const service of description.services) {
    for (const network of service.networks ?? []) {
      if (!declaredNetworks.has(network)) undeclared.push(`${service.name} -> ${network}`);
    }
  }
  if (undeclared.length > 0) {
    throw new PlanValidationError('NETWORK_NOT_DECLARED', `Undeclared networks: ${undeclared.join(', ')}`, undeclared);
  }

  if (description.ingress !== undefined) {
    const ingress = description.ingress;
    const dependents = description.services
      .filter(s => s.dependsOn?.includes(ingress))
      .map(s => s.name)
      .sort();
    if (dependents.length > 0) {
      throw new PlanValidationError(
        'INGRESS_DEPENDED_ON',
        `Ingress service '${ingress}' must deploy last but is a dependency of: ${dependents.join(', ')}`,
        dependents
      );
    }
  }
}

/**
 * Kahn's algorithm over the non-ingress services, picking the earliest
 * declared service among those whose dependencies are all placed.
 */
function orderServices(services: ServiceDescription[], ingress: string | undefined): ServiceDescription[] {
  const graph = services.filter(s => s.name !== ingress);
  const position = new Map(graph.map((s, i) => [s.name, i]));
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const service of graph) {
    const deps = [...new Set(service.dependsOn ?? [])];
    inDegree.set(service.name, deps.length);
    for (const dep of deps) {
      const list = dependents.get(dep) ?? [];
      list.push(service.name);
      dependents.set(dep, list);
    }
  }

  const byPosition = (a: string, b: string): number => (position.get(a) ?? 0) - (position.get(b) ?? 0);
  const ready = graph.filter(s => inDegree.get(s.name) === 0).map(s => s.name);
  const ordered: string[] = [];

  while (ready.length > 0) {
    ready.sort(byPosition);
    const next = ready.shift();
    if (next === undefined) break;
    ordered.push(next);
    for (const dependent of dependents.get(next) ?? []) {
      const remaining = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, remaining);
      if (remaining === 0) ready.push(dependent);
    }
  }

  if (ordered.length < graph.length) {
    const members = cycleMembers(graph, new Set(ordered));
    throw new PlanValidationError('DEPENDENCY_CYCLE', `Dependency cycle between: ${members.join(', ')}`, members);
  }

  const byName = new Map(services.map(s => [s.name, s]));
  const result: ServiceDescription[] = [];
  for (const name of ordered) {
    const service = byName.get(name);
    if (service) result.push(service);
  }
  const ingressService = ingress === undefined ? undefined : byName.get(ingress);
  if (ingressService) result.push(ingressService);
  return result;
}

/**
 * Services left unplaced by the sort include the cycles themselves plus
 * anything that merely depends on them; peel off the latter by repeatedly
 * dropping services nothing else in the remainder depends on.
 */
function cycleMembers(services: ServiceDescription[], placed: Set<string>): string[] {
  const remaining = new Set(services.map(s => s.name).filter(n => !placed.has(n)));
  const depsOf = new Map(services.map(s => [s.name, s.dependsOn ?? []]));

  let changed = true;
  while (changed) {
    changed = false;
    for (const name of remaining) {
      const neededByOthers = [...remaining].some(other => other !== name && (depsOf.get(other) ?? []).includes(name));
      const selfLoop = (depsOf.get(name) ?? []).includes(name);
      if (!neededByOthers && !selfLoop) {
        remaining.delete(name);
        changed = true;
      }
    }
  }

  return [...remaining].sort();
}

function buildGlobalEnv(description: StackDescription, context: DeploymentContext): Record<string, string> {
  const env: Record<string, string> = {
    [GLOBAL_ENV.environmentId]: context.environmentId,
    [GLOBAL_ENV.stackName]: description.name,
    [GLOBAL_ENV.stackVersion]: description.version,
  };
  if (context.organizationId) {
    env[GLOBAL_ENV.organizationId] = context.organizationId;
  }

  const features = { ...description.features, ...context.features };
  for (const name of Object.keys(features).sort()) {
    env[featureEnvName(name)] = String(features[name]);
  }
  return env;
}

function resolveVolumes(description: StackDescription, service: ServiceDescription): Record<string, string> {
  const volumes: Record<string, string> = {};
  for (const [source, target] of Object.entries(service.volumes ?? {})) {
    if (source.startsWith('/') || source.startsWith('.') || source.startsWith('~')) {
      volumes[source] = target;
      continue;
    }
    const declaration = description.volumes?.[source];
    const resolved = declaration?.external ? declaration.name ?? source : volumeName(description.name, source);
    volumes[resolved] = target;
  }
  return volumes;
}
