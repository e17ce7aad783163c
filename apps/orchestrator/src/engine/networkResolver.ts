import type { NetworkDeclaration, NetworkDefinition } from '@stackwright/shared';
import { networkName } from './naming.js';

export const DEFAULT_NETWORK = 'default';

/**
 * Map logical network names to concrete ones. Managed networks get the stack
 * prefix; external networks keep their own name and are never created.
 * Pure: the same inputs always produce the same mapping.
 */
export function resolveNetworks(
  stackName: string,
  declarations: Record<string, NetworkDeclaration> | undefined,
  options: { includeDefault: boolean }
): Record<string, NetworkDefinition> {
  const resolved: Record<string, NetworkDefinition> = {};

  for (const [logical, declaration] of Object.entries(declarations ?? {})) {
    resolved[logical] = declaration.external
      ? { external: true, resolvedName: declaration.name ?? logical }
      : { external: false, resolvedName: networkName(stackName, logical) };
  }

  if (options.includeDefault && !resolved[DEFAULT_NETWORK]) {
    resolved[DEFAULT_NETWORK] = { external: false, resolvedName: networkName(stackName, DEFAULT_NETWORK) };
  }

  return resolved;
}

export interface NetworkActions {
  create: string[];
  present: string[];
  /** External networks the host does not have */
  missingExternal: string[];
}

/**
 * Decide which of `required` must be created given the networks that already
 * exist on the host.
 */
export function planNetworkActions(
  networks: Record<string, NetworkDefinition>,
  required: string[],
  existing: Iterable<string>
): NetworkActions {
  const existingNames = new Set(existing);
  const byResolvedName = new Map(Object.values(networks).map(n => [n.resolvedName, n]));
  const actions: NetworkActions = { create: [], present: [], missingExternal: [] };

  for (const name of new Set(required)) {
    if (existingNames.has(name)) {
      actions.present.push(name);
    } else if (byResolvedName.get(name)?.external) {
      actions.missingExternal.push(name);
    } else {
      actions.create.push(name);
    }
  }

  return actions;
}
