/**
 * Container and network names, and the labels that mark containers as
 * managed by stackwright.
 */

export const LABELS = {
  stack: 'stackwright.stack',
  service: 'stackwright.service',
  context: 'stackwright.context',
  environment: 'stackwright.environment',
  version: 'stackwright.version',
  lifecycle: 'stackwright.lifecycle',
  maintenanceIgnore: 'stackwright.maintenance-ignore',
  managed: 'stackwright.managed',
} as const;

/**
 * Reduce a name to the characters Docker accepts: `[a-zA-Z0-9][a-zA-Z0-9_.-]*`.
 */
export function sanitizeName(name: string): string {
  const sanitized = name
    .replace(/[^a-zA-Z0-9_.-]/g, '_')
    .replace(/^[^a-zA-Z0-9]+/, '')
    .replace(/_+/g, '_')
    .replace(/_+$/, '');
  return sanitized || 'unnamed';
}

export function containerName(stackName: string, serviceName: string): string {
  return `${sanitizeName(stackName)}_${sanitizeName(serviceName)}`;
}

export function networkName(stackName: string, logicalName: string): string {
  return `${sanitizeName(stackName)}_${sanitizeName(logicalName)}`;
}

export function volumeName(stackName: string, logicalName: string): string {
  return `${sanitizeName(stackName)}_${sanitizeName(logicalName)}`;
}

/**
 * `STACKWRIGHT_FEATURE_<NAME>` with the flag name upper-cased and reduced
 * to `[A-Z0-9_]`.
 */
export function featureEnvName(feature: string): string {
  return `STACKWRIGHT_FEATURE_${feature.toUpperCase().replace(/[^A-Z0-9]+/g, '_').replace(/^_+|_+$/g, '')}`;
}
