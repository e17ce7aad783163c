import { z } from 'zod';
import type { StackDescription } from '../types/stack.js';

// host-ip:host:container/proto, every part but the container port optional
const PORT_MAPPING_PATTERN = /^(?:(?:\d{1,3}(?:\.\d{1,3}){3}|\[[0-9a-fA-F:]+\]):)?(?:\d{1,5}(?:-\d{1,5})?:)?\d{1,5}(?:-\d{1,5})?(?:\/(?:tcp|udp|sctp))?$/;

const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_.]*$/;

const nameSchema = z.string().trim().min(1, 'Name must not be empty').max(128);

export const ServiceHealthCheckSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('http'),
    path: z.string().startsWith('/', 'Health check path must start with /'),
    port: z.number().int().min(1).max(65535).optional(),
    useHttps: z.boolean().optional(),
    timeoutSeconds: z.number().positive().max(120).optional(),
    expectedStatusCodes: z.array(z.number().int().min(100).max(599)).min(1).optional(),
  }),
  z.object({ type: z.literal('docker') }),
  z.object({ type: z.literal('none') }),
]);

export const ServiceDescriptionSchema = z.object({
  name: nameSchema,
  image: z.string().trim().min(1, 'Image must not be empty'),
  version: z.string().trim().min(1).optional(),
  containerName: nameSchema.optional(),
  internal: z.boolean().optional(),
  lifecycle: z.enum(['service', 'init']).optional(),
  env: z.record(z.string().regex(ENV_NAME_PATTERN, 'Invalid environment variable name'), z.string()).optional(),
  ports: z.array(z.string().regex(PORT_MAPPING_PATTERN, 'Invalid port mapping')).optional(),
  volumes: z.record(z.string().min(1), z.string().startsWith('/', 'Volume target must be an absolute path')).optional(),
  dependsOn: z.array(nameSchema).optional(),
  networks: z.array(nameSchema).optional(),
  ignoreInMaintenance: z.boolean().optional(),
  healthCheck: ServiceHealthCheckSchema.optional(),
});

export const MaintenanceObserverSchema = z.object({
  url: z.string().url(),
  jsonPath: z.string().trim().min(1).optional(),
  maintenanceValue: z.string().trim().min(1, 'Maintenance value must not be empty'),
  normalValue: z.string().trim().min(1).optional(),
  pollingIntervalSeconds: z.number().int().positive().max(86_400).optional(),
  timeoutSeconds: z.number().positive().max(120).optional(),
});

export const NetworkDeclarationSchema = z.object({
  external: z.boolean().optional(),
  name: nameSchema.optional(),
});

export const StackDescriptionSchema: z.ZodType<StackDescription> = z.object({
  name: nameSchema,
  version: z.string().trim().min(1, 'Version must not be empty'),
  services: z.array(ServiceDescriptionSchema).min(1, 'A stack needs at least one service'),
  networks: z.record(nameSchema, NetworkDeclarationSchema).optional(),
  volumes: z.record(nameSchema, NetworkDeclarationSchema).optional(),
  ingress: nameSchema.optional(),
  features: z.record(z.string().min(1), z.boolean()).optional(),
  rollbackDisabled: z.boolean().optional(),
  healthEndpoints: z.object({
    bus: z.string().url().optional(),
    infra: z.string().url().optional(),
  }).optional(),
  maintenanceObserver: MaintenanceObserverSchema.optional(),
});

export const DeploymentContextSchema = z.object({
  organizationId: z.string().min(1).optional(),
  features: z.record(z.string().min(1), z.boolean()).optional(),
});

/**
 * Flatten zod issues into `path: message` lines for error responses.
 */
export function formatSchemaIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
