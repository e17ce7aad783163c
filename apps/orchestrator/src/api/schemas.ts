/**
 * Request body and query schemas for the HTTP API.
 */

import { z } from 'zod';
import { DeploymentContextSchema, StackDescriptionSchema } from '@stackwright/shared';

export const DeployRequestSchema = DeploymentContextSchema.extend({
  description: StackDescriptionSchema,
});

export const MaintenanceRequestSchema = z.object({
  enabled: z.boolean(),
});

export const SelfUpdateRequestSchema = z.object({
  version: z.string().min(1).max(128).regex(/^[\w][\w.-]*$/, 'version must be a valid image tag'),
});

export const HealthHistoryQuerySchema = z.object({
  since: z.string().datetime({ offset: true }).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(500),
});

export type DeployRequest = z.infer<typeof DeployRequestSchema>;
