/**
 * Zod schemas for events sent by dashboard clients.
 */

import { z } from 'zod';
import { wsLogger } from '../lib/logger.js';

export const SubscriptionSchema = z.object({
  environmentId: z.string().min(1).max(128).optional(),
  operationId: z.string().uuid('operationId must be a valid UUID').optional(),
}).refine(data => data.environmentId !== undefined || data.operationId !== undefined, {
  message: 'environmentId or operationId is required',
});

export type ValidatedSubscription = z.infer<typeof SubscriptionSchema>;

/**
 * Validate an incoming client payload. Returns null and logs when it does
 * not match.
 */
export function validateClientEvent<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  eventName: string,
  clientIp?: string
): T | null {
  const result = schema.safeParse(data);
  if (!result.success) {
    wsLogger.warn({
      clientIp,
      eventName,
      errors: result.error.issues.slice(0, 3),
    }, 'Invalid WebSocket event payload');
    return null;
  }
  return result.data;
}
