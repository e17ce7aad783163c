import { z } from 'zod';
import { SWAP_ENV, type SwapInstructions } from '@stackwright/shared';

const SwapEnvSchema = z.object({
  [SWAP_ENV.oldContainer]: z.string().min(1),
  [SWAP_ENV.newContainer]: z.string().min(1),
  [SWAP_ENV.stopTimeoutSeconds]: z.coerce.number().int().positive().default(10),
  [SWAP_ENV.readinessTimeoutMs]: z.coerce.number().int().positive().default(120_000),
  [SWAP_ENV.readinessUrl]: z.string().url().optional(),
  [SWAP_ENV.statusPagePort]: z.coerce.number().int().min(1).max(65535).optional(),
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid swap helper environment: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export interface HelperConfig {
  instructions: SwapInstructions;
  dockerSocketPath: string;
  readinessPollIntervalMs: number;
}

/**
 * Read the swap instructions the orchestrator passed in the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HelperConfig {
  const parsed = SwapEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const values = parsed.data;

  if (values[SWAP_ENV.oldContainer] === values[SWAP_ENV.newContainer]) {
    throw new ConfigError([`${SWAP_ENV.newContainer}: must differ from ${SWAP_ENV.oldContainer}`]);
  }

  return {
    instructions: {
      oldContainer: values[SWAP_ENV.oldContainer],
      newContainer: values[SWAP_ENV.newContainer],
      stopTimeoutSeconds: values[SWAP_ENV.stopTimeoutSeconds],
      readinessTimeoutMs: values[SWAP_ENV.readinessTimeoutMs],
      readinessUrl: values[SWAP_ENV.readinessUrl] ?? null,
      statusPagePort: values[SWAP_ENV.statusPagePort] ?? null,
    },
    dockerSocketPath: env.DOCKER_SOCKET || '/var/run/docker.sock',
    readinessPollIntervalMs: parseInt(env.READINESS_POLL_INTERVAL_MS || '1000', 10),
  };
}
