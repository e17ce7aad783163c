/** Environment variables the orchestrator hands to the swap helper container. */
export const SWAP_ENV = {
  oldContainer: 'OLD_CONTAINER',
  newContainer: 'NEW_CONTAINER',
  stopTimeoutSeconds: 'STOP_TIMEOUT_SECONDS',
  readinessTimeoutMs: 'READINESS_TIMEOUT_MS',
  readinessUrl: 'READINESS_URL',
  statusPagePort: 'STATUS_PAGE_PORT',
} as const;

export interface SwapInstructions {
  oldContainer: string;
  newContainer: string;
  stopTimeoutSeconds: number;
  readinessTimeoutMs: number;
  readinessUrl: string | null;
  statusPagePort: number | null;
}

export type SwapOutcomeStatus = 'swapped' | 'restored' | 'failed';

/** Encode instructions as container env entries (`KEY=value`). */
export function encodeSwapInstructions(instructions: SwapInstructions): string[] {
  const env = [
    `${SWAP_ENV.oldContainer}=${instructions.oldContainer}`,
    `${SWAP_ENV.newContainer}=${instructions.newContainer}`,
    `${SWAP_ENV.stopTimeoutSeconds}=${instructions.stopTimeoutSeconds}`,
    `${SWAP_ENV.readinessTimeoutMs}=${instructions.readinessTimeoutMs}`,
  ];
  if (instructions.readinessUrl) {
    env.push(`${SWAP_ENV.readinessUrl}=${instructions.readinessUrl}`);
  }
  if (instructions.statusPagePort !== null) {
    env.push(`${SWAP_ENV.statusPagePort}=${instructions.statusPagePort}`);
  }
  return env;
}
