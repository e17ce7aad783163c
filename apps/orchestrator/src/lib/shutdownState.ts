/**
 * Shutdown flag shared by the entry point and the health endpoint.
 */

let isShuttingDown = false;

/**
 * Health endpoints answer 503 once this is set.
 */
export function isServerShuttingDown(): boolean {
  return isShuttingDown;
}

export function setServerShuttingDown(value: boolean): void {
  isShuttingDown = value;
}
