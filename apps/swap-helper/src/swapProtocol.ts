import type { SwapInstructions, SwapOutcomeStatus } from '@stackwright/shared';
import type { Logger } from './logger.js';

export const PREVIOUS_SUFFIX = '-previous';

export interface SwapContainerState {
  running: boolean;
  status: string;
}

/**
 * The container operations the swap needs. Removing or inspecting a
 * container that does not exist is not an error.
 */
export interface SwapRuntime {
  inspect(name: string): Promise<SwapContainerState | null>;
  stop(name: string, timeoutSeconds: number): Promise<void>;
  start(name: string): Promise<void>;
  rename(name: string, newName: string): Promise<void>;
  remove(name: string): Promise<void>;
}

/** Shown on the orchestrator's port while no orchestrator is listening. */
export interface StatusPage {
  open(): Promise<void>;
  close(): Promise<void>;
}

export interface SwapDependencies {
  runtime: SwapRuntime;
  log: Logger;
  /** Resolves true once the URL answers with a 2xx status */
  probe: (url: string) => Promise<boolean>;
  sleep: (ms: number) => Promise<void>;
  now?: () => number;
  pollIntervalMs?: number;
  statusPage?: StatusPage | null;
}

export interface SwapOutcome {
  status: SwapOutcomeStatus;
  error: string | null;
}

interface Progress {
  stoppedOld: boolean;
  renamedOld: boolean;
  renamedNew: boolean;
  startedNew: boolean;
}

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Swap the old container for the prepared one, keeping the old name so
 * anything addressing the orchestrator by name keeps working:
 *
 * 1. stop the old container and park it as `<old>-previous`
 * 2. rename the new container to the old name and start it
 * 3. wait until it is running, and answering its readiness URL if one is set
 * 4. remove the parked container
 *
 * If any of 1-3 fails, the steps taken are undone in reverse and the old
 * container is started again.
 */
export async function runSwap(instructions: SwapInstructions, deps: SwapDependencies): Promise<SwapOutcome> {
  const { runtime, log } = deps;
  const { oldContainer, newContainer } = instructions;
  const previous = `${oldContainer}${PREVIOUS_SUFFIX}`;
  const progress: Progress = { stoppedOld: false, renamedOld: false, renamedNew: false, startedNew: false };

  const prepared = await runtime.inspect(newContainer);
  if (!prepared) {
    const error = `Replacement container ${newContainer} does not exist`;
    log.error({ newContainer }, error);
    return { status: 'failed', error };
  }

  log.info({ oldContainer, newContainer }, 'Starting swap');
  try {
    await runtime.remove(previous);

    await runtime.stop(oldContainer, instructions.stopTimeoutSeconds);
    progress.stoppedOld = true;
    await openStatusPage(deps);

    await runtime.rename(oldContainer, previous);
    progress.renamedOld = true;
    await runtime.rename(newContainer, oldContainer);
    progress.renamedNew = true;

    await closeStatusPage(deps);
    await runtime.start(oldContainer);
    progress.startedNew = true;

    await waitUntilReady(instructions, deps);
  } catch (err) {
    const error = message(err);
    log.error({ err: error, progress }, 'Swap failed, restoring the previous container');
    const restored = await restore(instructions, deps, progress);
    return { status: restored ? 'restored' : 'failed', error };
  }

  try {
    await runtime.remove(previous);
  } catch (err) {
    log.warn({ previous, err: message(err) }, 'Could not remove the previous container');
  }

  log.info({ container: oldContainer }, 'Swap complete');
  return { status: 'swapped', error: null };
}

async function waitUntilReady(instructions: SwapInstructions, deps: SwapDependencies): Promise<void> {
  const now = deps.now ?? Date.now;
  const interval = deps.pollIntervalMs ?? 1000;
  const deadline = now() + instructions.readinessTimeoutMs;
  const name = instructions.oldContainer;

  for (;;) {
    const state = await deps.runtime.inspect(name);
    if (!state) {
      throw new Error(`Container ${name} disappeared after start`);
    }
    if (state.status === 'exited' || state.status === 'dead') {
      throw new Error(`New container exited during startup (${state.status})`);
    }
    if (state.running && (!instructions.readinessUrl || await deps.probe(instructions.readinessUrl))) {
      return;
    }
    if (now() >= deadline) {
      throw new Error(`New container not ready within ${instructions.readinessTimeoutMs}ms`);
    }
    await deps.sleep(interval);
  }
}

/**
 * Undo a partial swap. Every undo step is attempted even if an earlier
 * one fails; returns true when the old container runs again.
 */
async function restore(instructions: SwapInstructions, deps: SwapDependencies, progress: Progress): Promise<boolean> {
  const { runtime, log } = deps;
  const { oldContainer, newContainer } = instructions;
  const previous = `${oldContainer}${PREVIOUS_SUFFIX}`;
  let ok = true;

  const attempt = async (description: string, fn: () => Promise<void>): Promise<void> => {
    try {
      await fn();
    } catch (err) {
      ok = false;
      log.error({ step: description, err: message(err) }, 'Restore step failed');
    }
  };

  await closeStatusPage(deps);
  if (progress.startedNew) {
    await attempt('stop new container', () => runtime.stop(oldContainer, instructions.stopTimeoutSeconds));
  }
  if (progress.renamedNew) {
    await attempt('rename new container back', () => runtime.rename(oldContainer, newContainer));
  }
  if (progress.renamedOld) {
    await attempt('rename old container back', () => runtime.rename(previous, oldContainer));
  }
  if (progress.stoppedOld) {
    await attempt('start old container', () => runtime.start(oldContainer));
  }

  if (ok) {
    log.warn({ oldContainer }, 'Previous container restored');
  }
  return ok;
}

async function openStatusPage(deps: SwapDependencies): Promise<void> {
  if (!deps.statusPage) return;
  try {
    await deps.statusPage.open();
  } catch (err) {
    deps.log.warn({ err: message(err) }, 'Status page could not be opened');
  }
}

async function closeStatusPage(deps: SwapDependencies): Promise<void> {
  if (!deps.statusPage) return;
  try {
    await deps.statusPage.close();
  } catch (err) {
    deps.log.warn({ err: message(err) }, 'Status page could not be closed');
  }
}
