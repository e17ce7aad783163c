import Docker from 'dockerode';
import { ConfigError, loadConfig, type HelperConfig } from './config.js';
import { DockerSwapRuntime } from './dockerSwapRuntime.js';
import logger from './logger.js';
import { createStatusPage } from './statusPage.js';
import { runSwap } from './swapProtocol.js';

const PROBE_TIMEOUT_MS = 2000;

async function probe(url: string): Promise<boolean> {
  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(PROBE_TIMEOUT_MS) });
    return response.ok;
  } catch (err) {
    logger.debug({ url, err: err instanceof Error ? err.message : String(err) }, 'Readiness probe failed');
    return false;
  }
}

async function main(): Promise<number> {
  let config: HelperConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ issues: err.issues }, 'Invalid configuration');
      return 2;
    }
    throw err;
  }

  const { instructions } = config;
  const outcome = await runSwap(instructions, {
    runtime: new DockerSwapRuntime(new Docker({ socketPath: config.dockerSocketPath })),
    log: logger,
    probe,
    sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
    pollIntervalMs: config.readinessPollIntervalMs,
    statusPage: instructions.statusPagePort !== null ? createStatusPage(instructions.statusPagePort) : null,
  });

  logger.info({ ...outcome }, 'Swap helper finished');
  return outcome.status === 'swapped' ? 0 : 1;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Swap helper crashed');
    process.exitCode = 1;
  });
