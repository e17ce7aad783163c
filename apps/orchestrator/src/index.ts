import { createServer } from 'http';
import { config } from './config.js';
import { initDb, closeDb } from './db/index.js';
import { createApi } from './api/index.js';
import { createWebSocket, shutdownWebSocket, broadcastHealthSnapshot, broadcastOperationEvent } from './websocket/index.js';
import { LifecycleExecutor } from './engine/lifecycleExecutor.js';
import { SelfReplacementCoordinator } from './engine/selfReplacement.js';
import type { RegistryCredentials } from './engine/registryAuth.js';
import { HealthAggregator } from './health/healthAggregator.js';
import { HealthMonitor } from './health/healthMonitor.js';
import { MaintenanceObserver } from './health/maintenanceObserver.js';
import { environmentLock } from './lib/environmentLock.js';
import { setServerShuttingDown } from './lib/shutdownState.js';
import logger from './lib/logger.js';
import { DockerRuntime } from './runtime/dockerRuntime.js';
import { RuntimeRegistry } from './runtime/runtimeRegistry.js';
import { HealthHistoryStore } from './services/healthHistoryStore.js';
import { OperationModeController } from './services/operationModeController.js';
import { StackOperations, type SelfUpdateTarget } from './services/stackOperations.js';
import { StackStateStore } from './services/stackStateStore.js';

async function main(): Promise<void> {
  logger.info({ env: config.nodeEnv }, 'Starting Stackwright orchestrator');

  const db = initDb();

  const runtimes = new RuntimeRegistry();
  for (const endpoint of config.environments) {
    const { environmentId, ...connection } = endpoint;
    runtimes.register(environmentId, new DockerRuntime({
      environmentId,
      connection,
      callTimeoutMs: config.docker.callTimeoutMs,
      pullTimeoutMs: config.docker.pullTimeoutMs,
      retryAttempts: config.docker.retryAttempts,
    }));
    logger.info({ environmentId }, 'Registered environment');
  }

  const credentials: RegistryCredentials | null = config.docker.registryUsername
    ? { username: config.docker.registryUsername, password: config.docker.registryPassword }
    : null;

  const store = new StackStateStore(db);
  const history = new HealthHistoryStore(db);
  const controller = new OperationModeController(store);
  const aggregator = new HealthAggregator(runtimes, history, { httpTimeoutMs: config.health.httpTimeoutMs });

  const executorFor = (environmentId: string): LifecycleExecutor =>
    new LifecycleExecutor(runtimes.get(environmentId), {
      stopTimeoutSeconds: config.executor.stopTimeoutSeconds,
      initTimeoutMs: config.executor.initTimeoutMs,
      initPollIntervalMs: config.executor.initPollIntervalMs,
      credentials,
      dockerConfigPath: config.docker.configPath,
    });

  let selfUpdate: SelfUpdateTarget | null = null;
  if (config.selfUpdate.enabled) {
    selfUpdate = {
      environmentId: config.selfUpdate.environmentId,
      coordinator: new SelfReplacementCoordinator(runtimes.get(config.selfUpdate.environmentId), {
        containerId: config.selfUpdate.containerId,
        image: config.selfUpdate.image,
        helperImage: config.selfUpdate.helperImage,
        dockerSocketPath: config.docker.socketPath,
        stopTimeoutSeconds: config.executor.stopTimeoutSeconds,
        readinessTimeoutMs: config.selfUpdate.readinessTimeoutMs,
        readinessUrl: config.selfUpdate.readinessUrl,
        statusPagePort: config.selfUpdate.statusPagePort,
        credentials,
        dockerConfigPath: config.docker.configPath,
      }),
    };
  }

  const operations = new StackOperations(runtimes, controller, environmentLock, executorFor, selfUpdate);
  operations.subscribe(broadcastOperationEvent);

  const monitor = new HealthMonitor(store, controller, aggregator, history, environmentLock, {
    pollIntervalMs: config.health.pollIntervalMs,
    retentionHours: config.health.retentionHours,
    maxSnapshotsPerStack: config.health.maxSnapshotsPerStack,
  }, broadcastHealthSnapshot);
  const observer = new MaintenanceObserver(store, operations, { tickIntervalMs: config.health.observerTickMs });

  const app = createApi({
    operations,
    controller,
    store,
    history,
    aggregator,
    runtimes,
    lock: environmentLock,
    monitor,
    observer,
  });

  const httpServer = createServer(app);

  createWebSocket(httpServer, {
    hasEnvironment: environmentId => runtimes.has(environmentId),
    getOperation: operationId => operations.getOperation(operationId),
  });

  httpServer.listen(config.port, '0.0.0.0', () => {
    logger.info({
      port: config.port,
      api: `http://localhost:${config.port}/api`,
      ws: `ws://localhost:${config.port}`,
    }, 'Orchestrator started');

    // The first tick also recovers stacks a previous process left mid-operation
    monitor.start();
    observer.start();
  });

  let shuttingDown = false;
  const shutdown = (): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    setServerShuttingDown(true);
    logger.info('Shutting down...');
    monitor.stop();
    observer.stop();

    void shutdownWebSocket()
      .catch(err => logger.warn({ err }, 'WebSocket shutdown failed'))
      .finally(() => {
        httpServer.close(() => {
          closeDb();
          logger.info('Shutdown complete');
          process.exit(0);
        });
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start orchestrator');
  process.exit(1);
});
