import type { HealthAggregator } from '../health/healthAggregator.js';
import type { HealthMonitor } from '../health/healthMonitor.js';
import type { MaintenanceObserver } from '../health/maintenanceObserver.js';
import type { EnvironmentLock } from '../lib/environmentLock.js';
import type { RuntimeRegistry } from '../runtime/runtimeRegistry.js';
import type { HealthHistoryStore } from '../services/healthHistoryStore.js';
import type { OperationModeController } from '../services/operationModeController.js';
import type { StackOperations } from '../services/stackOperations.js';
import type { StackStateStore } from '../services/stackStateStore.js';

/** Everything the HTTP routes read from or hand commands to. */
export interface ApiContext {
  operations: StackOperations;
  controller: OperationModeController;
  store: StackStateStore;
  history: HealthHistoryStore;
  aggregator: HealthAggregator;
  runtimes: RuntimeRegistry;
  lock: EnvironmentLock;
  monitor: HealthMonitor | null;
  observer: MaintenanceObserver | null;
}
