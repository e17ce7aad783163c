import type { DeploymentStatus, HealthSnapshot, StackRuntimeRecord } from '@stackwright/shared';
import type { EnvironmentLock } from '../lib/environmentLock.js';
import { errorMessage } from '../lib/errors.js';
import { healthLogger } from '../lib/logger.js';
import type { HealthHistoryStore } from '../services/healthHistoryStore.js';
import type { OperationModeController } from '../services/operationModeController.js';
import type { StackStateStore } from '../services/stackStateStore.js';
import type { HealthAggregator } from './healthAggregator.js';

const log = healthLogger.child({ module: 'health-monitor' });

// Containers are being stopped or started on purpose; a snapshot now would report them as down
const MAINTENANCE_CHANGES: ReadonlyArray<DeploymentStatus> = ['entering-maintenance', 'leaving-maintenance'];

export interface HealthMonitorOptions {
  pollIntervalMs: number;
  retentionHours: number;
  maxSnapshotsPerStack: number;
}

export interface TickSummary {
  captured: number;
  failed: number;
  recovered: number;
  pruned: number;
}

/**
 * Polls every managed stack on an interval. Each tick recovers stacks left
 * mid-operation by a previous process, captures a health snapshot per stack
 * and prunes old history.
 *
 * The monitor never takes an environment lock; it only reads the lock to
 * tell a running operation from an abandoned one.
 */
export class HealthMonitor {
  private timer: NodeJS.Timeout | null = null;
  private inFlight = new Set<string>();

  constructor(
    private readonly store: StackStateStore,
    private readonly controller: OperationModeController,
    private readonly aggregator: HealthAggregator,
    private readonly history: HealthHistoryStore,
    private readonly lock: EnvironmentLock,
    private readonly options: HealthMonitorOptions,
    private readonly onSnapshot: (snapshot: HealthSnapshot) => void = () => {}
  ) {}

  start(): void {
    if (this.timer) {
      log.warn('Health monitor already running');
      return;
    }

    log.info({ intervalMs: this.options.pollIntervalMs }, 'Starting health monitor');
    this.runTick();
    this.timer = setInterval(() => this.runTick(), this.options.pollIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info('Health monitor stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  private runTick(): void {
    this.tick().catch(err => {
      log.error({ err: errorMessage(err) }, 'Health monitor tick failed');
    });
  }

  async tick(now: Date = new Date()): Promise<TickSummary> {
    const summary: TickSummary = { captured: 0, failed: 0, recovered: 0, pruned: 0 };

    const byEnvironment = new Map<string, StackRuntimeRecord[]>();
    for (const record of this.store.list()) {
      const list = byEnvironment.get(record.environmentId) ?? [];
      list.push(record);
      byEnvironment.set(record.environmentId, list);
    }

    await Promise.all([...byEnvironment].map(async ([environmentId, records]) => {
      // A slow runtime must not stack up overlapping polls of one environment
      if (this.inFlight.has(environmentId)) {
        log.debug({ environmentId }, 'Previous poll still running, skipping');
        return;
      }
      this.inFlight.add(environmentId);
      try {
        const current = records.map(record => {
          if (this.isAbandoned(record)) {
            summary.recovered++;
            return this.controller.fail(record,
              `Operation interrupted while ${record.deploymentStatus}; the orchestrator stopped before it finished`);
          }
          return record;
        });

        const results = await Promise.allSettled(
          current
            .filter(record => record.operationMode !== 'stopped' && !MAINTENANCE_CHANGES.includes(record.deploymentStatus))
            .map(record => this.aggregator.capture(record, now))
        );
        for (const result of results) {
          if (result.status === 'fulfilled') {
            summary.captured++;
            this.onSnapshot(result.value);
          } else {
            summary.failed++;
            log.warn({ environmentId, err: errorMessage(result.reason) }, 'Health capture failed');
          }
        }
      } finally {
        this.inFlight.delete(environmentId);
      }
    }));

    summary.pruned = this.history.prune({
      retentionHours: this.options.retentionHours,
      maxPerStack: this.options.maxSnapshotsPerStack,
      now,
    });

    if (summary.recovered > 0 || summary.failed > 0) {
      log.info({ ...summary }, 'Health tick finished');
    }
    return summary;
  }

  private isAbandoned(record: StackRuntimeRecord): boolean {
    const transient = record.operationMode === 'migrating'
      || record.deploymentStatus === 'removing'
      || MAINTENANCE_CHANGES.includes(record.deploymentStatus);
    return transient && !this.lock.isLocked(record.environmentId);
  }
}
