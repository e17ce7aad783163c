import type { MaintenanceObserverConfig, StackRuntimeRecord } from '@stackwright/shared';
import { EngineError, errorMessage } from '../lib/errors.js';
import { healthLogger } from '../lib/logger.js';
import type { StackOperations } from '../services/stackOperations.js';
import type { StackStateStore } from '../services/stackStateStore.js';
import { fetchProbe, type HttpProbe } from './httpProbe.js';

const log = healthLogger.child({ module: 'maintenance-observer' });

const DEFAULT_POLLING_INTERVAL_SECONDS = 30;
const DEFAULT_TIMEOUT_SECONDS = 10;

export type ObserverResult =
  | { outcome: 'maintenance'; observedValue: string; checkedAt: string }
  | { outcome: 'normal'; observedValue: string; checkedAt: string }
  | { outcome: 'failed'; error: string; checkedAt: string };

export interface MaintenanceObserverOptions {
  /** How often the observer looks for stacks that are due a check. */
  tickIntervalMs: number;
}

/**
 * Read the value at a dot path such as `status.mode` or `items[0].state`.
 */
export function valueAtPath(body: unknown, path: string): unknown {
  let current = body;
  for (const part of path.replace(/^\$?\.?/, '').split('.')) {
    if (part === '') continue;
    const match = /^([^[\]]*)(?:\[(\d+)\])?$/.exec(part);
    if (!match) return undefined;
    const [, key, index] = match;
    if (key !== '') {
      if (typeof current !== 'object' || current === null || Array.isArray(current)) return undefined;
      current = Object.entries(current).find(([k]) => k === key)?.[1];
    }
    if (index !== undefined) {
      if (!Array.isArray(current)) return undefined;
      current = current[Number(index)];
    }
  }
  return current;
}

function asObservedValue(value: unknown): string | null {
  if (value === undefined) return null;
  if (value === null) return '';
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Turn one observed value into a verdict. Comparison ignores case.
 */
export function interpretObservedValue(
  config: MaintenanceObserverConfig,
  observedValue: string,
  checkedAt: string
): ObserverResult {
  const same = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();
  if (same(observedValue, config.maintenanceValue)) {
    return { outcome: 'maintenance', observedValue, checkedAt };
  }
  if (config.normalValue !== undefined && !same(observedValue, config.normalValue)) {
    return {
      outcome: 'failed',
      error: `Observed value '${observedValue}' matches neither '${config.maintenanceValue}' nor '${config.normalValue}'`,
      checkedAt,
    };
  }
  return { outcome: 'normal', observedValue, checkedAt };
}

/**
 * Watches the maintenance URL of every stack whose plan configures one and
 * moves the stack into or out of maintenance through the same command an
 * operator would use. Each stack is checked on its own polling interval.
 */
export class MaintenanceObserver {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private readonly lastChecked = new Map<string, number>();
  private readonly lastResults = new Map<string, ObserverResult>();

  constructor(
    private readonly store: StackStateStore,
    private readonly operations: Pick<StackOperations, 'setMaintenance'>,
    private readonly options: MaintenanceObserverOptions,
    private readonly probe: HttpProbe = fetchProbe
  ) {}

  start(): void {
    if (this.timer) {
      log.warn('Maintenance observer already running');
      return;
    }
    log.info({ intervalMs: this.options.tickIntervalMs }, 'Starting maintenance observer');
    this.runTick();
    this.timer = setInterval(() => this.runTick(), this.options.tickIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info('Maintenance observer stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  lastResult(stackId: string): ObserverResult | null {
    return this.lastResults.get(stackId) ?? null;
  }

  private runTick(): void {
    if (this.running) return;
    this.running = true;
    this.tick()
      .catch(err => {
        log.error({ err: errorMessage(err) }, 'Maintenance observer tick failed');
      })
      .finally(() => {
        this.running = false;
      });
  }

  /**
   * Check every stack that is due and apply the verdicts. Returns the
   * number of maintenance changes that were started.
   */
  async tick(now: Date = new Date()): Promise<number> {
    const due = this.store.list().filter(record => this.isDue(record, now.getTime()));
    const changes = await Promise.all(due.map(async record => {
      const config = record.currentPlan?.maintenanceObserver;
      if (!config) return false;
      const result = await this.check(config, now);
      this.lastChecked.set(record.stackId, now.getTime());
      this.lastResults.set(record.stackId, result);
      return this.apply(record, result);
    }));
    return changes.filter(Boolean).length;
  }

  async check(config: MaintenanceObserverConfig, now: Date = new Date()): Promise<ObserverResult> {
    const checkedAt = now.toISOString();
    const timeoutMs = (config.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS) * 1000;
    const response = await this.probe(config.url, timeoutMs);
    if (response.error !== null) {
      return { outcome: 'failed', error: response.error, checkedAt };
    }

    const raw = config.jsonPath ? valueAtPath(response.body, config.jsonPath) : response.body;
    const observed = asObservedValue(raw);
    if (observed === null) {
      return { outcome: 'failed', error: `Nothing found at ${config.jsonPath ?? 'response body'}`, checkedAt };
    }
    return interpretObservedValue(config, observed, checkedAt);
  }

  private isDue(record: StackRuntimeRecord, nowMs: number): boolean {
    const config = record.currentPlan?.maintenanceObserver;
    if (!config) return false;
    if (record.deploymentStatus !== 'idle') return false;
    if (record.operationMode !== 'normal' && record.operationMode !== 'maintenance') return false;

    const last = this.lastChecked.get(record.stackId);
    const intervalMs = (config.pollingIntervalSeconds ?? DEFAULT_POLLING_INTERVAL_SECONDS) * 1000;
    return last === undefined || nowMs - last >= intervalMs;
  }

  private async apply(record: StackRuntimeRecord, result: ObserverResult): Promise<boolean> {
    if (result.outcome === 'failed') {
      log.warn({ stackId: record.stackId, error: result.error }, 'Maintenance check failed');
      return false;
    }

    const enter = result.outcome === 'maintenance' && record.operationMode === 'normal';
    const leave = result.outcome === 'normal' && record.operationMode === 'maintenance';
    if (!enter && !leave) return false;

    log.info({ stackId: record.stackId, observed: result.observedValue },
      enter ? 'Observer requests maintenance' : 'Observer ends maintenance');
    try {
      const handle = this.operations.setMaintenance(record.environmentId, record.stackName, enter);
      const outcome = await handle.completion;
      if (!outcome.success) {
        log.warn({ stackId: record.stackId, errors: outcome.errors }, 'Observer-driven maintenance change failed');
      }
      return true;
    } catch (err) {
      // Another operation holds the environment; try again on the next check
      if (err instanceof EngineError && err.kind === 'concurrency') {
        log.debug({ stackId: record.stackId }, 'Environment busy, maintenance change deferred');
        this.lastChecked.delete(record.stackId);
        return false;
      }
      if (err instanceof EngineError) {
        log.warn({ stackId: record.stackId, code: err.code, err: err.message }, 'Maintenance change refused');
        return false;
      }
      throw err;
    }
  }
}
