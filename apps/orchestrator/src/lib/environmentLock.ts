import { Mutex, tryAcquire, E_ALREADY_LOCKED } from 'async-mutex';
import { OperationInProgressError } from './errors.js';

interface Holder {
  operation: string;
  since: string;
}

/**
 * A held environment lock. `release` is idempotent and takes effect
 * immediately.
 */
export interface EnvironmentLease {
  environmentId: string;
  operation: string;
  release(): void;
}

/**
 * One mutex per environment. Operations on different environments run in
 * parallel; a second operation on a busy environment is rejected
 * immediately instead of queueing behind the first.
 */
export class EnvironmentLock {
  private mutexes = new Map<string, Mutex>();
  private holders = new Map<string, Holder>();

  private getMutex(environmentId: string): Mutex {
    let mutex = this.mutexes.get(environmentId);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(environmentId, mutex);
    }
    return mutex;
  }

  /**
   * Take the lock or throw OperationInProgressError. The check and the
   * acquisition happen in the same tick, so two callers racing for the same
   * environment cannot both succeed.
   */
  acquire(environmentId: string, operation: string): EnvironmentLease {
    const mutex = this.getMutex(environmentId);
    if (mutex.isLocked()) {
      throw new OperationInProgressError(environmentId, this.holders.get(environmentId)?.operation ?? 'another operation');
    }

    // A free mutex is taken before acquire() returns, so the promise is
    // already settled and the lease releases through the mutex itself
    void tryAcquire(mutex, E_ALREADY_LOCKED).acquire();
    this.holders.set(environmentId, { operation, since: new Date().toISOString() });

    let released = false;
    return {
      environmentId,
      operation,
      release: () => {
        if (released) return;
        released = true;
        this.holders.delete(environmentId);
        mutex.release();
      },
    };
  }

  /**
   * Run `fn` while holding the environment lock.
   */
  async runExclusive<T>(environmentId: string, operation: string, fn: () => Promise<T>): Promise<T> {
    const lease = this.acquire(environmentId, operation);
    try {
      return await fn();
    } finally {
      lease.release();
    }
  }

  isLocked(environmentId: string): boolean {
    return this.mutexes.get(environmentId)?.isLocked() ?? false;
  }

  activeOperation(environmentId: string): Holder | null {
    return this.holders.get(environmentId) ?? null;
  }

  getStats(): { environments: number; locked: number } {
    let locked = 0;
    for (const mutex of this.mutexes.values()) {
      if (mutex.isLocked()) locked++;
    }
    return { environments: this.mutexes.size, locked };
  }
}

export const environmentLock = new EnvironmentLock();
