import { EnvironmentNotFoundError } from '../lib/errors.js';
import type { ContainerRuntime } from './types.js';

/**
 * Container hosts by environment id.
 */
export class RuntimeRegistry {
  private runtimes = new Map<string, ContainerRuntime>();

  register(environmentId: string, runtime: ContainerRuntime): void {
    this.runtimes.set(environmentId, runtime);
  }

  get(environmentId: string): ContainerRuntime {
    const runtime = this.runtimes.get(environmentId);
    if (!runtime) {
      throw new EnvironmentNotFoundError(environmentId);
    }
    return runtime;
  }

  has(environmentId: string): boolean {
    return this.runtimes.has(environmentId);
  }

  environments(): string[] {
    return [...this.runtimes.keys()];
  }
}
