import Docker from 'dockerode';
import type { SwapContainerState, SwapRuntime } from './swapProtocol.js';

function statusCodeOf(err: unknown): number | null {
  if (err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return null;
}

/**
 * SwapRuntime over the Docker socket. A 304 from start or stop means the
 * container was already in that state.
 */
export class DockerSwapRuntime implements SwapRuntime {
  constructor(private readonly docker: Docker) {}

  async inspect(name: string): Promise<SwapContainerState | null> {
    try {
      const info = await this.docker.getContainer(name).inspect();
      return { running: info.State.Running, status: info.State.Status };
    } catch (err) {
      if (statusCodeOf(err) === 404) return null;
      throw err;
    }
  }

  async stop(name: string, timeoutSeconds: number): Promise<void> {
    try {
      await this.docker.getContainer(name).stop({ t: timeoutSeconds });
    } catch (err) {
      if (statusCodeOf(err) !== 304) throw err;
    }
  }

  async start(name: string): Promise<void> {
    try {
      await this.docker.getContainer(name).start();
    } catch (err) {
      if (statusCodeOf(err) !== 304) throw err;
    }
  }

  async rename(name: string, newName: string): Promise<void> {
    await this.docker.getContainer(name).rename({ name: newName });
  }

  async remove(name: string): Promise<void> {
    try {
      await this.docker.getContainer(name).remove({ force: true });
    } catch (err) {
      if (statusCodeOf(err) !== 404) throw err;
    }
  }
}
