import { setTimeout as wait } from 'timers/promises';
import { RuntimeError } from './types.js';

/**
 * How one call to a container host is bounded: a deadline per attempt and
 * a few more attempts when the connection itself failed.
 */
export interface HostCallPolicy {
  timeoutMs: number;
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface HostCallRetry {
  action: string;
  attempt: number;
  delayMs: number;
  error: RuntimeError;
}

export class TimeoutError extends Error {
  constructor(action: string, timeoutMs: number) {
    super(`${action} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

const CONNECTION_ERROR_CODES = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
];

/** The socket or TCP connection to the host failed, not the request. */
export function isConnectionError(error: Error): boolean {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
  if (CONNECTION_ERROR_CODES.includes(code)) return true;

  const message = error.message.toLowerCase();
  return message.includes('socket hang up') || message.includes('connection reset');
}

function statusCodeOf(err: Error): number | null {
  return 'statusCode' in err && typeof err.statusCode === 'number' ? err.statusCode : null;
}

/**
 * Map dockerode and socket errors onto RuntimeError codes.
 */
export function toRuntimeError(err: unknown, action: string): RuntimeError {
  if (err instanceof RuntimeError) return err;
  if (err instanceof TimeoutError) return new RuntimeError('timeout', err.message);

  const error = err instanceof Error ? err : new Error(String(err));
  const statusCode = statusCodeOf(error);
  const message = `${action} failed: ${error.message}`;

  if (statusCode === 404) return new RuntimeError('not-found', message, statusCode);
  if (statusCode === 409) return new RuntimeError('conflict', message, statusCode);
  if (statusCode === 401 || statusCode === 403) return new RuntimeError('unauthorized', message, statusCode);
  if (statusCode === null && isConnectionError(error)) return new RuntimeError('transient', message);
  return new RuntimeError('unknown', message, statusCode);
}

/** Doubling delay before attempt `attempt + 1`, capped. */
export function backoffDelay(attempt: number, policy: Pick<HostCallPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

async function withDeadline<T>(promise: Promise<T>, timeoutMs: number, action: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(action, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run one host call. Every failure comes out as a RuntimeError. Only
 * `transient` ones are tried again: a timed out create may still have
 * happened on the host, so a timeout is never repeated.
 */
export async function callHost<T>(
  action: string,
  fn: () => Promise<T>,
  policy: HostCallPolicy,
  onRetry: (retry: HostCallRetry) => void = () => {}
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await withDeadline(fn(), policy.timeoutMs, action);
    } catch (err) {
      const error = toRuntimeError(err, action);
      if (error.code !== 'transient' || attempt >= policy.attempts) throw error;

      const delayMs = backoffDelay(attempt, policy);
      onRetry({ action, attempt, delayMs, error });
      await wait(delayMs);
    }
  }
}
