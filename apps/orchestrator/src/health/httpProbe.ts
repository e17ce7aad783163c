export interface ProbeResult {
  statusCode: number | null;
  body: unknown;
  responseTimeMs: number;
  error: string | null;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export type HttpProbe = (url: string, timeoutMs: number) => Promise<ProbeResult>;

/**
 * GET `url` with a timeout. Never throws: connection failures come back in
 * `error`. A JSON body is parsed, anything else is returned as text.
 */
export const fetchProbe: HttpProbe = async (url, timeoutMs) => {
  const started = Date.now();
  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
    const text = await response.text();
    const isJson = (response.headers.get('content-type') ?? '').includes('application/json');
    const body = isJson ? parseJson(text) : text;
    return { statusCode: response.status, body, responseTimeMs: Date.now() - started, error: null };
  } catch (err) {
    const message = err instanceof Error && err.name === 'TimeoutError'
      ? `timed out after ${timeoutMs}ms`
      : err instanceof Error ? err.message : String(err);
    return { statusCode: null, body: null, responseTimeMs: Date.now() - started, error: message };
  }
};
