export const DEFAULT_FETCH_HEADERS = { 'User-Agent': 'hydrocycle/1.0 (precipitation archive sync)' };

type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type FetchWithTimeout = (url: string, options?: RequestInit, timeoutMs?: number) => Promise<Response>;

/**
 * Wraps fetch with an abort timer; a timeout of 0 leaves the request unbounded.
 */
export const createFetchWithTimeout = (defaultTimeoutMs: number, fetchImpl: FetchLike = globalThis.fetch.bind(globalThis)): FetchWithTimeout =>
  async (url, options = {}, timeoutMs = defaultTimeoutMs) => {
    const controller = new AbortController();
    const upstreamSignal = options.signal;
    const abortFromUpstream = () => {
      controller.abort(upstreamSignal?.reason);
    };
    if (upstreamSignal) {
      if (upstreamSignal.aborted) {
        abortFromUpstream();
      } else {
        upstreamSignal.addEventListener('abort', abortFromUpstream, { once: true });
      }
    }
    const timeout = timeoutMs > 0 ? setTimeout(() => controller.abort(), timeoutMs) : null;
    try {
      return await fetchImpl(url, { ...options, signal: controller.signal });
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
      if (upstreamSignal) {
        upstreamSignal.removeEventListener('abort', abortFromUpstream);
      }
    }
  };

export const basicAuthHeader = (username: string, password: string): string =>
  `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
