export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const DEFAULT_FETCH_HEADERS = { "User-Agent": "TouringAdvisor/0.3 (caravan and motorhome touring advisor)" };

export type FetchWithTimeout = (url: string, init?: RequestInit, timeoutMs?: number) => Promise<Response>;

/**
 * Wrap a fetch implementation so every call aborts after `defaultTimeoutMs`
 * unless a per-call timeout is given. An upstream signal still cancels.
 */
export const createFetchWithTimeout =
  (defaultTimeoutMs: number, fetchImpl: FetchLike = globalThis.fetch.bind(globalThis)): FetchWithTimeout =>
  async (url, init = {}, timeoutMs = defaultTimeoutMs) => {
    const controller = new AbortController();
    const upstreamSignal = init.signal;
    const abortFromUpstream = () => {
      controller.abort(upstreamSignal?.reason);
    };
    if (upstreamSignal) {
      if (upstreamSignal.aborted) {
        abortFromUpstream();
      } else {
        upstreamSignal.addEventListener("abort", abortFromUpstream, { once: true });
      }
    }
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetchImpl(url, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
      if (upstreamSignal) {
        upstreamSignal.removeEventListener("abort", abortFromUpstream);
      }
    }
  };
