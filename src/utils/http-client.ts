import nodeFetch from 'node-fetch';
import pkg from '../../package.json' with { type: 'json' };

export const DEFAULT_FETCH_HEADERS: Readonly<Record<string, string>> = { 'User-Agent': `uv-exposure-engine/${pkg.version}` };

export interface FetchOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, options?: FetchOptions) => Promise<FetchResponseLike>;

export type FetchWithTimeout = (url: string, options?: FetchOptions, timeoutMs?: number) => Promise<FetchResponseLike>;

const defaultFetch: FetchLike =
  typeof globalThis.fetch === 'function'
    ? (url, options) => globalThis.fetch(url, options)
    : (url, options) => nodeFetch(url, options);

export const createFetchWithTimeout = (defaultTimeoutMs: number, fetchImpl: FetchLike = defaultFetch): FetchWithTimeout =>
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
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetchImpl(url, { ...options, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
      if (upstreamSignal) {
        upstreamSignal.removeEventListener('abort', abortFromUpstream);
      }
    }
  };
