import fetch from 'node-fetch';
import { logger } from './logger.js';

export type FetchOptions = {
  headers?: Record<string, string>;
  timeoutMs?: number;
  /** Aborts the request along with the timeout. */
  signal?: AbortSignal;
};

export type TextFetcher = (url: string, opts?: FetchOptions) => Promise<string>;

export function browserHeaders(): Record<string, string> {
  return {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    'Accept': 'text/html,application/xhtml+xml,*/*',
    'Accept-Language': 'en-US,en;q=0.9'
  };
}

export class HttpStatusError extends Error {
  constructor(readonly url: string, readonly status: number, statusText: string) {
    super(`${status} ${statusText}`);
    this.name = 'HttpStatusError';
  }
}

/** Single GET with browser-like headers; aborts after `timeoutMs` or when `signal` aborts. */
export const fetchText: TextFetcher = async (url, opts = {}) => {
  const { headers = {}, timeoutMs = 10000, signal } = opts;
  signal?.throwIfAborted();
  const ctrl = new AbortController();
  const to = setTimeout(() => ctrl.abort(), timeoutMs);
  const onAbort = () => ctrl.abort();
  signal?.addEventListener('abort', onAbort, { once: true });
  try {
    const res = await fetch(url, { method: 'GET', headers: { ...browserHeaders(), ...headers }, signal: ctrl.signal });
    if (!res.ok) throw new HttpStatusError(url, res.status, res.statusText);
    return await res.text();
  } catch (err) {
    if (signal?.aborted) logger.debug({ url }, 'http_fetch_cancelled');
    else logger.warn({ url, err }, 'http_fetch_failed');
    throw err;
  } finally {
    clearTimeout(to);
    signal?.removeEventListener('abort', onAbort);
  }
};
