/**
 * Page fetcher
 *
 * One GET with an explicit timeout and bounded retries. Network errors,
 * timeouts and 5xx responses are retried with exponential backoff; other
 * statuses are final. Never throws: the caller gets a tagged result.
 */

import fetch from 'node-fetch';
import type { FetchConfig } from '../config/env.js';
import { FetchError, errorMessage } from '../errors.js';
import { RequestThrottle, sleep, type Sleeper } from './throttle.js';

export type PageResult =
  | { kind: 'ok'; html: string; status: number }
  | { kind: 'not_found'; status: number }
  | { kind: 'error'; error: FetchError };

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<FetchResponse>;

export interface FetchPageOptions extends FetchConfig {
  fetchImpl?: FetchLike;
  /** Base delay for exponential backoff between attempts. */
  retryDelayMs?: number;
  throttle?: RequestThrottle;
  signal?: AbortSignal;
  sleep?: Sleeper;
}

const HEADERS = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
};

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 429;
}

export async function fetchPage(url: string, options: FetchPageOptions): Promise<PageResult> {
  const fetchImpl = options.fetchImpl ?? defaultFetch;
  const wait = options.sleep ?? sleep;
  const retryDelayMs = options.retryDelayMs ?? 1000;
  let lastError = new FetchError('No attempt made', { url });

  for (let attempt = 0; attempt <= options.retries; attempt++) {
    if (options.throttle) {
      await options.throttle.acquire(url, options.signal);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const response = await fetchImpl(url, {
        headers: { ...HEADERS, 'User-Agent': options.userAgent },
        signal: controller.signal,
      });

      if (response.status === 404) {
        return { kind: 'not_found', status: response.status };
      }

      if (response.ok) {
        const html = await response.text();
        if (!html.trim()) {
          return { kind: 'not_found', status: response.status };
        }
        return { kind: 'ok', html, status: response.status };
      }

      lastError = new FetchError(`HTTP ${response.status}: ${response.statusText}`, {
        url,
        status: response.status,
      });
      if (!isRetryableStatus(response.status)) {
        return { kind: 'error', error: lastError };
      }
    } catch (error) {
      const timedOut = controller.signal.aborted;
      lastError = new FetchError(
        timedOut ? `Timed out after ${options.timeoutMs}ms` : errorMessage(error),
        { url, timedOut, cause: error }
      );
    } finally {
      clearTimeout(timer);
    }

    if (attempt < options.retries) {
      console.warn(`Request failed (attempt ${attempt + 1}/${options.retries + 1}): ${lastError.message}`);
      await wait(retryDelayMs * Math.pow(2, attempt), options.signal);
      if (options.signal?.aborted) break;
    }
  }

  return { kind: 'error', error: lastError };
}

export type PageFetcher = (url: string, signal?: AbortSignal) => Promise<PageResult>;

/**
 * Bind configuration and the shared throttle once; targets only pass URLs.
 */
export function createPageFetcher(
  config: FetchConfig,
  throttle: RequestThrottle,
  overrides: Pick<FetchPageOptions, 'fetchImpl' | 'retryDelayMs' | 'sleep'> = {}
): PageFetcher {
  return (url, signal) => fetchPage(url, { ...config, ...overrides, throttle, signal });
}
