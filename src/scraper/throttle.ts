/**
 * Request spacing
 * Keeps a minimum interval between requests to the same origin.
 */

/**
 * Sleep helper for rate limiting. Resolves early, without error, when the
 * signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();

  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ThrottleOptions {
  minIntervalMs: number;
  now?: () => number;
  sleep?: Sleeper;
}

export class RequestThrottle {
  private readonly lastRequestAt = new Map<string, number>();
  private readonly now: () => number;
  private readonly sleeper: Sleeper;

  constructor(private readonly options: ThrottleOptions) {
    this.now = options.now ?? Date.now;
    this.sleeper = options.sleep ?? sleep;
  }

  get minIntervalMs(): number {
    return this.options.minIntervalMs;
  }

  /**
   * Wait until a request to the URL's origin is allowed, then record it.
   */
  async acquire(url: string, signal?: AbortSignal): Promise<void> {
    const origin = new URL(url).origin;
    const last = this.lastRequestAt.get(origin);

    if (last !== undefined) {
      const waitMs = last + this.options.minIntervalMs - this.now();
      if (waitMs > 0) {
        await this.sleeper(waitMs, signal);
      }
    }

    this.lastRequestAt.set(origin, this.now());
  }
}
