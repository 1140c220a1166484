import { FetchError } from './index.js';

/**
 * Configuration for the RetryingRateLimiter.
 */
export interface RateLimiterConfig {
  /** Total attempts per request, including the first. */
  maxAttempts: number;
  /** Delay step in milliseconds; attempt n waits n * retryDelay before retrying. */
  retryDelay: number;
  /** Minimum spacing between request starts to the same host, in milliseconds. */
  hostInterval: number;
}

/**
 * Rate limiter that spaces requests per host and retries failed attempts.
 *
 * - Any FetchError (timeout, connection error, HTTP error status) is retried
 *   until `maxAttempts` is reached.
 * - The wait before retry n is `n * retryDelay` (linear, not exponential).
 * - A 429 carrying a Retry-After header waits at least that long.
 * - Errors other than FetchError (e.g. an abort) are re-thrown immediately.
 */
export class RetryingRateLimiter {
  private readonly maxAttempts: number;
  private readonly retryDelay: number;
  private readonly hostInterval: number;
  private readonly lastStart = new Map<string, number>();

  constructor(config: RateLimiterConfig) {
    this.maxAttempts = Math.max(1, config.maxAttempts);
    this.retryDelay = config.retryDelay;
    this.hostInterval = config.hostInterval;
  }

  /**
   * Execute a function with host spacing and retries applied.
   *
   * @param url - The request URL, used to key host spacing
   * @param fn - The async function to execute (typically one fetch attempt)
   * @param signal - Aborts pending waits and prevents further attempts
   * @returns The result of fn
   */
  async execute<T>(url: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      await this.waitForHost(url, signal);

      try {
        return await fn();
      } catch (error) {
        if (!(error instanceof FetchError) || signal?.aborted) {
          throw error;
        }
        if (attempt >= this.maxAttempts) {
          throw error;
        }
        await this.sleep(this.backoffFor(attempt, error), signal);
      }
    }
  }

  /**
   * Delay before the retry following `attempt` (1-based).
   */
  backoffFor(attempt: number, error: FetchError): number {
    const linear = this.retryDelay * attempt;
    if (error.statusCode === 429) {
      const retryAfter = error.headers?.['retry-after'];
      const parsed = retryAfter ? parseRetryAfter(retryAfter) : undefined;
      if (parsed !== undefined) {
        return Math.max(linear, parsed);
      }
    }
    return linear;
  }

  /**
   * Wait until `hostInterval` has passed since the last request to the
   * URL's host, then record this request's start.
   */
  private async waitForHost(url: string, signal?: AbortSignal): Promise<void> {
    if (this.hostInterval <= 0) {
      return;
    }
    const host = hostOf(url);
    const last = this.lastStart.get(host);
    if (last !== undefined) {
      const remaining = last + this.hostInterval - Date.now();
      if (remaining > 0) {
        await this.sleep(remaining, signal);
      }
    }
    this.lastStart.set(host, Date.now());
  }

  /**
   * Sleep for a given number of milliseconds, rejecting early on abort.
   */
  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return sleep(ms, signal);
  }
}

/**
 * Sleep for a given number of milliseconds. Rejects with the signal's
 * reason if it aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

/**
 * Parse a Retry-After header value.
 * Can be either a number of seconds or an HTTP-date string.
 *
 * @param value - The Retry-After header value
 * @returns Delay in milliseconds, or undefined if unparseable
 */
export function parseRetryAfter(value: string): number | undefined {
  // Try parsing as a number of seconds first
  const seconds = Number(value);
  if (value.trim() !== '' && !isNaN(seconds) && isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  // Try parsing as an HTTP-date
  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - Date.now();
    // If the date is in the past, use 0
    return Math.max(0, delayMs);
  }

  return undefined;
}
