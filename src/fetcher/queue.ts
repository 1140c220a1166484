import PQueue from 'p-queue';
import { RetryingRateLimiter, type RateLimiterConfig } from './rate-limiter.js';

/**
 * Serial request queue with host spacing and retries.
 *
 * Every HTTP request of a run goes through one instance, so the session,
 * the authenticator and the downloader never have two requests in flight.
 */
export class FetchQueue {
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly rateLimiter: RetryingRateLimiter;

  constructor(config: RateLimiterConfig) {
    this.rateLimiter = new RetryingRateLimiter(config);
  }

  /**
   * Run `fn` once earlier requests have settled, spacing it from the last
   * request to the same host and retrying it on FetchError.
   *
   * @param url - The request URL
   * @param fn - One attempt at the request
   * @param signal - Aborts pending waits and further attempts
   */
  async add<T>(url: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.queue.add(() => this.rateLimiter.execute(url, fn, signal), { throwOnTimeout: true });
  }

  /**
   * Drop waiting requests; running ones finish.
   */
  clear(): void {
    this.queue.clear();
  }
}
