import type { DatasetFetchConfig } from '../types.js';
import { FetchQueue } from './queue.js';

/**
 * Whether a request is for an HTML page or a (possibly large) file body.
 * Selects the request timeout.
 */
export type RequestKind = 'page' | 'file';

/**
 * Options for a single HTTP request.
 */
export interface RequestOptions {
  method?: 'GET' | 'POST';
  body?: string;
  headers?: Record<string, string>;
  kind?: RequestKind;
  signal?: AbortSignal;
}

/**
 * The HTTP client used by the session. Redirects are returned to the
 * caller rather than followed, so cookies can be collected on every hop.
 */
export interface HttpClient {
  /** Issue a request; resolves with 2xx and 3xx responses, throws FetchError otherwise. */
  request(url: string, options?: RequestOptions): Promise<Response>;
  /** Clean up resources. */
  close(): void;
}

/**
 * Browser identity sent with every request. Several dataset hosts refuse
 * clients that do not look like a desktop browser.
 */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/** Content types considered as HTML. */
export const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * Error thrown when a fetch operation fails (timeout, connection error,
 * or an unexpected HTTP status).
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
    public readonly headers?: Record<string, string>,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * Convert a Response's headers to a plain object.
 */
export function responseHeadersToRecord(response: Response): Record<string, string> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

/**
 * Check whether a content type header value denotes an HTML document.
 */
export function isHtmlContentType(contentType: string): boolean {
  const lower = contentType.toLowerCase();
  return HTML_CONTENT_TYPES.some((type) => lower.includes(type));
}

/**
 * Check whether a content type header value denotes a binary or archive body
 * (anything under application/ except XHTML, plus PDF, ZIP and octet-stream).
 */
export function isBinaryContentType(contentType: string): boolean {
  const lower = contentType.toLowerCase();
  if (lower === '' || isHtmlContentType(lower)) {
    return false;
  }
  return (
    lower.includes('application/') ||
    lower.includes('pdf') ||
    lower.includes('zip') ||
    lower.includes('octet-stream')
  );
}

/**
 * Abort a request after `timeoutMs`, or when the caller's signal aborts.
 * The timeout keeps running while the body is read, so it covers the
 * whole transfer. Nothing is registered on the caller's signal.
 */
function createRequestSignal(timeoutMs: number, external?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return external ? AbortSignal.any([timeout, external]) : timeout;
}

/**
 * Create an HttpClient configured with the given options.
 *
 * Requests run one at a time through a queue that spaces them per host
 * and retries timeouts, connection errors and HTTP error statuses with a
 * linearly growing delay.
 *
 * @param config - The dataset-fetch configuration
 * @returns An HttpClient instance
 */
export function createHttpClient(
  config: Pick<
    DatasetFetchConfig,
    'headers' | 'maxAttempts' | 'retryDelay' | 'pageTimeout' | 'fileTimeout' | 'hostInterval'
  >,
): HttpClient {
  const fetchQueue = new FetchQueue({
    maxAttempts: config.maxAttempts,
    retryDelay: config.retryDelay,
    hostInterval: config.hostInterval,
  });

  const baseHeaders: Record<string, string> = {
    'User-Agent': DEFAULT_USER_AGENT,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    ...config.headers,
  };

  /**
   * Perform one HTTP attempt. This is the function that gets retried by the queue.
   */
  async function attempt(url: string, options: RequestOptions): Promise<Response> {
    const kind = options.kind ?? 'page';
    const timeoutMs = kind === 'file' ? config.fileTimeout : config.pageTimeout;
    const signal = createRequestSignal(timeoutMs, options.signal);

    let response: Response;
    try {
      response = await fetch(url, {
        method: options.method ?? 'GET',
        headers: { ...baseHeaders, ...options.headers },
        body: options.body,
        signal,
        redirect: 'manual',
      });
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      if (signal.aborted) {
        throw new FetchError(`Request timed out after ${timeoutMs}ms: ${url}`, url);
      }
      throw new FetchError(
        `Network error fetching ${url}: ${error instanceof Error ? error.message : String(error)}`,
        url,
      );
    }

    if (response.status >= 200 && response.status < 400) {
      return response;
    }

    const errorHeaders = responseHeadersToRecord(response);
    await response.body?.cancel();
    throw new FetchError(
      `HTTP ${response.status} for ${url}`,
      url,
      response.status,
      errorHeaders,
    );
  }

  return {
    request(url: string, options: RequestOptions = {}): Promise<Response> {
      return fetchQueue.add(url, () => attempt(url, options), options.signal);
    },

    close(): void {
      fetchQueue.clear();
    },
  };
}

// Re-export types and utilities for external use
export { RetryingRateLimiter, parseRetryAfter } from './rate-limiter.js';
export type { RateLimiterConfig } from './rate-limiter.js';
export { FetchQueue } from './queue.js';
export { Session } from './session.js';
export type { SessionResponse, SessionOptions } from './session.js';
export { extractResources, ParseError } from './link-extractor.js';
export type { ExtractResourcesOptions } from './link-extractor.js';
