import { CookieJar } from 'tough-cookie';
import type { HttpClient, RequestKind } from './index.js';
import { FetchError, responseHeadersToRecord } from './index.js';

/** Maximum number of redirects to follow. */
const MAX_REDIRECTS = 10;

/**
 * A response obtained through a Session, after redirects.
 */
export interface SessionResponse {
  /** Final URL after redirects. */
  url: string;
  status: number;
  headers: Record<string, string>;
  /** Lower-cased Content-Type header, or an empty string. */
  contentType: string;
  /** The live response; its body has not been read. */
  response: Response;
}

/**
 * Per-request options for session calls.
 */
export interface SessionRequestOptions {
  kind?: RequestKind;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Options for constructing a Session.
 */
export interface SessionOptions {
  jar?: CookieJar;
}

/**
 * An HTTP client plus a cookie jar. All network access in a run goes
 * through one Session so that login cookies reach every later request.
 *
 * Redirects are followed here, hop by hop, so that cookies set by a
 * redirecting response (typical for login handlers) land in the jar.
 */
export class Session {
  readonly jar: CookieJar;
  /** Set by the authenticator once a login is confirmed. */
  authenticated = false;

  constructor(
    private readonly client: HttpClient,
    options: SessionOptions = {},
  ) {
    this.jar = options.jar ?? new CookieJar();
  }

  /**
   * GET a URL, following redirects.
   */
  get(url: string, options: SessionRequestOptions = {}): Promise<SessionResponse> {
    return this.send(url, 'GET', undefined, options);
  }

  /**
   * POST form fields as application/x-www-form-urlencoded, following redirects.
   */
  postForm(
    url: string,
    fields: URLSearchParams,
    options: SessionRequestOptions = {},
  ): Promise<SessionResponse> {
    return this.send(url, 'POST', fields.toString(), {
      ...options,
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        ...options.headers,
      },
    });
  }

  /**
   * Return the Cookie header value the jar would send to a URL.
   */
  cookieHeaderFor(url: string): Promise<string> {
    return this.jar.getCookieString(url);
  }

  /**
   * Release the underlying client.
   */
  close(): void {
    this.client.close();
  }

  private async send(
    url: string,
    method: 'GET' | 'POST',
    body: string | undefined,
    options: SessionRequestOptions,
  ): Promise<SessionResponse> {
    let currentUrl = url;
    let currentMethod = method;
    let currentBody = body;
    let extraHeaders = options.headers ?? {};

    for (let redirectCount = 0; ; redirectCount++) {
      const headers: Record<string, string> = { ...extraHeaders };
      const cookieHeader = await this.jar.getCookieString(currentUrl);
      if (cookieHeader) {
        headers['Cookie'] = cookieHeader;
      }

      const response = await this.client.request(currentUrl, {
        method: currentMethod,
        body: currentBody,
        headers,
        kind: options.kind,
        signal: options.signal,
      });

      await this.storeCookies(response, currentUrl);

      const status = response.status;
      if (status < 300 || status >= 400) {
        return {
          url: currentUrl,
          status,
          headers: responseHeadersToRecord(response),
          contentType: (response.headers.get('content-type') ?? '').toLowerCase(),
          response,
        };
      }

      await response.body?.cancel();

      const location = response.headers.get('location');
      if (!location) {
        throw new FetchError(
          `Redirect response missing Location header: ${currentUrl}`,
          url,
          status,
        );
      }
      if (redirectCount === MAX_REDIRECTS) {
        throw new FetchError(
          `Too many redirects (max ${MAX_REDIRECTS}): ${url}`,
          url,
          status,
        );
      }

      // Resolve relative redirect URLs
      currentUrl = new URL(location, currentUrl).href;

      if (status === 303 || ((status === 301 || status === 302) && currentMethod === 'POST')) {
        currentMethod = 'GET';
        currentBody = undefined;
        extraHeaders = withoutContentType(extraHeaders);
      }
    }
  }

  private async storeCookies(response: Response, url: string): Promise<void> {
    for (const setCookie of response.headers.getSetCookie()) {
      // Malformed or foreign-domain cookies are dropped, as a browser would.
      await this.jar.setCookie(setCookie, url, { ignoreError: true });
    }
  }
}

function withoutContentType(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== 'content-type') {
      result[key] = value;
    }
  }
  return result;
}
