import type { AuthEvent, Credentials, ResourceReference } from '../types.js';
import { DEFAULT_FILE_EXTENSIONS } from '../types.js';
import type { Session, SessionResponse } from '../fetcher/session.js';
import { isBinaryContentType } from '../fetcher/index.js';
import { extractFromDocument, parseHtml } from '../fetcher/link-extractor.js';
import { normalizeUrl } from '../crawler/base.js';
import type { FormAdapter } from './adapters.js';
import { resolveFormAction } from './forms.js';

/**
 * Error describing why a login or terms submission did not succeed.
 * Reported through results and events; the run continues without it.
 */
export class AuthError extends Error {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}

/**
 * Outcome of a login attempt.
 */
export interface LoginResult {
  ok: boolean;
  /** Final URL of the login submission, when one was made. */
  responseUrl?: string;
  error?: AuthError;
}

/**
 * Outcome of a terms-acceptance submission.
 */
export interface TermsResult {
  /** File references revealed by the submission. */
  references: ResourceReference[];
  /**
   * Set when the submission was answered with the file itself; the body
   * has not been read and belongs to the first reference's URL.
   */
  inline?: SessionResponse;
  error?: AuthError;
}

/**
 * Options for the Authenticator.
 */
export interface AuthenticatorOptions {
  fileExtensions?: readonly string[];
  /** Extra post-login URL fragments, on top of the adapter's. */
  postLoginFragments?: readonly string[];
  signal?: AbortSignal;
  onAuth?: (event: AuthEvent) => void;
}

/**
 * Runs the login and terms-acceptance protocols on a session.
 *
 * Neither protocol throws for site or network problems: a failed login
 * leaves the session unauthenticated, and a failed terms submission
 * yields no references. Only cancellation propagates.
 */
export class Authenticator {
  constructor(
    private readonly session: Session,
    private readonly adapter: FormAdapter,
    private readonly options: AuthenticatorOptions = {},
  ) {}

  /**
   * Submit the login form found at `loginUrl`.
   *
   * Success is inferred when the submission lands on a different URL,
   * when the response mentions the username, or when the landing URL
   * contains a post-login fragment.
   */
  async login(loginUrl: string, credentials: Credentials): Promise<LoginResult> {
    let result: LoginResult;
    try {
      result = await this.submitLogin(loginUrl, credentials);
    } catch (error) {
      this.rethrowIfAborted(error);
      const message = error instanceof Error ? error.message : String(error);
      result = { ok: false, error: new AuthError(`Login failed: ${message}`, loginUrl) };
    }

    this.session.authenticated = result.ok;
    this.emit({
      step: 'login',
      url: loginUrl,
      ok: result.ok,
      detail: result.ok
        ? `logged in as ${credentials.username}`
        : (result.error?.message ?? 'login failed'),
    });
    return result;
  }

  /**
   * Accept the terms of use on a gated download page.
   *
   * @param pageUrl - The gate page URL
   * @param html - The page's HTML if already fetched; otherwise it is fetched
   */
  async acceptTerms(pageUrl: string, html?: string): Promise<TermsResult> {
    let result: TermsResult;
    try {
      result = await this.submitTerms(pageUrl, html);
    } catch (error) {
      this.rethrowIfAborted(error);
      const message = error instanceof Error ? error.message : String(error);
      result = { references: [], error: new AuthError(`Terms submission failed: ${message}`, pageUrl) };
    }

    this.emit({
      step: 'terms',
      url: pageUrl,
      ok: result.error === undefined,
      detail: result.error?.message ?? `${result.references.length} file(s) revealed`,
    });
    return result;
  }

  private async submitLogin(loginUrl: string, credentials: Credentials): Promise<LoginResult> {
    const page = await this.session.get(loginUrl, { signal: this.options.signal });
    const html = await page.response.text();
    const form = this.adapter.selectLoginForm(parseHtml(html, page.url));
    if (!form) {
      return { ok: false, error: new AuthError(`No login form found at ${loginUrl}`, loginUrl) };
    }

    const fields = this.adapter.buildLoginFields(form, credentials);
    const action = resolveFormAction(form, page.url);
    const response = await this.session.postForm(action, fields, {
      signal: this.options.signal,
      headers: { Referer: page.url, Origin: new URL(page.url).origin },
    });
    const body = await response.response.text();

    const fragments = [
      ...this.adapter.postLoginFragments,
      ...(this.options.postLoginFragments ?? []),
    ];
    const landedElsewhere = normalizeUrl(response.url) !== normalizeUrl(loginUrl);
    const mentionsUser = body.toLowerCase().includes(credentials.username.toLowerCase());
    const onPostLoginPath = fragments.some((fragment) => response.url.includes(fragment));

    if (landedElsewhere || mentionsUser || onPostLoginPath) {
      return { ok: true, responseUrl: response.url };
    }
    return {
      ok: false,
      responseUrl: response.url,
      error: new AuthError(`Login not confirmed; response URL: ${response.url}`, loginUrl),
    };
  }

  private async submitTerms(pageUrl: string, html?: string): Promise<TermsResult> {
    let pageHtml = html;
    let baseUrl = pageUrl;
    if (pageHtml === undefined) {
      const page = await this.session.get(pageUrl, { signal: this.options.signal });
      pageHtml = await page.response.text();
      baseUrl = page.url;
    }

    const form = this.adapter.selectTermsForm(parseHtml(pageHtml, baseUrl));
    if (!form) {
      return { references: [], error: new AuthError(`No form found at ${pageUrl}`, pageUrl) };
    }

    const fields = this.adapter.buildTermsFields(form);
    const action = resolveFormAction(form, baseUrl);
    const response = await this.session.postForm(action, fields, {
      kind: 'file',
      signal: this.options.signal,
      headers: { Referer: baseUrl, Origin: new URL(baseUrl).origin },
    });

    if (isBinaryContentType(response.contentType)) {
      return {
        references: [{ url: response.url, kind: 'file', via: 'terms' }],
        inline: response,
      };
    }

    const body = await response.response.text();
    const references = extractFromDocument(parseHtml(body, response.url), body, response.url, {
      fileExtensions: this.options.fileExtensions ?? DEFAULT_FILE_EXTENSIONS,
      pageKeywords: [],
      downloadKeywords: [],
      via: 'terms',
    }).filter((reference) => reference.kind === 'file');

    return { references };
  }

  private rethrowIfAborted(error: unknown): void {
    if (this.options.signal?.aborted) {
      throw error;
    }
  }

  private emit(event: AuthEvent): void {
    this.options.onAuth?.(event);
  }
}
