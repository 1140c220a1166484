import type { CrawlResult, DatasetFetchConfig } from '../types.js';
import { createHttpClient } from '../fetcher/index.js';
import { Session } from '../fetcher/session.js';
import { loadCookieFile, seedCookieJar } from '../fetcher/cookies.js';
import { sleep } from '../fetcher/rate-limiter.js';
import { Authenticator } from '../auth/authenticator.js';
import { getFormAdapter } from '../auth/adapters.js';
import { Downloader } from '../download/downloader.js';
import { CrawlEngine } from '../crawler/engine.js';
import { ConfigError, validateAndMergeConfig } from './config.js';

/**
 * Load the configured cookie file into the session's jar.
 *
 * @returns The number of cookies added
 * @throws ConfigError if the file cannot be read
 */
async function seedSessionCookies(session: Session, cookieFile: string): Promise<number> {
  let cookies: ReturnType<typeof loadCookieFile>;
  try {
    cookies = loadCookieFile(cookieFile);
  } catch (error) {
    throw new ConfigError(
      `Cannot read cookie file ${cookieFile}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return seedCookieJar(session.jar, cookies);
}

/**
 * Create the authenticator for a config, wiring its events and the
 * configured form adapter.
 */
function createAuthenticator(config: DatasetFetchConfig, session: Session): Authenticator {
  return new Authenticator(session, getFormAdapter(config.formAdapter), {
    fileExtensions: config.fileExtensions,
    postLoginFragments: config.postLoginFragments,
    signal: config.signal,
    onAuth: config.onAuth,
  });
}

/**
 * Crawl a dataset publisher's site and download its files.
 *
 * This is the main SDK entry point. It validates the configuration,
 * opens one cookie-carrying session for the whole run, logs in when
 * credentials are given, then walks the seed pages downloading every
 * file it finds. A failed login is reported through `onAuth` and the
 * crawl continues without authentication.
 *
 * @param userConfig - Partial config with at least `url` specified
 * @returns The crawl result including pages, downloads, skipped pages, and stats
 * @throws ConfigError for invalid configuration
 * @throws SeedUnreachableError if no seed page could be fetched
 *
 * @example
 * ```typescript
 * const result = await datasetFetch({
 *   url: 'https://data.example.org/downloads/',
 *   loginUrl: 'https://data.example.org/login',
 *   credentials: { username: 'reader', password: 'test-secret' },
 *   formAdapter: 'wordpress',
 * });
 * ```
 */
export async function datasetFetch(
  userConfig: Partial<DatasetFetchConfig> & { url: string },
): Promise<CrawlResult> {
  const config = validateAndMergeConfig(userConfig);

  const session = new Session(createHttpClient(config));
  try {
    if (config.cookieFile) {
      const added = await seedSessionCookies(session, config.cookieFile);
      // Imported browser cookies stand in for a login
      session.authenticated = added > 0;
    }

    const authenticator = createAuthenticator(config, session);
    if (config.credentials && config.loginUrl) {
      await authenticator.login(config.loginUrl, config.credentials);
      await sleep(config.pageDelay, config.signal);
    }

    const downloader = new Downloader(session, {
      htmlSizeThreshold: config.htmlSizeThreshold,
      skipExisting: config.skipExisting,
      referer: `${new URL(config.url).origin}/`,
      signal: config.signal,
    });

    const engine = new CrawlEngine(config, session, downloader, authenticator);
    return await engine.crawl();
  } finally {
    session.close();
  }
}

// Default export
export default datasetFetch;

// Re-export building blocks for advanced usage
export { createHttpClient, FetchError } from '../fetcher/index.js';
export type { HttpClient, RequestOptions } from '../fetcher/index.js';
export { Session } from '../fetcher/session.js';
export type { SessionResponse } from '../fetcher/session.js';
export { extractResources, ParseError } from '../fetcher/link-extractor.js';
export { loadCookieFile, seedCookieJar } from '../fetcher/cookies.js';
export {
  Authenticator,
  AuthError,
  getFormAdapter,
  GenericFormAdapter,
  WordPressFormAdapter,
} from '../auth/index.js';
export type { FormAdapter, FormAdapterName, LoginResult, TermsResult } from '../auth/index.js';
export { Downloader, FilesystemError } from '../download/index.js';
export type { DownloadOutcome } from '../download/index.js';
export { CrawlEngine, SeedUnreachableError, normalizeUrl } from '../crawler/index.js';
export { createLayout, MirrorLayout, FlatLayout } from '../output/index.js';
export { CONFIG_DEFAULTS, DEFAULT_FILE_EXTENSIONS } from '../types.js';
export type {
  DatasetFetchConfig,
  CrawlResult,
  VisitedPage,
  SkippedPage,
  ResourceReference,
  AuthEvent,
  Credentials,
} from '../types.js';
export {
  ConfigError,
  validateAndMergeConfig,
  parseSiteProfile,
  siteProfileSchema,
} from './config.js';
export type { SiteProfile } from './config.js';
