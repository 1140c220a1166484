import { readFileSync } from 'node:fs';
import type { DatasetFetchConfig } from '../types.js';
import { FORM_ADAPTER_NAMES, type FormAdapterName } from '../auth/adapters.js';
import { parseSiteProfile, type SiteProfile } from '../sdk/config.js';

/** Environment variable read when --password is not given. */
export const PASSWORD_ENV_VAR = 'DATASET_FETCH_PASSWORD';

/**
 * Raw CLI options as parsed by commander.
 */
export interface CLIOptions {
  depth?: string;
  maxPages?: string;
  output?: string;
  flat?: boolean;
  seed?: string[];
  keyword?: string[];
  profile?: string;
  loginUrl?: string;
  username?: string;
  password?: string;
  adapter?: string;
  cookieFile?: string;
  header?: string[];
  pageDelay?: string;
  downloadDelay?: string;
  retries?: string;
  htmlThreshold?: string;
  skipExisting?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
}

/**
 * Parse --header values from "key:value" format into a Record.
 * Splits on the first colon to allow colons in the value.
 *
 * @param headers - Array of "key:value" strings
 * @returns A Record mapping header names to values
 * @throws Error if a header value does not contain a colon
 */
export function parseHeaders(headers: string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const header of headers) {
    const colonIndex = header.indexOf(':');
    if (colonIndex === -1) {
      throw new Error(
        `Invalid header format: "${header}". Expected "key:value" format.`,
      );
    }
    const key = header.slice(0, colonIndex).trim();
    const value = header.slice(colonIndex + 1).trim();
    if (!key) {
      throw new Error(
        `Invalid header format: "${header}". Header name cannot be empty.`,
      );
    }
    result[key] = value;
  }

  return result;
}

export function isFormAdapterName(value: string): value is FormAdapterName {
  return FORM_ADAPTER_NAMES.some((name) => name === value);
}

/**
 * Load and validate a site profile JSON file.
 *
 * @param filePath - Path to the profile file
 * @returns The parsed SiteProfile
 * @throws Error if the file cannot be read or parsed, or ConfigError if it is invalid
 */
export function loadSiteProfile(filePath: string): SiteProfile {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new Error(
      `Cannot read site profile "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Invalid JSON in site profile "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return parseSiteProfile(value, `"${filePath}"`);
}

/**
 * Build a DatasetFetchConfig from the parsed CLI options and URL argument.
 *
 * Profile values are applied first and explicit flags override them.
 * Only sets properties that were explicitly provided by the user;
 * the SDK's own default merging handles the rest.
 *
 * @param url - The positional URL argument, if given
 * @param options - The parsed commander options
 * @param env - Environment consulted for the password
 * @returns A partial DatasetFetchConfig with at least `url` set
 * @throws Error if no URL is available or the credentials are incomplete
 */
export function buildConfig(
  url: string | undefined,
  options: CLIOptions,
  env: NodeJS.ProcessEnv = process.env,
): Partial<DatasetFetchConfig> & { url: string } {
  const profile = options.profile !== undefined ? loadSiteProfile(options.profile) : undefined;

  const seedUrl = url ?? profile?.url;
  if (!seedUrl) {
    throw new Error('A URL is required, either as an argument or in the --profile file.');
  }

  const config: Partial<DatasetFetchConfig> & { url: string } = { url: seedUrl };

  // Profile
  if (profile) {
    if (profile.seeds !== undefined) config.seeds = profile.seeds;
    if (profile.loginUrl !== undefined) config.loginUrl = profile.loginUrl;
    if (profile.formAdapter !== undefined) config.formAdapter = profile.formAdapter;
    if (profile.postLoginFragments !== undefined) config.postLoginFragments = profile.postLoginFragments;
    if (profile.pageKeywords !== undefined) config.pageKeywords = profile.pageKeywords;
    if (profile.downloadKeywords !== undefined) config.downloadKeywords = profile.downloadKeywords;
    if (profile.termsPagePatterns !== undefined) config.termsPagePatterns = profile.termsPagePatterns;
    if (profile.fileExtensions !== undefined) config.fileExtensions = profile.fileExtensions;
    if (profile.maxDepth !== undefined) config.maxDepth = profile.maxDepth;
    if (profile.outputStructure !== undefined) config.outputStructure = profile.outputStructure;
  }

  // Scope
  if (options.depth !== undefined) {
    config.maxDepth = parseInt(options.depth, 10);
  }
  if (options.maxPages !== undefined) {
    config.maxPages = parseInt(options.maxPages, 10);
  }
  if (options.seed !== undefined && options.seed.length > 0) {
    config.seeds = [...(config.seeds ?? []), ...options.seed];
  }
  if (options.keyword !== undefined && options.keyword.length > 0) {
    config.pageKeywords = options.keyword;
  }

  // Output
  if (options.output) {
    config.outputDir = options.output;
  }
  if (options.flat) {
    config.outputStructure = 'flat';
  }
  // Commander negated option: --no-skip-existing sets options.skipExisting to false
  if (options.skipExisting === false) {
    config.skipExisting = false;
  }
  if (options.htmlThreshold !== undefined) {
    config.htmlSizeThreshold = parseInt(options.htmlThreshold, 10);
  }

  // Authentication
  if (options.loginUrl !== undefined) {
    config.loginUrl = options.loginUrl;
  }
  if (options.adapter !== undefined) {
    if (!isFormAdapterName(options.adapter)) {
      throw new Error(
        `Invalid adapter "${options.adapter}". Must be one of: ${FORM_ADAPTER_NAMES.join(', ')}`,
      );
    }
    config.formAdapter = options.adapter;
  }
  if (options.username !== undefined) {
    const password = options.password ?? env[PASSWORD_ENV_VAR];
    if (password === undefined) {
      throw new Error(`--username needs --password or the ${PASSWORD_ENV_VAR} environment variable.`);
    }
    config.credentials = { username: options.username, password };
  }
  if (options.cookieFile !== undefined) {
    config.cookieFile = options.cookieFile;
  }

  // Fetching
  if (options.pageDelay !== undefined) {
    config.pageDelay = parseInt(options.pageDelay, 10);
  }
  if (options.downloadDelay !== undefined) {
    config.downloadDelay = parseInt(options.downloadDelay, 10);
  }
  if (options.retries !== undefined) {
    config.maxAttempts = parseInt(options.retries, 10);
  }
  if (options.header !== undefined && options.header.length > 0) {
    config.headers = parseHeaders(options.header);
  }

  return config;
}
