import type { DownloadOutcome } from './download/downloader.js';
import type { FormAdapter, FormAdapterName } from './auth/adapters.js';

/**
 * How a URL found on a page should be treated by the crawler.
 */
export type ResourceKind = 'page' | 'file';

/**
 * A classified absolute URL discovered during a crawl.
 */
export interface ResourceReference {
  url: string;
  kind: ResourceKind;
  /** Whether the URL came from plain traversal or from a terms-acceptance response. */
  via: 'traversal' | 'terms';
}

/**
 * Login credentials for sites that gate their downloads behind an account.
 */
export interface Credentials {
  username: string;
  password: string;
}

/**
 * A page that was fetched and parsed during crawling.
 */
export interface VisitedPage {
  url: string;
  depth: number;
  statusCode: number;
  /** Number of file references found on the page. */
  fileLinks: number;
  /** Number of page references found on the page. */
  pageLinks: number;
  fetchedAt: Date;
}

/**
 * A page that was skipped during crawling.
 */
export interface SkippedPage {
  url: string;
  reason: string;
}

/**
 * Authentication progress reported through `onAuth`.
 */
export interface AuthEvent {
  step: 'login' | 'terms';
  url: string;
  ok: boolean;
  detail: string;
}

/**
 * Full configuration interface for dataset-fetch.
 */
export interface DatasetFetchConfig {
  // Required
  url: string;

  // Scope
  seeds?: string[];
  maxDepth: number;
  maxPages: number;
  pageKeywords: string[];
  downloadKeywords: string[];
  termsPagePatterns: string[];
  fileExtensions: string[];

  // Output
  outputDir: string;
  outputStructure: 'mirror' | 'flat';
  skipExisting: boolean;
  htmlSizeThreshold: number;

  // Authentication
  credentials?: Credentials;
  loginUrl?: string;
  formAdapter: FormAdapterName | FormAdapter;
  postLoginFragments?: string[];
  cookieFile?: string;

  // Fetching
  pageDelay: number;
  downloadDelay: number;
  maxAttempts: number;
  retryDelay: number;
  pageTimeout: number;
  fileTimeout: number;
  hostInterval: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;

  // Events
  onPageVisited?: (page: VisitedPage) => void;
  onPageSkipped?: (url: string, reason: string) => void;
  onDownload?: (outcome: DownloadOutcome) => void;
  onAuth?: (event: AuthEvent) => void;
  onError?: (url: string, error: Error) => void;
}

/**
 * Result returned from a dataset fetch run.
 */
export interface CrawlResult {
  pages: VisitedPage[];
  downloads: DownloadOutcome[];
  skipped: SkippedPage[];
  authenticated: boolean;
  outputPath: string;
  stats: {
    totalPages: number;
    totalDownloaded: number;
    totalSkipped: number;
    totalFailed: number;
    totalBytes: number;
    duration: number;
  };
}

/**
 * Extensions treated as downloadable resources: archives, documents,
 * spreadsheets, tabular text, markup and database files.
 */
export const DEFAULT_FILE_EXTENSIONS = [
  '.zip', '.gz', '.pdf', '.txt', '.csv', '.tsv', '.xlsx', '.xls',
  '.docx', '.doc', '.xml', '.json', '.db', '.sqlite', '.owl', '.rdf',
];

/**
 * Default configuration values. Applied when merging user-provided
 * partial config into a full DatasetFetchConfig.
 */
export const CONFIG_DEFAULTS = {
  maxDepth: 3,
  maxPages: 500,
  pageKeywords: ['download', 'file'],
  downloadKeywords: ['download'],
  termsPagePatterns: ['file-access', 'download-id'],
  fileExtensions: DEFAULT_FILE_EXTENSIONS,
  outputDir: './datasets',
  outputStructure: 'mirror',
  skipExisting: true,
  htmlSizeThreshold: 10_000,
  formAdapter: 'generic',
  pageDelay: 1000,
  downloadDelay: 500,
  maxAttempts: 3,
  retryDelay: 2000,
  pageTimeout: 30_000,
  fileTimeout: 300_000,
  hostInterval: 0,
} satisfies Omit<DatasetFetchConfig, 'url'>;
