import type { AuthEvent, CrawlResult, VisitedPage } from '../types.js';
import type { DownloadOutcome } from '../download/downloader.js';

/**
 * Output verbosity level for the CLI.
 */
export type Verbosity = 'normal' | 'verbose' | 'quiet';

/**
 * Event callbacks rendered by the CLI.
 */
export interface ProgressCallbacks {
  onPageVisited: (page: VisitedPage) => void;
  onPageSkipped: (url: string, reason: string) => void;
  onDownload: (outcome: DownloadOutcome) => void;
  onAuth: (event: AuthEvent) => void;
  onError: (url: string, error: Error) => void;
}

/**
 * Format a byte count for display.
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Create event callback handlers for progress display during crawling.
 *
 * All output goes to stderr so stdout stays clean.
 *
 * - quiet mode: no output
 * - normal mode: visited pages, saved files, login/terms results and errors
 * - verbose mode: also depth and link counts, skipped pages and skipped files
 *
 * @param verbosity - The desired output verbosity
 */
export function createProgressCallbacks(verbosity: Verbosity): ProgressCallbacks {
  let pageCount = 0;

  if (verbosity === 'quiet') {
    return {
      onPageVisited: () => { pageCount++; },
      onPageSkipped: () => {},
      onDownload: () => {},
      onAuth: () => {},
      onError: () => {},
    };
  }

  return {
    onPageVisited: (page: VisitedPage) => {
      pageCount++;
      if (verbosity === 'verbose') {
        process.stderr.write(
          `[${pageCount}] Visited: ${page.url} (depth ${page.depth}, ${page.fileLinks} files, ${page.pageLinks} links)\n`,
        );
      } else {
        process.stderr.write(`[${pageCount}] ${page.url}\n`);
      }
    },

    onPageSkipped: (url: string, reason: string) => {
      if (verbosity === 'verbose') {
        process.stderr.write(`  Skipped: ${url} (${reason})\n`);
      }
    },

    onDownload: (outcome: DownloadOutcome) => {
      switch (outcome.status) {
        case 'success':
          process.stderr.write(`  Saved: ${outcome.path} (${formatBytes(outcome.bytes)})\n`);
          break;
        case 'skip':
          if (verbosity === 'verbose') {
            process.stderr.write(`  Not saved: ${outcome.url} (${outcome.reason})\n`);
          }
          break;
        case 'failure':
          // Reported through onError
          break;
        default: {
          const _exhaustive: never = outcome;
          throw new Error(`Unknown download outcome: ${JSON.stringify(_exhaustive)}`);
        }
      }
    },

    onAuth: (event: AuthEvent) => {
      const label = event.step === 'login' ? 'Login' : 'Terms';
      process.stderr.write(`${label} ${event.ok ? 'ok' : 'failed'}: ${event.detail}\n`);
    },

    onError: (url: string, error: Error) => {
      process.stderr.write(`  Error: ${url} - ${error.message}\n`);
    },
  };
}

/**
 * Print a summary of the crawl results to stderr.
 *
 * @param result - The crawl result to summarize
 * @param verbosity - The desired output verbosity
 */
export function printSummary(result: CrawlResult, verbosity: Verbosity): void {
  if (verbosity === 'quiet') {
    return;
  }

  const { stats } = result;
  const durationSec = (stats.duration / 1000).toFixed(1);

  process.stderr.write('\n');
  process.stderr.write(
    `Done! Visited ${stats.totalPages} pages, downloaded ${stats.totalDownloaded} files (${formatBytes(stats.totalBytes)})`,
  );
  if (stats.totalFailed > 0) {
    process.stderr.write(`, ${stats.totalFailed} failed`);
  }
  if (stats.totalSkipped > 0) {
    process.stderr.write(`, skipped ${stats.totalSkipped} pages`);
  }
  process.stderr.write(` in ${durationSec}s\n`);
  process.stderr.write(`Authenticated: ${result.authenticated ? 'yes' : 'no'}\n`);
  process.stderr.write(`Output: ${result.outputPath}\n`);
}

/**
 * Print dry-run information showing what would be crawled.
 *
 * @param config - Key configuration values to display
 */
export function printDryRun(config: {
  url: string;
  seeds: string[];
  maxDepth: number;
  maxPages: number;
  outputDir: string;
  outputStructure: string;
  pageKeywords: string[];
  loginUrl?: string;
  username?: string;
  formAdapter: string;
}): void {
  process.stderr.write('\n--- Dry Run ---\n');
  process.stderr.write(`URL: ${config.url}\n`);
  if (config.seeds.length > 0) {
    process.stderr.write(`Extra seeds: ${config.seeds.join(', ')}\n`);
  }
  process.stderr.write(`Max depth: ${config.maxDepth}\n`);
  process.stderr.write(`Max pages: ${config.maxPages}\n`);
  process.stderr.write(`Page keywords: ${config.pageKeywords.length > 0 ? config.pageKeywords.join(', ') : '(any)'}\n`);
  process.stderr.write(`Output: ${config.outputDir} (${config.outputStructure})\n`);
  if (config.loginUrl) {
    process.stderr.write(
      `Login: ${config.loginUrl} as ${config.username ?? '(no username)'} via ${config.formAdapter} adapter\n`,
    );
  }
  process.stderr.write('--- Nothing will be fetched ---\n');
}
