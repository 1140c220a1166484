import type { CrawlResult, SkippedPage, VisitedPage } from '../types.js';
import type { DownloadOutcome } from '../download/downloader.js';

/**
 * Canonical form used to compare URLs within a run: lower-case host, no
 * fragment, no trailing slash on a non-root path. The query string stays,
 * since download endpoints often name the file there
 * (`/get?file=codes.zip`).
 *
 * Unparseable input comes back unchanged.
 */
export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  parsed.hostname = parsed.hostname.toLowerCase();
  parsed.hash = '';
  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.slice(0, -1);
  }

  return parsed.href;
}

/**
 * A set of URLs compared in normalized form.
 *
 * Used both for pages visited and for files downloaded during one run,
 * so that `https://example.com/docs` and `https://example.com/docs/`
 * are considered the same URL.
 */
export class UrlSet {
  private set = new Set<string>();

  /**
   * Check whether a URL (after normalization) is in the set.
   */
  has(url: string): boolean {
    return this.set.has(normalizeUrl(url));
  }

  /**
   * Add a URL (after normalization) to the set.
   */
  add(url: string): void {
    this.set.add(normalizeUrl(url));
  }

  /**
   * Return the number of URLs in the set.
   */
  get size(): number {
    return this.set.size;
  }

  /**
   * Return the normalized URLs in insertion order.
   */
  values(): string[] {
    return Array.from(this.set);
  }
}

/**
 * Check whether two URLs share an origin (scheme, host and port).
 */
export function sameOrigin(a: string, b: string): boolean {
  try {
    return new URL(a).origin === new URL(b).origin;
  } catch {
    return false;
  }
}

/**
 * Build a CrawlResult from collected pages, downloads, skipped pages, and timing info.
 */
export function buildCrawlResult(
  pages: VisitedPage[],
  downloads: DownloadOutcome[],
  skipped: SkippedPage[],
  authenticated: boolean,
  outputPath: string,
  startTime: number,
): CrawlResult {
  let totalDownloaded = 0;
  let totalFailed = 0;
  let totalBytes = 0;
  for (const outcome of downloads) {
    if (outcome.status === 'success') {
      totalDownloaded++;
      totalBytes += outcome.bytes;
    } else if (outcome.status === 'failure') {
      totalFailed++;
    }
  }

  return {
    pages,
    downloads,
    skipped,
    authenticated,
    outputPath,
    stats: {
      totalPages: pages.length,
      totalDownloaded,
      totalSkipped: skipped.length,
      totalFailed,
      totalBytes,
      duration: Date.now() - startTime,
    },
  };
}
