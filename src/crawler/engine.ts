import type {
  CrawlResult,
  DatasetFetchConfig,
  SkippedPage,
  VisitedPage,
} from '../types.js';
import type { Session, SessionResponse } from '../fetcher/session.js';
import { isBinaryContentType } from '../fetcher/index.js';
import { extractFromDocument, parseHtml } from '../fetcher/link-extractor.js';
import { hasFileExtension, urlMatchesAny } from '../fetcher/classify.js';
import { sleep } from '../fetcher/rate-limiter.js';
import type { Authenticator } from '../auth/authenticator.js';
import type { Downloader, DownloadOutcome } from '../download/downloader.js';
import { createLayout, FlatLayout, type DestinationLayout } from '../output/index.js';
import { filenameFromContentDisposition, urlPathSegments } from '../output/utils.js';
import { UrlSet, buildCrawlResult, sameOrigin } from './base.js';

/**
 * Thrown when none of the seed URLs could be fetched. Carries the
 * (empty) result so callers can still report what was attempted.
 */
export class SeedUnreachableError extends Error {
  constructor(
    message: string,
    public readonly result: CrawlResult,
  ) {
    super(message);
    this.name = 'SeedUnreachableError';
  }
}

/**
 * Depth-first crawler that walks from seed pages towards downloadable
 * files, downloading every file it meets and accepting terms-of-use gates
 * on the way.
 *
 * All per-run state (visited pages, results) lives on the instance; the
 * set of downloaded files lives on the Downloader it is given. Requests are
 * issued one at a time with fixed pauses between them.
 */
export class CrawlEngine {
  private visited = new UrlSet();
  private pages: VisitedPage[] = [];
  private downloads: DownloadOutcome[] = [];
  private skipped: SkippedPage[] = [];
  private readonly layout: DestinationLayout;
  private readonly termsLayout: FlatLayout;
  private seedOrigin = '';
  private seedsReached = 0;

  constructor(
    private config: DatasetFetchConfig,
    private session: Session,
    private downloader: Downloader,
    private authenticator?: Authenticator,
  ) {
    this.layout = createLayout(config);
    this.termsLayout = new FlatLayout(config.outputDir);
  }

  /**
   * Crawl each seed in turn, starting at depth 0.
   *
   * @param seeds - Seed URLs; defaults to the configured url and seeds
   * @returns The crawl result including pages, downloads, skipped pages, and stats
   * @throws SeedUnreachableError if no seed page could be fetched
   */
  async crawl(
    seeds: string[] = [this.config.url, ...(this.config.seeds ?? [])],
  ): Promise<CrawlResult> {
    const startTime = Date.now();

    for (const seed of seeds) {
      if (this.aborted) {
        break;
      }
      this.seedOrigin = new URL(seed).origin;
      await this.visit(seed, 0);
    }

    const result = buildCrawlResult(
      this.pages,
      this.downloads,
      this.skipped,
      this.session.authenticated,
      this.config.outputDir,
      startTime,
    );

    if (seeds.length > 0 && this.seedsReached === 0 && !this.aborted) {
      throw new SeedUnreachableError(
        `None of the seed URLs could be fetched: ${seeds.join(', ')}`,
        result,
      );
    }

    return result;
  }

  /**
   * Visit one page: fetch it, download the files it links to, run the
   * terms flow if it is a gate page, then descend into its page links.
   */
  private async visit(url: string, depth: number): Promise<void> {
    if (depth > this.config.maxDepth) {
      this.addSkipped(url, `Exceeds max depth (${this.config.maxDepth})`);
      return;
    }
    if (this.visited.has(url)) {
      return;
    }
    if (this.visited.size >= this.config.maxPages) {
      this.addSkipped(url, `Page limit reached (${this.config.maxPages})`);
      return;
    }
    if (this.aborted) {
      return;
    }

    // Mark as visited before fetching so cycles end here
    this.visited.add(url);

    const knownFile = hasFileExtension(url, this.config.fileExtensions);
    let page: SessionResponse;
    let html: string;
    try {
      page = await this.session.get(url, {
        kind: knownFile ? 'file' : 'page',
        signal: this.config.signal,
      });
      this.visited.add(page.url);

      if (knownFile || isBinaryContentType(page.contentType)) {
        if (depth === 0) {
          this.seedsReached++;
        }
        const destination = this.destinationFor(url, page);
        if (knownFile) {
          await this.downloadResponse(url, page, destination);
        } else {
          // The page timeout would cut the transfer short; fetch again as a file
          await page.response.body?.cancel();
          if (!this.downloader.hasDownloaded(url)) {
            this.record(await this.downloader.save(url, destination));
          }
        }
        return;
      }

      html = await page.response.text();
    } catch (error) {
      if (!this.aborted) {
        this.reportFailure(url, error);
      }
      return;
    }

    if (depth === 0) {
      this.seedsReached++;
    }

    let document: Document;
    try {
      document = parseHtml(html, page.url);
    } catch (error) {
      this.reportFailure(url, error);
      return;
    }

    const references = extractFromDocument(document, html, page.url, {
      fileExtensions: this.config.fileExtensions,
      pageKeywords: this.config.pageKeywords,
      downloadKeywords: this.config.downloadKeywords,
    });
    const files = references.filter((reference) => reference.kind === 'file');
    const links = references.filter((reference) => reference.kind === 'page');

    const visitedPage: VisitedPage = {
      url: page.url,
      depth,
      statusCode: page.status,
      fileLinks: files.length,
      pageLinks: links.length,
      fetchedAt: new Date(),
    };
    this.pages.push(visitedPage);
    this.config.onPageVisited?.(visitedPage);

    for (const file of files) {
      if (this.aborted) {
        return;
      }
      if (this.downloader.hasDownloaded(file.url)) {
        continue;
      }
      this.record(await this.downloader.save(file.url, this.layout.resolve(file.url)));
      await this.pause(this.config.downloadDelay);
    }

    if (
      this.authenticator &&
      urlMatchesAny(page.url, this.config.termsPagePatterns) &&
      document.querySelector('form') !== null
    ) {
      await this.acceptTerms(this.authenticator, page.url, html);
    }

    for (const link of links) {
      if (this.aborted) {
        return;
      }
      if (!sameOrigin(link.url, this.seedOrigin) || this.visited.has(link.url)) {
        continue;
      }
      if (depth < this.config.maxDepth) {
        await this.pause(this.config.pageDelay);
      }
      await this.visit(link.url, depth + 1);
    }
  }

  /**
   * Submit the terms form on a gate page and download what it reveals.
   * Terms-flow files are written flat into the output directory.
   */
  private async acceptTerms(
    authenticator: Authenticator,
    pageUrl: string,
    html: string,
  ): Promise<void> {
    const result = await authenticator.acceptTerms(pageUrl, html);
    if (result.error) {
      this.config.onError?.(pageUrl, result.error);
    }

    const [first] = result.references;
    if (result.inline && first) {
      const name = filenameFromContentDisposition(result.inline.headers['content-disposition']);
      const destination = name
        ? this.termsLayout.resolveName(name)
        : this.termsLayout.resolve(first.url, fallbackName(first.url));
      await this.downloadResponse(first.url, result.inline, destination);
      return;
    }

    for (const reference of result.references) {
      if (this.aborted) {
        return;
      }
      if (this.downloader.hasDownloaded(reference.url)) {
        continue;
      }
      const destination = this.termsLayout.resolve(reference.url, fallbackName(reference.url));
      this.record(await this.downloader.save(reference.url, destination));
      await this.pause(this.config.downloadDelay);
    }
  }

  /**
   * Traversal destination for a response, honouring a server-chosen name.
   */
  private destinationFor(url: string, response: SessionResponse): string {
    const name = filenameFromContentDisposition(response.headers['content-disposition']);
    return name ? this.layout.resolveName(name, url) : this.layout.resolve(url);
  }

  /**
   * Hand an already-fetched response to the downloader, unless its URL
   * has been handled as a file before.
   */
  private async downloadResponse(
    url: string,
    response: SessionResponse,
    destination: string,
  ): Promise<void> {
    if (this.downloader.hasDownloaded(url)) {
      await response.response.body?.cancel();
      return;
    }
    this.record(await this.downloader.saveResponse(url, response, destination));
  }

  /**
   * Record a download outcome and fire the onDownload callback.
   */
  private record(outcome: DownloadOutcome): void {
    this.downloads.push(outcome);
    this.config.onDownload?.(outcome);
    if (outcome.status === 'failure') {
      this.config.onError?.(outcome.url, outcome.error);
    }
  }

  /**
   * Report a page that could not be fetched or parsed. The crawl continues.
   */
  private reportFailure(url: string, error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.config.onError?.(url, err);
    this.addSkipped(url, err.message);
  }

  /**
   * Record a skipped page and fire the onPageSkipped callback.
   */
  private addSkipped(url: string, reason: string): void {
    this.skipped.push({ url, reason });
    this.config.onPageSkipped?.(url, reason);
  }

  /**
   * Politeness delay; returns early when the run is cancelled.
   */
  private async pause(ms: number): Promise<void> {
    try {
      await sleep(ms, this.config.signal);
    } catch (error) {
      if (!this.aborted) {
        throw error;
      }
    }
  }

  private get aborted(): boolean {
    return this.config.signal?.aborted ?? false;
  }
}

/**
 * Name for a file whose URL ends in a directory, e.g. a form endpoint
 * such as `/file-access/download-id/470626/`: its last path segment.
 */
function fallbackName(url: string): string {
  const segments = urlPathSegments(url);
  return segments[segments.length - 1] ?? 'download';
}
