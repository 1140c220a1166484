import { JSDOM } from 'jsdom';
import type { ResourceReference } from '../types.js';
import { DEFAULT_FILE_EXTENSIONS } from '../types.js';
import { fileUrlPattern, hasFileExtension, pathHasKeyword } from './classify.js';

/**
 * Options for link extraction and classification.
 */
export interface ExtractResourcesOptions {
  /** Extensions that mark a URL as a downloadable file. */
  fileExtensions?: readonly string[];
  /** Path keywords that make a non-file link worth traversing. Empty accepts all. */
  pageKeywords?: readonly string[];
  /** Keywords that make a form's action URL a traversal candidate. */
  downloadKeywords?: readonly string[];
  /** How the references were reached; defaults to 'traversal'. */
  via?: ResourceReference['via'];
}

/**
 * Error thrown when a document cannot be parsed as HTML.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

/** URL schemes to exclude. */
const EXCLUDED_SCHEMES = ['mailto:', 'javascript:', 'tel:', 'data:'];

/**
 * Parse an HTML string into a jsdom Document.
 *
 * @throws ParseError if jsdom rejects the input
 */
export function parseHtml(html: string, url: string): Document {
  try {
    return new JSDOM(html, { url }).window.document;
  } catch (error) {
    throw new ParseError(
      `Could not parse HTML for ${url}: ${error instanceof Error ? error.message : String(error)}`,
      url,
    );
  }
}

/**
 * Resolve an href against a base URL, keeping only http(s) targets.
 * Fragments are stripped; query strings are kept since download endpoints
 * often identify the file there.
 *
 * @returns The absolute URL, or undefined for unusable hrefs
 */
export function resolveHref(href: string | null, baseUrl: string): string | undefined {
  if (!href || href.trim() === '') {
    return undefined;
  }

  const trimmedHref = href.trim();

  // Skip fragment-only links
  if (trimmedHref.startsWith('#')) {
    return undefined;
  }

  // Skip excluded schemes
  const lowerHref = trimmedHref.toLowerCase();
  if (EXCLUDED_SCHEMES.some((scheme) => lowerHref.startsWith(scheme))) {
    return undefined;
  }

  let resolved: URL;
  try {
    resolved = new URL(trimmedHref, baseUrl);
  } catch {
    // Malformed URL - skip
    return undefined;
  }

  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
    return undefined;
  }

  resolved.hash = '';
  return resolved.href;
}

/**
 * Extract and classify resource links from an already-parsed document.
 *
 * @param document - Parsed HTML document (its URL is the resolution base)
 * @param html - The raw HTML, scanned for URLs outside anchors
 * @param pageUrl - The URL the document was fetched from
 * @param options - Classification options
 * @returns References deduplicated by URL, in document order
 */
export function extractFromDocument(
  document: Document,
  html: string,
  pageUrl: string,
  options: ExtractResourcesOptions = {},
): ResourceReference[] {
  const fileExtensions = options.fileExtensions ?? DEFAULT_FILE_EXTENSIONS;
  const pageKeywords = options.pageKeywords ?? [];
  const downloadKeywords = options.downloadKeywords ?? ['download'];
  const via = options.via ?? 'traversal';

  // document.baseURI honours <base href>
  const baseUrl = document.baseURI || pageUrl;

  const results = new Map<string, ResourceReference>();

  const add = (url: string, kind: ResourceReference['kind']): void => {
    const existing = results.get(url);
    if (existing) {
      // A file classification wins over a page classification
      if (existing.kind === 'page' && kind === 'file') {
        existing.kind = 'file';
      }
      return;
    }
    results.set(url, { url, kind, via });
  };

  // Primary pass: anchors and image-map areas
  for (const anchor of document.querySelectorAll('a[href], area[href]')) {
    const url = resolveHref(anchor.getAttribute('href'), baseUrl);
    if (!url) {
      continue;
    }

    if (hasFileExtension(url, fileExtensions)) {
      add(url, 'file');
    } else if (pathHasKeyword(url, pageKeywords)) {
      add(url, 'page');
    }
  }

  // Secondary pass: absolute file URLs embedded in scripts or attributes
  for (const match of html.matchAll(fileUrlPattern(fileExtensions))) {
    const url = resolveHref(match[0], baseUrl);
    if (url) {
      add(url, 'file');
    }
  }

  // Forms posting to a download endpoint may lead to a terms gate
  for (const form of document.querySelectorAll('form[action]')) {
    const url = resolveHref(form.getAttribute('action'), baseUrl);
    if (!url) {
      continue;
    }
    const lower = url.toLowerCase();
    if (downloadKeywords.some((keyword) => lower.includes(keyword.toLowerCase()))) {
      add(url, hasFileExtension(url, fileExtensions) ? 'file' : 'page');
    }
  }

  return Array.from(results.values());
}

/**
 * Extract and classify resource links from an HTML page.
 *
 * A link is a `file` if its path ends in a known extension, otherwise a
 * `page` if its path contains one of the page keywords. Links matching
 * neither are dropped.
 *
 * @param html - The raw HTML string
 * @param pageUrl - The URL of the page (used to resolve relative URLs)
 * @param options - Classification options
 * @returns References deduplicated by URL
 * @throws ParseError if the HTML cannot be parsed
 */
export function extractResources(
  html: string,
  pageUrl: string,
  options?: ExtractResourcesOptions,
): ResourceReference[] {
  const document = parseHtml(html, pageUrl);
  return extractFromDocument(document, html, pageUrl, options);
}
