import { DEFAULT_FILE_EXTENSIONS } from '../types.js';

/**
 * Check whether a URL's path ends in one of the given file extensions.
 * The query string is ignored, so `/get/data.zip?v=2` counts as a file.
 */
export function hasFileExtension(
  url: string,
  extensions: readonly string[] = DEFAULT_FILE_EXTENSIONS,
): boolean {
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    return false;
  }
  return extensions.some((ext) => pathname.endsWith(ext.toLowerCase()));
}

/**
 * Check whether a URL's path contains one of the given keywords
 * (case-insensitive). An empty keyword list matches everything.
 */
export function pathHasKeyword(url: string, keywords: readonly string[]): boolean {
  if (keywords.length === 0) {
    return true;
  }
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    return false;
  }
  return keywords.some((keyword) => pathname.includes(keyword.toLowerCase()));
}

/**
 * Check whether a URL matches one of the given substrings
 * (case-insensitive, tested against the whole URL).
 */
export function urlMatchesAny(url: string, patterns: readonly string[]): boolean {
  const lower = url.toLowerCase();
  return patterns.some((pattern) => lower.includes(pattern.toLowerCase()));
}

/**
 * Build a regular expression matching absolute http(s) URLs that end in one
 * of the given extensions, for scanning raw page text.
 */
export function fileUrlPattern(extensions: readonly string[]): RegExp {
  const alternatives = extensions
    .map((ext) => ext.replace(/^\./, '').replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('|');
  return new RegExp(
    `https?://[^\\s<>"'{}|\\\\^\`\\[\\]]+\\.(?:${alternatives})(?![A-Za-z0-9])`,
    'gi',
  );
}
