import { basename } from 'node:path';

/**
 * Sanitize a filename component to be filesystem-safe.
 * Every character outside `[A-Za-z0-9._-]` becomes `_`; the path
 * components `.` and `..` and empty names become `_`.
 */
export function sanitizeFilename(name: string): string {
  let sanitized = name.replace(/[^A-Za-z0-9._-]/g, '_');

  if (sanitized === '' || sanitized === '.' || sanitized === '..') {
    sanitized = '_';
  }

  // Truncate overly long filenames (keep well under 255-char limit)
  if (sanitized.length > 200) {
    sanitized = sanitized.substring(0, 200);
  }

  return sanitized;
}

/**
 * Decode a percent-encoded path segment, leaving malformed escapes as-is.
 */
function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Split a URL's pathname into decoded, non-empty segments.
 */
export function urlPathSegments(url: string): string[] {
  const parsed = new URL(url);
  return parsed.pathname
    .split('/')
    .filter((segment) => segment !== '')
    .map(decodeSegment);
}

/**
 * Derive a filename from a URL.
 *
 * Uses the last path segment; for paths ending in `/` falls back to a
 * `file` query parameter, and then to `fallback`.
 *
 * - `https://example.com/docs/report.pdf` -> `report.pdf`
 * - `https://example.com/get/?file=codes.zip` -> `codes.zip`
 * - `https://example.com/download/` -> `fallback`
 */
export function filenameFromUrl(url: string, fallback = 'download'): string {
  const parsed = new URL(url);
  const name = parsed.pathname.endsWith('/')
    ? ''
    : decodeSegment(basename(parsed.pathname));

  if (name) {
    return sanitizeFilename(name);
  }

  const fromQuery = parsed.searchParams.get('file');
  if (fromQuery) {
    return sanitizeFilename(basename(fromQuery));
  }

  return sanitizeFilename(fallback);
}

/**
 * Extract the filename from a Content-Disposition header value.
 * Prefers the RFC 5987 `filename*=` form over `filename=`.
 *
 * @returns The sanitized filename, or undefined if none is given
 */
export function filenameFromContentDisposition(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }

  const extended = /filename\*\s*=\s*(?:[\w-]+)?'[^']*'([^;]+)/i.exec(header);
  if (extended) {
    return sanitizeFilename(basename(decodeSegment(extended[1].trim())));
  }

  const plain = /filename\s*=\s*(?:"([^"]*)"|([^;]+))/i.exec(header);
  if (plain) {
    const value = (plain[1] ?? plain[2] ?? '').trim();
    if (value) {
      return sanitizeFilename(basename(value));
    }
  }

  return undefined;
}
