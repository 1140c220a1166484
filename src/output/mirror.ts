import { join } from 'node:path';

import { filenameFromUrl, sanitizeFilename, urlPathSegments } from './utils.js';

/**
 * Mirror layout.
 *
 * Maps URL paths to file paths preserving directory hierarchy.
 * Example: `https://example.com/files/2024/codes.zip` -> `<outputDir>/files/2024/codes.zip`
 */
export class MirrorLayout {
  constructor(private outputDir: string) {}

  /**
   * Convert a resource URL to its destination path.
   *
   * @param url - The resource URL
   * @param fallbackName - Filename used when the URL has none
   */
  resolve(url: string, fallbackName?: string): string {
    return join(this.outputDir, ...directories(url), filenameFromUrl(url, fallbackName));
  }

  /**
   * Destination for a name chosen by the server (Content-Disposition),
   * kept in the directory the URL maps to.
   */
  resolveName(name: string, url: string): string {
    return join(this.outputDir, ...directories(url), name);
  }
}

/** Sanitized directory segments of a URL path, without its last name. */
function directories(url: string): string[] {
  const segments = urlPathSegments(url);
  const hasName = segments.length > 0 && !new URL(url).pathname.endsWith('/');
  return (hasName ? segments.slice(0, -1) : segments).map((seg) => sanitizeFilename(seg));
}
