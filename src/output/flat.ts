import { join } from 'node:path';

import { filenameFromUrl } from './utils.js';

/**
 * Flat layout.
 *
 * Places every file directly in the output directory under its own name.
 * Example: `https://example.com/files/2024/codes.zip` -> `<outputDir>/codes.zip`
 */
export class FlatLayout {
  constructor(private outputDir: string) {}

  /**
   * Convert a resource URL to its destination path.
   *
   * @param url - The resource URL
   * @param fallbackName - Filename used when the URL has none
   */
  resolve(url: string, fallbackName?: string): string {
    return join(this.outputDir, filenameFromUrl(url, fallbackName));
  }

  /**
   * Destination for a name chosen by the server (Content-Disposition).
   */
  resolveName(name: string): string {
    return join(this.outputDir, name);
  }
}
