export { MirrorLayout } from './mirror.js';
export { FlatLayout } from './flat.js';
export {
  sanitizeFilename,
  urlPathSegments,
  filenameFromUrl,
  filenameFromContentDisposition,
} from './utils.js';

import type { DatasetFetchConfig } from '../types.js';
import { MirrorLayout } from './mirror.js';
import { FlatLayout } from './flat.js';

/**
 * Common interface for destination layouts.
 */
export interface DestinationLayout {
  resolve(url: string, fallbackName?: string): string;
  resolveName(name: string, url: string): string;
}

/**
 * Factory function that returns the layout for traversal downloads
 * based on the configuration's `outputStructure` setting.
 */
export function createLayout(
  config: Pick<DatasetFetchConfig, 'outputStructure' | 'outputDir'>,
): DestinationLayout {
  switch (config.outputStructure) {
    case 'mirror':
      return new MirrorLayout(config.outputDir);
    case 'flat':
      return new FlatLayout(config.outputDir);
    default: {
      const _exhaustive: never = config.outputStructure;
      throw new Error(`Unknown output structure: ${String(_exhaustive)}`);
    }
  }
}
