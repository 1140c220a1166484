export { CrawlEngine, SeedUnreachableError } from './engine.js';
export { normalizeUrl, UrlSet, sameOrigin, buildCrawlResult } from './base.js';
