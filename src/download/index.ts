export { Downloader, FilesystemError } from './downloader.js';
export type { DownloadOutcome, DownloaderOptions } from './downloader.js';
