import { access, mkdir, open, rename, rm } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { Session, SessionResponse } from '../fetcher/session.js';
import { isHtmlContentType } from '../fetcher/index.js';
import { UrlSet } from '../crawler/base.js';

type FileHandle = Awaited<ReturnType<typeof open>>;

/** Size of the slices written to disk. */
const CHUNK_SIZE = 8192;

/**
 * Error thrown when a destination directory or file cannot be written.
 */
export class FilesystemError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'FilesystemError';
  }
}

/**
 * Result of a download attempt. Failures are reported, never thrown.
 */
export type DownloadOutcome =
  | { status: 'success'; url: string; path: string; bytes: number }
  | { status: 'skip'; url: string; path?: string; reason: string }
  | { status: 'failure'; url: string; path?: string; kind: 'network' | 'filesystem'; reason: string; error: Error };

/**
 * Options for the Downloader.
 */
export interface DownloaderOptions {
  /** HTML-like bodies smaller than this many bytes are treated as error/login pages. */
  htmlSizeThreshold: number;
  /** Skip destinations that already exist on disk. */
  skipExisting: boolean;
  /** Referer sent with file requests. */
  referer?: string;
  signal?: AbortSignal;
}

/**
 * Fetches resources through the session and writes them to disk.
 *
 * Owns the set of URLs already fetched as files this run. A URL joins
 * that set as soon as a fetch is attempted, so no URL is requested as a
 * file twice, whatever the outcome of the first attempt.
 */
export class Downloader {
  constructor(
    private readonly session: Session,
    private readonly options: DownloaderOptions,
    readonly downloaded: UrlSet = new UrlSet(),
  ) {}

  /**
   * Whether the URL has already been handled as a file this run.
   */
  hasDownloaded(url: string): boolean {
    return this.downloaded.has(url);
  }

  /**
   * Fetch `url` and save it to `destination`.
   *
   * @returns success, skip, or failure with the reason
   */
  async save(url: string, destination: string): Promise<DownloadOutcome> {
    if (this.downloaded.has(url)) {
      return { status: 'skip', url, path: destination, reason: 'already downloaded this run' };
    }

    if (this.options.skipExisting && (await fileExists(destination))) {
      this.downloaded.add(url);
      return { status: 'skip', url, path: destination, reason: 'already exists on disk' };
    }

    this.downloaded.add(url);

    let response: SessionResponse;
    try {
      response = await this.session.get(url, {
        kind: 'file',
        signal: this.options.signal,
        headers: this.options.referer ? { Referer: this.options.referer } : undefined,
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      return { status: 'failure', url, path: destination, kind: 'network', reason: err.message, error: err };
    }

    return this.write(url, response, destination);
  }

  /**
   * Save a response that has already been fetched (a page URL that turned
   * out to be a file, or a form submission answered with the file itself).
   *
   * @param url - The URL identifying the resource
   * @param response - The live response; its body is consumed here
   * @param destination - Destination file path
   */
  async saveResponse(
    url: string,
    response: SessionResponse,
    destination: string,
  ): Promise<DownloadOutcome> {
    this.downloaded.add(url);

    if (this.options.skipExisting && (await fileExists(destination))) {
      await response.response.body?.cancel();
      return { status: 'skip', url, path: destination, reason: 'already exists on disk' };
    }

    return this.write(url, response, destination);
  }

  private async write(
    url: string,
    response: SessionResponse,
    destination: string,
  ): Promise<DownloadOutcome> {
    const body = response.response.body;

    // An HTML body is read up front: small ones are login or error pages
    let buffered: Uint8Array | undefined;
    if (isHtmlContentType(response.contentType)) {
      try {
        buffered = new Uint8Array(await response.response.arrayBuffer());
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        return { status: 'failure', url, path: destination, kind: 'network', reason: err.message, error: err };
      }
      if (buffered.byteLength < this.options.htmlSizeThreshold) {
        return {
          status: 'skip',
          url,
          path: destination,
          reason: `response is HTML (${buffered.byteLength} bytes), likely a login or error page`,
        };
      }
    }

    const partPath = `${destination}.part`;
    try {
      await mkdir(dirname(destination), { recursive: true });
    } catch (error) {
      await body?.cancel();
      return filesystemFailure(url, destination, error);
    }

    let handle: FileHandle;
    try {
      handle = await open(partPath, 'w');
    } catch (error) {
      await body?.cancel();
      return filesystemFailure(url, destination, error);
    }

    let bytes = 0;
    let phase: 'network' | 'filesystem' = 'network';
    try {
      if (buffered) {
        phase = 'filesystem';
        bytes = await writeChunked(handle, buffered);
      } else if (body) {
        const reader = body.getReader();
        for (;;) {
          phase = 'network';
          const { done, value } = await reader.read();
          if (done) {
            break;
          }
          phase = 'filesystem';
          bytes += await writeChunked(handle, value);
        }
      }
      phase = 'filesystem';
      await handle.close();
      await rename(partPath, destination);
    } catch (error) {
      await handle.close().catch(() => undefined);
      await rm(partPath, { force: true });
      if (phase === 'filesystem') {
        return filesystemFailure(url, destination, error);
      }
      const err = error instanceof Error ? error : new Error(String(error));
      return { status: 'failure', url, path: destination, kind: 'network', reason: err.message, error: err };
    }

    return { status: 'success', url, path: destination, bytes };
  }
}

/**
 * Write `data` to the handle in CHUNK_SIZE slices.
 */
async function writeChunked(handle: FileHandle, data: Uint8Array): Promise<number> {
  for (let offset = 0; offset < data.byteLength; offset += CHUNK_SIZE) {
    await handle.write(data.subarray(offset, offset + CHUNK_SIZE));
  }
  return data.byteLength;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function filesystemFailure(url: string, path: string, error: unknown): DownloadOutcome {
  const cause = error instanceof Error ? error.message : String(error);
  const err = new FilesystemError(`Cannot write ${path}: ${cause}`, path);
  return { status: 'failure', url, path, kind: 'filesystem', reason: err.message, error: err };
}
