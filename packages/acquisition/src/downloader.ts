/**
 * Downloader
 *
 * Streams release archives into the download cache. A file already present
 * at the destination is a cache hit and is not fetched again; partial
 * downloads live under a `.partial` name until complete.
 */

import { EventEmitter } from 'node:events';
import { createWriteStream } from 'node:fs';
import { dirname } from 'node:path';
import { Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { request, type Dispatcher } from 'undici';
import { FetchError, errorMessage } from '@ghidra-dmg/core';
import {
  createLogger,
  ensureDir,
  moveFile,
  pathExists,
  removePath,
  retry,
  type Logger,
  type RetryOptions,
} from '@ghidra-dmg/utils';

export interface DownloadProgress {
  url: string;
  bytesDownloaded: number;
  totalBytes?: number;
  percentage?: number;
}

export interface DownloadResult {
  path: string;
  cached: boolean;
  bytes: number;
}

export interface DownloaderOptions {
  dispatcher?: Dispatcher;
  logger?: Logger;
  retry?: Partial<RetryOptions>;
}

class HttpStatusError extends Error {
  constructor(public readonly statusCode: number) {
    super(`server responded with status code ${statusCode}`);
    this.name = 'HttpStatusError';
  }
}

function isRetryable(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.statusCode >= 500 || error.statusCode === 429;
  }
  return !(error instanceof Error && error.name === 'AbortError');
}

export class Downloader extends EventEmitter {
  private readonly dispatcher?: Dispatcher;
  private readonly logger: Logger;
  private readonly retryOptions: Partial<RetryOptions>;

  constructor(options: DownloaderOptions = {}) {
    super();
    this.dispatcher = options.dispatcher;
    this.logger = options.logger ?? createLogger({ component: 'downloader' });
    this.retryOptions = options.retry ?? {};
  }

  /**
   * Download `url` to `destination` unless it is already cached there
   */
  async download(url: string, destination: string, signal?: AbortSignal): Promise<DownloadResult> {
    if (await pathExists(destination)) {
      this.logger.info({ url, destination }, 'Using cached download');
      return { path: destination, cached: true, bytes: 0 };
    }

    await ensureDir(dirname(destination));
    const partialPath = `${destination}.partial`;

    try {
      const bytes = await retry(
        () => this.fetchTo(url, partialPath, signal),
        {
          retryIf: isRetryable,
          onRetry: (error, attempt) => {
            this.logger.warn({ url, attempt, error: errorMessage(error) }, 'Download failed, retrying');
          },
          signal,
          ...this.retryOptions,
        }
      );
      await moveFile(partialPath, destination);
      this.logger.info({ url, destination, bytes }, 'Download complete');
      return { path: destination, cached: false, bytes };
    } catch (error) {
      await removePath(partialPath);
      throw new FetchError(url, errorMessage(error), { cause: error });
    }
  }

  private async fetchTo(url: string, filePath: string, signal?: AbortSignal): Promise<number> {
    const response = await request(url, {
      method: 'GET',
      headers: { 'user-agent': 'ghidra-dmg' },
      maxRedirections: 5,
      dispatcher: this.dispatcher,
      signal,
    });

    if (response.statusCode !== 200) {
      await response.body.dump();
      throw new HttpStatusError(response.statusCode);
    }

    const lengthHeader = response.headers['content-length'];
    const parsedLength = typeof lengthHeader === 'string' ? Number.parseInt(lengthHeader, 10) : NaN;
    const totalBytes = Number.isFinite(parsedLength) ? parsedLength : undefined;

    let bytesDownloaded = 0;
    const trackProgress = new Transform({
      transform: (chunk: Buffer, _encoding, callback) => {
        bytesDownloaded += chunk.length;
        const progress: DownloadProgress = {
          url,
          bytesDownloaded,
          totalBytes,
          percentage: totalBytes ? Math.round((bytesDownloaded / totalBytes) * 100) : undefined,
        };
        this.emit('progress', progress);
        callback(null, chunk);
      },
    });

    await pipeline(response.body, trackProgress, createWriteStream(filePath));

    if (totalBytes !== undefined && bytesDownloaded !== totalBytes) {
      throw new Error(`size mismatch: expected ${totalBytes} bytes, got ${bytesDownloaded}`);
    }

    return bytesDownloaded;
  }
}
