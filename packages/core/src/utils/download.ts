/**
 * Network fetch primitive.
 *
 * Everything above this module talks to a `Downloader`; tests swap in an
 * in-memory implementation. Transport errors, HTTP errors and timeouts all
 * surface as DownloadFailureError.
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { DEFAULT_DOWNLOAD_TIMEOUT_MS } from '../constants/index.js';
import { DownloadFailureError, errorMessage } from './errors.js';
import { logger } from './logger.js';

export interface Downloader {
  /** Fetch the full body at `url` */
  download(url: string): Promise<Uint8Array>;
}

export interface HttpDownloaderOptions {
  timeoutMs?: number;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export function createHttpDownloader(options: HttpDownloaderOptions = {}): Downloader {
  const timeoutMs = options.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;

  return {
    async download(url: string): Promise<Uint8Array> {
      // file:// for manifests and artifacts on local mirrors
      if (url.startsWith('file://')) {
        try {
          return new Uint8Array(await readFile(fileURLToPath(url)));
        } catch (error) {
          throw new DownloadFailureError(`Failed to read ${url}: ${errorMessage(error)}`, { url });
        }
      }

      logger.debug(`Downloading ${url}`, { timeoutMs });
      let response: Response;
      try {
        response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
      } catch (error) {
        if (isTimeout(error)) {
          throw new DownloadFailureError(`Timed out after ${timeoutMs}ms downloading ${url}`, { url, timeoutMs });
        }
        throw new DownloadFailureError(`Failed to download ${url}: ${errorMessage(error)}`, { url });
      }

      if (!response.ok) {
        throw new DownloadFailureError(
          `Failed to download ${url}: HTTP ${response.status} ${response.statusText}`,
          { url, status: response.status }
        );
      }

      try {
        return new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        if (isTimeout(error)) {
          throw new DownloadFailureError(`Timed out after ${timeoutMs}ms downloading ${url}`, { url, timeoutMs });
        }
        throw new DownloadFailureError(`Failed to read response from ${url}: ${errorMessage(error)}`, { url });
      }
    }
  };
}

/**
 * Download and decode as UTF-8 text
 */
export async function downloadText(downloader: Downloader, url: string): Promise<string> {
  const bytes = await downloader.download(url);
  return new TextDecoder('utf-8').decode(bytes);
}
