import { createHash } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { mkdir, open, rename, rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { Episode } from '../catalog/episode-catalog.js';
import { errorMessage, TransferError } from '../errors/custom-errors.js';
import type { Notifier } from '../notifications/notifier.js';
import { NotificationLevel } from '../notifications/notifier.js';
import { MAX_FILENAME_BYTES, truncateFilename } from '../utils/filename-sanitizer.js';
import { requestHeaders } from '../utils/url-utils.js';

export type TransferSettings = {
  /** Directory the finished files land in */
  downloadDir: string;
  /** Seconds without a received chunk before the transfer is abandoned */
  idleTimeout: number;
  /** Upper bound on a whole transfer in seconds; 0 disables it */
  maxDuration: number;
};

export type TransferResult = {
  /** Absolute path of the finished file */
  path: string;
  bytes: number;
};

/**
 * Moves one episode's media onto disk
 */
export type TransferFunction = (episode: Episode, signal?: AbortSignal) => Promise<TransferResult>;

/**
 * HTTP download manager
 *
 * Streams a media resource into a hidden `.part` file beside its final
 * location, flushes it, and renames it into place only once the whole body
 * has arrived. Every failure removes the partial file and surfaces as a
 * `TransferError`.
 */
export class DownloadManager {
  private readonly downloadDir: string;

  constructor(
    private readonly notifier: Notifier,
    private readonly settings: TransferSettings,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    this.downloadDir = resolve(settings.downloadDir);
  }

  /**
   * Download an episode into the download directory
   *
   * @throws TransferError on network, HTTP, timeout, disk and abort failures
   */
  async download(episode: Episode, signal?: AbortSignal): Promise<TransferResult> {
    const url = episode.sourceUrl;
    const finalPath = join(this.downloadDir, episode.resolvedFilename);
    const tempPath = join(this.downloadDir, this.tempName(episode));

    if (signal?.aborted) {
      throw new TransferError('Transfer aborted before it started', url, 'aborted');
    }

    try {
      await mkdir(this.downloadDir, { recursive: true });
    } catch (error) {
      throw new TransferError(`Cannot create ${this.downloadDir}: ${errorMessage(error)}`, url, 'disk');
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let timeoutReason: string | undefined;
    let idleTimer: NodeJS.Timeout | undefined;
    const armIdleTimer = () => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => {
        timeoutReason = `No data received for ${this.settings.idleTimeout}s`;
        controller.abort();
      }, this.settings.idleTimeout * 1000);
    };

    const maxTimer =
      this.settings.maxDuration > 0
        ? setTimeout(() => {
            timeoutReason = `Transfer exceeded ${this.settings.maxDuration}s`;
            controller.abort();
          }, this.settings.maxDuration * 1000)
        : undefined;

    const classify = (error: unknown): TransferError => {
      if (error instanceof TransferError) {
        return error;
      }
      if (signal?.aborted) {
        return new TransferError('Transfer aborted', url, 'aborted');
      }
      if (timeoutReason) {
        return new TransferError(timeoutReason, url, 'timeout');
      }
      if (isFileSystemError(error)) {
        return new TransferError(`Write failed: ${errorMessage(error)}`, url, 'disk');
      }
      return new TransferError(`Network error: ${describeFetchError(error)}`, url, 'network');
    };

    this.notifier.notify(NotificationLevel.DEBUG, `GET ${url} -> ${finalPath}`);

    try {
      armIdleTimer();

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          headers: requestHeaders('*/*'),
          redirect: 'follow',
          signal: controller.signal,
        });
      } catch (error) {
        throw classify(error);
      }

      if (!response.ok) {
        await response.body?.cancel();
        throw new TransferError(
          `HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ''}`,
          url,
          'http',
          response.status,
        );
      }

      if (!response.body) {
        throw new TransferError('Response has no body', url, 'network');
      }

      let bytes = 0;
      const watchProgress = async function* (source: AsyncIterable<Buffer>) {
        for await (const chunk of source) {
          bytes += chunk.length;
          armIdleTimer();
          yield chunk;
        }
      };

      try {
        armIdleTimer();
        await pipeline(Readable.fromWeb(response.body), watchProgress, createWriteStream(tempPath), {
          signal: controller.signal,
        });
        await flushToDisk(tempPath);
        await rename(tempPath, finalPath);
      } catch (error) {
        await this.removePartial(tempPath);
        throw classify(error);
      }

      return { path: finalPath, bytes };
    } finally {
      clearTimeout(idleTimer);
      clearTimeout(maxTimer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * `.<filename>.<hash>.part`, kept within the filename byte limit
   */
  private tempName(episode: Episode): string {
    const hash = createHash('sha1').update(episode.sourceUrl).digest('hex').slice(0, 8);
    const suffix = `.${hash}.part`;
    return `.${truncateFilename(episode.resolvedFilename, MAX_FILENAME_BYTES - suffix.length - 1)}${suffix}`;
  }

  private async removePartial(tempPath: string): Promise<void> {
    try {
      await rm(tempPath, { force: true });
    } catch (error) {
      this.notifier.notify(NotificationLevel.WARNING, `Failed to remove ${tempPath}: ${errorMessage(error)}`);
    }
  }
}

async function flushToDisk(path: string): Promise<void> {
  const handle = await open(path, 'r+');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

function isFileSystemError(error: unknown): boolean {
  return error instanceof Error && 'syscall' in error && 'path' in error;
}

/**
 * fetch wraps socket errors as "fetch failed"; the cause says what happened
 */
function describeFetchError(error: unknown): string {
  if (error instanceof Error && error.cause instanceof Error) {
    return `${error.message} (${error.cause.message})`;
  }
  return errorMessage(error);
}
