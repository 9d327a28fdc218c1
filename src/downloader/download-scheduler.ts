import type { Episode } from '../catalog/episode-catalog.js';
import { errorMessage, StateWriteError, TransferError } from '../errors/custom-errors.js';
import type { Notifier } from '../notifications/notifier.js';
import { NotificationLevel } from '../notifications/notifier.js';
import { WorkerPool } from '../queue/worker-pool.js';
import type { EpisodeDetails, StateManager } from '../state/state-manager.js';
import type { TransferFunction } from './download-manager.js';

export type EpisodeFailure = {
  episode: Episode;
  error: Error;
};

/**
 * Outcome of one podcast's download pass
 */
export type DownloadSummary = {
  /** Episodes already complete, from the catalog or found complete before transfer */
  skipped: number;
  downloaded: number;
  failed: number;
  /** Episodes dropped from the queue or interrupted mid-transfer by an abort */
  cancelled: number;
  failures: EpisodeFailure[];
};

export type DownloadSchedulerOptions = {
  /** Transfers kept in flight */
  parallelism: number;
  transfer: TransferFunction;
  stateManager: StateManager;
  notifier: Notifier;
  /** Stops handing out episodes and aborts in-flight transfers */
  signal?: AbortSignal;
};

/**
 * Download scheduler
 *
 * Feeds the pending episodes of a podcast through a bounded worker pool.
 * An episode counts as downloaded only once its completion mark is
 * persisted; every failure stays local to its episode.
 */
export class DownloadScheduler {
  constructor(private readonly options: DownloadSchedulerOptions) {}

  /**
   * Download `tasks` in feed order, at most `parallelism` at a time
   *
   * @param skipped - Episodes the catalog already found complete
   */
  async run(
    podcastId: string,
    tasks: readonly Episode[],
    { skipped = 0 }: { skipped?: number } = {},
  ): Promise<DownloadSummary> {
    const { parallelism, transfer, stateManager, notifier, signal } = this.options;
    const summary: DownloadSummary = { skipped, downloaded: 0, failed: 0, cancelled: 0, failures: [] };

    if (signal?.aborted) {
      summary.cancelled = tasks.length;
      return summary;
    }

    const pool = new WorkerPool<Episode>(
      async (episode) => {
        if (stateManager.isComplete(podcastId, episode.sourceUrl)) {
          summary.skipped++;
          notifier.notify(NotificationLevel.DEBUG, `[${podcastId}] Already complete: ${episode.resolvedFilename}`);
          return;
        }

        notifier.notify(NotificationLevel.INFO, `[${podcastId}] Downloading ${episode.resolvedFilename}`);
        const result = await transfer(episode, signal);
        await stateManager.markComplete(
          podcastId,
          episode.sourceUrl,
          episode.resolvedFilename,
          recordDetails(episode, result.bytes),
        );

        summary.downloaded++;
        notifier.notify(
          NotificationLevel.SUCCESS,
          `[${podcastId}] Downloaded ${episode.resolvedFilename} (${formatSize(result.bytes)})`,
        );
      },
      parallelism,
      (episode, error) => {
        const failure = error instanceof Error ? error : new Error(errorMessage(error));

        if (failure instanceof TransferError && failure.kind === 'aborted') {
          summary.cancelled++;
          notifier.notify(NotificationLevel.WARNING, `[${podcastId}] Interrupted ${episode.resolvedFilename}`);
          return;
        }

        summary.failed++;
        summary.failures.push({ episode, error: failure });
        if (failure instanceof StateWriteError) {
          notifier.notify(
            NotificationLevel.ERROR,
            `[${podcastId}] ${episode.resolvedFilename} was downloaded but could not be recorded: ${failure.message}`,
          );
        } else {
          notifier.notify(
            NotificationLevel.ERROR,
            `[${podcastId}] Failed ${episode.resolvedFilename}: ${failure.message}`,
          );
        }
      },
    );

    const onAbort = () => {
      const dropped = pool.cancel();
      summary.cancelled += dropped.length;
      if (dropped.length > 0) {
        notifier.notify(NotificationLevel.WARNING, `[${podcastId}] Cancelled ${dropped.length} pending download(s)`);
      }
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      pool.addAll(tasks);
      await pool.drain();
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    return summary;
  }
}

/**
 * Format file size for display
 */
export function formatSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(2)} ${units[unit]}`;
}

/**
 * Feed metadata and transferred size kept in the state record
 */
function recordDetails(episode: Episode, bytes: number): EpisodeDetails {
  const { title, publishedAt, length, duration } = episode;
  const details: EpisodeDetails = { bytes };

  if (title !== undefined) {
    details.title = title;
  }
  if (publishedAt !== undefined) {
    details.publishedAt = publishedAt;
  }
  if (length !== undefined) {
    details.length = length;
  }
  if (duration !== undefined) {
    details.duration = duration;
  }

  return details;
}
