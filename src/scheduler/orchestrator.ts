/**
 * Orchestrator - one run over every configured podcast
 *
 * Podcasts are handled one after another: fetch the feed, build and
 * reconcile the episodes, then either report what is new (refresh-only) or
 * hand the pending episodes to a download scheduler. A failure is contained
 * to its podcast and ends up in the run report.
 */

import { join } from 'node:path';
import {
  buildEpisodes,
  type Episode,
  type FeedEntry,
  filenameCollisions,
  reconcile,
} from '../catalog/episode-catalog.js';
import type { ResolvedPodcastConfig } from '../config/resolved-config.types.js';
import type { DownloadSummary } from '../downloader/download-scheduler.js';
import { FeedFetchError } from '../errors/custom-errors.js';
import type { FeedFetcher } from '../feed/feed-fetcher.js';
import type { Notifier } from '../notifications/notifier.js';
import { NotificationLevel } from '../notifications/notifier.js';
import type { StateManager } from '../state/state-manager.js';

export type RunMode = 'full' | 'refreshOnly';

export type PodcastStatus = 'completed' | 'refreshed' | 'dry-run' | 'disabled' | 'config-error' | 'fetch-failed';

export type PodcastReport = {
  podcastId: string;
  status: PodcastStatus;
  /** Episodes not downloaded yet when the run looked at the feed */
  discovered: number;
  summary?: DownloadSummary;
  error?: Error;
};

export type RunReport = {
  mode: RunMode;
  podcasts: PodcastReport[];
  /** An abort stopped the run before every podcast was handled */
  interrupted: boolean;
  exitCode: 0 | 1;
};

/**
 * Anything that can run a podcast's pending episodes
 */
export type EpisodeScheduler = {
  run(podcastId: string, tasks: readonly Episode[], options: { skipped: number }): Promise<DownloadSummary>;
};

/**
 * Scheduler factory type for dependency injection
 */
export type SchedulerFactory = (podcast: ResolvedPodcastConfig) => EpisodeScheduler;

export type OrchestratorDependencies = {
  feedFetcher: Pick<FeedFetcher, 'fetchEntries'>;
  stateManager: StateManager;
  notifier: Notifier;
  createScheduler: SchedulerFactory;
  signal?: AbortSignal;
};

export class Orchestrator {
  constructor(private readonly deps: OrchestratorDependencies) {}

  async runOnce(podcasts: readonly ResolvedPodcastConfig[], mode: RunMode): Promise<RunReport> {
    const { notifier, signal } = this.deps;
    const reports: PodcastReport[] = [];
    let interrupted = false;

    for (const [index, podcast] of podcasts.entries()) {
      if (signal?.aborted) {
        interrupted = true;
        notifier.notify(
          NotificationLevel.WARNING,
          `Run interrupted: ${podcasts.length - index} podcast(s) not started`,
        );
        break;
      }

      // biome-ignore lint/performance/noAwaitInLoops: podcasts are processed one at a time
      const report = await this.processPodcast(podcast, mode);
      if (report) {
        reports.push(report);
      } else {
        interrupted = true;
      }
    }

    return { mode, podcasts: reports, interrupted, exitCode: computeExitCode(reports, interrupted) };
  }

  /**
   * @returns The podcast's report, or undefined when an abort cut it short
   */
  private async processPodcast(podcast: ResolvedPodcastConfig, mode: RunMode): Promise<PodcastReport | undefined> {
    const { feedFetcher, stateManager, notifier, signal } = this.deps;
    const podcastId = podcast.name;

    if (!podcast.enabled) {
      notifier.notify(NotificationLevel.DEBUG, `[${podcastId}] Disabled, skipping`);
      return { podcastId, status: 'disabled', discovered: 0 };
    }

    if (podcast.ruleError) {
      notifier.notify(NotificationLevel.ERROR, `[${podcastId}] ${podcast.ruleError.message}`);
      return { podcastId, status: 'config-error', discovered: 0, error: podcast.ruleError };
    }

    notifier.notify(NotificationLevel.DEBUG, `[${podcastId}] Fetching ${podcast.url}`);

    let entries: FeedEntry[];
    try {
      entries = await feedFetcher.fetchEntries(podcast.url, signal);
    } catch (error) {
      if (signal?.aborted) {
        return undefined;
      }
      if (!(error instanceof FeedFetchError)) {
        throw error;
      }
      notifier.notify(NotificationLevel.ERROR, `[${podcastId}] Feed ${error.url} failed: ${error.message}`);
      return { podcastId, status: 'fetch-failed', discovered: 0, error };
    }

    const episodes = buildEpisodes(podcastId, entries, podcast.rule, podcast.limit);
    const { toDownload, alreadyDone, duplicates } = reconcile(episodes, stateManager.completedKeys(podcastId));

    this.reportRenamed(podcastId, alreadyDone);

    if (duplicates > 0) {
      notifier.notify(NotificationLevel.DEBUG, `[${podcastId}] Ignored ${duplicates} repeated feed entry(ies)`);
    }

    for (const [filename, urls] of filenameCollisions(toDownload)) {
      notifier.notify(
        NotificationLevel.WARNING,
        `[${podcastId}] ${urls.length} episodes resolve to "${filename}"; refine the sed rule: ${urls.join(', ')}`,
      );
    }

    notifier.notify(
      NotificationLevel.INFO,
      `[${podcastId}] ${toDownload.length} new episode(s), ${alreadyDone.length} already downloaded`,
    );

    if (mode === 'refreshOnly') {
      for (const episode of toDownload) {
        notifier.notify(
          NotificationLevel.INFO,
          `[${podcastId}] New: ${episode.resolvedFilename} <- ${episode.sourceUrl}`,
        );
      }
      return { podcastId, status: 'refreshed', discovered: toDownload.length };
    }

    if (podcast.dryRun) {
      for (const episode of toDownload) {
        const target = join(podcast.download.downloadDir, episode.resolvedFilename);
        notifier.notify(NotificationLevel.INFO, `[${podcastId}] Dry run: ${episode.sourceUrl} -> ${target}`);
      }
      return { podcastId, status: 'dry-run', discovered: toDownload.length };
    }

    const summary =
      toDownload.length > 0
        ? await this.deps.createScheduler(podcast).run(podcastId, toDownload, { skipped: alreadyDone.length })
        : emptySummary(alreadyDone.length);

    return { podcastId, status: 'completed', discovered: toDownload.length, summary };
  }

  /**
   * Completed episodes keep the filename they were saved under; say so
   * when the current rule would name them differently
   */
  private reportRenamed(podcastId: string, alreadyDone: readonly Episode[]): void {
    const { stateManager, notifier } = this.deps;

    for (const episode of alreadyDone) {
      const record = stateManager.getRecord(podcastId, episode.sourceUrl);
      if (record && record.resolvedFilename !== episode.resolvedFilename) {
        notifier.notify(
          NotificationLevel.DEBUG,
          `[${podcastId}] ${record.resolvedFilename} would now be named ${episode.resolvedFilename}; ` +
            'keeping the existing file',
        );
      }
    }
  }
}

function emptySummary(skipped: number): DownloadSummary {
  return { skipped, downloaded: 0, failed: 0, cancelled: 0, failures: [] };
}

function computeExitCode(reports: readonly PodcastReport[], interrupted: boolean): 0 | 1 {
  if (interrupted) {
    return 1;
  }

  const failed = reports.some(
    (report) =>
      report.status === 'fetch-failed' ||
      report.status === 'config-error' ||
      (report.summary !== undefined && (report.summary.failed > 0 || report.summary.cancelled > 0)),
  );

  return failed ? 1 : 0;
}
