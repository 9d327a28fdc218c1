import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import type { FeedEntry } from '../catalog/episode-catalog.js';
import { ConfigResolver } from '../config/config-resolver.js';
import type { PodcastConfig } from '../config/config-schema.js';
import type { TransferFunction } from '../downloader/download-manager.js';
import { DownloadScheduler } from '../downloader/download-scheduler.js';
import { FeedFetchError, StateWriteError } from '../errors/custom-errors.js';
import { NotificationLevel } from '../notifications/notification-level.js';
import type { Notifier } from '../notifications/notifier.js';
import { StateManager } from '../state/state-manager.js';
import { Orchestrator, type SchedulerFactory } from './orchestrator.js';

const FEEDS: Record<string, FeedEntry[]> = {
  'https://feeds.example.com/a.rss': [
    { sourceUrl: 'https://cdn.example.com/a/1.mp3' },
    { sourceUrl: 'https://cdn.example.com/a/2.mp3' },
  ],
  'https://feeds.example.com/b.rss': [{ sourceUrl: 'https://cdn.example.com/b/1.mp3' }],
};

type FetchEntries = (feedUrl: string, signal?: AbortSignal) => Promise<FeedEntry[]>;

const PODCASTS: PodcastConfig[] = [
  { name: 'a', url: 'https://feeds.example.com/a.rss' },
  { name: 'b', url: 'https://feeds.example.com/b.rss' },
];

describe('Orchestrator', () => {
  let dir: string;
  let statePath: string;
  let stateManager: StateManager;
  let notify: Mock<Notifier['notify']>;
  let notifier: Notifier;
  let fetchEntries: Mock<FetchEntries>;
  let transfer: Mock<TransferFunction>;
  const resolver = new ConfigResolver();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'podsed-orchestrator-'));
    statePath = join(dir, 'state.json');
    stateManager = new StateManager(statePath);
    await stateManager.load();
    notify = vi.fn<Notifier['notify']>();
    notifier = { notify };
    fetchEntries = vi.fn<FetchEntries>(async (feedUrl) => FEEDS[feedUrl] ?? []);
    transfer = vi.fn<TransferFunction>(async (episode) => ({ path: episode.resolvedFilename, bytes: 10 }));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function orchestrator(state: StateManager = stateManager, signal?: AbortSignal): Orchestrator {
    const createScheduler: SchedulerFactory = () =>
      new DownloadScheduler({ parallelism: 2, transfer, stateManager: state, notifier, signal });
    return new Orchestrator({ feedFetcher: { fetchEntries }, stateManager: state, notifier, createScheduler, signal });
  }

  it('should download new episodes and report them', async () => {
    const report = await orchestrator().runOnce(resolver.resolveAll(PODCASTS), 'full');

    expect(report.exitCode).toBe(0);
    expect(report.interrupted).toBe(false);
    expect(report.podcasts.map((podcast) => [podcast.podcastId, podcast.status, podcast.discovered])).toEqual([
      ['a', 'completed', 2],
      ['b', 'completed', 1],
    ]);
    expect(report.podcasts[0]?.summary).toEqual({ skipped: 0, downloaded: 2, failed: 0, cancelled: 0, failures: [] });
    expect(transfer).toHaveBeenCalledTimes(3);
    expect(stateManager.getDownloadedCount()).toBe(3);
  });

  it('should download nothing on a second run over unchanged feeds', async () => {
    await orchestrator().runOnce(resolver.resolveAll(PODCASTS), 'full');
    transfer.mockClear();

    const reloaded = new StateManager(statePath);
    await reloaded.load();
    const report = await orchestrator(reloaded).runOnce(resolver.resolveAll(PODCASTS), 'full');

    expect(transfer).not.toHaveBeenCalled();
    expect(report.podcasts.map((podcast) => podcast.summary?.skipped)).toEqual([2, 1]);
    expect(report.exitCode).toBe(0);
  });

  it('should re-download exactly once an episode whose mark was lost', async () => {
    const markComplete = vi.spyOn(stateManager, 'markComplete');
    markComplete.mockRejectedValueOnce(new StateWriteError('disk full', statePath));

    const first = await orchestrator().runOnce(resolver.resolveAll(PODCASTS.slice(0, 1)), 'full');
    expect(first.exitCode).toBe(1);
    expect(first.podcasts[0]?.summary?.failed).toBe(1);
    expect(first.podcasts[0]?.summary?.downloaded).toBe(1);
    markComplete.mockRestore();
    transfer.mockClear();

    const reloaded = new StateManager(statePath);
    await reloaded.load();
    const second = await orchestrator(reloaded).runOnce(resolver.resolveAll(PODCASTS.slice(0, 1)), 'full');

    expect(transfer).toHaveBeenCalledTimes(1);
    expect(second.podcasts[0]?.summary?.downloaded).toBe(1);
    expect(second.podcasts[0]?.summary?.skipped).toBe(1);

    transfer.mockClear();
    const third = await orchestrator(reloaded).runOnce(resolver.resolveAll(PODCASTS.slice(0, 1)), 'full');
    expect(transfer).not.toHaveBeenCalled();
    expect(third.exitCode).toBe(0);
  });

  it('should only report discoveries in refresh-only mode', async () => {
    await stateManager.markComplete('a', 'https://cdn.example.com/a/0.mp3', '0.mp3');
    fetchEntries.mockImplementation(async (feedUrl: string) =>
      feedUrl === 'https://feeds.example.com/a.rss'
        ? [{ sourceUrl: 'https://cdn.example.com/a/0.mp3' }, ...(FEEDS[feedUrl] ?? [])]
        : (FEEDS[feedUrl] ?? []),
    );
    const createScheduler = vi.fn<SchedulerFactory>();
    const refresh = new Orchestrator({ feedFetcher: { fetchEntries }, stateManager, notifier, createScheduler });

    const report = await refresh.runOnce(resolver.resolveAll(PODCASTS), 'refreshOnly');

    expect(report.mode).toBe('refreshOnly');
    expect(report.podcasts).toEqual([
      { podcastId: 'a', status: 'refreshed', discovered: 2 },
      { podcastId: 'b', status: 'refreshed', discovered: 1 },
    ]);
    expect(report.podcasts.reduce((total, podcast) => total + podcast.discovered, 0)).toBe(3);
    expect(createScheduler).not.toHaveBeenCalled();
    expect(stateManager.getDownloadedCount()).toBe(1);
    expect(report.exitCode).toBe(0);
  });

  it('should log dry-run targets without scheduling downloads', async () => {
    const createScheduler = vi.fn<SchedulerFactory>(
      () => new DownloadScheduler({ parallelism: 2, transfer, stateManager, notifier }),
    );
    const podcasts = resolver.resolveAll([
      {
        name: 'a',
        url: 'https://feeds.example.com/a.rss',
        dryRun: true,
        download: { downloadDir: '/srv/podcasts/{name}' },
      },
      { name: 'b', url: 'https://feeds.example.com/b.rss' },
    ]);

    const dryRun = new Orchestrator({ feedFetcher: { fetchEntries }, stateManager, notifier, createScheduler });

    const report = await dryRun.runOnce(podcasts, 'full');

    expect(report.podcasts[0]).toEqual({ podcastId: 'a', status: 'dry-run', discovered: 2 });
    expect(report.podcasts[1]?.status).toBe('completed');
    expect(report.exitCode).toBe(0);
    expect(createScheduler).toHaveBeenCalledTimes(1);
    expect(transfer.mock.calls.map(([episode]) => episode.sourceUrl)).toEqual(['https://cdn.example.com/b/1.mp3']);
    expect(stateManager.isComplete('a', 'https://cdn.example.com/a/1.mp3')).toBe(false);
    expect(notify).toHaveBeenCalledWith(
      NotificationLevel.INFO,
      '[a] Dry run: https://cdn.example.com/a/1.mp3 -> /srv/podcasts/a/1.mp3',
    );
    expect(notify).toHaveBeenCalledWith(
      NotificationLevel.INFO,
      '[a] Dry run: https://cdn.example.com/a/2.mp3 -> /srv/podcasts/a/2.mp3',
    );
  });

  it('should keep going after a feed fails', async () => {
    fetchEntries.mockImplementation(async (feedUrl: string) => {
      if (feedUrl === 'https://feeds.example.com/a.rss') {
        throw new FeedFetchError('HTTP 500', feedUrl, 500);
      }
      return FEEDS[feedUrl] ?? [];
    });

    const report = await orchestrator().runOnce(resolver.resolveAll(PODCASTS), 'full');

    expect(report.podcasts.map((podcast) => podcast.status)).toEqual(['fetch-failed', 'completed']);
    expect(report.podcasts[0]?.error).toBeInstanceOf(FeedFetchError);
    expect(report.podcasts[1]?.summary?.downloaded).toBe(1);
    expect(report.exitCode).toBe(1);
    expect(notify).toHaveBeenCalledWith(
      NotificationLevel.ERROR,
      '[a] Feed https://feeds.example.com/a.rss failed: HTTP 500',
    );
  });

  it('should not fetch disabled podcasts or podcasts with a broken rule', async () => {
    const podcasts = resolver.resolveAll([
      { name: 'a', url: 'https://feeds.example.com/a.rss', enabled: false },
      { name: 'b', url: 'https://feeds.example.com/b.rss', sed: 's/(x)/\\3/' },
    ]);

    const report = await orchestrator().runOnce(podcasts, 'full');

    expect(report.podcasts.map((podcast) => podcast.status)).toEqual(['disabled', 'config-error']);
    expect(fetchEntries).not.toHaveBeenCalled();
    expect(report.exitCode).toBe(1);
  });

  it('should apply the podcast rule and limit', async () => {
    const podcasts = resolver.resolveAll([
      { name: 'a', url: 'https://feeds.example.com/a.rss', sed: 's,^.+/([0-9]+)[.]mp3$,a-\\1.mp3,', limit: 1 },
    ]);

    const report = await orchestrator().runOnce(podcasts, 'full');

    expect(report.podcasts[0]?.discovered).toBe(1);
    expect(transfer).toHaveBeenCalledTimes(1);
    expect(transfer.mock.calls[0]?.[0].resolvedFilename).toBe('a-1.mp3');
    expect(stateManager.getRecord('a', 'https://cdn.example.com/a/1.mp3')?.resolvedFilename).toBe('a-1.mp3');
  });

  it('should keep completed episodes under their old name after a rule edit', async () => {
    await stateManager.markComplete('b', 'https://cdn.example.com/b/1.mp3', '1.mp3');
    const podcasts = resolver.resolveAll([
      { name: 'b', url: 'https://feeds.example.com/b.rss', sed: 's,^.+/([0-9]+)[.]mp3$,b-\\1.mp3,' },
    ]);

    const report = await orchestrator().runOnce(podcasts, 'full');

    expect(transfer).not.toHaveBeenCalled();
    expect(report.podcasts[0]?.summary?.skipped).toBe(1);
    expect(notify).toHaveBeenCalledWith(
      NotificationLevel.DEBUG,
      '[b] 1.mp3 would now be named b-1.mp3; keeping the existing file',
    );
  });

  it('should not start podcasts after an interrupt', async () => {
    const controller = new AbortController();
    controller.abort();

    const report = await orchestrator(stateManager, controller.signal).runOnce(resolver.resolveAll(PODCASTS), 'full');

    expect(report.podcasts).toEqual([]);
    expect(report.interrupted).toBe(true);
    expect(report.exitCode).toBe(1);
    expect(fetchEntries).not.toHaveBeenCalled();
  });
});
