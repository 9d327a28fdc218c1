import {
  boolean,
  command,
  flag,
  multiflag,
  number,
  option,
  optional,
  restPositionals,
  string,
  type Type,
} from 'cmd-ts';
import { defaults } from './config/config-defaults.js';
import { DEFAULT_CONFIG_PATH, loadConfig } from './config/config-loader.js';
import { ConfigResolver, type RuntimeOverrides } from './config/config-resolver.js';
import { DownloadManager, type TransferFunction, type TransferSettings } from './downloader/download-manager.js';
import { DownloadScheduler, formatSize } from './downloader/download-scheduler.js';
import { ConfigError, errorMessage, MalformedRuleError } from './errors/custom-errors.js';
import { FeedFetcher } from './feed/feed-fetcher.js';
import { ConsoleNotifier } from './notifications/console-notifier.js';
import { levelForVerbosity } from './notifications/notification-level.js';
import { NotificationLevel, type Notifier } from './notifications/notifier.js';
import { resolveFilename } from './rules/filename-resolver.js';
import { parseRule } from './rules/substitution-rule.js';
import { Orchestrator, type PodcastReport, type RunMode, type RunReport } from './scheduler/orchestrator.js';
import { StateManager } from './state/state-manager.js';

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  createStateManager: (path: string, notifier: Notifier) => StateManager;
  createFeedFetcher: (timeout: number) => Pick<FeedFetcher, 'fetchEntries'>;
  createTransfer: (settings: TransferSettings, notifier: Notifier) => TransferFunction;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  createStateManager: (path, notifier) => new StateManager(path, notifier),
  createFeedFetcher: (timeout) => new FeedFetcher({ timeout }),
  createTransfer: (settings, notifier) => {
    const manager = new DownloadManager(notifier, settings);
    return (episode, signal) => manager.download(episode, signal);
  },
};

export type RunOptions = {
  notifier: Notifier;
  overrides?: RuntimeOverrides;
  /** Aborting stops the run; the summary is still produced */
  signal?: AbortSignal;
};

/**
 * Load the configuration and state, run every podcast once and print the summary
 *
 * @throws ConfigError for an unreadable or invalid configuration
 * @throws StateError for an unreadable state file
 */
export async function runApp(
  configPath: string,
  mode: RunMode,
  { notifier, overrides, signal }: RunOptions,
  deps: AppDependencies = defaultDependencies,
): Promise<RunReport> {
  notifier.notify(NotificationLevel.INFO, `Loading configuration from ${configPath}...`);
  const config = await deps.loadConfig(configPath, notifier);

  const resolver = new ConfigResolver(config.globalConfig, overrides);
  const podcasts = resolver.resolveAll(config.podcasts);
  notifier.notify(NotificationLevel.SUCCESS, `Configuration loaded: ${podcasts.length} podcast(s)`);

  const stateManager = deps.createStateManager(resolver.getStateFile(), notifier);
  await stateManager.load();

  const orchestrator = new Orchestrator({
    feedFetcher: deps.createFeedFetcher(resolver.getFeedTimeout()),
    stateManager,
    notifier,
    signal,
    createScheduler: (podcast) =>
      new DownloadScheduler({
        parallelism: resolver.getParallelDownloads(),
        transfer: deps.createTransfer(podcast.download, notifier),
        stateManager,
        notifier,
        signal,
      }),
  });

  const report = await orchestrator.runOnce(podcasts, mode);
  for (const line of formatSummary(report)) {
    notifier.notify(NotificationLevel.HIGHLIGHT, line);
  }

  return report;
}

/**
 * End-of-run summary, one line per podcast plus one per failed episode
 */
export function formatSummary(report: RunReport): string[] {
  const lines = [report.mode === 'full' ? 'Summary:' : 'Summary (refresh only):'];

  for (const podcast of report.podcasts) {
    lines.push(...formatPodcast(podcast));
  }

  if (report.interrupted) {
    lines.push('Run was interrupted');
  }

  return lines;
}

function formatPodcast({ podcastId, status, discovered, summary, error }: PodcastReport): string[] {
  switch (status) {
    case 'disabled':
      return [`  [${podcastId}] disabled`];
    case 'refreshed':
      return [`  [${podcastId}] ${discovered} new episode(s)`];
    case 'dry-run':
      return [`  [${podcastId}] dry run: ${discovered} episode(s) would be downloaded`];
    case 'config-error':
    case 'fetch-failed':
      return [`  [${podcastId}] ${status}: ${error ? error.message : 'unknown error'}`];
    case 'completed': {
      if (!summary) {
        return [`  [${podcastId}] nothing to do`];
      }
      const { downloaded, skipped, failed, cancelled, failures } = summary;
      return [
        `  [${podcastId}] ${downloaded} downloaded, ${skipped} skipped, ${failed} failed, ${cancelled} cancelled`,
        ...failures.map(({ episode, error: cause }) => `    ${episode.resolvedFilename}: ${cause.message}`),
      ];
    }
  }
}

/**
 * `<url> -> <filename>` for every URL, as the rule would name it
 *
 * @throws MalformedRuleError
 */
export function previewRule(ruleText: string, urls: readonly string[]): string[] {
  const rule = parseRule(ruleText);
  return urls.map((url) => `${url} -> ${resolveFilename(rule, url)}`);
}

/**
 * Fetch a feed and list each enclosure with the filename it resolves to
 *
 * @throws MalformedRuleError
 * @throws FeedFetchError
 */
export async function probeFeed(
  feedUrl: string,
  ruleText: string | undefined,
  feedFetcher: Pick<FeedFetcher, 'fetchEntries'>,
  signal?: AbortSignal,
): Promise<string[]> {
  const rule = ruleText === undefined ? undefined : parseRule(ruleText);
  const entries = await feedFetcher.fetchEntries(feedUrl, signal);

  return entries.map((entry) => {
    const size = entry.length === undefined ? '' : ` (${formatSize(entry.length)})`;
    return `${entry.sourceUrl} -> ${resolveFilename(rule, entry.sourceUrl)}${size}`;
  });
}

/**
 * Feed timeout of a one-off feed listing: `--timeout` when given
 */
export function previewFeedTimeout(timeout: number | undefined): number {
  return timeout ?? defaults.feedTimeout;
}

/**
 * First SIGINT/SIGTERM aborts the run, a second one exits with 130
 *
 * @returns A function removing the handlers
 */
export function installSignalHandlers(
  controller: AbortController,
  notifier: Notifier,
  exit: (code: number) => void = (code) => process.exit(code),
): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    if (!controller.signal.aborted) {
      notifier.notify(NotificationLevel.WARNING, `Received ${signal}, stopping (repeat to quit immediately)`);
      controller.abort();
      return;
    }
    notifier.notify(NotificationLevel.ERROR, `Received ${signal} again, exiting`);
    exit(130);
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

const VerbosityCount: Type<boolean[], number> = {
  async from(values) {
    return values.filter(Boolean).length;
  },
};

function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    process.stdout.write(`${line}\n`);
  }
}

// Define CLI using cmd-ts
export const cli = command({
  name: 'podsed',
  description: 'Download podcast episodes, naming files with sed-style rules',
  version: '0.1.0',
  args: {
    config: option({
      type: string,
      long: 'config',
      short: 'c',
      defaultValue: () => DEFAULT_CONFIG_PATH,
      description: `Path to configuration file (default: ${DEFAULT_CONFIG_PATH})`,
    }),
    refresh: flag({
      type: boolean,
      long: 'refresh',
      short: 'r',
      description: 'Only report new episodes, download nothing',
    }),
    downloads: option({
      type: optional(number),
      long: 'downloads',
      short: 'd',
      description: 'Number of parallel downloads',
    }),
    timeout: option({
      type: optional(number),
      long: 'timeout',
      short: 't',
      description: 'Seconds without data before a download is abandoned; with --probe, the feed timeout',
    }),
    verbose: multiflag({
      type: VerbosityCount,
      long: 'verbose',
      short: 'v',
      description: 'More output; repeat for debug detail',
    }),
    sed: option({
      type: optional(string),
      long: 'sed',
      short: 's',
      description: 'Print the filenames a rule gives the URLs, without reading the configuration',
    }),
    probe: option({
      type: optional(string),
      long: 'probe',
      short: 'p',
      description: 'Fetch a feed and print the filename of each episode',
    }),
    urls: restPositionals({
      type: string,
      displayName: 'url',
      description: 'URLs to test a --sed rule against',
    }),
  },
  handler: async ({ config, refresh, downloads, timeout, verbose, sed, probe, urls }) => {
    const notifier = new ConsoleNotifier(levelForVerbosity(verbose));

    try {
      if (probe !== undefined) {
        printLines(await probeFeed(probe, sed, new FeedFetcher({ timeout: previewFeedTimeout(timeout) })));
        return;
      }

      if (sed !== undefined) {
        printLines(previewRule(sed, urls));
        return;
      }

      if (urls.length > 0) {
        throw new ConfigError('URL arguments are only accepted together with --sed');
      }

      const controller = new AbortController();
      const removeSignalHandlers = installSignalHandlers(controller, notifier);
      try {
        const report = await runApp(config, refresh ? 'refreshOnly' : 'full', {
          notifier,
          overrides: { parallelDownloads: downloads, idleTimeout: timeout },
          signal: controller.signal,
        });
        process.exitCode = report.exitCode;
      } finally {
        removeSignalHandlers();
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        notifier.notify(NotificationLevel.ERROR, `Configuration error: ${error.message}`);
      } else if (error instanceof MalformedRuleError) {
        notifier.notify(NotificationLevel.ERROR, `Invalid rule: ${error.message}`);
      } else {
        notifier.notify(NotificationLevel.ERROR, `Fatal error: ${errorMessage(error)}`);
      }
      process.exitCode = 1;
    }
  },
});
