import { ConfigError, MalformedRuleError } from '../errors/custom-errors.js';
import { parseRule } from '../rules/substitution-rule.js';
import { defaults } from './config-defaults.js';
import type { DownloadSettings, GlobalConfig, PodcastConfig } from './config-schema.js';
import type { ResolvedDownloadSettings, ResolvedPodcastConfig } from './resolved-config.types.js';

/**
 * Command-line values that take precedence over the file
 */
export type RuntimeOverrides = {
  parallelDownloads?: number;
  /** Idle timeout for every podcast, in seconds */
  idleTimeout?: number;
};

/**
 * Centralized configuration resolver
 *
 * Handles the merging hierarchy:
 * 1. Command-line overrides (Highest Priority)
 * 2. Podcast Config
 * 3. Global Config
 * 4. Default Config (Lowest Priority)
 */
export class ConfigResolver {
  /**
   * @throws ConfigError when an override is out of range
   */
  constructor(
    private readonly globalConfig: GlobalConfig = {},
    private readonly overrides: RuntimeOverrides = {},
  ) {
    const { parallelDownloads, idleTimeout } = overrides;
    if (parallelDownloads !== undefined && (!Number.isInteger(parallelDownloads) || parallelDownloads < 1)) {
      throw new ConfigError(`Invalid number of parallel downloads: ${parallelDownloads}`);
    }
    if (idleTimeout !== undefined && !(idleTimeout > 0)) {
      throw new ConfigError(`Invalid timeout: ${idleTimeout}`);
    }
  }

  getStateFile(): string {
    return this.globalConfig.stateFile ?? defaults.stateFile;
  }

  getFeedTimeout(): number {
    return this.globalConfig.feedTimeout ?? defaults.feedTimeout;
  }

  getParallelDownloads(): number {
    return (
      this.overrides.parallelDownloads ?? this.globalConfig.download?.parallelDownloads ?? defaults.parallelDownloads
    );
  }

  /**
   * Resolve configuration for a specific podcast
   *
   * A rule that does not parse is reported through `ruleError` so the other
   * podcasts are unaffected.
   */
  resolve(podcast: PodcastConfig): ResolvedPodcastConfig {
    const resolved: ResolvedPodcastConfig = {
      name: podcast.name,
      url: podcast.url,
      enabled: podcast.enabled ?? true,
      limit: podcast.limit ?? 0,
      dryRun: podcast.dryRun ?? false,
      download: this.mergeDownloadSettings(podcast.name, podcast.download),
    };

    if (podcast.sed !== undefined) {
      try {
        resolved.rule = parseRule(podcast.sed);
      } catch (error) {
        if (!(error instanceof MalformedRuleError)) {
          throw error;
        }
        resolved.ruleError = error;
      }
    }

    return resolved;
  }

  resolveAll(podcasts: readonly PodcastConfig[]): ResolvedPodcastConfig[] {
    return podcasts.map((podcast) => this.resolve(podcast));
  }

  /**
   * Merge download settings according to hierarchy
   */
  private mergeDownloadSettings(name: string, podcast?: DownloadSettings): ResolvedDownloadSettings {
    const global = this.globalConfig.download;
    const fallback = defaults.download;

    const downloadDir = podcast?.downloadDir ?? global?.downloadDir ?? fallback.downloadDir;

    return {
      downloadDir: downloadDir.replaceAll('{name}', name),
      idleTimeout: this.overrides.idleTimeout ?? podcast?.idleTimeout ?? global?.idleTimeout ?? fallback.idleTimeout,
      maxDuration: podcast?.maxDuration ?? global?.maxDuration ?? fallback.maxDuration,
    };
  }
}
