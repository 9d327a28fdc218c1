import { resolveFilename } from '../rules/filename-resolver.js';
import type { SubstitutionRule } from '../rules/substitution-rule.js';

/**
 * Enclosure found in a feed, in document order
 */
export type FeedEntry = {
  sourceUrl: string;
  title?: string;
  /** ISO timestamp, when the feed date could be parsed */
  publishedAt?: string;
  /** Enclosure size in bytes, as announced by the feed */
  length?: number;
  /** Running time in seconds, from `itunes:duration` */
  duration?: number;
};

/**
 * Feed details carried from an entry to its episode and state record
 */
export type EpisodeMetadata = Omit<FeedEntry, 'sourceUrl'>;

export type Episode = {
  podcastId: string;
  sourceUrl: string;
  resolvedFilename: string;
  /** Identity key: podcast id and source URL, never the filename */
  key: string;
} & EpisodeMetadata;

export type Reconciliation = {
  toDownload: Episode[];
  /** Episodes whose source URL is already marked complete */
  alreadyDone: Episode[];
  /** Repeated source URLs dropped after their first occurrence */
  duplicates: number;
};

/**
 * Identity key of an episode
 */
export function episodeKey(podcastId: string, sourceUrl: string): string {
  return `${podcastId}\u0000${sourceUrl}`;
}

/**
 * Turn the fetched feed entries of one podcast into episodes
 *
 * `limit > 0` keeps only the first `limit` entries.
 */
export function buildEpisodes(
  podcastId: string,
  entries: readonly FeedEntry[],
  rule: SubstitutionRule | undefined,
  limit = 0,
): Episode[] {
  const considered = limit > 0 ? entries.slice(0, limit) : entries;

  return considered.map(({ sourceUrl, ...metadata }) => ({
    ...metadata,
    podcastId,
    sourceUrl,
    resolvedFilename: resolveFilename(rule, sourceUrl),
    key: episodeKey(podcastId, sourceUrl),
  }));
}

/**
 * Split episodes into the ones still to download and the ones already done
 *
 * `completedKeys` holds the source URLs recorded as complete for the
 * podcast. Feed order is kept and each source URL is taken once.
 */
export function reconcile(episodes: readonly Episode[], completedKeys: ReadonlySet<string>): Reconciliation {
  const seen = new Set<string>();
  const result: Reconciliation = { toDownload: [], alreadyDone: [], duplicates: 0 };

  for (const episode of episodes) {
    if (seen.has(episode.key)) {
      result.duplicates++;
      continue;
    }
    seen.add(episode.key);

    if (completedKeys.has(episode.sourceUrl)) {
      result.alreadyDone.push(episode);
    } else {
      result.toDownload.push(episode);
    }
  }

  return result;
}

/**
 * Filenames claimed by more than one distinct source URL
 */
export function filenameCollisions(episodes: readonly Episode[]): Map<string, string[]> {
  const byName = new Map<string, string[]>();

  for (const episode of episodes) {
    const urls = byName.get(episode.resolvedFilename);
    if (!urls) {
      byName.set(episode.resolvedFilename, [episode.sourceUrl]);
    } else if (!urls.includes(episode.sourceUrl)) {
      urls.push(episode.sourceUrl);
    }
  }

  for (const [name, urls] of byName) {
    if (urls.length < 2) {
      byName.delete(name);
    }
  }

  return byName;
}
