import { z } from 'zod';

export const STATE_VERSION = '1.0.0';

/**
 * Completed episode record
 */
export const EpisodeRecordSchema = z.object({
  /** Enclosure URL the episode was fetched from */
  sourceUrl: z.string(),
  /** Filename the episode was saved under */
  resolvedFilename: z.string(),
  /** Completion timestamp */
  completedAt: z.string(),
  title: z.string().optional(),
  /** Feed publication date, ISO timestamp */
  publishedAt: z.string().optional(),
  /** Enclosure size announced by the feed */
  length: z.number().optional(),
  /** Running time in seconds */
  duration: z.number().optional(),
  /** Bytes actually written */
  bytes: z.number().optional(),
});

export type EpisodeRecord = z.infer<typeof EpisodeRecordSchema>;

/**
 * Podcast data in state
 */
export const PodcastStateSchema = z.object({
  /** Completed episodes keyed by source URL */
  episodes: z.record(z.string(), EpisodeRecordSchema),
});

/**
 * State file structure
 */
export const StateSchema = z.object({
  version: z.literal(STATE_VERSION),
  /** Podcasts keyed by identifier */
  podcasts: z.record(z.string(), PodcastStateSchema),
  lastUpdated: z.string(),
});

export type State = z.infer<typeof StateSchema>;

/**
 * Create a new empty state
 */
export function createEmptyState(): State {
  return {
    version: STATE_VERSION,
    podcasts: {},
    lastUpdated: new Date().toISOString(),
  };
}
