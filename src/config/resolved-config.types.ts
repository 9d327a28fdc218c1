import type { MalformedRuleError } from '../errors/custom-errors.js';
import type { SubstitutionRule } from '../rules/substitution-rule.js';
import type { DownloadSettings } from './config-schema.js';

/**
 * Resolved download settings with all fields required
 */
export type ResolvedDownloadSettings = Required<DownloadSettings>;

/**
 * Full resolved configuration for a podcast
 */
export type ResolvedPodcastConfig = {
  /** Podcast identifier */
  name: string;
  /** Feed URL */
  url: string;
  enabled: boolean;
  /** Only the first `limit` feed entries are considered; 0 = all */
  limit: number;
  /** Log resolved targets, transfer nothing */
  dryRun: boolean;
  /** Parsed filename rule, absent when none is configured */
  rule?: SubstitutionRule;
  /** Set instead of `rule` when the configured rule does not parse */
  ruleError?: MalformedRuleError;
  /** `downloadDir` has its `{name}` placeholder filled in */
  download: ResolvedDownloadSettings;
};
