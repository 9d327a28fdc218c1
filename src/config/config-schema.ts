/**
 * Zod schemas for configuration validation
 *
 * This file defines both the validation schemas AND the TypeScript types.
 * Types are automatically inferred from the schemas, ensuring they stay in sync.
 */

import { z } from 'zod';
import { isHttpUrl } from '../utils/url-utils.js';

/**
 * Download settings, per podcast or global
 */
export const DownloadSettingsSchema = z.object({
  downloadDir: z.string().min(1).optional().describe('Directory to save episodes; {name} is the podcast name'),
  idleTimeout: z.number().positive().optional().describe('Seconds without data before a transfer is abandoned'),
  maxDuration: z.number().nonnegative().optional().describe('Maximum seconds per transfer, 0 for no limit'),
});

export type DownloadSettings = z.infer<typeof DownloadSettingsSchema>;

export const GlobalDownloadSettingsSchema = DownloadSettingsSchema.extend({
  parallelDownloads: z.number().int().positive().optional().describe('Transfers kept in flight'),
});

/**
 * Global configuration defaults
 */
export const GlobalConfigSchema = z.object({
  stateFile: z.string().min(1).optional().describe('Path to state file'),
  feedTimeout: z.number().positive().optional().describe('Seconds before a feed request is abandoned'),
  download: GlobalDownloadSettingsSchema.optional().describe('Download settings'),
});

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>;

/**
 * Podcast configuration
 */
export const PodcastConfigSchema = z.object({
  name: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, { message: 'Must not contain path separators' })
    .describe('Podcast identifier'),
  url: z.string().refine(isHttpUrl, { message: 'Must be an http(s) URL' }).describe('Feed URL'),
  sed: z.string().optional().describe('sed-style filename rule'),
  enabled: z.boolean().optional().describe('Whether the podcast is processed'),
  limit: z.number().int().nonnegative().optional().describe('Only consider the first N feed entries'),
  dryRun: z.boolean().optional().describe('Log the files that would be downloaded instead of downloading them'),
  download: DownloadSettingsSchema.optional().describe('Download settings'),
});

export type PodcastConfig = z.infer<typeof PodcastConfigSchema>;

/**
 * Main configuration schema
 */
export const ConfigSchema = z
  .object({
    globalConfig: GlobalConfigSchema.optional().describe('Global configuration defaults'),
    podcasts: z.array(PodcastConfigSchema).min(1, 'Cannot be empty').describe('List of podcasts to fetch'),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.podcasts.forEach((podcast, index) => {
      if (seen.has(podcast.name)) {
        ctx.addIssue({
          code: 'custom',
          path: ['podcasts', index, 'name'],
          message: `Duplicate podcast name "${podcast.name}"`,
        });
      }
      seen.add(podcast.name);
    });
  });

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration before validation
 */
export type RawConfig = Record<string, unknown>;

const RecordSchema = z.record(z.string(), z.unknown());

function asRecord(value: unknown): RawConfig | undefined {
  const parsed = RecordSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

const DOWNLOAD_KEYS = ['downloadDir', 'idleTimeout', 'maxDuration'] as const;

/**
 * Collect common configuration mistakes that validation lets through
 *
 * Unknown keys are dropped by the schemas, so settings placed at the wrong
 * level would otherwise be ignored without a word.
 */
export function collectConfigWarnings(rawConfig: RawConfig): string[] {
  const warnings: string[] = [];

  if ('globalConfigs' in rawConfig) {
    warnings.push(`'globalConfigs' found. Did you mean 'globalConfig'?`);
  }

  const globalConfig = asRecord(rawConfig.globalConfig);
  if (globalConfig) {
    if ('sed' in globalConfig) {
      warnings.push(`'sed' found under 'globalConfig'. Rules are per podcast: set 'sed' on each podcast entry.`);
    }

    for (const key of [...DOWNLOAD_KEYS, 'parallelDownloads']) {
      if (key in globalConfig) {
        warnings.push(
          `'${key}' found directly under 'globalConfig'. It should be placed under 'globalConfig.download'.`,
        );
      }
    }
  }

  const podcasts = Array.isArray(rawConfig.podcasts) ? rawConfig.podcasts : [];
  podcasts.forEach((entry: unknown, index: number) => {
    const podcast = asRecord(entry);
    if (!podcast) {
      return;
    }

    for (const key of DOWNLOAD_KEYS) {
      if (key in podcast) {
        warnings.push(
          `'${key}' found directly under 'podcasts[${index}]'. ` +
            `It should be placed under 'podcasts[${index}].download'.`,
        );
      }
    }

    if ('parallelDownloads' in podcast || 'parallelDownloads' in (asRecord(podcast.download) ?? {})) {
      warnings.push(
        `'parallelDownloads' found in 'podcasts[${index}]'. It is a global setting: place it under 'globalConfig.download'.`,
      );
    }
  });

  return warnings;
}

/**
 * Validate configuration using Zod
 *
 * @returns Validated configuration, or a readable error message
 */
export function validateConfigSafe(
  rawConfig: unknown,
): { success: true; config: Config } | { success: false; error: string } {
  const result = ConfigSchema.safeParse(rawConfig);
  if (result.success) {
    return { success: true, config: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}

/**
 * Format Zod error into a readable message
 */
function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}"` : 'value';
      const code = issue.code.toUpperCase();
      return `${path} ${issue.message} [${code}]`;
    })
    .join('; ');
}
