import type { ResolvedDownloadSettings } from './resolved-config.types.js';

export type DefaultConfig = {
  stateFile: string;
  /** Seconds before a feed request is abandoned */
  feedTimeout: number;
  parallelDownloads: number;
  download: ResolvedDownloadSettings;
};

export const defaults = {
  stateFile: './podsed-state.json',
  feedTimeout: 30,
  parallelDownloads: 4,
  download: {
    downloadDir: './podcasts/{name}',
    idleTimeout: 10,
    maxDuration: 3600,
  },
} as const satisfies DefaultConfig;

export const DEFAULT_DOWNLOAD_SETTINGS: ResolvedDownloadSettings = defaults.download;
