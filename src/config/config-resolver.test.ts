import { describe, expect, it } from 'vitest';
import { ConfigError, MalformedRuleError } from '../errors/custom-errors.js';
import { applyRule } from '../rules/substitution-rule.js';
import { DEFAULT_DOWNLOAD_SETTINGS } from './config-defaults.js';
import { ConfigResolver } from './config-resolver.js';
import type { GlobalConfig, PodcastConfig } from './config-schema.js';

describe('ConfigResolver', () => {
  const podcast: PodcastConfig = {
    name: 'war-college',
    url: 'https://feeds.example.com/war-college.rss',
  };

  const globalConfig: GlobalConfig = {
    stateFile: '/var/lib/podsed/state.json',
    feedTimeout: 12,
    download: { downloadDir: '/srv/podcasts/{name}', parallelDownloads: 6, idleTimeout: 20 },
  };

  it('should return defaults when nothing is configured', () => {
    const resolver = new ConfigResolver();
    const result = resolver.resolve(podcast);

    expect(result).toEqual({
      name: 'war-college',
      url: 'https://feeds.example.com/war-college.rss',
      enabled: true,
      limit: 0,
      dryRun: false,
      download: { ...DEFAULT_DOWNLOAD_SETTINGS, downloadDir: './podcasts/war-college' },
    });
    expect(resolver.getStateFile()).toBe('./podsed-state.json');
    expect(resolver.getFeedTimeout()).toBe(30);
    expect(resolver.getParallelDownloads()).toBe(4);
  });

  it('should merge hierarchy correctly: Podcast > Global > Default', () => {
    const resolver = new ConfigResolver(globalConfig);

    const fromGlobal = resolver.resolve(podcast);
    expect(fromGlobal.download).toEqual({
      downloadDir: '/srv/podcasts/war-college',
      idleTimeout: 20,
      maxDuration: 3600,
    });

    const fromPodcast = resolver.resolve({
      ...podcast,
      enabled: false,
      limit: 5,
      dryRun: true,
      download: { downloadDir: '/mnt/wc', maxDuration: 0 },
    });
    expect(fromPodcast.download).toEqual({ downloadDir: '/mnt/wc', idleTimeout: 20, maxDuration: 0 });
    expect(fromPodcast.enabled).toBe(false);
    expect(fromPodcast.limit).toBe(5);
    expect(fromPodcast.dryRun).toBe(true);

    expect(resolver.getStateFile()).toBe('/var/lib/podsed/state.json');
    expect(resolver.getFeedTimeout()).toBe(12);
    expect(resolver.getParallelDownloads()).toBe(6);
  });

  it('should let command-line overrides win', () => {
    const resolver = new ConfigResolver(globalConfig, { parallelDownloads: 1, idleTimeout: 3 });

    expect(resolver.getParallelDownloads()).toBe(1);
    expect(resolver.resolve({ ...podcast, download: { idleTimeout: 60 } }).download.idleTimeout).toBe(3);
  });

  it('should reject out-of-range overrides', () => {
    expect(() => new ConfigResolver({}, { parallelDownloads: 0 })).toThrow(ConfigError);
    expect(() => new ConfigResolver({}, { parallelDownloads: 1.5 })).toThrow('Invalid number of parallel downloads: 1.5');
    expect(() => new ConfigResolver({}, { idleTimeout: -1 })).toThrow('Invalid timeout: -1');
  });

  it('should parse the podcast rule', () => {
    const resolver = new ConfigResolver();
    const result = resolver.resolve({ ...podcast, sed: 's,^.+/([^/]+)/media([.]\\w+)$,\\1\\2,' });

    expect(result.ruleError).toBeUndefined();
    expect(result.rule).toBeDefined();
    if (result.rule) {
      expect(applyRule(result.rule, 'https://media.example.com/wc/episode-slug/media.mp3')).toBe('episode-slug.mp3');
    }
  });

  it('should report a malformed rule without throwing', () => {
    const resolver = new ConfigResolver();
    const [broken, healthy] = resolver.resolveAll([
      { ...podcast, sed: 's/(a)/\\2/' },
      { ...podcast, name: 'other' },
    ]);

    expect(broken?.rule).toBeUndefined();
    expect(broken?.ruleError).toBeInstanceOf(MalformedRuleError);
    expect(healthy?.ruleError).toBeUndefined();
    expect(healthy?.download.downloadDir).toBe('./podcasts/other');
  });
});
