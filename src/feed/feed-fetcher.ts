import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { FeedEntry } from '../catalog/episode-catalog.js';
import { errorMessage, FeedFetchError } from '../errors/custom-errors.js';
import { requestHeaders, resolveUrl } from '../utils/url-utils.js';

const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.8';

export type FeedFetcherOptions = {
  /** Seconds before a feed request is abandoned */
  timeout: number;
  fetchImpl?: typeof fetch;
};

/**
 * Fetches podcast feeds and lists their enclosures
 */
export class FeedFetcher {
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch;

  constructor({ timeout, fetchImpl = fetch }: FeedFetcherOptions) {
    this.timeout = timeout;
    this.fetchImpl = fetchImpl;
  }

  /**
   * Fetch a feed and return its enclosures in document order
   *
   * @throws FeedFetchError on network errors, timeouts, non-2xx responses
   * and documents that are not RSS or Atom
   */
  async fetchEntries(feedUrl: string, signal?: AbortSignal): Promise<FeedEntry[]> {
    const xml = await this.fetchFeed(feedUrl, signal);
    return parseFeed(xml, feedUrl);
  }

  private async fetchFeed(feedUrl: string, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout * 1000);

    try {
      const response = await this.fetchImpl(feedUrl, {
        headers: requestHeaders(FEED_ACCEPT),
        signal: controller.signal,
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new FeedFetchError(
          `HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ''}`,
          feedUrl,
          response.status,
        );
      }

      return await response.text();
    } catch (error) {
      if (error instanceof FeedFetchError) {
        throw error;
      }
      if (timedOut) {
        throw new FeedFetchError(`Timed out after ${this.timeout}s`, feedUrl);
      }
      if (signal?.aborted) {
        throw new FeedFetchError('Feed request aborted', feedUrl);
      }
      throw new FeedFetchError(`Failed to fetch feed: ${errorMessage(error)}`, feedUrl);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Extract the enclosures of an RSS 2.0 or Atom document
 *
 * Items without an enclosure are skipped; relative enclosure URLs are
 * resolved against `feedUrl`.
 *
 * @throws FeedFetchError when the document is neither RSS nor Atom
 */
export function parseFeed(xml: string, feedUrl: string): FeedEntry[] {
  const $ = cheerio.load(xml, { xml: true });

  if ($('rss, channel').length > 0) {
    return $('item')
      .toArray()
      .flatMap((item) => toEntries($, item, feedUrl, 'rss'));
  }

  if ($('feed').length > 0) {
    return $('entry')
      .toArray()
      .flatMap((entry) => toEntries($, entry, feedUrl, 'atom'));
  }

  throw new FeedFetchError('Document is not an RSS or Atom feed', feedUrl);
}

function toEntries($: cheerio.CheerioAPI, element: AnyNode, feedUrl: string, format: 'rss' | 'atom'): FeedEntry[] {
  const $el = $(element);

  const enclosure =
    format === 'rss'
      ? $el.children('enclosure[url]').first()
      : $el.children('link[rel="enclosure"][href]').first();
  const href = enclosure.attr(format === 'rss' ? 'url' : 'href');

  const sourceUrl = href ? resolveUrl(href, feedUrl) : undefined;
  if (!sourceUrl) {
    return [];
  }

  const entry: FeedEntry = { sourceUrl };

  const title = $el.children('title').first().text().trim();
  if (title) {
    entry.title = title;
  }

  const dateText =
    format === 'rss'
      ? $el.children('pubDate').first().text()
      : $el.children('published').first().text() || $el.children('updated').first().text();
  const publishedAt = parseDate(dateText);
  if (publishedAt) {
    entry.publishedAt = publishedAt;
  }

  const length = Number(enclosure.attr('length'));
  if (Number.isInteger(length) && length > 0) {
    entry.length = length;
  }

  const duration = parseDuration(
    $el
      .children()
      .filter((_, child) => child.name === 'itunes:duration')
      .first()
      .text(),
  );
  if (duration !== undefined) {
    entry.duration = duration;
  }

  return [entry];
}

function parseDate(text: string): string | undefined {
  const trimmed = text.trim();
  if (!trimmed) {
    return undefined;
  }

  const timestamp = Date.parse(trimmed);
  return Number.isNaN(timestamp) ? undefined : new Date(timestamp).toISOString();
}

/**
 * Seconds from an `itunes:duration` value: `SS`, `MM:SS` or `HH:MM:SS`
 */
export function parseDuration(text: string): number | undefined {
  const parts = text.trim().split(':');
  if (parts.length > 3 || parts.some((part) => !/^\d+$/.test(part))) {
    return undefined;
  }

  const seconds = parts.reduce((total, part) => total * 60 + Number(part), 0);
  return seconds > 0 ? seconds : undefined;
}
