import { createHash } from 'node:crypto';
import { sanitizeFilename } from '../utils/filename-sanitizer.js';
import { type SubstitutionRule, substitute } from './substitution-rule.js';

/**
 * Final path segment of a URL, without query or fragment, percent-decoded
 *
 * Malformed percent escapes are kept as they are.
 */
export function defaultFilename(sourceUrl: string): string {
  let path: string;
  try {
    path = new URL(sourceUrl).pathname;
  } catch {
    path = sourceUrl.split(/[?#]/, 1)[0] ?? '';
  }

  const segment = path.split('/').filter((part) => part.length > 0).pop() ?? '';

  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Stable fallback name for URLs that leave nothing usable
 */
export function fallbackFilename(sourceUrl: string): string {
  const digest = createHash('sha1').update(sourceUrl).digest('hex');
  return `episode-${digest.slice(0, 12)}`;
}

/**
 * Local filename for an episode's media file
 *
 * The rule's result when it matches the source URL, the URL's basename
 * otherwise. Either way the name is sanitized so it stays inside the
 * download directory.
 */
export function resolveFilename(rule: SubstitutionRule | undefined, sourceUrl: string): string {
  const substituted = rule ? substitute(rule, sourceUrl) : undefined;
  const name = sanitizeFilename(substituted ?? defaultFilename(sourceUrl));
  return name.length > 0 ? name : fallbackFilename(sourceUrl);
}
