/**
 * Desktop browser User-Agent sent with every request
 */
export const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/**
 * Request headers for a GET with the given Accept value
 */
export function requestHeaders(accept: string): Record<string, string> {
  return {
    'User-Agent': USER_AGENT,
    Accept: accept,
    'Accept-Language': 'en-US,en;q=0.9',
  };
}

/**
 * Check if a string is an absolute http(s) URL
 */
export function isHttpUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Resolve a possibly relative reference against a base URL
 *
 * @returns Absolute URL, or undefined when the reference cannot be resolved
 */
export function resolveUrl(reference: string, base: string): string | undefined {
  const trimmed = reference.trim();
  if (!trimmed) {
    return undefined;
  }

  try {
    return new URL(trimmed, base).toString();
  } catch {
    return undefined;
  }
}
