/**
 * Longest filename most file systems accept, in UTF-8 bytes
 */
export const MAX_FILENAME_BYTES = 255;

/**
 * Utility to sanitize filenames for cross-platform compatibility
 * Specifically targets Windows restrictions which are stricter than *nix,
 * and path separators, so a name can never leave its directory
 */
export function sanitizeFilename(name: string): string {
  const cleaned = name
    // Replace Windows illegal characters and path separators: < > : " / \ | ? *
    .replace(/[<>:"/\\|?*]/g, '_')
    // Remove control characters (0-31 in ASCII)
    // biome-ignore lint/suspicious/noControlCharactersInRegex: Needed to strip control characters
    .replace(/[\x00-\x1F]/g, '')
    // Remove trailing spaces and dots (Windows doesn't like them)
    .replace(/[\s.]+$/, '');

  return truncateFilename(cleaned, MAX_FILENAME_BYTES);
}

/**
 * Shorten a filename to `maxBytes` of UTF-8, keeping a short extension intact
 *
 * Cuts only between code points.
 */
export function truncateFilename(name: string, maxBytes: number): string {
  if (Buffer.byteLength(name, 'utf8') <= maxBytes) {
    return name;
  }

  const dot = name.lastIndexOf('.');
  const extension = dot > 0 && name.length - dot <= 10 ? name.slice(dot) : '';
  const stem = extension ? name.slice(0, dot) : name;

  return fitBytes(stem, maxBytes - Buffer.byteLength(extension, 'utf8')) + extension;
}

function fitBytes(text: string, maxBytes: number): string {
  let result = '';
  let used = 0;

  for (const char of text) {
    const size = Buffer.byteLength(char, 'utf8');
    if (used + size > maxBytes) {
      break;
    }
    result += char;
    used += size;
  }

  return result;
}
