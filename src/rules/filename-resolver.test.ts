import { describe, expect, it } from 'vitest';
import { defaultFilename, fallbackFilename, resolveFilename } from './filename-resolver.js';
import { parseRule } from './substitution-rule.js';

describe('defaultFilename', () => {
  it('should take the last path segment and decode it', () => {
    expect(defaultFilename('https://cdn.example.com/shows/My%20Show/ep%201.mp3?token=abc#t=10')).toBe('ep 1.mp3');
  });

  it('should ignore a trailing slash', () => {
    expect(defaultFilename('https://cdn.example.com/shows/latest/')).toBe('latest');
  });

  it('should keep malformed percent escapes verbatim', () => {
    expect(defaultFilename('https://example.com/a%E0%A4%A.mp3')).toBe('a%E0%A4%A.mp3');
  });

  it('should cope with strings that are not URLs', () => {
    expect(defaultFilename('not a url/file.mp3?x=1')).toBe('file.mp3');
  });
});

describe('resolveFilename', () => {
  it('should use the basename when no rule is configured', () => {
    expect(resolveFilename(undefined, 'https://cdn.example.com/a/episode-12.mp3')).toBe('episode-12.mp3');
  });

  it('should use the rule result when it matches', () => {
    const rule = parseRule('s,^.+/([^/]+)/media([.]\\w+)$,\\1\\2,');
    expect(resolveFilename(rule, 'https://media.example.com/warcollege/episode-slug/media.mp3')).toBe(
      'episode-slug.mp3',
    );
  });

  it('should fall back to the basename when the rule does not match', () => {
    const rule = parseRule('s,^.+/([^/]+)/media([.]\\w+)$,\\1\\2,');
    expect(resolveFilename(rule, 'https://cdn.example.com/a/b/track%2001.ogg')).toBe('track 01.ogg');
  });

  it('should keep path separators produced by a rule out of the filename', () => {
    const rule = parseRule('s/^https:\\/\\///');
    expect(resolveFilename(rule, 'https://h.example.com/a/b.mp3')).toBe('h.example.com_a_b.mp3');
  });

  it('should fall back to a hashed name when nothing usable remains', () => {
    const name = resolveFilename(undefined, 'https://example.com/');
    expect(name).toMatch(/^episode-[0-9a-f]{12}$/);
    expect(name).toBe(fallbackFilename('https://example.com/'));
    expect(resolveFilename(parseRule('s/.*//'), 'https://example.com/x.mp3')).toBe(
      fallbackFilename('https://example.com/x.mp3'),
    );
  });
});
