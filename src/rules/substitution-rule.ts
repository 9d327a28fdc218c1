/**
 * sed-style substitution rules: `s<D><pattern><D><replacement><D><flags>`
 *
 * A rule is parsed once, when the configuration is resolved, into a compiled
 * pattern and a token list for the replacement. Every contract violation is
 * reported by `parseRule`; applying a parsed rule never throws.
 */

import { errorMessage, MalformedRuleError } from '../errors/custom-errors.js';

/**
 * Piece of a replacement template
 */
export type TemplateToken = { kind: 'literal'; text: string } | { kind: 'group'; index: number };

export type RuleFlags = {
  /** Case-insensitive matching (`i`) */
  ignoreCase: boolean;
};

export type SubstitutionRule = Readonly<{
  /** Rule text as written by the user */
  source: string;
  delimiter: string;
  pattern: RegExp;
  /** Number of capturing groups in the pattern */
  groupCount: number;
  template: readonly TemplateToken[];
  flags: Readonly<RuleFlags>;
}>;

const REGEX_METACHARACTERS = new Set(['^', '$', '.', '|', '?', '*', '+', '(', ')', '[', ']', '{', '}', '/']);

/**
 * Every match is replaced; `g` is accepted so sed-style rules keep working
 */
const KNOWN_FLAGS = new Set(['g', 'i']);

/**
 * Parse a rule string
 *
 * @throws MalformedRuleError when the rule breaks the delimiter, escaping,
 * pattern or group-reference contract
 */
export function parseRule(ruleText: string): SubstitutionRule {
  const chars = Array.from(ruleText);

  if (chars[0] !== 's') {
    throw new MalformedRuleError(`Rule must start with "s": "${ruleText}"`, ruleText);
  }

  const delimiter = chars[1];
  if (delimiter === undefined) {
    throw new MalformedRuleError(`Rule has no delimiter: "${ruleText}"`, ruleText);
  }
  if (/\s/.test(delimiter) || delimiter === '\\' || delimiter === 's') {
    throw new MalformedRuleError(
      `Invalid delimiter "${delimiter}": whitespace, "s" and backslash cannot be used`,
      ruleText,
      delimiter,
    );
  }

  const [patternSource, replacement, flagText] = splitSections(chars.slice(2), delimiter, ruleText);

  if (patternSource.length === 0) {
    throw new MalformedRuleError(`Rule has an empty pattern: "${ruleText}"`, ruleText);
  }

  const flags = parseFlags(flagText, ruleText);
  const regexFlags = flags.ignoreCase ? 'gi' : 'g';

  let pattern: RegExp;
  try {
    pattern = new RegExp(patternSource, regexFlags);
  } catch (error) {
    throw new MalformedRuleError(
      `Invalid pattern "${patternSource}": ${errorMessage(error)}`,
      ruleText,
      patternSource,
    );
  }

  const groupCount = countGroups(patternSource, flags);
  const template = tokenizeTemplate(replacement, groupCount, ruleText);

  return Object.freeze({
    source: ruleText,
    delimiter,
    pattern,
    groupCount,
    template: Object.freeze(template),
    flags: Object.freeze(flags),
  });
}

/**
 * Split the text after `s<D>` into pattern, replacement and flags
 *
 * `\<D>` is an escaped delimiter: in the pattern it stays a literal
 * character for the regex compiler, in the replacement it becomes the plain
 * character. Any other backslash pair is passed through untouched.
 */
function splitSections(chars: string[], delimiter: string, ruleText: string): [string, string, string] {
  const sections: string[] = [];
  let current = '';

  for (let i = 0; i < chars.length; i++) {
    const char = chars[i];

    if (char === '\\') {
      const next = chars[i + 1];
      if (next === undefined) {
        current += char;
      } else if (next === delimiter) {
        const inPattern = sections.length === 0;
        current += inPattern && REGEX_METACHARACTERS.has(delimiter) ? `\\${delimiter}` : delimiter;
        i++;
      } else {
        current += char + next;
        i++;
      }
      continue;
    }

    if (char === delimiter) {
      sections.push(current);
      current = '';
      continue;
    }

    current += char;
  }
  sections.push(current);

  const [pattern, replacement, flags] = sections;
  if (pattern === undefined || replacement === undefined || flags === undefined) {
    throw new MalformedRuleError(
      `Unterminated rule: expected 3 "${delimiter}" delimiters, found ${sections.length}: "${ruleText}"`,
      ruleText,
    );
  }
  if (sections.length > 3) {
    throw new MalformedRuleError(
      `Too many "${delimiter}" delimiters (escape literal ones as "\\${delimiter}"): "${ruleText}"`,
      ruleText,
      sections.slice(2).join(delimiter),
    );
  }

  return [pattern, replacement, flags];
}

function parseFlags(flagText: string, ruleText: string): RuleFlags {
  const seen = new Set<string>();

  for (const flag of flagText) {
    if (!KNOWN_FLAGS.has(flag) || seen.has(flag)) {
      throw new MalformedRuleError(`Unsupported or repeated flag "${flag}" in "${ruleText}"`, ruleText, flag);
    }
    seen.add(flag);
  }

  return { ignoreCase: seen.has('i') };
}

/**
 * Count capturing groups: an empty alternative always matches, and the
 * match array then has one slot per group
 */
function countGroups(patternSource: string, flags: RuleFlags): number {
  const emptyMatch = new RegExp(`${patternSource}|`, flags.ignoreCase ? 'i' : '').exec('');
  return emptyMatch ? emptyMatch.length - 1 : 0;
}

/**
 * Turn the replacement text into literal and group-reference tokens
 *
 * Supported escapes: `\1`..`\9`, `\g<N>`, `\\`, and a backslash before any
 * other non-alphanumeric character.
 */
function tokenizeTemplate(replacement: string, groupCount: number, ruleText: string): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  let literal = '';

  const pushGroup = (index: number, fragment: string) => {
    if (index > groupCount) {
      throw new MalformedRuleError(
        `Replacement references group ${index} but the pattern has ${groupCount} group(s)`,
        ruleText,
        fragment,
      );
    }
    if (literal) {
      tokens.push({ kind: 'literal', text: literal });
      literal = '';
    }
    tokens.push({ kind: 'group', index });
  };

  for (let i = 0; i < replacement.length; i++) {
    const char = replacement.charAt(i);
    if (char !== '\\') {
      literal += char;
      continue;
    }

    if (i + 1 >= replacement.length) {
      throw new MalformedRuleError(`Replacement ends with a lone backslash: "${ruleText}"`, ruleText, '\\');
    }

    const next = replacement.charAt(i + 1);

    if (/[1-9]/.test(next)) {
      pushGroup(Number(next), `\\${next}`);
      i++;
      continue;
    }

    if (next === 'g') {
      const named = /^g<(\d+)>/.exec(replacement.slice(i + 1));
      const digits = named?.[1];
      if (!named || digits === undefined) {
        throw new MalformedRuleError(`Malformed group reference in replacement: "${ruleText}"`, ruleText, '\\g');
      }
      pushGroup(Number(digits), `\\${named[0]}`);
      i += named[0].length;
      continue;
    }

    if (/[A-Za-z0-9]/.test(next)) {
      throw new MalformedRuleError(`Unsupported escape "\\${next}" in replacement`, ruleText, `\\${next}`);
    }

    literal += next;
    i++;
  }

  if (literal) {
    tokens.push({ kind: 'literal', text: literal });
  }

  return tokens;
}

/**
 * Apply a rule, returning `undefined` when the pattern does not match
 */
export function substitute(rule: SubstitutionRule, candidate: string): string | undefined {
  let matched = false;

  const result = candidate.replace(rule.pattern, (match: string, ...rest: unknown[]) => {
    matched = true;
    return expandTemplate(rule.template, match, rest);
  });

  return matched ? result : undefined;
}

/**
 * Apply a rule; a candidate the pattern does not match comes back unchanged
 */
export function applyRule(rule: SubstitutionRule, candidate: string): string {
  return substitute(rule, candidate) ?? candidate;
}

function expandTemplate(template: readonly TemplateToken[], match: string, captures: unknown[]): string {
  let output = '';

  for (const token of template) {
    if (token.kind === 'literal') {
      output += token.text;
    } else if (token.index === 0) {
      output += match;
    } else {
      // Groups that did not take part in the match expand to nothing
      const captured = captures[token.index - 1];
      output += typeof captured === 'string' ? captured : '';
    }
  }

  return output;
}
