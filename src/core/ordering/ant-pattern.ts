/**
 * Ant-style URL pattern compiler.
 *
 * Supports `?` (one character except `/`), `*` (any run without `/`) and
 * `**` (any run, `/` included). Spring path variables such as
 * `{id:[0-9]+}` are not globs; patterns holding one never match.
 */

import type { MatchRule } from './types.js';

/** Characters that make a text look like a pattern rather than a path. */
const MATCHER_SPECIAL_CHAR = /[?*{]/;

/** Regex metacharacters that may appear literally in an Ant pattern. */
const REGEXP_SPECIAL_CHARS = /([.(){}+|^$[\]\\])/g;

/** Stands in for `**` while single stars are rewritten. */
const DOUBLE_STAR_PLACEHOLDER = '\u0000';

/**
 * Escape regex metacharacters with a backslash.
 */
export function escapeRegExpChars(pattern: string): string {
  return pattern.replace(REGEXP_SPECIAL_CHARS, '\\$1');
}

/**
 * Translate an Ant pattern into an anchored regular expression source.
 */
export function antPatternToRegExpSource(pattern: string): string {
  const body = escapeRegExpChars(pattern)
    .replaceAll('?', '[^/]')
    .replaceAll('**', DOUBLE_STAR_PLACEHOLDER)
    .replaceAll('*', '[^/]*')
    .replaceAll(DOUBLE_STAR_PLACEHOLDER, '.*');
  return `^${body}$`;
}

/**
 * Returns true when `pattern` matches every request `text` would match,
 * as far as can be told from the two literals.
 */
export function matchesAntPattern(pattern: string, text: string): boolean {
  return compileAntPattern(pattern).matches(text);
}

/**
 * Compile an Ant pattern into a reusable {@link MatchRule}.
 */
export function compileAntPattern(pattern: string): MatchRule {
  const prefix = pattern.endsWith('**') ? pattern.slice(0, -2) : null;
  const incomparable = pattern === '' || pattern.includes('{');
  // Built on first use; exact and prefix matches never need it.
  let regex: RegExp | undefined;

  return {
    pattern,
    matches(text: string): boolean {
      if (pattern === text) {
        return true;
      }
      if (prefix !== null && text.startsWith(prefix)) {
        return true;
      }
      if (incomparable || MATCHER_SPECIAL_CHAR.test(text)) {
        return false;
      }
      // `u` so `?` and `[^/]` consume a whole code point
      regex ??= new RegExp(antPatternToRegExpSource(pattern), 'su');
      return regex.test(text);
    },
  };
}

/**
 * Memoizes compiled patterns for one analysis pass.
 */
export class MatchRuleCache {
  private rules = new Map<string, MatchRule>();

  get(pattern: string): MatchRule {
    let rule = this.rules.get(pattern);
    if (!rule) {
      rule = compileAntPattern(pattern);
      this.rules.set(pattern, rule);
    }
    return rule;
  }

  get size(): number {
    return this.rules.size;
  }

  clear(): void {
    this.rules.clear();
  }
}
