/**
 * Match engine — decides whether a message hits a blocked phrase
 * or pattern. Pure functions; the only side effect is a warning
 * for stored patterns that no longer compile.
 *
 * Every scan stops at the first hit, in list order.
 */

import type { MatchMode, PatternValidation } from '../types/index.js';

export interface RegexMatchOptions {
  /** Log stored patterns that fail to compile */
  debug?: boolean;
}

/**
 * Return the first phrase the text matches, or null.
 */
export function findPhraseMatch(
  text: string,
  phrases: readonly string[],
  mode: MatchMode,
  caseSensitive: boolean
): string | null {
  if (!text || phrases.length === 0) return null;

  const haystack = caseSensitive ? text : text.toLowerCase();

  for (const phrase of phrases) {
    if (!phrase) continue;
    const needle = caseSensitive ? phrase : phrase.toLowerCase();
    if (testPhrase(haystack, needle, mode)) {
      return phrase;
    }
  }

  return null;
}

export function matchPhrase(
  text: string,
  phrases: readonly string[],
  mode: MatchMode,
  caseSensitive: boolean
): boolean {
  return findPhraseMatch(text, phrases, mode, caseSensitive) !== null;
}

/**
 * Return the first pattern found anywhere in the text, or null.
 * Case-insensitivity goes through the `i` flag; the text is searched as-is.
 */
export function findRegexMatch(
  text: string,
  patterns: readonly string[],
  caseSensitive: boolean,
  options: RegexMatchOptions = {}
): string | null {
  if (!text || patterns.length === 0) return null;

  const flags = caseSensitive ? '' : 'i';

  for (const pattern of patterns) {
    if (!pattern) continue;

    let regex: RegExp;
    try {
      regex = new RegExp(pattern, flags);
    } catch (error) {
      // Stored before it broke, or edited in by hand. Skip it, keep scanning.
      if (options.debug) {
        console.warn(`[hush] invalid pattern '${pattern}':`, errorMessage(error));
      }
      continue;
    }

    if (regex.test(text)) {
      return pattern;
    }
  }

  return null;
}

export function matchRegex(
  text: string,
  patterns: readonly string[],
  caseSensitive: boolean,
  options: RegexMatchOptions = {}
): boolean {
  return findRegexMatch(text, patterns, caseSensitive, options) !== null;
}

/**
 * Check that a pattern compiles. The error is the engine's own message.
 */
export function validatePattern(pattern: string): PatternValidation {
  try {
    new RegExp(pattern);
    return { valid: true };
  } catch (error) {
    return { valid: false, error: errorMessage(error) };
  }
}

function testPhrase(haystack: string, needle: string, mode: MatchMode): boolean {
  switch (mode) {
    case 'exact':
      return haystack === needle;

    case 'startswith':
      return haystack.startsWith(needle);

    case 'endswith':
      return haystack.endsWith(needle);

    case 'contains':
    default:
      return haystack.includes(needle);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
